import { MAX_TICK, MAX_UINT128, MIN_TICK, Q96 } from "../constants";
import { InvariantViolationError, ValidationError } from "../errors";
import { getAmount0Delta, getAmount1Delta } from "./sqrt_price_math";
import { toUint128 } from "./full_math";

/** x + y for a uint128 liquidity and a signed delta; rejects underflow and overflow. */
export function addLiquidityDelta(x: bigint, y: bigint): bigint {
  const z = x + y;
  if (z < 0n) {
    throw new ValidationError(
      "INSUFFICIENT_LIQUIDITY",
      `liquidity ${x} cannot absorb delta ${y}`
    );
  }
  if (z > MAX_UINT128) {
    throw new InvariantViolationError(
      "LIQUIDITY_OVERFLOW",
      `liquidity ${x} + ${y} exceeds uint128`
    );
  }
  return z;
}

/**
 * Gross liquidity cap per initialized tick, so the sum over every usable tick
 * can never overflow uint128 active liquidity.
 */
export function maxLiquidityPerTick(tickSpacing: number): bigint {
  const minTick = Math.ceil(MIN_TICK / tickSpacing) * tickSpacing;
  const maxTick = Math.floor(MAX_TICK / tickSpacing) * tickSpacing;
  const numTicks = BigInt((maxTick - minTick) / tickSpacing + 1);
  return MAX_UINT128 / numTicks;
}

/**
 * Signed token amounts for a liquidity change over [sqrtLower, sqrtUpper] at
 * the current price. Deposits round up (owed to the pool), withdrawals round down.
 */
export function amountsForLiquidityDelta(
  sqrtPrice: bigint,
  sqrtLower: bigint,
  sqrtUpper: bigint,
  liquidityDelta: bigint
): { amount0: bigint; amount1: bigint } {
  if (liquidityDelta === 0n) return { amount0: 0n, amount1: 0n };

  const roundUp = liquidityDelta > 0n;
  const magnitude = roundUp ? liquidityDelta : -liquidityDelta;
  const sign = roundUp ? 1n : -1n;

  let amount0 = 0n;
  let amount1 = 0n;
  if (sqrtPrice <= sqrtLower) {
    amount0 = getAmount0Delta(sqrtLower, sqrtUpper, magnitude, roundUp);
  } else if (sqrtPrice < sqrtUpper) {
    amount0 = getAmount0Delta(sqrtPrice, sqrtUpper, magnitude, roundUp);
    amount1 = getAmount1Delta(sqrtLower, sqrtPrice, magnitude, roundUp);
  } else {
    amount1 = getAmount1Delta(sqrtLower, sqrtUpper, magnitude, roundUp);
  }
  return { amount0: amount0 * sign, amount1: amount1 * sign };
}

/**
 * Largest liquidity whose deposit over [sqrtLower, sqrtUpper] costs at most
 * amount0 and amount1. Rounds down.
 */
export function liquidityForAmounts(
  sqrtPrice: bigint,
  sqrtLower: bigint,
  sqrtUpper: bigint,
  amount0: bigint,
  amount1: bigint
): bigint {
  const sa = sqrtLower < sqrtUpper ? sqrtLower : sqrtUpper;
  const sb = sqrtLower < sqrtUpper ? sqrtUpper : sqrtLower;

  const forAmount0 = (lo: bigint) => (amount0 * ((lo * sb) / Q96)) / (sb - lo);
  const forAmount1 = (hi: bigint) => (amount1 * Q96) / (hi - sa);

  let liquidity: bigint;
  if (sqrtPrice <= sa) {
    liquidity = forAmount0(sa);
  } else if (sqrtPrice < sb) {
    const l0 = forAmount0(sqrtPrice);
    const l1 = forAmount1(sqrtPrice);
    liquidity = l0 < l1 ? l0 : l1;
  } else {
    liquidity = forAmount1(sb);
  }
  return toUint128(liquidity, "liquidity");
}
