import {
  FEE_DENOMINATOR,
  MAX_SQRT_PRICE,
  MAX_TICK,
  MIN_SQRT_PRICE,
  MIN_TICK,
  Q128,
  TICK_SEARCH_WORD,
} from "./constants";
import { ValidationError } from "./errors";
import type { Logger } from "./logger";
import { mulDiv, toInt128, wrappingAdd256, wrappingSub256 } from "./math/full_math";
import { addLiquidityDelta } from "./math/liquidity_math";
import { computeSwapStep } from "./math/swap_math";
import { sqrtPriceToTick, tickToSqrtPrice } from "./math/tick_math";
import type { PoolId } from "./pool_key";
import type { FeesPerLiquidity, PoolRecord, StateStore } from "./state_store";
import type { SwapParams, SwapResult } from "./types";

export interface SwapContext {
  store: StateStore;
  poolId: PoolId;
  protocolFeePpm: number;
  skipAhead: number;
  logger: Logger;
}

// seeking-boundary -> crossing-tick | limit-reached | amount-exhausted -> done
type SwapPhase = "seeking-boundary" | "crossing-tick" | "limit-reached" | "amount-exhausted" | "done";

interface SwapState {
  phase: SwapPhase;
  amountRemaining: bigint; // specified token, same sign as the request
  amountCalculated: bigint; // other token, unsigned
  sqrtPrice: bigint;
  tick: number;
  liquidity: bigint;
  feesPerLiquidity: FeesPerLiquidity;
  protocolFee: bigint;
  ticksCrossed: number;
  steps: number;
}

function clampTick(tick: number): number {
  return Math.min(MAX_TICK, Math.max(MIN_TICK, tick));
}

/** Price moves down (token0 in, token1 out) exactly when this returns true. */
export function isZeroForOne(params: Pick<SwapParams, "isToken1" | "amount">): boolean {
  return params.isToken1 === (params.amount < 0n);
}

export function validateSwapParams(pool: PoolRecord, params: SwapParams): void {
  toInt128(params.amount, "swap amount");
  const limit = params.sqrtPriceLimit;
  if (limit < MIN_SQRT_PRICE || limit > MAX_SQRT_PRICE) {
    throw new ValidationError(
      "INVALID_SQRT_PRICE_LIMIT",
      `limit ${limit} outside [${MIN_SQRT_PRICE}, ${MAX_SQRT_PRICE}]`
    );
  }
  if (params.skipAhead !== undefined && (!Number.isSafeInteger(params.skipAhead) || params.skipAhead < 0)) {
    throw new ValidationError("INVALID_SKIP_AHEAD", `skipAhead ${params.skipAhead} must be a non-negative integer`);
  }
  if (params.amount === 0n || limit === pool.sqrtPrice) return;

  const zeroForOne = isZeroForOne(params);
  if (zeroForOne ? limit > pool.sqrtPrice : limit < pool.sqrtPrice) {
    throw new ValidationError(
      "INVALID_SQRT_PRICE_LIMIT",
      `limit ${limit} is on the wrong side of price ${pool.sqrtPrice} for a ` +
        `${zeroForOne ? "decreasing" : "increasing"} swap`
    );
  }
}

/**
 * Walks initialized ticks from the current price toward `sqrtPriceLimit`
 * until the specified amount is used up. Writes the pool, crossed ticks and
 * protocol fees to the store; posting the delta is left to the caller.
 */
export function executeSwap(ctx: SwapContext, params: SwapParams): SwapResult {
  const { store, poolId, logger } = ctx;
  const pool = store.getPool(poolId);
  if (!pool) {
    throw new ValidationError("POOL_NOT_INITIALIZED", `pool ${poolId} is not initialized`);
  }
  validateSwapParams(pool, params);

  const { amount, isToken1, sqrtPriceLimit } = params;
  const zeroForOne = isZeroForOne(params);
  const exactIn = amount > 0n;
  const fee = BigInt(pool.key.config.fee);
  const protocolFeePpm = BigInt(ctx.protocolFeePpm);
  const searchSpan = ((params.skipAhead ?? ctx.skipAhead) + 1) * TICK_SEARCH_WORD * pool.key.config.tickSpacing;

  const s: SwapState = {
    phase: "seeking-boundary",
    amountRemaining: amount,
    amountCalculated: 0n,
    sqrtPrice: pool.sqrtPrice,
    tick: pool.tick,
    liquidity: pool.liquidity,
    feesPerLiquidity: { ...pool.feesPerLiquidity },
    protocolFee: 0n,
    ticksCrossed: 0,
    steps: 0,
  };

  if (amount === 0n || sqrtPriceLimit === pool.sqrtPrice) s.phase = "done";

  let boundary = s.tick;
  let boundaryInitialized = false;
  let boundaryPrice = s.sqrtPrice;

  while (s.phase !== "done") {
    switch (s.phase) {
      case "seeking-boundary": {
        const next = store.nextInitializedTick(poolId, s.tick, zeroForOne, searchSpan);
        boundary = clampTick(next.tick);
        boundaryInitialized = next.initialized && boundary === next.tick;
        boundaryPrice = tickToSqrtPrice(boundary);

        const target = zeroForOne
          ? boundaryPrice < sqrtPriceLimit ? sqrtPriceLimit : boundaryPrice
          : boundaryPrice > sqrtPriceLimit ? sqrtPriceLimit : boundaryPrice;

        const priceBefore = s.sqrtPrice;
        const step = computeSwapStep(s.sqrtPrice, target, s.liquidity, s.amountRemaining, fee);
        s.steps++;

        if (exactIn) {
          s.amountRemaining -= step.amountIn + step.feeAmount;
          s.amountCalculated += step.amountOut;
        } else {
          s.amountRemaining += step.amountOut;
          s.amountCalculated += step.amountIn + step.feeAmount;
        }

        // a step without liquidity moves no tokens and charges no fee
        const protocolShare = (step.feeAmount * protocolFeePpm) / FEE_DENOMINATOR;
        if (s.liquidity > 0n) {
          const growth = mulDiv(step.feeAmount - protocolShare, Q128, s.liquidity);
          if (zeroForOne) {
            s.feesPerLiquidity.value0 = wrappingAdd256(s.feesPerLiquidity.value0, growth);
          } else {
            s.feesPerLiquidity.value1 = wrappingAdd256(s.feesPerLiquidity.value1, growth);
          }
        }
        s.protocolFee += protocolShare;
        s.sqrtPrice = step.nextSqrtPrice;

        if (s.sqrtPrice === boundaryPrice) {
          s.phase = "crossing-tick";
        } else {
          if (s.sqrtPrice !== priceBefore) s.tick = sqrtPriceToTick(s.sqrtPrice);
          s.phase = s.amountRemaining === 0n ? "amount-exhausted" : "limit-reached";
        }
        logger.debug("STEP", {
          pool: poolId.slice(0, 10),
          step: s.steps,
          target: target.toString(),
          price: s.sqrtPrice.toString(),
          in: step.amountIn,
          out: step.amountOut,
          fee: step.feeAmount,
        });
        break;
      }

      case "crossing-tick": {
        if (boundaryInitialized) {
          const info = store.getTick(poolId, boundary);
          if (info) {
            store.setTick(poolId, boundary, {
              ...info,
              feesPerLiquidityOutside: {
                value0: wrappingSub256(s.feesPerLiquidity.value0, info.feesPerLiquidityOutside.value0),
                value1: wrappingSub256(s.feesPerLiquidity.value1, info.feesPerLiquidityOutside.value1),
              },
            });
            const net = zeroForOne ? -info.liquidityDelta : info.liquidityDelta;
            s.liquidity = addLiquidityDelta(s.liquidity, net);
            s.ticksCrossed++;
          }
        }
        // landing on a boundary while moving down leaves the boundary inactive
        s.tick = zeroForOne ? boundary - 1 : boundary;

        if (s.amountRemaining === 0n) s.phase = "amount-exhausted";
        else if (s.sqrtPrice === sqrtPriceLimit) s.phase = "limit-reached";
        else s.phase = "seeking-boundary";
        break;
      }

      case "limit-reached":
      case "amount-exhausted":
        s.phase = "done";
        break;
    }
  }

  const specified = amount - s.amountRemaining;
  const calculated = exactIn ? -s.amountCalculated : s.amountCalculated;
  const delta0 = toInt128(isToken1 ? calculated : specified, "delta0");
  const delta1 = toInt128(isToken1 ? specified : calculated, "delta1");

  const updated: PoolRecord = {
    ...pool,
    sqrtPrice: s.sqrtPrice,
    tick: s.tick,
    liquidity: s.liquidity,
    feesPerLiquidity: s.feesPerLiquidity,
  };
  store.setPool(poolId, updated);
  store.addProtocolFees(zeroForOne ? pool.key.token0 : pool.key.token1, s.protocolFee);

  return {
    delta0,
    delta1,
    state: {
      sqrtPrice: updated.sqrtPrice,
      tick: updated.tick,
      liquidity: updated.liquidity,
      feesPerLiquidity: { ...updated.feesPerLiquidity },
    },
    ticksCrossed: s.ticksCrossed,
    steps: s.steps,
    protocolFee: s.protocolFee,
  };
}
