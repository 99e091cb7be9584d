import type { Address } from "viem";
import { Q128 } from "./constants";
import { InvariantViolationError, ValidationError } from "./errors";
import { mulDiv, toInt128, wrappingAdd256, wrappingSub256 } from "./math/full_math";
import {
  addLiquidityDelta,
  amountsForLiquidityDelta,
  maxLiquidityPerTick,
} from "./math/liquidity_math";
import { tickToSqrtPrice } from "./math/tick_math";
import { validateRange, type PoolId } from "./pool_key";
import {
  ZERO_FEES,
  type FeesPerLiquidity,
  type PoolRecord,
  type PositionKey,
  type PositionRecord,
  type StateStore,
  type TokenAmounts,
} from "./state_store";
import type { BalanceDelta, CollectFeesParams, UpdatePositionParams } from "./types";

const NO_FEES: Readonly<TokenAmounts> = Object.freeze({ amount0: 0n, amount1: 0n });

function requirePool(store: StateStore, poolId: PoolId): PoolRecord {
  const pool = store.getPool(poolId);
  if (!pool) {
    throw new ValidationError("POOL_NOT_INITIALIZED", `pool ${poolId} is not initialized`);
  }
  return pool;
}

/***************** Fee growth *****************/

/**
 * Fees per unit of liquidity earned inside [tickLower, tickUpper], from the
 * global accumulator and the outside values of both boundary ticks. All
 * arithmetic wraps modulo 2^256; only differences are meaningful.
 */
export function feesPerLiquidityInside(
  store: StateStore,
  poolId: PoolId,
  tickLower: number,
  tickUpper: number
): FeesPerLiquidity {
  const pool = requirePool(store, poolId);
  const lower = store.getTick(poolId, tickLower)?.feesPerLiquidityOutside ?? ZERO_FEES;
  const upper = store.getTick(poolId, tickUpper)?.feesPerLiquidityOutside ?? ZERO_FEES;
  const global = pool.feesPerLiquidity;

  if (pool.tick < tickLower) {
    return {
      value0: wrappingSub256(lower.value0, upper.value0),
      value1: wrappingSub256(lower.value1, upper.value1),
    };
  }
  if (pool.tick >= tickUpper) {
    return {
      value0: wrappingSub256(upper.value0, lower.value0),
      value1: wrappingSub256(upper.value1, lower.value1),
    };
  }
  return {
    value0: wrappingSub256(wrappingSub256(global.value0, lower.value0), upper.value0),
    value1: wrappingSub256(wrappingSub256(global.value1, lower.value1), upper.value1),
  };
}

// (inside - last) * liquidity / 2^128, rounded down
function accruedFees(
  position: PositionRecord | undefined,
  inside: FeesPerLiquidity
): TokenAmounts {
  if (!position) return { ...NO_FEES };
  const { feesPerLiquidityInsideLast: last, liquidity, feesOwed } = position;
  return {
    amount0: feesOwed.amount0 + mulDiv(wrappingSub256(inside.value0, last.value0), liquidity, Q128),
    amount1: feesOwed.amount1 + mulDiv(wrappingSub256(inside.value1, last.value1), liquidity, Q128),
  };
}

/***************** Ticks *****************/

/**
 * Applies a position's liquidity change to one boundary tick. Returns true
 * when the tick's gross liquidity dropped to zero; clearing is deferred until
 * the position's fees have been computed from the tick's outside values.
 */
function updateTick(
  store: StateStore,
  poolId: PoolId,
  pool: PoolRecord,
  tick: number,
  liquidityDelta: bigint,
  isUpper: boolean
): boolean {
  const info = store.getTick(poolId, tick);
  const grossAfter = addLiquidityDelta(info?.liquidityGross ?? 0n, liquidityDelta);

  const cap = maxLiquidityPerTick(pool.key.config.tickSpacing);
  if (grossAfter > cap) {
    throw new InvariantViolationError(
      "TICK_LIQUIDITY_OVERFLOW",
      `tick ${tick} gross liquidity ${grossAfter} exceeds ${cap}`
    );
  }

  const net = (info?.liquidityDelta ?? 0n) + (isUpper ? -liquidityDelta : liquidityDelta);
  store.setTick(poolId, tick, {
    liquidityDelta: toInt128(net, `tick ${tick} liquidity delta`),
    liquidityGross: grossAfter,
    // by convention all growth so far happened below a freshly used tick
    feesPerLiquidityOutside: info
      ? info.feesPerLiquidityOutside
      : tick <= pool.tick
        ? { ...pool.feesPerLiquidity }
        : { ...ZERO_FEES },
  });
  return grossAfter === 0n;
}

/***************** Positions *****************/

export interface PositionUpdate extends BalanceDelta {
  // fees paid out because the position was closed
  feesPaid: TokenAmounts;
  liquidityAfter: bigint;
}

/**
 * Changes the liquidity of (owner, salt, range). Fees earned since the last
 * touch are accrued with the liquidity held before the change and the
 * checkpoint is set to the current inside value. Closing a position pays its
 * owed fees in the same delta.
 */
export function updatePosition(
  store: StateStore,
  poolId: PoolId,
  owner: Address,
  params: UpdatePositionParams
): PositionUpdate {
  const pool = requirePool(store, poolId);
  const { salt, tickLower, tickUpper, liquidityDelta } = params;
  validateRange({ tickLower, tickUpper }, pool.key.config.tickSpacing);
  toInt128(liquidityDelta, "liquidityDelta");
  if (salt < 0n) {
    throw new ValidationError("INVALID_SALT", `salt ${salt} must be non-negative`);
  }

  const key: PositionKey = { owner, salt, tickLower, tickUpper };
  const existing = store.getPosition(poolId, key);
  if (!existing && liquidityDelta <= 0n) {
    throw new ValidationError(
      liquidityDelta === 0n ? "POSITION_NOT_FOUND" : "INSUFFICIENT_LIQUIDITY",
      `no position for ${owner} salt ${salt} in [${tickLower}, ${tickUpper}]`
    );
  }
  const liquidityBefore = existing?.liquidity ?? 0n;
  const liquidityAfter = addLiquidityDelta(liquidityBefore, liquidityDelta);

  let clearLower = false;
  let clearUpper = false;
  if (liquidityDelta !== 0n) {
    clearLower = updateTick(store, poolId, pool, tickLower, liquidityDelta, false);
    clearUpper = updateTick(store, poolId, pool, tickUpper, liquidityDelta, true);
  }

  const inside = feesPerLiquidityInside(store, poolId, tickLower, tickUpper);
  const owed = accruedFees(existing, inside);

  const principal = amountsForLiquidityDelta(
    pool.sqrtPrice,
    tickToSqrtPrice(tickLower),
    tickToSqrtPrice(tickUpper),
    liquidityDelta
  );

  if (liquidityDelta !== 0n && pool.tick >= tickLower && pool.tick < tickUpper) {
    store.setPool(poolId, {
      ...pool,
      liquidity: addLiquidityDelta(pool.liquidity, liquidityDelta),
    });
  }

  let feesPaid: TokenAmounts = { ...NO_FEES };
  if (liquidityAfter === 0n) {
    feesPaid = owed;
    store.deletePosition(poolId, key);
  } else {
    store.setPosition(poolId, {
      ...key,
      liquidity: liquidityAfter,
      feesPerLiquidityInsideLast: inside,
      feesOwed: owed,
    });
  }

  if (clearLower) store.clearTick(poolId, tickLower);
  if (clearUpper) store.clearTick(poolId, tickUpper);

  return {
    delta0: toInt128(principal.amount0 - feesPaid.amount0, "delta0"),
    delta1: toInt128(principal.amount1 - feesPaid.amount1, "delta1"),
    feesPaid,
    liquidityAfter,
  };
}

/** Pays out everything the position has earned; a second call returns zero. */
export function collectFees(
  store: StateStore,
  poolId: PoolId,
  owner: Address,
  params: CollectFeesParams
): TokenAmounts {
  const pool = requirePool(store, poolId);
  validateRange(params, pool.key.config.tickSpacing);
  const key: PositionKey = { owner, ...params };
  const existing = store.getPosition(poolId, key);
  if (!existing) {
    throw new ValidationError(
      "POSITION_NOT_FOUND",
      `no position for ${owner} salt ${params.salt} in [${params.tickLower}, ${params.tickUpper}]`
    );
  }

  const inside = feesPerLiquidityInside(store, poolId, params.tickLower, params.tickUpper);
  const owed = accruedFees(existing, inside);
  store.setPosition(poolId, {
    ...existing,
    feesPerLiquidityInsideLast: inside,
    feesOwed: { ...NO_FEES },
  });
  return owed;
}

/** Owed plus not-yet-accrued fees, without touching the position. */
export function getPositionFees(
  store: StateStore,
  poolId: PoolId,
  key: PositionKey
): TokenAmounts {
  const position = store.getPosition(poolId, key);
  if (!position) return { ...NO_FEES };
  return accruedFees(position, feesPerLiquidityInside(store, poolId, key.tickLower, key.tickUpper));
}

/**
 * Adds a donation to the global accumulators of the pool so that in-range
 * liquidity earns it. Returns the part that nobody can earn.
 */
export function donateToLiquidity(
  store: StateStore,
  poolId: PoolId,
  amount0: bigint,
  amount1: bigint
): TokenAmounts {
  const pool = requirePool(store, poolId);
  if (pool.liquidity === 0n) return { amount0, amount1 };
  store.setPool(poolId, {
    ...pool,
    feesPerLiquidity: {
      value0: wrappingAdd256(pool.feesPerLiquidity.value0, mulDiv(amount0, Q128, pool.liquidity)),
      value1: wrappingAdd256(pool.feesPerLiquidity.value1, mulDiv(amount1, Q128, pool.liquidity)),
    },
  });
  return { ...NO_FEES };
}
