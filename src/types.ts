import type { FeesPerLiquidity } from "./state_store";

// Signed amounts from the caller's side: positive is owed to the engine,
// negative is owed to the caller.
export interface BalanceDelta {
  delta0: bigint;
  delta1: bigint;
}

export interface PoolState {
  sqrtPrice: bigint;
  tick: number;
  liquidity: bigint;
  feesPerLiquidity: FeesPerLiquidity;
}

export interface SwapParams {
  // which token `amount` refers to
  isToken1: boolean;
  // > 0 exact input, < 0 exact output
  amount: bigint;
  sqrtPriceLimit: bigint;
  // extra tick-search words per step; defaults to the engine config
  skipAhead?: number;
}

export interface SwapResult extends BalanceDelta {
  state: PoolState;
  ticksCrossed: number;
  steps: number;
  // protocol share of the swap fee, in the input token
  protocolFee: bigint;
}

export interface UpdatePositionParams {
  salt: bigint;
  tickLower: number;
  tickUpper: number;
  liquidityDelta: bigint;
}

export interface CollectFeesParams {
  salt: bigint;
  tickLower: number;
  tickUpper: number;
}
