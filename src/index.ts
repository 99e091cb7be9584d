export * from "./constants";
export * from "./errors";
export * from "./types";
export { loadEngineConfig, type EngineConfig, type LogLevel } from "./config/engine_config";
export { Logger, formatLine } from "./logger";
export * from "./math/full_math";
export * from "./math/tick_math";
export * from "./math/sqrt_price_math";
export * from "./math/swap_math";
export * from "./math/liquidity_math";
export * from "./math/price";
export * from "./pool_key";
export * from "./state_store";
export { DebtLedger, type Actor, type Session } from "./debt_ledger";
export { Journal, recordMapEntry } from "./journal";
export * from "./extensions";
export { executeSwap, isZeroForOne, validateSwapParams, type SwapContext } from "./swap_executor";
export {
  collectFees,
  donateToLiquidity,
  feesPerLiquidityInside,
  getPositionFees,
  updatePosition,
  type PositionUpdate,
} from "./position_accounting";
export type { Token } from "./tokens/token";
export { InMemoryToken, type InMemoryTokenOptions } from "./tokens/in_memory_token";
export { TokenRegistry } from "./tokens/token_registry";
export { Engine, type EngineOptions, type ForwardTarget } from "./engine";
