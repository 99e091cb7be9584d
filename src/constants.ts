import { maxInt128, maxUint128, minInt128, type Address } from "viem";

/***************** Fixed-point constants *****************/
export const Q32 = 1n << 32n;
export const Q96 = 1n << 96n;
export const Q128 = 1n << 128n;
export const Q256 = 1n << 256n;

export const MAX_UINT128 = maxUint128;
export const MAX_UINT256 = Q256 - 1n;
export const MIN_INT128 = minInt128;
export const MAX_INT128 = maxInt128;

/***************** Tick bounds (price = 1.0001^tick) *****************/
export const MIN_TICK = -887272;
export const MAX_TICK = 887272;
export const MAX_TICK_SPACING = 16384;

// tickToSqrtPrice(MIN_TICK) and tickToSqrtPrice(MAX_TICK)
export const MIN_SQRT_PRICE = 4295128739n;
export const MAX_SQRT_PRICE =
  1461446703485210103287273052203988822378723970342n;

/***************** Fees *****************/
// fee is expressed in millionths of the input amount (3000 = 0.3%)
export const FEE_DENOMINATOR = 1_000_000n;

// initialized-tick search span per skipAhead unit, in multiples of tickSpacing
export const TICK_SEARCH_WORD = 256;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
