import {
  MAX_SQRT_PRICE,
  MAX_TICK,
  MAX_UINT256,
  MIN_SQRT_PRICE,
  MIN_TICK,
  Q32,
} from "../constants";
import { ArithmeticDomainError } from "../errors";

// 1/sqrt(1.0001)^(2^i) in Q128.128, for i = 1..19 (bit 0 handled separately)
const RATIO_FACTORS: ReadonlyArray<readonly [number, bigint]> = [
  [0x2, 0xfff97272373d413259a46990580e213an],
  [0x4, 0xfff2e50f5f656932ef12357cf3c7fdccn],
  [0x8, 0xffe5caca7e10e4e61c3624eaa0941cd0n],
  [0x10, 0xffcb9843d60f6159c9db58835c926644n],
  [0x20, 0xff973b41fa98c081472e6896dfb254c0n],
  [0x40, 0xff2ea16466c96a3843ec78b326b52861n],
  [0x80, 0xfe5dee046a99a2a811c461f1969c3053n],
  [0x100, 0xfcbe86c7900a88aedcffc83b479aa3a4n],
  [0x200, 0xf987a7253ac413176f2b074cf7815e54n],
  [0x400, 0xf3392b0822b70005940c7a398e4b70f3n],
  [0x800, 0xe7159475a2c29b7443b29c7fa6e889d9n],
  [0x1000, 0xd097f3bdfd2022b8845ad8f792aa5825n],
  [0x2000, 0xa9f746462d870fdf8a65dc1f90e061e5n],
  [0x4000, 0x70d869a156d2a1b890bb3df62baf32f7n],
  [0x8000, 0x31be135f97d08fd981231505542fcfa6n],
  [0x10000, 0x9aa508b5b7a84e1c677de54f3e99bc9n],
  [0x20000, 0x5d6af8dedb81196699c329225ee604n],
  [0x40000, 0x2216e584f5fa1ea926041bedfe98n],
  [0x80000, 0x48a170391f7dc42444e8fa2n],
];

// log_2(sqrt(1.0001)) reciprocal scaled so that log_2 (Q64) * this = log_sqrt10001 (Q128)
const LOG2_TO_LOG_SQRT10001 = 255738958999603826347141n;
// symmetric error bounds of the 14-iteration series, in Q128
const TICK_LOW_ERROR = 3402992956809132418596140100660247210n;
const TICK_HIGH_ERROR = 291339464771989622907027621153398088495n;
const LOG2_ITERATIONS = 14;

export function assertTickInRange(tick: number): void {
  if (!Number.isSafeInteger(tick)) {
    throw new ArithmeticDomainError("TICK_NOT_INTEGER", `tick ${tick} is not an integer`);
  }
  if (tick < MIN_TICK || tick > MAX_TICK) {
    throw new ArithmeticDomainError(
      "TICK_OUT_OF_RANGE",
      `tick ${tick} outside [${MIN_TICK}, ${MAX_TICK}]`
    );
  }
}

/**
 * sqrt(1.0001^tick) as a Q64.96 number, rounded up so that
 * sqrtPriceToTick(tickToSqrtPrice(t)) === t for every valid t.
 */
export function tickToSqrtPrice(tick: number): bigint {
  assertTickInRange(tick);
  const absTick = Math.abs(tick);

  let ratio =
    (absTick & 0x1) !== 0
      ? 0xfffcb933bd6fad37aa2d162d1a594001n
      : 0x100000000000000000000000000000000n;
  for (const [bit, factor] of RATIO_FACTORS) {
    if ((absTick & bit) !== 0) ratio = (ratio * factor) >> 128n;
  }

  if (tick > 0) ratio = MAX_UINT256 / ratio;

  // Q128.128 -> Q64.96, rounding up
  return (ratio >> 32n) + (ratio % Q32 === 0n ? 0n : 1n);
}

function mostSignificantBit(x: bigint): bigint {
  let msb = 0n;
  let r = x;
  for (const shift of [128n, 64n, 32n, 16n, 8n, 4n, 2n, 1n]) {
    if (r >> shift > 0n) {
      r >>= shift;
      msb += shift;
    }
  }
  return msb;
}

function clampTick(tick: number): number {
  return Math.min(MAX_TICK, Math.max(MIN_TICK, tick));
}

/**
 * Greatest tick t with tickToSqrtPrice(t) <= sqrtPrice.
 * Accepts the closed interval [MIN_SQRT_PRICE, MAX_SQRT_PRICE].
 */
export function sqrtPriceToTick(sqrtPrice: bigint): number {
  if (sqrtPrice < MIN_SQRT_PRICE || sqrtPrice > MAX_SQRT_PRICE) {
    throw new ArithmeticDomainError(
      "SQRT_PRICE_OUT_OF_RANGE",
      `sqrt price ${sqrtPrice} outside [${MIN_SQRT_PRICE}, ${MAX_SQRT_PRICE}]`
    );
  }

  const ratio = sqrtPrice << 32n; // Q128.128
  const msb = mostSignificantBit(ratio);

  let r = msb >= 128n ? ratio >> (msb - 127n) : ratio << (127n - msb);
  let log2 = (msb - 128n) << 64n;

  for (let i = 0; i < LOG2_ITERATIONS; i++) {
    r = (r * r) >> 127n;
    const f = r >> 128n;
    log2 |= f << BigInt(63 - i);
    r >>= f;
  }

  const logSqrt10001 = log2 * LOG2_TO_LOG_SQRT10001;

  // candidates must be clamped before the consistency check: at MAX_SQRT_PRICE
  // the upper candidate is one past MAX_TICK
  const tickLow = clampTick(Number((logSqrt10001 - TICK_LOW_ERROR) >> 128n));
  const tickHigh = clampTick(Number((logSqrt10001 + TICK_HIGH_ERROR) >> 128n));

  if (tickLow === tickHigh) return tickLow;
  return tickToSqrtPrice(tickHigh) <= sqrtPrice ? tickHigh : tickLow;
}
