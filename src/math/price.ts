import Decimal from "decimal.js";

/***************** Precision setup *****************/
// Display-only helpers: settlement math never goes through Decimal.
const Dec = Decimal.clone({
  precision: 80,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -1e6,
  toExpPos: 1e6,
});

export const D = (x: Decimal.Value): Decimal => new Dec(x);

const Q96 = D(2).pow(96);
const LN_1_0001 = D("1.0001").ln();
const TICK_EPSILON = D("1e-40");

export function tickToPrice(tick: number): Decimal {
  return D("1.0001").pow(tick);
}

// floor of log_1.0001(price); exact tick prices land on their own tick
export function priceToTick(price: Decimal.Value): number {
  const raw = D(price).ln().div(LN_1_0001);
  const nearest = raw.toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN);
  if (raw.sub(nearest).abs().lt(TICK_EPSILON)) return nearest.toNumber();
  return raw.toDecimalPlaces(0, Decimal.ROUND_FLOOR).toNumber();
}

export function sqrtPriceToPrice(sqrtPriceX96: bigint): Decimal {
  const s = D(sqrtPriceX96.toString()).div(Q96);
  return s.mul(s);
}

export function priceToSqrtPrice(price: Decimal.Value): bigint {
  const sqrt = D(price).sqrt().mul(Q96);
  return BigInt(sqrt.toFixed(0, Decimal.ROUND_FLOOR));
}

/** token1 per token0 adjusted for decimals, e.g. for log lines */
export function formatPrice(
  sqrtPriceX96: bigint,
  decimals0 = 0,
  decimals1 = 0,
  significantDigits = 10
): string {
  return sqrtPriceToPrice(sqrtPriceX96)
    .mul(D(10).pow(decimals0 - decimals1))
    .toSignificantDigits(significantDigits)
    .toString();
}
