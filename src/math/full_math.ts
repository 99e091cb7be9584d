import {
  MAX_INT128,
  MAX_UINT128,
  MIN_INT128,
  Q256,
} from "../constants";
import { ArithmeticDomainError, InvariantViolationError } from "../errors";

// mulDiv for bigint: floor(a*b / d)
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  if (d === 0n) throw new ArithmeticDomainError("DIV_BY_ZERO", "mulDiv by zero");
  if (a < 0n || b < 0n || d < 0n) {
    throw new ArithmeticDomainError("NEGATIVE_OPERAND", "mulDiv expects unsigned operands");
  }
  return (a * b) / d;
}

// ceil(a*b / d)
export function mulDivRoundingUp(a: bigint, b: bigint, d: bigint): bigint {
  const product = a * b;
  const result = mulDiv(a, b, d);
  return product % d === 0n ? result : result + 1n;
}

// ceil(a / d)
export function divRoundingUp(a: bigint, d: bigint): bigint {
  if (d === 0n) throw new ArithmeticDomainError("DIV_BY_ZERO", "division by zero");
  return a / d + (a % d === 0n ? 0n : 1n);
}

/***************** Modular 256-bit accumulators *****************/
export function wrappingAdd256(a: bigint, b: bigint): bigint {
  return (((a + b) % Q256) + Q256) % Q256;
}

export function wrappingSub256(a: bigint, b: bigint): bigint {
  return (((a - b) % Q256) + Q256) % Q256;
}

/***************** Checked width casts *****************/
export function toUint128(x: bigint, what = "value"): bigint {
  if (x < 0n || x > MAX_UINT128) {
    throw new InvariantViolationError("UINT128_OVERFLOW", `${what} ${x} does not fit in uint128`);
  }
  return x;
}

export function toInt128(x: bigint, what = "value"): bigint {
  if (x < MIN_INT128 || x > MAX_INT128) {
    throw new InvariantViolationError("INT128_OVERFLOW", `${what} ${x} does not fit in int128`);
  }
  return x;
}
