import { MAX_SQRT_PRICE, MIN_SQRT_PRICE, Q96 } from "../constants";
import { ArithmeticDomainError } from "../errors";
import { divRoundingUp, mulDiv, mulDivRoundingUp } from "./full_math";

/***************** Amount/Liquidity formulas (Q64.96 sqrt domain) *****************/

/**
 * Token0 between two sqrt prices for a liquidity:
 * amount0 = L * (sb - sa) / (sa * sb)
 * Round up for amounts owed to the pool, down for amounts owed to users.
 */
export function getAmount0Delta(
  sqrtPriceA: bigint,
  sqrtPriceB: bigint,
  liquidity: bigint,
  roundUp: boolean
): bigint {
  const sa = sqrtPriceA < sqrtPriceB ? sqrtPriceA : sqrtPriceB;
  const sb = sqrtPriceA < sqrtPriceB ? sqrtPriceB : sqrtPriceA;
  if (sa <= 0n) {
    throw new ArithmeticDomainError("ZERO_SQRT_PRICE", "sqrt price must be positive");
  }

  const numerator1 = liquidity << 96n;
  const numerator2 = sb - sa;

  return roundUp
    ? divRoundingUp(mulDivRoundingUp(numerator1, numerator2, sb), sa)
    : mulDiv(numerator1, numerator2, sb) / sa;
}

/** Token1 between two sqrt prices: amount1 = L * (sb - sa) */
export function getAmount1Delta(
  sqrtPriceA: bigint,
  sqrtPriceB: bigint,
  liquidity: bigint,
  roundUp: boolean
): bigint {
  const sa = sqrtPriceA < sqrtPriceB ? sqrtPriceA : sqrtPriceB;
  const sb = sqrtPriceA < sqrtPriceB ? sqrtPriceB : sqrtPriceA;
  return roundUp
    ? mulDivRoundingUp(liquidity, sb - sa, Q96)
    : mulDiv(liquidity, sb - sa, Q96);
}

function assertPriceInDomain(sqrtPrice: bigint): bigint {
  if (sqrtPrice < MIN_SQRT_PRICE || sqrtPrice > MAX_SQRT_PRICE) {
    throw new ArithmeticDomainError(
      "SQRT_PRICE_OUT_OF_RANGE",
      `next sqrt price ${sqrtPrice} leaves the supported range`
    );
  }
  return sqrtPrice;
}

// Rounds up so the price never moves further than the token0 amount pays for.
function nextSqrtPriceFromAmount0RoundingUp(
  sqrtPrice: bigint,
  liquidity: bigint,
  amount: bigint,
  add: boolean
): bigint {
  if (amount === 0n) return sqrtPrice;
  const numerator1 = liquidity << 96n;
  const product = amount * sqrtPrice;

  if (add) {
    return mulDivRoundingUp(numerator1, sqrtPrice, numerator1 + product);
  }
  if (product >= numerator1) {
    throw new ArithmeticDomainError(
      "INSUFFICIENT_LIQUIDITY",
      "requested token0 output exceeds the liquidity of the range"
    );
  }
  return mulDivRoundingUp(numerator1, sqrtPrice, numerator1 - product);
}

// Rounds down so the price never moves further than the token1 amount pays for.
function nextSqrtPriceFromAmount1RoundingDown(
  sqrtPrice: bigint,
  liquidity: bigint,
  amount: bigint,
  add: boolean
): bigint {
  if (add) {
    return sqrtPrice + mulDiv(amount, Q96, liquidity);
  }
  const quotient = divRoundingUp(amount << 96n, liquidity);
  if (sqrtPrice <= quotient) {
    throw new ArithmeticDomainError(
      "INSUFFICIENT_LIQUIDITY",
      "requested token1 output exceeds the liquidity of the range"
    );
  }
  return sqrtPrice - quotient;
}

export function getNextSqrtPriceFromInput(
  sqrtPrice: bigint,
  liquidity: bigint,
  amountIn: bigint,
  zeroForOne: boolean
): bigint {
  if (sqrtPrice <= 0n || liquidity <= 0n) {
    throw new ArithmeticDomainError("ZERO_LIQUIDITY", "price and liquidity must be positive");
  }
  const next = zeroForOne
    ? nextSqrtPriceFromAmount0RoundingUp(sqrtPrice, liquidity, amountIn, true)
    : nextSqrtPriceFromAmount1RoundingDown(sqrtPrice, liquidity, amountIn, true);
  return assertPriceInDomain(next);
}

export function getNextSqrtPriceFromOutput(
  sqrtPrice: bigint,
  liquidity: bigint,
  amountOut: bigint,
  zeroForOne: boolean
): bigint {
  if (sqrtPrice <= 0n || liquidity <= 0n) {
    throw new ArithmeticDomainError("ZERO_LIQUIDITY", "price and liquidity must be positive");
  }
  const next = zeroForOne
    ? nextSqrtPriceFromAmount1RoundingDown(sqrtPrice, liquidity, amountOut, false)
    : nextSqrtPriceFromAmount0RoundingUp(sqrtPrice, liquidity, amountOut, false);
  return assertPriceInDomain(next);
}
