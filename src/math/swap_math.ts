import { FEE_DENOMINATOR } from "../constants";
import { mulDiv, mulDivRoundingUp } from "./full_math";
import {
  getAmount0Delta,
  getAmount1Delta,
  getNextSqrtPriceFromInput,
  getNextSqrtPriceFromOutput,
} from "./sqrt_price_math";

export interface SwapStep {
  nextSqrtPrice: bigint;
  amountIn: bigint; // excludes feeAmount
  amountOut: bigint;
  feeAmount: bigint;
}

/**
 * One step of a swap inside a range of constant liquidity.
 *
 * amountRemaining > 0 is exact input (fee included), < 0 exact output.
 * The direction is implied by the relation between current and target price.
 * On-chain style: fee is taken from the input leg, amountIn rounds up,
 * amountOut rounds down.
 */
export function computeSwapStep(
  sqrtPriceCurrent: bigint,
  sqrtPriceTarget: bigint,
  liquidity: bigint,
  amountRemaining: bigint,
  feePpm: bigint
): SwapStep {
  const zeroForOne = sqrtPriceCurrent >= sqrtPriceTarget;
  const exactIn = amountRemaining >= 0n;

  let nextSqrtPrice: bigint;
  let amountIn = 0n;
  let amountOut = 0n;

  if (exactIn) {
    const amountRemainingLessFee = mulDiv(
      amountRemaining,
      FEE_DENOMINATOR - feePpm,
      FEE_DENOMINATOR
    );
    amountIn = zeroForOne
      ? getAmount0Delta(sqrtPriceTarget, sqrtPriceCurrent, liquidity, true)
      : getAmount1Delta(sqrtPriceCurrent, sqrtPriceTarget, liquidity, true);
    nextSqrtPrice =
      amountRemainingLessFee >= amountIn
        ? sqrtPriceTarget
        : getNextSqrtPriceFromInput(
            sqrtPriceCurrent,
            liquidity,
            amountRemainingLessFee,
            zeroForOne
          );
  } else {
    amountOut = zeroForOne
      ? getAmount1Delta(sqrtPriceTarget, sqrtPriceCurrent, liquidity, false)
      : getAmount0Delta(sqrtPriceCurrent, sqrtPriceTarget, liquidity, false);
    nextSqrtPrice =
      -amountRemaining >= amountOut
        ? sqrtPriceTarget
        : getNextSqrtPriceFromOutput(
            sqrtPriceCurrent,
            liquidity,
            -amountRemaining,
            zeroForOne
          );
  }

  const reachedTarget = sqrtPriceTarget === nextSqrtPrice;

  // recompute the legs that the partial step invalidated
  if (zeroForOne) {
    if (!(reachedTarget && exactIn)) {
      amountIn = getAmount0Delta(nextSqrtPrice, sqrtPriceCurrent, liquidity, true);
    }
    if (!(reachedTarget && !exactIn)) {
      amountOut = getAmount1Delta(nextSqrtPrice, sqrtPriceCurrent, liquidity, false);
    }
  } else {
    if (!(reachedTarget && exactIn)) {
      amountIn = getAmount1Delta(sqrtPriceCurrent, nextSqrtPrice, liquidity, true);
    }
    if (!(reachedTarget && !exactIn)) {
      amountOut = getAmount0Delta(sqrtPriceCurrent, nextSqrtPrice, liquidity, false);
    }
  }

  // never hand out more than the caller asked for
  if (!exactIn && amountOut > -amountRemaining) {
    amountOut = -amountRemaining;
  }

  const feeAmount =
    exactIn && nextSqrtPrice !== sqrtPriceTarget
      ? amountRemaining - amountIn // the remainder of the input is the fee
      : mulDivRoundingUp(amountIn, feePpm, FEE_DENOMINATOR - feePpm);

  return { nextSqrtPrice, amountIn, amountOut, feeAmount };
}
