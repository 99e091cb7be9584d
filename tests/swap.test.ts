import { describe, expect, it } from "vitest";
import {
  MAX_INT128,
  MAX_SQRT_PRICE,
  MAX_TICK,
  MIN_SQRT_PRICE,
  MIN_TICK,
  Q96,
} from "../src/constants";
import { InvariantViolationError, ValidationError } from "../src/errors";
import { tickToSqrtPrice } from "../src/math/tick_math";
import type { SwapParams, SwapResult } from "../src/types";
import { ALICE, BOB, TOKEN0, TOKEN1, settle, setup, type Fixture } from "./helpers";

const L = 10n ** 18n;

function provide(f: Fixture, tickLower: number, tickUpper: number, liquidity = L): void {
  f.engine.lock(f.alice, (session) => {
    f.engine.updatePosition(session, f.key, { salt: 0n, tickLower, tickUpper, liquidityDelta: liquidity });
    settle(f.engine, session, [TOKEN0, TOKEN1], ALICE);
  });
}

function swap(f: Fixture, params: SwapParams): SwapResult {
  return f.engine.lock(f.bob, (session) => {
    const result = f.engine.swap(session, f.key, params);
    settle(f.engine, session, [TOKEN0, TOKEN1], BOB);
    return result;
  });
}

describe("swap", () => {
  it("sells an exact amount of token0 inside one range", () => {
    const f = setup();
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, -100, 100);
    const bob0 = f.token0.balanceOf(BOB);
    const bob1 = f.token1.balanceOf(BOB);

    const result = swap(f, { isToken1: false, amount: 10n ** 15n, sqrtPriceLimit: MIN_SQRT_PRICE });

    expect(result.delta0).toBe(1000000000000000n);
    expect(result.delta1).toBe(-996006981039903n);
    expect(result.state.sqrtPrice).toBe(79149250711305166342700278159n);
    expect(result.state.tick).toBe(-20);
    expect(result.state.liquidity).toBe(L);
    expect(result.state.feesPerLiquidity.value0).toBe(1020847100762815390390123822295304n);
    expect(result.ticksCrossed).toBe(0);
    expect(result.steps).toBe(1);
    expect(f.token0.balanceOf(BOB)).toBe(bob0 - 1000000000000000n);
    expect(f.token1.balanceOf(BOB)).toBe(bob1 + 996006981039903n);
  });

  it("buys an exact amount of token1", () => {
    const f = setup();
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, -100, 100);

    const result = swap(f, { isToken1: true, amount: -(10n ** 15n), sqrtPriceLimit: MIN_SQRT_PRICE });

    expect(result.delta0).toBe(1004013040121367n);
    expect(result.delta1).toBe(-1000000000000000n);
    expect(result.state.tick).toBe(-21);
    expect(result.state.sqrtPrice).toBe(79148934351750073255950406385n);
  });

  it("buys an exact amount of token0 moving the price up", () => {
    const f = setup();
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, -100, 100);

    const result = swap(f, { isToken1: false, amount: -(10n ** 15n), sqrtPriceLimit: MAX_SQRT_PRICE });

    expect(result.delta0).toBe(-1000000000000000n);
    expect(result.delta1).toBe(1004013040121367n);
    expect(result.state.tick).toBe(20);
    expect(result.state.feesPerLiquidity.value1).toBe(1024943801136263662990517543963260n);
  });

  it("records boundary - 1 when landing on a boundary moving down", () => {
    const f = setup();
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, -100, 100);

    const down = swap(f, { isToken1: false, amount: L, sqrtPriceLimit: tickToSqrtPrice(-100) });
    expect(down.delta0).toBe(5027351678085461n);
    expect(down.delta1).toBe(-4987272070749096n);
    expect(down.state.sqrtPrice).toBe(tickToSqrtPrice(-100));
    expect(down.state.tick).toBe(-101);
    expect(down.state.liquidity).toBe(0n);
    expect(down.ticksCrossed).toBe(1);

    // coming back up re-enters the range at its lower tick
    const up = swap(f, { isToken1: true, amount: 10n ** 12n, sqrtPriceLimit: MAX_SQRT_PRICE });
    expect(up.delta0).toBe(-1007018504076n);
    expect(up.delta1).toBe(1000000000000n);
    expect(up.state.tick).toBe(-100);
    expect(up.state.sqrtPrice).toBe(78833109102618203297407435342n);
    expect(up.state.liquidity).toBe(L);
    expect(up.ticksCrossed).toBe(1);
    expect(up.steps).toBe(2);
  });

  it("reaches the maximum price and reports the maximum tick", () => {
    const f = setup({ tickSpacing: 1, mint: 10n ** 38n });
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, MIN_TICK, MAX_TICK);

    const result = swap(f, { isToken1: true, amount: 10n ** 38n, sqrtPriceLimit: MAX_SQRT_PRICE });

    expect(result.state.sqrtPrice).toBe(MAX_SQRT_PRICE);
    expect(result.state.tick).toBe(MAX_TICK);
    expect(result.state.liquidity).toBe(0n);
    expect(result.delta0).toBe(-999999999999998472n);
    expect(result.delta1).toBe(18501555377229391704427315950069902401n);
    expect(result.ticksCrossed).toBe(1);
  });

  it("moves through empty regions without charging anything", () => {
    const f = setup();
    f.engine.initializePool(ALICE, f.key, 0);

    const result = swap(f, { isToken1: false, amount: L, sqrtPriceLimit: tickToSqrtPrice(-1000) });

    expect(result.delta0).toBe(0n);
    expect(result.delta1).toBe(0n);
    expect(result.state.tick).toBe(-1000);
    expect(result.protocolFee).toBe(0n);
  });

  it("returns a zero delta for a zero amount or a limit at the current price", () => {
    const f = setup();
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, -100, 100);

    const none = swap(f, { isToken1: false, amount: 0n, sqrtPriceLimit: MIN_SQRT_PRICE });
    const atLimit = swap(f, { isToken1: false, amount: L, sqrtPriceLimit: Q96 });
    for (const result of [none, atLimit]) {
      expect(result.delta0).toBe(0n);
      expect(result.delta1).toBe(0n);
      expect(result.steps).toBe(0);
      expect(result.state.sqrtPrice).toBe(Q96);
    }
  });

  it("rejects limits on the wrong side or outside the range", () => {
    const f = setup();
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, -100, 100);

    expect(() => swap(f, { isToken1: false, amount: 1000n, sqrtPriceLimit: MAX_SQRT_PRICE })).toThrow(
      ValidationError
    );
    expect(() => swap(f, { isToken1: true, amount: 1000n, sqrtPriceLimit: MIN_SQRT_PRICE })).toThrow(
      /INVALID_SQRT_PRICE_LIMIT/
    );
    expect(() => swap(f, { isToken1: true, amount: 1000n, sqrtPriceLimit: MAX_SQRT_PRICE + 1n })).toThrow(
      /INVALID_SQRT_PRICE_LIMIT/
    );
    expect(() =>
      swap(f, { isToken1: true, amount: MAX_INT128 + 1n, sqrtPriceLimit: MAX_SQRT_PRICE })
    ).toThrow(InvariantViolationError);
    expect(f.engine.getPoolState(f.key)?.sqrtPrice).toBe(Q96);
  });

  it("rejects swaps on pools that do not exist or outside a session", () => {
    const f = setup();
    expect(() => swap(f, { isToken1: true, amount: 1n, sqrtPriceLimit: MAX_SQRT_PRICE })).toThrow(
      /POOL_NOT_INITIALIZED/
    );
    f.engine.initializePool(ALICE, f.key, 0);
    const stale = f.engine.lock(f.bob, (session) => session);
    expect(() => f.engine.swap(stale, f.key, { isToken1: true, amount: 1n, sqrtPriceLimit: MAX_SQRT_PRICE })).toThrow(
      /NOT_LOCKED/
    );
  });

  it("keeps the protocol share of each fee", () => {
    const f = setup({ config: { protocolFeePpm: 100_000 } });
    f.engine.initializePool(ALICE, f.key, 0);
    provide(f, -100, 100);

    const result = swap(f, { isToken1: false, amount: 10n ** 15n, sqrtPriceLimit: MIN_SQRT_PRICE });
    expect(result.protocolFee).toBe(300000000000n);
    expect(result.state.feesPerLiquidity.value0).toBe(918762390686533851351111440065774n);
    expect(f.engine.getProtocolFees(TOKEN0)).toBe(300000000000n);
    expect(f.engine.getProtocolFees(TOKEN1)).toBe(0n);
  });
});
