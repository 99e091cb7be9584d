import { describe, expect, it } from "vitest";
import type { Address } from "viem";
import { MAX_UINT128, MIN_SQRT_PRICE, Q96 } from "../src/constants";
import type { Session } from "../src/debt_ledger";
import type { ForwardTarget } from "../src/engine";
import {
  CALL_POINT_ORDER,
  NO_CALL_POINTS,
  decodeCallPoints,
  encodeCallPoints,
  type CallPoint,
  type CallPoints,
  type Extension,
} from "../src/extensions";
import { ALICE, BOB, TOKEN0, TOKEN1, settle, setup, type Fixture } from "./helpers";

const EXT: Address = "0x0000000000000000000000000000000000005555";
const L = 10n ** 18n;
const RANGE = { salt: 0n, tickLower: -100, tickUpper: 100 };

type Hooks = Partial<Pick<Extension, CallPoint>>;
type TestExtension = Extension & ForwardTarget<(session: Session) => void, void>;

// the extension only declares the hooks it is given
function makeExtension(hooks: Hooks, address: Address = EXT): TestExtension {
  const callPoints: CallPoints = { ...NO_CALL_POINTS };
  for (const point of CALL_POINT_ORDER) callPoints[point] = typeof hooks[point] === "function";
  return {
    address,
    callPoints,
    ...hooks,
    forwarded: (session, run) => run(session),
  };
}

function register(f: Fixture, extension: TestExtension): void {
  f.engine.registerExtension(extension, encodeCallPoints(extension.callPoints));
}

function deposit(f: Fixture): void {
  f.engine.lock(f.alice, (session) => {
    f.engine.updatePosition(session, f.key, { ...RANGE, liquidityDelta: L });
    settle(f.engine, session, [TOKEN0, TOKEN1], ALICE);
  });
}

describe("call points", () => {
  it("encodes one bit per hook in lifecycle order", () => {
    const points: CallPoints = { ...NO_CALL_POINTS, beforeSwap: true, afterCollectFees: true };
    expect(encodeCallPoints(points)).toBe(132);
    expect(decodeCallPoints(132)).toEqual(points);
    expect(decodeCallPoints(0)).toEqual(NO_CALL_POINTS);
    expect(encodeCallPoints(decodeCallPoints(255))).toBe(255);
  });

  it("rejects masks outside eight bits", () => {
    expect(() => decodeCallPoints(256)).toThrow(/INVALID_CALL_POINTS/);
    expect(() => decodeCallPoints(-1)).toThrow(/INVALID_CALL_POINTS/);
    expect(() => decodeCallPoints(1.5)).toThrow(/INVALID_CALL_POINTS/);
  });
});

describe("registerExtension", () => {
  it("requires the declared mask to match what the extension implements", () => {
    const f = setup({ extension: EXT });
    const swapOnly = makeExtension({ beforeSwap: () => undefined });

    expect(() => f.engine.registerExtension(swapOnly, 12)).toThrow(/CALL_POINTS_MISMATCH/);
    // claims a hook it does not implement
    const spoofed: Extension = { address: EXT, callPoints: { ...NO_CALL_POINTS, afterSwap: true } };
    expect(() => f.engine.registerExtension(spoofed, 8)).toThrow(/CALL_POINTS_MISMATCH/);
    // implements a hook it does not declare
    const hidden: Extension = { address: EXT, callPoints: { ...NO_CALL_POINTS }, afterSwap: () => undefined };
    expect(() => f.engine.registerExtension(hidden, 0)).toThrow(/CALL_POINTS_MISMATCH/);

    expect(f.engine.registerExtension(swapOnly, 4)).toEqual({ ...NO_CALL_POINTS, beforeSwap: true });
    expect(() => f.engine.registerExtension(swapOnly, 4)).toThrow(/EXTENSION_ALREADY_REGISTERED/);
  });

  it("rejects the zero address", () => {
    const f = setup();
    const zero = makeExtension({}, "0x0000000000000000000000000000000000000000");
    expect(() => register(f, zero)).toThrow(/INVALID_EXTENSION/);
  });

  it("must happen before a pool names the extension", () => {
    const f = setup({ extension: EXT });
    expect(() => f.engine.initializePool(ALICE, f.key, 0)).toThrow(/EXTENSION_NOT_REGISTERED/);
    expect(f.engine.getPoolState(f.key)).toBeUndefined();
  });
});

describe("hooks", () => {
  it("fire around every pool operation with the caller and session", () => {
    const f = setup({ extension: EXT });
    const calls: { point: CallPoint; caller: Address; session?: number }[] = [];
    const hooks: Hooks = {};
    for (const point of CALL_POINT_ORDER) {
      hooks[point] = (ctx: { caller: Address; session?: Session }) => {
        calls.push({ point, caller: ctx.caller, session: ctx.session?.id });
      };
    }
    let added: unknown;
    hooks.afterUpdatePosition = (ctx, _key, _params, delta) => {
      calls.push({ point: "afterUpdatePosition", caller: ctx.caller, session: ctx.session?.id });
      added = delta;
    };
    register(f, makeExtension(hooks));

    f.engine.initializePool(ALICE, f.key, 0);
    deposit(f);
    f.engine.lock(f.bob, (session) => {
      f.engine.swap(session, f.key, { isToken1: false, amount: 10n ** 15n, sqrtPriceLimit: MIN_SQRT_PRICE });
      settle(f.engine, session, [TOKEN0, TOKEN1], BOB);
    });
    f.engine.lock(f.alice, (session) => {
      f.engine.collectFees(session, f.key, RANGE);
      settle(f.engine, session, [TOKEN0, TOKEN1], ALICE);
    });

    expect(calls).toEqual([
      { point: "beforeInitializePool", caller: ALICE, session: undefined },
      { point: "afterInitializePool", caller: ALICE, session: undefined },
      { point: "beforeUpdatePosition", caller: ALICE, session: 1 },
      { point: "afterUpdatePosition", caller: ALICE, session: 1 },
      { point: "beforeSwap", caller: BOB, session: 2 },
      { point: "afterSwap", caller: BOB, session: 2 },
      { point: "beforeCollectFees", caller: ALICE, session: 3 },
      { point: "afterCollectFees", caller: ALICE, session: 3 },
    ]);
    expect(added).toEqual({ delta0: 4987272070749097n, delta1: 4987272070749097n });
  });

  it("only run at declared points", () => {
    const f = setup({ extension: EXT });
    let swaps = 0;
    register(f, makeExtension({ beforeSwap: () => void swaps++ }));
    f.engine.initializePool(ALICE, f.key, 0);
    deposit(f);
    f.engine.lock(f.bob, (session) => {
      f.engine.swap(session, f.key, { isToken1: false, amount: 1000n, sqrtPriceLimit: MIN_SQRT_PRICE });
      settle(f.engine, session, [TOKEN0, TOKEN1], BOB);
    });
    expect(swaps).toBe(1);
  });

  it("veto the operation by throwing, undoing its effects", () => {
    const f = setup({ extension: EXT });
    register(
      f,
      makeExtension({
        afterSwap: () => {
          throw new Error("paused");
        },
      })
    );
    f.engine.initializePool(ALICE, f.key, 0);
    deposit(f);
    const bob0 = f.token0.balanceOf(BOB);

    expect(() =>
      f.engine.lock(f.bob, (session) => {
        f.engine.swap(session, f.key, { isToken1: false, amount: 10n ** 15n, sqrtPriceLimit: MIN_SQRT_PRICE });
        settle(f.engine, session, [TOKEN0, TOKEN1], BOB);
      })
    ).toThrow("paused");
    expect(f.engine.getPoolState(f.key)?.sqrtPrice).toBe(Q96);
    expect(f.engine.getPoolState(f.key)?.tick).toBe(0);
    expect(f.token0.balanceOf(BOB)).toBe(bob0);
  });

  it("can block pool creation", () => {
    const f = setup({ extension: EXT });
    register(
      f,
      makeExtension({
        beforeInitializePool: (_ctx, _key, tick) => {
          if (tick !== 0) throw new Error(`tick ${tick} not allowed`);
        },
      })
    );
    expect(() => f.engine.initializePool(ALICE, f.key, 60)).toThrow("tick 60 not allowed");
    expect(f.engine.getPoolState(f.key)).toBeUndefined();
    expect(f.engine.initializePool(ALICE, f.key, 0)).toBe(Q96);
  });

  it("re-enter the engine under the same session without triggering themselves", () => {
    const f = setup({ extension: EXT });
    let beforeSwaps = 0;
    const extension: TestExtension = makeExtension({
      beforeSwap: () => void beforeSwaps++,
      afterSwap: (ctx, key) => {
        const { session } = ctx;
        if (!session) throw new Error("swap without session");
        ctx.engine.forward(session, extension, (inner) => {
          expect(inner.id).toBe(session.id);
          ctx.engine.swap(inner, key, { isToken1: false, amount: 0n, sqrtPriceLimit: MIN_SQRT_PRICE });
          ctx.engine.accumulateAsFees(inner, key, 1000n, 0n);
        });
      },
    });
    register(f, extension);
    f.engine.initializePool(ALICE, f.key, 0);
    deposit(f);

    f.engine.lock(f.bob, (session) => {
      f.engine.swap(session, f.key, { isToken1: false, amount: 10n ** 15n, sqrtPriceLimit: MIN_SQRT_PRICE });
      // the swapper pays for the extension's donation
      expect(f.engine.getDebt(session, TOKEN0)).toBe(1000000000001000n);
      settle(f.engine, session, [TOKEN0, TOKEN1], BOB);
    });

    expect(beforeSwaps).toBe(1);
    expect(f.engine.getPoolState(f.key)?.feesPerLiquidity.value0).toBe(1020847101103097757311062285758678n);
    expect(f.engine.getPositionFees(f.key, { owner: ALICE, ...RANGE })).toEqual({
      amount0: 3000000000999n,
      amount1: 0n,
    });
  });
});

describe("extension primitives", () => {
  function withExtension() {
    const f = setup({ extension: EXT });
    const extension = makeExtension({});
    register(f, extension);
    f.engine.initializePool(ALICE, f.key, 0);
    const act = <T>(run: (session: Session) => T): T =>
      f.engine.lock(f.alice, (session) => {
        let result: T | undefined;
        f.engine.forward(session, extension, (inner) => {
          result = run(inner);
        });
        settle(f.engine, session, [TOKEN0, TOKEN1], ALICE);
        if (result === undefined) throw new Error("forward did not run");
        return result;
      });
    return { f, act };
  }

  it("send donations to protocol fees when nothing is in range", () => {
    const { f, act } = withExtension();
    act((session) => {
      f.engine.accumulateAsFees(session, f.key, 500n, 7n);
      return true;
    });
    expect(f.engine.getProtocolFees(TOKEN0)).toBe(500n);
    expect(f.engine.getProtocolFees(TOKEN1)).toBe(7n);
    expect(f.token0.balanceOf(f.engine.address)).toBe(500n);
  });

  it("are refused to anyone but the pool's extension", () => {
    const { f } = withExtension();
    expect(() =>
      f.engine.lock(f.bob, (session) => f.engine.accumulateAsFees(session, f.key, 1n, 0n))
    ).toThrow(/UNAUTHORIZED/);
    expect(() =>
      f.engine.lock(f.bob, (session) => f.engine.updateSavedBalances(session, f.key, 1n, 0n))
    ).toThrow(/UNAUTHORIZED/);

    const plain = setup();
    plain.engine.initializePool(ALICE, plain.key, 0);
    expect(() =>
      plain.engine.lock(plain.alice, (session) => plain.engine.accumulateAsFees(session, plain.key, 1n, 0n))
    ).toThrow(/UNAUTHORIZED/);
  });

  it("save and release balances through the session's debt", () => {
    const { f, act } = withExtension();
    const alice0 = f.token0.balanceOf(ALICE);

    expect(act((session) => f.engine.updateSavedBalances(session, f.key, 100n, 50n))).toEqual({
      amount0: 100n,
      amount1: 50n,
    });
    expect(f.engine.getSavedBalances(f.key)).toEqual({ amount0: 100n, amount1: 50n });
    expect(f.token0.balanceOf(ALICE)).toBe(alice0 - 100n);

    expect(act((session) => f.engine.updateSavedBalances(session, f.key, -100n, 0n))).toEqual({
      amount0: 0n,
      amount1: 50n,
    });
    expect(f.token0.balanceOf(ALICE)).toBe(alice0);
  });

  it("keep saved balances within [0, 2^128)", () => {
    const { f, act } = withExtension();
    act((session) => f.engine.updateSavedBalances(session, f.key, 0n, 50n));

    expect(() => act((session) => f.engine.updateSavedBalances(session, f.key, -1n, 0n))).toThrow(
      /SAVED_BALANCE_UNDERFLOW/
    );
    expect(() => act((session) => f.engine.updateSavedBalances(session, f.key, 0n, MAX_UINT128))).toThrow(
      /SAVED_BALANCE_OVERFLOW/
    );
    expect(f.engine.getSavedBalances(f.key)).toEqual({ amount0: 0n, amount1: 50n });
  });
});
