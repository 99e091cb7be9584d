import { describe, expect, it } from "vitest";
import { ZERO_ADDRESS } from "../src/constants";
import { ValidationError } from "../src/errors";
import {
  canonicalPoolKey,
  hasExtension,
  makePoolKey,
  toPoolId,
  validatePoolKey,
  validateRange,
} from "../src/pool_key";
import { TOKEN0, TOKEN1 } from "./helpers";

describe("pool keys", () => {
  it("sorts tokens and defaults the extension", () => {
    const key = makePoolKey(TOKEN1, TOKEN0, { fee: 500, tickSpacing: 10 });
    expect(key).toEqual({
      token0: TOKEN0,
      token1: TOKEN1,
      config: { fee: 500, tickSpacing: 10, extension: ZERO_ADDRESS },
    });
    expect(hasExtension(key)).toBe(false);
  });

  it("rejects malformed keys", () => {
    const config = { fee: 500, tickSpacing: 10, extension: ZERO_ADDRESS };
    expect(() => validatePoolKey({ token0: TOKEN1, token1: TOKEN0, config })).toThrow(/TOKENS_NOT_SORTED/);
    expect(() => validatePoolKey({ token0: TOKEN0, token1: TOKEN0, config })).toThrow(/TOKENS_NOT_SORTED/);
    expect(() => validatePoolKey({ token0: ZERO_ADDRESS, token1: TOKEN1, config })).toThrow(/INVALID_TOKEN/);
    expect(() => makePoolKey(TOKEN0, TOKEN1, { fee: 1_000_000, tickSpacing: 10 })).toThrow(/INVALID_FEE/);
    expect(() => makePoolKey(TOKEN0, TOKEN1, { fee: 500, tickSpacing: 0 })).toThrow(/INVALID_TICK_SPACING/);
    expect(() => makePoolKey(TOKEN0, TOKEN1, { fee: 500, tickSpacing: 16385 })).toThrow(ValidationError);
    expect(() => makePoolKey("0x12", TOKEN1, { fee: 500, tickSpacing: 1 })).toThrow(/INVALID_ADDRESS/);
  });

  it("hashes every field into the pool id", () => {
    const key = makePoolKey(TOKEN0, TOKEN1, { fee: 500, tickSpacing: 10 });
    const id = toPoolId(key);
    expect(id).toMatch(/^0x[0-9a-f]{64}$/);
    expect(toPoolId(makePoolKey(TOKEN1, TOKEN0, { fee: 500, tickSpacing: 10 }))).toBe(id);
    expect(toPoolId(makePoolKey(TOKEN0, TOKEN1, { fee: 3000, tickSpacing: 10 }))).not.toBe(id);
    expect(toPoolId(makePoolKey(TOKEN0, TOKEN1, { fee: 500, tickSpacing: 60 }))).not.toBe(id);
    expect(
      toPoolId(
        makePoolKey(TOKEN0, TOKEN1, {
          fee: 500,
          tickSpacing: 10,
          extension: "0x0000000000000000000000000000000000000077",
        })
      )
    ).not.toBe(id);
  });

  it("canonicalizes address case", () => {
    const key = canonicalPoolKey({
      token0: TOKEN0,
      token1: TOKEN1,
      config: { fee: 0, tickSpacing: 1, extension: ZERO_ADDRESS },
    });
    expect(key.token0).toBe(TOKEN0);
    expect(key.config).toEqual({ fee: 0, tickSpacing: 1, extension: ZERO_ADDRESS });
  });
});

describe("validateRange", () => {
  it("accepts aligned ranges inside the bounds", () => {
    expect(() => validateRange({ tickLower: -100, tickUpper: 100 }, 10)).not.toThrow();
    expect(() => validateRange({ tickLower: -887272, tickUpper: 887272 }, 1)).not.toThrow();
  });

  it("rejects inverted, unaligned and out-of-bounds ranges", () => {
    expect(() => validateRange({ tickLower: 100, tickUpper: 100 }, 10)).toThrow(/INVALID_RANGE/);
    expect(() => validateRange({ tickLower: -105, tickUpper: 100 }, 10)).toThrow(/RANGE_NOT_ALIGNED/);
    expect(() => validateRange({ tickLower: -887280, tickUpper: 0 }, 10)).toThrow(/RANGE_OUT_OF_BOUNDS/);
  });
});
