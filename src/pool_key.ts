import {
  encodeAbiParameters,
  getAddress,
  isAddress,
  keccak256,
  type Address,
  type Hex,
} from "viem";
import {
  FEE_DENOMINATOR,
  MAX_TICK,
  MAX_TICK_SPACING,
  MIN_TICK,
  ZERO_ADDRESS,
} from "./constants";
import { ValidationError } from "./errors";

export type PoolId = Hex;

export interface PoolConfig {
  fee: number; // millionths of the input amount, 3000 = 0.3%
  tickSpacing: number; // e.g., 1 or 10 or 60
  extension: Address; // zero address when the pool has none
}

export interface PoolKey {
  token0: Address;
  token1: Address;
  config: PoolConfig;
}

export interface PositionRange {
  tickLower: number;
  tickUpper: number;
}

export function normalizeAddress(raw: string, what = "address"): Address {
  if (!isAddress(raw, { strict: false })) {
    throw new ValidationError("INVALID_ADDRESS", `${what} ${raw} is not an address`);
  }
  return getAddress(raw);
}

export function hasExtension(key: PoolKey): boolean {
  return key.config.extension !== ZERO_ADDRESS;
}

/** Canonical numeric order of two token addresses. */
export function sortTokens(a: Address, b: Address): [Address, Address] {
  return BigInt(a) < BigInt(b) ? [a, b] : [b, a];
}

/**
 * Build a key from tokens in any order. Fee and tick spacing are validated by
 * {@link validatePoolKey}.
 */
export function makePoolKey(
  tokenA: string,
  tokenB: string,
  config: { fee: number; tickSpacing: number; extension?: string }
): PoolKey {
  const [token0, token1] = sortTokens(
    normalizeAddress(tokenA, "token"),
    normalizeAddress(tokenB, "token")
  );
  const key: PoolKey = {
    token0,
    token1,
    config: {
      fee: config.fee,
      tickSpacing: config.tickSpacing,
      extension: normalizeAddress(config.extension ?? ZERO_ADDRESS, "extension"),
    },
  };
  validatePoolKey(key);
  return key;
}

export function validatePoolKey(key: PoolKey): void {
  const token0 = normalizeAddress(key.token0, "token0");
  const token1 = normalizeAddress(key.token1, "token1");
  normalizeAddress(key.config.extension, "extension");

  if (token0 === ZERO_ADDRESS) {
    throw new ValidationError("INVALID_TOKEN", "token0 must not be the zero address");
  }
  if (!(BigInt(token0) < BigInt(token1))) {
    throw new ValidationError(
      "TOKENS_NOT_SORTED",
      `token0 ${token0} must sort strictly before token1 ${token1}`
    );
  }

  const { fee, tickSpacing } = key.config;
  if (!Number.isSafeInteger(fee) || fee < 0 || fee >= Number(FEE_DENOMINATOR)) {
    throw new ValidationError("INVALID_FEE", `fee ${fee} must be an integer in [0, ${FEE_DENOMINATOR})`);
  }
  if (!Number.isSafeInteger(tickSpacing) || tickSpacing < 1 || tickSpacing > MAX_TICK_SPACING) {
    throw new ValidationError(
      "INVALID_TICK_SPACING",
      `tick spacing ${tickSpacing} must be an integer in [1, ${MAX_TICK_SPACING}]`
    );
  }
}

/** Validated copy of `key` with checksummed addresses. */
export function canonicalPoolKey(key: PoolKey): PoolKey {
  validatePoolKey(key);
  return {
    token0: getAddress(key.token0),
    token1: getAddress(key.token1),
    config: { ...key.config, extension: getAddress(key.config.extension) },
  };
}

/** keccak256 over the ABI encoding of every field of the key. */
export function toPoolId(key: PoolKey): PoolId {
  return keccak256(
    encodeAbiParameters(
      [
        { name: "token0", type: "address" },
        { name: "token1", type: "address" },
        { name: "fee", type: "uint32" },
        { name: "tickSpacing", type: "uint32" },
        { name: "extension", type: "address" },
      ],
      [
        key.token0,
        key.token1,
        key.config.fee,
        key.config.tickSpacing,
        key.config.extension,
      ]
    )
  );
}

export function validateRange(range: PositionRange, tickSpacing: number): void {
  const { tickLower, tickUpper } = range;
  if (!Number.isSafeInteger(tickLower) || !Number.isSafeInteger(tickUpper)) {
    throw new ValidationError("INVALID_RANGE", `ticks ${tickLower}/${tickUpper} must be integers`);
  }
  if (!(tickLower < tickUpper)) {
    throw new ValidationError("INVALID_RANGE", `tickLower ${tickLower} must be below tickUpper ${tickUpper}`);
  }
  if (tickLower < MIN_TICK || tickUpper > MAX_TICK) {
    throw new ValidationError(
      "RANGE_OUT_OF_BOUNDS",
      `range [${tickLower}, ${tickUpper}] leaves [${MIN_TICK}, ${MAX_TICK}]`
    );
  }
  if (tickLower % tickSpacing !== 0 || tickUpper % tickSpacing !== 0) {
    throw new ValidationError(
      "RANGE_NOT_ALIGNED",
      `range [${tickLower}, ${tickUpper}] not aligned to tick spacing ${tickSpacing}`
    );
  }
}
