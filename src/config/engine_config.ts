import dotenv from "dotenv";
import { getAddress, isAddress, type Address } from "viem";
import { FEE_DENOMINATOR } from "../constants";
import { ValidationError } from "../errors";

// Load environment variables from .env file
dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface EngineConfig {
  // identity the engine holds token balances under
  engineAddress: Address;
  // only identity allowed to withdraw protocol fees
  owner: Address;
  // share of every swap fee retained by the protocol, in millionths
  protocolFeePpm: number;
  // default number of extra tick-search words per swap step
  skipAhead: number;
  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_ADDRESS: Address = "0x0000000000000000000000000000000000004617";
export const DEFAULT_OWNER: Address = "0x0000000000000000000000000000000000000001";

function parseAddress(name: string, raw: string): Address {
  if (!isAddress(raw)) {
    throw new ValidationError("INVALID_CONFIG", `${name}=${raw} is not an address`);
  }
  return getAddress(raw);
}

function parseIntInRange(name: string, raw: string, min: number, max: number): number {
  const value = parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || String(value) !== raw.trim() || value < min || value > max) {
    throw new ValidationError(
      "INVALID_CONFIG",
      `${name}=${raw} must be an integer in [${min}, ${max}]`
    );
  }
  return value;
}

function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === raw.toLowerCase());
  if (!level) {
    throw new ValidationError(
      "INVALID_CONFIG",
      `LOG_LEVEL=${raw} must be one of ${LOG_LEVELS.join(", ")}`
    );
  }
  return level;
}

/**
 * Resolve engine configuration from the environment, applying overrides last.
 */
export function loadEngineConfig(
  overrides: Partial<EngineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const config: EngineConfig = {
    engineAddress: parseAddress("ENGINE_ADDRESS", env.ENGINE_ADDRESS || DEFAULT_ENGINE_ADDRESS),
    owner: parseAddress("ENGINE_OWNER", env.ENGINE_OWNER || DEFAULT_OWNER),
    protocolFeePpm: parseIntInRange(
      "PROTOCOL_FEE_PPM",
      env.PROTOCOL_FEE_PPM || "0",
      0,
      Number(FEE_DENOMINATOR)
    ),
    skipAhead: parseIntInRange("SWAP_SKIP_AHEAD", env.SWAP_SKIP_AHEAD || "0", 0, 4096),
    logLevel: parseLogLevel(env.LOG_LEVEL || "warn"),
    ...overrides,
  };

  // overrides go through the same checks
  parseAddress("engineAddress", config.engineAddress);
  parseAddress("owner", config.owner);
  parseIntInRange("protocolFeePpm", String(config.protocolFeePpm), 0, Number(FEE_DENOMINATOR));
  parseIntInRange("skipAhead", String(config.skipAhead), 0, 4096);
  parseLogLevel(config.logLevel);

  return {
    ...config,
    engineAddress: getAddress(config.engineAddress),
    owner: getAddress(config.owner),
  };
}
