import { getAddress, type Address } from "viem";
import { ZERO_ADDRESS } from "./constants";
import type { Session } from "./debt_ledger";
import type { Engine } from "./engine";
import { ValidationError } from "./errors";
import type { PoolKey } from "./pool_key";
import type { TokenAmounts } from "./state_store";
import type {
  BalanceDelta,
  CollectFeesParams,
  SwapParams,
  SwapResult,
  UpdatePositionParams,
} from "./types";

/** Lifecycle points an extension can ask to be called at. */
export interface CallPoints {
  beforeInitializePool: boolean;
  afterInitializePool: boolean;
  beforeSwap: boolean;
  afterSwap: boolean;
  beforeUpdatePosition: boolean;
  afterUpdatePosition: boolean;
  beforeCollectFees: boolean;
  afterCollectFees: boolean;
}

export type CallPoint = keyof CallPoints;

// bit order of the capability mask
export const CALL_POINT_ORDER: readonly CallPoint[] = [
  "beforeInitializePool",
  "afterInitializePool",
  "beforeSwap",
  "afterSwap",
  "beforeUpdatePosition",
  "afterUpdatePosition",
  "beforeCollectFees",
  "afterCollectFees",
];

export const NO_CALL_POINTS: Readonly<CallPoints> = Object.freeze({
  beforeInitializePool: false,
  afterInitializePool: false,
  beforeSwap: false,
  afterSwap: false,
  beforeUpdatePosition: false,
  afterUpdatePosition: false,
  beforeCollectFees: false,
  afterCollectFees: false,
});

export function encodeCallPoints(points: CallPoints): number {
  return CALL_POINT_ORDER.reduce(
    (mask, point, bit) => (points[point] ? mask | (1 << bit) : mask),
    0
  );
}

export function decodeCallPoints(mask: number): CallPoints {
  if (!Number.isInteger(mask) || mask < 0 || mask >= 1 << CALL_POINT_ORDER.length) {
    throw new ValidationError("INVALID_CALL_POINTS", `call point mask ${mask} out of range`);
  }
  const points: CallPoints = { ...NO_CALL_POINTS };
  CALL_POINT_ORDER.forEach((point, bit) => {
    points[point] = (mask & (1 << bit)) !== 0;
  });
  return points;
}

/** What a hook sees about the operation it is wrapped around. */
export interface HookContext {
  engine: Engine;
  // identity that issued the operation
  caller: Address;
  // absent for initializePool, which runs outside any session
  session?: Session;
}

/**
 * Pool-specific extension. Hooks run synchronously; throwing from a hook
 * vetoes the operation and unwinds the enclosing session.
 */
export interface Extension {
  readonly address: Address;
  readonly callPoints: CallPoints;

  beforeInitializePool?(ctx: HookContext, key: PoolKey, tick: number): void;
  afterInitializePool?(ctx: HookContext, key: PoolKey, tick: number, sqrtPrice: bigint): void;
  beforeSwap?(ctx: HookContext, key: PoolKey, params: SwapParams): void;
  afterSwap?(ctx: HookContext, key: PoolKey, params: SwapParams, result: SwapResult): void;
  beforeUpdatePosition?(ctx: HookContext, key: PoolKey, params: UpdatePositionParams): void;
  afterUpdatePosition?(
    ctx: HookContext,
    key: PoolKey,
    params: UpdatePositionParams,
    delta: BalanceDelta
  ): void;
  beforeCollectFees?(ctx: HookContext, key: PoolKey, params: CollectFeesParams): void;
  afterCollectFees?(
    ctx: HookContext,
    key: PoolKey,
    params: CollectFeesParams,
    amounts: TokenAmounts
  ): void;
}

interface Registration {
  extension: Extension;
  callPoints: CallPoints;
}

export class ExtensionRegistry {
  private readonly registrations = new Map<Address, Registration>();

  /**
   * Registers an extension whose declared mask must match both its own
   * `callPoints` and the hooks it actually implements.
   */
  register(extension: Extension, declaredMask: number): CallPoints {
    const address = getAddress(extension.address);
    if (address === ZERO_ADDRESS) {
      throw new ValidationError("INVALID_EXTENSION", "extension cannot use the zero address");
    }
    if (this.registrations.has(address)) {
      throw new ValidationError("EXTENSION_ALREADY_REGISTERED", `extension ${address} already registered`);
    }

    const declared = decodeCallPoints(declaredMask);
    const selfReported = encodeCallPoints(extension.callPoints);
    if (selfReported !== declaredMask) {
      throw new ValidationError(
        "CALL_POINTS_MISMATCH",
        `extension ${address} reports mask ${selfReported}, registration declares ${declaredMask}`
      );
    }
    for (const point of CALL_POINT_ORDER) {
      const implemented = typeof extension[point] === "function";
      if (declared[point] !== implemented) {
        throw new ValidationError(
          "CALL_POINTS_MISMATCH",
          `extension ${address} ${declared[point] ? "declares" : "implements"} ${point} ` +
            `but ${implemented ? "does not declare" : "does not implement"} it`
        );
      }
    }

    this.registrations.set(address, { extension, callPoints: declared });
    return declared;
  }

  isRegistered(address: Address): boolean {
    return this.registrations.has(getAddress(address));
  }

  /** Registration for a pool's extension, or undefined when the hook should not run. */
  lookup(address: Address, point: CallPoint): Extension | undefined {
    const registration = this.registrations.get(getAddress(address));
    if (!registration || !registration.callPoints[point]) return undefined;
    return registration.extension;
  }
}
