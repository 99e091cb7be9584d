import { getAddress, type Address } from "viem";
import { loadEngineConfig, type EngineConfig } from "./config/engine_config";
import { MAX_UINT128 } from "./constants";
import { DebtLedger, type Actor, type Session } from "./debt_ledger";
import { EngineError, InvariantViolationError, SessionError, ValidationError } from "./errors";
import {
  ExtensionRegistry,
  type CallPoint,
  type CallPoints,
  type Extension,
  type HookContext,
} from "./extensions";
import type { Journal } from "./journal";
import { Logger } from "./logger";
import { tickToSqrtPrice } from "./math/tick_math";
import {
  canonicalPoolKey,
  hasExtension,
  toPoolId,
  type PoolId,
  type PoolKey,
} from "./pool_key";
import {
  collectFees as collectPositionFees,
  donateToLiquidity,
  feesPerLiquidityInside,
  getPositionFees as computePositionFees,
  updatePosition as applyPositionUpdate,
  type PositionUpdate,
} from "./position_accounting";
import {
  StateStore,
  ZERO_FEES,
  type FeesPerLiquidity,
  type PoolRecord,
  type PositionKey,
  type PositionRecord,
  type TickRecord,
  type TokenAmounts,
} from "./state_store";
import { executeSwap } from "./swap_executor";
import { TokenRegistry } from "./tokens/token_registry";
import type {
  CollectFeesParams,
  PoolState,
  SwapParams,
  SwapResult,
  UpdatePositionParams,
} from "./types";

/** Receiver of {@link Engine.forward}; runs under the forwarding session id. */
export interface ForwardTarget<P = unknown, R = unknown> extends Actor {
  forwarded(session: Session, payload: P): R;
}

export interface EngineOptions {
  config?: Partial<EngineConfig>;
  // defaults to process.env
  env?: NodeJS.ProcessEnv;
  tokens?: TokenRegistry;
  store?: StateStore;
  logger?: Logger;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function assertAmount(amount: bigint, what: string): void {
  if (amount < 0n || amount > MAX_UINT128) {
    throw new ValidationError("INVALID_AMOUNT", `${what} ${amount} must be in [0, 2^128)`);
  }
}

/**
 * Singleton exchange engine: every pool lives in one store and every balance
 * change goes through a session's debt ledger.
 */
export class Engine {
  readonly config: EngineConfig;
  readonly address: Address;
  readonly tokens: TokenRegistry;
  private readonly store: StateStore;
  private readonly journal: Journal;
  private readonly ledger: DebtLedger;
  private readonly extensions = new ExtensionRegistry();
  private readonly logger: Logger;

  constructor(options: EngineOptions = {}) {
    this.config = loadEngineConfig(options.config, options.env ?? process.env);
    this.address = this.config.engineAddress;
    this.tokens = options.tokens ?? new TokenRegistry();
    this.store = options.store ?? new StateStore();
    this.journal = this.store.journal;
    this.ledger = new DebtLedger(this.journal);
    this.tokens.useJournal(this.journal);
    this.logger = options.logger ?? new Logger("ENGINE", this.config.logLevel);
  }

  /***************** Atomic scopes *****************/

  /**
   * Everything written inside `fn` is undone if it throws. When the scope runs
   * inside `session`, that session is also marked failed, so catching the
   * error in the callback cannot let the session close.
   */
  private atomic<T>(scope: string, session: Session | undefined, fn: () => T): T {
    const mark = this.journal.begin();
    try {
      const result = fn();
      this.journal.commit();
      return result;
    } catch (err) {
      this.journal.rollback(mark);
      if (session) this.ledger.markFailed(session.id);
      this.logger.warn("ROLLBACK", {
        scope,
        session: session?.id,
        code: err instanceof EngineError ? err.code : undefined,
        reason: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  // the promise is dropped; its rejection is logged rather than left unhandled
  private rejectAsync(result: PromiseLike<unknown>, message: string): never {
    result.then(undefined, (err: unknown) =>
      this.logger.warn("ASYNC_CALLBACK_REJECTED", {
        reason: err instanceof Error ? err.message : String(err),
      })
    );
    throw new SessionError("ASYNC_CALLBACK", message);
  }

  /***************** Extensions *****************/

  registerExtension(extension: Extension, declaredMask: number): CallPoints {
    const points = this.extensions.register(extension, declaredMask);
    this.logger.info("EXTENSION_REGISTERED", {
      extension: getAddress(extension.address),
      mask: declaredMask,
    });
    return points;
  }

  private callHook(
    key: PoolKey,
    point: CallPoint,
    caller: Address,
    session: Session | undefined,
    invoke: (extension: Extension, ctx: HookContext) => void
  ): void {
    // an extension acting on its own pool does not trigger itself
    if (!hasExtension(key) || caller === key.config.extension) return;
    const extension = this.extensions.lookup(key.config.extension, point);
    if (!extension) return;
    this.logger.debug("HOOK", { point, extension: key.config.extension, session: session?.id });
    invoke(extension, { engine: this, caller, session });
  }

  /***************** Pools *****************/

  private resolvePool(key: PoolKey): { poolKey: PoolKey; poolId: PoolId; pool: PoolRecord } {
    const poolKey = canonicalPoolKey(key);
    const poolId = toPoolId(poolKey);
    const pool = this.store.getPool(poolId);
    if (!pool) {
      throw new ValidationError("POOL_NOT_INITIALIZED", `pool ${poolId} is not initialized`);
    }
    return { poolKey, poolId, pool };
  }

  /** Creates the pool at `tick`. Runs in its own atomic scope outside any session. */
  initializePool(caller: Address, key: PoolKey, tick: number): bigint {
    const poolKey = canonicalPoolKey(key);
    const poolId = toPoolId(poolKey);
    const from = getAddress(caller);
    const sqrtPrice = tickToSqrtPrice(tick);
    this.tokens.get(poolKey.token0);
    this.tokens.get(poolKey.token1);
    if (hasExtension(poolKey) && !this.extensions.isRegistered(poolKey.config.extension)) {
      throw new ValidationError(
        "EXTENSION_NOT_REGISTERED",
        `extension ${poolKey.config.extension} is not registered`
      );
    }

    return this.atomic("initializePool", undefined, () => {
      if (this.store.hasPool(poolId)) {
        throw new ValidationError("POOL_ALREADY_INITIALIZED", `pool ${poolId} already initialized`);
      }
      this.callHook(poolKey, "beforeInitializePool", from, undefined, (ext, ctx) =>
        ext.beforeInitializePool?.(ctx, poolKey, tick)
      );

      this.store.setPool(poolId, {
        key: poolKey,
        sqrtPrice,
        tick,
        liquidity: 0n,
        feesPerLiquidity: { ...ZERO_FEES },
      });

      this.callHook(poolKey, "afterInitializePool", from, undefined, (ext, ctx) =>
        ext.afterInitializePool?.(ctx, poolKey, tick, sqrtPrice)
      );
      this.logger.info("POOL_INITIALIZED", {
        pool: poolId,
        fee: poolKey.config.fee,
        spacing: poolKey.config.tickSpacing,
        tick,
      });
      return sqrtPrice;
    });
  }

  /***************** Sessions *****************/

  /**
   * Opens a session for `locker`, runs `callback` and requires every debt of
   * the session to be zero afterwards. Any failure inside the session, even
   * one the callback catches, or unsettled debt, undoes everything done
   * since the lock opened.
   *
   * The callback must be synchronous: one returning a promise is rejected
   * with `ASYNC_CALLBACK`, and engine calls made after its first `await` find
   * the session closed.
   */
  lock<T>(locker: Actor, callback: (session: Session) => T): T {
    return this.atomic("lock", undefined, () => {
      const session = this.ledger.open(locker);
      this.logger.debug("LOCK", { session: session.id, locker: locker.address });
      const result = callback(session);
      if (isThenable(result)) {
        this.rejectAsync(result, `session ${session.id} callback returned a promise`);
      }
      this.ledger.close(session);
      this.logger.debug("UNLOCK", { session: session.id });
      return result;
    });
  }

  /**
   * Calls `target.forwarded` with the same session id and `target` as the
   * acting identity, then restores the caller's identity.
   */
  forward<P, R>(session: Session, target: ForwardTarget<P, R>, payload: P): R {
    return this.atomic("forward", session, () => {
      const child = this.ledger.pushForward(session, target);
      this.logger.debug("FORWARD", { session: child.id, to: target.address, depth: child.forwardDepth });
      const result = target.forwarded(child, payload);
      if (isThenable(result)) {
        this.rejectAsync(result, `forward to ${target.address} returned a promise`);
      }
      this.ledger.popForward(child);
      return result;
    });
  }

  /***************** Pool operations *****************/

  swap(session: Session, key: PoolKey, params: SwapParams): SwapResult {
    return this.atomic("swap", session, () => {
      this.ledger.assertCurrent(session);
      const { poolKey, poolId } = this.resolvePool(key);
      const caller = session.actingIdentity;
      this.callHook(poolKey, "beforeSwap", caller, session, (ext, ctx) =>
        ext.beforeSwap?.(ctx, poolKey, params)
      );

      const result = executeSwap(
        {
          store: this.store,
          poolId,
          protocolFeePpm: this.config.protocolFeePpm,
          skipAhead: this.config.skipAhead,
          logger: this.logger.child("SWAP"),
        },
        params
      );
      this.ledger.accountDebt(session, poolKey.token0, result.delta0);
      this.ledger.accountDebt(session, poolKey.token1, result.delta1);

      this.callHook(poolKey, "afterSwap", caller, session, (ext, ctx) =>
        ext.afterSwap?.(ctx, poolKey, params, result)
      );
      this.logger.info("SWAP", {
        session: session.id,
        pool: poolId.slice(0, 10),
        delta0: result.delta0,
        delta1: result.delta1,
        tick: result.state.tick,
        crossed: result.ticksCrossed,
      });
      return result;
    });
  }

  /** Owner of the position is the session's acting identity. */
  updatePosition(session: Session, key: PoolKey, params: UpdatePositionParams): PositionUpdate {
    return this.atomic("updatePosition", session, () => {
      this.ledger.assertCurrent(session);
      const { poolKey, poolId } = this.resolvePool(key);
      const owner = session.actingIdentity;
      this.callHook(poolKey, "beforeUpdatePosition", owner, session, (ext, ctx) =>
        ext.beforeUpdatePosition?.(ctx, poolKey, params)
      );

      const update = applyPositionUpdate(this.store, poolId, owner, params);
      this.ledger.accountDebt(session, poolKey.token0, update.delta0);
      this.ledger.accountDebt(session, poolKey.token1, update.delta1);

      this.callHook(poolKey, "afterUpdatePosition", owner, session, (ext, ctx) =>
        ext.afterUpdatePosition?.(ctx, poolKey, params, { delta0: update.delta0, delta1: update.delta1 })
      );
      this.logger.info("POSITION", {
        session: session.id,
        owner,
        range: `${params.tickLower}:${params.tickUpper}`,
        liquidityDelta: params.liquidityDelta,
        delta0: update.delta0,
        delta1: update.delta1,
      });
      return update;
    });
  }

  collectFees(session: Session, key: PoolKey, params: CollectFeesParams): TokenAmounts {
    return this.atomic("collectFees", session, () => {
      this.ledger.assertCurrent(session);
      const { poolKey, poolId } = this.resolvePool(key);
      const owner = session.actingIdentity;
      this.callHook(poolKey, "beforeCollectFees", owner, session, (ext, ctx) =>
        ext.beforeCollectFees?.(ctx, poolKey, params)
      );

      const amounts = collectPositionFees(this.store, poolId, owner, params);
      this.ledger.accountDebt(session, poolKey.token0, -amounts.amount0);
      this.ledger.accountDebt(session, poolKey.token1, -amounts.amount1);

      this.callHook(poolKey, "afterCollectFees", owner, session, (ext, ctx) =>
        ext.afterCollectFees?.(ctx, poolKey, params, amounts)
      );
      this.logger.info("COLLECT", {
        session: session.id,
        owner,
        amount0: amounts.amount0,
        amount1: amounts.amount1,
      });
      return amounts;
    });
  }

  /***************** Settlement *****************/

  /**
   * Asks the acting actor to send `amount` of `token` and credits whatever the
   * engine's balance actually grew by.
   */
  pay(session: Session, token: Address, amount: bigint): bigint {
    return this.atomic("pay", session, () => {
      const actor = this.ledger.assertCurrent(session);
      assertAmount(amount, "pay amount");
      const tokenImpl = this.tokens.get(token);
      if (!actor.payCallback) {
        throw new ValidationError("NO_PAY_CALLBACK", `${actor.address} cannot pay: no payCallback`);
      }
      const before = tokenImpl.balanceOf(this.address);
      actor.payCallback(session, tokenImpl.address, amount);
      const received = this.received(tokenImpl.address, before, tokenImpl.balanceOf(this.address));
      this.ledger.accountDebt(session, getAddress(tokenImpl.address), -received);
      this.logger.debug("PAY", { session: session.id, token: tokenImpl.symbol, requested: amount, received });
      return received;
    });
  }

  /** Pulls `amount` from `from` using the allowance granted to the engine. */
  payFrom(session: Session, from: Address, token: Address, amount: bigint): bigint {
    return this.atomic("payFrom", session, () => {
      this.ledger.assertCurrent(session);
      assertAmount(amount, "pay amount");
      const tokenImpl = this.tokens.get(token);
      const before = tokenImpl.balanceOf(this.address);
      tokenImpl.transferFrom(this.address, getAddress(from), this.address, amount);
      const received = this.received(tokenImpl.address, before, tokenImpl.balanceOf(this.address));
      this.ledger.accountDebt(session, getAddress(tokenImpl.address), -received);
      this.logger.debug("PAY_FROM", { session: session.id, from, token: tokenImpl.symbol, requested: amount, received });
      return received;
    });
  }

  private received(token: Address, before: bigint, after: bigint): bigint {
    if (after < before) {
      throw new InvariantViolationError("BALANCE_DECREASED", `engine balance of ${token} fell during payment`);
    }
    return after - before;
  }

  /** Sends tokens out first; the session then owes them back. */
  withdraw(session: Session, token: Address, recipient: Address, amount: bigint): void {
    this.atomic("withdraw", session, () => {
      this.ledger.assertCurrent(session);
      assertAmount(amount, "withdraw amount");
      const tokenImpl = this.tokens.get(token);
      tokenImpl.transfer(this.address, getAddress(recipient), amount);
      this.ledger.accountDebt(session, getAddress(tokenImpl.address), amount);
      this.logger.debug("WITHDRAW", { session: session.id, token: tokenImpl.symbol, recipient, amount });
    });
  }

  /***************** Extension-only primitives *****************/

  private requireExtensionActor(session: Session, key: PoolKey): void {
    if (!hasExtension(key) || session.actingIdentity !== key.config.extension) {
      throw new ValidationError(
        "UNAUTHORIZED",
        `${session.actingIdentity} is not the extension of this pool`
      );
    }
  }

  /** Donates to in-range liquidity, or to protocol fees when none is in range. */
  accumulateAsFees(session: Session, key: PoolKey, amount0: bigint, amount1: bigint): void {
    this.atomic("accumulateAsFees", session, () => {
      this.ledger.assertCurrent(session);
      const { poolKey, poolId } = this.resolvePool(key);
      this.requireExtensionActor(session, poolKey);
      assertAmount(amount0, "amount0");
      assertAmount(amount1, "amount1");

      const unearned = donateToLiquidity(this.store, poolId, amount0, amount1);
      this.store.addProtocolFees(poolKey.token0, unearned.amount0);
      this.store.addProtocolFees(poolKey.token1, unearned.amount1);
      this.ledger.accountDebt(session, poolKey.token0, amount0);
      this.ledger.accountDebt(session, poolKey.token1, amount1);
      this.logger.debug("ACCUMULATE", { session: session.id, pool: poolId.slice(0, 10), amount0, amount1 });
    });
  }

  /**
   * Moves tokens between the session's debt and the pool's saved balance.
   * Positive deltas save (the session owes them), negative deltas release.
   */
  updateSavedBalances(session: Session, key: PoolKey, delta0: bigint, delta1: bigint): TokenAmounts {
    return this.atomic("updateSavedBalances", session, () => {
      this.ledger.assertCurrent(session);
      const { poolKey, poolId } = this.resolvePool(key);
      this.requireExtensionActor(session, poolKey);

      const saved = this.store.getSavedBalance(poolId);
      const next: TokenAmounts = {
        amount0: saved.amount0 + delta0,
        amount1: saved.amount1 + delta1,
      };
      for (const amount of [next.amount0, next.amount1]) {
        if (amount < 0n) {
          throw new InvariantViolationError("SAVED_BALANCE_UNDERFLOW", `saved balance would become ${amount}`);
        }
        if (amount > MAX_UINT128) {
          throw new InvariantViolationError("SAVED_BALANCE_OVERFLOW", `saved balance ${amount} exceeds uint128`);
        }
      }
      this.store.setSavedBalance(poolId, next);
      this.ledger.accountDebt(session, poolKey.token0, delta0);
      this.ledger.accountDebt(session, poolKey.token1, delta1);
      return { ...next };
    });
  }

  /***************** Protocol fees *****************/

  withdrawProtocolFees(caller: Address, token: Address, recipient: Address, amount: bigint): void {
    if (getAddress(caller) !== this.config.owner) {
      throw new ValidationError("UNAUTHORIZED", `${caller} is not the engine owner`);
    }
    assertAmount(amount, "withdraw amount");
    const tokenImpl = this.tokens.get(token);
    const tokenAddress = getAddress(tokenImpl.address);
    const collected = this.store.getProtocolFees(tokenAddress);
    if (amount > collected) {
      throw new ValidationError(
        "INSUFFICIENT_PROTOCOL_FEES",
        `requested ${amount} of ${tokenImpl.symbol}, collected ${collected}`
      );
    }
    this.atomic("withdrawProtocolFees", undefined, () => {
      this.store.addProtocolFees(tokenAddress, -amount);
      tokenImpl.transfer(this.address, getAddress(recipient), amount);
      this.logger.info("PROTOCOL_FEES_WITHDRAWN", { token: tokenImpl.symbol, recipient, amount });
    });
  }

  /***************** Views *****************/

  poolId(key: PoolKey): PoolId {
    return toPoolId(canonicalPoolKey(key));
  }

  getPoolState(key: PoolKey): PoolState | undefined {
    const pool = this.store.getPool(this.poolId(key));
    if (!pool) return undefined;
    return {
      sqrtPrice: pool.sqrtPrice,
      tick: pool.tick,
      liquidity: pool.liquidity,
      feesPerLiquidity: { ...pool.feesPerLiquidity },
    };
  }

  getTick(key: PoolKey, tick: number): TickRecord | undefined {
    const info = this.store.getTick(this.poolId(key), tick);
    return info ? structuredClone(info) : undefined;
  }

  getPosition(key: PoolKey, position: PositionKey): PositionRecord | undefined {
    const record = this.store.getPosition(this.poolId(key), { ...position, owner: getAddress(position.owner) });
    return record ? structuredClone(record) : undefined;
  }

  getPositionFees(key: PoolKey, position: PositionKey): TokenAmounts {
    const { poolId } = this.resolvePool(key);
    return computePositionFees(this.store, poolId, { ...position, owner: getAddress(position.owner) });
  }

  getPoolFeesPerLiquidityInside(key: PoolKey, tickLower: number, tickUpper: number): FeesPerLiquidity {
    const { poolId } = this.resolvePool(key);
    return feesPerLiquidityInside(this.store, poolId, tickLower, tickUpper);
  }

  getSavedBalances(key: PoolKey): TokenAmounts {
    return { ...this.store.getSavedBalance(this.poolId(key)) };
  }

  getProtocolFees(token: Address): bigint {
    return this.store.getProtocolFees(getAddress(token));
  }

  getDebt(session: Session, token: Address): bigint {
    return this.ledger.debtOf(session.id, getAddress(token));
  }

  nonzeroDebtCount(session: Session): number {
    return this.ledger.nonzeroDebtCount(session.id);
  }

  isLocked(): boolean {
    return this.ledger.isLocked();
  }

  toJSON() {
    return {
      address: this.address,
      owner: this.config.owner,
      protocolFeePpm: this.config.protocolFeePpm,
      ...this.store.toJSON(),
    };
  }
}
