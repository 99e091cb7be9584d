import type { Address } from "viem";
import { Journal, recordMapEntry } from "./journal";
import type { PoolId, PoolKey } from "./pool_key";

/***************** Records *****************/
// Q128.128 fee-per-liquidity pair, wrapping modulo 2^256
export interface FeesPerLiquidity {
  value0: bigint;
  value1: bigint;
}

export interface TokenAmounts {
  amount0: bigint;
  amount1: bigint;
}

export interface PoolRecord {
  key: PoolKey;
  sqrtPrice: bigint; // Q64.96
  tick: number;
  liquidity: bigint; // active liquidity in current tick
  feesPerLiquidity: FeesPerLiquidity; // global accumulators
}

export interface TickRecord {
  // net liquidity change when crossing this tick upwards
  liquidityDelta: bigint;
  // sum of |liquidity| referencing the tick; the tick exists while > 0
  liquidityGross: bigint;
  feesPerLiquidityOutside: FeesPerLiquidity;
}

export interface PositionRecord {
  owner: Address;
  salt: bigint;
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
  feesPerLiquidityInsideLast: FeesPerLiquidity;
  // accrued at earlier updates, not yet paid out
  feesOwed: TokenAmounts;
}

export interface PositionKey {
  owner: Address;
  salt: bigint;
  tickLower: number;
  tickUpper: number;
}

interface StoreData {
  pools: Map<PoolId, PoolRecord>;
  ticks: Map<PoolId, Map<number, TickRecord>>;
  // sorted ascending
  initializedTicks: Map<PoolId, number[]>;
  positions: Map<string, PositionRecord>;
  savedBalances: Map<PoolId, TokenAmounts>;
  protocolFees: Map<Address, bigint>;
}

export const ZERO_FEES: Readonly<FeesPerLiquidity> = Object.freeze({ value0: 0n, value1: 0n });

function emptyData(): StoreData {
  return {
    pools: new Map(),
    ticks: new Map(),
    initializedTicks: new Map(),
    positions: new Map(),
    savedBalances: new Map(),
    protocolFees: new Map(),
  };
}

export function positionId(poolId: PoolId, key: PositionKey): string {
  return `${poolId}:${key.owner}:${key.salt}:${key.tickLower}:${key.tickUpper}`;
}

// index of the first element >= tick
function lowerBound(sorted: readonly number[], tick: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < tick) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Process-wide state shared by every pool. Passed by reference into each
 * operation. Records are replaced, never mutated in place, and every write
 * goes through the journal so an atomic scope can undo it.
 */
export class StateStore {
  readonly journal: Journal;
  private readonly data: StoreData = emptyData();

  constructor(journal: Journal = new Journal()) {
    this.journal = journal;
  }

  /***************** Pools *****************/
  hasPool(poolId: PoolId): boolean {
    return this.data.pools.has(poolId);
  }

  getPool(poolId: PoolId): PoolRecord | undefined {
    return this.data.pools.get(poolId);
  }

  setPool(poolId: PoolId, pool: PoolRecord): void {
    recordMapEntry(this.journal, this.data.pools, poolId);
    this.data.pools.set(poolId, pool);
  }

  /***************** Ticks *****************/
  getTick(poolId: PoolId, tick: number): TickRecord | undefined {
    return this.data.ticks.get(poolId)?.get(tick);
  }

  setTick(poolId: PoolId, tick: number, info: TickRecord): void {
    this.recordTick(poolId, tick);
    this.writeTick(poolId, tick, info);
  }

  clearTick(poolId: PoolId, tick: number): void {
    if (!this.getTick(poolId, tick)) return;
    this.recordTick(poolId, tick);
    this.writeTick(poolId, tick, undefined);
  }

  private recordTick(poolId: PoolId, tick: number): void {
    const previous = this.getTick(poolId, tick);
    this.journal.record(() => this.writeTick(poolId, tick, previous));
  }

  // keeps the sorted index in step with the tick map; undefined removes
  private writeTick(poolId: PoolId, tick: number, info: TickRecord | undefined): void {
    let ticks = this.data.ticks.get(poolId);
    if (!ticks) {
      ticks = new Map();
      this.data.ticks.set(poolId, ticks);
    }
    const sorted = this.data.initializedTicks.get(poolId) ?? [];
    this.data.initializedTicks.set(poolId, sorted);
    const i = lowerBound(sorted, tick);
    if (info) {
      if (sorted[i] !== tick) sorted.splice(i, 0, tick);
      ticks.set(tick, info);
    } else if (ticks.delete(tick) && sorted[i] === tick) {
      sorted.splice(i, 1);
    }
  }

  initializedTicks(poolId: PoolId): readonly number[] {
    return this.data.initializedTicks.get(poolId) ?? [];
  }

  /**
   * Next initialized tick in the direction of travel, looking at most
   * `searchSpan` ticks away. Moving down (lte) the current tick itself
   * qualifies; moving up the search starts strictly above it. When nothing is
   * initialized within the span, the span limit is returned uninitialized.
   */
  nextInitializedTick(
    poolId: PoolId,
    tick: number,
    lte: boolean,
    searchSpan: number
  ): { tick: number; initialized: boolean } {
    const sorted = this.initializedTicks(poolId);
    if (lte) {
      const limit = tick - searchSpan;
      const i = lowerBound(sorted, tick + 1) - 1;
      if (i >= 0 && sorted[i] >= limit) return { tick: sorted[i], initialized: true };
      return { tick: limit, initialized: false };
    }
    const limit = tick + searchSpan;
    const i = lowerBound(sorted, tick + 1);
    if (i < sorted.length && sorted[i] <= limit) return { tick: sorted[i], initialized: true };
    return { tick: limit, initialized: false };
  }

  /***************** Positions *****************/
  getPosition(poolId: PoolId, key: PositionKey): PositionRecord | undefined {
    return this.data.positions.get(positionId(poolId, key));
  }

  setPosition(poolId: PoolId, position: PositionRecord): void {
    const id = positionId(poolId, position);
    recordMapEntry(this.journal, this.data.positions, id);
    this.data.positions.set(id, position);
  }

  deletePosition(poolId: PoolId, key: PositionKey): void {
    const id = positionId(poolId, key);
    recordMapEntry(this.journal, this.data.positions, id);
    this.data.positions.delete(id);
  }

  /***************** Saved balances *****************/
  getSavedBalance(poolId: PoolId): TokenAmounts {
    return this.data.savedBalances.get(poolId) ?? { amount0: 0n, amount1: 0n };
  }

  setSavedBalance(poolId: PoolId, balance: TokenAmounts): void {
    recordMapEntry(this.journal, this.data.savedBalances, poolId);
    if (balance.amount0 === 0n && balance.amount1 === 0n) {
      this.data.savedBalances.delete(poolId);
    } else {
      this.data.savedBalances.set(poolId, balance);
    }
  }

  /***************** Protocol fees *****************/
  getProtocolFees(token: Address): bigint {
    return this.data.protocolFees.get(token) ?? 0n;
  }

  addProtocolFees(token: Address, amount: bigint): void {
    if (amount === 0n) return;
    recordMapEntry(this.journal, this.data.protocolFees, token);
    this.data.protocolFees.set(token, this.getProtocolFees(token) + amount);
  }

  /***************** Inspection helpers *****************/
  toJSON() {
    const str = (v: bigint) => v.toString();
    return {
      pools: Array.from(this.data.pools.entries()).map(([id, p]) => ({
        id,
        token0: p.key.token0,
        token1: p.key.token1,
        fee: p.key.config.fee,
        tickSpacing: p.key.config.tickSpacing,
        extension: p.key.config.extension,
        sqrtPrice: str(p.sqrtPrice),
        tick: p.tick,
        liquidity: str(p.liquidity),
        feesPerLiquidity0: str(p.feesPerLiquidity.value0),
        feesPerLiquidity1: str(p.feesPerLiquidity.value1),
        ticks: this.initializedTicks(id).map((t) => {
          const info = this.getTick(id, t);
          return {
            index: t,
            liquidityDelta: info ? str(info.liquidityDelta) : "0",
            liquidityGross: info ? str(info.liquidityGross) : "0",
          };
        }),
      })),
      positions: Array.from(this.data.positions.entries()).map(([id, p]) => ({
        id,
        liquidity: str(p.liquidity),
        owed0: str(p.feesOwed.amount0),
        owed1: str(p.feesOwed.amount1),
      })),
      protocolFees: Array.from(this.data.protocolFees.entries()).map(([token, amount]) => ({
        token,
        amount: str(amount),
      })),
    };
  }
}
