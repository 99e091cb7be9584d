import type { Address } from "viem";
import type { Actor, Session } from "../src/debt_ledger";
import { Engine } from "../src/engine";
import type { EngineConfig } from "../src/config/engine_config";
import type { Logger } from "../src/logger";
import { makePoolKey, type PoolKey } from "../src/pool_key";
import { StateStore } from "../src/state_store";
import { InMemoryToken, type InMemoryTokenOptions } from "../src/tokens/in_memory_token";
import { TokenRegistry } from "../src/tokens/token_registry";

export const TOKEN0: Address = "0x1000000000000000000000000000000000000000";
export const TOKEN1: Address = "0x2000000000000000000000000000000000000000";
export const TOKEN2: Address = "0x3000000000000000000000000000000000000000";
export const ALICE: Address = "0x0000000000000000000000000000000000001111";
export const BOB: Address = "0x0000000000000000000000000000000000002222";
export const OWNER: Address = "0x0000000000000000000000000000000000000001";

/**
 * A wallet that settles by transferring from its own balance when the engine
 * asks it to pay.
 */
export class Trader implements Actor {
  readonly address: Address;
  private readonly tokens: TokenRegistry;
  private readonly engine: () => Engine;

  constructor(address: Address, tokens: TokenRegistry, engine: () => Engine) {
    this.address = address;
    this.tokens = tokens;
    this.engine = engine;
  }

  payCallback(_session: Session, token: Address, amount: bigint): void {
    this.tokens.get(token).transfer(this.address, this.engine().address, amount);
  }
}

export interface Fixture {
  engine: Engine;
  store: StateStore;
  tokens: TokenRegistry;
  token0: InMemoryToken;
  token1: InMemoryToken;
  key: PoolKey;
  alice: Trader;
  bob: Trader;
}

export function setup(
  options: {
    config?: Partial<EngineConfig>;
    fee?: number;
    tickSpacing?: number;
    extension?: Address;
    token1?: Partial<InMemoryTokenOptions>;
    mint?: bigint;
    logger?: Logger;
  } = {}
): Fixture {
  const token0 = new InMemoryToken(TOKEN0, { symbol: "TK0" });
  const token1 = new InMemoryToken(TOKEN1, { symbol: "TK1", ...options.token1 });
  const tokens = new TokenRegistry([token0, token1]);
  const store = new StateStore();
  const engine = new Engine({
    tokens,
    store,
    logger: options.logger,
    env: {},
    config: { owner: OWNER, logLevel: "silent", ...options.config },
  });
  const mint = options.mint ?? 10n ** 30n;
  for (const holder of [ALICE, BOB]) {
    token0.mint(holder, mint);
    token1.mint(holder, mint);
  }
  const key = makePoolKey(TOKEN0, TOKEN1, {
    fee: options.fee ?? 3000,
    tickSpacing: options.tickSpacing ?? 10,
    extension: options.extension,
  });
  return {
    engine,
    store,
    tokens,
    token0,
    token1,
    key,
    alice: new Trader(ALICE, tokens, () => engine),
    bob: new Trader(BOB, tokens, () => engine),
  };
}

/** Pays every positive debt, then withdraws every negative one to `to`. */
export function settle(engine: Engine, session: Session, tokens: readonly Address[], to: Address): void {
  for (const token of tokens) {
    const debt = engine.getDebt(session, token);
    if (debt > 0n) engine.pay(session, token, debt);
  }
  for (const token of tokens) {
    const debt = engine.getDebt(session, token);
    if (debt < 0n) engine.withdraw(session, token, to, -debt);
  }
}
