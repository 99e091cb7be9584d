/**
 * Example session runner
 *
 * Creates a stable-pair pool, provides liquidity, routes a few swaps through
 * one session each and prints the resulting pool and position state.
 *
 * Usage:
 *   npm run example
 *   LOG_LEVEL=debug npm run example
 */

import type { Address } from "viem";
import {
  Engine,
  InMemoryToken,
  MAX_SQRT_PRICE,
  MIN_SQRT_PRICE,
  TokenRegistry,
  formatPrice,
  makePoolKey,
  type Actor,
  type Session,
} from "../src";

const USDC: Address = "0x1000000000000000000000000000000000000000";
const USDT: Address = "0x2000000000000000000000000000000000000000";
const LP: Address = "0x0000000000000000000000000000000000001111";
const TRADER: Address = "0x0000000000000000000000000000000000002222";

const usdc = new InMemoryToken(USDC, { symbol: "USDC", decimals: 6 });
const usdt = new InMemoryToken(USDT, { symbol: "USDT", decimals: 6 });
const tokens = new TokenRegistry([usdc, usdt]);
const engine = new Engine({ tokens, config: { protocolFeePpm: 50_000 } });

function wallet(address: Address): Actor {
  return {
    address,
    payCallback: (_session: Session, token: Address, amount: bigint) =>
      tokens.get(token).transfer(address, engine.address, amount),
  };
}

function settle(session: Session, to: Address): void {
  for (const token of [USDC, USDT]) {
    const debt = engine.getDebt(session, token);
    if (debt > 0n) engine.pay(session, token, debt);
  }
  for (const token of [USDC, USDT]) {
    const debt = engine.getDebt(session, token);
    if (debt < 0n) engine.withdraw(session, token, to, -debt);
  }
}

function main() {
  console.log("=== Example Session ===\n");

  for (const holder of [LP, TRADER]) {
    usdc.mint(holder, 1_000_000_000000n);
    usdt.mint(holder, 1_000_000_000000n);
  }

  // 0.01% fee, spacing 2: the usual stable-pair setup
  const key = makePoolKey(USDC, USDT, { fee: 100, tickSpacing: 2 });
  engine.initializePool(LP, key, 0);
  console.log(`Pool ID: ${engine.poolId(key)}`);

  const range = { salt: 0n, tickLower: -10, tickUpper: 10 };
  const lp = wallet(LP);
  const trader = wallet(TRADER);

  const added = engine.lock(lp, (session) => {
    const update = engine.updatePosition(session, key, { ...range, liquidityDelta: 10n ** 15n });
    settle(session, LP);
    return update;
  });
  console.log(`[LP] [ADD] [amount0=${added.delta0}] [amount1=${added.delta1}]`);

  const trades = [
    { isToken1: false, amount: 250_000_000000n, sqrtPriceLimit: MIN_SQRT_PRICE },
    { isToken1: true, amount: 400_000_000000n, sqrtPriceLimit: MAX_SQRT_PRICE },
    { isToken1: false, amount: -100_000_000000n, sqrtPriceLimit: MIN_SQRT_PRICE },
  ];
  for (const params of trades) {
    const result = engine.lock(trader, (session) => {
      const swapped = engine.swap(session, key, params);
      settle(session, TRADER);
      return swapped;
    });
    console.log(
      `[TRADER] [SWAP] [delta0=${result.delta0}] [delta1=${result.delta1}] ` +
        `[tick=${result.state.tick}] [price=${formatPrice(result.state.sqrtPrice, 6, 6)}]`
    );
  }

  const fees = engine.getPositionFees(key, { owner: LP, ...range });
  console.log(`\n[LP] [FEES] [amount0=${fees.amount0}] [amount1=${fees.amount1}]`);

  const removed = engine.lock(lp, (session) => {
    const update = engine.updatePosition(session, key, { ...range, liquidityDelta: -added.liquidityAfter });
    settle(session, LP);
    return update;
  });
  console.log(`[LP] [REMOVE] [amount0=${-removed.delta0}] [amount1=${-removed.delta1}]`);

  console.log(
    `[PROTOCOL] [FEES] [USDC=${engine.getProtocolFees(USDC)}] [USDT=${engine.getProtocolFees(USDT)}]`
  );
  console.log(`[ENGINE] [BALANCE] [USDC=${usdc.balanceOf(engine.address)}] [USDT=${usdt.balanceOf(engine.address)}]`);
}

try {
  main();
} catch (err) {
  console.error("Session failed:", err);
  process.exit(1);
}
