import type { Address } from "viem";
import type { Journal } from "../journal";

/** ERC20-like ledger living in the same process as the engine. */
export interface Token {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;

  balanceOf(holder: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(owner: Address, spender: Address, amount: bigint): void;
  transfer(from: Address, to: Address, amount: bigint): void;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;

  // writes made after this call are undone together with the engine's on abort
  useJournal(journal: Journal): void;
}
