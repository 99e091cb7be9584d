import { getAddress, type Address } from "viem";
import { FEE_DENOMINATOR } from "../constants";
import { ValidationError } from "../errors";
import { recordMapEntry, type Journal } from "../journal";
import type { Token } from "./token";

export interface InMemoryTokenOptions {
  symbol: string;
  decimals?: number;
  // burned from every transfer, in millionths; models fee-on-transfer tokens
  transferFeePpm?: number;
}

export class InMemoryToken implements Token {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
  readonly transferFeePpm: number;
  private readonly balances = new Map<Address, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private supply = 0n;
  private journal: Journal | undefined;

  constructor(address: string, options: InMemoryTokenOptions) {
    this.address = getAddress(address);
    this.symbol = options.symbol;
    this.decimals = options.decimals ?? 18;
    this.transferFeePpm = options.transferFeePpm ?? 0;
  }

  get totalSupply(): bigint {
    return this.supply;
  }

  useJournal(journal: Journal): void {
    this.journal = journal;
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(getAddress(holder)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
  }

  mint(to: Address, amount: bigint): void {
    this.assertAmount(amount);
    const holder = getAddress(to);
    this.setBalance(holder, this.balanceOf(holder) + amount);
    this.setSupply(this.supply + amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.assertAmount(amount);
    this.setAllowance(this.allowanceKey(owner, spender), amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.assertAmount(amount);
    const sender = getAddress(from);
    const balance = this.balanceOf(sender);
    if (balance < amount) {
      throw new ValidationError(
        "INSUFFICIENT_BALANCE",
        `${this.symbol}: ${sender} holds ${balance}, needs ${amount}`
      );
    }
    const fee = (amount * BigInt(this.transferFeePpm)) / FEE_DENOMINATOR;
    const recipient = getAddress(to);
    this.setBalance(sender, balance - amount);
    this.setBalance(recipient, this.balanceOf(recipient) + amount - fee);
    if (fee > 0n) this.setSupply(this.supply - fee);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    const key = this.allowanceKey(from, spender);
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new ValidationError(
        "INSUFFICIENT_ALLOWANCE",
        `${this.symbol}: ${spender} may move ${allowed} from ${from}, needs ${amount}`
      );
    }
    this.transfer(from, to, amount);
    this.setAllowance(key, allowed - amount);
  }

  /***************** Journaled writes *****************/
  private setBalance(holder: Address, amount: bigint): void {
    if (this.journal) recordMapEntry(this.journal, this.balances, holder);
    this.balances.set(holder, amount);
  }

  private setAllowance(key: string, amount: bigint): void {
    if (this.journal) recordMapEntry(this.journal, this.allowances, key);
    this.allowances.set(key, amount);
  }

  private setSupply(amount: bigint): void {
    const previous = this.supply;
    this.journal?.record(() => {
      this.supply = previous;
    });
    this.supply = amount;
  }

  private allowanceKey(owner: Address, spender: Address): string {
    return `${getAddress(owner)}:${getAddress(spender)}`;
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new ValidationError("NEGATIVE_AMOUNT", `${this.symbol}: negative amount ${amount}`);
    }
  }
}
