import { getAddress, type Address } from "viem";
import { ValidationError } from "../errors";
import type { Journal } from "../journal";
import type { Token } from "./token";

/** Tokens the engine settles in, keyed by address. */
export class TokenRegistry {
  private readonly tokens = new Map<Address, Token>();
  private journal: Journal | undefined;

  constructor(tokens: Iterable<Token> = []) {
    for (const token of tokens) this.register(token);
  }

  register(token: Token): void {
    const address = getAddress(token.address);
    if (this.tokens.has(address)) {
      throw new ValidationError("TOKEN_ALREADY_REGISTERED", `token ${address} already registered`);
    }
    this.tokens.set(address, token);
    if (this.journal) token.useJournal(this.journal);
  }

  /** Journals every token's writes, including tokens registered later. */
  useJournal(journal: Journal): void {
    this.journal = journal;
    for (const token of this.tokens.values()) token.useJournal(journal);
  }

  has(address: Address): boolean {
    return this.tokens.has(getAddress(address));
  }

  get(address: Address): Token {
    const token = this.tokens.get(getAddress(address));
    if (!token) {
      throw new ValidationError("UNKNOWN_TOKEN", `token ${address} is not registered`);
    }
    return token;
  }
}
