import { getAddress, type Address } from "viem";
import { InvariantViolationError, SessionError } from "./errors";
import { Journal, recordMapEntry } from "./journal";

/**
 * Anything that can hold a session: the locker that opened it, or a forward
 * target acting under the same session id.
 */
export interface Actor {
  readonly address: Address;
  /**
   * Asked by `pay` to move tokens into the engine. Whatever actually arrives
   * is credited, never the requested amount.
   */
  payCallback?(session: Session, token: Address, amount: bigint): void;
}

/** Value threaded through every session-scoped operation. */
export interface Session {
  readonly id: number;
  readonly actingIdentity: Address;
  // 0 for the frame opened by lock, +1 per forward
  readonly forwardDepth: number;
}

interface Frame {
  readonly session: Session;
  readonly actor: Actor;
}

/**
 * Flash accounting: per (session, token) signed debt. Positive means the
 * caller owes the engine, negative means the engine owes the caller.
 */
export class DebtLedger {
  private nextSessionId = 1;
  private readonly frames: Frame[] = [];
  private readonly debts = new Map<number, Map<Address, bigint>>();
  // sessions in which an operation threw; they can no longer close
  private readonly failed = new Set<number>();
  private readonly journal: Journal;

  constructor(journal: Journal = new Journal()) {
    this.journal = journal;
  }

  /***************** Frames *****************/
  isLocked(): boolean {
    return this.frames.length > 0;
  }

  /** Opens a new session for `actor` on top of whatever is running. */
  open(actor: Actor): Session {
    const session: Session = {
      id: this.nextSessionId++,
      actingIdentity: getAddress(actor.address),
      forwardDepth: 0,
    };
    this.pushFrame({ session, actor });
    recordMapEntry(this.journal, this.debts, session.id);
    this.debts.set(session.id, new Map());
    return session;
  }

  /**
   * Closes a session opened by {@link open}. Every debt must be exactly zero;
   * the check walks only the tokens with non-zero debt. A session in which
   * any operation failed cannot close.
   */
  close(session: Session): void {
    this.assertCurrent(session);
    if (session.forwardDepth !== 0) {
      throw new SessionError("NOT_SESSION_ROOT", `session ${session.id} closed from a forwarded frame`);
    }
    if (this.failed.has(session.id)) {
      throw new InvariantViolationError(
        "SESSION_FAILED",
        `session ${session.id} closed after an operation inside it failed`
      );
    }
    const outstanding = this.debts.get(session.id) ?? new Map<Address, bigint>();
    if (outstanding.size > 0) {
      const detail = Array.from(outstanding.entries())
        .map(([token, debt]) => `${token}=${debt}`)
        .join(", ");
      throw new InvariantViolationError(
        "NONZERO_DEBT",
        `session ${session.id} closed with ${outstanding.size} unsettled token(s): ${detail}`
      );
    }
    recordMapEntry(this.journal, this.debts, session.id);
    this.debts.delete(session.id);
    this.popFrame();
  }

  /** Marks an open session as failed. Unknown or closed sessions are ignored. */
  markFailed(sessionId: number): void {
    if (!this.debts.has(sessionId) || this.failed.has(sessionId)) return;
    this.failed.add(sessionId);
    this.journal.record(() => this.failed.delete(sessionId));
  }

  /** Rebinds the acting identity, keeping the session id. */
  pushForward(session: Session, target: Actor): Session {
    this.assertCurrent(session);
    const child: Session = {
      id: session.id,
      actingIdentity: getAddress(target.address),
      forwardDepth: session.forwardDepth + 1,
    };
    this.pushFrame({ session: child, actor: target });
    return child;
  }

  popForward(child: Session): void {
    this.assertCurrent(child);
    if (child.forwardDepth === 0) {
      throw new SessionError("NOT_FORWARDED", `session ${child.id} frame was not forwarded`);
    }
    this.popFrame();
  }

  private pushFrame(frame: Frame): void {
    this.frames.push(frame);
    this.journal.record(() => this.frames.pop());
  }

  private popFrame(): void {
    const frame = this.frames.pop();
    if (frame) this.journal.record(() => this.frames.push(frame));
  }

  /** Only the innermost frame may act; stale or foreign session values are rejected. */
  assertCurrent(session: Session): Actor {
    const top = this.frames[this.frames.length - 1];
    if (!top) {
      throw new SessionError("NOT_LOCKED", "operation requires an open session");
    }
    if (top.session !== session) {
      throw new SessionError(
        "STALE_SESSION",
        `session ${session.id} (depth ${session.forwardDepth}) is not the current frame ` +
          `(current ${top.session.id}, depth ${top.session.forwardDepth})`
      );
    }
    return top.actor;
  }

  /***************** Debts *****************/
  accountDebt(session: Session, token: Address, delta: bigint): void {
    this.assertCurrent(session);
    if (delta === 0n) return;
    const debts = this.debts.get(session.id);
    if (!debts) {
      throw new SessionError("NOT_LOCKED", `session ${session.id} has no ledger`);
    }
    const next = (debts.get(token) ?? 0n) + delta;
    recordMapEntry(this.journal, debts, token);
    // zero entries are dropped so map size is the non-zero count
    if (next === 0n) debts.delete(token);
    else debts.set(token, next);
  }

  debtOf(sessionId: number, token: Address): bigint {
    return this.debts.get(sessionId)?.get(token) ?? 0n;
  }

  nonzeroDebtCount(sessionId: number): number {
    return this.debts.get(sessionId)?.size ?? 0;
  }
}
