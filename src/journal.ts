/**
 * Undo log shared by the store, the debt ledger and the tokens. Every write
 * records how to put the previous value back; a failed scope replays its
 * entries newest first. Cost is proportional to what the scope touched.
 */
export class Journal {
  private entries: Array<() => void> = [];
  private depth = 0;

  get size(): number {
    return this.entries.length;
  }

  /** Opens a scope; the returned mark is what a failure rolls back to. */
  begin(): number {
    this.depth++;
    return this.entries.length;
  }

  // writes outside any scope are permanent
  record(undo: () => void): void {
    if (this.depth > 0) this.entries.push(undo);
  }

  rollback(mark: number): void {
    while (this.entries.length > mark) {
      const undo = this.entries.pop();
      undo?.();
    }
    this.end();
  }

  // entries stay until the outermost scope commits; an enclosing scope may still fail
  commit(): void {
    this.end();
  }

  private end(): void {
    this.depth = Math.max(0, this.depth - 1);
    if (this.depth === 0) this.entries = [];
  }
}

/** Records the previous entry of `map` at `key` before it is overwritten. */
export function recordMapEntry<K, V>(journal: Journal, map: Map<K, V>, key: K): void {
  if (map.has(key)) {
    const previous = map.get(key);
    journal.record(() => {
      if (previous !== undefined) map.set(key, previous);
    });
  } else {
    journal.record(() => map.delete(key));
  }
}
