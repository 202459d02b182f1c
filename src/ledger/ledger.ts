import type { LedgerStore } from './store.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_LEDGER_CAPACITY = 50;

/**
 * Per-account record of post ids already forwarded. Ids are kept in
 * insertion order, so the oldest is evicted first once the set exceeds
 * `capacity`.
 */
export class DedupLedger {
  private readonly working = new Map<string, Set<string>>();
  private readonly flushes = new Map<string, Promise<void>>();

  constructor(
    private readonly store: LedgerStore,
    private readonly capacity: number = DEFAULT_LEDGER_CAPACITY,
  ) {}

  /**
   * Replace the working set with what is persisted for `account`.
   */
  async load(account: string): Promise<ReadonlySet<string>> {
    const ids = new Set(await this.store.read(account));
    this.working.set(account, ids);
    logger.debug({ account, count: ids.size }, 'Ledger loaded');
    return ids;
  }

  has(account: string, id: string): boolean {
    return this.working.get(account)?.has(id) ?? false;
  }

  /**
   * Add `id` as the most recent entry. Recording an id again moves it to
   * the newest position.
   */
  record(account: string, id: string): void {
    let ids = this.working.get(account);
    if (!ids) {
      ids = new Set();
      this.working.set(account, ids);
    }
    ids.delete(id);
    ids.add(id);
  }

  /**
   * Working-set ids, oldest first.
   */
  snapshot(account: string): string[] {
    return [...(this.working.get(account) ?? [])];
  }

  /**
   * Trim to capacity and persist. Flushes for one account never interleave.
   */
  flush(account: string): Promise<void> {
    const ids = this.working.get(account) ?? new Set<string>();
    while (ids.size > this.capacity) {
      const oldest = ids.values().next();
      if (oldest.done) break;
      ids.delete(oldest.value);
    }
    this.working.set(account, ids);
    const snapshot = [...ids];

    const previous = this.flushes.get(account) ?? Promise.resolve();
    // A failed earlier flush was already reported to its own caller.
    const next = previous.catch(() => undefined).then(() => this.store.write(account, snapshot));
    this.flushes.set(account, next);
    return next;
  }
}
