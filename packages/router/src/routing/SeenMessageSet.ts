export interface SeenMessageSetOptions {
  capacity: number;
  /** Entries older than this are treated as unseen. Omit for a count-only bound. */
  maxAgeMs?: number | null;
  now?: () => number;
}

/**
 * Bounded set of message ids that have already produced an intent.
 *
 * Map insertion order doubles as age order, so eviction (by count or by age)
 * always removes from the front.
 */
export class SeenMessageSet {
  readonly capacity: number;
  private readonly maxAgeMs: number | null;
  private readonly now: () => number;
  // id → time it was added
  private readonly entries = new Map<string, number>();

  constructor(options: SeenMessageSetOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.maxAgeMs = options.maxAgeMs ?? null;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    this.pruneExpired();
    return this.entries.size;
  }

  has(id: string): boolean {
    this.pruneExpired();
    return this.entries.has(id);
  }

  add(id: string): void {
    this.checkAndAdd(id);
  }

  /**
   * Membership check and insert as one step. Returns true when `id` was not
   * present (and is now), false when it was already seen.
   */
  checkAndAdd(id: string): boolean {
    this.pruneExpired();
    if (this.entries.has(id)) return false;

    this.entries.set(id, this.now());
    this.evictOverflow();
    return true;
  }

  /** Ids currently remembered, oldest first. */
  snapshot(): string[] {
    this.pruneExpired();
    return [...this.entries.keys()];
  }

  /**
   * Seed from a snapshot (oldest first). Restored ids are placed before every
   * live entry and share the oldest live timestamp, so eviction still removes
   * the oldest ids first. A live entry keeps its own position and time.
   */
  restore(ids: readonly string[]): void {
    this.pruneExpired();
    const live = [...this.entries];
    const restoredAt = live[0]?.[1] ?? this.now();

    this.entries.clear();
    for (const id of ids) {
      if (!this.entries.has(id)) this.entries.set(id, restoredAt);
    }
    for (const [id, addedAt] of live) {
      this.entries.delete(id);
      this.entries.set(id, addedAt);
    }
    this.evictOverflow();
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOverflow(): void {
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  private pruneExpired(): void {
    if (this.maxAgeMs === null) return;
    const cutoff = this.now() - this.maxAgeMs;
    for (const [id, addedAt] of this.entries) {
      if (addedAt > cutoff) break;
      this.entries.delete(id);
    }
  }
}
