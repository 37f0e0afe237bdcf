/**
 * Per-user interaction state owned by the transport. The core only reads,
 * replaces or clears the value; it never keeps its own copy between turns.
 */
export interface SessionStore<T> {
  get(userId: number): T | undefined;
  set(userId: number, value: T): void;
  clear(userId: number): void;
}

interface Entry<T> {
  value: T;
  touchedAt: number;
}

/**
 * In-memory session store whose entries lapse after `ttlMs` without a write.
 * Lost on restart; users simply start over.
 */
export class MemorySessionStore<T> implements SessionStore<T> {
  private readonly entries = new Map<number, Entry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(userId: number): T | undefined {
    const entry = this.entries.get(userId);
    if (!entry) return undefined;
    if (this.now() - entry.touchedAt > this.ttlMs) {
      this.entries.delete(userId);
      return undefined;
    }
    return entry.value;
  }

  set(userId: number, value: T): void {
    this.entries.set(userId, { value, touchedAt: this.now() });
  }

  clear(userId: number): void {
    this.entries.delete(userId);
  }

  /** Drop every lapsed entry. */
  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let dropped = 0;
    for (const [userId, entry] of this.entries) {
      if (entry.touchedAt < cutoff) {
        this.entries.delete(userId);
        dropped++;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.entries.size;
  }
}
