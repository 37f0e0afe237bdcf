export interface RateLimiterOptions {
  maxActions: number;
  windowMs: number;
  now?: () => number;
}

/**
 * Sliding-window action counter keyed by user. Process-local: a restart resets it.
 */
export class RateLimiter {
  private readonly actions = new Map<number, number[]>();
  private readonly maxActions: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    this.maxActions = options.maxActions;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns true when the user is limited. Otherwise records the action and returns false.
   */
  isRateLimited(userId: number): boolean {
    const now = this.now();
    const cutoff = now - this.windowMs;
    const recent = (this.actions.get(userId) ?? []).filter((ts) => ts > cutoff);

    if (recent.length >= this.maxActions) {
      this.actions.set(userId, recent);
      return true;
    }

    recent.push(now);
    this.actions.set(userId, recent);
    return false;
  }

  clear(userId: number): void {
    this.actions.delete(userId);
  }

  /** Drop users whose every timestamp has left the window. */
  prune(): void {
    const cutoff = this.now() - this.windowMs;
    for (const [userId, stamps] of this.actions) {
      if (stamps.every((ts) => ts <= cutoff)) {
        this.actions.delete(userId);
      }
    }
  }
}
