import type { Store } from '../db/store.js';

export interface RetentionJobOptions {
  intervalMs: number;
  now?: () => Date;
}

/**
 * Delete every ad whose expires_at has passed, whatever its status.
 */
export async function sweepExpiredAds(store: Store, now: Date = new Date()): Promise<number> {
  const removed = await store.cleanupOldAds(now);
  if (removed > 0) {
    console.log(`[retention] Removed ${removed} expired ad(s)`);
  }
  return removed;
}

/**
 * Start a periodic job that removes expired ads.
 * Runs once immediately, then every `intervalMs`. Returns a stop function.
 */
export function startRetentionJob(store: Store, options: RetentionJobOptions): () => void {
  const now = options.now ?? (() => new Date());

  const run = (label: string): void => {
    sweepExpiredAds(store, now()).catch((err) =>
      console.error(`[retention] ${label} sweep failed:`, err),
    );
  };

  run('Initial');
  const interval = setInterval(() => run('Periodic'), options.intervalMs);

  console.log(`[retention] Retention job started (every ${Math.round(options.intervalMs / 3_600_000)}h)`);
  return () => clearInterval(interval);
}
