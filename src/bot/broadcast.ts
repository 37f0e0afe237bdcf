import type { Store } from '../db/store.js';
import { escapeHtml } from '../shared/format.js';
import { logDeliveryFailure, type Messenger } from './messenger.js';

export interface BroadcastResult {
  total: number;
  sent: number;
  failed: number;
  /** Failures caused by users who blocked the bot or are otherwise unreachable. */
  unreachable: number;
}

export interface BroadcastOptions {
  /** Pause between two sends, to stay under Telegram's per-bot rate limit. */
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatBroadcast(text: string): string {
  return `📢 <b>Yangilik</b>\n\n${escapeHtml(text)}`;
}

/**
 * Send one message to every known user, one at a time with a fixed pause.
 * Unreachable recipients are counted but not logged as errors.
 */
export async function broadcastToAll(
  store: Store,
  messenger: Messenger,
  text: string,
  options: BroadcastOptions,
): Promise<BroadcastResult> {
  const pause = options.sleep ?? sleep;
  const users = await store.getAllUsers();
  const body = formatBroadcast(text);
  const result: BroadcastResult = { total: users.length, sent: 0, failed: 0, unreachable: 0 };

  for (const [index, user] of users.entries()) {
    const delivery = await messenger.send(user.telegram_id, body);
    if (delivery.ok) {
      result.sent++;
    } else {
      result.failed++;
      if (delivery.reason === 'unreachable') {
        result.unreachable++;
      }
      logDeliveryFailure('broadcast', `user ${user.telegram_id}`, delivery);
    }

    if (options.delayMs > 0 && index < users.length - 1) {
      await pause(options.delayMs);
    }
  }

  console.log(`[broadcast] Done: ${result.sent}/${result.total} sent, ${result.failed} failed (${result.unreachable} unreachable)`);
  return result;
}
