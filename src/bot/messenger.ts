import { GrammyError, HttpError, type Api } from 'grammy';
import type { InlineKeyboardMarkup } from 'grammy/types';

export type DeliveryFailureReason = 'unreachable' | 'other';

export type DeliveryResult =
  | { ok: true; messageId: number }
  | { ok: false; reason: DeliveryFailureReason; error: string };

/**
 * Outbound side of the chat transport. Never throws: every failure comes back
 * as a DeliveryResult so a committed state change is never rolled back by it.
 */
export interface Messenger {
  send(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<DeliveryResult>;
  publish(channelId: string | number, text: string): Promise<DeliveryResult>;
}

/**
 * "Recipient unreachable" covers users who blocked the bot, deleted their
 * account or never opened a chat with it. Those are expected and not logged as errors.
 */
export function classifyDeliveryError(err: unknown): DeliveryFailureReason {
  if (err instanceof GrammyError) {
    const desc = err.description.toLowerCase();
    if (
      err.error_code === 403
      || desc.includes('bot was blocked')
      || desc.includes('user is deactivated')
      || desc.includes('chat not found')
    ) {
      return 'unreachable';
    }
    return 'other';
  }
  if (err instanceof HttpError) {
    return 'other';
  }
  const message = err instanceof Error ? err.message.toLowerCase() : String(err).toLowerCase();
  return message.includes('bot was blocked') ? 'unreachable' : 'other';
}

function failure(err: unknown): DeliveryResult {
  return {
    ok: false,
    reason: classifyDeliveryError(err),
    error: err instanceof Error ? err.message : String(err),
  };
}

export class GrammyMessenger implements Messenger {
  constructor(private readonly api: Api) {}

  async send(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<DeliveryResult> {
    try {
      const msg = await this.api.sendMessage(chatId, text, {
        parse_mode: 'HTML',
        reply_markup: keyboard,
      });
      return { ok: true, messageId: msg.message_id };
    } catch (err) {
      return failure(err);
    }
  }

  async publish(channelId: string | number, text: string): Promise<DeliveryResult> {
    try {
      const msg = await this.api.sendMessage(channelId, text, { parse_mode: 'HTML' });
      return { ok: true, messageId: msg.message_id };
    } catch (err) {
      return failure(err);
    }
  }
}

/** Log a failed delivery unless the recipient simply cannot be reached. */
export function logDeliveryFailure(tag: string, target: string | number, result: DeliveryResult): void {
  if (result.ok) return;
  if (result.reason === 'unreachable') {
    console.log(`[${tag}] ${target} unreachable, skipped`);
    return;
  }
  console.error(`[${tag}] Failed to deliver to ${target}:`, result.error);
}
