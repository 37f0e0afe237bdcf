import type { Store } from '../db/store.js';
import type { EditableField } from '../config/env.js';
import { escapeHtml, formatAdForAdmin, formatChannelPost } from '../shared/format.js';
import type { Ad, User } from '../shared/types.js';
import { adActionKeyboard } from './keyboards.js';
import { logDeliveryFailure, type DeliveryResult, type Messenger } from './messenger.js';

export interface AdminFanoutResult {
  delivered: number;
  failed: number;
}

const FIELD_NAMES: Record<EditableField, string> = {
  title: 'sarlavha',
  description: 'tavsif',
  contact: 'aloqa',
};

/**
 * All outbound notices. Every method is best-effort: failures are logged and
 * reported in the return value, never thrown.
 */
export class Notifier {
  constructor(
    private readonly messenger: Messenger,
    private readonly store: Store,
    private readonly channelId: string,
  ) {}

  /**
   * Send a new listing with its moderation buttons to every admin and superadmin.
   * Each admin is attempted independently.
   */
  async notifyAdminsNewAd(ad: Ad): Promise<AdminFanoutResult> {
    let admins: User[];
    let owner: User | null;
    try {
      admins = await this.store.getAdmins();
      owner = await this.store.getUser(ad.user_id);
    } catch (err) {
      console.error(`[notify] Could not load admins for ad ${ad.id}:`, err);
      return { delivered: 0, failed: 0 };
    }

    const text = formatAdForAdmin(ad, owner);
    let delivered = 0;
    let failed = 0;
    for (const admin of admins) {
      const result = await this.messenger.send(admin.telegram_id, text, adActionKeyboard(ad.id));
      if (result.ok) {
        delivered++;
      } else {
        failed++;
        logDeliveryFailure('notify', `admin ${admin.telegram_id}`, result);
      }
    }
    return { delivered, failed };
  }

  async publishToChannel(ad: Ad): Promise<DeliveryResult> {
    const result = await this.messenger.publish(this.channelId, formatChannelPost(ad));
    if (result.ok) {
      console.log(`[notify] Ad ${ad.id} published to ${this.channelId} (msg ${result.messageId})`);
    } else {
      // A channel is never "unreachable" in the expected sense; always surface it.
      console.error(`[notify] Failed to publish ad ${ad.id} to ${this.channelId}:`, result.error);
    }
    return result;
  }

  notifyOwnerApproved(ad: Ad): Promise<DeliveryResult> {
    return this.sendDM(
      ad.user_id,
      "🎉 <b>E'loningiz tasdiqlandi!</b>\n\n"
      + `📝 E'lon: ${escapeHtml(ad.title)}\n`
      + "📢 E'loningiz kanalda e'lon qilindi.",
    );
  }

  notifyOwnerRejected(ad: Ad): Promise<DeliveryResult> {
    return this.sendDM(
      ad.user_id,
      "😔 <b>E'loningiz rad etildi</b>\n\n"
      + `📝 E'lon: ${escapeHtml(ad.title)}\n`
      + "💡 E'loningizni qaytadan ko'rib chiqib, yangi e'lon bering.",
    );
  }

  notifyOwnerEdited(ad: Ad, field: EditableField): Promise<DeliveryResult> {
    return this.sendDM(
      ad.user_id,
      "✏️ <b>E'loningiz tahrirlandi</b>\n\n"
      + `📝 E'lon: ${escapeHtml(ad.title)}\n`
      + `🔄 O'zgartirilgan: ${FIELD_NAMES[field]}`,
    );
  }

  notifyOwnerDeleted(ad: Ad): Promise<DeliveryResult> {
    return this.sendDM(
      ad.user_id,
      "🗑 <b>E'loningiz o'chirildi</b>\n\n"
      + `📝 E'lon: ${escapeHtml(ad.title)}\n`
      + "💡 Agar bu xato bo'lsa, adminlar bilan bog'laning.",
    );
  }

  notifyPromoted(telegramId: number): Promise<DeliveryResult> {
    return this.sendDM(
      telegramId,
      '🎉 <b>Tabriklaymiz!</b>\n\n'
      + "Siz endi botning admini bo'ldingiz.\n"
      + 'Admin panelga kirish uchun /start buyrug\'ini yuboring.',
    );
  }

  notifyDemoted(telegramId: number): Promise<DeliveryResult> {
    return this.sendDM(
      telegramId,
      '📢 <b>Xabar</b>\n\nSizning admin huquqlaringiz olib tashlandi.',
    );
  }

  private async sendDM(telegramId: number, text: string): Promise<DeliveryResult> {
    const result = await this.messenger.send(telegramId, text);
    logDeliveryFailure('notify', `user ${telegramId}`, result);
    return result;
  }
}
