import type { FieldLimits } from '../config/env.js';
import {
  AuthorizationError,
  InvalidTransitionError,
  NotFoundError,
  StoreError,
  ValidationError,
} from '../shared/errors.js';
import { statusText } from '../shared/format.js';
import type { ActiveStep } from '../wizard/machine.js';

export const TEXT = {
  accessDenied: "❌ Sizda ushbu bo'limga kirish huquqi yo'q.",
  noRights: "❌ Sizda huquq yo'q!",
  genericFailure: "❌ Xatolik yuz berdi! Keyinroq qayta urinib ko'ring.",
  slowDown: "⏳ Juda ko'p so'rov. Biroz kuting va qayta urinib ko'ring.",
  blocked: '🚫 Siz botdan foydalanishdan chetlatilgansiz.',
  noAds: "📭 <b>E'lonlaringiz yo'q</b>\n\n"
    + "Hozircha hech qanday e'lon bermagansiz.\n"
    + "Yangi e'lon berish uchun \"➕ E'lon berish\" tugmasini bosing.",
  noPendingAds: "📭 Yangi e'lonlar yo'q.",
  noAdsAtAll: "📭 E'lonlar yo'q.",
  wizardCancelled: "❌ E'lon yaratish bekor qilindi.",
  nothingToCancel: "Bekor qilinadigan jarayon yo'q.",
} as const;

const FIELD_LABELS: Record<string, string> = {
  title: 'Ish nomi',
  description: 'Tavsif',
  contact: "Aloqa ma'lumoti",
};

export function wizardPrompt(step: ActiveStep): string {
  switch (step) {
    case 'awaiting_title':
      return "📝 <b>Yangi e'lon yaratish</b>\n\n"
        + 'Ish nomini kiriting:\n'
        + '<i>Masalan: Python dasturchi, Kassir, Qurilish ustasi</i>';
    case 'awaiting_description':
      return '📄 <b>Ish tavsifi</b>\n\n'
        + "Ish haqida batafsil ma'lumot bering:\n"
        + "<i>Talablar, ish vaqti, maosh va boshqa ma'lumotlar</i>";
    case 'awaiting_contact':
      return "📞 <b>Aloqa ma'lumoti</b>\n\n"
        + "Bog'lanish uchun telefon raqam yoki username kiriting:\n"
        + '<i>Masalan: +998901234567 yoki @username</i>';
    case 'awaiting_category':
      return '🏷 <b>Kategoriya tanlang:</b>';
  }
}

export function quotaExceeded(count: number): string {
  return '⚠️ <b>Kunlik limit</b>\n\n'
    + `Siz bugun allaqachon ${count} ta e'lon bergansiz.\n`
    + 'Ertaga qaytadan harakat qiling.';
}

export function validationMessage(err: ValidationError, limits: FieldLimits): string {
  if (err.field === 'title' || err.field === 'description' || err.field === 'contact') {
    const { min, max } = limits[err.field];
    if (err.message.includes('length')) {
      return `❌ ${FIELD_LABELS[err.field]} ${min}-${max} belgi orasida bo'lishi kerak.\nQaytadan kiriting:`;
    }
    return "❌ Telefon raqam (+998901234567) yoki @username kiriting.\nQaytadan kiriting:";
  }
  if (err.field === 'category') {
    return "❌ Kategoriya ro'yxatdan tanlanishi kerak.";
  }
  if (err.field === 'role') {
    return `❌ Bu amalni bajarib bo'lmaydi: ${err.message.replace(/^Validation failed for role: /, '')}`;
  }
  if (err.field === 'text') {
    return "❌ Xabar bo'sh bo'lmasligi kerak.";
  }
  return "❌ Noto'g'ri kiritildi. Qaytadan urinib ko'ring.";
}

/**
 * Short human-readable reply for any failure. Only store and unexpected errors
 * are worth an operator's attention; the caller logs those.
 */
export function userMessageFor(err: unknown, limits: FieldLimits): string {
  if (err instanceof AuthorizationError) return TEXT.noRights;
  if (err instanceof NotFoundError) {
    return err.resource === 'ad' ? "❌ E'lon topilmadi!" : '❌ Foydalanuvchi topilmadi!';
  }
  if (err instanceof InvalidTransitionError) {
    return `⚠️ E'lon allaqachon ko'rib chiqilgan: ${statusText(err.from)}.`;
  }
  if (err instanceof ValidationError) return validationMessage(err, limits);
  return TEXT.genericFailure;
}

export function shouldLog(err: unknown): boolean {
  return err instanceof StoreError
    || !(err instanceof AuthorizationError
      || err instanceof NotFoundError
      || err instanceof InvalidTransitionError
      || err instanceof ValidationError);
}

/** The part of a grammy context that failure replies need. */
export interface ReplyTarget {
  readonly callbackQuery?: unknown;
  answerCallbackQuery(other: { text: string; show_alert?: boolean }): Promise<unknown>;
  reply(text: string, other?: { parse_mode?: 'HTML' }): Promise<unknown>;
}

export interface FailureOptions {
  /** The callback was already answered; Telegram refuses a second answer. */
  callbackAnswered?: boolean;
}

/**
 * Report a failed interaction back to the actor: an alert for button presses,
 * a reply for messages.
 */
export async function replyWithFailure(
  ctx: ReplyTarget,
  tag: string,
  err: unknown,
  limits: FieldLimits,
  options: FailureOptions = {},
): Promise<void> {
  if (shouldLog(err)) {
    console.error(`[${tag}] Interaction failed:`, err);
  }
  const text = userMessageFor(err, limits);
  if (ctx.callbackQuery && !options.callbackAnswered) {
    await ctx.answerCallbackQuery({ text, show_alert: true });
    return;
  }
  await ctx.reply(text, { parse_mode: 'HTML' });
}
