import type { Bot, Context } from 'grammy';
import type { AppContext } from '../app.js';
import type { EditableField } from '../config/env.js';
import { ValidationError } from '../shared/errors.js';
import { escapeHtml, formatAdForAdmin, formatStatistics, statusEmoji, statusText } from '../shared/format.js';
import type { Ad } from '../shared/types.js';
import {
  adActionKeyboard,
  confirmDeleteKeyboard,
  editFieldKeyboard,
  MENU,
} from './keyboards.js';
import { replyWithFailure, TEXT, validationMessage } from './replies.js';

const LIST_LIMIT = 10;

const EDIT_PROMPTS: Record<EditableField, string> = {
  title: '📝 Yangi sarlavhani kiriting:',
  description: '📄 Yangi tavsifni kiriting:',
  contact: "📞 Yangi aloqa ma'lumotini kiriting:",
};

export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function parseEditableField(raw: string | undefined): EditableField | null {
  return raw === 'title' || raw === 'description' || raw === 'contact' ? raw : null;
}

async function renderAd(app: AppContext, ad: Ad, heading: string): Promise<string> {
  const owner = await app.store.getUser(ad.user_id);
  return formatAdForAdmin(ad, owner, heading);
}

function statusHeading(ad: Ad): string {
  return `${statusEmoji(ad.status)} <b>${statusText(ad.status)}</b>`;
}

export function registerAdminPanelHandlers(bot: Bot, app: AppContext): void {
  const fail = (ctx: Context, err: unknown) => replyWithFailure(ctx, 'admin', err, app.limits);

  bot.hears(MENU.statistics, async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    try {
      const stats = await app.moderation.statistics(from.id);
      await ctx.reply(formatStatistics(stats), { parse_mode: 'HTML' });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.hears(MENU.pendingAds, async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    try {
      const ads = await app.moderation.listByStatus(from.id, 'pending', LIST_LIMIT);
      if (ads.length === 0) {
        await ctx.reply(TEXT.noPendingAds);
        return;
      }
      for (const ad of ads) {
        await ctx.reply(await renderAd(app, ad, statusHeading(ad)), {
          parse_mode: 'HTML',
          reply_markup: adActionKeyboard(ad.id, ad.status),
        });
      }
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.hears(MENU.allAds, async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    try {
      const ads = await app.moderation.listAll(from.id, LIST_LIMIT);
      if (ads.length === 0) {
        await ctx.reply(TEXT.noAdsAtAll);
        return;
      }
      for (const ad of ads) {
        await ctx.reply(await renderAd(app, ad, statusHeading(ad)), {
          parse_mode: 'HTML',
          reply_markup: adActionKeyboard(ad.id, ad.status),
        });
      }
    } catch (err) {
      await fail(ctx, err);
    }
  });

  // ── Moderation buttons ─────────────────────────────────────────────

  bot.on('callback_query:data', async (ctx, next) => {
    const data = ctx.callbackQuery.data;
    if (!data.startsWith('ad_')) {
      await next();
      return;
    }

    const actorId = ctx.from.id;
    const parts = data.split(':');
    const action = parts[0];
    const adId = parseId(parts[parts.length - 1]);
    if (adId === null) {
      await ctx.answerCallbackQuery({ text: "❌ Noto'g'ri e'lon raqami" });
      return;
    }

    try {
      if (action === 'ad_approve') {
        const ad = await app.moderation.approve(actorId, adId);
        await ctx.editMessageText(await renderAd(app, ad, "✅ <b>Tasdiqlandi va kanalga joylandi</b>"), {
          parse_mode: 'HTML',
          reply_markup: adActionKeyboard(ad.id, ad.status),
        });
        await ctx.answerCallbackQuery({ text: '✅ Tasdiqlandi' });
        return;
      }

      if (action === 'ad_reject') {
        const ad = await app.moderation.reject(actorId, adId);
        await ctx.editMessageText(await renderAd(app, ad, '❌ <b>Rad etildi</b>'), {
          parse_mode: 'HTML',
          reply_markup: adActionKeyboard(ad.id, ad.status),
        });
        await ctx.answerCallbackQuery({ text: '❌ Rad etildi' });
        return;
      }

      if (action === 'ad_edit') {
        await app.moderation.getAd(actorId, adId);
        await ctx.editMessageReplyMarkup({ reply_markup: editFieldKeyboard(adId) });
        await ctx.answerCallbackQuery();
        return;
      }

      if (action === 'ad_edit_field') {
        const field = parseEditableField(parts[1]);
        if (!field) {
          await ctx.answerCallbackQuery({ text: "❌ Noma'lum maydon" });
          return;
        }
        await app.moderation.getAd(actorId, adId);
        app.adminPrompts.set(actorId, { kind: 'edit_field', adId, field });
        await ctx.answerCallbackQuery();
        await ctx.reply(`${EDIT_PROMPTS[field]}\n\n<i>Bekor qilish: /cancel</i>`, { parse_mode: 'HTML' });
        return;
      }

      if (action === 'ad_delete') {
        const ad = await app.moderation.prepareDelete(actorId, adId);
        await ctx.editMessageReplyMarkup({ reply_markup: confirmDeleteKeyboard(ad.id) });
        await ctx.answerCallbackQuery({ text: "⚠️ O'chirishni tasdiqlang" });
        return;
      }

      if (action === 'ad_delete_confirm') {
        const ad = await app.moderation.deleteAd(actorId, adId);
        await ctx.editMessageText(`🗑 <b>E'lon #${ad.id} o'chirildi</b>\n\n📝 ${escapeHtml(ad.title)}`, {
          parse_mode: 'HTML',
        });
        await ctx.answerCallbackQuery({ text: "🗑 O'chirildi" });
        return;
      }

      if (action === 'ad_back') {
        const ad = await app.moderation.getAd(actorId, adId);
        await ctx.editMessageReplyMarkup({ reply_markup: adActionKeyboard(ad.id, ad.status) });
        await ctx.answerCallbackQuery();
        return;
      }

      await ctx.answerCallbackQuery({ text: "Noma'lum amal" });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  // ── Field edit prompt ──────────────────────────────────────────────

  bot.on('message:text', async (ctx, next) => {
    const actorId = ctx.from.id;
    const prompt = app.adminPrompts.get(actorId);
    if (!prompt || prompt.kind !== 'edit_field') {
      await next();
      return;
    }

    try {
      const ad = await app.moderation.editField(actorId, prompt.adId, prompt.field, ctx.message.text);
      app.adminPrompts.clear(actorId);
      await ctx.reply(await renderAd(app, ad, "✏️ <b>E'lon yangilandi</b>"), {
        parse_mode: 'HTML',
        reply_markup: adActionKeyboard(ad.id, ad.status),
      });
    } catch (err) {
      if (err instanceof ValidationError) {
        // Prompt stays open for another attempt.
        await ctx.reply(validationMessage(err, app.limits));
        return;
      }
      app.adminPrompts.clear(actorId);
      await fail(ctx, err);
    }
  });
}
