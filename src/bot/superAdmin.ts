import type { Bot, Context } from 'grammy';
import type { AppContext } from '../app.js';
import { escapeHtml, formatAdminList } from '../shared/format.js';
import { parseTelegramId } from '../shared/validation.js';
import { formatBroadcast, type BroadcastResult } from './broadcast.js';
import {
  adminListKeyboard,
  adminManagementKeyboard,
  confirmBroadcastKeyboard,
  MENU,
} from './keyboards.js';
import { replyWithFailure } from './replies.js';

const MANAGEMENT_TEXT = '👥 <b>Admin boshqaruv</b>\n\nAmalni tanlang:';

const NEW_ADMIN_PROMPT = "➕ <b>Admin qo'shish</b>\n\n"
  + "Yangi adminning Telegram ID raqamini yuboring.\n"
  + "<i>Foydalanuvchi avval botga /start yuborgan bo'lishi kerak.</i>\n\n"
  + '<i>Bekor qilish: /cancel</i>';

const BROADCAST_PROMPT = '📢 <b>Xabar yuborish</b>\n\n'
  + "Barcha foydalanuvchilarga yuboriladigan xabarni kiriting:\n\n"
  + '<i>Bekor qilish: /cancel</i>';

export function formatBroadcastSummary(result: BroadcastResult): string {
  return '📢 <b>Xabar yuborildi</b>\n\n'
    + `👥 Jami: ${result.total}\n`
    + `✅ Yuborildi: ${result.sent}\n`
    + `❌ Xatolik: ${result.failed}\n`
    + `🚫 Botni bloklagan: ${result.unreachable}`;
}

function formatSettings(settings: Record<string, string | null>, defaultDailyAds: number): string {
  let text = '⚙️ <b>Sozlamalar</b>\n';
  for (const [key, value] of Object.entries(settings)) {
    const shown = value ?? `${defaultDailyAds} (standart)`;
    text += `\n• <code>${escapeHtml(key)}</code>: ${escapeHtml(shown)}`;
  }
  text += "\n\nO'zgartirish: <code>/set max_daily_ads 5</code>";
  return text;
}

export function registerSuperAdminHandlers(bot: Bot, app: AppContext): void {
  const fail = (ctx: Context, err: unknown) => replyWithFailure(ctx, 'superadmin', err, app.limits);

  bot.hears(MENU.adminManagement, async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    try {
      await app.roles.requireSuperadmin(from.id);
      await ctx.reply(MANAGEMENT_TEXT, { parse_mode: 'HTML', reply_markup: adminManagementKeyboard() });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  // ── Settings ───────────────────────────────────────────────────────

  const showSettings = async (ctx: Context): Promise<void> => {
    const from = ctx.from;
    if (!from) return;
    try {
      const settings = await app.moderation.getSettings(from.id);
      await ctx.reply(formatSettings(settings, app.env.MAX_DAILY_ADS), { parse_mode: 'HTML' });
    } catch (err) {
      await fail(ctx, err);
    }
  };

  bot.hears(MENU.settings, showSettings);
  bot.command('settings', showSettings);

  bot.command('set', async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    const [key, value] = ctx.match.trim().split(/\s+/);
    if (!key || !value) {
      await ctx.reply('Foydalanish: <code>/set kalit qiymat</code>', { parse_mode: 'HTML' });
      return;
    }
    try {
      await app.moderation.setSetting(from.id, key, value);
      await ctx.reply(`✅ <code>${escapeHtml(key)}</code> = ${escapeHtml(value)}`, { parse_mode: 'HTML' });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  // ── Blocking ───────────────────────────────────────────────────────

  const setBlocked = (blocked: boolean) => async (ctx: Context & { match: string }): Promise<void> => {
    const from = ctx.from;
    if (!from) return;
    const targetId = parseTelegramId(ctx.match.trim());
    if (targetId === null) {
      await ctx.reply(`Foydalanish: <code>/${blocked ? 'block' : 'unblock'} TELEGRAM_ID</code>`, { parse_mode: 'HTML' });
      return;
    }
    try {
      const user = await app.moderation.setBlocked(from.id, targetId, blocked);
      await ctx.reply(
        blocked
          ? `🚫 ${escapeHtml(user.full_name)} bloklandi.`
          : `✅ ${escapeHtml(user.full_name)} blokdan chiqarildi.`,
      );
    } catch (err) {
      await fail(ctx, err);
    }
  };

  bot.command('block', setBlocked(true));
  bot.command('unblock', setBlocked(false));

  // ── Management buttons ─────────────────────────────────────────────

  bot.on('callback_query:data', async (ctx, next) => {
    const data = ctx.callbackQuery.data;
    if (!data.startsWith('sa_')) {
      await next();
      return;
    }

    const actorId = ctx.from.id;
    const [action, arg] = data.split(':');

    try {
      if (action === 'sa_menu') {
        await app.roles.requireSuperadmin(actorId);
        await ctx.editMessageText(MANAGEMENT_TEXT, { parse_mode: 'HTML', reply_markup: adminManagementKeyboard() });
        await ctx.answerCallbackQuery();
        return;
      }

      if (action === 'sa_add_admin') {
        await app.roles.requireSuperadmin(actorId);
        app.adminPrompts.set(actorId, { kind: 'new_admin_id' });
        await ctx.answerCallbackQuery();
        await ctx.reply(NEW_ADMIN_PROMPT, { parse_mode: 'HTML' });
        return;
      }

      if (action === 'sa_list_admins') {
        const admins = await app.moderation.listAdmins(actorId);
        await ctx.editMessageText(formatAdminList(admins), {
          parse_mode: 'HTML',
          reply_markup: adminListKeyboard(admins),
        });
        await ctx.answerCallbackQuery();
        return;
      }

      if (action === 'sa_remove_admin') {
        const targetId = parseTelegramId(arg ?? '');
        if (targetId === null) {
          await ctx.answerCallbackQuery({ text: "❌ Noto'g'ri ID" });
          return;
        }
        const demoted = await app.moderation.demoteAdmin(actorId, targetId);
        const admins = await app.moderation.listAdmins(actorId);
        await ctx.editMessageText(formatAdminList(admins), {
          parse_mode: 'HTML',
          reply_markup: adminListKeyboard(admins),
        });
        await ctx.answerCallbackQuery({ text: `✅ ${demoted.full_name} adminlikdan olindi` });
        return;
      }

      if (action === 'sa_broadcast') {
        await app.roles.requireSuperadmin(actorId);
        app.adminPrompts.set(actorId, { kind: 'broadcast_text' });
        await ctx.answerCallbackQuery();
        await ctx.reply(BROADCAST_PROMPT, { parse_mode: 'HTML' });
        return;
      }

      if (action === 'sa_broadcast_confirm') {
        const prompt = app.adminPrompts.get(actorId);
        if (!prompt || prompt.kind !== 'broadcast_confirm') {
          await ctx.answerCallbackQuery({ text: '⌛ Xabar topilmadi. Qaytadan boshlang.', show_alert: true });
          return;
        }
        app.adminPrompts.clear(actorId);
        await ctx.editMessageReplyMarkup({ reply_markup: undefined });
        await ctx.answerCallbackQuery({ text: '📤 Yuborilmoqda...' });
        try {
          const result = await app.moderation.broadcast(actorId, prompt.text);
          await ctx.reply(formatBroadcastSummary(result), { parse_mode: 'HTML' });
        } catch (err) {
          await replyWithFailure(ctx, 'superadmin', err, app.limits, { callbackAnswered: true });
        }
        return;
      }

      if (action === 'sa_broadcast_cancel') {
        app.adminPrompts.clear(actorId);
        await ctx.editMessageText('❌ Xabar yuborish bekor qilindi.');
        await ctx.answerCallbackQuery();
        return;
      }

      await ctx.answerCallbackQuery({ text: "Noma'lum amal" });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  // ── Text prompts ───────────────────────────────────────────────────

  bot.on('message:text', async (ctx, next) => {
    const actorId = ctx.from.id;
    const prompt = app.adminPrompts.get(actorId);
    if (!prompt || prompt.kind === 'edit_field') {
      await next();
      return;
    }

    const text = ctx.message.text;
    try {
      if (prompt.kind === 'new_admin_id') {
        const targetId = parseTelegramId(text.trim());
        if (targetId === null) {
          await ctx.reply("❌ Noto'g'ri ID. Faqat raqam kiriting (masalan: 123456789).");
          return;
        }
        app.adminPrompts.clear(actorId);
        const promoted = await app.moderation.promoteAdmin(actorId, targetId);
        await ctx.reply(`✅ ${escapeHtml(promoted.full_name)} admin qilib tayinlandi.`, { parse_mode: 'HTML' });
        return;
      }

      if (prompt.kind === 'broadcast_text') {
        const preview = await app.moderation.prepareBroadcast(actorId, text);
        app.adminPrompts.set(actorId, { kind: 'broadcast_confirm', text: preview.text });
        await ctx.reply(
          `${formatBroadcast(preview.text)}\n\n`
          + `👥 Qabul qiluvchilar: ${preview.recipients}\n`
          + 'Yuborishni tasdiqlaysizmi?',
          { parse_mode: 'HTML', reply_markup: confirmBroadcastKeyboard() },
        );
        return;
      }

      await ctx.reply('☝️ Yuqoridagi tugmalardan birini tanlang yoki /cancel.');
    } catch (err) {
      await fail(ctx, err);
    }
  });
}
