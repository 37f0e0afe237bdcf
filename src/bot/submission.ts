import type { Bot, Context } from 'grammy';
import type { InlineKeyboardMarkup } from 'grammy/types';
import type { AppContext } from '../app.js';
import { escapeHtml } from '../shared/format.js';
import type { WizardReply } from '../wizard/index.js';
import { cancelWizardKeyboard, categoriesKeyboard, MENU } from './keyboards.js';
import { quotaExceeded, replyWithFailure, TEXT, validationMessage, wizardPrompt } from './replies.js';

const CREATED_TEXT = "✅ <b>E'loningiz qabul qilindi!</b>\n\n"
  + "⏳ Admin tekshiruvidan so'ng kanalda e'lon qilinadi.\n"
  + '📬 Natija haqida sizga xabar beramiz.';

/** Render a wizard outcome as a chat reply. */
export function renderWizardReply(reply: WizardReply, app: AppContext): {
  text: string;
  keyboard?: InlineKeyboardMarkup;
} {
  switch (reply.kind) {
    case 'prompt':
      return {
        text: wizardPrompt(reply.step),
        keyboard: reply.step === 'awaiting_category' ? categoriesKeyboard() : cancelWizardKeyboard(),
      };
    case 'invalid':
      return {
        text: validationMessage(reply.error, app.limits),
        keyboard: reply.step === 'awaiting_category' ? categoriesKeyboard() : cancelWizardKeyboard(),
      };
    case 'quota_exceeded':
      return { text: quotaExceeded(reply.count) };
    case 'created':
      return { text: `${CREATED_TEXT}\n\n🆔 E'lon raqami: #${reply.ad.id}\n📝 ${escapeHtml(reply.ad.title)}` };
    case 'cancelled':
      return { text: TEXT.wizardCancelled };
    case 'not_active':
      return { text: "⌛ Bu jarayon tugagan. Yangi e'lon uchun \"➕ E'lon berish\" tugmasini bosing." };
  }
}

async function send(ctx: Context, reply: WizardReply, app: AppContext): Promise<void> {
  const { text, keyboard } = renderWizardReply(reply, app);
  await ctx.reply(text, { parse_mode: 'HTML', reply_markup: keyboard });
}

export function registerSubmissionHandlers(bot: Bot, app: AppContext): void {
  const fail = (ctx: Context, err: unknown) => replyWithFailure(ctx, 'wizard', err, app.limits);

  bot.hears(MENU.createAd, async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    app.adminPrompts.clear(from.id);
    try {
      await send(ctx, await app.wizard.start(from.id), app);
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.on('callback_query:data', async (ctx, next) => {
    const data = ctx.callbackQuery.data;
    const userId = ctx.from.id;

    if (data !== 'wiz_cancel' && !data.startsWith('cat:')) {
      await next();
      return;
    }

    try {
      if (data === 'wiz_cancel') {
        const reply = app.wizard.cancel(userId);
        await ctx.answerCallbackQuery();
        await ctx.editMessageReplyMarkup({ reply_markup: undefined });
        await send(ctx, reply, app);
        return;
      }

      const index = Number(data.slice('cat:'.length));
      const reply = await app.wizard.selectCategory(userId, Number.isInteger(index) ? index : -1);
      if (reply.kind === 'invalid') {
        await ctx.answerCallbackQuery({ text: validationMessage(reply.error, app.limits), show_alert: true });
        return;
      }
      await ctx.answerCallbackQuery();
      if (reply.kind === 'created' || reply.kind === 'quota_exceeded') {
        await ctx.editMessageReplyMarkup({ reply_markup: undefined });
      }
      await send(ctx, reply, app);
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.on('message:text', async (ctx, next) => {
    const userId = ctx.from.id;
    if (!app.wizard.isActive(userId)) {
      await next();
      return;
    }
    try {
      await send(ctx, await app.wizard.handleText(userId, ctx.message.text), app);
    } catch (err) {
      await fail(ctx, err);
    }
  });
}
