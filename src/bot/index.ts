import type { Bot } from 'grammy';
import type { User as TelegramUser } from 'grammy/types';
import type { AppContext } from '../app.js';
import { hasAdminRights } from '../moderation/roles.js';
import { registerAdminPanelHandlers } from './adminPanel.js';
import { TEXT, replyWithFailure, type ReplyTarget } from './replies.js';
import { registerSubmissionHandlers } from './submission.js';
import { registerSuperAdminHandlers } from './superAdmin.js';
import { registerUserMenuHandlers } from './userMenu.js';

export function displayName(from: TelegramUser): string {
  const name = [from.first_name, from.last_name].filter(Boolean).join(' ').trim();
  return name || from.username || String(from.id);
}

async function refuse(ctx: ReplyTarget, text: string): Promise<void> {
  if (ctx.callbackQuery) {
    await ctx.answerCallbackQuery({ text, show_alert: true });
  } else {
    await ctx.reply(text);
  }
}

export type Admission = 'admitted' | 'blocked' | 'throttled';

/**
 * Register the user record, then decide whether the update may reach a handler.
 * Admins are never throttled.
 */
export async function admit(app: AppContext, from: TelegramUser): Promise<Admission> {
  const user = await app.store.ensureUser(from.id, displayName(from));
  if (user.is_blocked) return 'blocked';
  if (!hasAdminRights(user.role) && app.rateLimiter.isRateLimited(from.id)) {
    return 'throttled';
  }
  return 'admitted';
}

export interface GateContext extends ReplyTarget {
  readonly from?: TelegramUser;
}

export function gatekeeper(app: AppContext) {
  return async (ctx: GateContext, next: () => Promise<void>): Promise<void> => {
    const from = ctx.from;
    if (!from || from.is_bot) return;

    let admission: Admission;
    try {
      admission = await admit(app, from);
    } catch (err) {
      await replyWithFailure(ctx, 'bot', err, app.limits);
      return;
    }
    if (admission === 'blocked') {
      await refuse(ctx, TEXT.blocked);
      return;
    }
    if (admission === 'throttled') {
      console.log(`[bot] Rate limited ${from.id}`);
      await refuse(ctx, TEXT.slowDown);
      return;
    }
    await next();
  };
}

/**
 * Wire every handler onto the bot. Order matters: commands and menu buttons
 * first, then pending admin prompts, then the submission wizard.
 */
export function registerHandlers(bot: Bot, app: AppContext): void {
  bot.use(gatekeeper(app));

  registerUserMenuHandlers(bot, app);
  registerAdminPanelHandlers(bot, app);
  registerSuperAdminHandlers(bot, app);
  registerSubmissionHandlers(bot, app);

  bot.catch((err) => {
    console.error(`[bot] Error while handling update ${err.ctx.update.update_id}:`, err.error);
  });
}

export async function startBot(bot: Bot): Promise<void> {
  const me = await bot.api.getMe();
  console.log(`[bot] Bot username: @${me.username}`);

  await bot.api.setMyCommands([
    { command: 'start', description: 'Botni ishga tushirish' },
    { command: 'profile', description: 'Mening profilim' },
    { command: 'search', description: "E'lonlarni qidirish" },
    { command: 'cancel', description: 'Jarayonni bekor qilish' },
  ]);

  console.log('[bot] Starting Telegram bot...');
  // Not awaited: polling runs until bot.stop().
  void bot.start({ drop_pending_updates: true }).catch((err) => {
    console.error('[bot] Polling failed:', err);
  });
}
