import type { Bot, Context } from 'grammy';
import type { AppContext } from '../app.js';
import { hasAdminRights } from '../moderation/roles.js';
import { escapeHtml, formatSearchResults, formatUserAdList, formatUserProfile } from '../shared/format.js';
import { sanitizeInput } from '../shared/validation.js';
import { keyboardForRole, mainKeyboard, MENU } from './keyboards.js';
import { replyWithFailure, TEXT } from './replies.js';

const MY_ADS_LIMIT = 10;
const SEARCH_LIMIT = 10;

export function helpText(dailyLimit: number, expiryDays: number): string {
  return 'ℹ️ <b>Yordam</b>\n\n'
    + "<b>E'lon berish:</b>\n"
    + "1. \"➕ E'lon berish\" tugmasini bosing\n"
    + '2. Ish nomini kiriting\n'
    + '3. Ish tavsifini yozing\n'
    + "4. Aloqa ma'lumotini kiriting\n"
    + '5. Kategoriyani tanlang\n\n'
    + '<b>Qoidalar:</b>\n'
    + `• Kuniga ${dailyLimit} tagacha e'lon berish mumkin\n`
    + `• E'lonlar ${expiryDays} kundan so'ng o'chiriladi\n`
    + "• E'lonlar admin tomonidan tekshirilgandan so'ng kanalda e'lon qilinadi\n\n"
    + '<b>Buyruqlar:</b>\n'
    + '/profile - mening profilim\n'
    + "/search so'z - e'lonlarni qidirish\n"
    + '/cancel - jarayonni bekor qilish';
}

function welcomeText(name: string, admin: boolean): string {
  if (admin) {
    return `👋 Salom, ${name}!\n\n🛠 <b>Admin panelga xush kelibsiz.</b>\nQuyidagi tugmalardan foydalaning.`;
  }
  return `👋 Salom, ${name}!\n\n`
    + "💼 Bu bot orqali ish e'lonlarini joylashtirishingiz mumkin.\n"
    + "E'lonlar moderatsiyadan so'ng kanalda chiqadi.";
}

export function registerUserMenuHandlers(bot: Bot, app: AppContext): void {
  const fail = (ctx: Context, err: unknown) => replyWithFailure(ctx, 'menu', err, app.limits);

  bot.command('start', async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    app.wizard.cancel(from.id);
    app.adminPrompts.clear(from.id);
    try {
      const role = await app.roles.resolveRole(from.id);
      await ctx.reply(welcomeText(escapeHtml(from.first_name), hasAdminRights(role)), {
        parse_mode: 'HTML',
        reply_markup: keyboardForRole(role),
      });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.command('cancel', async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    const hadPrompt = app.adminPrompts.get(from.id) !== undefined;
    app.adminPrompts.clear(from.id);
    const reply = app.wizard.cancel(from.id);
    if (reply.kind === 'cancelled') {
      await ctx.reply(TEXT.wizardCancelled);
    } else {
      await ctx.reply(hadPrompt ? '❌ Bekor qilindi.' : TEXT.nothingToCancel);
    }
  });

  bot.hears(MENU.help, async (ctx) => {
    try {
      const limit = await app.wizard.dailyLimit();
      await ctx.reply(helpText(limit, app.env.AD_EXPIRY_DAYS), { parse_mode: 'HTML' });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.hears(MENU.userMode, async (ctx) => {
    await ctx.reply('👤 Foydalanuvchi rejimi. Admin panelga qaytish uchun /start.', {
      reply_markup: mainKeyboard(),
    });
  });

  bot.hears(MENU.myAds, async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    try {
      const ads = await app.store.getUserAds(from.id);
      if (ads.length === 0) {
        await ctx.reply(TEXT.noAds, { parse_mode: 'HTML' });
        return;
      }
      await ctx.reply(formatUserAdList(ads.slice(0, MY_ADS_LIMIT)), { parse_mode: 'HTML' });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.command('profile', async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    try {
      const user = await app.store.getUser(from.id);
      if (!user) {
        await ctx.reply('❌ Profil topilmadi. /start buyrug\'ini yuboring.');
        return;
      }
      const stats = await app.store.getUserStats(from.id);
      await ctx.reply(formatUserProfile(user, stats), { parse_mode: 'HTML' });
    } catch (err) {
      await fail(ctx, err);
    }
  });

  bot.command('search', async (ctx) => {
    const query = sanitizeInput(ctx.match);
    if (query.length < 2) {
      await ctx.reply("🔍 Qidirish uchun kamida 2 belgi kiriting.\nMasalan: <code>/search dasturchi</code>", {
        parse_mode: 'HTML',
      });
      return;
    }
    try {
      const ads = await app.store.searchAds(query, 'approved', SEARCH_LIMIT);
      await ctx.reply(formatSearchResults(query, ads), { parse_mode: 'HTML' });
    } catch (err) {
      await fail(ctx, err);
    }
  });
}
