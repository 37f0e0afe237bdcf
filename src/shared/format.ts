import { categoryHashtag } from './categories.js';
import type { Ad, AdStatus, Statistics, User, UserStats } from './types.js';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function truncate(text: string, maxLength: number = 50): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** dd.mm.yyyy in UTC. */
export function formatDate(date: Date): string {
  return `${pad(date.getUTCDate())}.${pad(date.getUTCMonth() + 1)}.${date.getUTCFullYear()}`;
}

/** dd.mm.yyyy HH:MM in UTC. */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

const STATUS_EMOJI: Record<AdStatus, string> = {
  pending: '⏳',
  approved: '✅',
  rejected: '❌',
};

const STATUS_TEXT: Record<AdStatus, string> = {
  pending: "Ko'rib chiqilmoqda",
  approved: 'Tasdiqlangan',
  rejected: 'Rad etilgan',
};

export function statusEmoji(status: AdStatus): string {
  return STATUS_EMOJI[status];
}

export function statusText(status: AdStatus): string {
  return STATUS_TEXT[status];
}

/** Public channel post for an approved ad. */
export function formatChannelPost(ad: Ad): string {
  return (
    `💼 <b>${escapeHtml(ad.title)}</b>\n\n`
    + `🏷 <b>Kategoriya:</b> ${escapeHtml(ad.category)}\n\n`
    + `📄 <b>Tavsif:</b>\n${escapeHtml(ad.description)}\n\n`
    + `📞 <b>Aloqa:</b> ${escapeHtml(ad.contact)}\n\n`
    + `📅 <b>E'lon sanasi:</b> ${formatDate(ad.created_at)}\n\n`
    + `#ish #vacancy ${categoryHashtag(ad.category)}`
  );
}

/** Full listing card shown to admins, with the owner's name when known. */
export function formatAdForAdmin(ad: Ad, owner: User | null, heading: string = "🆕 <b>Yangi e'lon</b>"): string {
  return (
    `${heading}\n\n`
    + `🆔 <b>ID:</b> #${ad.id}\n`
    + `👤 <b>Foydalanuvchi:</b> ${owner ? escapeHtml(owner.full_name) : "Noma'lum"} (<code>${ad.user_id}</code>)\n`
    + `📝 <b>Sarlavha:</b> ${escapeHtml(ad.title)}\n`
    + `🏷 <b>Kategoriya:</b> ${escapeHtml(ad.category)}\n`
    + `📄 <b>Tavsif:</b> ${escapeHtml(ad.description)}\n`
    + `📞 <b>Aloqa:</b> ${escapeHtml(ad.contact)}\n`
    + `📊 <b>Holat:</b> ${statusEmoji(ad.status)} ${statusText(ad.status)}\n\n`
    + `🕐 <b>Sana:</b> ${formatDateTime(ad.created_at)}`
  );
}

export function formatUserAdList(ads: Ad[]): string {
  let text = "📋 <b>Sizning e'lonlaringiz:</b>\n\n";
  ads.forEach((ad, i) => {
    text += `${i + 1}. ${statusEmoji(ad.status)} <b>${escapeHtml(ad.title)}</b>\n`;
    text += `   🏷 ${escapeHtml(ad.category)}\n`;
    text += `   📅 ${formatDate(ad.created_at)}\n`;
    text += `   📊 ${statusText(ad.status)}\n\n`;
  });
  return text.trimEnd();
}

export function formatStatistics(stats: Statistics): string {
  let text = '📊 <b>Bot statistikasi</b>\n\n'
    + `👥 <b>Foydalanuvchilar:</b> ${stats.total_users}\n`
    + `📋 <b>Jami e'lonlar:</b> ${stats.total_ads}\n\n`
    + "📈 <b>E'lonlar holati bo'yicha:</b>\n"
    + `⏳ Ko'rib chiqilmoqda: ${stats.pending_ads}\n`
    + `✅ Tasdiqlangan: ${stats.approved_ads}\n`
    + `❌ Rad etilgan: ${stats.rejected_ads}\n\n`
    + `📅 <b>Bugungi e'lonlar:</b> ${stats.today_ads}\n`
    + `👤 <b>Bugungi yangi foydalanuvchilar:</b> ${stats.today_users}\n\n`
    + '🏷 <b>Eng mashhur kategoriyalar:</b>';

  if (stats.popular_categories.length === 0) {
    text += "\n• Hali yo'q";
  }
  for (const { category, count } of stats.popular_categories) {
    text += `\n• ${escapeHtml(category)}: ${count} ta`;
  }
  return text;
}

export function formatUserProfile(user: User, stats: UserStats): string {
  const categories = stats.categories_used.length > 0
    ? stats.categories_used.map(escapeHtml).join(', ')
    : "Hali yo'q";
  return (
    '👤 <b>Foydalanuvchi profili</b>\n\n'
    + `📛 <b>Ism:</b> ${escapeHtml(user.full_name)}\n`
    + `🆔 <b>ID:</b> <code>${user.telegram_id}</code>\n`
    + `👑 <b>Rol:</b> ${user.role}\n`
    + `📅 <b>Ro'yxatdan o'tgan:</b> ${formatDate(user.created_at)}\n\n`
    + '📊 <b>Statistika:</b>\n'
    + `📋 Jami e'lonlar: ${stats.total_ads}\n`
    + `✅ Tasdiqlangan: ${stats.approved_ads}\n`
    + `⏳ Ko'rib chiqilmoqda: ${stats.pending_ads}\n`
    + `❌ Rad etilgan: ${stats.rejected_ads}\n\n`
    + `🏷 <b>Ishlatgan kategoriyalar:</b>\n${categories}`
  );
}

export function formatAdminList(admins: User[]): string {
  if (admins.length === 0) return "📭 Adminlar yo'q";
  let text = "👥 <b>Adminlar ro'yxati:</b>\n";
  for (const admin of admins) {
    const emoji = admin.role === 'superadmin' ? '👑' : '👤';
    text += `\n${emoji} ${escapeHtml(admin.full_name)}\n`;
    text += `   ID: <code>${admin.telegram_id}</code>\n`;
    text += `   Role: ${admin.role}\n`;
  }
  return text;
}

export function formatSearchResults(query: string, ads: Ad[]): string {
  if (ads.length === 0) {
    return `🔍 "${escapeHtml(query)}" bo'yicha hech narsa topilmadi.`;
  }
  let text = `🔍 <b>"${escapeHtml(query)}" bo'yicha natijalar:</b>\n`;
  for (const ad of ads) {
    text += `\n💼 <b>${escapeHtml(ad.title)}</b>\n`;
    text += `   🏷 ${escapeHtml(ad.category)}\n`;
    text += `   📞 ${escapeHtml(ad.contact)}\n`;
  }
  return text;
}
