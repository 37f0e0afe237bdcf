import type { InlineKeyboardMarkup, ReplyKeyboardMarkup } from 'grammy/types';
import { JOB_CATEGORIES } from '../shared/categories.js';
import type { EditableField } from '../config/env.js';
import { truncate } from '../shared/format.js';
import type { AdStatus, User, UserRole } from '../shared/types.js';

export const MENU = {
  createAd: "➕ E'lon berish",
  myAds: "📋 Mening e'lonlarim",
  help: 'ℹ️ Yordam',
  statistics: '📊 Statistika',
  pendingAds: "📋 Yangi e'lonlar",
  allAds: "🗂 Barcha e'lonlar",
  adminManagement: '👥 Admin boshqaruv',
  settings: '⚙️ Sozlamalar',
  userMode: '👤 Foydalanuvchi rejimi',
} as const;

export function mainKeyboard(): ReplyKeyboardMarkup {
  return {
    keyboard: [
      [{ text: MENU.createAd }],
      [{ text: MENU.myAds }, { text: MENU.help }],
    ],
    resize_keyboard: true,
  };
}

export function adminKeyboard(role: Exclude<UserRole, 'user'>): ReplyKeyboardMarkup {
  const rows: ReplyKeyboardMarkup['keyboard'] = [[{ text: MENU.statistics }, { text: MENU.pendingAds }]];
  if (role === 'superadmin') {
    rows.push([{ text: MENU.allAds }, { text: MENU.adminManagement }]);
    rows.push([{ text: MENU.settings }, { text: MENU.userMode }]);
  } else {
    rows.push([{ text: MENU.allAds }, { text: MENU.userMode }]);
  }
  return { keyboard: rows, resize_keyboard: true };
}

export function keyboardForRole(role: UserRole | null): ReplyKeyboardMarkup {
  if (role === 'admin' || role === 'superadmin') return adminKeyboard(role);
  return mainKeyboard();
}

export function categoriesKeyboard(): InlineKeyboardMarkup {
  const rows: InlineKeyboardMarkup['inline_keyboard'] = [];
  for (let i = 0; i < JOB_CATEGORIES.length; i += 2) {
    const row = [{ text: JOB_CATEGORIES[i], callback_data: `cat:${i}` }];
    const next = JOB_CATEGORIES[i + 1];
    if (next) {
      row.push({ text: next, callback_data: `cat:${i + 1}` });
    }
    rows.push(row);
  }
  rows.push([{ text: '❌ Bekor qilish', callback_data: 'wiz_cancel' }]);
  return { inline_keyboard: rows };
}

export function cancelWizardKeyboard(): InlineKeyboardMarkup {
  return { inline_keyboard: [[{ text: '❌ Bekor qilish', callback_data: 'wiz_cancel' }]] };
}

/** Moderation actions; approve/reject only while the ad is still pending. */
export function adActionKeyboard(adId: number, status: AdStatus = 'pending'): InlineKeyboardMarkup {
  const manage = [
    { text: '✏️ Tahrirlash', callback_data: `ad_edit:${adId}` },
    { text: "🗑 O'chirish", callback_data: `ad_delete:${adId}` },
  ];
  if (status !== 'pending') {
    return { inline_keyboard: [manage] };
  }
  return {
    inline_keyboard: [
      [
        { text: '✅ Tasdiqlash', callback_data: `ad_approve:${adId}` },
        { text: '❌ Rad etish', callback_data: `ad_reject:${adId}` },
      ],
      manage,
    ],
  };
}

const FIELD_LABELS: Record<EditableField, string> = {
  title: '📝 Sarlavha',
  description: '📄 Tavsif',
  contact: '📞 Aloqa',
};

export function editFieldKeyboard(adId: number): InlineKeyboardMarkup {
  const fields: EditableField[] = ['title', 'description', 'contact'];
  return {
    inline_keyboard: [
      ...fields.map((f) => [{ text: FIELD_LABELS[f], callback_data: `ad_edit_field:${f}:${adId}` }]),
      [{ text: '◀️ Orqaga', callback_data: `ad_back:${adId}` }],
    ],
  };
}

export function confirmDeleteKeyboard(adId: number): InlineKeyboardMarkup {
  return {
    inline_keyboard: [[
      { text: "✅ Ha, o'chirish", callback_data: `ad_delete_confirm:${adId}` },
      { text: '❌ Bekor qilish', callback_data: `ad_back:${adId}` },
    ]],
  };
}

export function adminManagementKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [{ text: "➕ Admin qo'shish", callback_data: 'sa_add_admin' }],
      [{ text: "👥 Adminlar ro'yxati", callback_data: 'sa_list_admins' }],
      [{ text: '📢 Xabar yuborish', callback_data: 'sa_broadcast' }],
    ],
  };
}

/** One removal button per plain admin; superadmins are never listed for removal. */
export function adminListKeyboard(admins: User[]): InlineKeyboardMarkup {
  const rows: InlineKeyboardMarkup['inline_keyboard'] = admins
    .filter((a) => a.role === 'admin')
    .map((a) => [{ text: `❌ ${truncate(a.full_name, 30)}`, callback_data: `sa_remove_admin:${a.telegram_id}` }]);
  rows.push([{ text: '◀️ Orqaga', callback_data: 'sa_menu' }]);
  return { inline_keyboard: rows };
}

export function confirmBroadcastKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [[
      { text: '✅ Ha, yuborish', callback_data: 'sa_broadcast_confirm' },
      { text: '❌ Bekor qilish', callback_data: 'sa_broadcast_cancel' },
    ]],
  };
}
