import { describe, it, expect } from 'vitest';
import type { InlineKeyboardMarkup } from 'grammy/types';
import {
  adActionKeyboard,
  adminKeyboard,
  adminListKeyboard,
  categoriesKeyboard,
  keyboardForRole,
  MENU,
} from './keyboards.js';
import { parseEditableField, parseId } from './adminPanel.js';
import type { User } from '../shared/types.js';

function callbacks(markup: InlineKeyboardMarkup): string[] {
  return markup.inline_keyboard.flat().map((b) => ('callback_data' in b ? b.callback_data : ''));
}

describe('keyboards', () => {
  it('lays out twelve categories two per row plus cancel', () => {
    const markup = categoriesKeyboard();

    expect(markup.inline_keyboard).toHaveLength(7);
    expect(callbacks(markup)[5]).toBe('cat:5');
    expect(callbacks(markup).at(-1)).toBe('wiz_cancel');
  });

  it('offers approve and reject only for pending ads', () => {
    expect(callbacks(adActionKeyboard(3))).toEqual(['ad_approve:3', 'ad_reject:3', 'ad_edit:3', 'ad_delete:3']);
    expect(callbacks(adActionKeyboard(3, 'approved'))).toEqual(['ad_edit:3', 'ad_delete:3']);
  });

  it('shows admin management only to the superadmin', () => {
    const labels = (role: 'admin' | 'superadmin') => adminKeyboard(role).keyboard.flat().map((b) => (typeof b === 'string' ? b : b.text));

    expect(labels('superadmin')).toContain(MENU.adminManagement);
    expect(labels('admin')).not.toContain(MENU.adminManagement);
    expect(labels('admin')).not.toContain(MENU.settings);
  });

  it('gives plain users the main menu', () => {
    expect(keyboardForRole('user').keyboard[0][0]).toEqual({ text: MENU.createAd });
    expect(keyboardForRole(null).keyboard[0][0]).toEqual({ text: MENU.createAd });
  });

  it('never offers removal of a superadmin', () => {
    const admins: User[] = [
      { id: 1, telegram_id: 100001, full_name: 'Boss', role: 'superadmin', is_blocked: false, created_at: new Date() },
      { id: 2, telegram_id: 100002, full_name: 'Moderator', role: 'admin', is_blocked: false, created_at: new Date() },
    ];

    expect(callbacks(adminListKeyboard(admins))).toEqual(['sa_remove_admin:100002', 'sa_menu']);
  });
});

describe('callback parsing', () => {
  it('parses positive integer ids', () => {
    expect(parseId('42')).toBe(42);
    expect(parseId('0')).toBeNull();
    expect(parseId('4x')).toBeNull();
    expect(parseId(undefined)).toBeNull();
  });

  it('accepts only editable fields', () => {
    expect(parseEditableField('contact')).toBe('contact');
    expect(parseEditableField('status')).toBeNull();
  });
});
