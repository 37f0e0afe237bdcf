import { describe, it, expect } from 'vitest';
import { createAppContext } from '../app.js';
import { ValidationError } from '../shared/errors.js';
import { FakeMessenger } from '../testing/fakeMessenger.js';
import { testEnv } from '../testing/fixtures.js';
import { MemoryStore } from '../testing/memoryStore.js';
import { renderWizardReply } from './submission.js';
import { formatBroadcastSummary } from './superAdmin.js';

const app = createAppContext({ env: testEnv(), store: new MemoryStore(), messenger: new FakeMessenger() });

describe('renderWizardReply', () => {
  it('offers the category buttons at the last step', () => {
    const { text, keyboard } = renderWizardReply({ kind: 'prompt', step: 'awaiting_category' }, app);

    expect(text).toBe('🏷 <b>Kategoriya tanlang:</b>');
    expect(keyboard?.inline_keyboard).toHaveLength(7);
  });

  it('offers cancel on text steps', () => {
    const { keyboard } = renderWizardReply({ kind: 'prompt', step: 'awaiting_title' }, app);

    expect(keyboard?.inline_keyboard).toHaveLength(1);
  });

  it('explains a rejected field with its bounds', () => {
    const { text } = renderWizardReply({
      kind: 'invalid',
      step: 'awaiting_description',
      error: new ValidationError('description', 'length must be between 10 and 1000, got 3'),
    }, app);

    expect(text).toBe("❌ Tavsif 10-1000 belgi orasida bo'lishi kerak.\nQaytadan kiriting:");
  });

  it('reports the daily limit', () => {
    const { text, keyboard } = renderWizardReply({ kind: 'quota_exceeded', count: 3, limit: 3 }, app);

    expect(text).toBe("⚠️ <b>Kunlik limit</b>\n\nSiz bugun allaqachon 3 ta e'lon bergansiz.\nErtaga qaytadan harakat qiling.");
    expect(keyboard).toBeUndefined();
  });
});

describe('formatBroadcastSummary', () => {
  it('lists every counter', () => {
    expect(formatBroadcastSummary({ total: 4, sent: 3, failed: 1, unreachable: 1 })).toBe(
      '📢 <b>Xabar yuborildi</b>\n\n👥 Jami: 4\n✅ Yuborildi: 3\n❌ Xatolik: 1\n🚫 Botni bloklagan: 1',
    );
  });
});
