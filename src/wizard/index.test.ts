import { describe, it, expect, beforeEach } from 'vitest';
import { createAppContext, type AppContext } from '../app.js';
import { fieldLimits } from '../config/env.js';
import { FakeMessenger } from '../testing/fakeMessenger.js';
import { ADMIN_ID, SUPERADMIN_ID, TestClock, USER_ID, testEnv } from '../testing/fixtures.js';
import { MemoryStore } from '../testing/memoryStore.js';
import { SubmissionWizard } from './index.js';
import { MemorySessionStore } from './session.js';
import type { WizardState } from './machine.js';

const MINUTE = 60_000;

describe('SubmissionWizard', () => {
  let clock: TestClock;
  let store: MemoryStore;
  let messenger: FakeMessenger;
  let app: AppContext;

  beforeEach(async () => {
    clock = new TestClock();
    store = new MemoryStore(clock.now);
    messenger = new FakeMessenger();
    app = createAppContext({ env: testEnv(), store, messenger, now: clock.now });

    await store.createUser(SUPERADMIN_ID, 'Boss', 'superadmin');
    await store.createUser(ADMIN_ID, 'Moderator', 'admin');
    await store.createUser(USER_ID, 'Test User');
  });

  async function seedAds(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await store.createAd(
        { user_id: USER_ID, title: `Ish ${i}`, description: 'Oldingi e\'lon tavsifi', contact: '@test_user', category: '🔧 Xizmat' },
        new Date('2030-01-01T00:00:00Z'),
      );
    }
  }

  async function fillUpToCategory(): Promise<void> {
    await app.wizard.start(USER_ID);
    await app.wizard.handleText(USER_ID, 'Python dasturchi');
    await app.wizard.handleText(USER_ID, 'Backend jamoaga dasturchi kerak');
    await app.wizard.handleText(USER_ID, '+998901234567');
  }

  it('submits a listing and sees it through approval', async () => {
    const description = 'Django va PostgreSQL bilan ishlash tajribasi kerak';
    expect(description).toHaveLength(50);

    expect(await app.wizard.start(USER_ID)).toEqual({ kind: 'prompt', step: 'awaiting_title' });
    expect(await app.wizard.handleText(USER_ID, 'Python dasturchi')).toEqual({ kind: 'prompt', step: 'awaiting_description' });
    expect(await app.wizard.handleText(USER_ID, description)).toEqual({ kind: 'prompt', step: 'awaiting_contact' });
    expect(await app.wizard.handleText(USER_ID, '+998901234567')).toEqual({ kind: 'prompt', step: 'awaiting_category' });

    const reply = await app.wizard.selectCategory(USER_ID, 5);
    if (reply.kind !== 'created') throw new Error(`expected created, got ${reply.kind}`);

    expect(reply.ad).toMatchObject({
      user_id: USER_ID,
      title: 'Python dasturchi',
      description,
      contact: '+998901234567',
      category: '💻 IT',
      status: 'pending',
      approved_by: null,
    });
    expect(reply.ad.expires_at).toEqual(new Date('2024-03-17T09:00:00.000Z'));
    expect(app.wizard.isActive(USER_ID)).toBe(false);

    const mine = await store.getUserAds(USER_ID);
    expect(mine.map((a) => a.id)).toEqual([reply.ad.id]);

    // Both moderators get the card with its buttons.
    for (const adminId of [SUPERADMIN_ID, ADMIN_ID]) {
      const [card] = messenger.to(adminId);
      expect(card.text).toContain(`#${reply.ad.id}`);
      const button = card.keyboard?.inline_keyboard[0][0];
      expect(button && 'callback_data' in button ? button.callback_data : undefined).toBe(`ad_approve:${reply.ad.id}`);
    }

    const approved = await app.moderation.approve(ADMIN_ID, reply.ad.id);
    expect(approved.approved_by).toBe(ADMIN_ID);
    expect(approved.approved_at).toEqual(clock.now());
    expect(messenger.published()).toHaveLength(1);
  });

  it('refuses a fourth listing on the same day', async () => {
    await seedAds(3);

    expect(await app.wizard.start(USER_ID)).toEqual({ kind: 'quota_exceeded', count: 3, limit: 3 });
    expect(app.wizard.isActive(USER_ID)).toBe(false);
  });

  it('re-checks the quota when the listing is finalized', async () => {
    await seedAds(2);
    await fillUpToCategory();
    await seedAds(1);

    expect(await app.wizard.selectCategory(USER_ID, 0)).toEqual({ kind: 'quota_exceeded', count: 3, limit: 3 });
    expect(store.ads.size).toBe(3);
    expect(app.wizard.isActive(USER_ID)).toBe(false);
  });

  it('resets the quota at the next UTC day', async () => {
    await seedAds(3);
    clock.set('2024-03-11T00:00:00.000Z');

    expect(await app.wizard.start(USER_ID)).toEqual({ kind: 'prompt', step: 'awaiting_title' });
  });

  it('lets the stored setting override the daily limit', async () => {
    await seedAds(1);
    await store.setSetting('max_daily_ads', '1');

    expect(await app.wizard.dailyLimit()).toBe(1);
    expect(await app.wizard.start(USER_ID)).toEqual({ kind: 'quota_exceeded', count: 1, limit: 1 });
  });

  it('falls back to the configured limit when the setting is unusable', async () => {
    await store.setSetting('max_daily_ads', 'many');

    expect(await app.wizard.dailyLimit()).toBe(3);
  });

  it('keeps the step on invalid input', async () => {
    await app.wizard.start(USER_ID);

    const reply = await app.wizard.handleText(USER_ID, 'IT');

    expect(reply.kind).toBe('invalid');
    expect(app.wizard.state(USER_ID)).toEqual({ step: 'awaiting_title' });
  });

  it('cancels an active submission', async () => {
    await fillUpToCategory();

    expect(app.wizard.cancel(USER_ID)).toEqual({ kind: 'cancelled' });
    expect(app.wizard.cancel(USER_ID)).toEqual({ kind: 'not_active' });
    expect(await app.wizard.selectCategory(USER_ID, 5)).toEqual({ kind: 'not_active' });
    expect(store.ads.size).toBe(0);
  });

  it('forgets a submission left idle past the timeout', async () => {
    await app.wizard.start(USER_ID);
    await app.wizard.handleText(USER_ID, 'Python dasturchi');

    clock.advance(31 * MINUTE);

    expect(app.wizard.isActive(USER_ID)).toBe(false);
    expect(await app.wizard.handleText(USER_ID, 'Backend jamoaga dasturchi kerak')).toEqual({ kind: 'not_active' });
  });

  it('reports a bad category without leaving the step', async () => {
    await fillUpToCategory();

    const reply = await app.wizard.selectCategory(USER_ID, 42);

    expect(reply.kind).toBe('invalid');
    expect(app.wizard.state(USER_ID).step).toBe('awaiting_category');
  });

  it('creates the listing even when admin notification throws', async () => {
    const sessions = new MemorySessionStore<WizardState>(30 * MINUTE, clock.millis);
    const wizard = new SubmissionWizard({
      store,
      sessions,
      listener: {
        notifyAdminsNewAd: async () => {
          throw new Error('telegram down');
        },
      },
      rules: { limits: fieldLimits(testEnv()), strictContact: false },
      maxDailyAds: 3,
      adExpiryDays: 7,
      now: clock.now,
    });

    sessions.set(USER_ID, {
      step: 'awaiting_category',
      title: 'Python dasturchi',
      description: 'Backend jamoaga dasturchi kerak',
      contact: '@test_user',
    });
    const reply = await wizard.selectCategory(USER_ID, 5);

    expect(reply.kind).toBe('created');
    expect(store.ads.size).toBe(1);
  });
});
