import { describe, it, expect, beforeEach } from 'vitest';
import { createAppContext, type AppContext } from '../app.js';
import {
  AuthorizationError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from '../shared/errors.js';
import type { Ad } from '../shared/types.js';
import { FakeMessenger } from '../testing/fakeMessenger.js';
import {
  ADMIN_ID,
  OTHER_USER_ID,
  SUPERADMIN_ID,
  TestClock,
  USER_ID,
  testEnv,
} from '../testing/fixtures.js';
import { MemoryStore } from '../testing/memoryStore.js';

describe('ModerationService', () => {
  let clock: TestClock;
  let store: MemoryStore;
  let messenger: FakeMessenger;
  let app: AppContext;
  let ad: Ad;

  beforeEach(async () => {
    clock = new TestClock();
    store = new MemoryStore(clock.now);
    messenger = new FakeMessenger();
    app = createAppContext({ env: testEnv(), store, messenger, now: clock.now, sleep: async () => {} });

    await store.createUser(SUPERADMIN_ID, 'Boss', 'superadmin');
    await store.createUser(ADMIN_ID, 'Moderator', 'admin');
    await store.createUser(USER_ID, 'Test User');
    ad = await store.createAd(
      {
        user_id: USER_ID,
        title: 'Python dasturchi',
        description: 'Backend jamoaga tajribali dasturchi kerak',
        contact: '+998901234567',
        category: '💻 IT',
      },
      new Date('2024-03-17T09:00:00.000Z'),
    );
  });

  describe('approve', () => {
    it('publishes once and notifies the owner', async () => {
      const approved = await app.moderation.approve(ADMIN_ID, ad.id);

      expect(approved.status).toBe('approved');
      expect(approved.approved_by).toBe(ADMIN_ID);
      expect(approved.approved_at).toEqual(clock.now());

      const posts = messenger.published();
      expect(posts).toHaveLength(1);
      expect(posts[0].chatId).toBe('@test_channel');
      expect(posts[0].text).toContain('<b>Python dasturchi</b>');
      expect(posts[0].text.endsWith('#ish #vacancy #IT')).toBe(true);

      const dms = messenger.to(USER_ID);
      expect(dms).toHaveLength(1);
      expect(dms[0].text).toContain("E'loningiz tasdiqlandi!");
    });

    it('refuses a second decision without publishing again', async () => {
      await app.moderation.approve(ADMIN_ID, ad.id);

      await expect(app.moderation.approve(SUPERADMIN_ID, ad.id)).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(app.moderation.reject(ADMIN_ID, ad.id)).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(messenger.published()).toHaveLength(1);
      expect((await store.getAd(ad.id))?.status).toBe('approved');
    });

    it('requires admin rights', async () => {
      await expect(app.moderation.approve(USER_ID, ad.id)).rejects.toBeInstanceOf(AuthorizationError);

      expect((await store.getAd(ad.id))?.status).toBe('pending');
      expect(messenger.sent).toHaveLength(0);
    });

    it('reports a missing ad', async () => {
      await expect(app.moderation.approve(ADMIN_ID, 9999)).rejects.toThrow('ad not found: 9999');
    });

    it('still commits when the owner cannot be reached', async () => {
      messenger.unreachable.add(USER_ID);

      const approved = await app.moderation.approve(ADMIN_ID, ad.id);

      expect(approved.status).toBe('approved');
      expect(messenger.published()).toHaveLength(1);
    });
  });

  describe('reject', () => {
    it('notifies the owner and does not publish', async () => {
      const rejected = await app.moderation.reject(ADMIN_ID, ad.id);

      expect(rejected.status).toBe('rejected');
      expect(rejected.approved_by).toBeNull();
      expect(messenger.published()).toHaveLength(0);
      expect(messenger.to(USER_ID)[0].text).toContain("E'loningiz rad etildi");
    });
  });

  describe('editField', () => {
    it('overwrites the field and keeps the status', async () => {
      const updated = await app.moderation.editField(ADMIN_ID, ad.id, 'title', '  Senior Python dasturchi ');

      expect(updated.title).toBe('Senior Python dasturchi');
      expect(updated.status).toBe('pending');
      expect(messenger.to(USER_ID)[0].text).toContain("O'zgartirilgan: sarlavha");
    });

    it('rejects an out-of-bounds value and leaves the ad unchanged', async () => {
      await expect(app.moderation.editField(ADMIN_ID, ad.id, 'title', 'abc')).rejects.toBeInstanceOf(ValidationError);

      expect((await store.getAd(ad.id))?.title).toBe('Python dasturchi');
      expect(messenger.sent).toHaveLength(0);
    });

    it('checks rights before the value', async () => {
      await expect(app.moderation.editField(USER_ID, ad.id, 'title', 'abc')).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('checks existence before the value', async () => {
      await expect(app.moderation.editField(ADMIN_ID, 9999, 'title', 'abc')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('prepareDelete changes nothing', async () => {
      const target = await app.moderation.prepareDelete(ADMIN_ID, ad.id);

      expect(target.id).toBe(ad.id);
      expect(await store.getAd(ad.id)).not.toBeNull();
    });

    it('removes the ad and notifies the owner', async () => {
      await app.moderation.deleteAd(ADMIN_ID, ad.id);

      expect(await store.getAd(ad.id)).toBeNull();
      expect(messenger.to(USER_ID)[0].text).toContain("E'loningiz o'chirildi");
    });

    it('reports an already deleted ad as not found', async () => {
      await app.moderation.deleteAd(ADMIN_ID, ad.id);

      await expect(app.moderation.deleteAd(ADMIN_ID, ad.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('admin management', () => {
    it('promotes a plain user', async () => {
      const promoted = await app.moderation.promoteAdmin(SUPERADMIN_ID, USER_ID);

      expect(promoted.role).toBe('admin');
      expect(await app.roles.isAdmin(USER_ID)).toBe(true);
      expect(messenger.to(USER_ID)[0].text).toContain('Tabriklaymiz!');
    });

    it('refuses to promote someone who is already an admin', async () => {
      await expect(app.moderation.promoteAdmin(SUPERADMIN_ID, ADMIN_ID)).rejects.toBeInstanceOf(ValidationError);
    });

    it('refuses to promote an unknown user', async () => {
      await expect(app.moderation.promoteAdmin(SUPERADMIN_ID, OTHER_USER_ID)).rejects.toThrow(
        `user not found: ${OTHER_USER_ID}`,
      );
    });

    it('only a superadmin may manage admins', async () => {
      await expect(app.moderation.promoteAdmin(ADMIN_ID, USER_ID)).rejects.toBeInstanceOf(AuthorizationError);
      await expect(app.moderation.listAdmins(ADMIN_ID)).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('demotes an admin', async () => {
      const demoted = await app.moderation.demoteAdmin(SUPERADMIN_ID, ADMIN_ID);

      expect(demoted.role).toBe('user');
      await expect(app.moderation.approve(ADMIN_ID, ad.id)).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('never demotes a superadmin', async () => {
      await expect(app.moderation.demoteAdmin(SUPERADMIN_ID, SUPERADMIN_ID)).rejects.toBeInstanceOf(ValidationError);

      expect((await store.getUser(SUPERADMIN_ID))?.role).toBe('superadmin');
    });

    it('lists superadmins first', async () => {
      const admins = await app.moderation.listAdmins(SUPERADMIN_ID);

      expect(admins.map((a) => a.telegram_id)).toEqual([SUPERADMIN_ID, ADMIN_ID]);
    });

    it('blocks and unblocks users but never a superadmin', async () => {
      expect((await app.moderation.setBlocked(SUPERADMIN_ID, USER_ID, true)).is_blocked).toBe(true);
      expect((await app.moderation.setBlocked(SUPERADMIN_ID, USER_ID, false)).is_blocked).toBe(false);
      await expect(app.moderation.setBlocked(SUPERADMIN_ID, SUPERADMIN_ID, true)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('broadcast', () => {
    it('counts recipients before sending', async () => {
      const preview = await app.moderation.prepareBroadcast(SUPERADMIN_ID, '  Yangi imkoniyatlar  ');

      expect(preview).toEqual({ text: 'Yangi imkoniyatlar', recipients: 3 });
      expect(messenger.sent).toHaveLength(0);
    });

    it('rejects an empty message', async () => {
      await expect(app.moderation.broadcast(SUPERADMIN_ID, '   ')).rejects.toBeInstanceOf(ValidationError);
    });

    it('sends to every user and counts the unreachable ones', async () => {
      await store.createUser(OTHER_USER_ID, 'Gone User');
      messenger.unreachable.add(OTHER_USER_ID);

      const result = await app.moderation.broadcast(SUPERADMIN_ID, 'Salom <hammaga>');

      expect(result).toEqual({ total: 4, sent: 3, failed: 1, unreachable: 1 });
      expect(messenger.to(USER_ID)[0].text).toBe('📢 <b>Yangilik</b>\n\nSalom &lt;hammaga&gt;');
    });

    it('is reserved for the superadmin', async () => {
      await expect(app.moderation.broadcast(ADMIN_ID, 'Salom')).rejects.toBeInstanceOf(AuthorizationError);
    });
  });

  describe('settings', () => {
    it('stores a valid daily limit', async () => {
      await app.moderation.setSetting(SUPERADMIN_ID, 'max_daily_ads', ' 5 ');

      expect(await store.getSetting('max_daily_ads')).toBe('5');
      expect(await app.moderation.getSettings(SUPERADMIN_ID)).toEqual({ max_daily_ads: '5' });
    });

    it('rejects unknown keys and invalid values', async () => {
      await expect(app.moderation.setSetting(SUPERADMIN_ID, 'welcome', 'hi')).rejects.toBeInstanceOf(ValidationError);
      await expect(app.moderation.setSetting(SUPERADMIN_ID, 'max_daily_ads', '0')).rejects.toBeInstanceOf(ValidationError);
      await expect(app.moderation.setSetting(SUPERADMIN_ID, 'max_daily_ads', 'abc')).rejects.toBeInstanceOf(ValidationError);
      expect(await store.getSetting('max_daily_ads')).toBeNull();
    });
  });

  describe('statistics', () => {
    it('counts ads by status and today', async () => {
      await app.moderation.approve(ADMIN_ID, ad.id);

      const stats = await app.moderation.statistics(ADMIN_ID);

      expect(stats).toEqual({
        total_users: 3,
        total_ads: 1,
        pending_ads: 0,
        approved_ads: 1,
        rejected_ads: 0,
        today_ads: 1,
        today_users: 3,
        popular_categories: [{ category: '💻 IT', count: 1 }],
      });
    });
  });
});
