import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { startRetentionJob, sweepExpiredAds } from './retention.js';
import { MemoryStore } from '../testing/memoryStore.js';
import { USER_ID } from '../testing/fixtures.js';
import type { AdStatus } from '../shared/types.js';

describe('retention', () => {
  let store: MemoryStore;

  async function adExpiring(expiresAt: string, status: AdStatus = 'pending'): Promise<number> {
    const ad = await store.createAd(
      { user_id: USER_ID, title: 'Haydovchi kerak', description: 'Yuk tashish uchun haydovchi', contact: '@test_user', category: '🚗 Haydovchi' },
      new Date(expiresAt),
    );
    if (status !== 'pending') {
      await store.updateAdStatus(ad.id, 'pending', status, 1);
    }
    return ad.id;
  }

  beforeEach(async () => {
    store = new MemoryStore();
    await store.createUser(USER_ID, 'Test User');
  });

  it('removes ads past expires_at whatever their status', async () => {
    const expiredPending = await adExpiring('2024-03-01T00:00:00Z');
    const expiredApproved = await adExpiring('2024-03-05T00:00:00Z', 'approved');
    const live = await adExpiring('2024-03-20T00:00:00Z', 'approved');

    const removed = await sweepExpiredAds(store, new Date('2024-03-10T00:00:00Z'));

    expect(removed).toBe(2);
    expect(await store.getAd(expiredPending)).toBeNull();
    expect(await store.getAd(expiredApproved)).toBeNull();
    expect(await store.getAd(live)).not.toBeNull();
  });

  it('keeps an ad expiring exactly now', async () => {
    const id = await adExpiring('2024-03-10T00:00:00Z');

    expect(await sweepExpiredAds(store, new Date('2024-03-10T00:00:00Z'))).toBe(0);
    expect(await store.getAd(id)).not.toBeNull();
  });

  describe('startRetentionJob', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('sweeps immediately and then on every interval', async () => {
      const sweep = vi.spyOn(store, 'cleanupOldAds');
      const now = () => new Date('2024-03-10T00:00:00Z');

      const stop = startRetentionJob(store, { intervalMs: 3_600_000, now });
      expect(sweep).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(2 * 3_600_000);
      expect(sweep).toHaveBeenCalledTimes(3);

      stop();
      await vi.advanceTimersByTimeAsync(3_600_000);
      expect(sweep).toHaveBeenCalledTimes(3);
    });

    it('survives a failing sweep', async () => {
      const sweep = vi.spyOn(store, 'cleanupOldAds').mockRejectedValue(new Error('db down'));
      const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

      const stop = startRetentionJob(store, { intervalMs: 1000 });
      await vi.advanceTimersByTimeAsync(1000);
      stop();

      expect(sweep).toHaveBeenCalledTimes(2);
      expect(errors).toHaveBeenCalledTimes(2);
      errors.mockRestore();
    });
  });
});
