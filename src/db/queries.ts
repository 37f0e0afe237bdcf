import type { DbPool } from './index.js';
import { addDays, type Store } from './store.js';
import { StoreError } from '../shared/errors.js';
import type {
  Ad,
  AdFieldUpdate,
  AdStatus,
  CategoryCount,
  NewAd,
  Statistics,
  User,
  UserRole,
  UserStats,
} from '../shared/types.js';

// pg hands BIGINT columns back as strings; rows are mapped before leaving this module.
interface UserRow {
  id: number;
  telegram_id: string;
  full_name: string;
  role: UserRole;
  is_blocked: boolean;
  created_at: Date;
}

interface AdRow {
  id: number;
  user_id: string;
  title: string;
  description: string;
  category: string;
  contact: string;
  status: AdStatus;
  created_at: Date;
  expires_at: Date;
  approved_by: string | null;
  approved_at: Date | null;
}

function toUser(row: UserRow): User {
  return { ...row, telegram_id: Number(row.telegram_id) };
}

function toAd(row: AdRow): Ad {
  return {
    ...row,
    user_id: Number(row.user_id),
    approved_by: row.approved_by === null ? null : Number(row.approved_by),
  };
}

export class PgStore implements Store {
  constructor(private readonly pool: DbPool) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreError(operation, err);
    }
  }

  // ── Users ────────────────────────────────────────────────────────────

  getUser(telegramId: number): Promise<User | null> {
    return this.run('getUser', async () => {
      const { rows } = await this.pool.query<UserRow>(
        'SELECT * FROM users WHERE telegram_id = $1',
        [telegramId],
      );
      return rows[0] ? toUser(rows[0]) : null;
    });
  }

  createUser(telegramId: number, fullName: string, role: UserRole = 'user'): Promise<User> {
    return this.run('createUser', async () => {
      const { rows } = await this.pool.query<UserRow>(
        `INSERT INTO users (telegram_id, full_name, role)
         VALUES ($1, $2, $3)
         RETURNING *`,
        [telegramId, fullName, role],
      );
      return toUser(rows[0]);
    });
  }

  /**
   * Ensure a user row exists when they interact with the bot.
   * Creates a new row with role 'user' if missing, but never overrides an existing role.
   */
  ensureUser(telegramId: number, fullName: string): Promise<User> {
    return this.run('ensureUser', async () => {
      const { rows } = await this.pool.query<UserRow>(
        `INSERT INTO users (telegram_id, full_name, role)
         VALUES ($1, $2, 'user')
         ON CONFLICT (telegram_id) DO UPDATE
           SET full_name = EXCLUDED.full_name
         RETURNING *`,
        [telegramId, fullName],
      );
      return toUser(rows[0]);
    });
  }

  updateUserRole(telegramId: number, role: UserRole): Promise<User | null> {
    return this.run('updateUserRole', async () => {
      const { rows } = await this.pool.query<UserRow>(
        'UPDATE users SET role = $2 WHERE telegram_id = $1 RETURNING *',
        [telegramId, role],
      );
      return rows[0] ? toUser(rows[0]) : null;
    });
  }

  setUserBlocked(telegramId: number, blocked: boolean): Promise<User | null> {
    return this.run('setUserBlocked', async () => {
      const { rows } = await this.pool.query<UserRow>(
        'UPDATE users SET is_blocked = $2 WHERE telegram_id = $1 RETURNING *',
        [telegramId, blocked],
      );
      return rows[0] ? toUser(rows[0]) : null;
    });
  }

  getAdmins(): Promise<User[]> {
    return this.run('getAdmins', async () => {
      const { rows } = await this.pool.query<UserRow>(
        `SELECT * FROM users
         WHERE role IN ('admin', 'superadmin')
         ORDER BY role DESC, created_at ASC`,
      );
      return rows.map(toUser);
    });
  }

  getAllUsers(): Promise<User[]> {
    return this.run('getAllUsers', async () => {
      const { rows } = await this.pool.query<UserRow>(
        'SELECT * FROM users ORDER BY id ASC',
      );
      return rows.map(toUser);
    });
  }

  // ── Ads ──────────────────────────────────────────────────────────────

  createAd(ad: NewAd, expiresAt: Date): Promise<Ad> {
    return this.run('createAd', async () => {
      const { rows } = await this.pool.query<AdRow>(
        `INSERT INTO ads (user_id, title, description, category, contact, status, expires_at)
         VALUES ($1, $2, $3, $4, $5, 'pending', $6)
         RETURNING *`,
        [ad.user_id, ad.title, ad.description, ad.category, ad.contact, expiresAt],
      );
      return toAd(rows[0]);
    });
  }

  getAd(adId: number): Promise<Ad | null> {
    return this.run('getAd', async () => {
      const { rows } = await this.pool.query<AdRow>(
        'SELECT * FROM ads WHERE id = $1',
        [adId],
      );
      return rows[0] ? toAd(rows[0]) : null;
    });
  }

  updateAdStatus(adId: number, from: AdStatus, to: AdStatus, approvedBy?: number): Promise<Ad | null> {
    return this.run('updateAdStatus', async () => {
      const approve = to === 'approved' && approvedBy !== undefined;
      const { rows } = await this.pool.query<AdRow>(
        `UPDATE ads
         SET status = $3,
             approved_by = CASE WHEN $4::boolean THEN $5::bigint ELSE approved_by END,
             approved_at = CASE WHEN $4::boolean THEN NOW() ELSE approved_at END
         WHERE id = $1 AND status = $2
         RETURNING *`,
        [adId, from, to, approve, approvedBy ?? null],
      );
      return rows[0] ? toAd(rows[0]) : null;
    });
  }

  updateAd(adId: number, fields: AdFieldUpdate): Promise<Ad | null> {
    return this.run('updateAd', async () => {
      const { rows } = await this.pool.query<AdRow>(
        `UPDATE ads
         SET title = COALESCE($2, title),
             description = COALESCE($3, description),
             contact = COALESCE($4, contact)
         WHERE id = $1
         RETURNING *`,
        [adId, fields.title ?? null, fields.description ?? null, fields.contact ?? null],
      );
      return rows[0] ? toAd(rows[0]) : null;
    });
  }

  deleteAd(adId: number): Promise<Ad | null> {
    return this.run('deleteAd', async () => {
      const { rows } = await this.pool.query<AdRow>(
        'DELETE FROM ads WHERE id = $1 RETURNING *',
        [adId],
      );
      return rows[0] ? toAd(rows[0]) : null;
    });
  }

  getUserAds(telegramId: number): Promise<Ad[]> {
    return this.run('getUserAds', async () => {
      const { rows } = await this.pool.query<AdRow>(
        'SELECT * FROM ads WHERE user_id = $1 ORDER BY created_at DESC',
        [telegramId],
      );
      return rows.map(toAd);
    });
  }

  getUserAdsToday(telegramId: number, dayStart: Date): Promise<Ad[]> {
    return this.run('getUserAdsToday', async () => {
      const { rows } = await this.pool.query<AdRow>(
        `SELECT * FROM ads
         WHERE user_id = $1 AND created_at >= $2 AND created_at < $3
         ORDER BY created_at DESC`,
        [telegramId, dayStart, addDays(dayStart, 1)],
      );
      return rows.map(toAd);
    });
  }

  getAdsByStatus(status: AdStatus, limit: number = 50): Promise<Ad[]> {
    return this.run('getAdsByStatus', async () => {
      const { rows } = await this.pool.query<AdRow>(
        'SELECT * FROM ads WHERE status = $1 ORDER BY created_at DESC LIMIT $2',
        [status, limit],
      );
      return rows.map(toAd);
    });
  }

  getAllAds(limit: number = 100): Promise<Ad[]> {
    return this.run('getAllAds', async () => {
      const { rows } = await this.pool.query<AdRow>(
        'SELECT * FROM ads ORDER BY created_at DESC LIMIT $1',
        [limit],
      );
      return rows.map(toAd);
    });
  }

  searchAds(query: string, status: AdStatus = 'approved', limit: number = 10): Promise<Ad[]> {
    return this.run('searchAds', async () => {
      // Escape LIKE wildcards so the query is matched literally.
      const pattern = `%${query.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
      const { rows } = await this.pool.query<AdRow>(
        `SELECT * FROM ads
         WHERE status = $1 AND (title ILIKE $2 OR description ILIKE $2)
         ORDER BY created_at DESC
         LIMIT $3`,
        [status, pattern, limit],
      );
      return rows.map(toAd);
    });
  }

  getUserStats(telegramId: number): Promise<UserStats> {
    return this.run('getUserStats', async () => {
      const { rows } = await this.pool.query<{
        total_ads: number;
        approved_ads: number;
        pending_ads: number;
        rejected_ads: number;
        categories_used: string[] | null;
        last_ad_at: Date | null;
      }>(
        `SELECT
           COUNT(*)::int AS total_ads,
           COUNT(*) FILTER (WHERE status = 'approved')::int AS approved_ads,
           COUNT(*) FILTER (WHERE status = 'pending')::int AS pending_ads,
           COUNT(*) FILTER (WHERE status = 'rejected')::int AS rejected_ads,
           ARRAY_AGG(DISTINCT category) FILTER (WHERE category IS NOT NULL) AS categories_used,
           MAX(created_at) AS last_ad_at
         FROM ads
         WHERE user_id = $1`,
        [telegramId],
      );
      const row = rows[0];
      return {
        total_ads: row?.total_ads ?? 0,
        approved_ads: row?.approved_ads ?? 0,
        pending_ads: row?.pending_ads ?? 0,
        rejected_ads: row?.rejected_ads ?? 0,
        categories_used: row?.categories_used ?? [],
        last_ad_at: row?.last_ad_at ?? null,
      };
    });
  }

  getStatistics(dayStart: Date): Promise<Statistics> {
    return this.run('getStatistics', async () => {
      const dayEnd = addDays(dayStart, 1);
      const counts = await this.pool.query<Omit<Statistics, 'popular_categories'>>(
        `SELECT
           (SELECT COUNT(*)::int FROM users) AS total_users,
           (SELECT COUNT(*)::int FROM users WHERE created_at >= $1 AND created_at < $2) AS today_users,
           COUNT(a.id)::int AS total_ads,
           COUNT(a.id) FILTER (WHERE a.status = 'pending')::int AS pending_ads,
           COUNT(a.id) FILTER (WHERE a.status = 'approved')::int AS approved_ads,
           COUNT(a.id) FILTER (WHERE a.status = 'rejected')::int AS rejected_ads,
           COUNT(a.id) FILTER (WHERE a.created_at >= $1 AND a.created_at < $2)::int AS today_ads
         FROM ads a`,
        [dayStart, dayEnd],
      );

      const popular = await this.pool.query<CategoryCount>(
        `SELECT category, COUNT(*)::int AS count
         FROM ads
         WHERE status = 'approved'
         GROUP BY category
         ORDER BY count DESC, category ASC
         LIMIT 5`,
      );

      const row = counts.rows[0];
      return {
        total_users: row?.total_users ?? 0,
        total_ads: row?.total_ads ?? 0,
        pending_ads: row?.pending_ads ?? 0,
        approved_ads: row?.approved_ads ?? 0,
        rejected_ads: row?.rejected_ads ?? 0,
        today_ads: row?.today_ads ?? 0,
        today_users: row?.today_users ?? 0,
        popular_categories: popular.rows,
      };
    });
  }

  getExpiredAdIds(now: Date): Promise<number[]> {
    return this.run('getExpiredAdIds', async () => {
      const { rows } = await this.pool.query<{ id: number }>(
        'SELECT id FROM ads WHERE expires_at < $1 ORDER BY id ASC',
        [now],
      );
      return rows.map((r) => r.id);
    });
  }

  async cleanupOldAds(now: Date): Promise<number> {
    const ids = await this.getExpiredAdIds(now);
    let removed = 0;
    for (const id of ids) {
      // One statement per row; the sweep never locks more than one ad.
      const deleted = await this.run('cleanupOldAds', () =>
        this.pool.query('DELETE FROM ads WHERE id = $1 AND expires_at < $2', [id, now]),
      );
      removed += deleted.rowCount ?? 0;
    }
    return removed;
  }

  // ── Settings ─────────────────────────────────────────────────────────

  getSetting(key: string): Promise<string | null> {
    return this.run('getSetting', async () => {
      const { rows } = await this.pool.query<{ value: string }>(
        'SELECT value FROM bot_settings WHERE key = $1',
        [key],
      );
      return rows[0]?.value ?? null;
    });
  }

  setSetting(key: string, value: string): Promise<void> {
    return this.run('setSetting', async () => {
      await this.pool.query(
        `INSERT INTO bot_settings (key, value)
         VALUES ($1, $2)
         ON CONFLICT (key) DO UPDATE
           SET value = EXCLUDED.value,
               updated_at = NOW()`,
        [key, value],
      );
    });
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
