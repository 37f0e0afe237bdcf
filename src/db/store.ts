import type {
  Ad,
  AdFieldUpdate,
  AdStatus,
  NewAd,
  Statistics,
  User,
  UserRole,
  UserStats,
} from '../shared/types.js';

/**
 * Persistence contract. Every call is atomic on its own and returns fresh rows;
 * callers never mutate stored records in place.
 */
export interface Store {
  // ── Users ──
  getUser(telegramId: number): Promise<User | null>;
  createUser(telegramId: number, fullName: string, role?: UserRole): Promise<User>;
  /** Insert on first contact; refreshes the display name but never the role. */
  ensureUser(telegramId: number, fullName: string): Promise<User>;
  updateUserRole(telegramId: number, role: UserRole): Promise<User | null>;
  setUserBlocked(telegramId: number, blocked: boolean): Promise<User | null>;
  getAdmins(): Promise<User[]>;
  getAllUsers(): Promise<User[]>;

  // ── Ads ──
  createAd(ad: NewAd, expiresAt: Date): Promise<Ad>;
  getAd(adId: number): Promise<Ad | null>;
  /**
   * Move an ad from `from` to `to`. Returns null when the ad is missing or no longer
   * in `from` (the WHERE clause doubles as an optimistic lock).
   */
  updateAdStatus(adId: number, from: AdStatus, to: AdStatus, approvedBy?: number): Promise<Ad | null>;
  updateAd(adId: number, fields: AdFieldUpdate): Promise<Ad | null>;
  deleteAd(adId: number): Promise<Ad | null>;
  getUserAds(telegramId: number): Promise<Ad[]>;
  /** Ads created inside [dayStart, dayStart + 24h). */
  getUserAdsToday(telegramId: number, dayStart: Date): Promise<Ad[]>;
  getAdsByStatus(status: AdStatus, limit?: number): Promise<Ad[]>;
  getAllAds(limit?: number): Promise<Ad[]>;
  searchAds(query: string, status?: AdStatus, limit?: number): Promise<Ad[]>;
  getUserStats(telegramId: number): Promise<UserStats>;
  getStatistics(dayStart: Date): Promise<Statistics>;
  /** Ids of ads whose expires_at is before `now`. */
  getExpiredAdIds(now: Date): Promise<number[]>;
  /** Delete every ad whose expires_at is before `now`, one row at a time. Returns the count. */
  cleanupOldAds(now: Date): Promise<number>;

  // ── Settings ──
  getSetting(key: string): Promise<string | null>;
  setSetting(key: string, value: string): Promise<void>;

  close(): Promise<void>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Midnight UTC of the calendar day containing `now`. */
export function utcDayStart(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}
