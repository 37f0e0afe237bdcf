// Ad status union type — all status changes go through src/moderation/transitions.ts
export type AdStatus = 'pending' | 'approved' | 'rejected';

export type UserRole = 'user' | 'admin' | 'superadmin';

export const AD_STATUSES: readonly AdStatus[] = ['pending', 'approved', 'rejected'];

export interface User {
  id: number;
  telegram_id: number;
  full_name: string;
  role: UserRole;
  is_blocked: boolean;
  created_at: Date;
}

export interface Ad {
  id: number;
  /** Owner's Telegram ID. */
  user_id: number;
  title: string;
  description: string;
  category: string;
  contact: string;
  status: AdStatus;
  created_at: Date;
  expires_at: Date;
  approved_by: number | null;
  approved_at: Date | null;
}

export interface NewAd {
  user_id: number;
  title: string;
  description: string;
  category: string;
  contact: string;
}

export type AdFieldUpdate = Partial<Pick<Ad, 'title' | 'description' | 'contact'>>;

export interface CategoryCount {
  category: string;
  count: number;
}

export interface Statistics {
  total_users: number;
  total_ads: number;
  pending_ads: number;
  approved_ads: number;
  rejected_ads: number;
  today_ads: number;
  today_users: number;
  popular_categories: CategoryCount[];
}

export interface UserStats {
  total_ads: number;
  approved_ads: number;
  pending_ads: number;
  rejected_ads: number;
  categories_used: string[];
  last_ad_at: Date | null;
}
