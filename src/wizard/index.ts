import { addDays, utcDayStart, type Store } from '../db/store.js';
import type { ValidationError } from '../shared/errors.js';
import type { Ad } from '../shared/types.js';
import {
  acceptCategory,
  acceptText,
  begin,
  IDLE,
  type ActiveStep,
  type WizardRules,
  type WizardState,
} from './machine.js';
import type { SessionStore } from './session.js';

export const MAX_DAILY_ADS_SETTING = 'max_daily_ads';

export type WizardReply =
  | { kind: 'prompt'; step: ActiveStep }
  | { kind: 'invalid'; step: ActiveStep; error: ValidationError }
  | { kind: 'quota_exceeded'; count: number; limit: number }
  | { kind: 'created'; ad: Ad }
  | { kind: 'cancelled' }
  | { kind: 'not_active' };

/** Receives every freshly created listing; must not throw into the wizard. */
export interface NewAdListener {
  notifyAdminsNewAd(ad: Ad): Promise<unknown>;
}

export interface SubmissionWizardOptions {
  store: Store;
  sessions: SessionStore<WizardState>;
  listener: NewAdListener;
  rules: WizardRules;
  /** Default daily cap; the `max_daily_ads` setting overrides it when valid. */
  maxDailyAds: number;
  adExpiryDays: number;
  now?: () => Date;
}

export class SubmissionWizard {
  private readonly store: Store;
  private readonly sessions: SessionStore<WizardState>;
  private readonly listener: NewAdListener;
  private readonly rules: WizardRules;
  private readonly maxDailyAds: number;
  private readonly adExpiryDays: number;
  private readonly now: () => Date;

  constructor(options: SubmissionWizardOptions) {
    this.store = options.store;
    this.sessions = options.sessions;
    this.listener = options.listener;
    this.rules = options.rules;
    this.maxDailyAds = options.maxDailyAds;
    this.adExpiryDays = options.adExpiryDays;
    this.now = options.now ?? (() => new Date());
  }

  state(userId: number): WizardState {
    return this.sessions.get(userId) ?? IDLE;
  }

  isActive(userId: number): boolean {
    return this.state(userId).step !== 'idle';
  }

  async dailyLimit(): Promise<number> {
    const raw = await this.store.getSetting(MAX_DAILY_ADS_SETTING);
    const parsed = raw === null ? NaN : Number(raw);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : this.maxDailyAds;
  }

  /** Listings created by the user during the current UTC calendar day. */
  async countToday(userId: number): Promise<number> {
    const ads = await this.store.getUserAdsToday(userId, utcDayStart(this.now()));
    return ads.length;
  }

  async start(userId: number): Promise<WizardReply> {
    const quota = await this.checkQuota(userId);
    if (quota) {
      this.sessions.clear(userId);
      return quota;
    }
    this.sessions.set(userId, begin());
    return { kind: 'prompt', step: 'awaiting_title' };
  }

  async handleText(userId: number, text: string): Promise<WizardReply> {
    const current = this.state(userId);
    if (current.step === 'idle') {
      return { kind: 'not_active' };
    }

    const result = acceptText(current, text, this.rules);
    switch (result.kind) {
      case 'advanced':
        this.sessions.set(userId, result.state);
        return { kind: 'prompt', step: activeStep(result.state) };
      case 'invalid':
        return { kind: 'invalid', step: current.step, error: result.error };
      case 'ignored':
        return { kind: 'prompt', step: current.step };
    }
  }

  async selectCategory(userId: number, index: number): Promise<WizardReply> {
    const current = this.state(userId);
    const result = acceptCategory(current, index);
    if (result.kind === 'ignored') {
      return { kind: 'not_active' };
    }
    if (result.kind === 'invalid') {
      return { kind: 'invalid', step: 'awaiting_category', error: result.error };
    }

    // Re-checked here: the day may have rolled over or other ads landed since start().
    const quota = await this.checkQuota(userId);
    if (quota) {
      this.sessions.clear(userId);
      return quota;
    }

    const createdAt = this.now();
    const ad = await this.store.createAd(
      { user_id: userId, ...result.draft },
      addDays(createdAt, this.adExpiryDays),
    );
    this.sessions.clear(userId);
    console.log(`[wizard] Ad ${ad.id} created by ${userId} (${ad.category})`);

    try {
      await this.listener.notifyAdminsNewAd(ad);
    } catch (err) {
      console.error(`[wizard] Admin notification for ad ${ad.id} failed:`, err);
    }

    return { kind: 'created', ad };
  }

  cancel(userId: number): WizardReply {
    if (!this.isActive(userId)) {
      return { kind: 'not_active' };
    }
    this.sessions.clear(userId);
    return { kind: 'cancelled' };
  }

  private async checkQuota(userId: number): Promise<WizardReply | null> {
    const [count, limit] = await Promise.all([this.countToday(userId), this.dailyLimit()]);
    return count >= limit ? { kind: 'quota_exceeded', count, limit } : null;
  }
}

function activeStep(state: WizardState): ActiveStep {
  // acceptText never advances back to idle.
  return state.step === 'idle' ? 'awaiting_title' : state.step;
}
