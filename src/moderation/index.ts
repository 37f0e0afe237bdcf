import type { EditableField, FieldLimits } from '../config/env.js';
import { utcDayStart, type Store } from '../db/store.js';
import { NotFoundError, ValidationError } from '../shared/errors.js';
import type { Ad, AdFieldUpdate, AdStatus, Statistics, User } from '../shared/types.js';
import { validateField } from '../shared/validation.js';
import type { BroadcastResult } from '../bot/broadcast.js';
import type { RoleAuthority } from './roles.js';
import { transitionAd } from './transitions.js';

/** Side effects of moderation. Implementations never throw. */
export interface ModerationEffects {
  publishToChannel(ad: Ad): Promise<unknown>;
  notifyOwnerApproved(ad: Ad): Promise<unknown>;
  notifyOwnerRejected(ad: Ad): Promise<unknown>;
  notifyOwnerEdited(ad: Ad, field: EditableField): Promise<unknown>;
  notifyOwnerDeleted(ad: Ad): Promise<unknown>;
  notifyPromoted(telegramId: number): Promise<unknown>;
  notifyDemoted(telegramId: number): Promise<unknown>;
}

export type Broadcaster = (text: string) => Promise<BroadcastResult>;

export interface BroadcastPreview {
  text: string;
  recipients: number;
}

export type SettingValidator = (value: string) => boolean;

/** Settings a superadmin may change at runtime, with their validators. */
export const EDITABLE_SETTINGS: Readonly<Partial<Record<string, SettingValidator>>> = {
  max_daily_ads: (value) => /^\d+$/.test(value) && Number(value) > 0 && Number(value) <= 100,
};

export interface ModerationServiceOptions {
  store: Store;
  roles: RoleAuthority;
  effects: ModerationEffects;
  broadcaster: Broadcaster;
  limits: FieldLimits;
  now?: () => Date;
}

/**
 * Every privileged operation. Each one checks the actor's role first, then the
 * target, and only then mutates. Side effects run after the write has committed.
 */
export class ModerationService {
  private readonly store: Store;
  private readonly roles: RoleAuthority;
  private readonly effects: ModerationEffects;
  private readonly broadcaster: Broadcaster;
  private readonly limits: FieldLimits;
  private readonly now: () => Date;

  constructor(options: ModerationServiceOptions) {
    this.store = options.store;
    this.roles = options.roles;
    this.effects = options.effects;
    this.broadcaster = options.broadcaster;
    this.limits = options.limits;
    this.now = options.now ?? (() => new Date());
  }

  // ── Listings ─────────────────────────────────────────────────────────

  async getAd(actorId: number, adId: number): Promise<Ad> {
    await this.roles.requireAdmin(actorId);
    return this.loadAd(adId);
  }

  async approve(actorId: number, adId: number): Promise<Ad> {
    await this.roles.requireAdmin(actorId);
    const ad = await this.loadAd(adId);
    const approved = await transitionAd(this.store, ad, 'approved', actorId);
    console.log(`[moderation] Ad ${adId} approved by ${actorId}`);

    await this.effects.publishToChannel(approved);
    await this.effects.notifyOwnerApproved(approved);
    return approved;
  }

  async reject(actorId: number, adId: number): Promise<Ad> {
    await this.roles.requireAdmin(actorId);
    const ad = await this.loadAd(adId);
    const rejected = await transitionAd(this.store, ad, 'rejected');
    console.log(`[moderation] Ad ${adId} rejected by ${actorId}`);

    await this.effects.notifyOwnerRejected(rejected);
    return rejected;
  }

  /** Overwrite one text field. Status is left as it is. */
  async editField(actorId: number, adId: number, field: EditableField, value: string): Promise<Ad> {
    await this.roles.requireAdmin(actorId);
    await this.loadAd(adId);
    const clean = validateField(field, value, this.limits);

    const fields: AdFieldUpdate = {};
    fields[field] = clean;
    const updated = await this.store.updateAd(adId, fields);
    if (!updated) {
      throw new NotFoundError('ad', adId);
    }
    console.log(`[moderation] Ad ${adId} ${field} edited by ${actorId}`);

    await this.effects.notifyOwnerEdited(updated, field);
    return updated;
  }

  /** First half of the two-step delete: checks rights and existence, changes nothing. */
  async prepareDelete(actorId: number, adId: number): Promise<Ad> {
    await this.roles.requireAdmin(actorId);
    return this.loadAd(adId);
  }

  async deleteAd(actorId: number, adId: number): Promise<Ad> {
    await this.roles.requireAdmin(actorId);
    const deleted = await this.store.deleteAd(adId);
    if (!deleted) {
      throw new NotFoundError('ad', adId);
    }
    console.log(`[moderation] Ad ${adId} deleted by ${actorId}`);

    await this.effects.notifyOwnerDeleted(deleted);
    return deleted;
  }

  async listByStatus(actorId: number, status: AdStatus, limit?: number): Promise<Ad[]> {
    await this.roles.requireAdmin(actorId);
    return this.store.getAdsByStatus(status, limit);
  }

  async listAll(actorId: number, limit?: number): Promise<Ad[]> {
    await this.roles.requireAdmin(actorId);
    return this.store.getAllAds(limit);
  }

  async statistics(actorId: number): Promise<Statistics> {
    await this.roles.requireAdmin(actorId);
    return this.store.getStatistics(utcDayStart(this.now()));
  }

  // ── Admin management ─────────────────────────────────────────────────

  async listAdmins(actorId: number): Promise<User[]> {
    await this.roles.requireSuperadmin(actorId);
    return this.store.getAdmins();
  }

  async promoteAdmin(actorId: number, targetId: number): Promise<User> {
    await this.roles.requireSuperadmin(actorId);
    const target = await this.loadUser(targetId);
    if (target.role !== 'user') {
      throw new ValidationError('role', `user ${targetId} is already ${target.role}`);
    }

    const updated = await this.store.updateUserRole(targetId, 'admin');
    if (!updated) {
      throw new NotFoundError('user', targetId);
    }
    console.log(`[moderation] User ${targetId} promoted to admin by ${actorId}`);

    await this.effects.notifyPromoted(targetId);
    return updated;
  }

  async demoteAdmin(actorId: number, targetId: number): Promise<User> {
    await this.roles.requireSuperadmin(actorId);
    const target = await this.loadUser(targetId);
    if (target.role !== 'admin') {
      throw new ValidationError('role', `user ${targetId} is ${target.role}, only admins can be demoted`);
    }

    const updated = await this.store.updateUserRole(targetId, 'user');
    if (!updated) {
      throw new NotFoundError('user', targetId);
    }
    console.log(`[moderation] Admin ${targetId} demoted by ${actorId}`);

    await this.effects.notifyDemoted(targetId);
    return updated;
  }

  async setBlocked(actorId: number, targetId: number, blocked: boolean): Promise<User> {
    await this.roles.requireSuperadmin(actorId);
    const target = await this.loadUser(targetId);
    if (target.role === 'superadmin') {
      throw new ValidationError('role', 'a superadmin cannot be blocked');
    }

    const updated = await this.store.setUserBlocked(targetId, blocked);
    if (!updated) {
      throw new NotFoundError('user', targetId);
    }
    console.log(`[moderation] User ${targetId} ${blocked ? 'blocked' : 'unblocked'} by ${actorId}`);
    return updated;
  }

  // ── Broadcast ────────────────────────────────────────────────────────

  /** First half of the two-step broadcast: validates and counts recipients. */
  async prepareBroadcast(actorId: number, text: string): Promise<BroadcastPreview> {
    await this.roles.requireSuperadmin(actorId);
    const clean = requireBroadcastText(text);
    const users = await this.store.getAllUsers();
    return { text: clean, recipients: users.length };
  }

  async broadcast(actorId: number, text: string): Promise<BroadcastResult> {
    await this.roles.requireSuperadmin(actorId);
    const clean = requireBroadcastText(text);
    console.log(`[moderation] Broadcast started by ${actorId}`);
    return this.broadcaster(clean);
  }

  // ── Settings ─────────────────────────────────────────────────────────

  async getSettings(actorId: number): Promise<Record<string, string | null>> {
    await this.roles.requireSuperadmin(actorId);
    const entries = await Promise.all(
      Object.keys(EDITABLE_SETTINGS).map(async (key) => [key, await this.store.getSetting(key)] as const),
    );
    return Object.fromEntries(entries);
  }

  async setSetting(actorId: number, key: string, value: string): Promise<void> {
    await this.roles.requireSuperadmin(actorId);
    const validate = EDITABLE_SETTINGS[key];
    if (!validate) {
      throw new ValidationError('key', `unknown setting ${key}`);
    }
    const trimmed = value.trim();
    if (!validate(trimmed)) {
      throw new ValidationError(key, `invalid value ${trimmed}`);
    }
    await this.store.setSetting(key, trimmed);
    console.log(`[moderation] Setting ${key}=${trimmed} by ${actorId}`);
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  private async loadAd(adId: number): Promise<Ad> {
    const ad = await this.store.getAd(adId);
    if (!ad) {
      throw new NotFoundError('ad', adId);
    }
    return ad;
  }

  private async loadUser(telegramId: number): Promise<User> {
    const user = await this.store.getUser(telegramId);
    if (!user) {
      throw new NotFoundError('user', telegramId);
    }
    return user;
  }
}

function requireBroadcastText(text: string): string {
  const clean = text.trim();
  if (clean.length === 0) {
    throw new ValidationError('text', 'broadcast message must not be empty');
  }
  return clean;
}
