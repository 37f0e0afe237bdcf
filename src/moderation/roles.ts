import type { Store } from '../db/store.js';
import { AuthorizationError } from '../shared/errors.js';
import type { User, UserRole } from '../shared/types.js';

export function hasAdminRights(role: UserRole | null): boolean {
  return role === 'admin' || role === 'superadmin';
}

export function hasSuperadminRights(role: UserRole | null): boolean {
  return role === 'superadmin';
}

/**
 * Single place where a Telegram ID is turned into a permission tier.
 * A missing or blocked user resolves to no privileged role.
 */
export class RoleAuthority {
  constructor(private readonly store: Store) {}

  async resolveRole(telegramId: number): Promise<UserRole | null> {
    const user = await this.store.getUser(telegramId);
    if (!user) return null;
    if (user.is_blocked) return 'user';
    return user.role;
  }

  async isAdmin(telegramId: number): Promise<boolean> {
    return hasAdminRights(await this.resolveRole(telegramId));
  }

  async isSuperadmin(telegramId: number): Promise<boolean> {
    return hasSuperadminRights(await this.resolveRole(telegramId));
  }

  async requireAdmin(telegramId: number): Promise<void> {
    if (!(await this.isAdmin(telegramId))) {
      throw new AuthorizationError(telegramId, 'admin');
    }
  }

  async requireSuperadmin(telegramId: number): Promise<void> {
    if (!(await this.isSuperadmin(telegramId))) {
      throw new AuthorizationError(telegramId, 'superadmin');
    }
  }
}

/**
 * Seed the configured superadmin. Creates the record if missing and raises its
 * role if an earlier /start registered it as a plain user. Any other superadmin
 * left from a previous configuration drops to admin.
 */
export async function bootstrapSuperadmin(store: Store, telegramId: number): Promise<User> {
  for (const other of await store.getAdmins()) {
    if (other.role === 'superadmin' && other.telegram_id !== telegramId) {
      await store.updateUserRole(other.telegram_id, 'admin');
      console.log(`[roles] Former superadmin ${other.telegram_id} lowered to admin`);
    }
  }

  const existing = await store.getUser(telegramId);
  if (!existing) {
    const created = await store.createUser(telegramId, 'SuperAdmin', 'superadmin');
    console.log(`[roles] Superadmin ${telegramId} created`);
    return created;
  }
  if (existing.role === 'superadmin') {
    return existing;
  }
  const promoted = await store.updateUserRole(telegramId, 'superadmin');
  console.log(`[roles] User ${telegramId} raised to superadmin`);
  return promoted ?? existing;
}
