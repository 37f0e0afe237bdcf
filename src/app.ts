import { fieldLimits, type EditableField, type Env, type FieldLimits } from './config/env.js';
import type { Store } from './db/store.js';
import { broadcastToAll } from './bot/broadcast.js';
import type { Messenger } from './bot/messenger.js';
import { Notifier } from './bot/notifications.js';
import { ModerationService } from './moderation/index.js';
import { RoleAuthority } from './moderation/roles.js';
import { RateLimiter } from './shared/rateLimiter.js';
import { SubmissionWizard } from './wizard/index.js';
import type { WizardState } from './wizard/machine.js';
import { MemorySessionStore } from './wizard/session.js';

/** A free-text answer an admin owes the bot after pressing a button. */
export type AdminPrompt =
  | { kind: 'edit_field'; adId: number; field: EditableField }
  | { kind: 'new_admin_id' }
  | { kind: 'broadcast_text' }
  | { kind: 'broadcast_confirm'; text: string };

export interface AppContext {
  env: Env;
  limits: FieldLimits;
  store: Store;
  messenger: Messenger;
  notifier: Notifier;
  roles: RoleAuthority;
  rateLimiter: RateLimiter;
  wizardSessions: MemorySessionStore<WizardState>;
  adminPrompts: MemorySessionStore<AdminPrompt>;
  wizard: SubmissionWizard;
  moderation: ModerationService;
}

export interface AppDependencies {
  env: Env;
  store: Store;
  messenger: Messenger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build every service from explicit dependencies. Nothing here touches the
 * network or the database until a handler calls into it.
 */
export function createAppContext(deps: AppDependencies): AppContext {
  const { env, store, messenger } = deps;
  const now = deps.now ?? (() => new Date());
  const clock = (): number => now().getTime();
  const limits = fieldLimits(env);
  const sessionTtlMs = env.WIZARD_TIMEOUT_MINUTES * 60_000;

  const notifier = new Notifier(messenger, store, env.CHANNEL_ID);
  const roles = new RoleAuthority(store);
  const rateLimiter = new RateLimiter({
    maxActions: env.RATE_LIMIT_MAX,
    windowMs: env.RATE_LIMIT_WINDOW_SECONDS * 1000,
    now: clock,
  });
  const wizardSessions = new MemorySessionStore<WizardState>(sessionTtlMs, clock);
  const adminPrompts = new MemorySessionStore<AdminPrompt>(sessionTtlMs, clock);

  const wizard = new SubmissionWizard({
    store,
    sessions: wizardSessions,
    listener: notifier,
    rules: { limits, strictContact: env.STRICT_CONTACT },
    maxDailyAds: env.MAX_DAILY_ADS,
    adExpiryDays: env.AD_EXPIRY_DAYS,
    now,
  });

  const moderation = new ModerationService({
    store,
    roles,
    effects: notifier,
    broadcaster: (text) => broadcastToAll(store, messenger, text, {
      delayMs: env.BROADCAST_DELAY_MS,
      sleep: deps.sleep,
    }),
    limits,
    now,
  });

  return {
    env,
    limits,
    store,
    messenger,
    notifier,
    roles,
    rateLimiter,
    wizardSessions,
    adminPrompts,
    wizard,
    moderation,
  };
}

/** Periodically drop lapsed sessions and rate-limit buckets. Returns a stop function. */
export function startHousekeeping(app: AppContext, intervalMs: number): () => void {
  const interval = setInterval(() => {
    const dropped = app.wizardSessions.sweep() + app.adminPrompts.sweep();
    app.rateLimiter.prune();
    if (dropped > 0) {
      console.log(`[app] Dropped ${dropped} stale session(s)`);
    }
  }, intervalMs);
  return () => clearInterval(interval);
}
