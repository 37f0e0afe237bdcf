import { Bot } from 'grammy';
import { createAppContext, startHousekeeping } from './app.js';
import { registerHandlers, startBot } from './bot/index.js';
import { GrammyMessenger } from './bot/messenger.js';
import { startRetentionJob } from './bot/retention.js';
import { loadEnv } from './config/env.js';
import { checkConnection, createPool } from './db/index.js';
import { PgStore } from './db/queries.js';
import { bootstrapSuperadmin } from './moderation/roles.js';

const HOUSEKEEPING_INTERVAL_MS = 5 * 60 * 1000;

async function main(): Promise<void> {
  console.log('[app] Starting job board bot...');
  const env = loadEnv();

  const pool = createPool(env);
  await checkConnection(pool);
  const store = new PgStore(pool);
  await bootstrapSuperadmin(store, env.SUPER_ADMIN_ID);

  const bot = new Bot(env.BOT_TOKEN);
  const app = createAppContext({ env, store, messenger: new GrammyMessenger(bot.api) });
  registerHandlers(bot, app);

  const stopRetention = startRetentionJob(store, { intervalMs: env.RETENTION_SWEEP_HOURS * 3_600_000 });
  const stopHousekeeping = startHousekeeping(app, HOUSEKEEPING_INTERVAL_MS);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.log(`[app] ${signal} received, shutting down`);
    stopRetention();
    stopHousekeeping();
    await bot.stop();
    await store.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('[app] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await startBot(bot);
}

main().catch((err) => {
  console.error('[app] Fatal error:', err);
  process.exit(1);
});
