import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
  CHANNEL_ID: z.string().min(1, 'CHANNEL_ID is required'),
  DATABASE_URL: z.string().url(),
  SUPER_ADMIN_ID: z.coerce.number().int().positive(),
  MAX_DAILY_ADS: z.coerce.number().int().positive().default(3),
  AD_EXPIRY_DAYS: z.coerce.number().int().positive().default(7),
  TITLE_MIN_LENGTH: z.coerce.number().int().positive().default(5),
  TITLE_MAX_LENGTH: z.coerce.number().int().positive().default(100),
  DESCRIPTION_MIN_LENGTH: z.coerce.number().int().positive().default(10),
  DESCRIPTION_MAX_LENGTH: z.coerce.number().int().positive().default(1000),
  CONTACT_MIN_LENGTH: z.coerce.number().int().positive().default(5),
  CONTACT_MAX_LENGTH: z.coerce.number().int().positive().default(50),
  STRICT_CONTACT: booleanFlag,
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  RETENTION_SWEEP_HOURS: z.coerce.number().positive().default(24),
  BROADCAST_DELAY_MS: z.coerce.number().int().nonnegative().default(50),
  WIZARD_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
});

export type Env = z.infer<typeof envSchema>;

export interface FieldBounds {
  min: number;
  max: number;
}

export type EditableField = 'title' | 'description' | 'contact';

export type FieldLimits = Record<EditableField, FieldBounds>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export function fieldLimits(env: Env): FieldLimits {
  return {
    title: { min: env.TITLE_MIN_LENGTH, max: env.TITLE_MAX_LENGTH },
    description: { min: env.DESCRIPTION_MIN_LENGTH, max: env.DESCRIPTION_MAX_LENGTH },
    contact: { min: env.CONTACT_MIN_LENGTH, max: env.CONTACT_MAX_LENGTH },
  };
}
