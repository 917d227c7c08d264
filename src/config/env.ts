import { z } from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  PORT: z.coerce.number().default(4001),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Alternative keyword/threshold rule set (JSON). Falls back to the bundled default.
  RULE_SET_PATH: z.string().optional(),

  // Error reporting is only initialised when a DSN is provided.
  SENTRY_DSN: z.string().url().optional(),

  // Upper bound on lots accepted by POST /lots/batch
  BATCH_MAX_LOTS: z.coerce.number().int().positive().default(5000),
  ENABLE_RATE_LIMIT: z.string().optional().default('true'),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const config: AppConfig = parsed.data;
