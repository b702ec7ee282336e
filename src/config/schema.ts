import { z } from 'zod';

export const envSchema = z.object({
  DATABASE_URL: z.string(),
  API_TOKEN: z.string().min(16),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  APP_HOST: z.string().url().default('http://localhost:3000'),

  // Scan engine (browser automation service)
  SCAN_ENGINE_URL: z.string().url(),
  SCAN_ENGINE_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),

  // Pipeline tunables
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  SLOW_PAGE_THRESHOLD_MS: z.coerce.number().int().positive().default(5_000),
  RESCAN_DELAY_MINUTES: z.coerce.number().positive().default(30),
  SCAN_REFRESH_HOURS: z.coerce.number().positive().default(24),
  DEEP_SCAN_WEEKDAY: z.coerce.number().int().min(0).max(6).default(1),
  SCAN_CONCURRENCY: z.coerce.number().int().positive().default(2),
  SCAN_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  SWEEP_CRON: z.string().default('0 6 * * *'),

  // AI confirmation; every AI step is skipped without a key
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),

  // Notification channels
  EMAIL_API_URL: z.string().url().default('https://api.resend.com/emails'),
  EMAIL_API_KEY: z.string().optional(),
  ALERT_FROM_EMAIL: z.string().default('alerts@pdp-watch.local'),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment map. Throws a ZodError listing every
 * missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  return envSchema.parse(env);
}
