import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

export const APP_VERSION = '1.0.0';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  EBAY_CLIENT_ID: z.string().min(1),
  EBAY_CLIENT_SECRET: z.string().min(1),
  EBAY_API_BASE: z.string().url().default('https://api.ebay.com'),
  EBAY_MARKETPLACE_ID: z.string().default('EBAY_US'),
  EBAY_CAMPAIGN_ID: z.string().optional(),
  DATA_DIR: z.string().default('./data'),
  SEARCHES_FILE: z.string().default('./searches.json'),
  SCAN_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  ADAPTIVE_PACING: flag.default('true'),
  SLEEP_TICK_SECONDS: z.coerce.number().int().positive().default(30),
  DAILY_CALL_LIMIT: z.coerce.number().int().positive().default(4500),
  SEARCH_RESULTS_LIMIT: z.coerce.number().int().min(1).max(200).default(150),
  PRICE_HEADROOM_RATIO: z.coerce.number().min(0).max(1).default(0.15),
  SEEN_MAX_AGE_DAYS: z.coerce.number().positive().default(14),
  QUOTA_SYNC_INTERVAL_MINUTES: z.coerce.number().positive().default(30),
  QUOTA_ANOMALY_WINDOW_MINUTES: z.coerce.number().positive().default(10),
  QUOTA_ANOMALY_RETRY_SECONDS: z.coerce.number().int().positive().default(120),
  PROVIDER_TIME_ZONE: z.string().default('America/Los_Angeles'),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError('Invalid environment configuration', issues);
  }
  return parsed.data;
}

export interface StatePaths {
  quota: string;
  token: string;
  seen: string;
  heartbeat: string;
  shutdown: string;
}

export function statePaths(dataDir: string): StatePaths {
  const dir = path.resolve(dataDir);
  return {
    quota: path.join(dir, 'quota.json'),
    token: path.join(dir, 'token.json'),
    seen: path.join(dir, 'seen.json'),
    heartbeat: path.join(dir, '.heartbeat'),
    shutdown: path.join(dir, '.shutdown_requested'),
  };
}
