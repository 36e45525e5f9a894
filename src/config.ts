import { z } from 'zod';
import { ConfigError } from './errors.js';

export const MARKET_CATEGORY = 'basketball' as const;
export const MAX_MARKETS = 10;

export type MarketCategory = typeof MARKET_CATEGORY;
export type HitDirection = 'above' | 'below' | 'implied';

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

export const nodeEnvSchema = z.enum(['development', 'production', 'test']).default('development');
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info');

export type LogLevel = z.infer<typeof logLevelSchema>;

export const envSchema = z.object({
  NODE_ENV: nodeEnvSchema,
  LOG_LEVEL: logLevelSchema,

  ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),

  KALSHI_BASE_URL: z.string().url().default('https://api.elections.kalshi.com/trade-api/v2'),
  KALSHI_SERIES_TICKER: z.string().min(1).default('NBA'),
  KALSHI_ACCESS_KEY_ID: z.string().optional(),
  KALSHI_PRIVATE_KEY_PATH: z.string().optional(),
  KALSHI_OFFLINE: flag,

  WATCHER_POLL_INTERVAL_SEC: z.coerce.number().min(0).max(3600).default(30),
  WATCHER_TIMEOUT_SEC: z.coerce.number().min(0).default(300),
  WATCHER_MAX_TICKS: z.coerce.number().int().min(0).default(3),
  WATCHER_MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().min(1).default(3),
  WATCHER_HIT_DIRECTION: z.enum(['above', 'below', 'implied']).default('above'),

  DEFAULT_BET_AMOUNT: z.coerce.number().min(0).default(10),
  OUTPUT_DIR: z.string().min(1).default('data'),
  SNAPSHOT_WINDOW_MINUTES: z.coerce.number().int().min(1).default(120)
});

export type Env = z.infer<typeof envSchema>;

export interface KalshiConfig {
  readonly baseUrl: string;
  readonly seriesTicker: string;
  readonly accessKeyId: string | null;
  readonly privateKeyPath: string | null;
  readonly offline: boolean;
}

export interface WatcherConfig {
  readonly pollIntervalMs: number;
  readonly timeoutMs: number;
  readonly maxTicks: number;
  readonly maxConsecutiveFailures: number;
  readonly hitDirection: HitDirection;
}

export interface AppConfig {
  readonly category: MarketCategory;
  readonly maxMarkets: number;
  readonly model: string;
  readonly kalshi: KalshiConfig;
  readonly watcher: WatcherConfig;
  readonly betAmount: number;
  readonly outputDir: string;
  readonly betLogPath: string;
  readonly runLogPath: string;
  readonly snapshotDbPath: string;
  readonly snapshotWindowMinutes: number;
}

function blankToNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment variables: ${issues}`);
  }

  const e = result.data;
  const outputDir = e.OUTPUT_DIR.replace(/\/+$/, '');

  return Object.freeze({
    category: MARKET_CATEGORY,
    maxMarkets: MAX_MARKETS,
    model: e.ANTHROPIC_MODEL,
    kalshi: Object.freeze({
      baseUrl: e.KALSHI_BASE_URL.replace(/\/+$/, ''),
      seriesTicker: e.KALSHI_SERIES_TICKER,
      accessKeyId: blankToNull(e.KALSHI_ACCESS_KEY_ID),
      privateKeyPath: blankToNull(e.KALSHI_PRIVATE_KEY_PATH),
      offline: e.KALSHI_OFFLINE
    }),
    watcher: Object.freeze({
      pollIntervalMs: e.WATCHER_POLL_INTERVAL_SEC * 1000,
      timeoutMs: e.WATCHER_TIMEOUT_SEC * 1000,
      maxTicks: e.WATCHER_MAX_TICKS,
      maxConsecutiveFailures: e.WATCHER_MAX_CONSECUTIVE_FAILURES,
      hitDirection: e.WATCHER_HIT_DIRECTION
    }),
    betAmount: e.DEFAULT_BET_AMOUNT,
    outputDir,
    betLogPath: `${outputDir}/paper_bets.jsonl`,
    runLogPath: `${outputDir}/run_log.jsonl`,
    snapshotDbPath: `${outputDir}/snapshots.db`,
    snapshotWindowMinutes: e.SNAPSHOT_WINDOW_MINUTES
  });
}
