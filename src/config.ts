import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Classification and ranking constants. Fixed for the running process; a
 * TrendClassifier can be given its own copy.
 */
export const TREND_THRESHOLDS = {
  /** tokens ranked into classification */
  rankLimit: 30,
  /** tokens retained as the next cycle's baseline */
  stateLimit: 100,
  /** a ranked token below this count never alerts */
  minCount: 2,
  /** count needed for a token absent from the baseline */
  newMinCount: 3,
  /** relative increase over the baseline, in percent */
  spikePercent: 50,
} as const;

export type TrendThresholds = { readonly [K in keyof typeof TREND_THRESHOLDS]: number };

export const SUMMARY_LIMIT = 10;
export const RECENT_TRENDS_LIMIT = 20;
export const HOT_COUNT_THRESHOLD = 10;

const EnvSchema = z.object({
  SUBREDDITS: z.string().default('all,popular'),
  CYCLE_INTERVAL_SECONDS: z.coerce.number().positive().default(600),
  ERROR_BACKOFF_SECONDS: z.coerce.number().positive().default(60),
  FETCH_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  REDDIT_USER_AGENT: z.string().min(1).default('wordpulse/0.1.0'),
  REDDIT_CLIENT_ID: z.string().optional(),
  REDDIT_CLIENT_SECRET: z.string().optional(),
  REDDIT_USERNAME: z.string().optional(),
  REDDIT_PASSWORD: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(5000),
});

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
}

export interface MonitorConfig {
  sourceIds: string[];
  cycleIntervalMs: number;
  errorBackoffMs: number;
  fetchDelayMs: number;
  fetchTimeoutMs: number;
  userAgent: string;
  credentials: RedditCredentials | null;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join('.')} (${issue.message})`);
    throw new ConfigError(`Invalid configuration: ${fields.join(', ')}`);
  }

  const e = parsed.data;
  const sourceIds = e.SUBREDDITS.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  if (sourceIds.length === 0) {
    throw new ConfigError('Invalid configuration: SUBREDDITS names no subreddit');
  }

  // OAuth only when every credential is present
  const credentials =
    e.REDDIT_CLIENT_ID && e.REDDIT_CLIENT_SECRET && e.REDDIT_USERNAME && e.REDDIT_PASSWORD
      ? {
          clientId: e.REDDIT_CLIENT_ID,
          clientSecret: e.REDDIT_CLIENT_SECRET,
          username: e.REDDIT_USERNAME,
          password: e.REDDIT_PASSWORD,
        }
      : null;

  return {
    sourceIds,
    cycleIntervalMs: e.CYCLE_INTERVAL_SECONDS * 1000,
    errorBackoffMs: e.ERROR_BACKOFF_SECONDS * 1000,
    fetchDelayMs: e.FETCH_DELAY_MS,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    userAgent: e.REDDIT_USER_AGENT,
    credentials,
    port: e.PORT,
  };
}
