import path from 'path';
import { z } from 'zod';
import { DownloadStrategy, DownloaderConfig } from '../types';

export const DEFAULT_COOKIE_BROWSERS = [
  'edge',
  'chrome',
  'firefox',
  'brave',
  'opera',
  'vivaldi',
];

// Tried in order until one produces a file. Clients that serve complete
// formats without fragment failures come first.
export const DEFAULT_DOWNLOAD_STRATEGIES: DownloadStrategy[] = [
  { name: 'cookies-desktop-clients', playerClients: ['tv_downgraded', 'web', 'web_safari'], useCookies: true },
  { name: 'cookies-mobile-clients', playerClients: ['ios_downgraded', 'android_vr', 'web'], useCookies: true },
  { name: 'no-cookies-mobile', playerClients: ['ios_downgraded', 'android_vr'], useCookies: false },
  { name: 'no-cookies-default', playerClients: ['android', 'web'], useCookies: false },
];

export const DEFAULT_UNRELIABLE_PROTOCOLS = [
  'm3u8',
  'm3u8_native',
  'http_dash_segments',
];

const intFromEnv = (fallback: number, min: number, max?: number) => {
  const schema = max === undefined
    ? z.coerce.number().int().min(min)
    : z.coerce.number().int().min(min).max(max);
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? String(fallback) : value))
    .pipe(schema);
};

const listFromEnv = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const items = (value || '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
      return items.length > 0 ? items : [...fallback];
    });

const StrategySchema = z.object({
  name: z.string().min(1),
  playerClients: z.array(z.string().min(1)).min(1),
  useCookies: z.boolean(),
});

const strategiesFromEnv = z
  .string()
  .optional()
  .transform((value, ctx): unknown => {
    if (value === undefined || value.trim() === '') {
      return DEFAULT_DOWNLOAD_STRATEGIES;
    }
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a JSON array of strategies' });
      return z.NEVER;
    }
  })
  .pipe(z.array(StrategySchema).min(1));

const EnvSchema = z.object({
  BASE_DIR: z.string().optional(),
  OUTPUT_DIR: z.string().optional(),
  SYSTEM_DIR: z.string().optional(),
  MAX_CONCURRENT_DOWNLOADS: intFromEnv(2, 1, 4),
  RETRY_ATTEMPTS: intFromEnv(2, 0, 10),
  RETRY_DELAY_MS: intFromEnv(1000, 0),
  DOWNLOAD_TIMEOUT: intFromEnv(1800000, 0), // 30 min per attempt
  CANCEL_GRACE_MS: intFromEnv(5000, 0),
  COOKIE_BROWSERS: listFromEnv(DEFAULT_COOKIE_BROWSERS),
  DOWNLOAD_STRATEGIES: strategiesFromEnv,
  UNRELIABLE_PROTOCOLS: listFromEnv(DEFAULT_UNRELIABLE_PROTOCOLS),
  YTDLP_PATH: z.string().optional(),
  FFMPEG_PATH: z.string().optional(),
  MAX_TITLE_BYTES: intFromEnv(200, 16, 255),
  MIN_OUTPUT_BYTES: intFromEnv(10000, 0),
  LOG_LEVEL: z.string().optional(),
  SENTRY_DSN: z.string().optional(),
});

/**
 * Load configuration from environment variables
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): DownloaderConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join('.') : 'unknown';
    throw new Error(
      `Invalid environment variable ${variable}: ${issue ? issue.message : 'invalid value'}`,
    );
  }

  const values = parsed.data;
  const baseDirectory = path.resolve(values.BASE_DIR || process.cwd());

  return {
    baseDirectory,
    outputDirectory: path.resolve(baseDirectory, values.OUTPUT_DIR || 'output'),
    systemDirectory: path.resolve(baseDirectory, values.SYSTEM_DIR || 'system'),
    maxConcurrentDownloads: values.MAX_CONCURRENT_DOWNLOADS,
    retryAttempts: values.RETRY_ATTEMPTS,
    retryDelayMs: values.RETRY_DELAY_MS,
    downloadTimeout: values.DOWNLOAD_TIMEOUT,
    cancelGraceMs: values.CANCEL_GRACE_MS,
    cookieBrowsers: values.COOKIE_BROWSERS,
    strategies: values.DOWNLOAD_STRATEGIES,
    unreliableProtocols: values.UNRELIABLE_PROTOCOLS,
    ytDlpPath: values.YTDLP_PATH || 'yt-dlp',
    ffmpegPath: values.FFMPEG_PATH || 'ffmpeg',
    maxTitleBytes: values.MAX_TITLE_BYTES,
    minOutputBytes: values.MIN_OUTPUT_BYTES,
    logLevel: values.LOG_LEVEL || 'info',
    sentryDsn: values.SENTRY_DSN || undefined,
  };
}
