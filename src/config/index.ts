import { resolve, join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { isValidTimeZone } from '../utils/time.js';

export const DEFAULT_MEDIA_HOSTS = [
  'youtube.com',
  'youtu.be',
  'vimeo.com',
  'soundcloud.com',
  'twitch.tv',
  'dailymotion.com',
  'bandcamp.com',
  'tiktok.com',
];

const configSchema = z.object({
  // Server
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),

  // Storage
  notesDir: z.string().min(1).default('./notes'),
  attachmentsDir: z.string().min(1).optional(),
  timezone: z.string().refine(isValidTimeZone, 'must be an IANA timezone').default('UTC'),
  uploadMaxBytes: z.coerce.number().int().positive().default(500 * 1024 * 1024),

  // Capture
  captureConcurrency: z.coerce.number().int().positive().default(2),
  captureMaxAttempts: z.coerce.number().int().positive().default(3),
  captureBackoffMs: z.coerce.number().int().nonnegative().default(2000),
  captureBackoffMaxMs: z.coerce.number().int().nonnegative().default(60_000),
  pageCaptureTimeoutMs: z.coerce.number().int().positive().default(120_000),
  mediaCaptureTimeoutMs: z.coerce.number().int().positive().default(30 * 60_000),
  pageArchiverCommand: z.string().min(1).default('monolith {url} -o {dest}'),
  mediaDownloaderCommand: z.string().min(1).default('yt-dlp --no-playlist --no-part -f best -o {dest} {url}'),
  mediaHosts: z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((host) => host.trim().toLowerCase())
        .filter(Boolean)
    )
    .optional(),
  captureMode: z.enum(['all', 'marked']).default('all'),
  captureRetrySchedule: z.string().optional(), // cron expression; unset disables the sweep

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  shutdownGraceMs: z.coerce.number().int().nonnegative().default(10_000),
});

type ParsedConfig = z.infer<typeof configSchema>;

export type Config = Omit<ParsedConfig, 'attachmentsDir' | 'mediaHosts'> & {
  attachmentsDir: string;
  mediaHosts: string[];
};

export type CaptureMode = Config['captureMode'];

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    host: env('HOST'),
    port: env('PORT'),
    notesDir: env('NOTES_DIR'),
    attachmentsDir: env('ATTACHMENTS_DIR'),
    timezone: env('TIMEZONE'),
    uploadMaxBytes: env('UPLOAD_MAX_BYTES'),
    captureConcurrency: env('CAPTURE_CONCURRENCY'),
    captureMaxAttempts: env('CAPTURE_MAX_ATTEMPTS'),
    captureBackoffMs: env('CAPTURE_BACKOFF_MS'),
    captureBackoffMaxMs: env('CAPTURE_BACKOFF_MAX_MS'),
    pageCaptureTimeoutMs: env('PAGE_CAPTURE_TIMEOUT_MS'),
    mediaCaptureTimeoutMs: env('MEDIA_CAPTURE_TIMEOUT_MS'),
    pageArchiverCommand: env('PAGE_ARCHIVER_CMD'),
    mediaDownloaderCommand: env('MEDIA_DOWNLOADER_CMD'),
    mediaHosts: env('MEDIA_HOSTS'),
    captureMode: env('CAPTURE_MODE'),
    captureRetrySchedule: env('CAPTURE_RETRY_SCHEDULE'),
    logLevel: env('LOG_LEVEL'),
    shutdownGraceMs: env('SHUTDOWN_GRACE_MS'),
  };

  let parsed: ParsedConfig;
  try {
    parsed = configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }

  const notesDir = resolve(parsed.notesDir);
  return {
    ...parsed,
    notesDir,
    attachmentsDir: parsed.attachmentsDir ? resolve(parsed.attachmentsDir) : join(notesDir, 'attachments'),
    mediaHosts: parsed.mediaHosts ?? DEFAULT_MEDIA_HOSTS,
  };
}
