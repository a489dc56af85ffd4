import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Value helpers ─────────────────────────────────────────────────────────────

/**
 * Trim a value and drop one pair of surrounding quotes. Container env files
 * frequently pass `KEY="value"` through verbatim.
 */
export function unquote(value: string): string {
  const trimmed = value.trim();
  const match = trimmed.match(/^(["'])(.*)\1$/s);
  return match ? (match[2] ?? '') : trimmed;
}

const TRUTHY = ['true', '1', 'yes', 'on'] as const;
const FALSY = ['false', '0', 'no', 'off'] as const;

/** String → boolean, accepting the usual on/off spellings (case-insensitive). */
export const booleanish = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum([...TRUTHY, ...FALSY]))
  .transform((v) => TRUTHY.some((t) => t === v));

const cleaned = (v: unknown) => {
  if (typeof v !== 'string') return v;
  const u = unquote(v);
  return u === '' ? undefined : u;
};

const optionalText = z.preprocess(cleaned, z.string().optional());
const optionalUrl = z.preprocess(cleaned, z.string().url().optional());
const textWithDefault = (fallback: string) => z.preprocess(cleaned, z.string().default(fallback));
const flag = (fallback: boolean) =>
  z.preprocess(cleaned, booleanish.optional()).transform((v) => v ?? fallback);

// ── Env Schema ────────────────────────────────────────────────────────────────
// Process-level settings. Build settings (durations, folders, toggles) live in
// settings/keys.ts and can be overridden at runtime from chat.

const EnvSchema = z.object({
  // Logging
  LOG_LEVEL:                  z.preprocess(cleaned, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  LOG_FORMAT:                 z.preprocess(cleaned, z.enum(['text', 'json']).default('text')),

  // Persistent state
  SETTINGS_DB_PATH:           textWithDefault('/data/settings.db'),
  TEMP_DIR:                   textWithDefault('/tmp/slideshow-builder'),

  // Liveness
  HEARTBEAT_FILE:             textWithDefault('/tmp/heartbeat'),
  HEARTBEAT_INTERVAL_SECONDS: z.preprocess(cleaned, z.coerce.number().int().positive().default(60)),

  // Scheduling
  CRON_TIMEZONE:              optionalText,

  // Matrix chat
  MATRIX_HOMESERVER:          optionalUrl,
  MATRIX_ACCESS_TOKEN:        optionalText,
  MATRIX_ROOM_ID:             optionalText,
  MATRIX_USER_ID:             optionalText,
  MATRIX_ALLOWED_USERS:       textWithDefault('').transform((v) =>
    v.split(',').map((s) => s.trim()).filter((s) => s.length > 0),
  ),

  // Nextcloud (WebDAV)
  NEXTCLOUD_URL:              optionalUrl,
  NEXTCLOUD_USERNAME:         optionalText,
  NEXTCLOUD_PASSWORD:         optionalText,
  NEXTCLOUD_INSECURE_SSL:     flag(false),

  // ntfy push notifications
  NTFY_URL:                   textWithDefault('https://ntfy.sh').pipe(z.string().url()),
  NTFY_TOKEN:                 optionalText,

  // Media toolchain
  FFMPEG_PATH:                textWithDefault('ffmpeg'),
  FFPROBE_PATH:               textWithDefault('ffprobe'),
  TIMER_FONT_FILE:            optionalText,
});

export type Env = z.infer<typeof EnvSchema>;

/** Validate an environment record. Throws listing every offending variable. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export const env = loadEnv();

// ── Video constants ───────────────────────────────────────────────────────────

export const VIDEO_SIZE = {
  width:  1920,
  height: 1080,
} as const;

export const AUDIO_SAMPLE_RATE = 44_100;

// ── Transport policy ──────────────────────────────────────────────────────────

export const RETRY_POLICY = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
} as const;

export const HTTP_TIMEOUT_MS = 30_000;
export const MATRIX_SYNC_TIMEOUT_MS = 30_000;
export const MATRIX_RETRY_DELAY_MS = 5_000;
