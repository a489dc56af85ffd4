/**
 * Build settings that can be changed at runtime from chat.
 *
 * Every value travels as a string (env var, SQLite row, chat argument) and is
 * converted by the key's schema. Defaults are stored as raw strings too, so a
 * default goes through exactly the same conversion as an override.
 */
import cron from 'node-cron';
import { z } from 'zod';
import { booleanish } from '../config.js';

// ── Value schemas ─────────────────────────────────────────────────────────────

const integer = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'must be a whole number')
    .transform(Number)
    .pipe(z.number().int().min(min, `must be at least ${min}`).max(max, `must be at most ${max}`));

const text = z.string().trim();

const source = z.string().trim().toLowerCase().pipe(z.enum(['local', 'nextcloud']));

export const TIMER_POSITIONS = [
  'top-left', 'top-middle', 'top-right',
  'bottom-left', 'bottom-middle', 'bottom-right',
] as const;
export type TimerPosition = (typeof TIMER_POSITIONS)[number];

const cronExpression = z
  .string()
  .trim()
  .refine(
    (v) => v.split(/\s+/).length === 5 && cron.validate(v),
    'must be a 5-field cron expression, e.g. "0 1 * * 5"',
  );

export const SettingsSchema = z.object({
  TARGET_VIDEO_DURATION: integer(1),
  IMAGE_DURATION:        integer(1),
  MAX_IMAGE_DURATION:    integer(0),
  VIDEO_FPS:             integer(1, 60),
  CRON_SCHEDULE:         cronExpression,
  OUTPUT_FILEPATH:       text,

  IMAGE_SOURCE:          source,
  IMAGE_FOLDER:          text,
  NEXTCLOUD_IMAGE_PATH:  text,
  NEXTCLOUD_UPLOAD_PATH: text,

  ENABLE_MUSIC:          booleanish,
  MUSIC_SOURCE:          source,
  MUSIC_FOLDER:          text,
  FADE_DURATION:         integer(0),
  TRAILING_SILENCE:      integer(0),

  APPEND_VIDEO_SOURCE:   source,
  APPEND_VIDEO_PATH:     text,

  ENABLE_TIMER:          booleanish,
  TIMER_MINUTES:         integer(1),
  TIMER_POSITION:        z.string().trim().toLowerCase().pipe(z.enum(TIMER_POSITIONS)),

  ENABLE_HEARTBEAT:      booleanish,

  ENABLE_NTFY:           booleanish,
  NTFY_TOPIC:            text,
});

export type SettingValues = z.infer<typeof SettingsSchema>;
export type SettingKey = keyof SettingValues;
export type SettingSource = 'override' | 'environment' | 'default';
export type MediaSource = SettingValues['IMAGE_SOURCE'];

export const SETTING_KEYS = SettingsSchema.keyof().options;

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

// ── Metadata ──────────────────────────────────────────────────────────────────

export const SETTING_GROUPS = [
  'General', 'Sources', 'Music', 'Append', 'Timer', 'Heartbeat', 'Notifications',
] as const;
export type SettingGroup = (typeof SETTING_GROUPS)[number];

export interface SettingInfo {
  group: SettingGroup;
  defaultValue: string;
  /** Short type hint shown by !help. */
  type: string;
  description: string;
}

export const SETTING_INFO: Record<SettingKey, SettingInfo> = {
  TARGET_VIDEO_DURATION: { group: 'General', defaultValue: '600', type: 'seconds', description: 'Length of the finished video' },
  IMAGE_DURATION:        { group: 'General', defaultValue: '10', type: 'seconds', description: 'Minimum time each image is shown' },
  MAX_IMAGE_DURATION:    { group: 'General', defaultValue: '0', type: 'seconds', description: 'Maximum time each image is shown (0 = no limit)' },
  VIDEO_FPS:             { group: 'General', defaultValue: '5', type: '1-60', description: 'Output frame rate' },
  CRON_SCHEDULE:         { group: 'General', defaultValue: '0 1 * * 5', type: 'cron', description: 'When scheduled builds run' },
  OUTPUT_FILEPATH:       { group: 'General', defaultValue: '', type: 'path', description: 'Local file the video is written to' },

  IMAGE_SOURCE:          { group: 'Sources', defaultValue: 'local', type: 'local|nextcloud', description: 'Where images are read from' },
  IMAGE_FOLDER:          { group: 'Sources', defaultValue: 'images/', type: 'path', description: 'Local image folder' },
  NEXTCLOUD_IMAGE_PATH:  { group: 'Sources', defaultValue: '', type: 'path', description: 'Nextcloud image folder' },
  NEXTCLOUD_UPLOAD_PATH: { group: 'Sources', defaultValue: '', type: 'path', description: 'Nextcloud file the video is uploaded to' },

  ENABLE_MUSIC:          { group: 'Music', defaultValue: 'true', type: 'bool', description: 'Add a background track' },
  MUSIC_SOURCE:          { group: 'Music', defaultValue: 'local', type: 'local|nextcloud', description: 'Where music is read from' },
  MUSIC_FOLDER:          { group: 'Music', defaultValue: 'music/', type: 'path', description: 'Music folder' },
  FADE_DURATION:         { group: 'Music', defaultValue: '10', type: 'seconds', description: 'Fade-out length' },
  TRAILING_SILENCE:      { group: 'Music', defaultValue: '5', type: 'seconds', description: 'Silence after the fade, before the slides end' },

  APPEND_VIDEO_SOURCE:   { group: 'Append', defaultValue: 'local', type: 'local|nextcloud', description: 'Where the appended clip is read from' },
  APPEND_VIDEO_PATH:     { group: 'Append', defaultValue: '', type: 'path', description: 'Clip played after the slides (empty = none)' },

  ENABLE_TIMER:          { group: 'Timer', defaultValue: 'false', type: 'bool', description: 'Show a countdown at the end' },
  TIMER_MINUTES:         { group: 'Timer', defaultValue: '5', type: 'minutes', description: 'Countdown length' },
  TIMER_POSITION:        { group: 'Timer', defaultValue: 'top-middle', type: TIMER_POSITIONS.join('|'), description: 'Countdown placement' },

  ENABLE_HEARTBEAT:      { group: 'Heartbeat', defaultValue: 'true', type: 'bool', description: 'Refresh the liveness file' },

  ENABLE_NTFY:           { group: 'Notifications', defaultValue: 'true', type: 'bool', description: 'Push build results to ntfy' },
  NTFY_TOPIC:            { group: 'Notifications', defaultValue: '', type: 'text', description: 'ntfy topic (empty = disabled)' },
};

export function keysInGroup(group: SettingGroup): SettingKey[] {
  return SETTING_KEYS.filter((k) => SETTING_INFO[k].group === group);
}
