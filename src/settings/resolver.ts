/**
 * Effective configuration: override row → environment variable → default.
 *
 * Sources are immutable except for the override store, and every resolution
 * reads the store afresh, so a `!set` is observed by the very next build.
 */
import { z } from 'zod';
import { unquote } from '../config.js';
import { OverrideStore, type OverrideRecord } from '../db/overrides.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  SETTING_INFO,
  SETTING_KEYS,
  SettingsSchema,
  isSettingKey,
  type SettingKey,
  type SettingSource,
  type SettingValues,
} from './keys.js';

export interface EffectiveConfig {
  readonly values: Readonly<SettingValues>;
  readonly sources: ReadonlyMap<SettingKey, SettingSource>;
  readonly resolvedAt: Date;
}

export interface ResolvedSetting<K extends SettingKey> {
  key: K;
  value: SettingValues[K];
  source: SettingSource;
}

function schemaFor(key: SettingKey): z.ZodTypeAny {
  return SettingsSchema.shape[key];
}

function issueText(error: z.ZodError): string {
  return error.issues.map((i) => i.message).join('; ');
}

export class ConfigResolver {
  private readonly warned = new Set<string>();

  constructor(
    private readonly store: OverrideStore,
    private readonly environment: NodeJS.ProcessEnv = process.env,
  ) {}

  resolveAll(): EffectiveConfig {
    const raw: Record<string, string> = {};
    const sources = new Map<SettingKey, SettingSource>();
    const overrides = new Map(this.store.list().map((o) => [o.key, o.value]));

    for (const key of SETTING_KEYS) {
      const [value, source] = this.pick(key, overrides.get(key));
      raw[key] = value;
      sources.set(key, source);
    }

    // Every picked value already passed its schema, so this cannot throw.
    const values = SettingsSchema.parse(raw);
    return Object.freeze({
      values: Object.freeze(values),
      sources,
      resolvedAt: new Date(),
    });
  }

  resolve<K extends SettingKey>(key: K): ResolvedSetting<K> {
    const config = this.resolveAll();
    return { key, value: config.values[key], source: sourceOf(config, key) };
  }

  /**
   * Validate and store an override. Returns the canonical stored value.
   * Throws ValidationError and leaves the store untouched on bad input.
   */
  setOverride(rawKey: string, rawValue: string): OverrideRecord {
    const key = normalizeKey(rawKey);
    const parsed = schemaFor(key).safeParse(rawValue);
    if (!parsed.success) {
      throw new ValidationError(`Invalid value for ${key}: ${issueText(parsed.error)}`, key);
    }
    const record = this.store.set(key, String(parsed.data));
    logger.info('ConfigResolver: override set', { key, value: record.value });
    return record;
  }

  clearOverride(rawKey: string): boolean {
    return this.store.delete(normalizeKey(rawKey));
  }

  clearAll(): number {
    const removed = this.store.clear();
    logger.info('ConfigResolver: overrides cleared', { removed });
    return removed;
  }

  listOverrides(): OverrideRecord[] {
    return this.store.list();
  }

  private pick(key: SettingKey, override: string | undefined): [string, SettingSource] {
    const schema = schemaFor(key);

    if (override !== undefined) {
      if (schema.safeParse(override).success) return [override, 'override'];
      this.warnOnce(`override:${key}:${override}`, `ConfigResolver: stored override for ${key} is invalid, ignoring`, { value: override });
    }

    const fromEnv = this.environment[key];
    if (fromEnv !== undefined) {
      const value = unquote(fromEnv);
      if (value !== '') {
        if (schema.safeParse(value).success) return [value, 'environment'];
        this.warnOnce(`env:${key}:${value}`, `ConfigResolver: environment value for ${key} is invalid, using default`, { value });
      }
    }

    return [SETTING_INFO[key].defaultValue, 'default'];
  }

  private warnOnce(id: string, message: string, meta: Record<string, unknown>): void {
    if (this.warned.has(id)) return;
    this.warned.add(id);
    logger.warn(message, meta);
  }
}

function normalizeKey(rawKey: string): SettingKey {
  const key = rawKey.trim().toUpperCase();
  if (!isSettingKey(key)) throw new ValidationError(`Unknown setting: ${rawKey.trim()}`);
  return key;
}

export function sourceOf(config: EffectiveConfig, key: SettingKey): SettingSource {
  return config.sources.get(key) ?? 'default';
}
