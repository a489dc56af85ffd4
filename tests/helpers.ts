import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { orderKeyOf, type MediaItem, type MediaKind } from '../src/media/inventory.js';
import { SETTING_INFO, SETTING_KEYS, SettingsSchema, type MediaSource, type SettingKey, type SettingSource, type SettingValues } from '../src/settings/keys.js';
import type { EffectiveConfig } from '../src/settings/resolver.js';
import type { MediaStore, StoredFile } from '../src/storage/types.js';
import { ResourceNotFoundError } from '../src/utils/errors.js';

/** Settings at their defaults, with raw string overrides applied. */
export function settingsWith(overrides: Partial<Record<SettingKey, string>> = {}): SettingValues {
  const raw: Record<string, string> = {};
  for (const key of SETTING_KEYS) raw[key] = overrides[key] ?? SETTING_INFO[key].defaultValue;
  return SettingsSchema.parse(raw);
}

export function configOf(values: SettingValues): EffectiveConfig {
  return { values, sources: new Map<SettingKey, SettingSource>(), resolvedAt: new Date(0) };
}

export function media(name: string, kind: MediaKind = 'image', source: MediaSource = 'local'): MediaItem {
  return { path: `${kind}s/${name}`, name, kind, source, orderKey: orderKeyOf(name) };
}

export function images(count: number): MediaItem[] {
  return Array.from({ length: count }, (_, i) => media(`${i + 1}.jpg`));
}

export async function makeTempDir(prefix = 'slideshow-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

function normalize(p: string): string {
  const trimmed = p.replace(/^\.\//, '').replace(/^\/+|\/+$/g, '');
  return trimmed === '.' ? '' : trimmed;
}

function parentOf(p: string): string {
  const dir = path.posix.dirname(p);
  return dir === '.' ? '' : dir;
}

/** In-memory MediaStore: file path → content. Parent folders exist implicitly. */
export class MemoryStore implements MediaStore {
  readonly files = new Map<string, string>();
  readonly dirs = new Set<string>(['']);
  readonly uploads = new Map<string, string>();
  readonly fetched: string[] = [];

  constructor(readonly source: MediaSource, files: Record<string, string> = {}, dirs: string[] = []) {
    for (const [p, content] of Object.entries(files)) this.addFile(p, content);
    for (const d of dirs) this.addDir(d);
  }

  addFile(p: string, content: string): void {
    const key = normalize(p);
    this.files.set(key, content);
    this.addDir(parentOf(key));
  }

  addDir(d: string): void {
    let dir = normalize(d);
    while (dir !== '') {
      this.dirs.add(dir);
      dir = parentOf(dir);
    }
  }

  async listFiles(dir: string): Promise<StoredFile[]> {
    const key = normalize(dir);
    if (!this.dirs.has(key)) throw new ResourceNotFoundError([`${this.source}:${dir}`]);
    return [...this.files.entries()]
      .filter(([p]) => parentOf(p) === key)
      .map(([p, content]) => ({ path: p, name: path.posix.basename(p), size: content.length }));
  }

  async exists(p: string): Promise<boolean> {
    const key = normalize(p);
    return this.files.has(key) || this.dirs.has(key);
  }

  async fetch(p: string, localPath: string): Promise<void> {
    const content = this.files.get(normalize(p));
    if (content === undefined) throw new ResourceNotFoundError([`${this.source}:${p}`]);
    this.fetched.push(normalize(p));
    await fs.promises.writeFile(localPath, content, 'utf-8');
  }

  async upload(localPath: string, destPath: string): Promise<void> {
    this.uploads.set(normalize(destPath), await fs.promises.readFile(localPath, 'utf-8'));
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
