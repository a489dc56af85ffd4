/**
 * Media classification and ordering.
 *
 * Images are shown in filename order: names that start with a number sort
 * numerically (so 2.jpg precedes 10.jpg) ahead of everything else, and the
 * rest sort by code point.
 */
import * as path from 'path';
import type { MediaSource } from '../settings/keys.js';
import type { StoredFile } from '../storage/types.js';

export type MediaKind = 'image' | 'audio' | 'video';

export interface OrderKey {
  /** Leading decimal number, or null when the name has none. */
  prefix: number | null;
  name: string;
}

export interface MediaItem {
  /** Path within its store. */
  path: string;
  name: string;
  kind: MediaKind;
  source: MediaSource;
  orderKey: OrderKey;
}

const EXTENSIONS: Record<MediaKind, readonly string[]> = {
  image: ['.jpg', '.jpeg', '.png'],
  audio: ['.mp3', '.m4a', '.ogg', '.wav'],
  video: ['.mp4', '.mov', '.mkv', '.webm'],
};

export function mediaKind(name: string): MediaKind | undefined {
  const ext = path.extname(name).toLowerCase();
  if (EXTENSIONS.image.includes(ext)) return 'image';
  if (EXTENSIONS.audio.includes(ext)) return 'audio';
  if (EXTENSIONS.video.includes(ext)) return 'video';
  return undefined;
}

export function orderKeyOf(name: string): OrderKey {
  const match = name.match(/^\d+/);
  return { prefix: match ? Number(match[0]) : null, name };
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareOrderKeys(a: OrderKey, b: OrderKey): number {
  if (a.prefix !== null && b.prefix !== null) {
    return a.prefix - b.prefix || compareCodePoints(a.name, b.name);
  }
  if (a.prefix !== null) return -1;
  if (b.prefix !== null) return 1;
  return compareCodePoints(a.name, b.name);
}

/** Sorted copy; the input is left alone. */
export function orderMedia<T extends { orderKey: OrderKey }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compareOrderKeys(a.orderKey, b.orderKey));
}

/** Keep the files of a known kind, ordered. */
export function toMediaItems(files: readonly StoredFile[], source: MediaSource): MediaItem[] {
  const items: MediaItem[] = [];
  for (const file of files) {
    const kind = mediaKind(file.name);
    if (!kind) continue;
    items.push({ path: file.path, name: file.name, kind, source, orderKey: orderKeyOf(file.name) });
  }
  return orderMedia(items);
}
