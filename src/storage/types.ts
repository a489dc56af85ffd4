import type { MediaSource } from '../settings/keys.js';

export interface StoredFile {
  /** Path within the store, usable with fetch(). */
  path: string;
  name: string;
  size: number;
  modifiedAt?: Date;
}

/**
 * A place media is read from and videos are delivered to.
 *
 * Missing paths raise ResourceNotFoundError; anything else that goes wrong
 * on the way raises TransportError.
 */
export interface MediaStore {
  readonly source: MediaSource;
  /** Files directly inside `dir` (no recursion, folders omitted). */
  listFiles(dir: string): Promise<StoredFile[]>;
  exists(path: string): Promise<boolean>;
  fetch(path: string, localPath: string): Promise<void>;
  upload(localPath: string, destPath: string): Promise<void>;
  /** Cheap connectivity check used by !status. */
  ping(): Promise<boolean>;
}
