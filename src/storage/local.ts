import * as fs from 'fs';
import * as path from 'path';
import { ResourceNotFoundError, TransportError } from '../utils/errors.js';
import type { MediaStore, StoredFile } from './types.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Local filesystem. Relative paths resolve against `baseDir`. */
export class LocalStore implements MediaStore {
  readonly source = 'local' as const;

  constructor(private readonly baseDir: string = process.cwd()) {}

  private resolve(p: string): string {
    return path.resolve(this.baseDir, p);
  }

  async listFiles(dir: string): Promise<StoredFile[]> {
    const full = this.resolve(dir);
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(full, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) throw new ResourceNotFoundError([`local:${dir}`], { cause: err });
      throw new TransportError(`Cannot list ${full}`, { cause: err });
    }

    const files: StoredFile[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const filePath = path.join(full, entry.name);
      const stat = await fs.promises.stat(filePath);
      files.push({ path: filePath, name: entry.name, size: stat.size, modifiedAt: stat.mtime });
    }
    return files;
  }

  async exists(p: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(p));
      return true;
    } catch {
      return false;
    }
  }

  async fetch(p: string, localPath: string): Promise<void> {
    try {
      await fs.promises.copyFile(this.resolve(p), localPath);
    } catch (err) {
      if (isNotFound(err)) throw new ResourceNotFoundError([`local:${p}`], { cause: err });
      throw new TransportError(`Cannot read ${p}`, { cause: err });
    }
  }

  async upload(localPath: string, destPath: string): Promise<void> {
    try {
      await fs.promises.copyFile(localPath, this.resolve(destPath));
    } catch (err) {
      if (isNotFound(err)) throw new ResourceNotFoundError([`local:${path.dirname(destPath)}`], { cause: err });
      throw new TransportError(`Cannot write ${destPath}`, { cause: err });
    }
  }

  async ping(): Promise<boolean> {
    return this.exists(this.baseDir);
  }
}
