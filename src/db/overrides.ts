import type { Db } from './client.js';

export interface OverrideRecord {
  key: string;
  value: string;
  updatedAt: string;
}

interface OverrideRow {
  key: string;
  value: string;
  updated_at: string;
}

const toRecord = (row: OverrideRow): OverrideRecord => ({
  key: row.key,
  value: row.value,
  updatedAt: row.updated_at,
});

/**
 * Runtime overrides keyed by setting name. Reads hit SQLite every time, so a
 * committed write is visible to the next read.
 */
export class OverrideStore {
  constructor(private readonly db: Db) {}

  list(): OverrideRecord[] {
    return this.db
      .prepare<[], OverrideRow>('SELECT key, value, updated_at FROM settings_overrides ORDER BY key')
      .all()
      .map(toRecord);
  }

  set(key: string, value: string, now: Date = new Date()): OverrideRecord {
    const updatedAt = now.toISOString();
    this.db
      .prepare<[string, string, string]>(
        `INSERT INTO settings_overrides (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      )
      .run(key, value, updatedAt);
    return { key, value, updatedAt };
  }

  delete(key: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM settings_overrides WHERE key = ?').run(key).changes > 0;
  }

  /** Remove every override. Returns how many were removed. */
  clear(): number {
    return this.db.prepare('DELETE FROM settings_overrides').run().changes;
  }
}
