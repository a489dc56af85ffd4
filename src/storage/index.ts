import type { Env } from '../config.js';
import type { MediaSource } from '../settings/keys.js';
import { ValidationError } from '../utils/errors.js';
import { LocalStore } from './local.js';
import { NextcloudStore } from './nextcloud.js';
import type { MediaStore } from './types.js';

export type { MediaStore, StoredFile } from './types.js';

/** The stores a build may use, by source name. Nextcloud is absent when unconfigured. */
export interface StoreRegistry {
  get(source: MediaSource): MediaStore;
  has(source: MediaSource): boolean;
  /** Connectivity of every configured store, for !status. */
  ping(): Promise<Partial<Record<MediaSource, boolean>>>;
}

export function createStoreRegistry(stores: Partial<Record<MediaSource, MediaStore>>): StoreRegistry {
  return {
    get(source) {
      const store = stores[source];
      if (!store) {
        throw new ValidationError(
          `Source "${source}" is not configured (set NEXTCLOUD_URL, NEXTCLOUD_USERNAME and NEXTCLOUD_PASSWORD)`,
        );
      }
      return store;
    },

    has: (source) => stores[source] !== undefined,

    async ping() {
      const result: Partial<Record<MediaSource, boolean>> = {};
      for (const source of ['local', 'nextcloud'] as const) {
        const store = stores[source];
        if (store) result[source] = await store.ping();
      }
      return result;
    },
  };
}

export function storesFromEnv(e: Env): StoreRegistry {
  const stores: Partial<Record<MediaSource, MediaStore>> = { local: new LocalStore() };
  if (e.NEXTCLOUD_URL && e.NEXTCLOUD_USERNAME && e.NEXTCLOUD_PASSWORD) {
    stores.nextcloud = new NextcloudStore({
      url: e.NEXTCLOUD_URL,
      username: e.NEXTCLOUD_USERNAME,
      password: e.NEXTCLOUD_PASSWORD,
      insecureSsl: e.NEXTCLOUD_INSECURE_SSL,
    });
  }
  return createStoreRegistry(stores);
}
