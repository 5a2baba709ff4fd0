/**
 * Cached Record Operations
 *
 * Mirrors server entities (chat messages) per group/channel so the
 * message list can render without a network.
 */

import type { JsonObject } from '@/types/json';
import { CachedRecord, LocalStore, openLocalStore } from './db';
import { StorageError } from './errors';

/**
 * API payloads use `_id`; locally created ones may use `id`
 */
export function recordIdOf(record: JsonObject): string | null {
  const id = record._id ?? record.id;
  if (typeof id === 'string' && id.length > 0) return id;
  if (typeof id === 'number') return String(id);
  return null;
}

export class CachedRecordRepository {
  private readonly openStore: () => Promise<LocalStore>;
  private readonly now: () => number;

  constructor(options: { openStore?: () => Promise<LocalStore>; now?: () => number } = {}) {
    this.openStore = options.openStore ?? (() => openLocalStore());
    this.now = options.now ?? Date.now;
  }

  /**
   * Save messages for offline viewing, one record per id (overwrites).
   * Returns how many were written.
   */
  async cacheMessages(collectionKey: string, records: JsonObject[]): Promise<number> {
    const cachedAt = this.now();
    const rows: CachedRecord[] = [];

    for (const payload of records) {
      const id = recordIdOf(payload);
      if (!id) {
        console.warn(`[Store] Skipping record without id in ${collectionKey}`);
        continue;
      }
      rows.push({ id, collectionId: collectionKey, payload, cachedAt });
    }

    const store = await this.openStore();
    await store.putMany('cachedRecords', rows);
    return rows.length;
  }

  /**
   * Cached messages for a group/channel; empty when the store is unavailable
   */
  async getCachedMessages(collectionKey: string): Promise<JsonObject[]> {
    try {
      const store = await this.openStore();
      const rows = await store.getAllByIndex('cachedRecords', 'by-collection', collectionKey);
      return rows.map(row => row.payload);
    } catch (error) {
      if (!(error instanceof StorageError)) throw error;
      console.warn('[Store] Cached messages unavailable:', error.message);
      return [];
    }
  }

  async getCachedRecord(id: string): Promise<CachedRecord | undefined> {
    const store = await this.openStore();
    return store.get('cachedRecords', id);
  }

  async clearCollection(collectionKey: string): Promise<number> {
    const store = await this.openStore();
    const rows = await store.getAllByIndex('cachedRecords', 'by-collection', collectionKey);
    for (const row of rows) {
      await store.delete('cachedRecords', row.id);
    }
    return rows.length;
  }
}
