/**
 * IndexedDB Database Schema and Setup
 *
 * The durable local store behind the offline layer: queued writes,
 * records mirrored for offline reading, and local notification history.
 * Shared by the page and the service worker.
 *
 * Uses 'idb' library for Promise-based IndexedDB access.
 */

import {
  openDB,
  deleteDB,
  DBSchema,
  IDBPDatabase,
  IndexKey,
  IndexNames,
  StoreKey,
  StoreNames,
  StoreValue,
} from 'idb';
import { STORE_CONFIG } from '@/lib/constants';
import type { JsonObject, JsonValue } from '@/types/json';
import { StorageError, StorageOperation, errorMessage } from './errors';

export type WriteMethod = 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * The HTTP write a pending operation replays, forwarded verbatim
 */
export interface PendingOperationRequest {
  url: string;
  method: WriteMethod;
  body?: JsonValue;
  headers?: Record<string, string>;
}

/**
 * Queued write awaiting server acknowledgement.
 * `id` is assigned by the store (auto-increment) on insert.
 */
export interface PendingOperationRecord {
  id?: number;
  idempotencyKey: string;
  kind: string;
  collectionId?: string;
  request: PendingOperationRequest;
  enqueuedAt: number;
}

/**
 * Server entity mirrored for offline reading
 */
export interface CachedRecord {
  id: string;
  collectionId: string;         // group/channel id, secondary index
  payload: JsonObject;
  cachedAt: number;
}

export type NotificationState = 'shown' | 'closed';

export interface NotificationRecord {
  id: string;
  title: string;
  body: string;
  url: string;
  tag: string;
  read: 0 | 1;                  // booleans are not valid IndexedDB keys
  state: NotificationState;
  createdAt: number;
  closedAt?: number;
}

/**
 * IndexedDB Schema Definition
 */
export interface OfflineDBSchema extends DBSchema {
  pendingOperations: {
    key: number;
    value: PendingOperationRecord;
    indexes: {
      'by-collection': string;
    };
  };
  cachedRecords: {
    key: string;
    value: CachedRecord;
    indexes: {
      'by-collection': string;
    };
  };
  notifications: {
    key: string;
    value: NotificationRecord;
    indexes: {
      'by-read': number;
      'by-created': number;
    };
  };
}

export type CollectionName = StoreNames<OfflineDBSchema>;
export type CollectionKey<N extends CollectionName> = StoreKey<OfflineDBSchema, N>;
export type CollectionValue<N extends CollectionName> = StoreValue<OfflineDBSchema, N>;
export type CollectionIndex<N extends CollectionName> = IndexNames<OfflineDBSchema, N>;
export type CollectionIndexKey<
  N extends CollectionName,
  I extends CollectionIndex<N>,
> = IndexKey<OfflineDBSchema, N, I>;

/**
 * Every call runs in its own transaction scoped to one collection.
 * Nothing is atomic across collections.
 */
export interface LocalStore {
  readonly name: string;
  put<N extends CollectionName>(collection: N, record: CollectionValue<N>): Promise<CollectionKey<N>>;
  putMany<N extends CollectionName>(collection: N, records: CollectionValue<N>[]): Promise<void>;
  add<N extends CollectionName>(collection: N, record: CollectionValue<N>): Promise<CollectionKey<N>>;
  get<N extends CollectionName>(collection: N, id: CollectionKey<N>): Promise<CollectionValue<N> | undefined>;
  getAll<N extends CollectionName>(collection: N): Promise<CollectionValue<N>[]>;
  getAllByIndex<N extends CollectionName, I extends CollectionIndex<N>>(
    collection: N,
    indexName: I,
    value: CollectionIndexKey<N, I>
  ): Promise<CollectionValue<N>[]>;
  countByIndex<N extends CollectionName, I extends CollectionIndex<N>>(
    collection: N,
    indexName: I,
    value: CollectionIndexKey<N, I>
  ): Promise<number>;
  count<N extends CollectionName>(collection: N): Promise<number>;
  delete<N extends CollectionName>(collection: N, id: CollectionKey<N>): Promise<void>;
  clear<N extends CollectionName>(collection: N): Promise<void>;
  close(): void;
}

function toStorageError(operation: StorageOperation, target: string, error: unknown): StorageError {
  if (error instanceof StorageError) return error;
  return new StorageError(operation, `IndexedDB ${operation} failed on ${target}: ${errorMessage(error)}`, {
    cause: error,
  });
}

class IdbLocalStore implements LocalStore {
  constructor(
    private readonly db: IDBPDatabase<OfflineDBSchema>,
    private readonly onClose: () => void
  ) {}

  get name(): string {
    return this.db.name;
  }

  private async run<T>(operation: StorageOperation, collection: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toStorageError(operation, collection, error);
    }
  }

  put<N extends CollectionName>(collection: N, record: CollectionValue<N>): Promise<CollectionKey<N>> {
    return this.run('put', collection, () => this.db.put(collection, record));
  }

  putMany<N extends CollectionName>(collection: N, records: CollectionValue<N>[]): Promise<void> {
    if (records.length === 0) return Promise.resolve();

    return this.run('put', collection, async () => {
      const tx = this.db.transaction(collection, 'readwrite');
      await Promise.all([...records.map(record => tx.store.put(record)), tx.done]);
    });
  }

  add<N extends CollectionName>(collection: N, record: CollectionValue<N>): Promise<CollectionKey<N>> {
    return this.run('add', collection, () => this.db.add(collection, record));
  }

  get<N extends CollectionName>(collection: N, id: CollectionKey<N>): Promise<CollectionValue<N> | undefined> {
    return this.run('get', collection, () => this.db.get(collection, id));
  }

  getAll<N extends CollectionName>(collection: N): Promise<CollectionValue<N>[]> {
    return this.run('getAll', collection, () => this.db.getAll(collection));
  }

  getAllByIndex<N extends CollectionName, I extends CollectionIndex<N>>(
    collection: N,
    indexName: I,
    value: CollectionIndexKey<N, I>
  ): Promise<CollectionValue<N>[]> {
    return this.run('getAllByIndex', `${collection}.${String(indexName)}`, () =>
      this.db.getAllFromIndex(collection, indexName, value)
    );
  }

  countByIndex<N extends CollectionName, I extends CollectionIndex<N>>(
    collection: N,
    indexName: I,
    value: CollectionIndexKey<N, I>
  ): Promise<number> {
    return this.run('countByIndex', `${collection}.${String(indexName)}`, () =>
      this.db.countFromIndex(collection, indexName, value)
    );
  }

  count<N extends CollectionName>(collection: N): Promise<number> {
    return this.run('count', collection, () => this.db.count(collection));
  }

  delete<N extends CollectionName>(collection: N, id: CollectionKey<N>): Promise<void> {
    return this.run('delete', collection, () => this.db.delete(collection, id));
  }

  clear<N extends CollectionName>(collection: N): Promise<void> {
    return this.run('clear', collection, () => this.db.clear(collection));
  }

  close(): void {
    this.db.close();
    this.onClose();
  }
}

// One open connection per database name
const openStores = new Map<string, Promise<LocalStore>>();

export interface OpenLocalStoreOptions {
  name?: string;
}

/**
 * Open (or reuse) the local store, creating missing collections and
 * indexes. Upgrades only ever add; nothing is dropped.
 */
export function openLocalStore(options: OpenLocalStoreOptions = {}): Promise<LocalStore> {
  const name = options.name ?? STORE_CONFIG.NAME;

  const existing = openStores.get(name);
  if (existing) return existing;

  if (typeof indexedDB === 'undefined') {
    return Promise.reject(new StorageError('open', 'IndexedDB is not available in this context'));
  }

  const forget = () => {
    openStores.delete(name);
  };

  const opening = openDB<OfflineDBSchema>(name, STORE_CONFIG.VERSION, {
    upgrade(db, oldVersion, newVersion, transaction) {
      console.log(`[Store] Upgrading ${name} from v${oldVersion} to v${newVersion ?? STORE_CONFIG.VERSION}`);

      // Pending operations (offline write queue)
      const pending = db.objectStoreNames.contains('pendingOperations')
        ? transaction.objectStore('pendingOperations')
        : db.createObjectStore('pendingOperations', { keyPath: 'id', autoIncrement: true });
      if (!pending.indexNames.contains('by-collection')) {
        pending.createIndex('by-collection', 'collectionId');
      }

      // Records mirrored for offline reading
      const records = db.objectStoreNames.contains('cachedRecords')
        ? transaction.objectStore('cachedRecords')
        : db.createObjectStore('cachedRecords', { keyPath: 'id' });
      if (!records.indexNames.contains('by-collection')) {
        records.createIndex('by-collection', 'collectionId');
      }

      // Local notification history
      const notifications = db.objectStoreNames.contains('notifications')
        ? transaction.objectStore('notifications')
        : db.createObjectStore('notifications', { keyPath: 'id' });
      if (!notifications.indexNames.contains('by-read')) {
        notifications.createIndex('by-read', 'read');
      }
      if (!notifications.indexNames.contains('by-created')) {
        notifications.createIndex('by-created', 'createdAt');
      }
    },
    blocked() {
      console.warn('[Store] IndexedDB upgrade blocked - close other tabs');
    },
    blocking() {
      // Another context wants a newer version; let it through
      void opening.then(store => store.close(), forget);
    },
    terminated() {
      forget();
    },
  })
    .then((db): LocalStore => new IdbLocalStore(db, forget))
    .catch((error: unknown) => {
      forget();
      throw toStorageError('open', name, error);
    });

  openStores.set(name, opening);
  return opening;
}

/**
 * Remove the whole database (logout, tests)
 */
export async function deleteLocalStore(name: string = STORE_CONFIG.NAME): Promise<void> {
  const existing = openStores.get(name);
  if (existing) {
    openStores.delete(name);
    await existing.then(store => store.close(), () => undefined);
  }

  try {
    await deleteDB(name);
  } catch (error) {
    throw toStorageError('deleteDatabase', name, error);
  }
}
