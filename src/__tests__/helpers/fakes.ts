/**
 * In-process stand-ins for the service worker platform and page storage
 */

import type {
  CacheLike,
  CacheStorageLike,
  ClientsLike,
  ExtendableEventLike,
  FetchEventLike,
  MessagePortLike,
  ServiceWorkerScope,
  ShowNotificationOptions,
  WindowClientLike,
  WorkerEventMap,
  WorkerEventType,
  WorkerRegistrationLike,
} from '@/lib/sw/types';
import type { KeyValueStorage } from '@/lib/pwa/types';

export const ORIGIN = 'https://app.test';

export type Loader = (url: string) => Promise<Response>;

function keyOf(request: RequestInfo | URL): string {
  if (typeof request === 'string') return new URL(request, ORIGIN).href;
  if (request instanceof URL) return request.href;
  return request.url;
}

export class FakeCache implements CacheLike {
  readonly entries = new Map<string, Response>();

  constructor(private readonly owner: FakeCacheStorage) {}

  async match(request: RequestInfo | URL): Promise<Response | undefined> {
    const hit = this.entries.get(keyOf(request));
    return hit ? hit.clone() : undefined;
  }

  async put(request: RequestInfo | URL, response: Response): Promise<void> {
    if (this.owner.failWrites) throw new Error('QuotaExceededError');
    this.entries.set(keyOf(request), response);
  }

  async addAll(requests: string[]): Promise<void> {
    const fetched: Array<[string, Response]> = [];
    for (const url of requests) {
      const response = await this.owner.loader(url);
      if (!response.ok) throw new TypeError(`Request for ${url} returned ${response.status}`);
      fetched.push([keyOf(url), response]);
    }
    fetched.forEach(([key, response]) => this.entries.set(key, response));
  }

  async text(request: string): Promise<string | undefined> {
    const hit = await this.match(request);
    return hit ? hit.text() : undefined;
  }
}

export class FakeCacheStorage implements CacheStorageLike {
  readonly caches = new Map<string, FakeCache>();
  failWrites = false;
  failOpen = false;

  constructor(readonly loader: Loader = async () => new Response('asset')) {}

  async open(cacheName: string): Promise<FakeCache> {
    if (this.failOpen) throw new Error('SecurityError');
    let cache = this.caches.get(cacheName);
    if (!cache) {
      cache = new FakeCache(this);
      this.caches.set(cacheName, cache);
    }
    return cache;
  }

  async keys(): Promise<string[]> {
    return Array.from(this.caches.keys());
  }

  async delete(cacheName: string): Promise<boolean> {
    return this.caches.delete(cacheName);
  }

  async seed(cacheName: string, url: string, body: string): Promise<void> {
    const cache = await this.open(cacheName);
    cache.entries.set(keyOf(url), new Response(body, { status: 200 }));
  }
}

export class FakeWindowClient implements WindowClientLike {
  focused = 0;

  constructor(readonly url: string) {}

  async focus(): Promise<this> {
    this.focused++;
    return this;
  }
}

export class FakeClients implements ClientsLike {
  readonly opened: string[] = [];
  claimed = 0;
  openWindowResult: 'window' | null = 'window';

  constructor(readonly windows: FakeWindowClient[] = []) {}

  async matchAll(): Promise<FakeWindowClient[]> {
    return this.windows;
  }

  async openWindow(url: string): Promise<FakeWindowClient | null> {
    this.opened.push(url);
    return this.openWindowResult ? new FakeWindowClient(url) : null;
  }

  async claim(): Promise<void> {
    this.claimed++;
  }
}

export class FakeRegistration implements WorkerRegistrationLike {
  readonly shown: Array<{ title: string; options: ShowNotificationOptions }> = [];

  async showNotification(title: string, options: ShowNotificationOptions): Promise<void> {
    this.shown.push({ title, options });
  }
}

export class FakeExtendableEvent implements ExtendableEventLike {
  readonly lifetimes: Promise<unknown>[] = [];

  waitUntil(promise: Promise<unknown>): void {
    // The platform observes the rejection; so do we
    promise.catch(() => undefined);
    this.lifetimes.push(promise);
  }

  settled(): Promise<PromiseSettledResult<unknown>[]> {
    return Promise.allSettled(this.lifetimes);
  }
}

export class FakeFetchEvent extends FakeExtendableEvent implements FetchEventLike {
  responses: Promise<Response>[] = [];

  constructor(readonly request: Request) {
    super();
  }

  respondWith(response: Promise<Response>): void {
    response.catch(() => undefined);
    this.responses.push(response);
  }
}

export class FakePort implements MessagePortLike {
  readonly messages: unknown[] = [];

  postMessage(message: unknown): void {
    this.messages.push(message);
  }
}

export class FakeWorkerScope implements ServiceWorkerScope {
  readonly registration = new FakeRegistration();
  readonly clients = new FakeClients();
  readonly caches: FakeCacheStorage;
  readonly location = { origin: ORIGIN };
  skippedWaiting = 0;
  private readonly listeners = new Map<WorkerEventType, unknown>();

  constructor(readonly network: (request: Request) => Promise<Response>) {
    this.caches = new FakeCacheStorage(url => network(new Request(new URL(url, ORIGIN))));
  }

  async skipWaiting(): Promise<void> {
    this.skippedWaiting++;
  }

  fetch(input: RequestInfo | URL, init?: RequestInit): Promise<Response> {
    const request = input instanceof Request ? input : new Request(new URL(String(input), ORIGIN), init);
    return this.network(request);
  }

  addEventListener<K extends WorkerEventType>(type: K, listener: (event: WorkerEventMap[K]) => void): void {
    this.listeners.set(type, listener);
  }

  dispatch<K extends WorkerEventType>(type: K, event: WorkerEventMap[K]): void {
    const listener = this.listeners.get(type);
    if (isListenerFor(type, listener)) listener(event);
  }

  listens(type: WorkerEventType): boolean {
    return this.listeners.has(type);
  }
}

// Listeners are stored by the type they were added under
function isListenerFor<K extends WorkerEventType>(
  _type: K,
  value: unknown
): value is (event: WorkerEventMap[K]) => void {
  return typeof value === 'function';
}

export class MemoryStorage implements KeyValueStorage {
  readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }
}

let storeCounter = 0;

/**
 * Fresh database name per test
 */
export function uniqueStoreName(prefix = 'test-store'): string {
  storeCounter++;
  return `${prefix}-${storeCounter}-${Date.now()}`;
}
