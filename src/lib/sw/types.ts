/**
 * The slice of the service worker platform the offline layer uses.
 *
 * These mirror ServiceWorkerGlobalScope and its events structurally so
 * worker code type-checks next to page code under the DOM lib, and so
 * tests can hand in plain in-process fakes.
 */

export interface CacheLike {
  match(request: RequestInfo | URL): Promise<Response | undefined>;
  put(request: RequestInfo | URL, response: Response): Promise<void>;
  addAll(requests: string[]): Promise<void>;
}

export interface CacheStorageLike {
  open(cacheName: string): Promise<CacheLike>;
  keys(): Promise<string[]>;
  delete(cacheName: string): Promise<boolean>;
}

export interface ExtendableEventLike {
  waitUntil(promise: Promise<unknown>): void;
}

export interface FetchEventLike extends ExtendableEventLike {
  readonly request: Request;
  respondWith(response: Promise<Response>): void;
}

export interface PushMessageDataLike {
  text(): string;
}

export interface PushEventLike extends ExtendableEventLike {
  readonly data: PushMessageDataLike | null;
}

export interface NotificationLike {
  readonly data: unknown;
  close(): void;
}

export interface NotificationEventLike extends ExtendableEventLike {
  readonly action: string;
  readonly notification: NotificationLike;
}

export interface SyncEventLike extends ExtendableEventLike {
  readonly tag: string;
  readonly lastChance?: boolean;
}

export interface MessagePortLike {
  postMessage(message: unknown): void;
}

export interface MessageEventLike extends ExtendableEventLike {
  readonly data: unknown;
  // Reply channel; workbox-window's messageSW() waits on ports[0]
  readonly ports: ReadonlyArray<MessagePortLike>;
}

export interface WindowClientLike {
  readonly url: string;
  focus(): Promise<unknown>;
}

export interface ClientsLike {
  matchAll(options: { type: 'window'; includeUncontrolled: boolean }): Promise<ReadonlyArray<WindowClientLike>>;
  openWindow(url: string): Promise<unknown>;
  claim(): Promise<void>;
}

export interface NotificationAction {
  action: string;
  title: string;
}

export interface ShowNotificationOptions {
  body: string;
  icon: string;
  badge: string;
  tag: string;
  data: { url: string; recordId?: string };
  requireInteraction: boolean;
  actions: NotificationAction[];
}

export interface WorkerRegistrationLike {
  showNotification(title: string, options: ShowNotificationOptions): Promise<void>;
}

export interface WorkerEventMap {
  install: ExtendableEventLike;
  activate: ExtendableEventLike;
  fetch: FetchEventLike;
  push: PushEventLike;
  notificationclick: NotificationEventLike;
  notificationclose: NotificationEventLike;
  sync: SyncEventLike;
  message: MessageEventLike;
}

export type WorkerEventType = keyof WorkerEventMap;

export interface ServiceWorkerScope {
  readonly registration: WorkerRegistrationLike;
  readonly clients: ClientsLike;
  readonly caches: CacheStorageLike;
  readonly location: { readonly origin: string };
  skipWaiting(): Promise<void>;
  fetch(input: RequestInfo | URL, init?: RequestInit): Promise<Response>;
  addEventListener<K extends WorkerEventType>(type: K, listener: (event: WorkerEventMap[K]) => void): void;
}

/**
 * What an event handler needs the platform to do: answer a fetch and/or
 * keep the worker alive until `keepAlive` settles.
 */
export interface EventWork {
  keepAlive: Promise<unknown>;
  response?: Promise<Response>;
}

export type WorkerHandlers = {
  [K in WorkerEventType]: (event: WorkerEventMap[K]) => EventWork | null;
};

export function isServiceWorkerScope(value: unknown): value is ServiceWorkerScope {
  return (
    typeof value === 'object' &&
    value !== null &&
    'skipWaiting' in value &&
    typeof value.skipWaiting === 'function' &&
    'clients' in value &&
    'registration' in value
  );
}
