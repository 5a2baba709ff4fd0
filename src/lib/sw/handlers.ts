/**
 * Service worker event handlers
 *
 * One handler per event type. Handlers do not touch the event's lifetime
 * themselves; they return the work it must stay alive for and bindWorker()
 * hands that to waitUntil()/respondWith().
 */

import { SHELL_ASSETS, SYNC_CONFIG } from '@/lib/constants';
import { config as defaultConfig, OfflineConfig } from '@/lib/config/env';
import { createFetchSubmitter, PendingOperationQueue, ReplayReport } from '@/lib/offline/queue';
import { NotificationDispatcher } from '@/lib/push';
import { isJsonObject } from '@/types/json';
import { partitionNames, PartitionNames, precacheShell, rotatePartitions } from './partitions';
import { CacheStrategyEngine } from './strategies';
import type {
  CacheStorageLike,
  ClientsLike,
  EventWork,
  ExtendableEventLike,
  ServiceWorkerScope,
  WorkerEventType,
  WorkerHandlers,
} from './types';

export interface WorkerContext {
  caches: CacheStorageLike;
  clients: ClientsLike;
  partitions: PartitionNames;
  shellAssets: readonly string[];
  engine: CacheStrategyEngine;
  dispatcher: NotificationDispatcher;
  replay: () => Promise<ReplayReport>;
  skipWaiting: () => Promise<void>;
  syncTag?: string;
}

export type WorkerMessage = { type: 'SKIP_WAITING' } | { type: 'REPLAY_QUEUE' };

export function isWorkerMessage(data: unknown): data is WorkerMessage {
  return isJsonObject(data) && (data.type === 'SKIP_WAITING' || data.type === 'REPLAY_QUEUE');
}

/**
 * Wire the worker's collaborators from its global scope
 */
export function createWorkerContext(scope: ServiceWorkerScope, cfg: OfflineConfig = defaultConfig): WorkerContext {
  const partitions = partitionNames(cfg.cacheVersion);
  const fetchImpl = (input: RequestInfo | URL, init?: RequestInit) => scope.fetch(input, init);
  const queue = new PendingOperationQueue({ submit: createFetchSubmitter(fetchImpl) });

  return {
    caches: scope.caches,
    clients: scope.clients,
    partitions,
    shellAssets: SHELL_ASSETS,
    engine: new CacheStrategyEngine({
      caches: scope.caches,
      fetch: request => scope.fetch(request),
      partitions,
      origin: scope.location.origin,
      debug: cfg.debug,
    }),
    dispatcher: new NotificationDispatcher({
      registration: scope.registration,
      origin: scope.location.origin,
    }),
    replay: () => queue.replay(),
    skipWaiting: () => scope.skipWaiting(),
  };
}

export function createWorkerHandlers(ctx: WorkerContext): WorkerHandlers {
  const syncTag = ctx.syncTag ?? SYNC_CONFIG.TAG;

  return {
    install: () => {
      console.log('[SW] Installing service worker...');
      const keepAlive = precacheShell(ctx.caches, ctx.partitions, ctx.shellAssets).then(() => ctx.skipWaiting());
      return { keepAlive };
    },

    activate: () => {
      console.log('[SW] Activating service worker...');
      const keepAlive = rotatePartitions(ctx.caches, ctx.partitions).then(() => ctx.clients.claim());
      return { keepAlive };
    },

    fetch: event => {
      const result = ctx.engine.handle(event.request);
      if (!result) return null;
      return { response: result.response, keepAlive: result.settled };
    },

    push: event => {
      console.log('[SW] Push notification received');
      return { keepAlive: ctx.dispatcher.showPush(event.data) };
    },

    notificationclick: event => {
      console.log('[SW] Notification clicked:', event.action || 'default');
      return { keepAlive: ctx.dispatcher.handleClick(event, ctx.clients) };
    },

    notificationclose: event => ({ keepAlive: ctx.dispatcher.handleClose(event) }),

    sync: event => {
      if (event.tag !== syncTag) return null;
      console.log('[SW] Background sync triggered:', event.tag);

      // A rejected waitUntil asks the platform to retry the sync later
      const keepAlive = ctx.replay().then(report => {
        if (report.failed.length > 0 && !event.lastChance) {
          throw new Error(`${report.failed.length} pending operations still queued`);
        }
        return report;
      });
      return { keepAlive };
    },

    message: event => {
      if (!isWorkerMessage(event.data)) return null;

      switch (event.data.type) {
        case 'SKIP_WAITING':
          return { keepAlive: ctx.skipWaiting() };
        case 'REPLAY_QUEUE': {
          console.log('[SW] Replay requested by page');
          const [port] = event.ports;
          const keepAlive = ctx.replay().then(report => {
            port?.postMessage({ type: 'REPLAY_DONE', sent: report.sent, failed: report.failed.length });
            return report;
          });
          return { keepAlive };
        }
      }
    },
  };
}

function extendLifetime(type: WorkerEventType, event: ExtendableEventLike, work: EventWork): void {
  event.waitUntil(
    work.keepAlive.catch((error: unknown) => {
      console.error(`[SW] ${type} handler failed:`, error);
      throw error;
    })
  );
}

function bindEvent<K extends Exclude<WorkerEventType, 'fetch'>>(
  scope: ServiceWorkerScope,
  type: K,
  handler: WorkerHandlers[K]
): void {
  scope.addEventListener(type, event => {
    const work = handler(event);
    if (work) extendLifetime(type, event, work);
  });
}

export function bindWorker(scope: ServiceWorkerScope, handlers: WorkerHandlers): void {
  bindEvent(scope, 'install', handlers.install);
  bindEvent(scope, 'activate', handlers.activate);
  bindEvent(scope, 'push', handlers.push);
  bindEvent(scope, 'notificationclick', handlers.notificationclick);
  bindEvent(scope, 'notificationclose', handlers.notificationclose);
  bindEvent(scope, 'sync', handlers.sync);
  bindEvent(scope, 'message', handlers.message);

  scope.addEventListener('fetch', event => {
    const work = handlers.fetch(event);
    if (!work) return;
    if (work.response) event.respondWith(work.response);
    extendLifetime('fetch', event, work);
  });
}
