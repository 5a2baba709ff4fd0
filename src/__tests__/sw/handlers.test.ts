/**
 * Service Worker Handler Tests
 * Lifecycle, fetch, push, sync and message dispatch
 */

import { config } from '@/lib/config/env';
import { deleteLocalStore, openLocalStore } from '@/lib/offline/db';
import { PrecacheError, ReplaySubmitError } from '@/lib/offline/errors';
import type { ReplayReport } from '@/lib/offline/queue';
import { NotificationDispatcher } from '@/lib/push/dispatcher';
import {
  bindWorker,
  createWorkerContext,
  createWorkerHandlers,
  isWorkerMessage,
  WorkerContext,
} from '@/lib/sw/handlers';
import { partitionNames } from '@/lib/sw/partitions';
import { CacheStrategyEngine } from '@/lib/sw/strategies';
import { isServiceWorkerScope, WorkerEventType, WorkerHandlers } from '@/lib/sw/types';
import {
  FakeCacheStorage,
  FakeClients,
  FakeExtendableEvent,
  FakeFetchEvent,
  FakePort,
  FakeRegistration,
  FakeWorkerScope,
  ORIGIN,
  uniqueStoreName,
} from '../helpers/fakes';

function report(sent: number, failedIds: number[] = []): ReplayReport {
  return {
    attempted: sent + failedIds.length,
    sent,
    failed: failedIds.map(id => ({ id, error: new ReplaySubmitError(id, 'API Error: 500', { status: 500 }) })),
    startedAt: 1,
    finishedAt: 2,
  };
}

function syncEvent(tag: string, lastChance = false) {
  return Object.assign(new FakeExtendableEvent(), { tag, lastChance });
}

function messageEvent(data: unknown, port?: FakePort) {
  return Object.assign(new FakeExtendableEvent(), { data, ports: port ? [port] : [] });
}

describe('createWorkerHandlers', () => {
  let storeName: string;
  let caches: FakeCacheStorage;
  let clients: FakeClients;
  let registration: FakeRegistration;
  let network: jest.Mock<Promise<Response>, [Request]>;
  let replay: jest.Mock<Promise<ReplayReport>, []>;
  let skipWaiting: jest.Mock<Promise<void>, []>;
  let handlers: WorkerHandlers;

  beforeEach(() => {
    storeName = uniqueStoreName('worker');
    caches = new FakeCacheStorage(async url => new Response(`asset ${url}`));
    clients = new FakeClients();
    registration = new FakeRegistration();
    network = jest.fn<Promise<Response>, [Request]>();
    replay = jest.fn<Promise<ReplayReport>, []>().mockResolvedValue(report(0));
    skipWaiting = jest.fn<Promise<void>, []>().mockResolvedValue(undefined);

    const partitions = partitionNames('v2');
    const ctx: WorkerContext = {
      caches,
      clients,
      partitions,
      shellAssets: ['/', '/static/js/app.js'],
      engine: new CacheStrategyEngine({ caches, fetch: network, partitions, origin: ORIGIN }),
      dispatcher: new NotificationDispatcher({
        registration,
        origin: ORIGIN,
        openStore: () => openLocalStore({ name: storeName }),
      }),
      replay,
      skipWaiting,
    };
    handlers = createWorkerHandlers(ctx);

    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await deleteLocalStore(storeName);
  });

  describe('install', () => {
    it('should precache the shell and then skip waiting', async () => {
      const work = handlers.install(new FakeExtendableEvent());
      await work?.keepAlive;

      const cache = await caches.open('static-v2');
      expect(cache.entries.size).toBe(2);
      expect(await cache.text(`${ORIGIN}/static/js/app.js`)).toBe('asset /static/js/app.js');
      expect(skipWaiting).toHaveBeenCalledTimes(1);
    });

    it('should fail the install when precaching fails', async () => {
      caches = new FakeCacheStorage(async () => new Response('gone', { status: 404 }));
      const failing = createWorkerHandlers({
        caches,
        clients,
        partitions: partitionNames('v2'),
        shellAssets: ['/'],
        engine: new CacheStrategyEngine({ caches, fetch: network, partitions: partitionNames('v2'), origin: ORIGIN }),
        dispatcher: new NotificationDispatcher({ registration, origin: ORIGIN }),
        replay,
        skipWaiting,
      });

      const work = failing.install(new FakeExtendableEvent());

      await expect(work?.keepAlive).rejects.toBeInstanceOf(PrecacheError);
      expect(skipWaiting).not.toHaveBeenCalled();
    });
  });

  describe('activate', () => {
    it('should drop old partitions and claim clients', async () => {
      await caches.open('static-v1');
      await caches.open('dynamic-v1');
      await caches.open('static-v2');

      await handlers.activate(new FakeExtendableEvent())?.keepAlive;

      expect(await caches.keys()).toEqual(['static-v2']);
      expect(clients.claimed).toBe(1);
    });
  });

  describe('fetch', () => {
    it('should leave bypassed requests alone', () => {
      const event = new FakeFetchEvent(new Request(`${ORIGIN}/api/messages`, { method: 'POST', body: '{}' }));

      expect(handlers.fetch(event)).toBeNull();
    });

    it('should answer handled requests', async () => {
      network.mockResolvedValueOnce(new Response('[]', { status: 200 }));
      const event = new FakeFetchEvent(new Request(`${ORIGIN}/api/groups`));

      const work = handlers.fetch(event);

      expect(await (await work?.response)?.text()).toBe('[]');
    });
  });

  describe('push and notificationclick', () => {
    it('should show a notification for a push', async () => {
      const event = Object.assign(new FakeExtendableEvent(), { data: { text: () => '{"title":"T","body":"B"}' } });

      await handlers.push(event)?.keepAlive;

      expect(registration.shown.map(n => n.title)).toEqual(['T']);
    });

    it('should open the notification target on click', async () => {
      const event = Object.assign(new FakeExtendableEvent(), {
        action: '',
        notification: { data: { url: '/groups/g1' }, close: jest.fn() },
      });

      await expect(handlers.notificationclick(event)?.keepAlive).resolves.toBe('opened');
      expect(clients.opened).toEqual([`${ORIGIN}/groups/g1`]);
    });
  });

  describe('sync', () => {
    it('should ignore other tags', () => {
      expect(handlers.sync(syncEvent('other-tag'))).toBeNull();
      expect(replay).not.toHaveBeenCalled();
    });

    it('should replay the queue for the messages tag', async () => {
      replay.mockResolvedValueOnce(report(2));

      await expect(handlers.sync(syncEvent('sync-messages'))?.keepAlive).resolves.toEqual(report(2));
      expect(replay).toHaveBeenCalledTimes(1);
    });

    it('should reject so the platform retries while operations remain', async () => {
      replay.mockResolvedValueOnce(report(1, [7]));

      await expect(handlers.sync(syncEvent('sync-messages'))?.keepAlive).rejects.toThrow(
        '1 pending operations still queued'
      );
    });

    it('should settle on the last retry even with failures', async () => {
      replay.mockResolvedValueOnce(report(1, [7]));

      await expect(handlers.sync(syncEvent('sync-messages', true))?.keepAlive).resolves.toMatchObject({ sent: 1 });
    });
  });

  describe('message', () => {
    it('should skip waiting on request', async () => {
      await handlers.message(messageEvent({ type: 'SKIP_WAITING' }))?.keepAlive;

      expect(skipWaiting).toHaveBeenCalledTimes(1);
    });

    it('should replay and reply on the message port', async () => {
      replay.mockResolvedValueOnce(report(2));
      const port = new FakePort();

      await handlers.message(messageEvent({ type: 'REPLAY_QUEUE' }, port))?.keepAlive;

      expect(port.messages).toEqual([{ type: 'REPLAY_DONE', sent: 2, failed: 0 }]);
    });

    it('should ignore unknown messages', () => {
      expect(handlers.message(messageEvent({ type: 'CLEAR_EVERYTHING' }))).toBeNull();
      expect(handlers.message(messageEvent('SKIP_WAITING'))).toBeNull();
    });
  });
});

describe('isWorkerMessage', () => {
  it('should accept only known message types', () => {
    expect(isWorkerMessage({ type: 'REPLAY_QUEUE' })).toBe(true);
    expect(isWorkerMessage({ type: 'replay_queue' })).toBe(false);
    expect(isWorkerMessage(null)).toBe(false);
  });
});

describe('bindWorker', () => {
  let scope: FakeWorkerScope;
  let network: jest.Mock<Promise<Response>, [Request]>;

  beforeEach(() => {
    network = jest.fn<Promise<Response>, [Request]>().mockImplementation(async () => new Response('asset'));
    scope = new FakeWorkerScope(network);
    bindWorker(scope, createWorkerHandlers(createWorkerContext(scope, { ...config, cacheVersion: 'v9' })));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await deleteLocalStore();
  });

  it('should be recognised as a worker scope', () => {
    expect(isServiceWorkerScope(scope)).toBe(true);
    expect(isServiceWorkerScope({})).toBe(false);
  });

  it('should load the worker entry outside a worker without binding', async () => {
    let loaded = false;
    await jest.isolateModulesAsync(async () => {
      await import('@/sw');
      loaded = true;
    });

    expect(loaded).toBe(true);
    expect(isServiceWorkerScope(globalThis)).toBe(false);
  });

  it('should listen to every worker event', () => {
    const types: WorkerEventType[] = ['install', 'activate', 'fetch', 'push', 'notificationclick', 'notificationclose', 'sync', 'message'];

    expect(types.every(type => scope.listens(type))).toBe(true);
  });

  it('should respond to handled fetches and keep the worker alive for the cache write', async () => {
    const event = new FakeFetchEvent(new Request(`${ORIGIN}/api/groups`));

    scope.dispatch('fetch', event);

    expect(event.responses).toHaveLength(1);
    expect(event.lifetimes).toHaveLength(1);
    expect(await (await event.responses[0]).text()).toBe('asset');
    await event.settled();
    const cache = await scope.caches.open('dynamic-v9');
    expect(await cache.text(`${ORIGIN}/api/groups`)).toBe('asset');
  });

  it('should not respond to bypassed fetches', () => {
    const event = new FakeFetchEvent(new Request(`${ORIGIN}/api/messages`, { method: 'PUT', body: '{}' }));

    scope.dispatch('fetch', event);

    expect(event.responses).toHaveLength(0);
    expect(event.lifetimes).toHaveLength(0);
  });

  it('should install into the versioned static partition', async () => {
    const event = new FakeExtendableEvent();

    scope.dispatch('install', event);
    const [result] = await event.settled();

    expect(result.status).toBe('fulfilled');
    expect(scope.skippedWaiting).toBe(1);
    expect(await scope.caches.keys()).toEqual(['static-v9']);
  });
});
