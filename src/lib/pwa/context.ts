/**
 * Offline context
 *
 * Builds the page side of the offline layer once, from an explicit
 * BrowserEnvironment, and owns its start/stop lifecycle.
 */

import { config as defaultConfig, logConfig, OfflineConfig } from '@/lib/config/env';
import { SyncScheduler } from '@/lib/offline/backgroundSync';
import { LocalStore, openLocalStore } from '@/lib/offline/db';
import { errorMessage } from '@/lib/offline/errors';
import {
  createFetchSubmitter,
  createPendingOperationRequest,
  PendingOperationQueue,
  SendOutcome,
} from '@/lib/offline/queue';
import { CachedRecordRepository } from '@/lib/offline/records';
import { createPwaStore, PwaStore } from '@/store/pwaStore';
import type { JsonObject } from '@/types/json';
import { ConnectivityMonitor } from './connectivity';
import { InstallPromptManager } from './installPrompt';
import {
  createBrowserNotificationHost,
  LocalNotifier,
  NotificationHost,
  NotificationPreferences,
  WindowNavigation,
} from './notifications';
import { ServiceWorkerRegistrar } from './registration';
import type { EventSourceLike, KeyValueStorage, NavigatorLike } from './types';

export interface BrowserEnvironment {
  window: EventSourceLike;
  navigator: NavigatorLike;
  storage: KeyValueStorage;
  fetch: typeof fetch;
  notifications: NotificationHost;
  navigation: WindowNavigation;
  serviceWorkerSupported: boolean;
  isStandalone?: () => boolean;
  getAuthToken?: () => string | null;
  openStore?: () => Promise<LocalStore>;
  now?: () => number;
}

export interface MessageDraft {
  content: string;
  attachments?: JsonObject[];
  reply_to?: string;
}

export interface OfflineContext {
  config: OfflineConfig;
  store: PwaStore;
  queue: PendingOperationQueue;
  records: CachedRecordRepository;
  scheduler: SyncScheduler;
  registrar: ServiceWorkerRegistrar;
  connectivity: ConnectivityMonitor;
  install: InstallPromptManager;
  notifier: LocalNotifier;
  preferences: NotificationPreferences;
  start(): Promise<void>;
  stop(): void;
  sendMessage(groupId: string, draft: MessageDraft): Promise<SendOutcome>;
}

/**
 * Environment backed by the real page globals
 */
export function browserEnvironment(): BrowserEnvironment {
  return {
    window,
    navigator,
    storage: localStorage,
    fetch: window.fetch.bind(window),
    notifications: createBrowserNotificationHost(),
    navigation: {
      focus: () => window.focus(),
      navigate: url => {
        window.location.href = url;
      },
    },
    serviceWorkerSupported: 'serviceWorker' in navigator,
    isStandalone: () => window.matchMedia('(display-mode: standalone)').matches,
    getAuthToken: () => localStorage.getItem('token'),
  };
}

export function createOfflineContext(env: BrowserEnvironment, cfg: OfflineConfig = defaultConfig): OfflineContext {
  const now = env.now ?? Date.now;
  const openStore = env.openStore ?? (() => openLocalStore());
  const isOnline = () => env.navigator.onLine;

  const store = createPwaStore({ isOnline: isOnline(), now: now(), storage: env.storage });
  const registrar = new ServiceWorkerRegistrar({ store, supported: env.serviceWorkerSupported, config: cfg });

  const queue: PendingOperationQueue = new PendingOperationQueue({
    submit: createFetchSubmitter(env.fetch),
    openStore,
    isOnline,
    requestSync: () => scheduler.requestReplay(),
    now,
  });

  const scheduler: SyncScheduler = new SyncScheduler({
    getRegistration: () => registrar.getRegistration(),
    replay: () => queue.replay(),
    isOnline,
  });

  const records = new CachedRecordRepository({ openStore, now });
  const connectivity = new ConnectivityMonitor({
    target: env.window,
    navigator: env.navigator,
    store,
    scheduler,
    now,
  });
  const install = new InstallPromptManager({
    target: env.window,
    storage: env.storage,
    store,
    now,
    isStandalone: env.isStandalone,
  });
  const notifier = new LocalNotifier(env.notifications, env.navigation);
  const preferences = new NotificationPreferences({
    notifier,
    host: env.notifications,
    storage: env.storage,
    getAuthToken: env.getAuthToken,
  });

  let unsubscribe: (() => void) | null = null;

  const refreshPendingCount = async () => {
    try {
      store.getState().setPendingCount(await queue.count());
    } catch (error) {
      console.warn('[PWA] Pending count unavailable:', errorMessage(error));
    }
  };

  return {
    config: cfg,
    store,
    queue,
    records,
    scheduler,
    registrar,
    connectivity,
    install,
    notifier,
    preferences,

    async start() {
      if (unsubscribe) return;
      if (cfg.debug) logConfig(cfg);

      unsubscribe = queue.onChange(count => store.getState().setPendingCount(count));
      connectivity.start();
      install.start();

      await registrar.register();
      await refreshPendingCount();
      console.log('[PWA] Offline layer ready');
    },

    stop() {
      unsubscribe?.();
      unsubscribe = null;
      connectivity.stop();
      install.stop();
      registrar.stop();
    },

    sendMessage(groupId, draft) {
      const body: JsonObject = { content: draft.content, group_id: groupId };
      if (draft.attachments) body.attachments = draft.attachments;
      if (draft.reply_to) body.reply_to = draft.reply_to;

      const request = createPendingOperationRequest(`${cfg.apiBaseUrl}/messages`, 'POST', body);
      const token = env.getAuthToken?.();
      if (token) {
        request.headers = { Authorization: `Bearer ${token}` };
      }
      return queue.sendOrQueue({ request, kind: 'message', collectionId: groupId });
    },
  };
}
