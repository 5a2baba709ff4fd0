// Page-side entry of the offline layer
export {
  createOfflineContext,
  browserEnvironment,
  type BrowserEnvironment,
  type MessageDraft,
  type OfflineContext,
} from './context';
export { ConnectivityMonitor } from './connectivity';
export { InstallPromptManager, type InstallOutcome } from './installPrompt';
export {
  LocalNotifier,
  NotificationPreferences,
  createBrowserNotificationHost,
  type NotificationHost,
  type LocalNotificationOptions,
} from './notifications';
export { ServiceWorkerRegistrar } from './registration';
export type { EventSourceLike, KeyValueStorage, NavigatorLike } from './types';

export { createPwaStore, type PwaState, type PwaStore } from '@/store/pwaStore';
export * from '@/lib/offline';
