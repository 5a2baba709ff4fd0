/**
 * Page notifications and the notification preference
 *
 * Local notifications go through the Notification API directly and need
 * no push server. The preference lives in localStorage and is mirrored to
 * the server when the user is signed in.
 */

import { NOTIFICATION_DEFAULTS, STORAGE_KEYS } from '@/lib/constants';
import { errorMessage } from '@/lib/offline/errors';
import { notificationService } from '@/services/notificationService';
import type { KeyValueStorage } from './types';

export type PermissionState = 'default' | 'granted' | 'denied' | 'unsupported';

export interface ShownNotification {
  close(): void;
  onClick(handler: () => void): void;
}

export interface LocalNotificationOptions {
  body?: string;
  icon?: string;
  badge?: string;
  tag?: string;
  url?: string;
}

/**
 * The page's Notification API, or a stand-in
 */
export interface NotificationHost {
  permission(): PermissionState;
  requestPermission(): Promise<PermissionState>;
  show(title: string, options: NotificationOptions): ShownNotification;
}

export interface WindowNavigation {
  focus(): void;
  navigate(url: string): void;
}

export function createBrowserNotificationHost(): NotificationHost {
  const supported = typeof Notification !== 'undefined';

  return {
    permission: () => (supported ? Notification.permission : 'unsupported'),
    requestPermission: async () => (supported ? Notification.requestPermission() : 'unsupported'),
    show: (title, options) => {
      const notification = new Notification(title, options);
      return {
        close: () => notification.close(),
        onClick: handler => {
          notification.onclick = handler;
        },
      };
    },
  };
}

export class LocalNotifier {
  private readonly host: NotificationHost;
  private readonly navigation: WindowNavigation;

  constructor(host: NotificationHost, navigation: WindowNavigation) {
    this.host = host;
    this.navigation = navigation;
  }

  /**
   * True when permission is (or becomes) granted
   */
  async requestPermission(): Promise<boolean> {
    const current = this.host.permission();
    if (current === 'granted') return true;
    if (current === 'denied' || current === 'unsupported') return false;

    return (await this.host.requestPermission()) === 'granted';
  }

  /**
   * Show a notification now. Does nothing without permission.
   */
  sendNotification(title: string, options: LocalNotificationOptions = {}): ShownNotification | null {
    if (this.host.permission() !== 'granted') return null;

    const { url, ...rest } = options;
    const notification = this.host.show(title, {
      icon: NOTIFICATION_DEFAULTS.ICON,
      badge: NOTIFICATION_DEFAULTS.BADGE,
      ...rest,
    });

    notification.onClick(() => {
      this.navigation.focus();
      notification.close();
      if (url) {
        this.navigation.navigate(url);
      }
    });

    return notification;
  }
}

export interface NotificationPreferencesOptions {
  notifier: LocalNotifier;
  host: NotificationHost;
  storage: KeyValueStorage;
  // Bearer token of the signed-in user, if any
  getAuthToken?: () => string | null;
}

export class NotificationPreferences {
  private readonly options: NotificationPreferencesOptions;

  constructor(options: NotificationPreferencesOptions) {
    this.options = options;
  }

  isEnabled(): boolean {
    return (
      this.options.storage.getItem(STORAGE_KEYS.NOTIFICATIONS_ENABLED) === 'true' &&
      this.options.host.permission() === 'granted'
    );
  }

  async enable(): Promise<boolean> {
    const granted = await this.options.notifier.requestPermission();
    if (!granted) {
      console.log('[Push] Notification permission denied');
      return false;
    }

    this.options.storage.setItem(STORAGE_KEYS.NOTIFICATIONS_ENABLED, 'true');

    const token = this.authToken();
    if (token) {
      try {
        await notificationService.registerPushSubscription(
          { subscription: { type: 'browser', enabled: true } },
          token
        );
      } catch (error) {
        console.warn('[Push] Server notification update skipped:', errorMessage(error));
      }
    }

    console.log('[Push] Notifications enabled');
    return true;
  }

  async disable(): Promise<void> {
    this.options.storage.removeItem(STORAGE_KEYS.NOTIFICATIONS_ENABLED);

    const token = this.authToken();
    if (token) {
      try {
        await notificationService.unregisterPushSubscription(token);
      } catch (error) {
        console.warn('[Push] Server unsubscribe skipped:', errorMessage(error));
      }
    }

    console.log('[Push] Notifications disabled');
  }

  private authToken(): string | null {
    return this.options.getAuthToken?.() ?? null;
  }
}
