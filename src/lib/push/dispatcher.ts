/**
 * Notification Dispatcher
 *
 * Runs in the service worker: shows push notifications, keeps a local
 * history of them, and routes clicks to an existing window when one is
 * already showing the target page.
 */

import { NOTIFICATION_ACTIONS, NOTIFICATION_DEFAULTS } from '@/lib/constants';
import { LocalStore, NotificationRecord, openLocalStore } from '@/lib/offline/db';
import { errorMessage } from '@/lib/offline/errors';
import type {
  ClientsLike,
  NotificationEventLike,
  PushMessageDataLike,
  WorkerRegistrationLike,
} from '@/lib/sw/types';
import { isJsonObject } from '@/types/json';
import { buildNotification, parsePushPayload, PushParseResult } from './payload';

export type ClickOutcome = 'dismissed' | 'focused' | 'opened' | 'none';

export interface NotificationDispatcherOptions {
  registration: WorkerRegistrationLike;
  origin: string;
  openStore?: () => Promise<LocalStore>;
  now?: () => number;
  generateId?: () => string;
}

interface ClickTarget {
  url: string;
  recordId?: string;
}

function readClickTarget(data: unknown): ClickTarget {
  if (!isJsonObject(data)) return { url: NOTIFICATION_DEFAULTS.URL };
  const url = typeof data.url === 'string' && data.url ? data.url : NOTIFICATION_DEFAULTS.URL;
  return typeof data.recordId === 'string' ? { url, recordId: data.recordId } : { url };
}

/**
 * Same origin and same path+query; the fragment is ignored
 */
export function isSamePage(clientUrl: string, target: URL): boolean {
  let client: URL;
  try {
    client = new URL(clientUrl);
  } catch {
    return false;
  }
  return client.origin === target.origin && client.pathname === target.pathname && client.search === target.search;
}

export class NotificationDispatcher {
  private readonly registration: WorkerRegistrationLike;
  private readonly origin: string;
  private readonly openStore: () => Promise<LocalStore>;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: NotificationDispatcherOptions) {
    this.registration = options.registration;
    this.origin = options.origin;
    this.openStore = options.openStore ?? (() => openLocalStore());
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  /**
   * Handle a push message. Never rejects on bad payloads; the user still
   * gets a notification.
   */
  async showPush(data: PushMessageDataLike | null): Promise<NotificationRecord> {
    const text = data ? data.text() : '';
    const result: PushParseResult = text ? parsePushPayload(text) : { ok: true, payload: {} };

    if (!result.ok) {
      console.warn('[Push] Could not parse payload, showing raw text:', result.error.message);
    }

    return this.show(result);
  }

  async show(result: PushParseResult): Promise<NotificationRecord> {
    const { title, options } = buildNotification(result);
    const record: NotificationRecord = {
      id: this.generateId(),
      title,
      body: options.body,
      url: options.data.url,
      tag: options.tag,
      read: 0,
      state: 'shown',
      createdAt: this.now(),
    };

    await this.registration.showNotification(title, {
      ...options,
      data: { ...options.data, recordId: record.id },
    });

    await this.persist(record);
    return record;
  }

  async handleClick(event: NotificationEventLike, clients: ClientsLike): Promise<ClickOutcome> {
    event.notification.close();

    const target = readClickTarget(event.notification.data);
    if (target.recordId) {
      await this.markClosed(target.recordId, true);
    }

    if (event.action === NOTIFICATION_ACTIONS.DISMISS) {
      return 'dismissed';
    }

    let url: URL;
    try {
      url = new URL(target.url, this.origin);
    } catch {
      console.warn('[Push] Ignoring click with invalid url:', target.url);
      return 'none';
    }

    const windows = await clients.matchAll({ type: 'window', includeUncontrolled: true });
    const existing = windows.find(client => isSamePage(client.url, url));
    if (existing) {
      await existing.focus();
      return 'focused';
    }

    const opened = await clients.openWindow(url.href);
    return opened ? 'opened' : 'none';
  }

  /**
   * Notification closed without a click
   */
  async handleClose(event: NotificationEventLike): Promise<void> {
    const target = readClickTarget(event.notification.data);
    if (target.recordId) {
      await this.markClosed(target.recordId, false);
    }
  }

  async listNotifications(options: { unreadOnly?: boolean } = {}): Promise<NotificationRecord[]> {
    const store = await this.openStore();
    const records = options.unreadOnly
      ? await store.getAllByIndex('notifications', 'by-read', 0)
      : await store.getAll('notifications');
    return records.sort((a, b) => b.createdAt - a.createdAt);
  }

  async countUnread(): Promise<number> {
    const store = await this.openStore();
    return store.countByIndex('notifications', 'by-read', 0);
  }

  async markAllRead(): Promise<number> {
    const store = await this.openStore();
    const unread = await store.getAllByIndex('notifications', 'by-read', 0);
    await store.putMany(
      'notifications',
      unread.map(record => ({ ...record, read: 1 as const }))
    );
    return unread.length;
  }

  private async markClosed(id: string, read: boolean): Promise<void> {
    try {
      const store = await this.openStore();
      const record = await store.get('notifications', id);
      if (!record || record.state !== 'shown') return;

      await store.put('notifications', {
        ...record,
        state: 'closed',
        read: read ? 1 : record.read,
        closedAt: this.now(),
      });
    } catch (error) {
      console.warn('[Push] Could not update notification history:', errorMessage(error));
    }
  }

  private async persist(record: NotificationRecord): Promise<void> {
    try {
      const store = await this.openStore();
      await store.put('notifications', record);
    } catch (error) {
      console.warn('[Push] Could not record notification:', errorMessage(error));
    }
  }
}
