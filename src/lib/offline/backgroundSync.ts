/**
 * Background Sync for Offline Writes
 *
 * Uses the Background Sync API to let the service worker replay the
 * pending queue when the device comes back online. Where the API is
 * missing, the page replays eagerly on the next online transition.
 */

import { SYNC_CONFIG } from '@/lib/constants';
import type { ReplayReport } from './queue';

export interface SyncManagerLike {
  register(tag: string): Promise<void>;
}

// ServiceWorkerRegistration.sync is not in the DOM lib yet
export interface SyncCapableRegistration {
  readonly scope: string;
  sync?: SyncManagerLike;
}

/**
 * Register a one-off background sync. False when unsupported or refused.
 */
export async function registerBackgroundSync(
  registration: SyncCapableRegistration | null,
  tag: string = SYNC_CONFIG.TAG
): Promise<boolean> {
  if (!registration) {
    console.log('[Sync] Service Worker not available');
    return false;
  }

  if (!registration.sync) {
    console.log('[Sync] Background Sync not supported');
    return false;
  }

  try {
    await registration.sync.register(tag);
    console.log(`[Sync] Background sync registered (${tag})`);
    return true;
  } catch (error) {
    console.error('[Sync] Background sync registration failed:', error);
    return false;
  }
}

export type ReplayRequestOutcome =
  | { mode: 'background-sync' }
  | { mode: 'replayed'; report: ReplayReport }
  | { mode: 'deferred' };

export interface SyncSchedulerOptions {
  getRegistration: () => Promise<SyncCapableRegistration | null>;
  replay: () => Promise<ReplayReport>;
  isOnline: () => boolean;
  tag?: string;
}

export class SyncScheduler {
  private readonly options: SyncSchedulerOptions;

  constructor(options: SyncSchedulerOptions) {
    this.options = options;
  }

  /**
   * Prefer a platform background sync; otherwise replay now if online,
   * or leave it to the next online transition.
   */
  async requestReplay(): Promise<ReplayRequestOutcome> {
    const registration = await this.resolveRegistration();
    if (await registerBackgroundSync(registration, this.options.tag)) {
      return { mode: 'background-sync' };
    }

    if (!this.options.isOnline()) {
      console.log('[Sync] Offline, replay deferred until connectivity returns');
      return { mode: 'deferred' };
    }

    const report = await this.options.replay();
    return { mode: 'replayed', report };
  }

  /**
   * Called by the connectivity monitor when the page goes back online
   */
  handleOnline(): Promise<ReplayRequestOutcome> {
    console.log('[Sync] Back online, checking pending operations...');
    return this.requestReplay();
  }

  private async resolveRegistration(): Promise<SyncCapableRegistration | null> {
    try {
      return await this.options.getRegistration();
    } catch (error) {
      console.warn('[Sync] Service worker registration unavailable:', error);
      return null;
    }
  }
}
