/**
 * Service worker registration via workbox-window
 */

import { Workbox } from 'workbox-window';
import { config as defaultConfig, OfflineConfig } from '@/lib/config/env';
import { errorMessage } from '@/lib/offline/errors';
import type { PwaStore } from '@/store/pwaStore';

export interface ServiceWorkerRegistrarOptions {
  store: PwaStore;
  // False when the browser has no service worker support
  supported: boolean;
  config?: OfflineConfig;
}

export class ServiceWorkerRegistrar {
  private readonly options: ServiceWorkerRegistrarOptions;
  private readonly cfg: OfflineConfig;
  private wb: Workbox | null = null;
  private registration: ServiceWorkerRegistration | null = null;
  private updateTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ServiceWorkerRegistrarOptions) {
    this.options = options;
    this.cfg = options.config ?? defaultConfig;
  }

  /**
   * Register the worker and start periodic update checks.
   * Resolves false when unsupported or when registration fails.
   */
  async register(): Promise<boolean> {
    if (!this.options.supported) {
      console.log('[SW] Service workers not supported');
      return false;
    }
    if (this.wb) return this.registration !== null;

    const wb = new Workbox(this.cfg.serviceWorkerUrl);
    this.wb = wb;

    // Handle updates
    wb.addEventListener('waiting', () => {
      console.log('[SW] New version available');
      this.options.store.getState().setUpdateAvailable(true);
    });

    wb.addEventListener('controlling', () => {
      console.log('[SW] New version activated');
      this.options.store.getState().setUpdateAvailable(false);
    });

    try {
      this.registration = (await wb.register()) ?? null;
      console.log('[SW] Registered successfully');
    } catch (error) {
      console.error('[SW] Registration failed:', errorMessage(error));
      this.wb = null;
      return false;
    }

    this.updateTimer = setInterval(() => {
      wb.update().catch((error: unknown) => {
        console.warn('[SW] Update check failed:', errorMessage(error));
      });
    }, this.cfg.swUpdateIntervalMs);

    return true;
  }

  async getRegistration(): Promise<ServiceWorkerRegistration | null> {
    return this.registration;
  }

  /**
   * Tell the waiting worker to take over
   */
  activateUpdate(): void {
    if (this.wb) {
      this.wb.messageSkipWaiting();
    }
  }

  /**
   * Ask the active worker to replay the pending queue now
   */
  async requestReplay(): Promise<boolean> {
    if (!this.wb) return false;
    try {
      await this.wb.messageSW({ type: 'REPLAY_QUEUE' });
      return true;
    } catch (error) {
      console.warn('[SW] Replay request not delivered:', errorMessage(error));
      return false;
    }
  }

  stop(): void {
    if (this.updateTimer) {
      clearInterval(this.updateTimer);
      this.updateTimer = null;
    }
  }
}
