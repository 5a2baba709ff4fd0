/**
 * Install Prompt Manager
 *
 * Defers the browser's install prompt and drives the install banner.
 * A dismissal suppresses the banner for seven days.
 */

import { INSTALL_PROMPT, STORAGE_KEYS } from '@/lib/constants';
import type { PwaStore } from '@/store/pwaStore';
import type { EventSourceLike, KeyValueStorage } from './types';

export type InstallOutcome = 'accepted' | 'dismissed' | 'unavailable';

// BeforeInstallPromptEvent is not in the DOM lib
export interface DeferredInstallPrompt {
  preventDefault(): void;
  prompt(): Promise<void>;
  readonly userChoice: Promise<{ outcome: 'accepted' | 'dismissed' }>;
}

export function isDeferredInstallPrompt(event: Event): event is Event & DeferredInstallPrompt {
  return 'prompt' in event && typeof event.prompt === 'function' && 'userChoice' in event;
}

export interface InstallPromptOptions {
  target: EventSourceLike;
  storage: KeyValueStorage;
  store: PwaStore;
  now?: () => number;
  isStandalone?: () => boolean;
}

export class InstallPromptManager {
  private readonly options: InstallPromptOptions;
  private readonly now: () => number;
  private deferred: DeferredInstallPrompt | null = null;
  private started = false;

  constructor(options: InstallPromptOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    if (this.options.isStandalone?.()) {
      this.options.store.getState().markInstalled();
    }

    this.options.target.addEventListener('beforeinstallprompt', this.handleBeforeInstallPrompt);
    this.options.target.addEventListener('appinstalled', this.handleAppInstalled);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;

    this.options.target.removeEventListener('beforeinstallprompt', this.handleBeforeInstallPrompt);
    this.options.target.removeEventListener('appinstalled', this.handleAppInstalled);
  }

  /**
   * False while a dismissal from the last seven days is on record
   */
  shouldShowBanner(): boolean {
    const dismissedAt = parseInt(this.options.storage.getItem(STORAGE_KEYS.INSTALL_DISMISSED_AT) || '', 10);
    if (Number.isNaN(dismissedAt)) return true;
    return this.now() - dismissedAt >= INSTALL_PROMPT.DISMISS_COOLDOWN_MS;
  }

  async install(): Promise<InstallOutcome> {
    const deferred = this.deferred;
    if (!deferred) return 'unavailable';

    // A deferred prompt can only be used once
    this.deferred = null;
    this.options.store.getState().setInstallAvailable(false, false);

    await deferred.prompt();
    const { outcome } = await deferred.userChoice;
    console.log(`[PWA] Install prompt ${outcome}`);
    return outcome;
  }

  dismiss(): void {
    this.options.storage.setItem(STORAGE_KEYS.INSTALL_DISMISSED_AT, String(this.now()));
    this.options.store.getState().hideInstallBanner();
  }

  private readonly handleBeforeInstallPrompt = (event: Event): void => {
    if (!isDeferredInstallPrompt(event)) return;

    event.preventDefault();
    this.deferred = event;
    this.options.store.getState().setInstallAvailable(true, this.shouldShowBanner());
  };

  private readonly handleAppInstalled = (): void => {
    console.log('[PWA] App was installed');
    this.deferred = null;
    this.options.store.getState().markInstalled();
  };
}
