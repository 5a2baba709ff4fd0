/**
 * Connectivity Monitor
 *
 * Keeps the online/offline indicator in the PWA store current and kicks
 * off a queue replay whenever the page comes back online.
 */

import type { ReplayRequestOutcome, SyncScheduler } from '@/lib/offline/backgroundSync';
import { errorMessage } from '@/lib/offline/errors';
import type { PwaStore } from '@/store/pwaStore';
import type { EventSourceLike, NavigatorLike } from './types';

export interface ConnectivityMonitorOptions {
  target: EventSourceLike;
  navigator: NavigatorLike;
  store: PwaStore;
  scheduler: Pick<SyncScheduler, 'handleOnline'>;
  now?: () => number;
}

export class ConnectivityMonitor {
  private readonly options: ConnectivityMonitorOptions;
  private readonly now: () => number;
  private started = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: ConnectivityMonitorOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /**
   * Attach listeners and apply the current state once
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.options.target.addEventListener('online', this.handleOnline);
    this.options.target.addEventListener('offline', this.handleOffline);

    if (this.options.navigator.onLine) {
      this.options.store.getState().setOnline(true, this.now());
    } else {
      this.handleOffline();
    }
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;

    this.options.target.removeEventListener('online', this.handleOnline);
    this.options.target.removeEventListener('offline', this.handleOffline);
  }

  /**
   * Resolves once the replay started by the last online transition is done
   */
  settled(): Promise<void> {
    return this.pending;
  }

  private readonly handleOnline = (): void => {
    console.log('[PWA] Connection restored');
    this.options.store.getState().setOnline(true, this.now());
    this.pending = this.options.scheduler.handleOnline().then(
      outcome => this.recordOutcome(outcome),
      (error: unknown) => {
        console.error('[PWA] Replay after reconnect failed:', errorMessage(error));
      }
    );
  };

  private readonly handleOffline = (): void => {
    console.log('[PWA] Connection lost, working offline');
    this.options.store.getState().setOnline(false, this.now());
  };

  private recordOutcome(outcome: ReplayRequestOutcome): void {
    if (outcome.mode === 'replayed') {
      this.options.store.getState().recordReplay(outcome.report);
    }
  }
}
