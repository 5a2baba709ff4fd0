import { createStore, StoreApi } from 'zustand/vanilla';
import { createJSONStorage, persist } from 'zustand/middleware';
import { STORAGE_KEYS } from '@/lib/constants';
import type { ReplayReport } from '@/lib/offline/queue';
import type { KeyValueStorage } from '@/lib/pwa/types';

export interface ReplaySummary {
  sent: number;
  failed: number;
  finishedAt: number;
}

export interface PwaState {
  // Connectivity indicator
  isOnline: boolean;
  offlineSince: number | null;
  // Install banner
  installAvailable: boolean;
  installBannerVisible: boolean;
  isInstalled: boolean;
  // Offline writes
  pendingCount: number;
  lastReplay: ReplaySummary | null;
  // A new service worker is waiting to take over
  updateAvailable: boolean;

  // Actions
  setOnline: (isOnline: boolean, at: number) => void;
  setInstallAvailable: (available: boolean, showBanner: boolean) => void;
  hideInstallBanner: () => void;
  markInstalled: () => void;
  setPendingCount: (count: number) => void;
  recordReplay: (report: ReplayReport) => void;
  setUpdateAvailable: (available: boolean) => void;
}

export type PwaStore = StoreApi<PwaState>;

export interface PwaStoreOptions {
  isOnline: boolean;
  now: number;
  // Keeps the last replay and the installed flag across reloads
  storage?: KeyValueStorage;
}

type SetPwaState = (partial: Partial<PwaState> | ((state: PwaState) => Partial<PwaState>)) => void;

export function createPwaStore(options: PwaStoreOptions): PwaStore {
  const { storage } = options;
  if (!storage) {
    return createStore<PwaState>()((set) => pwaState(set, options));
  }

  return createStore<PwaState>()(
    persist((set) => pwaState(set, options), {
      name: STORAGE_KEYS.PWA_STATE,
      version: 1,
      storage: createJSONStorage(() => storage),
      partialize: (state) => ({
        lastReplay: state.lastReplay,
        isInstalled: state.isInstalled,
      }),
    })
  );
}

function pwaState(set: SetPwaState, initial: PwaStoreOptions): PwaState {
  return {
    isOnline: initial.isOnline,
    offlineSince: initial.isOnline ? null : initial.now,
    installAvailable: false,
    installBannerVisible: false,
    isInstalled: false,
    pendingCount: 0,
    lastReplay: null,
    updateAvailable: false,

    setOnline: (isOnline, at) => {
      set((state) => {
        if (state.isOnline === isOnline) return state;
        return { isOnline, offlineSince: isOnline ? null : at };
      });
    },

    setInstallAvailable: (available, showBanner) => {
      set({ installAvailable: available, installBannerVisible: available && showBanner });
    },

    hideInstallBanner: () => {
      set({ installBannerVisible: false });
    },

    markInstalled: () => {
      set({ isInstalled: true, installAvailable: false, installBannerVisible: false });
    },

    setPendingCount: (count) => {
      set({ pendingCount: count });
    },

    recordReplay: (report) => {
      set({
        lastReplay: { sent: report.sent, failed: report.failed.length, finishedAt: report.finishedAt },
      });
    },

    setUpdateAvailable: (available) => {
      set({ updateAvailable: available });
    },
  };
}
