export const APP_NAME = 'Huddle';

export const CACHE_CONFIG = {
  STATIC_PREFIX: 'static',
  DYNAMIC_PREFIX: 'dynamic',
  API_PREFIX: '/api/',
  OFFLINE_FALLBACK_URL: '/',
} as const;

// Everything the offline shell needs to render without a network
export const SHELL_ASSETS: readonly string[] = [
  '/',
  '/dashboard',
  '/groups',
  '/messages',
  '/profile',
  '/static/css/style.css',
  '/static/js/app.js',
  '/static/js/auth.js',
  '/static/js/pwa.js',
  '/static/manifest.json',
];

export const STORE_CONFIG = {
  NAME: 'huddle-offline',
  VERSION: 2,
} as const;

export const SYNC_CONFIG = {
  TAG: 'sync-messages',
  IDEMPOTENCY_HEADER: 'Idempotency-Key',
} as const;

export const STORAGE_KEYS = {
  NOTIFICATIONS_ENABLED: 'notifications-enabled',
  INSTALL_DISMISSED_AT: 'pwa-install-dismissed',
  PWA_STATE: 'huddle-pwa-state',
} as const;

export const INSTALL_PROMPT = {
  DISMISS_COOLDOWN_MS: 7 * 24 * 60 * 60 * 1000, // 7 days
} as const;

export const NOTIFICATION_DEFAULTS = {
  TITLE: APP_NAME,
  BODY: 'You have a new notification',
  ICON: '/static/images/icon-192.png',
  BADGE: '/static/images/badge-72.png',
  TAG: 'huddle-notification',
  URL: '/',
} as const;

export const NOTIFICATION_ACTIONS = {
  OPEN: 'open',
  DISMISS: 'dismiss',
} as const;
