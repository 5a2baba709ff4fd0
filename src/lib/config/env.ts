/**
 * Environment Configuration
 *
 * Centralized settings for the page runtime and the service worker.
 * PUBLIC_* variables are inlined by the bundler for browser builds.
 */

// Bundlers define process.env as a whole; a worker loaded without one has no process
const env: NodeJS.ProcessEnv = typeof process === 'undefined' ? {} : process.env;

export const NODE_ENV = env.NODE_ENV || 'development';

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = Object.freeze({
  // REST API root the queue and cache classify against
  apiBaseUrl: env.PUBLIC_API_URL || '/api',

  // Bumping this rotates both cache partitions on the next activation
  cacheVersion: env.PUBLIC_CACHE_VERSION || 'v3',

  serviceWorkerUrl: env.PUBLIC_SW_URL || '/sw.js',
  swUpdateIntervalMs: parseIntOr(env.PUBLIC_SW_UPDATE_INTERVAL_MS, 60 * 60 * 1000),

  // Push notifications
  vapidPublicKey: env.PUBLIC_VAPID_PUBLIC_KEY || '',

  debug: env.PUBLIC_OFFLINE_DEBUG === 'true',
});

export type OfflineConfig = typeof config;

// Log-safe summary (no key material)
export function describeConfig(cfg: OfflineConfig = config): string[] {
  return [
    `Environment: ${NODE_ENV}`,
    `API base: ${cfg.apiBaseUrl}`,
    `Cache version: ${cfg.cacheVersion}`,
    `Service worker: ${cfg.serviceWorkerUrl} (update check every ${cfg.swUpdateIntervalMs}ms)`,
    `VAPID key: ${cfg.vapidPublicKey ? '✓ configured' : '○ not configured'}`,
    `Debug logging: ${cfg.debug ? 'on' : 'off'}`,
  ];
}

export function logConfig(cfg: OfflineConfig = config): void {
  console.log('📋 Offline Configuration:');
  for (const line of describeConfig(cfg)) {
    console.log(`   ${line}`);
  }
}
