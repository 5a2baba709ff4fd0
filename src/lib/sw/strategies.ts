/**
 * Cache Strategy Engine
 *
 * Decides how each intercepted GET is answered:
 * - API data: network first, dynamic cache fallback
 * - Navigations: network first, cached page or offline page fallback
 * - Static assets: cache first, refreshed in the background
 *
 * Every strategy hands back the response plus a `settled` promise that
 * covers cache writes and background refreshes, for waitUntil().
 */

import { CACHE_CONFIG } from '@/lib/constants';
import { NetworkError, errorMessage } from '@/lib/offline/errors';
import type { PartitionNames } from './partitions';
import type { CacheStorageLike } from './types';

export type RequestClass = 'api' | 'navigation' | 'static' | 'bypass';

export interface StrategyResult {
  response: Promise<Response>;
  // Never rejects
  settled: Promise<void>;
}

export interface CacheStrategyOptions {
  caches: CacheStorageLike;
  fetch: (request: Request) => Promise<Response>;
  partitions: PartitionNames;
  origin: string;
  fallbackUrl?: string;
  apiPrefix?: string;
  debug?: boolean;
}

const noop = () => undefined;

export function classifyRequest(
  request: Request,
  origin: string,
  apiPrefix: string = CACHE_CONFIG.API_PREFIX
): RequestClass {
  if (request.method !== 'GET') return 'bypass';

  const url = new URL(request.url);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return 'bypass';

  if (url.origin === origin && url.pathname.startsWith(apiPrefix)) return 'api';

  const accept = request.headers.get('accept') || '';
  if (request.mode === 'navigate' || accept.includes('text/html')) return 'navigation';

  return 'static';
}

// 206 partials cannot be stored by the Cache API
export function isCacheable(response: Response): boolean {
  return response.ok && response.status !== 206;
}

export function offlineResponse(): Response {
  return new Response('You are offline', {
    status: 503,
    statusText: 'Service Unavailable',
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  });
}

export class CacheStrategyEngine {
  private readonly caches: CacheStorageLike;
  private readonly fetchImpl: (request: Request) => Promise<Response>;
  private readonly partitions: PartitionNames;
  private readonly origin: string;
  private readonly fallbackUrl: string;
  private readonly apiPrefix: string;
  private readonly debug: boolean;

  constructor(options: CacheStrategyOptions) {
    this.caches = options.caches;
    this.fetchImpl = options.fetch;
    this.partitions = options.partitions;
    this.origin = options.origin;
    this.fallbackUrl = options.fallbackUrl ?? CACHE_CONFIG.OFFLINE_FALLBACK_URL;
    this.apiPrefix = options.apiPrefix ?? CACHE_CONFIG.API_PREFIX;
    this.debug = options.debug ?? false;
  }

  /**
   * Null means "not ours": let the request go straight to the network
   */
  handle(request: Request): StrategyResult | null {
    switch (classifyRequest(request, this.origin, this.apiPrefix)) {
      case 'api':
        return this.networkFirst(request);
      case 'navigation':
        return this.networkFirstWithFallback(request);
      case 'static':
        return this.cacheFirstWithRefresh(request);
      case 'bypass':
        return null;
    }
  }

  /**
   * Fresh data when reachable, last good copy when not. No synthetic
   * response: with nothing cached the NetworkError reaches the caller.
   */
  networkFirst(request: Request): StrategyResult {
    const partition = this.partitions.dynamic;

    const response = this.fetchAndStore(request, partition).catch(async (error: unknown) => {
      const cached = await this.lookup(partition, request);
      if (cached) {
        this.log('Network failed, serving cached API response:', request.url);
        return cached;
      }
      throw error;
    });

    return { response, settled: response.then(noop, noop) };
  }

  networkFirstWithFallback(request: Request): StrategyResult {
    const partition = this.partitions.static;

    const response = this.fetchAndStore(request, partition).catch(async () => {
      const cached = (await this.lookup(partition, request)) ?? (await this.lookup(partition, this.fallbackUrl));
      if (cached) return cached;

      console.warn('[SW] No cached page for', request.url);
      return offlineResponse();
    });

    return { response, settled: response.then(noop, noop) };
  }

  /**
   * Serve the cached copy at once and refresh it behind the caller's back;
   * the refreshed bytes show up on the next request.
   */
  cacheFirstWithRefresh(request: Request): StrategyResult {
    const partition = this.partitions.static;

    const outcome = this.lookup(partition, request).then(async cached => {
      if (cached) {
        this.log('Cache hit for static asset:', request.url);
        return { response: cached, refresh: this.refresh(request, partition) };
      }

      this.log('Cache miss for static asset:', request.url);
      const response = await this.fetchAndStore(request, partition);
      return { response, refresh: Promise.resolve() };
    });

    return {
      response: outcome.then(result => result.response),
      settled: outcome.then(result => result.refresh, noop),
    };
  }

  private async fetchAndStore(request: Request, partition: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(request);
    } catch (error) {
      throw new NetworkError(request.url, { cause: error });
    }

    if (isCacheable(response)) {
      await this.store(partition, request, response.clone());
    }
    return response;
  }

  private async refresh(request: Request, partition: string): Promise<void> {
    try {
      const fresh = await this.fetchImpl(request);
      if (isCacheable(fresh)) {
        await this.store(partition, request, fresh);
        this.log('Refreshed cached asset:', request.url);
      }
    } catch (error) {
      console.warn(`[SW] Background refresh failed for ${request.url}:`, errorMessage(error));
    }
  }

  private async store(partition: string, request: Request, response: Response): Promise<void> {
    try {
      const cache = await this.caches.open(partition);
      await cache.put(request, response);
    } catch (error) {
      console.error(`[SW] Cache write to ${partition} failed:`, errorMessage(error));
    }
  }

  private async lookup(partition: string, request: Request | string): Promise<Response | undefined> {
    try {
      const cache = await this.caches.open(partition);
      return await cache.match(request);
    } catch (error) {
      console.error(`[SW] Cache read from ${partition} failed:`, errorMessage(error));
      return undefined;
    }
  }

  private log(...args: unknown[]): void {
    if (this.debug) console.log('[SW]', ...args);
  }
}
