import { CACHE_CONFIG } from '@/lib/constants';
import { PrecacheError } from '@/lib/offline/errors';
import type { CacheStorageLike } from './types';

export interface PartitionNames {
  static: string;
  dynamic: string;
}

export function partitionNames(version: string): PartitionNames {
  return {
    static: `${CACHE_CONFIG.STATIC_PREFIX}-${version}`,
    dynamic: `${CACHE_CONFIG.DYNAMIC_PREFIX}-${version}`,
  };
}

/**
 * Fill the static partition with the shell. All or nothing: one missing
 * asset fails the install and the previous worker stays in control.
 */
export async function precacheShell(
  caches: CacheStorageLike,
  partitions: PartitionNames,
  assets: readonly string[]
): Promise<void> {
  try {
    const cache = await caches.open(partitions.static);
    await cache.addAll([...assets]);
    console.log(`[SW] Precached ${assets.length} shell assets into ${partitions.static}`);
  } catch (error) {
    throw new PrecacheError(assets, { cause: error });
  }
}

/**
 * Delete every partition that is not one of the current two.
 * Returns the names that were removed.
 */
export async function rotatePartitions(caches: CacheStorageLike, partitions: PartitionNames): Promise<string[]> {
  const keep = new Set([partitions.static, partitions.dynamic]);
  const stale = (await caches.keys()).filter(name => !keep.has(name));

  await Promise.all(
    stale.map(async name => {
      await caches.delete(name);
      console.log('[SW] Deleting old cache:', name);
    })
  );

  return stale;
}
