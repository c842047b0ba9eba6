import { UnknownCacheBucketError } from "./errors";

export const CACHE_BUCKETS = [
  "common",
  "video_list",
  "seasons",
  "episodes",
  "metadata",
  "infolabels",
  "artinfo",
  "library"
] as const;
export type CacheBucket = typeof CACHE_BUCKETS[number];

/**
 * Kept at a fixed path in the data root, outside the per-entry file scheme,
 * so clearing the cache directory never removes it.
 */
export const RESERVED_BUCKET: CacheBucket = "library";

export const isCacheBucket = (value: string): value is CacheBucket =>
  CACHE_BUCKETS.some((bucket) => bucket === value);

export function assertCacheBucket(value: string): CacheBucket {
  if (!isCacheBucket(value)) {
    throw new UnknownCacheBucketError(value);
  }
  return value;
}

export const isReservedBucket = (bucket: CacheBucket): boolean => bucket === RESERVED_BUCKET;
