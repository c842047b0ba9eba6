import os from "os";
import path from "path";

/** 100 years, for entries that should outlive any realistic session. */
export const TTL_INFINITE = 60 * 60 * 24 * 365 * 100;

export const DEFAULT_TTL_SECONDS = 2 * 60 * 60;

export const DEFAULT_LIST_TYPES = [
  "queue",
  "topTen",
  "netflixOriginals",
  "continueWatching",
  "trendingNow",
  "newRelease",
  "popularTitles"
] as const;

export interface CacheConfig {
  /**
   * Root under which `cache/<bucket>/` and the reserved bucket's file live.
   */
  dataPath: string;
  /**
   * Seconds an entry lives when `add` is called without a TTL.
   */
  defaultTtl: number;
  /**
   * List types whose video lists are addressed through a resolved list id.
   */
  knownListTypes: readonly string[];
  propertyPrefix: string;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  dataPath: path.join(os.homedir(), ".bucket-cache"),
  defaultTtl: DEFAULT_TTL_SECONDS,
  knownListTypes: DEFAULT_LIST_TYPES,
  propertyPrefix: "memcache"
};

export function resolveCacheConfig(overrides: Partial<CacheConfig> = {}): CacheConfig {
  const defaultTtl =
    typeof overrides.defaultTtl === "number" && Number.isFinite(overrides.defaultTtl) && overrides.defaultTtl > 0
      ? overrides.defaultTtl
      : DEFAULT_CACHE_CONFIG.defaultTtl;
  return {
    dataPath: overrides.dataPath || DEFAULT_CACHE_CONFIG.dataPath,
    defaultTtl,
    knownListTypes: overrides.knownListTypes ?? DEFAULT_CACHE_CONFIG.knownListTypes,
    propertyPrefix: overrides.propertyPrefix || DEFAULT_CACHE_CONFIG.propertyPrefix
  };
}
