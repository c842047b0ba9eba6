import os from "os";
import path from "path";
import { DEFAULT_CACHE_CONFIG, isLogLevel, resolveCacheConfig, type CacheConfig, type LogLevel } from "@bucket-cache/engine";

export type PropertyStoreKind = "sqlite" | "memory";

export interface RuntimeConfig {
  cache: CacheConfig;
  propertyStore: PropertyStoreKind;
  logLevel: LogLevel;
}

export const ENV_KEYS = {
  dataPath: "BUCKET_CACHE_DATA_PATH",
  ttl: "BUCKET_CACHE_TTL",
  listTypes: "BUCKET_CACHE_LIST_TYPES",
  propertyPrefix: "BUCKET_CACHE_PROPERTY_PREFIX",
  propertyStore: "BUCKET_CACHE_PROPERTY_STORE",
  logLevel: "BUCKET_CACHE_LOG_LEVEL"
} as const;

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  cache: DEFAULT_CACHE_CONFIG,
  propertyStore: "sqlite",
  logLevel: "info"
};

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const cache = resolveCacheConfig({
    dataPath: normalizePath(env[ENV_KEYS.dataPath]),
    defaultTtl: normalizeTtl(env[ENV_KEYS.ttl]),
    knownListTypes: normalizeList(env[ENV_KEYS.listTypes]),
    propertyPrefix: env[ENV_KEYS.propertyPrefix]?.trim() || undefined
  });
  const propertyStore = env[ENV_KEYS.propertyStore]?.trim().toLowerCase() === "memory" ? "memory" : "sqlite";
  const level = env[ENV_KEYS.logLevel]?.trim().toLowerCase();
  return {
    cache,
    propertyStore,
    logLevel: isLogLevel(level) ? level : DEFAULT_RUNTIME_CONFIG.logLevel
  };
}

function normalizePath(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  if (trimmed === "~" || trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  return path.resolve(trimmed);
}

function normalizeTtl(value: string | undefined): number | undefined {
  if (!value || !/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

function normalizeList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
