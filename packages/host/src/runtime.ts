import { mkdir } from "fs/promises";
import path from "path";
import {
  CacheEngine,
  createConsoleLogger,
  createDiskStore,
  createMemoryPropertyStore,
  type Logger,
  type NavigationHost,
  type PropertyStore
} from "@bucket-cache/engine";
import { loadRuntimeConfig, type RuntimeConfig } from "./env";
import { createSqlitePropertyStore } from "./sqlite-property-store";

export const PROPERTY_DATABASE = "properties.sqlite";

export interface CacheRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  navigation?: NavigationHost;
  logger?: Logger;
}

export interface CacheRuntime {
  engine: CacheEngine;
  config: RuntimeConfig;
  properties: PropertyStore;
  /**
   * Commits resident buckets and closes the property store. Safe to call twice.
   */
  shutdown(): Promise<void>;
}

async function openPropertyStore(config: RuntimeConfig): Promise<PropertyStore> {
  if (config.propertyStore === "memory") {
    return createMemoryPropertyStore();
  }
  await mkdir(config.cache.dataPath, { recursive: true });
  return createSqlitePropertyStore({ filename: path.join(config.cache.dataPath, PROPERTY_DATABASE) });
}

export async function startCacheRuntime(options: CacheRuntimeOptions = {}): Promise<CacheRuntime> {
  const config = loadRuntimeConfig(options.env);
  const logger = options.logger ?? createConsoleLogger({ level: config.logLevel });
  const properties = await openPropertyStore(config);
  const engine = new CacheEngine({
    disk: createDiskStore({ rootDir: config.cache.dataPath }),
    properties,
    config: config.cache,
    logger,
    navigation: options.navigation
  });
  await engine.init();

  let stopped: Promise<void> | null = null;
  const stop = async () => {
    await engine.commit();
    await properties.close?.();
  };

  return {
    engine,
    config,
    properties,
    shutdown() {
      if (!stopped) {
        stopped = stop();
      }
      return stopped;
    }
  };
}
