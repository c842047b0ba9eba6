import { assertCacheBucket, CACHE_BUCKETS, isReservedBucket, type CacheBucket } from "../buckets";
import { BucketStore } from "../cache/bucket-store";
import type { DiskStore } from "../cache/disk-store";
import { BucketPropertyLayer, type BucketEntries } from "../cache/property-layer";
import { createEntry, isExpired, nowInSeconds, type PropertyStore } from "../cache/types";
import { resolveCacheConfig, type CacheConfig } from "../config";
import { CacheMiss, isCacheMiss } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { BucketLock } from "./bucket-lock";
import { resolveIdentifier, type IdentifierOptions } from "./identifier";
import { routeLocation, type NavigationHost } from "./last-location";

export interface CacheEngineOptions {
  disk: DiskStore;
  properties: PropertyStore;
  config?: Partial<CacheConfig>;
  logger?: Logger;
  navigation?: NavigationHost;
}

export interface AddOptions {
  /**
   * Seconds until expiry. Falls back to the configured default when omitted
   * or not positive.
   */
  ttl?: number;
  toDisk?: boolean;
}

export interface MemoizeOptions extends IdentifierOptions, AddOptions {}

export type Producer<TArgs extends unknown[], TResult> = (...args: TArgs) => TResult | Promise<TResult>;

export type InjectingProducer<TArgs extends unknown[], TResult> = (
  cached: TResult | undefined,
  ...args: TArgs
) => TResult | Promise<TResult>;

/**
 * Two-tier TTL cache: resident buckets backed by per-entry disk files, with
 * whole buckets written behind into host property slots on `commit`.
 */
export class CacheEngine {
  readonly config: CacheConfig;
  private readonly disk: DiskStore;
  private readonly properties: BucketPropertyLayer;
  private readonly store: BucketStore;
  private readonly locks = new BucketLock();
  private readonly logger: Logger;
  private readonly navigation?: NavigationHost;

  constructor(options: CacheEngineOptions) {
    this.config = resolveCacheConfig(options.config);
    this.disk = options.disk;
    this.logger = options.logger ?? silentLogger;
    this.navigation = options.navigation;
    this.properties = new BucketPropertyLayer({ store: options.properties, prefix: this.config.propertyPrefix });
    this.store = new BucketStore(this.properties, this.logger);
  }

  async init(): Promise<void> {
    const result = await this.disk.prepare(CACHE_BUCKETS);
    if (!result.ok) {
      this.logger.error(result.error.message);
    }
  }

  async get<TValue = unknown>(bucket: string, identifier: string): Promise<TValue> {
    const name = assertCacheBucket(bucket);
    return this.locks.run(name, async () => {
      const entries = await this.store.getBucket(name);
      let entry = entries.get(identifier);
      if (!entry) {
        this.logger.debug(`Retrieving cache entry from disk at ${this.disk.pathFor(name, identifier)}`);
        const loaded = await this.disk.read(name, identifier);
        if (!loaded.ok) {
          this.logger.debug(`Could not load from disk: ${loaded.error.message}`);
          throw new CacheMiss(name, identifier);
        }
        entry = loaded.value;
        entries.set(identifier, entry);
      }

      if (isExpired(entry, nowInSeconds())) {
        this.logger.debug(`Cache entry ${identifier} in ${name} has expired => cache miss`);
        await this.purge(name, identifier, entries);
        throw new CacheMiss(name, identifier, "expired");
      }

      this.logger.debug(`Cache hit on ${identifier} in ${name}. Entry valid until ${entry.eol}`);
      return entry.content as TValue;
    });
  }

  async add<TValue>(bucket: string, identifier: string, content: TValue, options: AddOptions = {}): Promise<void> {
    const name = assertCacheBucket(bucket);
    const ttl = options.ttl !== undefined && options.ttl > 0 ? options.ttl : this.config.defaultTtl;
    const entry = createEntry(content, ttl, nowInSeconds());
    await this.locks.run(name, async () => {
      const entries = await this.store.getBucket(name);
      entries.set(identifier, entry);
      if (options.toDisk) {
        const written = await this.disk.write(name, identifier, entry);
        if (!written.ok) {
          this.logger.error(written.error.message);
        }
      }
    });
  }

  /**
   * Wraps a producer so its result is served from `bucket` until it expires.
   * The bucket is checked now; the identifier is resolved on every call.
   */
  memoize(bucket: string, options: MemoizeOptions = {}) {
    const name = assertCacheBucket(bucket);
    return <TArgs extends unknown[], TResult>(producer: Producer<TArgs, TResult>) =>
      async (...args: TArgs): Promise<TResult> => {
        const identifier = resolveIdentifier(options, args);
        try {
          return await this.get<TResult>(name, identifier);
        } catch (error) {
          if (!isCacheMiss(error)) {
            throw error;
          }
        }
        const output = await producer(...args);
        await this.add(name, identifier, output, options);
        return output;
      };
  }

  /**
   * Like `memoize`, but always runs the producer, handing it the cached value
   * (or undefined) so it can refresh it. The result replaces the entry.
   */
  injectCached(bucket: string, options: MemoizeOptions = {}) {
    const name = assertCacheBucket(bucket);
    return <TArgs extends unknown[], TResult>(producer: InjectingProducer<TArgs, TResult>) =>
      async (...args: TArgs): Promise<TResult> => {
        const identifier = resolveIdentifier(options, args);
        let cached: TResult | undefined;
        try {
          cached = await this.get<TResult>(name, identifier);
        } catch (error) {
          if (!isCacheMiss(error)) {
            throw error;
          }
          cached = undefined;
        }
        const output = await producer(cached, ...args);
        await this.add(name, identifier, output, options);
        return output;
      };
  }

  async invalidateEntry(bucket: string, identifier: string): Promise<void> {
    const name = assertCacheBucket(bucket);
    await this.locks.run(name, async () => {
      const entries = await this.store.getBucket(name);
      const removed = await this.purge(name, identifier, entries);
      if (removed) {
        this.logger.debug(`Invalidated ${identifier} in ${name}`);
      } else {
        this.logger.debug(`Nothing to invalidate, ${identifier} was not in ${name}`);
      }
    });
  }

  /**
   * Clears every resident bucket and its persisted state, including disk files
   * of entries that were never promoted into memory. Buckets never loaded by
   * this process keep their disk files.
   */
  async invalidateCache(): Promise<void> {
    for (const [name, entries] of this.store.resident()) {
      await this.locks.run(name, async () => {
        if (!isReservedBucket(name)) {
          const cleared = await this.disk.clearBucket(name);
          if (!cleared.ok) {
            this.logger.error(cleared.error.message);
          }
        }
        entries.clear();
        const slot = await this.properties.clear(name);
        if (!slot.ok) {
          this.logger.error(slot.error.message);
        }
      });
    }
    this.store.reset();
    this.logger.info("Cache invalidated");
  }

  async invalidateLastLocation(): Promise<void> {
    if (!this.navigation) {
      this.logger.warn("No navigation host configured, cannot invalidate last location");
      return;
    }
    const navigation = this.navigation;
    const segments = await navigation.lastLocation();
    if (!segments) {
      this.logger.debug("No last location recorded, nothing to invalidate");
      return;
    }
    this.logger.debug(`Invalidating cache for last location /${segments.join("/")}`);

    const route = await routeLocation(segments, this.config.knownListTypes, (listType) =>
      navigation.listIdForType(listType)
    );
    if (route.kind === "malformed") {
      this.logger.error(
        `Failed to invalidate cache entry for last location: too few segments in /${route.segments.join("/")}`
      );
      return;
    }
    if (route.targets.length === 0) {
      this.logger.debug(`Last location /${segments.join("/")} has no cached view`);
    }
    for (const target of route.targets) {
      await this.invalidateEntry(target.bucket, target.identifier);
    }
  }

  async commit(): Promise<void> {
    for (const [name, entries] of this.store.resident()) {
      const saved = await this.properties.save(name, entries);
      if (!saved.ok) {
        this.logger.error(saved.error.message);
      }
    }
    this.logger.debug("Successfully persisted cache to property store");
  }

  residentBuckets(): CacheBucket[] {
    return this.store.resident().map(([name]) => name);
  }

  private async purge(bucket: CacheBucket, identifier: string, entries: BucketEntries): Promise<boolean> {
    const inMemory = entries.delete(identifier);
    // library.ndb is shared by every identifier of the reserved bucket
    if (isReservedBucket(bucket) && !inMemory) {
      return false;
    }
    const removed = await this.disk.remove(bucket, identifier);
    if (!removed.ok) {
      this.logger.error(removed.error.message);
      return inMemory;
    }
    return inMemory || removed.value;
  }
}

export const createCacheEngine = (options: CacheEngineOptions): CacheEngine => new CacheEngine(options);
