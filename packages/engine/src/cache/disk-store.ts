import { promises as fs } from "fs";
import path from "path";
import { isReservedBucket, type CacheBucket } from "../buckets";
import { describeError } from "../errors";
import { fail, isCacheEntry, ok, type CacheEntry, type StoreResult } from "./types";

export interface DiskStoreOptions {
  rootDir: string;
  /**
   * File name of the reserved bucket, directly under `rootDir`.
   */
  reservedFileName?: string;
}

interface DiskRecord<TValue> extends CacheEntry<TValue> {
  identifier: string;
}

const CACHE_DIR = "cache";
const ENTRY_EXTENSION = ".cache";

export const sanitizeIdentifier = (identifier: string): string => identifier.replace(/[^a-zA-Z0-9._-]+/g, "_");

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;

/**
 * One JSON file per (bucket, identifier). The reserved bucket maps every
 * identifier onto a single file outside the cache directory.
 */
export class DiskStore {
  private readonly rootDir: string;
  private readonly reservedFileName: string;

  constructor(options: DiskStoreOptions) {
    this.rootDir = options.rootDir;
    this.reservedFileName = options.reservedFileName ?? "library.ndb";
  }

  pathFor(bucket: CacheBucket, identifier: string): string {
    if (isReservedBucket(bucket)) {
      return path.join(this.rootDir, this.reservedFileName);
    }
    return path.join(this.rootDir, CACHE_DIR, bucket, `${sanitizeIdentifier(identifier)}${ENTRY_EXTENSION}`);
  }

  bucketDir(bucket: CacheBucket): string {
    return path.join(this.rootDir, CACHE_DIR, bucket);
  }

  async prepare(buckets: readonly CacheBucket[]): Promise<StoreResult<string[]>> {
    const created: string[] = [];
    for (const bucket of buckets) {
      if (isReservedBucket(bucket)) continue;
      const dir = this.bucketDir(bucket);
      try {
        await fs.mkdir(dir, { recursive: true });
        created.push(dir);
      } catch (error) {
        return fail("io", `Could not create ${dir}: ${describeError(error)}`, error);
      }
    }
    return ok(created);
  }

  async read<TValue>(bucket: CacheBucket, identifier: string): Promise<StoreResult<CacheEntry<TValue>>> {
    const fullPath = this.pathFor(bucket, identifier);
    let raw: string;
    try {
      raw = await fs.readFile(fullPath, "utf8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return fail("not_found", `No cache file at ${fullPath}`);
      }
      return fail("io", `Could not read ${fullPath}: ${describeError(error)}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return fail("corrupt", `Unparsable cache file at ${fullPath}`, error);
    }
    if (!isCacheEntry(parsed)) {
      return fail("corrupt", `Malformed cache file at ${fullPath}`);
    }
    if (!isReservedBucket(bucket) && (!("identifier" in parsed) || parsed.identifier !== identifier)) {
      return fail("not_found", `Cache file at ${fullPath} belongs to another identifier`);
    }
    return ok({ content: parsed.content as TValue, eol: parsed.eol });
  }

  async write<TValue>(bucket: CacheBucket, identifier: string, entry: CacheEntry<TValue>): Promise<StoreResult<void>> {
    const fullPath = this.pathFor(bucket, identifier);
    const record: DiskRecord<TValue> = { identifier, eol: entry.eol, content: entry.content };
    try {
      const payload = JSON.stringify(record);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, payload, "utf8");
      return ok(undefined);
    } catch (error) {
      return fail("io", `Failed to write cache entry to ${fullPath}: ${describeError(error)}`, error);
    }
  }

  /**
   * Deletes every entry file of a bucket, resident or not. Returns how many
   * files went away.
   */
  async clearBucket(bucket: CacheBucket): Promise<StoreResult<number>> {
    if (isReservedBucket(bucket)) {
      return ok(0);
    }
    const dir = this.bucketDir(bucket);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return ok(0);
      }
      return fail("io", `Could not list ${dir}: ${describeError(error)}`, error);
    }

    let removed = 0;
    for (const name of names) {
      if (!name.endsWith(ENTRY_EXTENSION)) continue;
      const fullPath = path.join(dir, name);
      try {
        await fs.unlink(fullPath);
        removed += 1;
      } catch (error) {
        if (errorCode(error) === "ENOENT") continue;
        return fail("io", `Failed to delete ${fullPath}: ${describeError(error)}`, error);
      }
    }
    return ok(removed);
  }

  async remove(bucket: CacheBucket, identifier: string): Promise<StoreResult<boolean>> {
    const fullPath = this.pathFor(bucket, identifier);
    try {
      await fs.unlink(fullPath);
      return ok(true);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return ok(false);
      }
      return fail("io", `Failed to delete ${fullPath}: ${describeError(error)}`, error);
    }
  }
}

export const createDiskStore = (options: DiskStoreOptions): DiskStore => new DiskStore(options);
