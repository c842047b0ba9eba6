import type { CacheBucket } from "../buckets";
import { describeError } from "../errors";
import { fail, isCacheEntry, ok, type CacheEntry, type PropertyStore, type StoreResult } from "./types";

export type BucketEntries = Map<string, CacheEntry>;

export interface BucketPropertyLayerOptions {
  store: PropertyStore;
  prefix: string;
}

/**
 * Serializes whole buckets into host property slots named `<prefix>_<bucket>`.
 */
export class BucketPropertyLayer {
  private readonly store: PropertyStore;
  private readonly prefix: string;

  constructor(options: BucketPropertyLayerOptions) {
    this.store = options.store;
    this.prefix = options.prefix;
  }

  slotName(bucket: CacheBucket): string {
    return `${this.prefix}_${bucket}`;
  }

  async load(bucket: CacheBucket): Promise<StoreResult<BucketEntries>> {
    const slot = this.slotName(bucket);
    let raw: string | null;
    try {
      raw = await this.store.get(slot);
    } catch (error) {
      return fail("io", `Could not read property ${slot}: ${describeError(error)}`, error);
    }
    if (raw === null || raw === "") {
      return fail("not_found", `No instance of ${bucket} found`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return fail("corrupt", `Unparsable property ${slot}`, error);
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return fail("corrupt", `Property ${slot} does not hold a bucket`);
    }

    const entries: BucketEntries = new Map();
    for (const [identifier, value] of Object.entries(parsed)) {
      if (isCacheEntry(value)) {
        entries.set(identifier, { content: value.content, eol: value.eol });
      }
    }
    return ok(entries);
  }

  async save(bucket: CacheBucket, entries: BucketEntries): Promise<StoreResult<void>> {
    const slot = this.slotName(bucket);
    try {
      await this.store.set(slot, JSON.stringify(Object.fromEntries(entries)));
      return ok(undefined);
    } catch (error) {
      return fail("io", `Failed to persist ${bucket} to property ${slot}: ${describeError(error)}`, error);
    }
  }

  async clear(bucket: CacheBucket): Promise<StoreResult<void>> {
    const slot = this.slotName(bucket);
    try {
      await this.store.remove(slot);
      return ok(undefined);
    } catch (error) {
      return fail("io", `Failed to clear property ${slot}: ${describeError(error)}`, error);
    }
  }
}
