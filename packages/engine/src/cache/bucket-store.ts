import { assertCacheBucket, type CacheBucket } from "../buckets";
import type { Logger } from "../logger";
import type { BucketEntries, BucketPropertyLayer } from "./property-layer";

/**
 * Resident buckets, loaded lazily from the property layer on first access.
 */
export class BucketStore {
  private readonly buckets = new Map<CacheBucket, BucketEntries>();
  private readonly pending = new Map<CacheBucket, Promise<BucketEntries>>();

  constructor(
    private readonly properties: BucketPropertyLayer,
    private readonly logger: Logger
  ) {}

  async getBucket(name: string): Promise<BucketEntries> {
    const bucket = assertCacheBucket(name);
    const resident = this.buckets.get(bucket);
    if (resident) {
      return resident;
    }

    let loading = this.pending.get(bucket);
    if (!loading) {
      loading = this.load(bucket);
      this.pending.set(bucket, loading);
    }
    try {
      return await loading;
    } finally {
      this.pending.delete(bucket);
    }
  }

  isResident(bucket: CacheBucket): boolean {
    return this.buckets.has(bucket);
  }

  resident(): Array<[CacheBucket, BucketEntries]> {
    return Array.from(this.buckets.entries());
  }

  reset(): void {
    this.buckets.clear();
    this.pending.clear();
  }

  private async load(bucket: CacheBucket): Promise<BucketEntries> {
    const result = await this.properties.load(bucket);
    let entries: BucketEntries;
    if (result.ok) {
      entries = result.value;
    } else {
      if (result.error.kind === "not_found") {
        this.logger.debug(`No instance of ${bucket} found. Creating new instance...`);
      } else {
        this.logger.warn(`Discarding persisted ${bucket}: ${result.error.message}`);
      }
      entries = new Map();
    }
    this.buckets.set(bucket, entries);
    return entries;
  }
}
