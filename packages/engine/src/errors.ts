export type CacheMissReason = "absent" | "expired";

/**
 * Requested entry is not in the cache, or was there but reached its EOL.
 */
export class CacheMiss extends Error {
  readonly bucket: string;
  readonly identifier: string;
  readonly reason: CacheMissReason;

  constructor(bucket: string, identifier: string, reason: CacheMissReason = "absent") {
    super(`Cache miss on ${identifier} in ${bucket} (${reason})`);
    this.name = "CacheMiss";
    this.bucket = bucket;
    this.identifier = identifier;
    this.reason = reason;
  }
}

export class UnknownCacheBucketError extends Error {
  readonly bucket: string;

  constructor(bucket: string) {
    super(`Unknown cache bucket: ${bucket}`);
    this.name = "UnknownCacheBucketError";
    this.bucket = bucket;
  }
}

export class CacheConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CacheConfigurationError";
  }
}

export const isCacheMiss = (error: unknown): error is CacheMiss => error instanceof CacheMiss;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
