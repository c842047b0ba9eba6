export interface CacheEntry<TValue = unknown> {
  content: TValue;
  /**
   * Absolute expiry instant in seconds since the epoch, fractions kept.
   */
  eol: number;
}

export type StoreErrorKind = "not_found" | "corrupt" | "io";

export interface StoreError {
  kind: StoreErrorKind;
  message: string;
  cause?: unknown;
}

export type StoreResult<TValue> =
  | {
      ok: true;
      value: TValue;
    }
  | {
      ok: false;
      error: StoreError;
    };

/**
 * Host key/value facility holding one serialized bucket per slot.
 */
export interface PropertyStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
  close?(): Promise<void>;
}

export const ok = <TValue>(value: TValue): StoreResult<TValue> => ({ ok: true, value });

export const fail = <TValue>(kind: StoreErrorKind, message: string, cause?: unknown): StoreResult<TValue> => ({
  ok: false,
  error: { kind, message, cause }
});

export const nowInSeconds = (): number => Date.now() / 1000;

export const createEntry = <TValue>(content: TValue, ttlSeconds: number, now = nowInSeconds()): CacheEntry<TValue> => ({
  content,
  eol: now + ttlSeconds
});

export const isExpired = (entry: CacheEntry, now = nowInSeconds()): boolean => now >= entry.eol;

export const isCacheEntry = (value: unknown): value is CacheEntry => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return "eol" in value && typeof value.eol === "number" && Number.isFinite(value.eol) && "content" in value;
};
