import type { JsonValue } from "../json.js";

export interface CacheEntry {
  /**
   * Epoch seconds (fractional) at which the value was stored.
   */
  timestamp: number;
  value: JsonValue;
}

/**
 * Flat mapping persisted as one JSON document per cache file.
 */
export type CacheDocument = Record<string, CacheEntry>;

export interface CacheProvider {
  /**
   * Resolves to `undefined` when the key is missing or older than `ttlSeconds`.
   */
  get(key: string, ttlSeconds: number): Promise<JsonValue | undefined>;
  set(key: string, value: JsonValue): Promise<void>;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const isFresh = (entry: CacheEntry, ttlSeconds: number, nowMs: number): boolean =>
  nowMs / 1000 - entry.timestamp <= ttlSeconds;
