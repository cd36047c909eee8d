import type { JsonValue } from "../json.js";
import { silentLogger } from "../logging.js";
import type { Logger } from "../logging.js";
import type { CacheProvider } from "./types.js";

export interface ReadThroughOptions<T extends JsonValue> {
  cache?: CacheProvider;
  key: string;
  ttlSeconds: number;
  /**
   * Narrows a cached value; returning null treats the entry as a miss.
   */
  parse: (value: JsonValue) => T | null;
  load: () => Promise<T>;
  logger?: Logger;
  /**
   * Prefix for diagnostic lines, e.g. "geocode".
   */
  label: string;
}

export async function readThrough<T extends JsonValue>(options: ReadThroughOptions<T>): Promise<T> {
  const { cache, key, ttlSeconds, parse, load, label } = options;
  const logger = options.logger ?? silentLogger;

  if (!cache) {
    return load();
  }

  const cached = await cache.get(key, ttlSeconds);
  if (cached !== undefined) {
    const value = parse(cached);
    if (value !== null) {
      logger.debug(`${label} cache hit: ${key}`);
      return value;
    }
  }

  logger.debug(`${label} cache miss: ${key}`);
  const fresh = await load();
  await cache.set(key, fresh);
  return fresh;
}
