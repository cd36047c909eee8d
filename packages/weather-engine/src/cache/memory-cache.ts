import type { JsonValue } from "../json.js";
import { isFresh, systemClock } from "./types.js";
import type { CacheEntry, CacheProvider, Clock } from "./types.js";

export class MemoryCache implements CacheProvider {
  private store = new Map<string, CacheEntry>();

  constructor(private readonly now: Clock = systemClock) {}

  get(key: string, ttlSeconds: number): Promise<JsonValue | undefined> {
    const entry = this.store.get(key);
    if (!entry || !isFresh(entry, ttlSeconds, this.now())) {
      return Promise.resolve(undefined);
    }

    return Promise.resolve(entry.value);
  }

  set(key: string, value: JsonValue): Promise<void> {
    this.store.set(key, { timestamp: this.now() / 1000, value });
    return Promise.resolve();
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
