import { promises as fs } from "fs";
import path from "path";
import { randomBytes } from "crypto";
import { isRecord } from "../json.js";
import type { JsonValue } from "../json.js";
import { withLease } from "./lease.js";
import { isFresh, systemClock } from "./types.js";
import type { CacheDocument, CacheEntry, CacheProvider, Clock } from "./types.js";

export interface FileCacheOptions {
  /**
   * JSON document holding every entry of this cache.
   */
  filePath: string;
  now?: Clock;
}

export class FileCache implements CacheProvider {
  readonly filePath: string;
  private readonly now: Clock;

  constructor(options: FileCacheOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? systemClock;
  }

  async get(key: string, ttlSeconds: number): Promise<JsonValue | undefined> {
    const entries = await this.load();
    const entry = entries.get(key);
    if (!entry || !isFresh(entry, ttlSeconds, this.now())) {
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: JsonValue): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await withLease(this.filePath, async () => {
      // Reload under the lease so keys written by other processes survive.
      const entries = await this.load();
      entries.set(key, { timestamp: this.now() / 1000, value });
      await this.writeAtomic(Object.fromEntries(entries));
    });
  }

  private async load(): Promise<Map<string, CacheEntry>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch {
      return new Map();
    }
    return parseCacheDocument(raw);
  }

  private async writeAtomic(document: CacheDocument): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tempName = `.${path.basename(this.filePath)}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`;
    const tempPath = path.join(dir, tempName);
    const payload = `${JSON.stringify(document, null, 2)}\n`;

    try {
      const handle = await fs.open(tempPath, "w");
      try {
        await handle.writeFile(payload, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}

/**
 * Anything other than an object of well-formed entries reads as an empty cache.
 */
export const parseCacheDocument = (raw: string): Map<string, CacheEntry> => {
  const entries = new Map<string, CacheEntry>();
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return entries;
  }
  if (!isRecord(parsed)) {
    return entries;
  }

  for (const [key, item] of Object.entries(parsed)) {
    if (!isRecord(item)) continue;
    if (!("value" in item)) continue;
    const { timestamp, value } = item;
    if (typeof timestamp !== "number" || !Number.isFinite(timestamp)) continue;
    entries.set(key, { timestamp, value });
  }
  return entries;
};

export const createFileCache = (options: FileCacheOptions): FileCache => {
  return new FileCache(options);
};
