import { promises as fs } from "fs";
import path from "path";
import pLimit from "p-limit";
import { open, type Database } from "sqlite";
import sqlite3 from "sqlite3";
import { componentLogger } from "../logger.js";
import { metrics } from "../metrics.js";
import type { StructuredPayload } from "../../shared/schema.js";
import { isJsonObject } from "./parsers.js";
import { errorMessage, type CacheEntry } from "./types.js";

const logger = componentLogger("cache");

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

interface CacheRow {
  fingerprint: string;
  model: string;
  raw_response: string;
  payload: string | null;
  created_at: number;
  size: number;
}

export interface CacheStoreOptions {
  /** File path, or ":memory:". */
  path: string;
  capacityBytes: number;
  now?: () => number;
}

export interface CacheWrite {
  model: string;
  rawResponse: string;
  payload: StructuredPayload | null;
}

/** What the engine needs from a result cache. */
export interface ResultCache {
  lookup(fingerprint: string): Promise<CacheEntry | undefined>;
  store(fingerprint: string, entry: CacheWrite, overwrite?: boolean): Promise<boolean>;
  evictIfOverCapacity(): Promise<number>;
}

export function entrySize(entry: CacheWrite): number {
  return Buffer.byteLength(entry.rawResponse, "utf8") + (entry.payload ? Buffer.byteLength(JSON.stringify(entry.payload), "utf8") : 0);
}

/**
 * Content-addressed result store on an embedded SQLite file.
 *
 * Every operation goes through a single-slot queue so reads and writes from
 * concurrent pipelines are serialized. Storage errors are logged and turned
 * into misses or skipped writes; they never fail the caller's request.
 */
export class CacheStore implements ResultCache {
  private readonly queue = pLimit(1);

  private constructor(
    private readonly db: Database | null,
    private readonly capacityBytes: number,
    private readonly now: () => number
  ) {}

  static async open(options: CacheStoreOptions): Promise<CacheStore> {
    const now = options.now ?? Date.now;
    try {
      if (options.path !== ":memory:") {
        await fs.mkdir(path.dirname(path.resolve(options.path)), { recursive: true });
      }
      const db = await open({ filename: options.path, driver: sqlite3.Database });
      await db.exec("PRAGMA journal_mode = WAL;");
      await db.exec(`
        CREATE TABLE IF NOT EXISTS cache_entries (
          fingerprint TEXT PRIMARY KEY,
          model TEXT NOT NULL,
          raw_response TEXT NOT NULL,
          payload TEXT,
          created_at INTEGER NOT NULL,
          size INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_cache_entries_created_at ON cache_entries (created_at);
      `);
      logger.info("Cache store opened", { path: options.path, capacityBytes: options.capacityBytes });
      return new CacheStore(db, options.capacityBytes, now);
    } catch (error) {
      metrics.recordCacheError();
      logger.error("Failed to open cache store - caching disabled", { path: options.path, error: errorMessage(error) });
      return new CacheStore(null, options.capacityBytes, now);
    }
  }

  /** A store that never hits and never writes. */
  static disabled(): CacheStore {
    return new CacheStore(null, 0, Date.now);
  }

  get enabled(): boolean {
    return this.db !== null;
  }

  async lookup(fingerprint: string): Promise<CacheEntry | undefined> {
    const db = this.db;
    if (!db || !FINGERPRINT_PATTERN.test(fingerprint)) return undefined;

    return this.queue(async () => {
      try {
        const row = await db.get<CacheRow>("SELECT * FROM cache_entries WHERE fingerprint = ?", fingerprint);
        if (!row) {
          metrics.recordCacheMiss();
          return undefined;
        }

        const entry = this.decode(row);
        if (!entry) {
          logger.warn("Dropping corrupt cache entry", { fingerprint });
          await db.run("DELETE FROM cache_entries WHERE fingerprint = ?", fingerprint);
          metrics.recordCacheMiss();
          return undefined;
        }

        metrics.recordCacheHit();
        logger.info("Cache hit", { fingerprint: fingerprint.substring(0, 12) });
        return entry;
      } catch (error) {
        metrics.recordCacheError();
        logger.error("Cache lookup failed", { fingerprint, error: errorMessage(error) });
        return undefined;
      }
    });
  }

  /**
   * Writes an entry. Without `overwrite`, an existing entry is left alone
   * and false is returned.
   */
  async store(fingerprint: string, entry: CacheWrite, overwrite = false): Promise<boolean> {
    const db = this.db;
    if (!db) return false;
    if (!FINGERPRINT_PATTERN.test(fingerprint)) {
      logger.warn("Refusing to cache entry with malformed fingerprint", { fingerprint });
      return false;
    }

    return this.queue(async () => {
      try {
        const verb = overwrite ? "INSERT OR REPLACE" : "INSERT OR IGNORE";
        const result = await db.run(
          `${verb} INTO cache_entries (fingerprint, model, raw_response, payload, created_at, size) VALUES (?, ?, ?, ?, ?, ?)`,
          fingerprint,
          entry.model,
          entry.rawResponse,
          entry.payload ? JSON.stringify(entry.payload) : null,
          this.now(),
          entrySize(entry)
        );
        const written = (result.changes ?? 0) > 0;
        if (written) {
          metrics.recordCacheWrite();
          logger.info("Result cached", { fingerprint: fingerprint.substring(0, 12), overwrite });
        }
        return written;
      } catch (error) {
        metrics.recordCacheError();
        logger.error("Failed to cache result", { fingerprint, error: errorMessage(error) });
        return false;
      }
    });
  }

  /** Deletes oldest entries until the total size fits the ceiling. */
  async evictIfOverCapacity(): Promise<number> {
    const db = this.db;
    if (!db) return 0;

    return this.queue(async () => {
      try {
        const totals = await db.get<{ total: number }>("SELECT COALESCE(SUM(size), 0) AS total FROM cache_entries");
        let total = totals?.total ?? 0;
        let evicted = 0;

        while (total > this.capacityBytes) {
          const oldest = await db.get<{ fingerprint: string; size: number }>(
            "SELECT fingerprint, size FROM cache_entries ORDER BY created_at ASC, rowid ASC LIMIT 1"
          );
          if (!oldest) break;
          await db.run("DELETE FROM cache_entries WHERE fingerprint = ?", oldest.fingerprint);
          total -= oldest.size;
          evicted++;
        }

        if (evicted > 0) {
          metrics.recordCacheEvictions(evicted);
          logger.info("Cache evicted oldest entries", { evicted, remainingBytes: total, capacityBytes: this.capacityBytes });
        }
        return evicted;
      } catch (error) {
        metrics.recordCacheError();
        logger.error("Cache eviction failed", { error: errorMessage(error) });
        return 0;
      }
    });
  }

  async stats(): Promise<{ enabled: boolean; entries: number; totalBytes: number; capacityBytes: number }> {
    const db = this.db;
    if (!db) return { enabled: false, entries: 0, totalBytes: 0, capacityBytes: this.capacityBytes };

    return this.queue(async () => {
      const row = await db.get<{ entries: number; total: number }>(
        "SELECT COUNT(*) AS entries, COALESCE(SUM(size), 0) AS total FROM cache_entries"
      );
      return { enabled: true, entries: row?.entries ?? 0, totalBytes: row?.total ?? 0, capacityBytes: this.capacityBytes };
    });
  }

  async delete(fingerprint: string): Promise<boolean> {
    const db = this.db;
    if (!db) return false;
    return this.queue(async () => {
      const result = await db.run("DELETE FROM cache_entries WHERE fingerprint = ?", fingerprint);
      return (result.changes ?? 0) > 0;
    });
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.queue(() => this.db?.close() ?? Promise.resolve());
    }
  }

  private decode(row: CacheRow): CacheEntry | undefined {
    let payload: StructuredPayload | null = null;
    if (row.payload !== null) {
      try {
        const parsed: unknown = JSON.parse(row.payload);
        if (!isJsonObject(parsed)) return undefined;
        payload = parsed;
      } catch {
        return undefined;
      }
    }
    return {
      fingerprint: row.fingerprint,
      model: row.model,
      rawResponse: row.raw_response,
      payload,
      createdAt: row.created_at,
      size: row.size,
    };
  }
}
