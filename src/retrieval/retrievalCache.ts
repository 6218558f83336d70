import { createHash } from "node:crypto";
import type Database from "better-sqlite3";
import { log } from "../utils/logger.js";
import type { SectionRecord } from "./types.js";

const retrievalLog = log.withScope("retrieval");

type CacheRow = { payload_json: string; expires_at_ms: number };

export class RetrievalCache {
  constructor(
    private readonly db: Database.Database,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now,
  ) {}

  static keyFor(bookId: string, query: string, k: number): string {
    return createHash("sha1").update(JSON.stringify([bookId, query.trim().toLowerCase(), k])).digest("hex");
  }

  get(key: string): SectionRecord[] | null {
    const row = this.db
      .prepare("SELECT payload_json, expires_at_ms FROM retrieval_cache WHERE cache_key = ?")
      .get(key) as CacheRow | undefined;
    if (!row) return null;
    if (row.expires_at_ms <= this.now()) {
      this.db.prepare("DELETE FROM retrieval_cache WHERE cache_key = ?").run(key);
      return null;
    }
    const parsed: unknown = JSON.parse(row.payload_json);
    if (!Array.isArray(parsed)) {
      retrievalLog.warn(`Discarding malformed cache entry ${key}`);
      return null;
    }
    return parsed.filter(isSectionRecord);
  }

  set(key: string, records: SectionRecord[]): void {
    if (this.ttlSeconds <= 0) return;
    const t = this.now();
    this.db
      .prepare(
        `INSERT INTO retrieval_cache (cache_key, payload_json, created_at_ms, expires_at_ms)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(cache_key) DO UPDATE SET
           payload_json = excluded.payload_json,
           created_at_ms = excluded.created_at_ms,
           expires_at_ms = excluded.expires_at_ms`,
      )
      .run(key, JSON.stringify(records), t, t + this.ttlSeconds * 1000);
  }

  /** Returns the number of expired rows removed. */
  purgeExpired(): number {
    return this.db.prepare("DELETE FROM retrieval_cache WHERE expires_at_ms <= ?").run(this.now()).changes;
  }

  clear(): void {
    this.db.prepare("DELETE FROM retrieval_cache").run();
  }
}

function isSectionRecord(value: unknown): value is SectionRecord {
  if (!value || typeof value !== "object") return false;
  return (
    "sectionId" in value &&
    typeof value.sectionId === "number" &&
    "content" in value &&
    typeof value.content === "string" &&
    "score" in value &&
    typeof value.score === "number" &&
    "metadata" in value &&
    typeof value.metadata === "object" &&
    value.metadata !== null
  );
}
