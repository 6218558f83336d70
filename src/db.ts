import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { resolveDbPath } from "./dataPaths.js";
import { log } from "./utils/logger.js";

const dbLog = log.withScope("db");

const dbByPath = new Map<string, Database.Database>();
let schemaSqlCache: string | null = null;

function assertTestDbPathSafety(dbPath: string): void {
  if (process.env.NODE_ENV !== "test") return;
  if (dbPath === ":memory:") return;

  const resolvedDbPath = path.resolve(dbPath);
  const resolvedTmpRoot = path.resolve(os.tmpdir());
  const normalize = (value: string) => path.normalize(value).toLowerCase();

  if (!normalize(resolvedDbPath).startsWith(normalize(resolvedTmpRoot + path.sep))) {
    throw new Error(
      `[db-test-safety] Refusing non-temp DB path in test mode: ${resolvedDbPath}. Expected under ${resolvedTmpRoot}`,
    );
  }
}

function ensureDirFor(dbPath: string) {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

function getSchemaSql(): string {
  if (schemaSqlCache) return schemaSqlCache;
  const schemaPath = path.join(process.cwd(), "src", "db", "schema.sql");
  schemaSqlCache = fs.readFileSync(schemaPath, "utf8");
  return schemaSqlCache;
}

export function bootstrapDbAtPath(dbPath: string): Database.Database {
  assertTestDbPathSafety(dbPath);
  if (dbPath !== ":memory:") ensureDirFor(dbPath);
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(getSchemaSql());
  return db;
}

/**
 * Shared connection per resolved path. Without an argument the configured
 * DATA_ROOT/DATA_DB_FILENAME database is used.
 */
export function getDb(dbPath: string = resolveDbPath()): Database.Database {
  const resolved = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
  const existing = dbByPath.get(resolved);
  if (existing) return existing;

  const db = bootstrapDbAtPath(resolved);
  if (resolved !== ":memory:") dbByPath.set(resolved, db);
  dbLog.debug(`Opened database`, { dbPath: resolved });
  return db;
}

export function closeAllDbs(): void {
  for (const [dbPath, db] of dbByPath) {
    db.close();
    dbLog.debug(`Closed database`, { dbPath });
  }
  dbByPath.clear();
}
