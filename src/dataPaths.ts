import fs from "node:fs";
import path from "node:path";
import { cfg } from "./config/env.js";

type ResolveOptions = {
  ensureExists?: boolean;
};

function ensureDirIfRequested(dirPath: string, ensureExists?: boolean): string {
  if (ensureExists) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
  return dirPath;
}

export function resolveDataRoot(opts: ResolveOptions = {}): string {
  return ensureDirIfRequested(path.resolve(cfg.data.root), opts.ensureExists);
}

export function resolveBooksDir(opts: ResolveOptions = {}): string {
  return ensureDirIfRequested(path.join(resolveDataRoot(), cfg.data.booksDir), opts.ensureExists);
}

/** Anything outside [a-z0-9_-] in a book id is folded to "-", so ids never leave the books dir. */
export function resolveBookDefinitionPath(bookId: string): string {
  const safeId = bookId.trim().toLowerCase().replace(/[^a-z0-9_-]+/g, "-") || "unnamed";
  return path.join(resolveBooksDir(), `${safeId}.yml`);
}

export function resolveDbPath(): string {
  return path.join(resolveDataRoot({ ensureExists: true }), cfg.data.dbFilename);
}

export function resolvePidPath(): string {
  return path.join(resolveDataRoot(), "narrator.pid");
}
