import "dotenv/config";
import type { Config, LogFormat, LogLevel } from "./types.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function optBool(name: string, def: boolean): boolean {
  const v = opt(name);
  if (!v) return def;
  if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
  throw new Error(`Invalid boolean for ${name}: ${v}`);
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((a) => a === v);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  const cfg: Config = {
    openai: {
      apiKey: opt("OPENAI_API_KEY"),
      baseUrl: opt("OPENAI_BASE_URL"),
    },

    llm: {
      model: opt("LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat("LLM_TEMPERATURE", 0.8),
      maxTokens: optInt("LLM_MAX_TOKENS", 1024),
      timeoutMs: optInt("LLM_TIMEOUT_MS", 30000),
      toolMode: optBool("LLM_TOOL_MODE", true),
      maxToolIterations: optInt("LLM_MAX_TOOL_ITERATIONS", 5),
      rateLimitRpm: optInt("LLM_RATE_LIMIT_RPM", 15),
    },

    embeddings: {
      model: opt("EMBEDDING_MODEL") ?? "text-embedding-3-small",
    },

    retrieval: {
      k: optInt("RETRIEVAL_K", 3),
      minScore: optFloat("RETRIEVAL_MIN_SCORE", 0.7),
      previewChars: optInt("RETRIEVAL_PREVIEW_CHARS", 200),
      maxSecondary: optInt("RETRIEVAL_MAX_SECONDARY", 2),
      timeoutMs: optInt("RETRIEVAL_TIMEOUT_MS", 10000),
      cacheTtlSeconds: optInt("RETRIEVAL_CACHE_TTL_SECONDS", 3600),
    },

    game: {
      inventoryCapacity: optInt("GAME_INVENTORY_CAPACITY", 12),
      backtrackLimit: optInt("GAME_BACKTRACK_LIMIT", 10),
      maxTurnAttempts: optInt("TURN_MAX_ATTEMPTS", 2),
    },

    data: {
      root: opt("DATA_ROOT") ?? "./data",
      booksDir: opt("DATA_BOOKS_DIR") ?? "books",
      dbFilename: opt("DATA_DB_FILENAME") ?? "narrator.sqlite",
    },

    server: {
      port: optInt("SERVER_PORT", 3001),
      printConfig: optBool("PRINT_CONFIG", true),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

function redact(secret: string | undefined): string | undefined {
  return secret === undefined ? undefined : "<redacted>";
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = {
    OPENAI_API_KEY: redact(cfg.openai.apiKey),
    OPENAI_BASE_URL: cfg.openai.baseUrl,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    LLM_TIMEOUT_MS: cfg.llm.timeoutMs,
    LLM_TOOL_MODE: cfg.llm.toolMode,
    LLM_MAX_TOOL_ITERATIONS: cfg.llm.maxToolIterations,
    LLM_RATE_LIMIT_RPM: cfg.llm.rateLimitRpm,
    EMBEDDING_MODEL: cfg.embeddings.model,
    RETRIEVAL_K: cfg.retrieval.k,
    RETRIEVAL_MIN_SCORE: cfg.retrieval.minScore,
    RETRIEVAL_PREVIEW_CHARS: cfg.retrieval.previewChars,
    RETRIEVAL_MAX_SECONDARY: cfg.retrieval.maxSecondary,
    RETRIEVAL_TIMEOUT_MS: cfg.retrieval.timeoutMs,
    RETRIEVAL_CACHE_TTL_SECONDS: cfg.retrieval.cacheTtlSeconds,
    GAME_INVENTORY_CAPACITY: cfg.game.inventoryCapacity,
    GAME_BACKTRACK_LIMIT: cfg.game.backtrackLimit,
    TURN_MAX_ATTEMPTS: cfg.game.maxTurnAttempts,
    DATA_ROOT: cfg.data.root,
    DATA_BOOKS_DIR: cfg.data.booksDir,
    DATA_DB_FILENAME: cfg.data.dbFilename,
    SERVER_PORT: cfg.server.port,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  };

  console.log("=== NARRATOR CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("================================");
}

export const cfg = loadConfig();
