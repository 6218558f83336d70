import "dotenv/config";
import { loadAllBooks, loadBook } from "../books/bookDefinition.js";
import { BookWhitelist } from "../books/whitelist.js";
import { cfg, printConfigSnapshot } from "../config/env.js";
import { resolvePidPath } from "../dataPaths.js";
import { closeAllDbs, getDb } from "../db.js";
import { RateLimiter } from "../llm/rateLimiter.js";
import { NarrativeGenerator } from "../narrative/generator.js";
import { OpenAINarrativeModel } from "../narrative/openaiModel.js";
import { acquireLock, releaseLock } from "../pidlock.js";
import { OpenAIEmbedder } from "../retrieval/embedder.js";
import { RetrievalCache } from "../retrieval/retrievalCache.js";
import { SqliteSectionIndex } from "../retrieval/sqliteSectionIndex.js";
import { SqliteSessionStore } from "../sessions/sessionStore.js";
import { TurnService } from "../turn/turnService.js";
import { log } from "../utils/logger.js";
import { createApp, startServer, stopServer } from "./app.js";

const bootLog = log.withScope("boot");

if (cfg.server.printConfig) {
  printConfigSnapshot(cfg);
}

const pidPath = resolvePidPath();
if (!acquireLock(pidPath)) {
  process.exit(1);
}

const books = loadAllBooks();
if (books.length === 0) {
  bootLog.warn("No book definitions found; sessions cannot be started until one is added");
}
bootLog.info(`Loaded ${books.length} book(s)`, { books: books.map((b) => b.bookId) });

const db = getDb();
// One limiter for chat and embeddings: they share the provider's quota.
const limiter = new RateLimiter(cfg.llm.rateLimitRpm);
const cache = cfg.retrieval.cacheTtlSeconds > 0 ? new RetrievalCache(db, cfg.retrieval.cacheTtlSeconds) : undefined;
const removed = cache?.purgeExpired() ?? 0;
if (removed > 0) bootLog.debug(`Purged ${removed} expired retrieval cache entries`);

const search = new SqliteSectionIndex(db, new OpenAIEmbedder(cfg.embeddings.model, limiter), cache);
const whitelist = new BookWhitelist(books);
const rng = Math.random;

const generator = new NarrativeGenerator(
  new OpenAINarrativeModel({
    model: cfg.llm.model,
    maxTokens: cfg.llm.maxTokens,
    timeoutMs: cfg.llm.timeoutMs,
    limiter,
  }),
  whitelist,
  {
    mode: cfg.llm.toolMode ? "tools" : "plain",
    temperature: cfg.llm.temperature,
    maxToolIterations: cfg.llm.maxToolIterations,
    backtrackLimit: cfg.game.backtrackLimit,
    rng,
  },
);

const service = new TurnService({
  store: new SqliteSessionStore(db),
  loadBook: (bookId) => loadBook(bookId),
  whitelist,
  search,
  generator,
  rng,
  retrieval: {
    k: cfg.retrieval.k,
    minScore: cfg.retrieval.minScore,
    previewChars: cfg.retrieval.previewChars,
    maxSecondary: cfg.retrieval.maxSecondary,
    timeoutMs: cfg.retrieval.timeoutMs,
  },
  backtrackLimit: cfg.game.backtrackLimit,
  maxAttempts: cfg.game.maxTurnAttempts,
});

const httpServer = await startServer(createApp(service), cfg.server.port);
bootLog.info(`Narrator ready (${generator.mode} mode, model ${cfg.llm.model})`);

async function shutdown(signal: string): Promise<void> {
  bootLog.info(`Received ${signal}, shutting down...`);
  await stopServer(httpServer);
  closeAllDbs();
  releaseLock(pidPath);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        bootLog.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        releaseLock(pidPath);
        process.exit(1);
      });
  });
}
