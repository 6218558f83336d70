/**
 * ingest-book.ts: Split a plain-text gamebook into sections and index them for search
 *
 * CLI: npx tsx src/tools/ingest-book.ts --book <BOOK_ID> --file <PATH_TO_TEXT> [--dry-run]
 *
 * Behavior:
 * 1. Check the book has a definition under the books directory
 * 2. Split the text on lines holding only a section number
 * 3. Embed every section and upsert it into book_sections (idempotent)
 * 4. Clear the retrieval cache so stale hits are not served
 */

import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { loadBook } from "../books/bookDefinition.js";
import { cfg } from "../config/env.js";
import { getDb } from "../db.js";
import { RateLimiter } from "../llm/rateLimiter.js";
import { OpenAIEmbedder } from "../retrieval/embedder.js";
import { parseBookSections } from "../retrieval/parseBookSections.js";
import { RetrievalCache } from "../retrieval/retrievalCache.js";
import { SqliteSectionIndex } from "../retrieval/sqliteSectionIndex.js";
import { log } from "../utils/logger.js";

const ingestLog = log.withScope("ingest");

type IngestArgs = {
  bookId: string | null;
  file: string | null;
  dryRun: boolean;
};

function parseArgs(argv: string[] = process.argv.slice(2)): IngestArgs {
  let bookId: string | null = null;
  let file: string | null = null;
  let dryRun = false;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--book" && argv[i + 1]) {
      bookId = argv[i + 1];
      i++;
    } else if (argv[i] === "--file" && argv[i + 1]) {
      file = argv[i + 1];
      i++;
    } else if (argv[i] === "--dry-run") {
      dryRun = true;
    }
  }

  return { bookId, file, dryRun };
}

async function main(): Promise<void> {
  const args = parseArgs();
  if (!args.bookId || !args.file) {
    console.error("Usage: npx tsx src/tools/ingest-book.ts --book <BOOK_ID> --file <PATH_TO_TEXT> [--dry-run]");
    process.exit(1);
  }

  const book = loadBook(args.bookId);
  const filePath = path.resolve(args.file);
  const sections = parseBookSections(fs.readFileSync(filePath, "utf-8"), path.basename(filePath));
  if (sections.length === 0) {
    throw new Error(`No numbered sections found in ${filePath}`);
  }

  const missing = [...book.sectionItems.keys()].filter((id) => !sections.some((s) => s.sectionId === id));
  if (missing.length > 0) {
    ingestLog.warn(`Book definition lists items for sections missing from the text: ${missing.join(", ")}`);
  }

  console.log(`${book.title}: ${sections.length} sections (${sections[0].sectionId}..${sections[sections.length - 1].sectionId})`);

  if (args.dryRun) {
    for (const section of sections.slice(0, 5)) {
      console.log(`  [${section.sectionId}] exits=${JSON.stringify(section.metadata?.exits ?? [])} ${section.content.slice(0, 60)}...`);
    }
    console.log("Dry run: nothing written.");
    return;
  }

  const db = getDb();
  const index = new SqliteSectionIndex(
    db,
    new OpenAIEmbedder(cfg.embeddings.model, new RateLimiter(cfg.llm.rateLimitRpm)),
    new RetrievalCache(db, cfg.retrieval.cacheTtlSeconds),
  );
  const written = await index.indexSections(book.bookId, sections);
  ingestLog.info(`Indexed ${written} sections`, { bookId: book.bookId, total: index.countSections(book.bookId) });
}

main().catch((err: unknown) => {
  console.error(`Ingest failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
