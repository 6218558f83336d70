import type Database from "better-sqlite3";
import { log } from "../utils/logger.js";
import { cosineSimilarity } from "./embedder.js";
import { RetrievalCache } from "./retrievalCache.js";
import type { Embedder, SectionMetadata, SectionRecord, SectionSearch } from "./types.js";

const retrievalLog = log.withScope("retrieval");

type SectionRow = {
  section_id: number;
  content: string;
  metadata_json: string;
  embedding_json: string;
};

export type IndexedSection = {
  sectionId: number;
  content: string;
  metadata?: SectionMetadata;
};

const EMBED_BATCH_SIZE = 64;

function parseMetadata(raw: string): SectionMetadata {
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object") return {};
  const meta: SectionMetadata = {};
  if ("exits" in parsed && Array.isArray(parsed.exits)) {
    meta.exits = parsed.exits.filter((e): e is number => typeof e === "number");
  }
  if ("title" in parsed && typeof parsed.title === "string") meta.title = parsed.title;
  if ("source" in parsed && typeof parsed.source === "string") meta.source = parsed.source;
  return meta;
}

function parseEmbedding(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === "number") : [];
}

/**
 * Section search over embeddings kept in SQLite. Ranking is brute-force
 * cosine similarity per book, which is plenty for a few hundred sections.
 */
export class SqliteSectionIndex implements SectionSearch {
  constructor(
    private readonly db: Database.Database,
    private readonly embedder: Embedder,
    private readonly cache?: RetrievalCache,
  ) {}

  async indexSections(bookId: string, sections: IndexedSection[]): Promise<number> {
    const upsert = this.db.prepare(
      `INSERT INTO book_sections (book_id, section_id, content, metadata_json, embedding_json, created_at_ms)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(book_id, section_id) DO UPDATE SET
         content = excluded.content,
         metadata_json = excluded.metadata_json,
         embedding_json = excluded.embedding_json`,
    );

    let written = 0;
    for (let i = 0; i < sections.length; i += EMBED_BATCH_SIZE) {
      const batch = sections.slice(i, i + EMBED_BATCH_SIZE);
      const vectors = await this.embedder.embed(batch.map((s) => s.content));
      if (vectors.length !== batch.length) {
        throw new Error(`Embedder returned ${vectors.length} vectors for ${batch.length} sections`);
      }
      const now = Date.now();
      const writeBatch = this.db.transaction(() => {
        batch.forEach((section, j) => {
          upsert.run(
            bookId,
            section.sectionId,
            section.content,
            JSON.stringify(section.metadata ?? {}),
            JSON.stringify(vectors[j]),
            now,
          );
        });
      });
      writeBatch();
      written += batch.length;
      retrievalLog.debug(`Indexed ${written}/${sections.length} sections`, { bookId });
    }

    this.cache?.clear();
    return written;
  }

  async search(bookId: string, query: string, k: number): Promise<SectionRecord[]> {
    const key = RetrievalCache.keyFor(bookId, query, k);
    const cached = this.cache?.get(key);
    if (cached) {
      retrievalLog.debug(`Cache hit`, { bookId, query });
      return cached;
    }

    const [queryVector] = await this.embedder.embed([query]);
    const rows = this.db
      .prepare("SELECT section_id, content, metadata_json, embedding_json FROM book_sections WHERE book_id = ?")
      .all(bookId) as SectionRow[];

    const ranked = rows
      .map((row) => ({
        sectionId: row.section_id,
        content: row.content,
        metadata: parseMetadata(row.metadata_json),
        score: cosineSimilarity(queryVector ?? [], parseEmbedding(row.embedding_json)),
      }))
      .sort((a, b) => b.score - a.score || a.sectionId - b.sectionId)
      .slice(0, k);

    this.cache?.set(key, ranked);
    return ranked;
  }

  async getBySection(bookId: string, sectionId: number): Promise<SectionRecord | null> {
    const row = this.db
      .prepare(
        "SELECT section_id, content, metadata_json, embedding_json FROM book_sections WHERE book_id = ? AND section_id = ?",
      )
      .get(bookId, sectionId) as SectionRow | undefined;
    if (!row) return null;
    return {
      sectionId: row.section_id,
      content: row.content,
      metadata: parseMetadata(row.metadata_json),
      score: 1,
    };
  }

  countSections(bookId: string): number {
    const row = this.db.prepare("SELECT COUNT(*) AS cnt FROM book_sections WHERE book_id = ?").get(bookId) as {
      cnt: number;
    };
    return row.cnt;
  }
}
