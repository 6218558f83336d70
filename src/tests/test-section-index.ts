import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { closeAllDbs, getDb } from "../db.js";
import { cosineSimilarity } from "../retrieval/embedder.js";
import { parseBookSections } from "../retrieval/parseBookSections.js";
import { RetrievalCache } from "../retrieval/retrievalCache.js";
import { SqliteSectionIndex } from "../retrieval/sqliteSectionIndex.js";
import type { Embedder } from "../retrieval/types.js";

const tempDirs: string[] = [];

afterEach(() => {
  closeAllDbs();
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
});

function tempDb() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "narrator-index-"));
  tempDirs.push(dir);
  return getDb(path.join(dir, "db.sqlite"));
}

/** Bag-of-keywords vectors: one axis per keyword plus a small constant. */
class KeywordEmbedder implements Embedder {
  calls = 0;

  async embed(texts: string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((t) => {
      const lower = t.toLowerCase();
      return [lower.includes("dragon") ? 1 : 0, lower.includes("door") ? 1 : 0, lower.includes("forest") ? 1 : 0, 0.01];
    });
  }
}

const SECTIONS = [
  { sectionId: 1, content: "A dragon sleeps on its hoard.", metadata: { exits: [2] } },
  { sectionId: 2, content: "A heavy door blocks the hall.", metadata: { exits: [3] } },
  { sectionId: 3, content: "A dark forest, and a door between the trees.", metadata: {} },
];

test("search ranks sections by cosine similarity and returns the top k", async () => {
  const embedder = new KeywordEmbedder();
  const index = new SqliteSectionIndex(tempDb(), embedder);
  expect(await index.indexSections("test-book", SECTIONS)).toBe(3);

  const hits = await index.search("test-book", "open the door", 2);
  expect(hits.map((h) => h.sectionId)).toEqual([2, 3]);
  expect(hits[0].metadata).toEqual({ exits: [3] });
  expect(hits[0].score).toBeCloseTo(1, 6);
  expect(await index.search("other-book", "open the door", 2)).toEqual([]);
});

test("direct lookup returns the stored section with full score", async () => {
  const index = new SqliteSectionIndex(tempDb(), new KeywordEmbedder());
  await index.indexSections("test-book", SECTIONS);
  await index.indexSections("test-book", [{ sectionId: 2, content: "The door now stands open." }]);

  expect(await index.getBySection("test-book", 2)).toEqual({
    sectionId: 2,
    content: "The door now stands open.",
    metadata: {},
    score: 1,
  });
  expect(await index.getBySection("test-book", 99)).toBeNull();
  expect(index.countSections("test-book")).toBe(3);
});

test("repeated queries are served from the cache until they expire", async () => {
  const db = tempDb();
  let clock = 1_000_000;
  const embedder = new KeywordEmbedder();
  const cache = new RetrievalCache(db, 60, () => clock);
  const index = new SqliteSectionIndex(db, embedder, cache);
  await index.indexSections("test-book", SECTIONS);
  expect(embedder.calls).toBe(1);

  const first = await index.search("test-book", "Find the dragon", 1);
  const second = await index.search("test-book", "  find the DRAGON ", 1);
  expect(second).toEqual(first);
  expect(embedder.calls).toBe(2);

  clock += 61_000;
  await index.search("test-book", "find the dragon", 1);
  expect(embedder.calls).toBe(3);
});

test("re-indexing clears cached results", async () => {
  const db = tempDb();
  const cache = new RetrievalCache(db, 3600);
  const index = new SqliteSectionIndex(db, new KeywordEmbedder(), cache);
  await index.indexSections("test-book", SECTIONS);
  await index.search("test-book", "door", 1);
  const key = RetrievalCache.keyFor("test-book", "door", 1);
  expect(cache.get(key)?.map((r) => r.sectionId)).toEqual([2]);

  await index.indexSections("test-book", SECTIONS);
  expect(cache.get(key)).toBeNull();
});

test("cosine similarity handles orthogonal and zero vectors", () => {
  expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
  expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
});

test("plain book text splits into numbered sections with their exits", () => {
  const text = [
    "WARRIOR OF BLOOD",
    "Front matter that is not a section.",
    "",
    "1",
    "You stand at the mouth of a cave. Turn to 5 or turn to 12.",
    "",
    "5",
    "A bronze key glints on the floor.",
    "Turn to 1.",
    "",
    "999",
    "still part of section 5",
  ].join("\n");

  const sections = parseBookSections(text, "book.txt");
  expect(sections.map((s) => s.sectionId)).toEqual([1, 5]);
  expect(sections[0]).toEqual({
    sectionId: 1,
    content: "You stand at the mouth of a cave. Turn to 5 or turn to 12.",
    metadata: { exits: [5, 12], source: "book.txt" },
  });
  expect(sections[1].content).toBe("A bronze key glints on the floor.\nTurn to 1.\n\n999\nstill part of section 5");
  expect(sections[1].metadata?.exits).toEqual([1, 5]);
});
