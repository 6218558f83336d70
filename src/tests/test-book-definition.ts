import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { BookNotFoundError, loadAllBooks, loadBook, parseBookDefinition } from "../books/bookDefinition.js";
import { BookWhitelist, normalizeItemId } from "../books/whitelist.js";
import { testBook } from "./helpers.js";

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("item ids are upper snake case", () => {
  expect(normalizeItemId("  golden key ")).toBe("GOLDEN_KEY");
  expect(normalizeItemId("potion-of  luck")).toBe("POTION_OF_LUCK");
  expect(normalizeItemId("_rope_")).toBe("ROPE");
});

test("a book definition is parsed into lookup maps with defaults applied", () => {
  const book = testBook();
  expect(book.bookId).toBe("test-book");
  expect(book.startSection).toBe(1);
  expect(book.inventoryCapacity).toBe(4);
  expect(book.victorySections).toEqual([400]);
  expect(book.defeatSections).toEqual([13]);
  expect(book.potions.get("POTION_OF_STRENGTH")).toEqual({ stat: "stamina", amount: 4 });
  expect(book.sectionItems.get(5)).toEqual(["BRONZE_KEY", "GOLD_PIECES"]);

  const minimal = parseBookDefinition("version: 1\nbook_id: tiny\ntitle: Tiny\nstart_section: 1\nendings: {}\n");
  expect(minimal.inventoryCapacity).toBe(12);
  expect(minimal.startingProvisions).toBe(10);
  expect(minimal.victorySections).toEqual([]);
});

test("a book without its own capacity takes the configured default", () => {
  const source = "version: 1\nbook_id: tiny\ntitle: Tiny\nstart_section: 1\nendings: {}\n";
  expect(parseBookDefinition(source, "tiny.yml", { inventoryCapacity: 7 }).inventoryCapacity).toBe(7);
  expect(parseBookDefinition(`${source}inventory_capacity: 3\n`, "tiny.yml", { inventoryCapacity: 7 }).inventoryCapacity).toBe(3);
});

test("invalid definitions name the offending field", () => {
  expect(() => parseBookDefinition("version: 2\nbook_id: x\ntitle: X\nstart_section: 1\nendings: {}\n", "x.yml")).toThrow(
    /Invalid book definition x\.yml: version/,
  );
});

test("the whitelist allows section items plus global items", () => {
  const whitelist = new BookWhitelist([testBook()]);
  expect([...whitelist.allowedItems("test-book", 5)].sort()).toEqual(["BRONZE_KEY", "GOLD_PIECES", "PROVISIONS"]);
  expect([...whitelist.allowedItems("test-book", 23)]).toEqual(["PROVISIONS"]);
  expect(whitelist.allowedItems("unknown-book", 5).size).toBe(0);
  expect(whitelist.isBaseItem("test-book", "sword")).toBe(true);
  expect(whitelist.isBaseItem("test-book", "BRONZE_KEY")).toBe(false);
});

test("books load once and are cached until reloaded", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "narrator-books-"));
  tempDirs.push(dir);
  const file = path.join(dir, "tiny.yml");
  fs.writeFileSync(file, "version: 1\nbook_id: tiny\ntitle: Tiny\nstart_section: 3\nendings: {}\n", "utf8");

  const first = loadBook("tiny", { path: file });
  expect(first.startSection).toBe(3);
  fs.writeFileSync(file, "version: 1\nbook_id: tiny\ntitle: Tiny\nstart_section: 4\nendings: {}\n", "utf8");
  expect(loadBook("tiny", { path: file })).toBe(first);
  expect(loadBook("tiny", { path: file, reload: true }).startSection).toBe(4);

  expect(() => loadBook("missing", { path: path.join(dir, "missing.yml") })).toThrow(BookNotFoundError);
});

test("every book shipped in data/books is valid", () => {
  const books = loadAllBooks(path.join(process.cwd(), "data", "books"));
  expect(books.map((b) => b.bookId)).toContain("warrior-of-blood");
  const warrior = books.find((b) => b.bookId === "warrior-of-blood");
  expect(warrior?.baseItems).toEqual(["SWORD", "BACKPACK", "LANTERN"]);
  expect(warrior?.potions.get("POTION_OF_FORTUNE")).toEqual({ stat: "luck", amount: 1 });
});
