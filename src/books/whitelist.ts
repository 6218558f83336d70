import type { BookDefinition } from "./bookDefinition.js";

/** Canonical item id: upper case, runs of whitespace or hyphens become `_`. */
export function normalizeItemId(name: string): string {
  return name
    .trim()
    .toUpperCase()
    .replace(/[\s-]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function isKeyItem(item: string): boolean {
  const id = normalizeItemId(item);
  return id === "KEY" || id.endsWith("_KEY");
}

/** Inventory id of the key a door asks for, e.g. "silver" is SILVER_KEY. */
export function keyItemFor(keyType: string): string {
  return normalizeItemId(`${keyType}_KEY`);
}

export interface Whitelist {
  allowedItems(bookId: string, sectionId: number): ReadonlySet<string>;
  isBaseItem(bookId: string, item: string): boolean;
}

/** Whitelist backed by the loaded book definitions, keyed by book id. */
export class BookWhitelist implements Whitelist {
  private readonly books = new Map<string, BookDefinition>();

  constructor(books: Iterable<BookDefinition>) {
    for (const book of books) this.books.set(book.bookId, book);
  }

  allowedItems(bookId: string, sectionId: number): ReadonlySet<string> {
    const book = this.books.get(bookId);
    if (!book) return new Set();
    return new Set([...(book.sectionItems.get(sectionId) ?? []), ...book.globalItems]);
  }

  isBaseItem(bookId: string, item: string): boolean {
    return this.books.get(bookId)?.baseItems.includes(normalizeItemId(item)) ?? false;
  }
}
