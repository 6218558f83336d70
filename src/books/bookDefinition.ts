import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";
import { z } from "zod";
import { cfg } from "../config/env.js";
import { resolveBookDefinitionPath, resolveBooksDir } from "../dataPaths.js";
import { normalizeItemId } from "./whitelist.js";

const itemId = z.string().min(1).transform(normalizeItemId);

const potionSchema = z.object({
  stat: z.enum(["skill", "stamina", "luck"]),
  amount: z.number().int().positive(),
});

export const bookDefinitionSchema = z.object({
  version: z.literal(1),
  book_id: z.string().min(1),
  title: z.string().min(1),
  start_section: z.number().int().positive(),
  inventory_capacity: z.number().int().positive().optional(),
  starting_provisions: z.number().int().nonnegative().default(10),
  starting_gold: z.number().int().nonnegative().default(0),
  endings: z.object({
    victory: z.array(z.number().int().positive()).default([]),
    defeat: z.array(z.number().int().positive()).default([]),
  }),
  base_items: z.array(itemId).default([]),
  global_items: z.array(itemId).default([]),
  potions: z.record(z.string(), potionSchema).default({}),
  sections: z.record(z.string().regex(/^\d+$/), z.array(itemId)).default({}),
});

export type Potion = z.infer<typeof potionSchema>;

export interface BookDefinition {
  bookId: string;
  title: string;
  startSection: number;
  inventoryCapacity: number;
  startingProvisions: number;
  startingGold: number;
  victorySections: number[];
  defeatSections: number[];
  baseItems: string[];
  globalItems: string[];
  potions: Map<string, Potion>;
  sectionItems: Map<number, string[]>;
}

export interface BookDefaults {
  /** Used when a definition has no `inventory_capacity`. */
  inventoryCapacity: number;
}

export function parseBookDefinition(
  source: string,
  origin = "<inline>",
  defaults: BookDefaults = { inventoryCapacity: cfg.game.inventoryCapacity },
): BookDefinition {
  const raw: unknown = yaml.parse(source);
  const result = bookDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`Invalid book definition ${origin}: ${detail}`);
  }
  const def = result.data;
  return {
    bookId: def.book_id,
    title: def.title,
    startSection: def.start_section,
    inventoryCapacity: def.inventory_capacity ?? defaults.inventoryCapacity,
    startingProvisions: def.starting_provisions,
    startingGold: def.starting_gold,
    victorySections: def.endings.victory,
    defeatSections: def.endings.defeat,
    baseItems: def.base_items,
    globalItems: def.global_items,
    potions: new Map(Object.entries(def.potions).map(([id, p]) => [normalizeItemId(id), p])),
    sectionItems: new Map(Object.entries(def.sections).map(([section, items]) => [Number(section), items])),
  };
}

export class BookNotFoundError extends Error {
  constructor(readonly bookId: string, filePath: string) {
    super(`Book definition not found: ${filePath}`);
    this.name = "BookNotFoundError";
  }
}

const bookCache = new Map<string, BookDefinition>();

/** Loads `<DATA_ROOT>/<DATA_BOOKS_DIR>/<bookId>.yml` once per process. */
export function loadBook(bookId: string, opts?: { path?: string; reload?: boolean }): BookDefinition {
  const filePath = opts?.path ?? resolveBookDefinitionPath(bookId);
  const cached = bookCache.get(filePath);
  if (cached && !opts?.reload) return cached;

  if (!fs.existsSync(filePath)) {
    throw new BookNotFoundError(bookId, filePath);
  }
  const book = parseBookDefinition(fs.readFileSync(filePath, "utf-8"), filePath);
  bookCache.set(filePath, book);
  return book;
}

/** Every `*.yml` definition in the books directory, sorted by book id. */
export function loadAllBooks(dir: string = resolveBooksDir()): BookDefinition[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith(".yml") || name.endsWith(".yaml"))
    .map((name) => {
      const book = parseBookDefinition(fs.readFileSync(path.join(dir, name), "utf-8"), name);
      bookCache.set(resolveBookDefinitionPath(book.bookId), book);
      return book;
    })
    .sort((a, b) => a.bookId.localeCompare(b.bookId));
}
