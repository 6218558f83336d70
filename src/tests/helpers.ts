import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { BookNotFoundError, parseBookDefinition, type BookDefinition } from "../books/bookDefinition.js";
import { BookWhitelist } from "../books/whitelist.js";
import { getDb } from "../db.js";
import type { Rng } from "../mechanics/dice.js";
import { NarrativeGenerator, type GenerationMode } from "../narrative/generator.js";
import type { CompletionRequest, CompletionResponse, ModelToolCall, NarrativeModel } from "../narrative/model.js";
import type { SectionRecord, SectionSearch } from "../retrieval/types.js";
import { SqliteSessionStore } from "../sessions/sessionStore.js";
import type { CharacterStats, GameState } from "../state/types.js";
import { TurnService } from "../turn/turnService.js";

export const TEST_BOOK_YAML = `
version: 1
book_id: test-book
title: Test Book
start_section: 1
inventory_capacity: 4
starting_provisions: 2
starting_gold: 5
endings:
  victory: [400]
  defeat: [13]
base_items: [SWORD]
global_items: [PROVISIONS]
potions:
  potion of strength: { stat: stamina, amount: 4 }
sections:
  1: [SWORD, PROVISIONS]
  5: [BRONZE_KEY, GOLD_PIECES]
  7: [SILVER_KEY]
`;

export function testBook(): BookDefinition {
  return parseBookDefinition(TEST_BOOK_YAML, "test-book.yml");
}

export function testWhitelist(book: BookDefinition = testBook()): BookWhitelist {
  return new BookWhitelist([book]);
}

export function makeState(overrides: Partial<GameState> = {}, stats: Partial<CharacterStats> = {}): GameState {
  return {
    bookId: "test-book",
    currentSection: 1,
    visitedSections: [1],
    flags: {},
    stats: {
      skill: 10,
      stamina: 18,
      luck: 9,
      gold: 5,
      provisions: 2,
      initialSkill: 10,
      initialStamina: 18,
      initialLuck: 9,
      ...stats,
    },
    inventory: ["SWORD"],
    inventoryCapacity: 4,
    inCombat: false,
    enemy: null,
    status: "active",
    turnNumber: 0,
    ...overrides,
  };
}

/** An Rng that yields the given six-sided faces in order, then fails the test. */
export function d6(...faces: number[]): Rng {
  const queue = [...faces];
  return () => {
    const face = queue.shift();
    if (face === undefined) throw new Error("d6 script exhausted");
    return (face - 0.5) / 6;
  };
}

/**
 * In-memory section search. The section named in a "Section N: ..." query
 * ranks first unless it is hidden; the rest follow by number.
 */
export class FakeSearch implements SectionSearch {
  readonly queries: string[] = [];
  readonly lookups: number[] = [];
  readonly hidden = new Set<number>();
  failures = 0;

  constructor(private readonly sections: Record<number, string>) {}

  async search(_bookId: string, query: string, k: number): Promise<SectionRecord[]> {
    this.queries.push(query);
    if (this.failures > 0) {
      this.failures--;
      throw new Error("search backend down");
    }
    const wanted = Number(/^Section (\d+):/.exec(query)?.[1]);
    const ids = Object.keys(this.sections)
      .map(Number)
      .filter((id) => !this.hidden.has(id))
      .sort((a, b) => (a === wanted ? -1 : b === wanted ? 1 : a - b));
    return ids.slice(0, k).map((id, rank) => this.record(id, 0.95 - rank * 0.05));
  }

  async getBySection(_bookId: string, sectionId: number): Promise<SectionRecord | null> {
    this.lookups.push(sectionId);
    return sectionId in this.sections ? this.record(sectionId, 1) : null;
  }

  private record(sectionId: number, score: number): SectionRecord {
    return { sectionId, content: this.sections[sectionId], metadata: {}, score };
  }
}

export function toolCall(id: string, name: string, args: unknown): ModelToolCall {
  return { id, name, arguments: JSON.stringify(args) };
}

/** Replays canned responses in order and records every request. */
export class ScriptedModel implements NarrativeModel {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: Array<CompletionResponse | Error>) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(structuredClone(request));
    const next = this.script.shift();
    if (next === undefined) throw new Error("model script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

export function prose(text: string): CompletionResponse {
  return { text, toolCalls: [] };
}

export const TEST_SECTIONS: Record<number, string> = {
  1: "You stand in a cold hall. A locked door blocks the north passage; you need the silver key. To go down the stairs, turn to 5.",
  5: "Rubble covers the floor of a narrow cellar. To climb the stairs, turn to 12. To go back up, turn to 1.",
  12: "A rope bridge spans the chasm. To cross it, turn to 400.",
  400: "Sunlight. The quest is done.",
};

export const TEST_RETRIEVAL = { k: 3, minScore: 0.5, previewChars: 40, maxSecondary: 2, timeoutMs: 1000 };

export const FIXED_NOW = 1_700_000_000_000;

export interface TestServiceOptions {
  script?: Array<CompletionResponse | Error>;
  mode?: GenerationMode;
  rng?: Rng;
  maxAttempts?: number;
}

/**
 * A TurnService over a fresh sqlite file in a temp dir, the test book,
 * FakeSearch and a ScriptedModel. Session ids are session-1, session-2, ...
 */
export function createTestService(opts: TestServiceOptions = {}) {
  const dbDir = fs.mkdtempSync(path.join(os.tmpdir(), "narrator-svc-"));
  const db = getDb(path.join(dbDir, "narrator.sqlite"));
  const book = testBook();
  const whitelist = testWhitelist(book);
  const search = new FakeSearch(TEST_SECTIONS);
  const model = new ScriptedModel(opts.script ?? []);
  const rng = opts.rng ?? d6();
  let issued = 0;

  const service = new TurnService({
    store: new SqliteSessionStore(db, () => FIXED_NOW),
    loadBook: (bookId) => {
      if (bookId !== book.bookId) throw new BookNotFoundError(bookId, `${bookId}.yml`);
      return book;
    },
    whitelist,
    search,
    generator: new NarrativeGenerator(model, whitelist, {
      mode: opts.mode ?? "plain",
      temperature: 0.7,
      maxToolIterations: 4,
      backtrackLimit: 10,
      rng,
    }),
    rng,
    retrieval: TEST_RETRIEVAL,
    backtrackLimit: 10,
    maxAttempts: opts.maxAttempts ?? 2,
    newSessionId: () => `session-${++issued}`,
  });

  return { service, search, model, dbDir };
}
