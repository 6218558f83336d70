import fs from "node:fs";
import { afterEach, expect, test } from "vitest";
import { BookNotFoundError } from "../books/bookDefinition.js";
import { closeAllDbs } from "../db.js";
import {
  SessionClosedError,
  SessionNotFoundError,
  TurnInProgressError,
  UpstreamUnavailableError,
} from "../turn/errors.js";
import { RETRY_LATER_MESSAGE } from "../turn/turnService.js";
import { createTestService, d6, FIXED_NOW, prose, toolCall, type TestServiceOptions } from "./helpers.js";

const tempDirs: string[] = [];

function setup(opts: TestServiceOptions = {}) {
  const ctx = createTestService(opts);
  tempDirs.push(ctx.dbDir);
  return ctx;
}

afterEach(() => {
  closeAllDbs();
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
});

const HERO = { skill: 10, stamina: 18, luck: 9 };

test("a new session rolls the adventurer and starts at the book's first section", () => {
  const { service } = setup({ rng: d6(3, 4, 5, 2) });

  const view = service.startSession("test-book");
  expect(view).toEqual({
    sessionId: "session-1",
    bookId: "test-book",
    status: "active",
    turnNumber: 0,
    currentSection: 1,
    stats: {
      skill: 9,
      stamina: 21,
      luck: 8,
      gold: 5,
      provisions: 2,
      initialSkill: 9,
      initialStamina: 21,
      initialLuck: 8,
    },
    inventory: ["SWORD"],
    inCombat: false,
    enemy: null,
  });
  expect(service.getSession("session-1")).toEqual(view);
});

test("character overrides skip the dice", () => {
  const { service } = setup();
  const view = service.startSession("test-book", HERO);
  expect(view.stats.skill).toBe(10);
  expect(view.stats.initialStamina).toBe(18);
  expect(view.stats.luck).toBe(9);
});

test("unknown books and sessions are reported as such", async () => {
  const { service } = setup();
  expect(() => service.startSession("no-such-book")).toThrow(BookNotFoundError);
  expect(() => service.getSession("missing")).toThrow(SessionNotFoundError);
  expect(() => service.history("missing")).toThrow(SessionNotFoundError);
  await expect(service.processTurn("missing", "look around")).rejects.toBeInstanceOf(SessionNotFoundError);
});

test("accepted and rejected turns are both logged; only accepted ones advance", async () => {
  const { service } = setup({ script: [prose("Cold air seeps under the door.")] });
  service.startSession("test-book", HERO);

  const first = await service.processTurn("session-1", "look around");
  expect(first).toEqual({
    sessionId: "session-1",
    narrative: "Cold air seeps under the door.",
    accepted: true,
    reason: "ok",
    stats: { ...HERO, gold: 5, provisions: 2, initialSkill: 10, initialStamina: 18, initialLuck: 9 },
    inventory: ["SWORD"],
    currentSection: 1,
    gameOver: false,
    victory: false,
    turnNumber: 1,
    status: "active",
  });

  const second = await service.processTurn("session-1", "unlock the door");
  expect(second.accepted).toBe(false);
  expect(second.reason).toBe("missing_key");
  expect(second.turnNumber).toBe(1);

  const turns = service.history("session-1");
  expect(turns.map((t) => [t.turnNumber, t.actionText, t.verdictReason])).toEqual([
    [1, "look around", "ok"],
    [1, "unlock the door", "missing_key"],
  ]);
  expect(turns[0]).toMatchObject({
    sectionBefore: 1,
    sectionAfter: 1,
    terminal: "continue",
    createdAtMs: FIXED_NOW,
    mutations: [
      { kind: "set_flag", flag: "doorLocked", value: true },
      { kind: "set_flag", flag: "keyType", value: "SILVER" },
    ],
  });
  expect(service.getSession("session-1").turnNumber).toBe(1);
});

test("a second turn for the same session is refused while one is running", async () => {
  const { service } = setup({ script: [prose("The hall is silent.")] });
  service.startSession("test-book", HERO);

  const running = service.processTurn("session-1", "look around");
  const overlapping = service.processTurn("session-1", "look around");

  await expect(overlapping).rejects.toBeInstanceOf(TurnInProgressError);
  await expect(running).resolves.toMatchObject({ accepted: true, turnNumber: 1 });
});

test("a failed search is retried within the same turn", async () => {
  const { service, search, model } = setup({ script: [prose("The hall is silent.")], maxAttempts: 2 });
  service.startSession("test-book", HERO);
  search.failures = 1;

  const result = await service.processTurn("session-1", "look around");
  expect(result.accepted).toBe(true);
  expect(search.queries).toHaveLength(2);
  expect(model.requests).toHaveLength(1);
});

test("when every attempt fails the player is asked to try again and nothing is saved", async () => {
  const { service, search } = setup({ script: [prose("The hall is silent.")], maxAttempts: 2 });
  service.startSession("test-book", HERO);
  search.failures = 2;

  const failed = service.processTurn("session-1", "look around");
  await expect(failed).rejects.toBeInstanceOf(UpstreamUnavailableError);
  await expect(failed).rejects.toThrow(RETRY_LATER_MESSAGE);
  expect(search.queries).toHaveLength(2);
  expect(service.getSession("session-1").turnNumber).toBe(0);
  expect(service.history("session-1")).toEqual([]);

  const retried = await service.processTurn("session-1", "look around");
  expect(retried.turnNumber).toBe(1);
});

test("a finished session accepts no more turns", async () => {
  const { service } = setup({
    mode: "tools",
    script: [
      { text: "", toolCalls: [toolCall("t1", "update_stat", { stat: "stamina", delta: -5 })] },
      prose("The ceiling gives way."),
    ],
  });
  service.startSession("test-book", { ...HERO, stamina: 1 });

  const fatal = await service.processTurn("session-1", "look around");
  expect(fatal).toMatchObject({ gameOver: true, victory: false, status: "dead" });
  expect(fatal.stats.stamina).toBe(0);

  await expect(service.processTurn("session-1", "look around")).rejects.toBeInstanceOf(SessionClosedError);
});
