import { expect, test } from "vitest";
import { extractSectionSignals } from "../extract/contentExtractor.js";
import type { Rng } from "../mechanics/dice.js";
import { NarrativeGenerator, type GenerationInput, type GenerationMode } from "../narrative/generator.js";
import { buildTurnContext } from "../narrative/prompts.js";
import { parseToolArguments } from "../narrative/toolArguments.js";
import { UpstreamUnavailableError } from "../turn/errors.js";
import { d6, makeState, prose, ScriptedModel, testWhitelist, toolCall } from "./helpers.js";

const SECTION_TEXT = "A bronze key lies on the flagstones. To take the stairs, turn to 12.";

function input(overrides: Partial<GenerationInput> = {}): GenerationInput {
  const whitelist = testWhitelist();
  return {
    state: makeState({ currentSection: 5, visitedSections: [1, 5] }),
    actionText: "look around",
    retrieval: {
      primary: { sectionId: 5, content: SECTION_TEXT, metadata: {}, score: 1 },
      secondary: [],
      mismatch: false,
    },
    signals: extractSectionSignals(SECTION_TEXT, 5),
    facts: [],
    allowedItems: whitelist.allowedItems("test-book", 5),
    knownExits: [12],
    ...overrides,
  };
}

function generator(model: ScriptedModel, mode: GenerationMode, rng: Rng = d6(), maxToolIterations = 5) {
  return new NarrativeGenerator(model, testWhitelist(), {
    mode,
    temperature: 0.7,
    maxToolIterations,
    backtrackLimit: 10,
    rng,
  });
}

test("the turn context hides section numbers outside the tool-only paths line", () => {
  const context = buildTurnContext(input({ facts: ["You take the bronze key."] }));
  expect(context).toContain("BOOK SECTION (authoritative)\nA bronze key lies on the flagstones. To take the stairs, turn to another place.");
  expect(context).toContain("ITEMS PRESENT HERE: BRONZE_KEY, GOLD_PIECES, PROVISIONS");
  expect(context).toContain("PATHS (attempt_navigation values only; never write these numbers): 12");
  expect(context).toContain("ENGINE RESULTS (final)\n- You take the bronze key.");
  expect(context).not.toContain("turn to 12");
});

test("plain mode makes one call without tools and proposes no changes", async () => {
  const model = new ScriptedModel([prose("  The hall is quiet.  ")]);
  const result = await generator(model, "plain").generate(input());

  expect(result).toEqual({
    text: "The hall is quiet.",
    mode: "plain",
    mutations: [],
    invocations: [],
    rolls: [],
    modelCalls: 1,
  });
  expect(model.requests[0].tools).toBeUndefined();
  expect(model.requests[0].system).toContain("You have no tools this turn.");
});

test("tool mode validates each proposal against the state built up so far", async () => {
  const model = new ScriptedModel([
    {
      text: "",
      toolCalls: [toolCall("c1", "add_item", { item: "BRONZE_KEY" }), toolCall("c2", "add_item", { item: "DRAGON_EGG" })],
    },
    {
      text: "",
      toolCalls: [
        toolCall("c3", "add_item", { item: "BRONZE_KEY" }),
        { id: "c4", name: "update_stat", arguments: "{not json" },
      ],
    },
    prose("You pocket the BRONZE_KEY."),
  ]);

  const result = await generator(model, "tools").generate(input());

  expect(result.text).toBe("You pocket the BRONZE_KEY.");
  expect(result.mutations).toEqual([{ kind: "add_item", item: "BRONZE_KEY" }]);
  expect(result.modelCalls).toBe(3);
  expect(result.invocations.map((i) => [i.toolName, i.result.accepted, i.result.reason])).toEqual([
    ["add_item", true, "ok"],
    ["add_item", false, "item_not_found_here"],
    ["add_item", false, "already_have_item"],
    ["update_stat", false, "invalid_tool_arguments"],
  ]);

  const secondRequest = model.requests[1];
  expect(secondRequest.messages).toHaveLength(4);
  expect(secondRequest.messages[3]).toEqual({
    role: "tool",
    toolCallId: "c2",
    content:
      "REJECTED (item_not_found_here): You search for the dragon egg, but find nothing like it here. Perhaps it lies elsewhere.",
  });
});

test("the tool loop stops at its limit and asks for a closing narration", async () => {
  const roll = toolCall("r", "roll_dice", { dice: "1d6" });
  const model = new ScriptedModel([
    { text: "The dice tumble.", toolCalls: [roll] },
    { text: "", toolCalls: [roll] },
    prose("Fortune is fickle."),
  ]);

  const result = await generator(model, "tools", d6(2, 5), 2).generate(input());

  expect(result.text).toBe("The dice tumble.\n\nFortune is fickle.");
  expect(result.rolls.map((r) => r.total)).toEqual([2, 5]);
  expect(result.modelCalls).toBe(3);
  expect(model.requests[2].tools).toBeUndefined();
});

test("model failures and empty replies surface as upstream errors", async () => {
  await expect(generator(new ScriptedModel([new Error("boom")]), "plain").generate(input())).rejects.toThrow(
    new UpstreamUnavailableError("llm", "Narrative generation failed: boom"),
  );
  await expect(generator(new ScriptedModel([prose("   ")]), "tools").generate(input())).rejects.toBeInstanceOf(
    UpstreamUnavailableError,
  );
});

test("tool arguments must be a JSON object, fenced or not", () => {
  expect(parseToolArguments("")).toEqual({});
  expect(parseToolArguments('```json\n{"item": "ROPE"}\n```')).toEqual({ item: "ROPE" });
  expect(() => parseToolArguments("[1, 2]")).toThrow("expected a JSON object, got an array");
  expect(() => parseToolArguments("{not json")).toThrow(SyntaxError);
});
