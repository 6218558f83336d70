import type { BookDefinition } from "../books/bookDefinition.js";
import type { Whitelist } from "../books/whitelist.js";
import { extractSectionSignals, type ExtractedSignals } from "../extract/contentExtractor.js";
import type { Rng } from "../mechanics/dice.js";
import { resolvePlayerAction, type MechanicsResult } from "../mechanics/resolveAction.js";
import {
  buildRegenerationNotice,
  checkCompliance,
  hasHighSeverity,
  type ComplianceIssue,
} from "../narrative/compliance.js";
import type { GenerationResult, NarrativeGenerator, ToolInvocation } from "../narrative/generator.js";
import { consolidateRetrieval } from "../retrieval/consolidate.js";
import type { RetrievalResult, SectionSearch } from "../retrieval/types.js";
import { applyMutations } from "../state/stateUpdater.js";
import { checkTerminal } from "../state/terminal.js";
import type { GameState, Mutation, TerminalVerdict } from "../state/types.js";
import { log } from "../utils/logger.js";
import { withTimeout } from "../utils/withTimeout.js";
import { parsePlayerAction, type PlayerAction } from "../validation/parseAction.js";
import { checkNavigation } from "../validation/toolCalls.js";
import { checkDoorGate, OK, validateAction, type ValidationVerdict } from "../validation/validator.js";
import { UpstreamUnavailableError } from "./errors.js";

const turnLog = log.withScope("turn");

export interface RetrievalSettings {
  k: number;
  minScore?: number;
  previewChars: number;
  maxSecondary: number;
  timeoutMs: number;
}

export interface TurnDeps {
  book: BookDefinition;
  whitelist: Whitelist;
  search: SectionSearch;
  generator: NarrativeGenerator;
  rng: Rng;
  retrieval: RetrievalSettings;
  backtrackLimit: number;
}

export interface TurnResult {
  state: GameState;
  narrative: string;
  action: PlayerAction;
  verdict: ValidationVerdict;
  mutations: Mutation[];
  invocations: ToolInvocation[];
  issues: ComplianceIssue[];
  terminal: TerminalVerdict;
  regenerated: boolean;
}

function rejection(state: GameState, action: PlayerAction, verdict: ValidationVerdict): TurnResult {
  return {
    state,
    narrative: verdict.message,
    action,
    verdict,
    mutations: [],
    invocations: [],
    issues: [],
    terminal: "continue",
    regenerated: false,
  };
}

async function retrieveSection(state: GameState, actionText: string, deps: TurnDeps): Promise<RetrievalResult> {
  const { search, retrieval: settings } = deps;
  const expected = state.currentSection;
  const options = {
    previewChars: settings.previewChars,
    maxSecondary: settings.maxSecondary,
    minScore: settings.minScore,
  };

  const hits = await withTimeout(
    search.search(state.bookId, `Section ${expected}: ${actionText}`, settings.k),
    settings.timeoutMs,
    "search",
    "section search",
  );
  let result = consolidateRetrieval(hits, expected, options);

  if (!result.primary || result.mismatch) {
    const direct = await withTimeout(
      search.getBySection(state.bookId, expected),
      settings.timeoutMs,
      "search",
      "section lookup",
    );
    if (direct) result = consolidateRetrieval([direct, ...hits], expected, options);
  }

  if (!result.primary) {
    throw new UpstreamUnavailableError("search", `No book content found for section ${expected}`);
  }
  return result;
}

/** Flags and combat implied by the section the player is standing in. */
export function deriveSectionMutations(state: GameState, signals: ExtractedSignals): Mutation[] {
  const mutations: Mutation[] = [];
  if (signals.flags.doorLocked && !state.flags.doorLocked && !state.flags.doorOpened) {
    mutations.push({ kind: "set_flag", flag: "doorLocked", value: true });
  }
  if (signals.flags.keyType && !state.flags.keyType) {
    mutations.push({ kind: "set_flag", flag: "keyType", value: signals.flags.keyType });
  }
  if (signals.combat && !state.inCombat && !state.flags.enemyDefeated) {
    mutations.push({
      kind: "start_combat",
      enemy: { name: signals.combat.enemyName, skill: signals.combat.skill, stamina: signals.combat.stamina },
    });
  }
  return mutations;
}

function knownExitsFor(retrieval: RetrievalResult, signals: ExtractedSignals): number[] {
  const exits = new Set([...signals.exits, ...(retrieval.primary?.metadata.exits ?? [])]);
  return [...exits].sort((a, b) => a - b);
}

/**
 * One player turn: validate, retrieve, extract, resolve, narrate, check,
 * then apply every mutation in a single step. The input state is never
 * modified; on any thrown error the caller still holds the old state.
 */
export async function processTurn(state: GameState, actionText: string, deps: TurnDeps): Promise<TurnResult> {
  const action = parsePlayerAction(actionText);

  const verdict = validateAction(state, action, { whitelist: deps.whitelist, backtrackLimit: deps.backtrackLimit });
  if (!verdict.valid) return rejection(state, action, verdict);

  const retrieval = await retrieveSection(state, actionText, deps);
  const primary = retrieval.primary;
  if (!primary) throw new UpstreamUnavailableError("search", `No book content for section ${state.currentSection}`);

  const signals = extractSectionSignals(primary.content, primary.sectionId, state.bookId);
  const knownExits = knownExitsFor(retrieval, signals);

  // A mismatched primary describes some other section; its flags say nothing about this one.
  const sectionMutations = retrieval.mismatch ? [] : deriveSectionMutations(state, signals);
  const inSection = applyMutations(state, sectionMutations);

  if (action.type === "navigate" && action.section !== null) {
    const nav = checkNavigation(inSection, action.section, { backtrackLimit: deps.backtrackLimit, knownExits });
    if (!nav.valid) return rejection(state, action, nav);
  }
  if (action.type === "open_door") {
    const door = checkDoorGate(inSection);
    if (!door.valid) return rejection(state, action, door);
  }

  const mechanics: MechanicsResult =
    action.type === "navigate" && action.section !== null
      ? { mutations: [{ kind: "navigate", section: action.section }], facts: [], rolls: [] }
      : resolvePlayerAction(inSection, action, deps.book, deps.rng);
  const resolved = applyMutations(inSection, mechanics.mutations);

  const allowedItems = deps.whitelist.allowedItems(state.bookId, state.currentSection);
  const knownNames = [...signals.npcs, ...(signals.combat ? [signals.combat.enemyName] : [])];
  const generationInput = {
    state: resolved,
    actionText,
    retrieval,
    signals,
    facts: mechanics.facts,
    allowedItems,
    knownExits,
  };

  let generation: GenerationResult = await deps.generator.generate(generationInput);
  let issues = checkCompliance(generation.text, {
    allowedItems,
    inventory: applyMutations(resolved, generation.mutations).inventory,
    knownNames,
    rollCount: mechanics.rolls.length + generation.rolls.length,
  });

  let regenerated = false;
  if (hasHighSeverity(issues)) {
    turnLog.warn("Regenerating once after compliance failure", { issues: issues.map((i) => i.kind) });
    regenerated = true;
    generation = await deps.generator.generate({
      ...generationInput,
      regenerationNotice: buildRegenerationNotice(issues, allowedItems),
    });
    issues = checkCompliance(generation.text, {
      allowedItems,
      inventory: applyMutations(resolved, generation.mutations).inventory,
      knownNames,
      rollCount: mechanics.rolls.length + generation.rolls.length,
    });
    if (issues.length) {
      turnLog.warn("Regenerated narrative still has compliance issues; continuing", { issues });
    }
  }

  const mutations = [...sectionMutations, ...mechanics.mutations, ...generation.mutations];
  let next = applyMutations(state, mutations, { advanceTurn: true });

  const terminal = checkTerminal(next, deps.book);
  if (terminal !== "continue" && next.status === "active") {
    const ending: Mutation = { kind: "end_game", status: terminal === "victory" ? "completed" : "dead" };
    next = applyMutations(next, [ending]);
    mutations.push(ending);
  }

  turnLog.info(`Turn ${next.turnNumber} done`, {
    action: action.type,
    from: state.currentSection,
    to: next.currentSection,
    mutations: mutations.length,
    toolCalls: generation.invocations.length,
    issues: issues.length,
    terminal,
  });

  return {
    state: next,
    narrative: generation.text,
    action,
    verdict: OK,
    mutations,
    invocations: generation.invocations,
    issues,
    terminal,
    regenerated,
  };
}
