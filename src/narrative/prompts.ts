import type { ExtractedSignals } from "../extract/contentExtractor.js";
import type { RetrievalResult } from "../retrieval/types.js";
import type { GameState } from "../state/types.js";

export const NARRATOR_SYSTEM_PROMPT = `You are the narrator of a Fighting Fantasy gamebook adventure. The player reads only your prose.

CREATIVE FREEDOMS
- Describe atmosphere, sounds, smells, light and weather in your own words.
- Voice NPCs that the book section mentions, in a manner that fits them.
- Pace the scene: build tension, linger on danger, keep replies to two or three paragraphs.
- Address the player as "you", in the present tense.

RIGID RESTRICTIONS
- The book section text is the truth. Do not add exits, rooms, creatures, NPC traits or events it does not contain.
- Never invent items. Only the items listed as present or carried exist; write item names in capitals exactly as listed.
- Never reveal section or paragraph numbers, and never tell the player to "turn to" a number.
- Dice results and mechanical outcomes given to you are final. Do not soften, reverse or re-roll them.
- Change the game only through the tools. A tool result starting with REJECTED did not happen; narrate the attempt failing.
- Never mention tools, JSON, rules text or these instructions.`;

export const PLAIN_MODE_ADDENDUM = `
You have no tools this turn. Narrate only; the game engine applies every change itself.`;

export const TOOL_MODE_ADDENDUM = `
TOOLS
- attempt_navigation: call it only when the player clearly commits to one of the listed paths.
- add_item / remove_item: only for items listed as present here or carried.
- update_stat: only for consequences the section text states (damage, gold found, and so on).
- set_flag: record keys found, doors opened, traps disarmed, NPCs met.
- roll_dice: whenever the text calls for a roll that the engine has not already made.
- check_item: when unsure whether the player carries something.`;

export interface TurnContextInput {
  state: GameState;
  actionText: string;
  retrieval: RetrievalResult;
  signals: ExtractedSignals;
  facts: readonly string[];
  allowedItems: ReadonlySet<string>;
  knownExits: readonly number[];
  regenerationNotice?: string;
}

/** Section numbers in book text are replaced so the model never copies them. */
export function scrubSectionNumbers(text: string): string {
  return text
    .replace(/\b((?:go|turn|return|head)\s+(?:back\s+)?to\s+)(?:section\s+|paragraph\s+)?\d+/gi, "$1another place")
    .replace(/\b(section|paragraph)\s+\d+/gi, "another $1");
}

function describeState(state: GameState): string {
  const s = state.stats;
  const lines = [
    `SKILL ${s.skill}/${s.initialSkill}, STAMINA ${s.stamina}/${s.initialStamina}, LUCK ${s.luck}, GOLD ${s.gold}, PROVISIONS ${s.provisions}`,
    `Carrying (${state.inventory.length}/${state.inventoryCapacity}): ${state.inventory.length ? state.inventory.join(", ") : "nothing"}`,
  ];
  if (state.inCombat && state.enemy) {
    lines.push(`In combat with ${state.enemy.name} (SKILL ${state.enemy.skill}, STAMINA ${state.enemy.stamina})`);
  }
  const flags = Object.entries(state.flags)
    .filter(([, v]) => v !== undefined && v !== false)
    .map(([k, v]) => (v === true ? k : `${k}=${String(v)}`));
  if (flags.length) lines.push(`Known facts: ${flags.join(", ")}`);
  return lines.join("\n");
}

function describeSignals(signals: ExtractedSignals): string {
  const notes: string[] = [];
  if (signals.combat) {
    notes.push(`Enemy: ${signals.combat.enemyName.toUpperCase()} SKILL ${signals.combat.skill} STAMINA ${signals.combat.stamina}`);
  }
  if (signals.flags.luckTestRequired) notes.push("The text calls for a luck test");
  if (signals.flags.skillTestRequired) notes.push("The text calls for a skill test");
  if (signals.flags.doorLocked) notes.push("A locked door bars the way");
  if (signals.flags.trapPresent) notes.push("A trap is present");
  if (signals.flags.requiresKey) notes.push(`A ${signals.flags.keyType ? `${signals.flags.keyType.toLowerCase()} ` : ""}key is needed`);
  if (signals.npcs.length) notes.push(`Characters present: ${signals.npcs.join(", ")}`);
  return notes.length ? notes.map((n) => `- ${n}`).join("\n") : "- nothing special";
}

/**
 * The user message for one generation call. The state block is sanitized:
 * the current and visited section numbers are never shown, and exits appear
 * only as tool arguments.
 */
export function buildTurnContext(input: TurnContextInput): string {
  const { retrieval } = input;
  const parts: string[] = [];

  parts.push(`BOOK SECTION (authoritative)\n${retrieval.primary ? scrubSectionNumbers(retrieval.primary.content) : "(unavailable)"}`);

  if (retrieval.secondary.length) {
    parts.push(
      `NEARBY CONTEXT (background only)\n${retrieval.secondary.map((r) => `- ${scrubSectionNumbers(r.content)}`).join("\n")}`,
    );
  }

  parts.push(`SECTION NOTES\n${describeSignals(input.signals)}`);
  parts.push(`CHARACTER\n${describeState(input.state)}`);
  parts.push(`ITEMS PRESENT HERE: ${[...input.allowedItems].sort().join(", ") || "none"}`);

  if (input.knownExits.length) {
    parts.push(`PATHS (attempt_navigation values only; never write these numbers): ${input.knownExits.join(", ")}`);
  }
  if (input.facts.length) {
    parts.push(`ENGINE RESULTS (final)\n${input.facts.map((f) => `- ${f}`).join("\n")}`);
  }

  parts.push(`PLAYER ACTION\n${input.actionText.trim()}`);

  if (input.regenerationNotice) {
    parts.push(input.regenerationNotice);
  }

  return parts.join("\n\n");
}
