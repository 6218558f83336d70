import { normalizeItemId } from "../books/whitelist.js";

export type PlayerAction =
  | { type: "empty"; raw: string }
  | { type: "attack"; target?: string; raw: string }
  | { type: "flee"; raw: string }
  | { type: "use_item"; item: string; raw: string }
  | { type: "test_luck"; raw: string }
  | { type: "test_skill"; raw: string }
  | { type: "pickup"; item: string; raw: string }
  | { type: "drop"; item: string; raw: string }
  | { type: "navigate"; section: number | null; direction?: string; raw: string }
  | { type: "open_door"; raw: string }
  | { type: "talk"; target?: string; raw: string }
  | { type: "examine"; target?: string; raw: string }
  | { type: "eat_provision"; raw: string }
  | { type: "explore"; raw: string };

export type PlayerActionType = PlayerAction["type"];

const ARTICLE = String.raw`(?:the\s+|a\s+|an\s+|some\s+|my\s+)?`;

const EAT = /\b(?:eat|consume)\b.*\b(?:provisions?|meal|rations?|food)\b|^eat$/;
const TEST_LUCK = /\btest\s+(?:my\s+|your\s+)?luck\b|\btry\s+my\s+luck\b/;
const TEST_SKILL = /\btest\s+(?:my\s+|your\s+)?skill\b/;
const FLEE = /\b(?:flee|run\s+away|escape|retreat)\b/;
const ATTACK = new RegExp(String.raw`\b(?:attack|fight|strike|hit|slash|stab)\b(?:\s+${ARTICLE}([a-z]+))?`);
const OPEN_DOOR = /\b(?:open|unlock|force)\b.*\bdoor\b/;
const PICKUP = new RegExp(String.raw`\b(?:pick\s+up|take|grab|collect|pocket)\s+${ARTICLE}(.+)$`);
const DROP = new RegExp(String.raw`\b(?:drop|discard|throw\s+away)\s+${ARTICLE}(.+)$`);
const USE = new RegExp(String.raw`\b(?:use|drink|quaff|wield|wear)\s+${ARTICLE}(.+)$`);
const NAVIGATE_NUMBER =
  /\b(?:go|turn|head|return|move|walk)\b(?:\s+back)?(?:\s+to)?\s+(?:section\s+|paragraph\s+)?(\d+)\b/;
const NAVIGATE_DIRECTION =
  /\b(?:go|walk|head|move|run|climb|enter|follow|continue|proceed|return)\b(?:\s+(?:to\s+|into\s+|through\s+)?(?:the\s+)?([a-z]+))?/;
const TALK = /\b(?:talk|speak|ask|greet|say)\b(?:\s+(?:to|with)\s+(?:the\s+)?([a-z]+))?/;
const EXAMINE = /\b(?:examine|inspect|look|search|study|read)\b(?:\s+(?:at\s+|around\s+)?(?:the\s+)?([a-z]+))?/;

/** Trailing place phrases ("from the table") are not part of the item name. */
function cleanItemPhrase(phrase: string): string {
  return normalizeItemId(
    phrase
      .replace(/[.!?,;:]+$/g, "")
      .replace(/\s+(?:from|off|on|in|into|under|with|and)\s+.*$/, "")
      .trim(),
  );
}

/**
 * Deterministic intent detection for a player's free text. Checked in a
 * fixed order; anything unmatched is general exploration.
 */
export function parsePlayerAction(text: string): PlayerAction {
  const raw = text;
  const lower = text.trim().toLowerCase();
  if (!lower) return { type: "empty", raw };

  if (EAT.test(lower)) return { type: "eat_provision", raw };
  if (TEST_LUCK.test(lower)) return { type: "test_luck", raw };
  if (TEST_SKILL.test(lower)) return { type: "test_skill", raw };
  if (FLEE.test(lower)) return { type: "flee", raw };

  const attack = ATTACK.exec(lower);
  if (attack) return attack[1] ? { type: "attack", target: attack[1], raw } : { type: "attack", raw };

  if (OPEN_DOOR.test(lower)) return { type: "open_door", raw };

  const pickup = PICKUP.exec(lower);
  if (pickup) {
    const item = cleanItemPhrase(pickup[1]);
    if (item) return { type: "pickup", item, raw };
  }

  const drop = DROP.exec(lower);
  if (drop) {
    const item = cleanItemPhrase(drop[1]);
    if (item) return { type: "drop", item, raw };
  }

  const use = USE.exec(lower);
  if (use) {
    const item = cleanItemPhrase(use[1]);
    if (item) return { type: "use_item", item, raw };
  }

  const numbered = NAVIGATE_NUMBER.exec(lower);
  if (numbered) return { type: "navigate", section: Number.parseInt(numbered[1], 10), raw };

  const direction = NAVIGATE_DIRECTION.exec(lower);
  if (direction) {
    return direction[1]
      ? { type: "navigate", section: null, direction: direction[1], raw }
      : { type: "navigate", section: null, raw };
  }

  const talk = TALK.exec(lower);
  if (talk) return talk[1] ? { type: "talk", target: talk[1], raw } : { type: "talk", raw };

  const examine = EXAMINE.exec(lower);
  if (examine) return examine[1] ? { type: "examine", target: examine[1], raw } : { type: "examine", raw };

  return { type: "explore", raw };
}
