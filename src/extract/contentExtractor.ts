/**
 * Pattern-based signals pulled out of raw book-section text.
 *
 * Everything here is a hint for the narrator and the post-turn flag pass.
 * A missed pattern just means an empty result; nothing in this module throws.
 */

import { log } from "../utils/logger.js";

const extractLog = log.withScope("extract");

export const MIN_SECTION = 1;
export const MAX_SECTION = 400;

export interface SectionFlags {
  combatRequired?: boolean;
  luckTestRequired?: boolean;
  skillTestRequired?: boolean;
  doorLocked?: boolean;
  requiresKey?: boolean;
  keyType?: string;
  requiredItems?: string[];
  trapPresent?: boolean;
  instantDeathPossible?: boolean;
  importantChoice?: boolean;
}

export interface CombatInfo {
  enemyName: string;
  skill: number;
  stamina: number;
}

export interface ExtractedSignals {
  exits: number[];
  flags: SectionFlags;
  npcs: string[];
  combat: CombatInfo | null;
}

// Overlapping matches ("section 42" inside "go to section 42") collapse by number.
const EXIT_PATTERNS: readonly RegExp[] = [
  /\b(?:go|turn|head)\s+(?:back\s+)?to\s+(?:section\s+|paragraph\s+)?(\d+)/gi,
  /\breturn\s+to\s+(?:section\s+|paragraph\s+)?(\d+)/gi,
  /\bsection\s+(\d+)/gi,
  /\bparagraph\s+(\d+)/gi,
];

const KEYWORDS = {
  combat: ["fight", "combat", "attack", "battle", "do battle with", "lunges at you"],
  luckTest: ["test your luck", "test for luck"],
  skillTest: ["test your skill", "test for skill"],
  doorLocked: ["locked door", "door is locked", "is locked", "barred door", "door is barred", "padlock"],
  trap: ["trap", "snare", "spiked pit", "poison dart", "tripwire"],
  lethal: ["you die", "you are dead", "your adventure ends", "your adventure is over", "instant death"],
} as const;

const KEY_PATTERNS: readonly RegExp[] = [
  /\byou need (?:a |the )?key\b/,
  /\bif you (?:have|possess) (?:a |the )?key\b/,
  /\buse the key\b/,
  /\bunlock(?:s|ed)? (?:it|the door) with\b/,
];

const KEY_TYPE_PATTERN = /\b(gold|golden|silver|iron|brass|bronze|copper|bone|crystal|skeleton)\s+key\b/;

const REQUIRED_ITEM_PATTERNS: readonly RegExp[] = [
  /\byou need (?:a |an |the |some )?([a-z]+)/g,
  /\bif you (?:have|possess) (?:a |an |the |some )?([a-z]+)/g,
  /\bwithout (?:a |an |the )?([a-z]+), you\b/g,
];

const REQUIRED_ITEM_STOPWORDS = new Set([
  "to", "it", "that", "this", "them", "one", "any", "not", "been", "more", "already", "enough", "no",
]);

const NPC_TITLE_PATTERN =
  /\b(king|queen|prince|princess|wizard|sorcerer|guard|captain|hermit|druid|merchant|blacksmith|priest|innkeeper)\b/gi;

const NAMED_CREATURE_PATTERN = /\b([A-Z][a-z]+) the (Orc|Goblin|Dragon|Troll|Giant|Demon|Dwarf|Elf|Ogre)\b/g;

// Stat blocks are printed in capitals: "ORC SKILL 6 STAMINA 5".
const COMBAT_PATTERN = /\b([A-Z][A-Z'-]*(?:\s+[A-Z][A-Z'-]*)*)[.:,;]?\s+SKILL\s+(\d+)\s+STAMINA\s+(\d+)/;

function containsKeyword(lower: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => new RegExp(`\\b${k}`).test(lower));
}

function titleCase(value: string): string {
  return value
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export function extractExits(text: string): number[] {
  const exits = new Set<number>();
  for (const pattern of EXIT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const n = Number.parseInt(match[1], 10);
      if (Number.isInteger(n) && n >= MIN_SECTION && n <= MAX_SECTION) {
        exits.add(n);
      }
    }
  }
  return [...exits].sort((a, b) => a - b);
}

export function extractCombatInfo(text: string): CombatInfo | null {
  const match = COMBAT_PATTERN.exec(text);
  if (!match) return null;
  return {
    enemyName: titleCase(match[1]),
    skill: Number.parseInt(match[2], 10),
    stamina: Number.parseInt(match[3], 10),
  };
}

export function extractFlags(text: string): SectionFlags {
  const flags: SectionFlags = {};
  const lower = text.toLowerCase();

  if (containsKeyword(lower, KEYWORDS.combat) || extractCombatInfo(text)) {
    flags.combatRequired = true;
  }
  if (containsKeyword(lower, KEYWORDS.luckTest)) flags.luckTestRequired = true;
  if (containsKeyword(lower, KEYWORDS.skillTest)) flags.skillTestRequired = true;
  if (containsKeyword(lower, KEYWORDS.doorLocked)) flags.doorLocked = true;

  const keyType = KEY_TYPE_PATTERN.exec(lower);
  if (keyType || KEY_PATTERNS.some((p) => p.test(lower))) {
    flags.requiresKey = true;
    if (keyType) flags.keyType = keyType[1].toUpperCase();
  }

  const requiredItems: string[] = [];
  for (const pattern of REQUIRED_ITEM_PATTERNS) {
    for (const match of lower.matchAll(pattern)) {
      const item = match[1].toUpperCase();
      if (!REQUIRED_ITEM_STOPWORDS.has(match[1]) && !requiredItems.includes(item)) {
        requiredItems.push(item);
      }
    }
  }
  if (requiredItems.length > 0) flags.requiredItems = requiredItems;

  if (containsKeyword(lower, KEYWORDS.trap)) flags.trapPresent = true;
  if (containsKeyword(lower, KEYWORDS.lethal)) flags.instantDeathPossible = true;

  if (extractExits(text).length >= 3) flags.importantChoice = true;

  return flags;
}

export function extractNpcs(text: string): string[] {
  const npcs: string[] = [];
  const push = (name: string) => {
    if (!npcs.includes(name)) npcs.push(name);
  };

  for (const match of text.matchAll(NPC_TITLE_PATTERN)) {
    push(titleCase(match[1]));
  }
  for (const match of text.matchAll(NAMED_CREATURE_PATTERN)) {
    push(`${match[1]} the ${match[2]}`);
  }
  return npcs;
}

/**
 * All signals for one section. `bookId` is carried for logging and for
 * book-specific pattern sets; every book currently shares the English set.
 */
export function extractSectionSignals(text: string, sectionId: number, bookId?: string): ExtractedSignals {
  const signals: ExtractedSignals = {
    exits: extractExits(text),
    flags: extractFlags(text),
    npcs: extractNpcs(text),
    combat: extractCombatInfo(text),
  };

  extractLog.debug(`Section ${sectionId} signals`, {
    bookId,
    exits: signals.exits,
    flags: Object.keys(signals.flags),
    enemy: signals.combat?.enemyName ?? null,
  });
  if (signals.flags.instantDeathPossible) {
    extractLog.warn(`Section ${sectionId} mentions lethal danger`, { bookId });
  }
  return signals;
}
