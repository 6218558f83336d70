import { normalizeItemId } from "../books/whitelist.js";
import { log } from "../utils/logger.js";

const complianceLog = log.withScope("compliance");

export type IssueSeverity = "high" | "medium" | "low";

export type ComplianceIssue =
  | { kind: "invented_item"; severity: "high"; token: string }
  | { kind: "section_leak"; severity: "medium"; excerpt: string }
  | { kind: "unverified_roll"; severity: "low"; excerpt: string };

export interface ComplianceContext {
  allowedItems: ReadonlySet<string>;
  inventory: readonly string[];
  /** Capitalised names that are not items: enemies, NPCs. */
  knownNames?: readonly string[];
  /** Dice rolled by the engine or a tool this turn. */
  rollCount: number;
}

// Stat names and game terms are printed in capitals in the books themselves.
const GAME_TERMS = new Set(["SKILL", "STAMINA", "LUCK", "GOLD", "PROVISIONS", "INVENTORY"]);

const CAPS_RUN = /\b[A-Z][A-Z'-]{2,}(?:[ _][A-Z][A-Z'-]{2,})*\b/g;
const SECTION_LEAK = /\b(?:section|paragraph)\s+\d+\b|\bturn\s+to\s+\d+\b/gi;
const CLAIMED_ROLL = /\byou\s+roll(?:ed)?\s+(?:a\s+)?\d+\b|\brolled\s+(?:a\s+)?\d+\b|\bdice\s+(?:show|shows|showed|come\s+up)\b/i;

/**
 * Scan generated prose for content the engine never granted. Findings are
 * reported, never corrected here; the caller decides whether to regenerate.
 */
export function checkCompliance(text: string, ctx: ComplianceContext): ComplianceIssue[] {
  const issues: ComplianceIssue[] = [];
  const permitted = new Set<string>([...ctx.allowedItems, ...ctx.inventory.map(normalizeItemId)]);
  const names = new Set((ctx.knownNames ?? []).map(normalizeItemId));

  const seenTokens = new Set<string>();
  for (const match of text.matchAll(CAPS_RUN)) {
    const id = normalizeItemId(match[0]);
    if (seenTokens.has(id)) continue;
    seenTokens.add(id);
    if (permitted.has(id) || names.has(id)) continue;
    const words = id.split("_");
    if (words.every((w) => GAME_TERMS.has(w))) continue;
    issues.push({ kind: "invented_item", severity: "high", token: match[0] });
  }

  for (const match of text.matchAll(SECTION_LEAK)) {
    issues.push({ kind: "section_leak", severity: "medium", excerpt: match[0] });
  }

  if (ctx.rollCount === 0) {
    const claimed = CLAIMED_ROLL.exec(text);
    if (claimed) issues.push({ kind: "unverified_roll", severity: "low", excerpt: claimed[0] });
  }

  for (const issue of issues) {
    complianceLog.warn(`Compliance issue: ${issue.kind}`, issue);
  }
  return issues;
}

export function hasHighSeverity(issues: readonly ComplianceIssue[]): boolean {
  return issues.some((i) => i.severity === "high");
}

/** Extra instruction appended to the prompt for the single regeneration attempt. */
export function buildRegenerationNotice(issues: readonly ComplianceIssue[], allowedItems: ReadonlySet<string>): string {
  const lines = ["CORRECTION: your previous draft broke the rules and was discarded."];

  const invented = issues.flatMap((i) => (i.kind === "invented_item" ? [i.token] : []));
  if (invented.length) {
    const allowed = [...allowedItems].sort().join(", ") || "none";
    lines.push(`- It named items that do not exist here: ${invented.join(", ")}. The only items you may name are: ${allowed}.`);
  }
  if (issues.some((i) => i.kind === "section_leak")) {
    lines.push("- It revealed section numbers. Never write section or paragraph numbers.");
  }
  if (issues.some((i) => i.kind === "unverified_roll")) {
    lines.push("- It claimed a dice result nobody rolled. Use roll_dice or leave the outcome open.");
  }
  lines.push("Write the scene again, obeying every restriction.");
  return lines.join("\n");
}
