import { extractExits, MAX_SECTION, MIN_SECTION } from "../extract/contentExtractor.js";
import type { IndexedSection } from "./sqliteSectionIndex.js";

const SECTION_HEADER = /^\s*(\d{1,3})\s*$/;

/**
 * Split a plain-text gamebook into numbered sections. A line holding only a
 * number opens a new section; text before the first header is front matter
 * and is dropped. A repeated number replaces the earlier section.
 */
export function parseBookSections(text: string, source?: string): IndexedSection[] {
  const bySection = new Map<number, string[]>();
  let current: number | null = null;

  for (const line of text.split(/\r?\n/)) {
    const header = SECTION_HEADER.exec(line);
    if (header) {
      const n = Number.parseInt(header[1], 10);
      if (n >= MIN_SECTION && n <= MAX_SECTION) {
        current = n;
        bySection.set(n, []);
        continue;
      }
    }
    if (current !== null) bySection.get(current)?.push(line);
  }

  return [...bySection.entries()]
    .map(([sectionId, lines]) => {
      const content = lines.join("\n").trim();
      return {
        sectionId,
        content,
        metadata: { exits: extractExits(content), ...(source ? { source } : {}) },
      };
    })
    .filter((s) => s.content.length > 0)
    .sort((a, b) => a.sectionId - b.sectionId);
}
