import { log } from "../utils/logger.js";
import type { RetrievalResult, SectionRecord } from "./types.js";

const retrievalLog = log.withScope("retrieval");

export interface ConsolidateOptions {
  previewChars: number;
  maxSecondary: number;
  /** Records scoring below this are dropped, except the expected section. */
  minScore?: number;
}

export const DEFAULT_CONSOLIDATE_OPTIONS: ConsolidateOptions = {
  previewChars: 200,
  maxSecondary: 2,
};

export function truncatePreview(content: string, maxChars: number): string {
  if (content.length <= maxChars) return content;
  return `${content.slice(0, maxChars)}...`;
}

function copyRecord(record: SectionRecord, content = record.content): SectionRecord {
  return {
    sectionId: record.sectionId,
    content,
    metadata: record.metadata.exits
      ? { ...record.metadata, exits: [...record.metadata.exits] }
      : { ...record.metadata },
    score: record.score,
  };
}

/**
 * Pick the primary section out of a ranked hit list and keep a couple of
 * short previews of the rest. Input order is the ranking.
 */
export function consolidateRetrieval(
  records: readonly SectionRecord[],
  expectedSection: number,
  opts: ConsolidateOptions = DEFAULT_CONSOLIDATE_OPTIONS,
): RetrievalResult {
  const kept = records.filter(
    (r) => r.sectionId === expectedSection || opts.minScore === undefined || r.score >= opts.minScore,
  );

  if (kept.length === 0) {
    return { primary: null, secondary: [], mismatch: false };
  }

  const expected = kept.find((r) => r.sectionId === expectedSection);
  const primary = expected ?? kept[0];
  const mismatch = expected === undefined;

  if (mismatch) {
    retrievalLog.warn(`Expected section ${expectedSection} not in results; using ${primary.sectionId}`, {
      returned: kept.map((r) => r.sectionId),
    });
  }

  const secondary: SectionRecord[] = [];
  const seen = new Set<number>([primary.sectionId]);
  for (const record of kept) {
    if (secondary.length >= opts.maxSecondary) break;
    if (seen.has(record.sectionId)) continue;
    seen.add(record.sectionId);
    secondary.push(copyRecord(record, truncatePreview(record.content, opts.previewChars)));
  }

  return { primary: copyRecord(primary), secondary, mismatch };
}
