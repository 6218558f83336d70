const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Arguments string of a model tool call. Empty means no arguments and a
 * markdown-fenced block is unwrapped; anything but a JSON object throws.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  const trimmed = raw.trim();
  if (trimmed === "") return {};

  const body = FENCED.exec(trimmed)?.[1] ?? trimmed;
  const value: unknown = JSON.parse(body);
  if (!isRecord(value)) {
    throw new Error(`expected a JSON object, got ${Array.isArray(value) ? "an array" : typeof value}`);
  }
  return value;
}
