import JSON5 from "json5";

export type ParseResult = { ok: true; value: unknown } | { ok: false };

function attempt(parse: (text: string) => unknown, text: string): ParseResult {
  try {
    return { ok: true, value: parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Strict JSON first, then JSON5 (single quotes, unquoted keys, trailing commas).
 * Returns `{ ok: false }` instead of throwing so callers can fall back to another format.
 */
export function tryParseJson(text: string): ParseResult {
  const cleaned = text.trim();
  if (!cleaned) return { ok: false };

  const strict = attempt((t) => JSON.parse(t), cleaned);
  if (strict.ok) return strict;
  return attempt((t) => JSON5.parse(t), cleaned);
}

export function prettyJson(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}
