import type { ChangeRecord, JsonMap, JsonNode, UpdateRecord } from "../contracts/chartDocument";
import { getChartKind, JsonNodeSchema, NO_VALUE } from "../contracts/chartDocument";
import { getValue, setValue, validatePath } from "../compiler/documentPatcher";
import { parsePath } from "../compiler/pathExpression";
import { translateInstructions } from "../translator";
import { tryParseJson } from "../utils/jsonParser";
import { trace, traceText } from "../utils/trace";

export type OrchestrationResult = {
  document: JsonMap;
  changes: ChangeRecord[];
  updates: UpdateRecord[];
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toUpdate(path: unknown, value: unknown): UpdateRecord | null {
  if (typeof path !== "string") return null;
  const parsed = JsonNodeSchema.safeParse(value);
  if (!parsed.success) return null;
  return { path, value: parsed.data };
}

function parseLiteral(text: string): JsonNode {
  const decoded = tryParseJson(text);
  if (decoded.ok) {
    const parsed = JsonNodeSchema.safeParse(decoded.value);
    if (parsed.success) return parsed.data;
  }
  return text;
}

/** `path = value` per line; blank lines, `#` comments and lines without `=` are skipped. */
export function parseKeyValueLines(raw: string): UpdateRecord[] {
  const updates: UpdateRecord[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const stripped = line.trim();
    if (!stripped || stripped.startsWith("#")) continue;
    const eq = stripped.indexOf("=");
    if (eq === -1) continue;
    const path = stripped.slice(0, eq).trim();
    const value = stripped.slice(eq + 1).trim();
    updates.push({ path, value: parseLiteral(value) });
  }
  return updates;
}

/**
 * Accepts a path→value mapping, a list of `{path, value}` records or `[path, value]` pairs,
 * or text holding either JSON or `key = value` lines.
 */
export function normalizeExplicitUpdates(raw: unknown): UpdateRecord[] {
  if (raw === null || raw === undefined) return [];

  let data: unknown = raw;
  if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (!trimmed) return [];
    const decoded = tryParseJson(trimmed);
    data = decoded.ok ? decoded.value : parseKeyValueLines(trimmed);
  }

  const out: UpdateRecord[] = [];
  if (Array.isArray(data)) {
    for (const item of data) {
      let update: UpdateRecord | null = null;
      if (isPlainObject(item) && "path" in item && "value" in item) {
        update = toUpdate(item.path, item.value);
      } else if (Array.isArray(item) && item.length === 2) {
        update = toUpdate(item[0], item[1]);
      }
      if (update) out.push(update);
    }
    return out;
  }

  if (isPlainObject(data)) {
    for (const [path, value] of Object.entries(data)) {
      const update = toUpdate(path, value);
      if (update) out.push(update);
    }
  }
  return out;
}

/** Explicit updates first, in caller order, then whatever the instructions translate to. */
export function collectUpdates(options: JsonMap, explicit: unknown, instructions?: string | null): UpdateRecord[] {
  const updates = normalizeExplicitUpdates(explicit);
  if (instructions) {
    traceText("translator.input", instructions);
    const derived = translateInstructions(instructions, options);
    trace("translator.updates", { count: derived.length, paths: derived.map((u) => u.path) });
    updates.push(...derived);
  }
  return updates;
}

/**
 * Validates and writes each update in order. The first rejected path aborts the run; writes
 * made before it stay in `options`, so callers must not persist after a failure.
 */
export function applyUpdateRecords(options: JsonMap, updates: readonly UpdateRecord[]): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  for (const update of updates) {
    if (!update.path) continue;
    const tokens = parsePath(update.path);
    const chartKind = getChartKind(options);
    try {
      validatePath(tokens, chartKind);
    } catch (err) {
      trace("patch.rejected", { path: update.path, chartKind });
      throw err;
    }
    const current = getValue(options, tokens);
    const before = current === NO_VALUE ? NO_VALUE : structuredClone(current);
    setValue(options, tokens, structuredClone(update.value));
    changes.push({ path: update.path, before, after: update.value });
    trace("patch.applied", { path: update.path });
  }
  return changes;
}

export function applyUpdates(options: JsonMap, explicit: unknown, instructions?: string | null): OrchestrationResult {
  const updates = collectUpdates(options, explicit, instructions);
  const changes = applyUpdateRecords(options, updates);
  return { document: options, changes, updates };
}
