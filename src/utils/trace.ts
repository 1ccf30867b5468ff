import { getTraceContext } from "./traceContext";

export type TraceEvent =
  | "skill.start"
  | "skill.done"
  | "skill.failed"
  | "translator.input"
  | "translator.updates"
  | "patch.applied"
  | "patch.rejected"
  | "store.persisted";

type TraceData = Record<string, unknown>;

const TRACE_PREFIX = "[CHARTWRIGHT_TRACE]";
const TEXT_LIMIT = 2000;
const FULL_TEXT_LIMIT = 20000;

function flag(name: string): boolean {
  return process.env[name] === "1";
}

export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return `${text.slice(0, maxLen)}…(truncated, len=${text.length})`;
}

/** One JSON line per event when CHARTWRIGHT_TRACE=1; explicit fields win over the skill context. */
export function trace(event: TraceEvent, data: TraceData = {}): void {
  if (!flag("CHARTWRIGHT_TRACE")) return;
  const line: TraceData = { ts: new Date().toISOString(), event, ...getTraceContext(), ...data };
  console.log(`${TRACE_PREFIX} ${JSON.stringify(line)}`);
}

export function traceText(event: TraceEvent, text: string, opts?: { maxLen?: number; extra?: TraceData }): void {
  if (!flag("CHARTWRIGHT_TRACE")) return;
  const maxLen = opts?.maxLen ?? (flag("CHARTWRIGHT_TRACE_FULL") ? FULL_TEXT_LIMIT : TEXT_LIMIT);
  trace(event, { text: truncate(text, maxLen), ...opts?.extra });
}
