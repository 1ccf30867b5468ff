import {
  COLOR_NAMES,
  DASH_KEYWORDS,
  DEFAULT_DONUT_INNER_SIZE,
  MARKER_CHART_KINDS,
  MARKER_SYMBOLS,
  NEGATIVE_BOOL_PHRASES,
  POSITIVE_BOOL_PHRASES,
  type DashStyle,
  type MarkerSymbol,
} from "./vocabulary";

const HEX_COLOR_RE = /#(?:[0-9a-f]{6}|[0-9a-f]{3})/i;
const RGB_COLOR_RE = /rgb\s*\(\s*\d+\s*,\s*\d+\s*,\s*\d+\s*\)/i;

const LINE_WIDTH_RES = [
  /(\d+(?:\.\d+)?)\s*(?:px|pt)?\s*(?:line width|linewidth|thickness|stroke)/i,
  /(?:line width|linewidth|thickness|stroke)\s*(?:of|to)?\s*(\d+(?:\.\d+)?)(?:\s*(?:px|pt))?/i,
];
const MARKER_RADIUS_RES = [
  /(\d+(?:\.\d+)?)\s*(?:px)?\s*(?:radius|size)/i,
  /(?:radius|size).*?(\d+(?:\.\d+)?)(?:\s*px)?/i,
];
const FILL_OPACITY_RE = /fill opacity.*?(\d+(?:\.\d+)?%?)/i;
const INNER_SIZE_RE = /inner size.*?(\d+%)/i;
const DONUT_SIZE_RE = /(?:donut|doughnut).*?(\d+%)/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function firstNumber(sentence: string, patterns: readonly RegExp[]): number | null {
  for (const re of patterns) {
    const m = sentence.match(re);
    if (!m?.[1]) continue;
    const n = Number(m[1]);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

/** Hex literal first (uppercased), then an rgb() literal as written, then a named color. */
export function extractColor(sentence: string): string | null {
  const hex = sentence.match(HEX_COLOR_RE);
  if (hex) return hex[0].toUpperCase();

  const rgb = sentence.match(RGB_COLOR_RE);
  if (rgb) return rgb[0];

  const lower = sentence.toLowerCase();
  for (const [name, value] of COLOR_NAMES) {
    if (new RegExp(`\\b${escapeRegExp(name)}\\b`).test(lower)) return value;
  }
  return null;
}

export function extractDashStyle(sentence: string): DashStyle | null {
  const lower = sentence.toLowerCase();
  for (const [keyword, style] of DASH_KEYWORDS) {
    if (lower.includes(keyword)) return style;
  }
  return null;
}

export function extractLineWidth(sentence: string): number | null {
  return firstNumber(sentence, LINE_WIDTH_RES);
}

export function extractMarkerRadius(sentence: string): number | null {
  return firstNumber(sentence, MARKER_RADIUS_RES);
}

export function extractMarkerSymbol(sentence: string): MarkerSymbol | null {
  const lower = sentence.toLowerCase();
  for (const [keyword, symbol] of MARKER_SYMBOLS) {
    if (lower.includes(keyword)) return symbol;
  }
  return null;
}

/** Negative phrases are checked first so "turn off" never reads as "turn on". */
export function detectBoolean(sentence: string): boolean | null {
  const lower = sentence.toLowerCase();
  if (NEGATIVE_BOOL_PHRASES.some((phrase) => lower.includes(phrase))) return false;
  if (POSITIVE_BOOL_PHRASES.some((phrase) => lower.includes(phrase))) return true;
  return null;
}

export function extractFillOpacity(sentence: string): number | null {
  const m = sentence.match(FILL_OPACITY_RE);
  if (!m?.[1]) return null;
  const raw = m[1].trim();
  const value = raw.endsWith("%") ? Number(raw.slice(0, -1)) / 100 : Number(raw);
  if (!Number.isFinite(value)) return null;
  return Math.max(0, Math.min(1, value));
}

export function extractInnerSize(sentence: string): string | null {
  const inner = sentence.match(INNER_SIZE_RE);
  if (inner?.[1]) return inner[1];
  const donut = sentence.match(DONUT_SIZE_RE);
  if (donut?.[1]) return donut[1];
  const lower = sentence.toLowerCase();
  if (lower.includes("donut") || lower.includes("doughnut")) return DEFAULT_DONUT_INNER_SIZE;
  return null;
}

export function markerEnabledPath(chartKind: string | null): string {
  if (chartKind && MARKER_CHART_KINDS.has(chartKind)) {
    return `plotOptions.${chartKind}.marker.enabled`;
  }
  return "plotOptions.series.marker.enabled";
}
