import type { JsonNode } from "../contracts/chartDocument";
import { isJsonMap } from "../contracts/chartDocument";
import { ORDINAL_WORDS } from "./vocabulary";

const SERIES_NUMBER_RE = /series\s+(\d+)/i;
const ORDINAL_SERIES_RE =
  /\b(first|second|third|fourth|fifth|sixth|seventh|eighth|ninth|tenth)\s+(?:series|line|bar|column|area)\b/i;

function seriesName(serie: JsonNode): string {
  if (!isJsonMap(serie)) return "";
  const name = serie.name;
  if (typeof name === "string") return name;
  if (typeof name === "number") return String(name);
  return "";
}

function indexIfInRange(index: number, total: number): number[] {
  return index >= 0 && index < total ? [index] : [];
}

export function mentionsAllSeries(lower: string): boolean {
  return lower.includes("all series") || lower.includes("every series");
}

/**
 * Picks the series a sentence talks about. The first matching rule decides:
 * all/every series, "series N" (1-based), an ordinal, a series name, then a lone series.
 */
export function resolveSeriesTargets(sentence: string, series: readonly JsonNode[]): number[] {
  const total = series.length;
  if (total === 0) return [];
  const lower = sentence.toLowerCase();

  if (mentionsAllSeries(lower)) {
    return series.map((_, idx) => idx);
  }

  const numbered = lower.match(SERIES_NUMBER_RE);
  if (numbered) {
    return indexIfInRange(Number(numbered[1]) - 1, total);
  }

  const ordinal = lower.match(ORDINAL_SERIES_RE);
  if (ordinal) {
    const idx = ORDINAL_WORDS[ordinal[1]];
    return typeof idx === "number" ? indexIfInRange(idx, total) : [];
  }

  for (let idx = 0; idx < total; idx++) {
    const name = seriesName(series[idx]).toLowerCase();
    if (name && lower.includes(name)) return [idx];
  }

  if (lower.includes("series") && total === 1) return [0];

  return [];
}
