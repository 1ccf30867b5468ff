import type { JsonMap, UpdateRecord } from "../contracts/chartDocument";
import { getChartKind, getSeriesList } from "../contracts/chartDocument";
import { FACET_EXTRACTORS, type SentenceContext } from "./facets";
import { resolveSeriesTargets } from "./targets";

export function splitSentences(text: string): string[] {
  return text
    .split(/[.;\n]+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Deterministically turns editing instructions into `(path, value)` updates for `options`.
 * Sentences nobody understands contribute nothing; this never throws.
 */
export function translateInstructions(text: string, options: JsonMap): UpdateRecord[] {
  if (!text) return [];

  const chartKind = getChartKind(options);
  const series = getSeriesList(options);
  const updates: UpdateRecord[] = [];

  for (const sentence of splitSentences(text)) {
    const ctx: SentenceContext = {
      sentence,
      lower: sentence.toLowerCase(),
      targets: resolveSeriesTargets(sentence, series),
      chartKind,
    };
    for (const extractor of FACET_EXTRACTORS) {
      updates.push(...extractor.extract(ctx));
    }
  }

  return updates;
}
