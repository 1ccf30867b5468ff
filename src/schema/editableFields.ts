import { z } from "zod";
import catalogJson from "./editableFields.json";
import type { JsonMap } from "../contracts/chartDocument";
import { getChartKind, getSeriesList, isJsonMap } from "../contracts/chartDocument";
import { normalizePath, parsePath, stringifyPath, type PathPattern } from "../compiler/pathExpression";

const FieldTemplateSchema = z
  .object({
    path: z.string().trim().min(1),
    description: z.string().trim().min(1),
  })
  .strict();

const FieldCatalogSchema = z
  .object({
    version: z.string().min(1),
    global: z.array(FieldTemplateSchema).min(1),
    series: z.array(FieldTemplateSchema).min(1),
    chartKinds: z.record(z.array(FieldTemplateSchema)),
  })
  .strict();

export type FieldTemplate = z.infer<typeof FieldTemplateSchema>;
export type FieldCatalog = z.infer<typeof FieldCatalogSchema>;

export type EditableField = {
  path: string;
  description: string;
};

export const FIELD_CATALOG: FieldCatalog = FieldCatalogSchema.parse(catalogJson);
export const FIELD_CATALOG_VERSION = FIELD_CATALOG.version;

function seriesFieldPath(index: number, suffix: string): string {
  return stringifyPath(["series", index, ...parsePath(suffix)]);
}

function toPattern(path: string): PathPattern {
  return normalizePath(parsePath(path));
}

const GLOBAL_PATTERNS: PathPattern[] = FIELD_CATALOG.global.map((f) => toPattern(f.path));
const SERIES_PATTERNS: PathPattern[] = FIELD_CATALOG.series.map((f) => toPattern(seriesFieldPath(0, f.path)));

function chartKindTemplates(chartKind: string | null | undefined): FieldTemplate[] {
  if (!chartKind) return [];
  if (!Object.prototype.hasOwnProperty.call(FIELD_CATALOG.chartKinds, chartKind)) return [];
  return FIELD_CATALOG.chartKinds[chartKind] ?? [];
}

export function listChartKinds(): string[] {
  return Object.keys(FIELD_CATALOG.chartKinds);
}

/** Global and per-series patterns always apply; kind-specific ones only for a known kind. */
export function allowedPatterns(chartKind?: string | null): Set<PathPattern> {
  const patterns = new Set<PathPattern>([...GLOBAL_PATTERNS, ...SERIES_PATTERNS]);
  for (const template of chartKindTemplates(chartKind)) {
    patterns.add(toPattern(template.path));
  }
  return patterns;
}

/**
 * User-facing listing of what can be edited on this document: global fields, then the
 * chart kind's fields, then every series template expanded for each series entry.
 */
export function editableFields(options: JsonMap): EditableField[] {
  const fields: EditableField[] = FIELD_CATALOG.global.map((f) => ({ path: f.path, description: f.description }));

  for (const template of chartKindTemplates(getChartKind(options))) {
    fields.push({ path: template.path, description: template.description });
  }

  getSeriesList(options).forEach((serie, index) => {
    if (!isJsonMap(serie)) return;
    for (const template of FIELD_CATALOG.series) {
      fields.push({ path: seriesFieldPath(index, template.path), description: template.description });
    }
  });

  return fields;
}
