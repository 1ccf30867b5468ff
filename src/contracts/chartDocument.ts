import { z } from "zod";

export type JsonScalar = string | number | boolean | null;
export type JsonNode = JsonScalar | JsonNode[] | JsonMap;
export interface JsonMap {
  [key: string]: JsonNode;
}

export const JsonNodeSchema: z.ZodType<JsonNode> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonNodeSchema), z.record(JsonNodeSchema)])
);

export const JsonMapSchema: z.ZodType<JsonMap> = z.record(JsonNodeSchema);

export type NodeView =
  | { kind: "mapping"; node: JsonMap }
  | { kind: "sequence"; node: JsonNode[] }
  | { kind: "scalar"; node: JsonScalar };

export function viewNode(node: JsonNode): NodeView {
  if (Array.isArray(node)) return { kind: "sequence", node };
  if (node !== null && typeof node === "object") return { kind: "mapping", node };
  return { kind: "scalar", node };
}

export function isJsonMap(node: JsonNode | undefined): node is JsonMap {
  return node !== undefined && viewNode(node).kind === "mapping";
}

/** Result of a read that found nothing; distinct from a stored `null`. */
export const NO_VALUE: unique symbol = Symbol("NoValue");
export type NoValue = typeof NO_VALUE;

export type PathToken = string | number;

export const UpdateRecordSchema = z
  .object({
    path: z.string(),
    value: JsonNodeSchema,
  })
  .strict();

export type UpdateRecord = z.infer<typeof UpdateRecordSchema>;

export type ChangeRecord = {
  path: string;
  before: JsonNode | NoValue;
  after: JsonNode;
};

export type ChangeLogEntry = {
  path: string;
  before: JsonNode;
  after: JsonNode;
};

export function toChangeLogEntry(change: ChangeRecord): ChangeLogEntry {
  return {
    path: change.path,
    before: change.before === NO_VALUE ? null : change.before,
    after: change.after,
  };
}

export function getChartKind(options: JsonMap): string | null {
  const chart = options.chart;
  if (!isJsonMap(chart)) return null;
  const kind = chart.type;
  return typeof kind === "string" && kind ? kind : null;
}

export function getSeriesList(options: JsonMap): JsonNode[] {
  const series = options.series;
  return Array.isArray(series) ? series : [];
}
