import type Database from "better-sqlite3";
import type { ChangeRecord, JsonMap, JsonNode, NoValue } from "../contracts/chartDocument";
import {
  getChartKind,
  getSeriesList,
  isJsonMap,
  JsonMapSchema,
  NO_VALUE,
  toChangeLogEntry,
} from "../contracts/chartDocument";
import { ChartNotFoundError, InvalidChartFormatError, PersistFailureError } from "../compiler/errors";
import { getValue, setValue } from "../compiler/documentPatcher";
import { createChartPayloadDb } from "../database";
import { config } from "../config";
import { trace } from "../utils/trace";

/** Where chart payloads live between skill invocations. */
export interface ChartPayloadStore {
  load(id: string): JsonMap;
  persist(payload: JsonMap, id: string): string;
  list(limit?: number): string[];
  remove(id: string): boolean;
}

export type HistoryEntryInput = {
  actor: string;
  action: string;
  details?: JsonMap;
  timestamp?: string;
};

export type SeriesSummary = {
  index: number;
  name: JsonNode;
  type: JsonNode;
  color: JsonNode;
  dashStyle: JsonNode;
  dataLabels: boolean;
};

export type ChartSummary = {
  chartType: string;
  seriesCount: number;
  series: SeriesSummary[];
};

function decodePayload(json: string): JsonMap {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new InvalidChartFormatError("Stored chart payload is not valid JSON.");
  }
  const parsed = JsonMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidChartFormatError();
  }
  return parsed.data;
}

export function createSqliteChartStore(db: Database.Database): ChartPayloadStore {
  const payloads = createChartPayloadDb(db);

  return {
    load(id) {
      if (!id) throw new ChartNotFoundError(id);
      const row = payloads.findById(id);
      if (!row) throw new ChartNotFoundError(id);
      return decodePayload(row.payload_json);
    },

    persist(payload, id) {
      if (!id) throw new PersistFailureError("No chart payload identifier was provided.");
      try {
        payloads.upsert(id, JSON.stringify(payload));
      } catch (err) {
        throw new PersistFailureError("Chart payload could not be saved.", { cause: err });
      }
      trace("store.persisted", { payloadId: id });
      return id;
    },

    list(limit) {
      return payloads.listIds(limit);
    },

    remove(id) {
      return payloads.delete(id);
    },
  };
}

/** Highcharts options sit under `data` in wrapped payloads; bare payloads are the options. */
export function extractChartOptions(payload: JsonMap): JsonMap {
  const data = payload.data;
  return isJsonMap(data) ? data : payload;
}

export function ensureMetadata(payload: JsonMap): JsonMap {
  const existing = getValue(payload, ["meta"]);
  let meta: JsonMap;
  if (existing === NO_VALUE) {
    meta = {};
    setValue(payload, ["meta"], meta);
  } else if (isJsonMap(existing)) {
    meta = existing;
  } else {
    meta = { note: typeof existing === "string" ? existing : JSON.stringify(existing) };
    setValue(payload, ["meta"], meta);
  }
  if (!Array.isArray(meta.history)) {
    meta.history = [];
  }
  return meta;
}

/** Appends to `meta.history` through the patcher directly; history paths are not user-editable. */
export function appendHistoryEntry(payload: JsonMap, entry: HistoryEntryInput): void {
  const meta = ensureMetadata(payload);
  const history = meta.history;
  if (!Array.isArray(history)) return;
  const record: JsonMap = {
    timestamp: entry.timestamp ?? new Date().toISOString(),
    actor: entry.actor,
    action: entry.action,
  };
  if (entry.details && Object.keys(entry.details).length > 0) {
    record.details = entry.details;
  }

  setValue(payload, ["meta", "history", history.length], record);

  const limit = config.historyLimit;
  if (history.length > limit) {
    history.splice(0, history.length - limit);
  }
}

export function formatValue(value: JsonNode | NoValue): string {
  if (value === NO_VALUE) return "(unset)";
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function changeLogJson(changes: readonly ChangeRecord[]): JsonNode[] {
  return changes.map(toChangeLogEntry);
}

export function summarizeOptions(options: JsonMap): ChartSummary {
  const chartType = getChartKind(options);
  const series = getSeriesList(options);
  const summary: ChartSummary = {
    chartType: chartType ?? "unknown",
    seriesCount: series.length,
    series: [],
  };

  series.forEach((serie, index) => {
    if (!isJsonMap(serie)) return;
    summary.series.push({
      index,
      name: serie.name ?? `Series ${index + 1}`,
      type: serie.type ?? chartType,
      color: serie.color ?? null,
      dashStyle: serie.dashStyle ?? null,
      dataLabels: Boolean(serie.dataLabels),
    });
  });

  return summary;
}
