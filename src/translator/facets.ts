import type { JsonNode, UpdateRecord } from "../contracts/chartDocument";
import { mentionsAllSeries } from "./targets";
import {
  detectBoolean,
  extractColor,
  extractDashStyle,
  extractFillOpacity,
  extractInnerSize,
  extractLineWidth,
  extractMarkerRadius,
  extractMarkerSymbol,
  markerEnabledPath,
} from "./extractors";
import { AREA_LIKE_KINDS } from "./vocabulary";

export type SentenceContext = {
  sentence: string;
  lower: string;
  targets: number[];
  chartKind: string | null;
};

export interface FacetExtractor {
  facet: string;
  extract(ctx: SentenceContext): UpdateRecord[];
}

function perSeries(targets: readonly number[], suffix: string, value: JsonNode): UpdateRecord[] {
  return targets.map((idx) => ({ path: `series[${idx}].${suffix}`, value }));
}

function scatterOrPerSeries(ctx: SentenceContext, suffix: string, value: JsonNode): UpdateRecord[] {
  if (ctx.chartKind === "scatter") {
    return [{ path: `plotOptions.scatter.${suffix}`, value }];
  }
  return perSeries(ctx.targets, suffix, value);
}

const colorFacet: FacetExtractor = {
  facet: "color",
  extract: (ctx) => {
    const color = extractColor(ctx.sentence);
    if (!color) return [];
    if (ctx.targets.length > 0) return perSeries(ctx.targets, "color", color);
    if (ctx.chartKind === "scatter" && ctx.lower.includes("marker")) {
      return [{ path: "plotOptions.scatter.marker.fillColor", value: color }];
    }
    return [];
  },
};

const dashStyleFacet: FacetExtractor = {
  facet: "dashStyle",
  extract: (ctx) => {
    const style = extractDashStyle(ctx.sentence);
    return style ? perSeries(ctx.targets, "dashStyle", style) : [];
  },
};

const lineWidthFacet: FacetExtractor = {
  facet: "lineWidth",
  extract: (ctx) => {
    const width = extractLineWidth(ctx.sentence);
    return width === null ? [] : perSeries(ctx.targets, "lineWidth", width);
  },
};

const dataLabelsFacet: FacetExtractor = {
  facet: "dataLabels",
  extract: (ctx) => {
    if (!ctx.lower.includes("data label")) return [];
    const enabled = detectBoolean(ctx.sentence);
    if (enabled === null) return [];
    if (ctx.targets.length > 0 && !mentionsAllSeries(ctx.lower)) {
      return perSeries(ctx.targets, "dataLabels.enabled", enabled);
    }
    return [{ path: "plotOptions.series.dataLabels.enabled", value: enabled }];
  },
};

const legendFacet: FacetExtractor = {
  facet: "legend",
  extract: (ctx) => {
    if (!ctx.lower.includes("legend")) return [];
    const enabled = detectBoolean(ctx.sentence);
    return enabled === null ? [] : [{ path: "legend.enabled", value: enabled }];
  },
};

const markerFacet: FacetExtractor = {
  facet: "marker",
  extract: (ctx) => {
    if (!ctx.lower.includes("marker")) return [];
    const updates: UpdateRecord[] = [];

    const enabled = detectBoolean(ctx.sentence);
    if (enabled !== null) {
      updates.push({ path: markerEnabledPath(ctx.chartKind), value: enabled });
    }

    const radius = extractMarkerRadius(ctx.sentence);
    if (radius !== null) {
      updates.push(...scatterOrPerSeries(ctx, "marker.radius", radius));
    }

    const symbol = extractMarkerSymbol(ctx.sentence);
    if (symbol) {
      updates.push(...scatterOrPerSeries(ctx, "marker.symbol", symbol));
    }

    return updates;
  },
};

const fillOpacityFacet: FacetExtractor = {
  facet: "fillOpacity",
  extract: (ctx) => {
    if (!ctx.chartKind || !AREA_LIKE_KINDS.has(ctx.chartKind)) return [];
    const opacity = extractFillOpacity(ctx.sentence);
    return opacity === null ? [] : [{ path: `plotOptions.${ctx.chartKind}.fillOpacity`, value: opacity }];
  },
};

const pieFacet: FacetExtractor = {
  facet: "pie",
  extract: (ctx) => {
    if (ctx.chartKind !== "pie") return [];
    const updates: UpdateRecord[] = [];

    const innerSize = extractInnerSize(ctx.sentence);
    if (innerSize) {
      updates.push({ path: "plotOptions.pie.innerSize", value: innerSize });
    }

    const enabled = detectBoolean(ctx.sentence);
    if (enabled !== null && ctx.lower.includes("legend")) {
      updates.push({ path: "plotOptions.pie.showInLegend", value: enabled });
    }
    if (enabled !== null && ctx.lower.includes("data label")) {
      updates.push({ path: "plotOptions.pie.dataLabels.enabled", value: enabled });
    }

    return updates;
  },
};

export const FACET_EXTRACTORS: readonly FacetExtractor[] = [
  colorFacet,
  dashStyleFacet,
  lineWidthFacet,
  dataLabelsFacet,
  legendFacet,
  markerFacet,
  fillOpacityFacet,
  pieFacet,
];
