// Ordered tables: earlier entries win, so longer phrases sit before their substrings.

export const COLOR_NAMES: ReadonlyArray<readonly [name: string, hex: string]> = [
  ["red", "#FF0000"],
  ["blue", "#1F77B4"],
  ["green", "#2CA02C"],
  ["orange", "#FF7F0E"],
  ["purple", "#9467BD"],
  ["yellow", "#F2C200"],
  ["black", "#000000"],
  ["white", "#FFFFFF"],
  ["gray", "#808080"],
  ["grey", "#808080"],
  ["pink", "#E377C2"],
  ["teal", "#17BECF"],
];

export type DashStyle = "ShortDashDot" | "ShortDash" | "LongDash" | "DashDot" | "Dot" | "Dash" | "Solid";

export const DASH_KEYWORDS: ReadonlyArray<readonly [keyword: string, style: DashStyle]> = [
  ["short dash dot", "ShortDashDot"],
  ["short dash", "ShortDash"],
  ["long dash", "LongDash"],
  ["dashdot", "DashDot"],
  ["dash-dot", "DashDot"],
  ["dotted", "Dot"],
  ["dot", "Dot"],
  ["dashed", "Dash"],
  ["dash", "Dash"],
  ["solid", "Solid"],
];

export const ORDINAL_WORDS: Readonly<Record<string, number>> = {
  first: 0,
  second: 1,
  third: 2,
  fourth: 3,
  fifth: 4,
  sixth: 5,
  seventh: 6,
  eighth: 7,
  ninth: 8,
  tenth: 9,
};

export const NEGATIVE_BOOL_PHRASES: readonly string[] = [
  "disable",
  "turn off",
  "turn it off",
  "hide",
  "remove",
  "deactivate",
  "suppress",
];

export const POSITIVE_BOOL_PHRASES: readonly string[] = [
  "enable",
  "turn on",
  "turn it on",
  "show",
  "display",
  "activate",
  "add",
  "use",
];

export type MarkerSymbol = "circle" | "square" | "diamond" | "triangle" | "triangle-down";

export const MARKER_SYMBOLS: ReadonlyArray<readonly [keyword: string, symbol: MarkerSymbol]> = [
  ["triangle-down", "triangle-down"],
  ["triangle down", "triangle-down"],
  ["circle", "circle"],
  ["square", "square"],
  ["diamond", "diamond"],
  ["triangle", "triangle"],
];

export const AREA_LIKE_KINDS: ReadonlySet<string> = new Set(["area", "areaspline"]);
export const MARKER_CHART_KINDS: ReadonlySet<string> = new Set(["line", "spline", "area", "areaspline", "scatter"]);

export const DEFAULT_DONUT_INNER_SIZE = "60%";
