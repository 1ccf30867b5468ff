import { describe, expect, it } from "vitest";
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

describe("extractColor", () => {
  it("uppercases hex literals", () => {
    expect(extractColor("use #ff8800 please")).toBe("#FF8800");
    expect(extractColor("use #abc")).toBe("#ABC");
  });

  it("prefers six digits over a three digit prefix", () => {
    expect(extractColor("set it to #12ab34")).toBe("#12AB34");
  });

  it("takes the leading digits of a longer hex run", () => {
    expect(extractColor("use #FF00001 here")).toBe("#FF0000");
    expect(extractColor("code #1234 only")).toBe("#123");
  });

  it("keeps rgb literals as written", () => {
    expect(extractColor("fill with rgb(10, 20, 30)")).toBe("rgb(10, 20, 30)");
  });

  it("maps named colors on word boundaries", () => {
    expect(extractColor("make it Red")).toBe("#FF0000");
    expect(extractColor("grey bars")).toBe("#808080");
    expect(extractColor("reduce the gap")).toBeNull();
  });
});

describe("extractDashStyle", () => {
  it("picks the longest matching phrase", () => {
    expect(extractDashStyle("short dash dot line")).toBe("ShortDashDot");
    expect(extractDashStyle("a long dash")).toBe("LongDash");
    expect(extractDashStyle("make it dotted")).toBe("Dot");
    expect(extractDashStyle("make it dashed")).toBe("Dash");
    expect(extractDashStyle("back to solid")).toBe("Solid");
    expect(extractDashStyle("thicker please")).toBeNull();
  });
});

describe("numeric extractors", () => {
  it("reads a line width before or after the keyword", () => {
    expect(extractLineWidth("line width 3")).toBe(3);
    expect(extractLineWidth("a 2.5px stroke")).toBe(2.5);
    expect(extractLineWidth("thickness of 4")).toBe(4);
    expect(extractLineWidth("wider lines")).toBeNull();
  });

  it("reads a marker radius", () => {
    expect(extractMarkerRadius("marker radius 6")).toBe(6);
    expect(extractMarkerRadius("8px size markers")).toBe(8);
    expect(extractMarkerRadius("bigger markers")).toBeNull();
  });

  it("turns percentages into fractions and clamps", () => {
    expect(extractFillOpacity("fill opacity 40%")).toBe(0.4);
    expect(extractFillOpacity("fill opacity to 0.25")).toBe(0.25);
    expect(extractFillOpacity("fill opacity 150%")).toBe(1);
    expect(extractFillOpacity("fill opacity 7")).toBe(1);
    expect(extractFillOpacity("opacity 40%")).toBeNull();
  });
});

describe("extractMarkerSymbol", () => {
  it("matches triangle-down before triangle", () => {
    expect(extractMarkerSymbol("use triangle-down markers")).toBe("triangle-down");
    expect(extractMarkerSymbol("use triangle down markers")).toBe("triangle-down");
    expect(extractMarkerSymbol("use triangle markers")).toBe("triangle");
    expect(extractMarkerSymbol("diamond markers")).toBe("diamond");
    expect(extractMarkerSymbol("star markers")).toBeNull();
  });
});

describe("extractInnerSize", () => {
  it("reads explicit sizes and defaults for donuts", () => {
    expect(extractInnerSize("inner size 45%")).toBe("45%");
    expect(extractInnerSize("make it a donut with 70%")).toBe("70%");
    expect(extractInnerSize("make it a doughnut")).toBe("60%");
    expect(extractInnerSize("make it bigger")).toBeNull();
  });
});

describe("detectBoolean", () => {
  it("lets negative phrases win", () => {
    expect(detectBoolean("turn off the legend")).toBe(false);
    expect(detectBoolean("hide data labels and show the legend")).toBe(false);
    expect(detectBoolean("Show data labels")).toBe(true);
    expect(detectBoolean("data labels")).toBeNull();
  });
});

describe("markerEnabledPath", () => {
  it("uses the chart kind when it has markers", () => {
    expect(markerEnabledPath("scatter")).toBe("plotOptions.scatter.marker.enabled");
    expect(markerEnabledPath("column")).toBe("plotOptions.series.marker.enabled");
    expect(markerEnabledPath(null)).toBe("plotOptions.series.marker.enabled");
  });
});
