import { describe, expect, it } from "vitest";
import { MalformedPathError } from "./errors";
import { normalizePath, parsePath, stringifyPath } from "./pathExpression";

describe("parsePath", () => {
  it("splits fields and indexes", () => {
    expect(parsePath("series[0].dataLabels.enabled")).toEqual(["series", 0, "dataLabels", "enabled"]);
    expect(parsePath("title.text")).toEqual(["title", "text"]);
    expect(parsePath("series[2][1]")).toEqual(["series", 2, 1]);
  });

  it("tolerates stray dots", () => {
    expect(parsePath(".legend..enabled.")).toEqual(["legend", "enabled"]);
    expect(parsePath("series.[1].color")).toEqual(["series", 1, "color"]);
  });

  it("rejects an empty path", () => {
    expect(() => parsePath("")).toThrow("Update paths cannot be empty.");
  });

  it("rejects an unclosed bracket", () => {
    expect(() => parsePath("series[0")).toThrow("Unmatched '[' in path series[0.");
  });

  it("rejects non-numeric and negative indexes", () => {
    expect(() => parsePath("series[a].color")).toThrow("List index must be numeric in path series[a].color.");
    expect(() => parsePath("series[-1].color")).toThrow(MalformedPathError);
    expect(() => parsePath("series[].color")).toThrow(MalformedPathError);
  });

  it("rejects paths without any field", () => {
    expect(() => parsePath("...")).toThrow("Path ... does not name any field.");
  });

  it("rejects paths that start with an index", () => {
    expect(() => parsePath("[0].name")).toThrow("Path [0].name must start with a field name.");
  });

  it("rejects prototype segments", () => {
    expect(() => parsePath("__proto__.polluted")).toThrow(MalformedPathError);
    expect(() => parsePath("series[0].constructor")).toThrow(MalformedPathError);
  });

  it("carries the offending path and a 400 status", () => {
    try {
      parsePath("legend[x]");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedPathError);
      if (err instanceof MalformedPathError) {
        expect(err.path).toBe("legend[x]");
        expect(err.status).toBe(400);
      }
    }
  });
});

describe("normalizePath", () => {
  it("collapses indexes into their field", () => {
    expect(normalizePath(["series", 0, "color"])).toBe("series[].color");
    expect(normalizePath(["series", 7, "color"])).toBe("series[].color");
    expect(normalizePath(["series", 1, 2])).toBe("series[][]");
  });

  it("keeps a leading index as a bare marker", () => {
    expect(normalizePath([0, "name"])).toBe("[].name");
  });

  it("leaves index-free paths alone", () => {
    expect(normalizePath(["plotOptions", "series", "dataLabels", "enabled"])).toBe(
      "plotOptions.series.dataLabels.enabled"
    );
  });
});

describe("stringifyPath", () => {
  it("writes the canonical text form", () => {
    expect(stringifyPath(["series", 3, "marker", "radius"])).toBe("series[3].marker.radius");
  });

  it("reparses to the same tokens", () => {
    const tokens = ["xAxis", "labels", "style"];
    expect(parsePath(stringifyPath(tokens))).toEqual(tokens);
  });
});
