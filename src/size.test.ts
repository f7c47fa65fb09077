import { describe, expect, it } from "vitest";
import { group } from "./grob.js";
import { mergeMetrics, measure, textExtent } from "./size.js";

describe("textExtent", () => {
  it("sizes by the longest line and the line count", () => {
    const e = textExtent("ab\nabcd", 10);
    expect(e.width).toBeCloseTo(4 * 10 * 0.6);
    expect(e.height).toBeCloseTo(2 * 10 * 1.2);
  });

  it("uses the given metrics", () => {
    expect(textExtent("abc", 10, { char_width: 1, line_height: 2 })).toEqual({ width: 30, height: 20 });
  });
});

describe("measure", () => {
  const metrics = { char_width: 1, line_height: 1 };

  it("adds padding on both sides of text", () => {
    expect(measure({ kind: "text", label: "ab", x: 0, y: 0, size: 10, pad: 3 }, metrics)).toEqual({ width: 26, height: 16 });
  });

  it("swaps width and height for vertical text", () => {
    expect(measure({ kind: "text", label: "abc", x: 0, y: 0, size: 10, rot: -90 }, metrics)).toEqual({ width: 10, height: 30 });
  });

  it("takes a group's declared extent over its children", () => {
    const g = group("g", [{ kind: "text", label: "abcdef", x: 0, y: 0, size: 10 }], { width: 5, height: 7 });
    expect(measure(g, metrics)).toEqual({ width: 5, height: 7 });
  });

  it("otherwise takes the largest child in each direction", () => {
    const g = group("g", [
      { kind: "text", label: "abcd", x: 0, y: 0, size: 10 },
      { kind: "text", label: "a\nb\nc", x: 0, y: 0, size: 10 },
      { kind: "rect", x: 0, y: 0, w: 1, h: 1 },
    ]);
    expect(measure(g, metrics)).toEqual({ width: 40, height: 30 });
  });
});

describe("mergeMetrics", () => {
  it("falls back to defaults for missing or non-numeric keys", () => {
    expect(mergeMetrics({ char_width: "0.5", line_height: "tall" })).toEqual({ char_width: 0.5, line_height: 1.2 });
    expect(mergeMetrics(undefined)).toEqual({ char_width: 0.6, line_height: 1.2 });
  });
});
