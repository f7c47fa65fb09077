import { describe, expect, it } from "vitest";
import { facetGrid } from "./facet_spec.js";
import { trainLayout } from "./layout_grid.js";
import { mapLayout } from "./locate_grid.js";
import { type RangeOptions, expandRange, prettyBreaks, trainRanges } from "./train_ranges.js";

const aes = { x: "x", y: "y" };

const data = [
  { g: "a", x: 0, y: 0 },
  { g: "a", x: 10, y: 5 },
  { g: "b", x: 100, y: 20 },
];

function ranges(scales: string, opts: RangeOptions = {}) {
  const spec = facetGrid(". ~ g", { scales });
  const layout = trainLayout(spec, data);
  return trainRanges(layout, mapLayout(data, layout, spec), aes, opts);
}

describe("prettyBreaks", () => {
  it("picks round steps", () => {
    expect(prettyBreaks([0, 10])).toEqual([0, 2, 4, 6, 8, 10]);
    expect(prettyBreaks([0, 100])).toEqual([0, 20, 40, 60, 80, 100]);
    expect(prettyBreaks([0, 1])).toEqual([0, 0.2, 0.4, 0.6, 0.8, 1]);
  });

  it("returns a single break for a zero-width range", () => {
    expect(prettyBreaks([3, 3])).toEqual([3]);
  });
});

describe("expandRange", () => {
  it("pads by five percent on each side", () => {
    expect(expandRange([0, 10])).toEqual([-0.5, 10.5]);
  });

  it("widens a zero-width range by one unit", () => {
    expect(expandRange([5, 5])).toEqual([4.5, 5.5]);
  });
});

describe("trainRanges", () => {
  it("shares one range across panels when scales are fixed", () => {
    const [a, b] = ranges("fixed", { expand: false });
    expect(a?.x).toEqual([0, 100]);
    expect(b?.x).toEqual([0, 100]);
    expect(a?.y).toEqual([0, 20]);
  });

  it("trains x per column when x is free", () => {
    const [a, b] = ranges("free_x", { expand: false });
    expect(a?.x).toEqual([0, 10]);
    expect(b?.x).toEqual([100, 100]);
    expect(a?.y).toEqual(b?.y);
    expect(a?.xBreaks).toEqual([0, 2, 4, 6, 8, 10]);
  });

  it("expands trained ranges by default", () => {
    const [a, b] = ranges("free_x");
    expect(a?.x).toEqual([-0.5, 10.5]);
    expect(b?.x).toEqual([99.5, 100.5]);
  });

  it("uses explicit limits exactly, even when free", () => {
    const [a, b] = ranges("free_x", { limits: { x: [0, 50] } });
    expect(a?.x).toEqual([0, 50]);
    expect(b?.x).toEqual([0, 50]);
    expect(a?.y).toEqual([-1, 21]);
  });

  it("falls back to the unit range for a group without numbers", () => {
    const sparse = [
      { g: "a", x: 1, y: 1 },
      { g: "b", x: "n/a", y: 2 },
    ];
    const spec = facetGrid(". ~ g", { scales: "free_x" });
    const layout = trainLayout(spec, sparse);
    const [, b] = trainRanges(layout, mapLayout(sparse, layout, spec), aes, { expand: false });
    expect(b?.x).toEqual([0, 1]);
  });

  it("returns one frozen range per panel", () => {
    const out = ranges("free");
    expect(out).toHaveLength(2);
    expect(Object.isFrozen(out[0])).toBe(true);
  });
});
