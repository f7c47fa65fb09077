import { describe, expect, it } from "vitest";
import { facetAxes } from "./axes.js";
import type { Coord, PanelRange } from "./coord.js";
import { facetGrid } from "./facet_spec.js";
import { facetRender, gridFacet } from "./facet_render.js";
import { type Grob, group, nullGrob } from "./grob.js";
import { cellAt, cellNames, ncol, nrow, nullUnit, px } from "./gtable.js";
import { trainLayout } from "./layout_grid.js";
import { facetPanels } from "./panels.js";
import { defaultTheme } from "./theme.js";

// Axes report their range so the tests can see which panel fed them.
const fakeCoord: Coord = {
  name: "fake",
  renderAxisH: (r) => group(`axis-h ${r.x[0]}..${r.x[1]}`, [], { width: 0, height: 12 }),
  renderAxisV: (r) => group(`axis-v ${r.y[0]}..${r.y[1]}`, [], { width: 20, height: 0 }),
  renderBg: () => ({ kind: "rect", x: 0, y: 0, w: 1, h: 1, cls: "bg" }),
  renderFg: () => ({ kind: "rect", x: 0, y: 0, w: 1, h: 1, cls: "fg" }),
  aspect: () => null,
};

const data = [
  { r: "p", c: 1 },
  { r: "p", c: 2 },
  { r: "q", c: 3 },
];

function rangesFor(n: number): PanelRange[] {
  return Array.from({ length: n }, (_, i): PanelRange => ({ x: [i, i + 1], y: [10 * i, 10 * i + 5], xBreaks: [], yBreaks: [] }));
}

function contentLayer(n: number): Grob[] {
  return Array.from({ length: n }, (_, i): Grob => ({ kind: "text", label: `content ${i + 1}`, x: 0.5, y: 0.5, size: 9 }));
}

function nameOf(g: Grob): string {
  return g.kind === "group" ? g.name : g.kind;
}

describe("facetAxes", () => {
  const layout = trainLayout(facetGrid("r ~ c"), data);
  const axes = facetAxes(layout, rangesFor(layout.length), fakeCoord, defaultTheme);

  it("draws one bottom axis per column from the first row", () => {
    expect(cellNames(axes.b)).toEqual(["axis-b-1", "null", "axis-b-2", "null", "axis-b-3"]);
    expect(nameOf(cellAt(axes.b, 0, 2).grob)).toBe("axis-h 1..2");
    expect(axes.b.heights).toEqual([px(12)]);
  });

  it("draws one left axis per row from the first column", () => {
    expect(cellNames(axes.l)).toEqual(["axis-l-1", "null", "axis-l-2"]);
    // panel 4 is row 2, column 1
    expect(nameOf(cellAt(axes.l, 2, 0).grob)).toBe("axis-v 30..35");
    expect(axes.l.widths).toEqual([px(20)]);
  });
});

describe("facetPanels", () => {
  const spec = facetGrid("r ~ c");
  const layout = trainLayout(spec, data);
  const ranges = rangesFor(layout.length);

  it("stacks background, content layers and foreground per panel", () => {
    const table = facetPanels({ spec, layout, ranges, coord: fakeCoord, theme: defaultTheme, geomGrobs: [contentLayer(6), contentLayer(6)] });
    const panel = cellAt(table, 2, 2).grob;
    expect(panel.kind).toBe("group");
    if (panel.kind !== "group") return;
    expect(panel.name).toBe("panel-5");
    expect(panel.children.map((c) => (c.kind === "rect" ? c.cls : c.kind === "text" ? c.label : c.kind))).toEqual([
      "bg",
      "content 5",
      "content 5",
      "fg",
    ]);
  });

  it("spaces panels apart inside the grid but not on the border", () => {
    const table = facetPanels({ spec, layout, ranges, coord: fakeCoord, theme: defaultTheme, geomGrobs: [] });
    expect(table.widths).toEqual([nullUnit(1), px(6), nullUnit(1), px(6), nullUnit(1)]);
    expect(table.heights).toEqual([nullUnit(1), px(6), nullUnit(1)]);
    expect(cellNames(table)).toEqual([
      "panel-1-1", "null", "panel-1-2", "null", "panel-1-3",
      "null", "null", "null", "null", "null",
      "panel-2-1", "null", "panel-2-2", "null", "panel-2-3",
    ]);
    expect(table.respect).toBe(false);
  });

  it("locks proportions when the theme sets an aspect ratio", () => {
    const theme = { ...defaultTheme, aspect_ratio: 1.5 };
    const table = facetPanels({ spec, layout, ranges, coord: fakeCoord, theme, geomGrobs: [] });
    expect(table.heights).toEqual([nullUnit(1.5), px(6), nullUnit(1.5)]);
    expect(table.respect).toBe(true);
  });

  it("treats a layer that does not cover every panel as a programming error", () => {
    expect(() =>
      facetPanels({ spec, layout, ranges, coord: fakeCoord, theme: defaultTheme, geomGrobs: [contentLayer(2)] }),
    ).toThrow("layer 1 has 2 panels, layout has 6");
  });
});

describe("facetRender", () => {
  it("aligns strips, axes and panels on one grid", () => {
    const spec = facetGrid("r ~ c");
    const layout = trainLayout(spec, data);
    const table = facetRender(spec, { layout, ranges: rangesFor(6), coord: fakeCoord, theme: defaultTheme, geomGrobs: [] });
    expect(table.name).toBe("layout");
    // 1 strip band + 3 panel tracks + 1 axis band, 1 axis + 5 panel tracks + 1 strip band
    expect(nrow(table)).toBe(5);
    expect(ncol(table)).toBe(7);
    const row = (r: number): string[] => cellNames(table).slice(r * 7, (r + 1) * 7);
    expect(row(0)).toEqual(["null", "strip-t-1-1", "null", "strip-t-2-1", "null", "strip-t-3-1", "null"]);
    expect(row(1)).toEqual(["axis-l-1", "panel-1-1", "null", "panel-1-2", "null", "panel-1-3", "strip-r-1-1"]);
    expect(row(3)).toEqual(["axis-l-2", "panel-2-1", "null", "panel-2-2", "null", "panel-2-3", "strip-r-2-1"]);
    expect(row(4)).toEqual(["null", "axis-b-1", "null", "axis-b-2", "null", "axis-b-3", "null"]);
    expect(table.widths.slice(1, 6)).toEqual([nullUnit(1), px(6), nullUnit(1), px(6), nullUnit(1)]);
  });

  it("adds no strip band for an empty side", () => {
    const spec = facetGrid(". ~ c");
    const layout = trainLayout(spec, data);
    const table = facetRender(spec, { layout, ranges: rangesFor(3), coord: fakeCoord, theme: defaultTheme, geomGrobs: [] });
    expect(nrow(table)).toBe(3);
    expect(ncol(table)).toBe(6);
    expect(cellNames(table).slice(6, 12)).toEqual(["axis-l-1", "panel-1-1", "null", "panel-1-2", "null", "panel-1-3"]);
  });

  it("puts row strips outside the left axis when asked", () => {
    const spec = facetGrid("r ~ .", { strip_placement: "left" });
    const layout = trainLayout(spec, data);
    const table = facetRender(spec, { layout, ranges: rangesFor(2), coord: fakeCoord, theme: defaultTheme, geomGrobs: [] });
    expect(ncol(table)).toBe(3);
    expect(cellNames(table).slice(0, 3)).toEqual(["strip-l-1-1", "axis-l-1", "panel-1-1"]);
    expect(cellNames(table).slice(9, 12)).toEqual(["null", "null", "axis-b-1"]);
  });

  it("carries the panels' respect flag", () => {
    const spec = facetGrid(". ~ c");
    const layout = trainLayout(spec, data);
    const theme = { ...defaultTheme, aspect_ratio: 1 };
    const table = facetRender(spec, { layout, ranges: rangesFor(3), coord: fakeCoord, theme, geomGrobs: [] });
    expect(table.respect).toBe(true);
  });
});

describe("gridFacet", () => {
  it("runs layout, mapping and rendering through one strategy object", () => {
    const facet = gridFacet(facetGrid(". ~ c"));
    const layout = facet.trainLayout(data);
    const located = facet.mapLayout(data, layout);
    expect(facet.kind).toBe("grid");
    expect(located.map((l) => l.panel)).toEqual([1, 2, 3]);
    const table = facet.render({ layout, ranges: rangesFor(3), coord: fakeCoord, theme: defaultTheme, geomGrobs: [[nullGrob, nullGrob, nullGrob]] });
    expect(ncol(table)).toBe(6);
  });
});
