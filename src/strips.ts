import type { FacetSpec } from "./facet_spec.js";
import { type Grob, group } from "./grob.js";
import {
  type Cell,
  type GridTable,
  addColSpace,
  addRowSpace,
  emptyCol,
  emptyRow,
  gridMatrix,
  nullUnit,
  px,
} from "./gtable.js";
import type { Labeller } from "./labeller.js";
import { type LayoutTable, gridDims, sideValues } from "./layout_grid.js";
import { measure } from "./size.js";
import type { Theme } from "./theme.js";
import type { FacetValue } from "./util.js";

export type StripSide = "top" | "bottom" | "left" | "right";

const sideCode: Record<StripSide, string> = { top: "t", bottom: "b", left: "l", right: "r" };

function stripGrob(label: string, side: StripSide, theme: Theme): Grob {
  const rot = side === "right" ? -90 : side === "left" ? 90 : 0;
  return group("strip", [
    { kind: "rect", x: 0, y: 0, w: 1, h: 1, fill: theme.strip_background, cls: "stripBackground" },
    {
      kind: "text",
      label,
      x: 0.5,
      y: 0.5,
      rot,
      size: theme.strip_text_size,
      pad: theme.strip_padding,
      anchor: "middle",
      colour: theme.strip_text_colour,
      cls: "stripText",
    },
  ]);
}

/**
 * One strip cell per (grid index, variable). Several variables stack as
 * separate bands; each band is as thick as its largest label and the other
 * dimension follows the panel grid, spacing included.
 */
export function buildStrip(
  layout: LayoutTable,
  vars: readonly string[],
  labeller: Labeller,
  theme: Theme,
  side: StripSide,
): GridTable {
  const horizontal = side === "top" || side === "bottom";
  const name = `strip-${sideCode[side]}`;
  const space = px(theme.panel_margin);
  const { nrow, ncol } = gridDims(layout);

  if (vars.length === 0) {
    return horizontal
      ? addColSpace(emptyRow(name, Array.from({ length: ncol }, () => nullUnit(0))), space)
      : addRowSpace(emptyCol(name, Array.from({ length: nrow }, () => nullUnit(0))), space);
  }

  const values: FacetValue[][] = sideValues(layout, vars, horizontal ? "col" : "row");
  const labels = values.map((tuple) => tuple.map((v, b) => labeller(vars[b] ?? "", v)));
  const grobs = labels.map((tuple) => tuple.map((label) => stripGrob(label, side, theme)));
  const cell = (i: number, b: number): Cell => ({
    name: `${name}-${i + 1}-${b + 1}`,
    grob: grobs[i]?.[b] ?? stripGrob("", side, theme),
  });

  if (horizontal) {
    const heights = vars.map((_, b) => px(Math.max(0, ...grobs.map((g) => measure(g[b] ?? group("strip", []), theme.metrics).height))));
    const cells = vars.map((_, b) => values.map((__, i) => cell(i, b)));
    return addColSpace(gridMatrix(name, cells, values.map(() => nullUnit(1)), heights), space);
  }
  const widths = vars.map((_, b) => px(Math.max(0, ...grobs.map((g) => measure(g[b] ?? group("strip", []), theme.metrics).width))));
  const cells = values.map((__, i) => vars.map((_, b) => cell(i, b)));
  return addRowSpace(gridMatrix(name, cells, widths, values.map(() => nullUnit(1))), space);
}

export function facetStrips(spec: FacetSpec, layout: LayoutTable, theme: Theme): { t: GridTable; r: GridTable } {
  return {
    t: buildStrip(layout, spec.cols, spec.labeller, theme, "top"),
    r: buildStrip(layout, spec.rows, spec.labeller, theme, spec.rowStripSide),
  };
}
