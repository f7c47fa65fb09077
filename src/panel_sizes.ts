import type { Coord, PanelRange, Range } from "./coord.js";
import type { FreeScales } from "./facet_spec.js";
import { type Unit, nullUnit } from "./gtable.js";
import { type LayoutTable, gridDims } from "./layout_grid.js";

export const MIN_SPAN = 1e-6;

export type PanelSizes = { widths: Unit[]; heights: Unit[] };

export type Aspect = { ratio: number; respect: boolean };

export function span(range: Range): number {
  const d = range[1] - range[0];
  return Number.isFinite(d) && d > MIN_SPAN ? d : MIN_SPAN;
}

/**
 * Theme aspect first; with both axes fixed the coordinate system may
 * suggest one. Without either, panels stretch freely (`respect` false).
 */
export function resolveAspect(
  themeAspect: number | null,
  free: FreeScales,
  coord: Coord,
  first: PanelRange | undefined,
): Aspect {
  let ratio = themeAspect;
  if (ratio === null && !free.x && !free.y && first) ratio = coord.aspect(first);
  if (ratio === null) return { ratio: 1, respect: false };
  return { ratio, respect: true };
}

export function panelSizes(opts: {
  layout: LayoutTable;
  ranges: readonly PanelRange[];
  spaceFree: boolean;
  aspectRatio?: number;
}): PanelSizes {
  const { layout, ranges, spaceFree } = opts;
  const { nrow, ncol } = gridDims(layout);
  if (!spaceFree) {
    const aspect = opts.aspectRatio ?? 1;
    return {
      widths: Array.from({ length: ncol }, () => nullUnit(1)),
      heights: Array.from({ length: nrow }, () => nullUnit(aspect)),
    };
  }
  const rangeOf = (panel: number): PanelRange | undefined => ranges[panel - 1];
  const widths: Unit[] = [];
  for (let c = 1; c <= ncol; c += 1) {
    const entry = layout.find((l) => l.row === 1 && l.col === c);
    const r = entry ? rangeOf(entry.panel) : undefined;
    widths.push(nullUnit(r ? span(r.x) : 1));
  }
  const heights: Unit[] = [];
  for (let r = 1; r <= nrow; r += 1) {
    const entry = layout.find((l) => l.col === 1 && l.row === r);
    const pr = entry ? rangeOf(entry.panel) : undefined;
    heights.push(nullUnit(pr ? span(pr.y) : 1));
  }
  return { widths, heights };
}
