import { gridFacet } from "./facet_render.js";
import { pointLayer } from "./geom_point.js";
import type { GridTable } from "./gtable.js";
import type { LayoutTable } from "./layout_grid.js";
import type { PlotRules } from "./rules.js";
import { trainRanges } from "./train_ranges.js";
import type { DataRecord } from "./util.js";

export type FacetPlot = {
  layout: LayoutTable;
  table: GridTable;
  located: number;
  dropped: number;
};

export function buildFacetPlot(data: readonly DataRecord[], rules: PlotRules): FacetPlot {
  const facet = gridFacet(rules.facet);
  const layout = facet.trainLayout(data);
  const located = facet.mapLayout(data, layout);
  const ranges = trainRanges(layout, located, rules.aes, rules.ranges);
  const points = pointLayer(located, layout, ranges, rules.aes, rules.theme);
  const table = facet.render({ layout, ranges, coord: rules.coord, theme: rules.theme, geomGrobs: [points] });
  const hit = new Set(located.map((l) => l.record));
  return { layout, table, located: located.length, dropped: data.filter((r) => !hit.has(r)).length };
}
