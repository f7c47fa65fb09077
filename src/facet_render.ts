import { facetAxes } from "./axes.js";
import type { Coord, PanelRange } from "./coord.js";
import type { FacetSpec } from "./facet_spec.js";
import { type GridTable, addCols, cbind, rbind, rename, withRespect } from "./gtable.js";
import { type LayoutTable, trainLayout } from "./layout_grid.js";
import { type Located, mapLayout } from "./locate_grid.js";
import { type GeomGrobs, facetPanels } from "./panels.js";
import { facetStrips } from "./strips.js";
import type { Theme } from "./theme.js";
import type { DataRecord } from "./util.js";

export type RenderInputs = {
  layout: LayoutTable;
  ranges: readonly PanelRange[];
  coord: Coord;
  theme: Theme;
  geomGrobs: GeomGrobs;
};

/** The contract every faceting strategy fulfils for the plot driver. */
export interface Facet {
  readonly kind: string;
  trainLayout(data: readonly DataRecord[]): LayoutTable;
  mapLayout(data: readonly DataRecord[], layout: LayoutTable): Located[];
  render(inputs: RenderInputs): GridTable;
}

/**
 * Stitches strips, axes and panels into one table:
 *
 *   [strip-l] axis-l  panels  [strip-r]
 *
 * with the column strips above and the bottom axis below, padded so that
 * every grid line runs straight through all three bands.
 */
export function facetRender(spec: FacetSpec, inputs: RenderInputs): GridTable {
  const { layout, ranges, coord, theme } = inputs;
  const axes = facetAxes(layout, ranges, coord, theme);
  const strips = facetStrips(spec, layout, theme);
  const panels = facetPanels({ spec, ...inputs });

  const rowStripLeft = spec.rowStripSide === "left";
  const pad = (t: GridTable): GridTable =>
    rowStripLeft
      ? addCols(addCols(t, axes.l.widths, 0), strips.r.widths, 0)
      : addCols(addCols(t, strips.r.widths), axes.l.widths, 0);

  const top = pad(strips.t);
  const centre = rowStripLeft
    ? cbind(cbind(strips.r, axes.l), panels)
    : cbind(cbind(axes.l, panels), strips.r);
  const bottom = pad(axes.b);

  const complete = rbind(rbind(top, centre), bottom);
  return withRespect(rename(complete, "layout"), panels.respect);
}

export function gridFacet(spec: FacetSpec): Facet {
  return {
    kind: "grid",
    trainLayout: (data) => trainLayout(spec, data),
    mapLayout: (data, layout) => mapLayout(data, layout, spec),
    render: (inputs) => facetRender(spec, inputs),
  };
}
