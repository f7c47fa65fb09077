import assert from "assert";
import type { Coord, PanelRange } from "./coord.js";
import type { FacetSpec } from "./facet_spec.js";
import { type Grob, group } from "./grob.js";
import { type Cell, type GridTable, addColSpace, addRowSpace, emptyCell, gridMatrix, px, withRespect } from "./gtable.js";
import { type LayoutTable, gridDims } from "./layout_grid.js";
import { panelSizes, resolveAspect } from "./panel_sizes.js";
import type { Theme } from "./theme.js";

/** Content drawables, `[layer][panel - 1]`. */
export type GeomGrobs = readonly (readonly Grob[])[];

export type PanelInputs = {
  spec: FacetSpec;
  layout: LayoutTable;
  ranges: readonly PanelRange[];
  coord: Coord;
  theme: Theme;
  geomGrobs: GeomGrobs;
};

export function facetPanels(inputs: PanelInputs): GridTable {
  const { spec, layout, ranges, coord, theme, geomGrobs } = inputs;
  const { nrow, ncol } = gridDims(layout);
  const aspect = resolveAspect(theme.aspect_ratio, spec.free, coord, ranges[0]);

  for (const [i, layer] of geomGrobs.entries()) {
    assert.equal(layer.length, layout.length, `layer ${i + 1} has ${layer.length} panels, layout has ${layout.length}`);
  }

  const matrix: Cell[][] = Array.from({ length: nrow }, () => Array.from({ length: ncol }, () => emptyCell));
  for (const entry of layout) {
    const range = ranges[entry.panel - 1];
    assert(range, `no range for panel ${entry.panel}`);
    const content = geomGrobs.map((layer) => layer[entry.panel - 1] ?? assert.fail(`missing panel ${entry.panel}`));
    const children = [coord.renderBg(range, theme), ...content, coord.renderFg(range, theme)];
    const row = matrix[entry.row - 1];
    assert(row, `panel ${entry.panel} outside the grid`);
    row[entry.col - 1] = { name: `panel-${entry.row}-${entry.col}`, grob: group(`panel-${entry.panel}`, children) };
  }

  const sizes = panelSizes({ layout, ranges, spaceFree: spec.spaceFree, aspectRatio: aspect.ratio });
  const space = px(theme.panel_margin);
  const table = gridMatrix("panel", matrix, sizes.widths, sizes.heights);
  return withRespect(addRowSpace(addColSpace(table, space), space), aspect.respect);
}
