import type { Coord, PanelRange } from "./coord.js";
import { nullGrob } from "./grob.js";
import { type Cell, type GridTable, addColSpace, addRowSpace, gridCol, gridRow, px } from "./gtable.js";
import { type LayoutTable, gridDims } from "./layout_grid.js";
import { measure } from "./size.js";
import type { Theme } from "./theme.js";

export function facetAxes(
  layout: LayoutTable,
  ranges: readonly PanelRange[],
  coord: Coord,
  theme: Theme,
): { b: GridTable; l: GridTable } {
  const { nrow, ncol } = gridDims(layout);
  const space = px(theme.panel_margin);

  // x scales are shared down a column, so the first row speaks for it
  const bottom: Cell[] = [];
  for (let c = 1; c <= ncol; c += 1) {
    const entry = layout.find((l) => l.row === 1 && l.col === c);
    const range = entry ? ranges[entry.panel - 1] : undefined;
    bottom.push({ name: `axis-b-${c}`, grob: range ? coord.renderAxisH(range, theme) : nullGrob });
  }
  const left: Cell[] = [];
  for (let r = 1; r <= nrow; r += 1) {
    const entry = layout.find((l) => l.col === 1 && l.row === r);
    const range = entry ? ranges[entry.panel - 1] : undefined;
    left.push({ name: `axis-l-${r}`, grob: range ? coord.renderAxisV(range, theme) : nullGrob });
  }

  const height = Math.max(0, ...bottom.map((c) => measure(c.grob, theme.metrics).height));
  const width = Math.max(0, ...left.map((c) => measure(c.grob, theme.metrics).width));
  return {
    b: addColSpace(gridRow("axis-b", bottom, [px(height)]), space),
    l: addRowSpace(gridCol("axis-l", left, [px(width)]), space),
  };
}
