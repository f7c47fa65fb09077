import { type PanelRange, rescale } from "./coord.js";
import { type Grob, nullGrob } from "./grob.js";
import type { LayoutTable } from "./layout_grid.js";
import type { Located } from "./locate_grid.js";
import type { Theme } from "./theme.js";
import type { Aesthetics } from "./train_ranges.js";
import { asNum } from "./util.js";

/** One points grob per panel, in panel id order. */
export function pointLayer(
  located: readonly Located[],
  layout: LayoutTable,
  ranges: readonly PanelRange[],
  aes: Aesthetics,
  theme: Theme,
): Grob[] {
  const xs = new Map<number, number[]>();
  const ys = new Map<number, number[]>();
  for (const { panel, record } of located) {
    const range = ranges[panel - 1];
    const x = asNum(record[aes.x]);
    const y = asNum(record[aes.y]);
    if (!range || x === undefined || y === undefined) continue;
    const px = xs.get(panel) ?? [];
    const py = ys.get(panel) ?? [];
    px.push(rescale(x, range.x));
    py.push(1 - rescale(y, range.y));
    xs.set(panel, px);
    ys.set(panel, py);
  }
  return [...layout]
    .sort((a, b) => a.panel - b.panel)
    .map((l): Grob => {
      const x = xs.get(l.panel);
      const y = ys.get(l.panel);
      if (!x || !y) return nullGrob;
      return { kind: "points", x, y, size: theme.point_size, colour: theme.point_colour, cls: "point" };
    });
}
