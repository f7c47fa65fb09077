import { type Grob, group, nullGrob } from "./grob.js";
import { textExtent } from "./size.js";
import type { Theme } from "./theme.js";

export type Range = readonly [number, number];

export type PanelRange = Readonly<{
  x: Range;
  y: Range;
  xBreaks: readonly number[];
  yBreaks: readonly number[];
}>;

export interface Coord {
  readonly name: string;
  renderAxisH(range: PanelRange, theme: Theme): Grob;
  renderAxisV(range: PanelRange, theme: Theme): Grob;
  renderBg(range: PanelRange, theme: Theme): Grob;
  renderFg(range: PanelRange, theme: Theme): Grob;
  /** Preferred height / width of a panel, or null for no preference. */
  aspect(range: PanelRange): number | null;
}

const LABEL_GAP = 2;

export function rescale(v: number, range: Range): number {
  const span = range[1] - range[0];
  if (!(span > 0)) return 0.5;
  return (v - range[0]) / span;
}

export function formatBreak(v: number): string {
  return String(Number(v.toPrecision(10)));
}

function inRange(breaks: readonly number[], range: Range): number[] {
  return breaks.filter((b) => b >= range[0] && b <= range[1]);
}

function axisH(range: PanelRange, theme: Theme): Grob {
  const breaks = inRange(range.xBreaks, range.x);
  const textH = textExtent("0", theme.axis_text_size, theme.metrics).height;
  const height = theme.axis_tick_length + LABEL_GAP + textH;
  const xs = breaks.map((b) => rescale(b, range.x));
  const tick = theme.axis_tick_length / height;
  return group(
    "axis-h",
    [
      { kind: "segments", x0: xs, y0: xs.map(() => 0), x1: xs, y1: xs.map(() => tick), colour: theme.axis_colour, cls: "axisTick" },
      ...breaks.map((b, i): Grob => ({
        kind: "text",
        label: formatBreak(b),
        x: xs[i] ?? 0,
        y: (theme.axis_tick_length + LABEL_GAP + textH / 2) / height,
        size: theme.axis_text_size,
        anchor: "middle",
        colour: theme.axis_text_colour,
        cls: "axisText",
      })),
    ],
    { width: 0, height },
  );
}

function axisV(range: PanelRange, theme: Theme): Grob {
  const breaks = inRange(range.yBreaks, range.y);
  const labels = breaks.map(formatBreak);
  const textW = Math.max(0, ...labels.map((l) => textExtent(l, theme.axis_text_size, theme.metrics).width));
  const width = textW + LABEL_GAP + theme.axis_tick_length;
  const ys = breaks.map((b) => 1 - rescale(b, range.y));
  const tick = theme.axis_tick_length / width;
  return group(
    "axis-v",
    [
      { kind: "segments", x0: ys.map(() => 1 - tick), y0: ys, x1: ys.map(() => 1), y1: ys, colour: theme.axis_colour, cls: "axisTick" },
      ...labels.map((label, i): Grob => ({
        kind: "text",
        label,
        x: textW / width,
        y: ys[i] ?? 0,
        size: theme.axis_text_size,
        anchor: "end",
        colour: theme.axis_text_colour,
        cls: "axisText",
      })),
    ],
    { width, height: 0 },
  );
}

function background(range: PanelRange, theme: Theme): Grob {
  const xs = inRange(range.xBreaks, range.x).map((b) => rescale(b, range.x));
  const ys = inRange(range.yBreaks, range.y).map((b) => 1 - rescale(b, range.y));
  return group("panel-bg", [
    { kind: "rect", x: 0, y: 0, w: 1, h: 1, fill: theme.panel_background, cls: "panelBackground" },
    { kind: "segments", x0: xs, y0: xs.map(() => 0), x1: xs, y1: xs.map(() => 1), colour: theme.grid_colour, cls: "gridMajor" },
    { kind: "segments", x0: ys.map(() => 0), y0: ys, x1: ys.map(() => 1), y1: ys, colour: theme.grid_colour, cls: "gridMajor" },
  ]);
}

export function coordCartesian(): Coord {
  return {
    name: "cartesian",
    renderAxisH: axisH,
    renderAxisV: axisV,
    renderBg: background,
    renderFg: () => nullGrob,
    aspect: () => null,
  };
}

/** Cartesian coordinates where one x unit is drawn `ratio` times as long as one y unit. */
export function coordFixed(ratio = 1): Coord {
  return {
    ...coordCartesian(),
    name: "fixed",
    aspect: (range) => {
      const dx = range.x[1] - range.x[0];
      const dy = range.y[1] - range.y[0];
      if (!(dx > 0) || !(dy > 0)) return null;
      return (dy / dx) * ratio;
    },
  };
}
