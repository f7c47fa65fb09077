// Drawable nodes. Coordinates are fractions (0..1) of the cell the grob is
// drawn into, y growing downwards as in SVG.

export type Extent = { width: number; height: number };

export type NullGrob = { kind: "null" };

export type RectGrob = {
  kind: "rect";
  x: number;
  y: number;
  w: number;
  h: number;
  fill?: string;
  stroke?: string;
  cls?: string;
};

export type TextGrob = {
  kind: "text";
  label: string;
  x: number;
  y: number;
  size: number;
  rot?: number;
  pad?: number;
  anchor?: "start" | "middle" | "end";
  colour?: string;
  cls?: string;
};

export type PointsGrob = {
  kind: "points";
  x: number[];
  y: number[];
  size: number;
  colour?: string;
  cls?: string;
};

export type SegmentsGrob = {
  kind: "segments";
  x0: number[];
  y0: number[];
  x1: number[];
  y1: number[];
  colour?: string;
  lineWidth?: number;
  cls?: string;
};

export type GroupGrob = {
  kind: "group";
  name: string;
  children: Grob[];
  /** Overrides the measured size of the children. */
  extent?: Extent;
};

export type Grob = NullGrob | RectGrob | TextGrob | PointsGrob | SegmentsGrob | GroupGrob;

export const nullGrob: NullGrob = Object.freeze({ kind: "null" });

export function group(name: string, children: Grob[], extent?: Extent): GroupGrob {
  return extent ? { kind: "group", name, children, extent } : { kind: "group", name, children };
}
