import type { PanelRange, Range } from "./coord.js";
import type { LayoutTable } from "./layout_grid.js";
import type { Located } from "./locate_grid.js";
import { asNum } from "./util.js";

export type Aesthetics = { x: string; y: string };

export type RangeOptions = {
  /** Explicit limits replace the trained range of every scale group on that axis. */
  limits?: { x?: Range; y?: Range };
  expand?: boolean;
};

const EXPAND_MULT = 0.05;
const ZERO_WIDTH = 1;

function niceStep(raw: number): number {
  const mag = Math.pow(10, Math.floor(Math.log10(raw)));
  const norm = raw / mag;
  if (norm <= 1) return mag;
  if (norm <= 2) return 2 * mag;
  if (norm <= 2.5) return 2.5 * mag;
  if (norm <= 5) return 5 * mag;
  return 10 * mag;
}

/** Round-number breaks covering `range`, about `n` of them. */
export function prettyBreaks(range: Range, n = 5): number[] {
  const [lo, hi] = range;
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) return [];
  if (hi <= lo) return [lo];
  const step = niceStep((hi - lo) / Math.max(1, n));
  const out: number[] = [];
  for (let v = Math.ceil(lo / step) * step; v <= hi + step * 1e-9; v += step) {
    out.push(Number(v.toPrecision(12)));
  }
  return out;
}

export function expandRange(range: Range): Range {
  const [lo, hi] = range;
  const span = hi - lo;
  if (span === 0) return [lo - ZERO_WIDTH / 2, hi + ZERO_WIDTH / 2];
  return [lo - span * EXPAND_MULT, hi + span * EXPAND_MULT];
}

function trainAxis(values: number[], limit: Range | undefined, expand: boolean): Range {
  if (limit) return limit;
  if (values.length === 0) return [0, 1];
  let lo = Infinity;
  let hi = -Infinity;
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  return expand ? expandRange([lo, hi]) : [lo, hi];
}

function push(m: Map<number, number[]>, key: number, v: number): void {
  const arr = m.get(key) ?? [];
  arr.push(v);
  m.set(key, arr);
}

/** One range per panel, indexed by panel id - 1, trained per scale group. */
export function trainRanges(
  layout: LayoutTable,
  located: readonly Located[],
  aes: Aesthetics,
  opts: RangeOptions = {},
): PanelRange[] {
  const expand = opts.expand ?? true;
  const scaleXOf = new Map(layout.map((l): [number, number] => [l.panel, l.scaleX]));
  const scaleYOf = new Map(layout.map((l): [number, number] => [l.panel, l.scaleY]));
  const xs = new Map<number, number[]>();
  const ys = new Map<number, number[]>();
  for (const { panel, record } of located) {
    const x = asNum(record[aes.x]);
    const y = asNum(record[aes.y]);
    const gx = scaleXOf.get(panel);
    const gy = scaleYOf.get(panel);
    if (x !== undefined && gx !== undefined) push(xs, gx, x);
    if (y !== undefined && gy !== undefined) push(ys, gy, y);
  }
  const xRanges = new Map<number, Range>();
  const yRanges = new Map<number, Range>();
  for (const l of layout) {
    if (!xRanges.has(l.scaleX)) xRanges.set(l.scaleX, trainAxis(xs.get(l.scaleX) ?? [], opts.limits?.x, expand));
    if (!yRanges.has(l.scaleY)) yRanges.set(l.scaleY, trainAxis(ys.get(l.scaleY) ?? [], opts.limits?.y, expand));
  }
  const unit: Range = [0, 1];
  const out: PanelRange[] = [];
  for (const l of [...layout].sort((a, b) => a.panel - b.panel)) {
    const x = xRanges.get(l.scaleX) ?? unit;
    const y = yRanges.get(l.scaleY) ?? unit;
    out.push(Object.freeze({ x, y, xBreaks: prettyBreaks(x), yBreaks: prettyBreaks(y) }));
  }
  return out;
}
