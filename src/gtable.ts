import assert from "assert";
import { type Grob, nullGrob } from "./grob.js";

export type Unit = { value: number; unit: "null" | "px" };

export type Cell = { name: string; grob: Grob };

/**
 * A grid of cells with explicit track sizes. `cells` is row-major with
 * `heights.length * widths.length` entries; every operation returns a new
 * table and leaves its inputs untouched.
 */
export type GridTable = {
  readonly name: string;
  readonly widths: readonly Unit[];
  readonly heights: readonly Unit[];
  readonly cells: readonly Cell[];
  readonly respect: boolean;
};

export const emptyCell: Cell = Object.freeze({ name: "null", grob: nullGrob });

export function nullUnit(value: number): Unit {
  return { value, unit: "null" };
}

export function px(value: number): Unit {
  return { value, unit: "px" };
}

export function ncol(t: GridTable): number {
  return t.widths.length;
}

export function nrow(t: GridTable): number {
  return t.heights.length;
}

export function cellAt(t: GridTable, row: number, col: number): Cell {
  assert(row >= 0 && row < nrow(t) && col >= 0 && col < ncol(t), `${t.name}: cell ${row},${col} out of range`);
  return t.cells[row * ncol(t) + col] ?? emptyCell;
}

function freeze(t: GridTable): GridTable {
  assert.equal(t.cells.length, t.widths.length * t.heights.length, `${t.name}: cell count does not match tracks`);
  return Object.freeze({
    ...t,
    widths: Object.freeze([...t.widths]),
    heights: Object.freeze([...t.heights]),
    cells: Object.freeze([...t.cells]),
  });
}

export function gridMatrix(
  name: string,
  cells: Cell[][],
  widths: readonly Unit[],
  heights: readonly Unit[],
): GridTable {
  assert.equal(cells.length, heights.length, `${name}: ${cells.length} rows for ${heights.length} heights`);
  const flat: Cell[] = [];
  for (const row of cells) {
    assert.equal(row.length, widths.length, `${name}: ${row.length} cells for ${widths.length} widths`);
    flat.push(...row);
  }
  return freeze({ name, widths, heights, cells: flat, respect: false });
}

export function gridRow(name: string, cells: Cell[], heights: readonly Unit[] = [nullUnit(1)]): GridTable {
  return gridMatrix(name, [cells], cells.map(() => nullUnit(1)), heights);
}

export function gridCol(name: string, cells: Cell[], widths: readonly Unit[] = [nullUnit(1)]): GridTable {
  return gridMatrix(name, cells.map((c) => [c]), widths, cells.map(() => nullUnit(1)));
}

/** A table with no rows, only column tracks. */
export function emptyRow(name: string, widths: readonly Unit[]): GridTable {
  return freeze({ name, widths, heights: [], cells: [], respect: false });
}

/** A table with no columns, only row tracks. */
export function emptyCol(name: string, heights: readonly Unit[]): GridTable {
  return freeze({ name, widths: [], heights, cells: [], respect: false });
}

export function withRespect(t: GridTable, respect: boolean): GridTable {
  return freeze({ ...t, respect });
}

export function rename(t: GridTable, name: string): GridTable {
  return freeze({ ...t, name });
}

/** Inserts empty columns before column `pos` (0-based); `pos` defaults to the end. */
export function addCols(t: GridTable, widths: readonly Unit[], pos = ncol(t)): GridTable {
  const n = ncol(t);
  const cells: Cell[] = [];
  for (let r = 0; r < nrow(t); r += 1) {
    const row = t.cells.slice(r * n, (r + 1) * n);
    cells.push(...row.slice(0, pos), ...widths.map(() => emptyCell), ...row.slice(pos));
  }
  return freeze({ ...t, widths: [...t.widths.slice(0, pos), ...widths, ...t.widths.slice(pos)], cells });
}

/** Inserts empty rows before row `pos` (0-based); `pos` defaults to the end. */
export function addRows(t: GridTable, heights: readonly Unit[], pos = nrow(t)): GridTable {
  const n = ncol(t);
  const blank = heights.flatMap(() => t.widths.map(() => emptyCell));
  const cells = [...t.cells.slice(0, pos * n), ...blank, ...t.cells.slice(pos * n)];
  return freeze({ ...t, heights: [...t.heights.slice(0, pos), ...heights, ...t.heights.slice(pos)], cells });
}

// Spacing goes between tracks only, never on the outer border.
export function addColSpace(t: GridTable, space: Unit): GridTable {
  let out = t;
  for (let c = ncol(t) - 1; c > 0; c -= 1) out = addCols(out, [space], c);
  return out;
}

export function addRowSpace(t: GridTable, space: Unit): GridTable {
  let out = t;
  for (let r = nrow(t) - 1; r > 0; r -= 1) out = addRows(out, [space], r);
  return out;
}

export function cbind(a: GridTable, b: GridTable): GridTable {
  if (ncol(b) === 0) return a;
  if (ncol(a) === 0) return rename(b, a.name);
  assert.equal(nrow(a), nrow(b), `cbind ${a.name} | ${b.name}: ${nrow(a)} rows vs ${nrow(b)}`);
  const cells: Cell[] = [];
  for (let r = 0; r < nrow(a); r += 1) {
    cells.push(...a.cells.slice(r * ncol(a), (r + 1) * ncol(a)), ...b.cells.slice(r * ncol(b), (r + 1) * ncol(b)));
  }
  return freeze({ ...a, widths: [...a.widths, ...b.widths], cells, respect: a.respect || b.respect });
}

export function rbind(a: GridTable, b: GridTable): GridTable {
  if (nrow(b) === 0) return a;
  if (nrow(a) === 0) return rename(b, a.name);
  assert.equal(ncol(a), ncol(b), `rbind ${a.name} / ${b.name}: ${ncol(a)} cols vs ${ncol(b)}`);
  return freeze({
    ...a,
    heights: [...a.heights, ...b.heights],
    cells: [...a.cells, ...b.cells],
    respect: a.respect || b.respect,
  });
}

export function cellNames(t: GridTable): string[] {
  return t.cells.map((c) => c.name);
}
