import fs from "fs";
import yaml from "js-yaml";
import { pathToFileURL } from "url";
import { ConfigurationError } from "./errors.js";
import { type FacetSpec, MARGIN_VALUE, compareValues, facetGrid, valueKey } from "./facet_spec.js";
import { resolveScaleGroups } from "./scales.js";
import { type DataRecord, type FacetValue, die, isRecord, toFacetValue } from "./util.js";

export type LayoutRow = Readonly<{
  panel: number;
  row: number;
  col: number;
  vars: Readonly<Record<string, FacetValue>>;
  scaleX: number;
  scaleY: number;
  margin: boolean;
}>;

export type LayoutTable = readonly LayoutRow[];

type Tuple = readonly FacetValue[];

function hasAll(rec: DataRecord, vars: readonly string[]): boolean {
  return vars.every((v) => v in rec && rec[v] !== undefined);
}

function tupleKey(t: Tuple): string {
  return JSON.stringify(t.map(valueKey));
}

function rejectMarginValue(tuples: readonly Tuple[], vars: readonly string[]): void {
  for (const t of tuples) {
    const i = t.findIndex((v) => v === MARGIN_VALUE);
    if (i !== -1) {
      throw new ConfigurationError(
        `${vars[i] ?? "facet variable"} has the value "${MARGIN_VALUE}", which is reserved for margin panels; rename it or turn margins off`,
      );
    }
  }
}

/** Distinct observed combinations of `vars`, sorted variable by variable. */
export function distinctTuples(
  data: readonly DataRecord[],
  vars: readonly string[],
  levels: FacetSpec["levels"] = {},
): Tuple[] {
  if (vars.length === 0) return [[]];
  const seen = new Map<string, Tuple>();
  for (const rec of data) {
    if (!hasAll(rec, vars)) continue;
    const t = vars.map((v) => toFacetValue(rec[v]));
    const key = tupleKey(t);
    if (!seen.has(key)) seen.set(key, t);
  }
  return Array.from(seen.values()).sort((a, b) => {
    for (let i = 0; i < vars.length; i += 1) {
      const name = vars[i] ?? "";
      const c = compareValues(a[i] ?? null, b[i] ?? null, levels[name]);
      if (c !== 0) return c;
    }
    return 0;
  });
}

export function trainLayout(spec: FacetSpec, data: readonly DataRecord[]): LayoutTable {
  if (spec.rows.length + spec.cols.length === 0) {
    throw new ConfigurationError("Must specify at least one variable to facet by");
  }
  const rowTuples = distinctTuples(data, spec.rows, spec.levels);
  if (!spec.asTable) rowTuples.reverse();
  const colTuples = distinctTuples(data, spec.cols, spec.levels);
  const rowMargin = spec.margins && spec.rows.length > 0;
  const colMargin = spec.margins && spec.cols.length > 0;
  if (rowMargin) {
    rejectMarginValue(rowTuples, spec.rows);
    rowTuples.push(spec.rows.map(() => MARGIN_VALUE));
  }
  if (colMargin) {
    rejectMarginValue(colTuples, spec.cols);
    colTuples.push(spec.cols.map(() => MARGIN_VALUE));
  }

  const ncol = colTuples.length;
  const out: LayoutRow[] = [];
  rowTuples.forEach((rt, ri) => {
    colTuples.forEach((ct, ci) => {
      const row = ri + 1;
      const col = ci + 1;
      const vars: Record<string, FacetValue> = {};
      spec.rows.forEach((name, i) => {
        vars[name] = rt[i] ?? null;
      });
      spec.cols.forEach((name, i) => {
        vars[name] = ct[i] ?? null;
      });
      const margin = (rowMargin && ri === rowTuples.length - 1) || (colMargin && ci === colTuples.length - 1);
      out.push(
        Object.freeze({
          panel: ri * ncol + col,
          row,
          col,
          vars: Object.freeze(vars),
          ...resolveScaleGroups(spec.free, row, col),
          margin,
        }),
      );
    });
  });
  return Object.freeze(out);
}

export function gridDims(layout: LayoutTable): { nrow: number; ncol: number } {
  return {
    nrow: Math.max(0, ...layout.map((l) => l.row)),
    ncol: Math.max(0, ...layout.map((l) => l.col)),
  };
}

/** Distinct values of `vars` in grid order along rows or columns. */
export function sideValues(layout: LayoutTable, vars: readonly string[], by: "row" | "col"): FacetValue[][] {
  const n = by === "row" ? gridDims(layout).nrow : gridDims(layout).ncol;
  const out: FacetValue[][] = [];
  for (let i = 1; i <= n; i += 1) {
    const hit = layout.find((l) => l[by] === i);
    out.push(vars.map((v) => hit?.vars[v] ?? null));
  }
  return out;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2] ?? "";
  const formula = process.argv[3] ?? "";
  const loaded = yaml.load(fs.readFileSync(input, "utf8"));
  if (!Array.isArray(loaded)) die(`${input}: expected an array of records`);
  const records = loaded.filter(isRecord);
  const layout = trainLayout(facetGrid(formula, { margins: process.argv.includes("--margins") }), records);
  process.stdout.write(JSON.stringify(layout, null, 2));
  const { nrow, ncol } = gridDims(layout);
  console.error(`layout_grid: panels=${layout.length} rows=${nrow} cols=${ncol}`);
}
