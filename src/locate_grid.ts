import { type FacetSpec, MARGIN_VALUE, sameValue } from "./facet_spec.js";
import type { LayoutRow, LayoutTable } from "./layout_grid.js";
import { type DataRecord, toFacetValue } from "./util.js";

export type Located = { panel: number; record: DataRecord };

function matches(rec: DataRecord, entry: LayoutRow, vars: readonly string[]): boolean {
  for (const v of vars) {
    const want = entry.vars[v];
    if (want === MARGIN_VALUE && entry.margin) continue;
    // a record without the variable is repeated across all of its values
    if (!(v in rec) || rec[v] === undefined) continue;
    if (want === undefined || !sameValue(toFacetValue(rec[v]), want)) return false;
  }
  return true;
}

/**
 * Panel ids for every record, ascending. Records whose combination of
 * values is not in the layout get no panel.
 */
export function locateGrid(data: readonly DataRecord[], layout: LayoutTable, spec: FacetSpec): number[][] {
  const vars = [...spec.rows, ...spec.cols];
  const candidates = spec.margins ? layout : layout.filter((l) => !l.margin);
  return data.map((rec) =>
    candidates
      .filter((entry) => matches(rec, entry, vars))
      .map((entry) => entry.panel)
      .sort((a, b) => a - b),
  );
}

export function mapLayout(data: readonly DataRecord[], layout: LayoutTable, spec: FacetSpec): Located[] {
  const assigned = locateGrid(data, layout, spec);
  const out: Located[] = [];
  data.forEach((record, i) => {
    for (const panel of assigned[i] ?? []) out.push({ panel, record });
  });
  return out;
}
