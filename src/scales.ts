import type { FreeScales } from "./facet_spec.js";

export type ScaleGroups = { scaleX: number; scaleY: number };

// x varies from column to column, y from row to row.
export function resolveScaleGroups(free: FreeScales, row: number, col: number): ScaleGroups {
  return {
    scaleX: free.x ? col : 1,
    scaleY: free.y ? row : 1,
  };
}
