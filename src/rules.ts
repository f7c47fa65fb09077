import path from "path";
import yaml from "js-yaml";
import { type Coord, type Range, coordCartesian, coordFixed } from "./coord.js";
import { ConfigurationError, oneOf } from "./errors.js";
import { type FacetGridOptions, type FacetSpec, type Facets, facetGrid } from "./facet_spec.js";
import { type Theme, mergeTheme } from "./theme.js";
import type { Aesthetics, RangeOptions } from "./train_ranges.js";
import { type DataRecord, type FacetValue, asBool, asNum, die, isRecord, readText, toFacetValue } from "./util.js";

export type PlotRules = {
  facet: FacetSpec;
  aes: Aesthetics;
  ranges: RangeOptions;
  theme: Theme;
  coord: Coord;
  width: number;
  height: number;
};

function parseFacetsValue(raw: Record<string, unknown>): Facets {
  if (typeof raw.facets === "string") return raw.facets;
  const names = (v: unknown): string[] => (Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : []);
  if (raw.rows !== undefined || raw.cols !== undefined) return [names(raw.rows), names(raw.cols)];
  throw new ConfigurationError("facet.facets (\"rows ~ cols\") or facet.rows / facet.cols is required");
}

function parseLevels(raw: unknown): Record<string, FacetValue[]> {
  const out: Record<string, FacetValue[]> = {};
  if (!isRecord(raw)) return out;
  for (const [k, v] of Object.entries(raw)) {
    if (Array.isArray(v)) out[k] = v.map(toFacetValue);
  }
  return out;
}

function parseLimit(raw: unknown): Range | undefined {
  if (!Array.isArray(raw) || raw.length !== 2) return undefined;
  const lo = asNum(raw[0]);
  const hi = asNum(raw[1]);
  if (lo === undefined || hi === undefined) return undefined;
  if (hi <= lo) throw new ConfigurationError(`limits must be increasing; got [${lo}, ${hi}]`);
  return [lo, hi];
}

function parseCoord(raw: unknown): Coord {
  const cfg = isRecord(raw) ? raw : {};
  const type = oneOf("coord.type", cfg.type ?? "cartesian", ["cartesian", "fixed"] as const);
  return type === "fixed" ? coordFixed(asNum(cfg.ratio) ?? 1) : coordCartesian();
}

export function parseRules(raw: unknown): PlotRules {
  const rules = isRecord(raw) ? raw : {};
  const facetRaw = isRecord(rules.facet) ? rules.facet : {};
  const plot = isRecord(rules.plot) ? rules.plot : {};
  const options: FacetGridOptions = {
    margins: asBool(facetRaw.margins),
    scales: typeof facetRaw.scales === "string" ? facetRaw.scales : undefined,
    space: typeof facetRaw.space === "string" ? facetRaw.space : undefined,
    labeller: facetRaw.labeller,
    as_table: asBool(facetRaw.as_table),
    levels: parseLevels(facetRaw.levels),
    strip_placement: typeof facetRaw.strip_placement === "string" ? facetRaw.strip_placement : undefined,
  };
  if (typeof plot.x !== "string" || typeof plot.y !== "string") {
    throw new ConfigurationError("plot.x and plot.y must name the variables to draw");
  }
  const limits = isRecord(plot.limits) ? plot.limits : {};
  return {
    facet: facetGrid(parseFacetsValue(facetRaw), options),
    aes: { x: plot.x, y: plot.y },
    ranges: { limits: { x: parseLimit(limits.x), y: parseLimit(limits.y) } },
    theme: mergeTheme(rules.theme),
    coord: parseCoord(rules.coord),
    width: asNum(plot.width) ?? 800,
    height: asNum(plot.height) ?? 600,
  };
}

export function loadRules(file: string): PlotRules {
  return parseRules(yaml.load(readText(file)));
}

/** JSON or YAML array of records, chosen by extension. */
export function loadData(file: string): DataRecord[] {
  const text = readText(file);
  const parsed: unknown = path.extname(file).toLowerCase() === ".json" ? JSON.parse(text) : yaml.load(text);
  if (!Array.isArray(parsed)) die(`${file}: expected an array of records`);
  return parsed.filter(isRecord);
}
