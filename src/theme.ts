import { type TextMetrics, defaultTextMetrics, mergeMetrics } from "./size.js";
import { asNum, isRecord } from "./util.js";

export type Theme = {
  panel_margin: number;
  panel_background: string;
  grid_colour: string;
  strip_background: string;
  strip_text_size: number;
  strip_text_colour: string;
  strip_padding: number;
  axis_text_size: number;
  axis_text_colour: string;
  axis_tick_length: number;
  axis_colour: string;
  point_size: number;
  point_colour: string;
  /** Height / width of every panel; null lets the coordinate system decide. */
  aspect_ratio: number | null;
  metrics: TextMetrics;
};

export const defaultTheme: Theme = {
  panel_margin: 6,
  panel_background: "#ebebeb",
  grid_colour: "#ffffff",
  strip_background: "#d9d9d9",
  strip_text_size: 11,
  strip_text_colour: "#1a1a1a",
  strip_padding: 4,
  axis_text_size: 9,
  axis_text_colour: "#4d4d4d",
  axis_tick_length: 4,
  axis_colour: "#333333",
  point_size: 2,
  point_colour: "#1f4f96",
  aspect_ratio: null,
  metrics: defaultTextMetrics,
};

function asStr(v: unknown): string | undefined {
  return typeof v === "string" && v.trim().length > 0 ? v : undefined;
}

export function mergeTheme(raw: unknown): Theme {
  const cfg = isRecord(raw) ? raw : {};
  const aspect = asNum(cfg.aspect_ratio);
  return {
    panel_margin: asNum(cfg.panel_margin) ?? defaultTheme.panel_margin,
    panel_background: asStr(cfg.panel_background) ?? defaultTheme.panel_background,
    grid_colour: asStr(cfg.grid_colour) ?? defaultTheme.grid_colour,
    strip_background: asStr(cfg.strip_background) ?? defaultTheme.strip_background,
    strip_text_size: asNum(cfg.strip_text_size) ?? defaultTheme.strip_text_size,
    strip_text_colour: asStr(cfg.strip_text_colour) ?? defaultTheme.strip_text_colour,
    strip_padding: asNum(cfg.strip_padding) ?? defaultTheme.strip_padding,
    axis_text_size: asNum(cfg.axis_text_size) ?? defaultTheme.axis_text_size,
    axis_text_colour: asStr(cfg.axis_text_colour) ?? defaultTheme.axis_text_colour,
    axis_tick_length: asNum(cfg.axis_tick_length) ?? defaultTheme.axis_tick_length,
    axis_colour: asStr(cfg.axis_colour) ?? defaultTheme.axis_colour,
    point_size: asNum(cfg.point_size) ?? defaultTheme.point_size,
    point_colour: asStr(cfg.point_colour) ?? defaultTheme.point_colour,
    aspect_ratio: aspect !== undefined && aspect > 0 ? aspect : null,
    metrics: mergeMetrics(cfg),
  };
}
