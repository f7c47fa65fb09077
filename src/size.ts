import type { Extent, Grob } from "./grob.js";
import { asNum, isRecord } from "./util.js";

export type TextMetrics = {
  char_width: number;
  line_height: number;
};

export const defaultTextMetrics: TextMetrics = {
  char_width: 0.6,
  line_height: 1.2,
};

export function mergeMetrics(raw: unknown): TextMetrics {
  const cfg = isRecord(raw) ? raw : {};
  return {
    char_width: asNum(cfg.char_width) ?? defaultTextMetrics.char_width,
    line_height: asNum(cfg.line_height) ?? defaultTextMetrics.line_height,
  };
}

// No font shaping here: every glyph is char_width em wide.
export function textExtent(label: string, size: number, metrics: TextMetrics = defaultTextMetrics): Extent {
  const lines = label.split("\n");
  const longest = Math.max(...lines.map((l) => Array.from(l).length));
  return {
    width: longest * size * metrics.char_width,
    height: lines.length * size * metrics.line_height,
  };
}

export function measure(grob: Grob, metrics: TextMetrics = defaultTextMetrics): Extent {
  switch (grob.kind) {
    case "text": {
      const e = textExtent(grob.label, grob.size, metrics);
      const pad = 2 * (grob.pad ?? 0);
      const vertical = Math.abs(grob.rot ?? 0) % 180 === 90;
      return vertical
        ? { width: e.height + pad, height: e.width + pad }
        : { width: e.width + pad, height: e.height + pad };
    }
    case "group": {
      if (grob.extent) return grob.extent;
      let width = 0;
      let height = 0;
      for (const c of grob.children) {
        const e = measure(c, metrics);
        width = Math.max(width, e.width);
        height = Math.max(height, e.height);
      }
      return { width, height };
    }
    default:
      return { width: 0, height: 0 };
  }
}
