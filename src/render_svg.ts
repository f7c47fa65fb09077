import fs from "fs";
import type { Grob } from "./grob.js";
import { type GridTable, type Unit, cellAt, ncol, nrow } from "./gtable.js";

export type SvgOptions = {
  width: number;
  height: number;
  cssPath?: string;
  margin?: number;
};

type Box = { x: number; y: number; w: number; h: number };

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function cls(s: string): string {
  return s.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "").toLowerCase();
}

function num(n: number): string {
  return String(Math.round(n * 100) / 100);
}

function sumOf(units: readonly Unit[], kind: Unit["unit"]): number {
  return units.filter((u) => u.unit === kind).reduce((acc, u) => acc + u.value, 0);
}

/** Pixel size of every track; `perNull` is the pixel length of one null unit. */
export function trackSizes(units: readonly Unit[], perNull: number): number[] {
  return units.map((u) => (u.unit === "px" ? u.value : u.value * perNull));
}

/**
 * Pixel widths and heights of `table` inside a `width` x `height` area.
 * Null units share what the px tracks leave; with `respect` one null unit
 * has the same length in both directions.
 */
export function resolveTracks(table: GridTable, width: number, height: number): { widths: number[]; heights: number[] } {
  const restW = Math.max(0, width - sumOf(table.widths, "px"));
  const restH = Math.max(0, height - sumOf(table.heights, "px"));
  const nullW = sumOf(table.widths, "null");
  const nullH = sumOf(table.heights, "null");
  let perW = nullW > 0 ? restW / nullW : 0;
  let perH = nullH > 0 ? restH / nullH : 0;
  if (table.respect && nullW > 0 && nullH > 0) {
    perW = Math.min(perW, perH);
    perH = perW;
  }
  return { widths: trackSizes(table.widths, perW), heights: trackSizes(table.heights, perH) };
}

function drawGrob(g: Grob, box: Box): string {
  const px = (fx: number): number => box.x + fx * box.w;
  const py = (fy: number): number => box.y + fy * box.h;
  switch (g.kind) {
    case "null":
      return "";
    case "rect": {
      const fill = g.fill ? ` fill="${esc(g.fill)}"` : ` fill="none"`;
      const stroke = g.stroke ? ` stroke="${esc(g.stroke)}"` : "";
      return `<rect class="${cls(g.cls ?? "rect")}" x="${num(px(g.x))}" y="${num(py(g.y))}" width="${num(g.w * box.w)}" height="${num(g.h * box.h)}"${fill}${stroke}/>`;
    }
    case "text": {
      const x = num(px(g.x));
      const y = num(py(g.y));
      const rot = g.rot ? ` transform="rotate(${g.rot} ${x} ${y})"` : "";
      const fill = g.colour ? ` fill="${esc(g.colour)}"` : "";
      return `<text class="${cls(g.cls ?? "text")}" x="${x}" y="${y}" font-size="${num(g.size)}" text-anchor="${g.anchor ?? "middle"}" dominant-baseline="middle"${fill}${rot}>${esc(g.label)}</text>`;
    }
    case "points": {
      const fill = g.colour ? ` fill="${esc(g.colour)}"` : "";
      return g.x
        .map((fx, i) => `<circle class="${cls(g.cls ?? "point")}" cx="${num(px(fx))}" cy="${num(py(g.y[i] ?? 0))}" r="${num(g.size)}"${fill}/>`)
        .join("");
    }
    case "segments": {
      const stroke = ` stroke="${esc(g.colour ?? "#000000")}" stroke-width="${num(g.lineWidth ?? 1)}"`;
      return g.x0
        .map(
          (x0, i) =>
            `<line class="${cls(g.cls ?? "segment")}" x1="${num(px(x0))}" y1="${num(py(g.y0[i] ?? 0))}" x2="${num(px(g.x1[i] ?? 0))}" y2="${num(py(g.y1[i] ?? 0))}"${stroke}/>`,
        )
        .join("");
    }
    case "group":
      return `<g class="${cls(g.name)}">${g.children.map((c) => drawGrob(c, box)).join("")}</g>`;
  }
}

export function renderSvg(table: GridTable, opts: SvgOptions): string {
  const margin = opts.margin ?? 10;
  const css = opts.cssPath ? fs.readFileSync(opts.cssPath, "utf8") : "";
  const { widths, heights } = resolveTracks(table, opts.width - 2 * margin, opts.height - 2 * margin);
  const usedW = widths.reduce((a, b) => a + b, 0);
  const usedH = heights.reduce((a, b) => a + b, 0);
  // centre whatever respect left unused
  const x0 = margin + Math.max(0, (opts.width - 2 * margin - usedW) / 2);
  const y0 = margin + Math.max(0, (opts.height - 2 * margin - usedH) / 2);

  const cells: string[] = [];
  let y = y0;
  for (let r = 0; r < nrow(table); r += 1) {
    let x = x0;
    const h = heights[r] ?? 0;
    for (let c = 0; c < ncol(table); c += 1) {
      const w = widths[c] ?? 0;
      const cell = cellAt(table, r, c);
      const body = drawGrob(cell.grob, { x, y, w, h });
      if (body) {
        cells.push(`\n  <g class="cell" data-name="${esc(cell.name)}">${body}</g>`);
      }
      x += w;
    }
    y += h;
  }

  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="${opts.width}" height="${opts.height}" viewBox="0 0 ${opts.width} ${opts.height}">\n<style>\n${css}\n</style>\n<g id="${esc(table.name)}" class="layout">${cells.join("")}\n</g>\n</svg>`;
}
