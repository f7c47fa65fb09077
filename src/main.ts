import type { FacetSpec } from "./facet_spec.js";
import { gridDims } from "./layout_grid.js";
import { type FacetPlot, buildFacetPlot } from "./plot.js";
import { loadData, loadRules } from "./rules.js";
import { renderSvg } from "./render_svg.js";
import { writeText } from "./util.js";

function describe(spec: FacetSpec, plot: FacetPlot, records: number): string {
  const { nrow, ncol } = gridDims(plot.layout);
  const formula = `${spec.rows.join(" + ") || "."} ~ ${spec.cols.join(" + ") || "."}`;
  return `facet_grid(${formula}): panels=${plot.layout.length} rows=${nrow} cols=${ncol} records=${records} located=${plot.located} dropped=${plot.dropped}`;
}

async function main() {
  const [dataPath, rulesPath, outSvg, outJson] = process.argv.slice(2);
  if (!dataPath || !rulesPath || !outSvg) {
    console.error("Usage: node dist/main.js <data.json|data.yaml> <rules.yaml> <out.svg> [layout.json]");
    process.exit(1);
  }
  const data = loadData(dataPath);
  const rules = loadRules(rulesPath);
  const plot = buildFacetPlot(data, rules);
  const svg = renderSvg(plot.table, {
    width: rules.width,
    height: rules.height,
    cssPath: new URL("../styles/facet.css", import.meta.url).pathname,
  });
  writeText(outSvg, svg);
  if (outJson) writeText(outJson, JSON.stringify(plot.layout, null, 2));
  console.error(describe(rules.facet, plot, data.length));
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
