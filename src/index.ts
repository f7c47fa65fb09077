export { ConfigurationError } from "./errors.js";
export { MARGIN_VALUE, compareValues, facetGrid, parseFacets } from "./facet_spec.js";
export type { FacetGridOptions, FacetSpec, Facets, ScalesOption, SpaceOption, StripPlacement } from "./facet_spec.js";
export { labelBoth, labelValue, resolveLabeller } from "./labeller.js";
export type { Labeller } from "./labeller.js";
export { distinctTuples, gridDims, trainLayout } from "./layout_grid.js";
export type { LayoutRow, LayoutTable } from "./layout_grid.js";
export { locateGrid, mapLayout } from "./locate_grid.js";
export type { Located } from "./locate_grid.js";
export { resolveScaleGroups } from "./scales.js";
export { MIN_SPAN, panelSizes, resolveAspect } from "./panel_sizes.js";
export { buildStrip, facetStrips } from "./strips.js";
export { facetAxes } from "./axes.js";
export { facetPanels } from "./panels.js";
export type { GeomGrobs } from "./panels.js";
export { facetRender, gridFacet } from "./facet_render.js";
export type { Facet, RenderInputs } from "./facet_render.js";
export * from "./gtable.js";
export * from "./grob.js";
export { coordCartesian, coordFixed } from "./coord.js";
export type { Coord, PanelRange, Range } from "./coord.js";
export { prettyBreaks, trainRanges } from "./train_ranges.js";
export { pointLayer } from "./geom_point.js";
export { measure, textExtent } from "./size.js";
export { defaultTheme, mergeTheme } from "./theme.js";
export type { Theme } from "./theme.js";
export { renderSvg, resolveTracks } from "./render_svg.js";
export { buildFacetPlot } from "./plot.js";
export { loadData, loadRules, parseRules } from "./rules.js";
