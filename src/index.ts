export type { Layout, MapModel, Mappable, Rect, RowHeuristic, RowSelection } from './treemap/types';
export { aspectRatio, cloneRect, createRect, rectArea, unitRect } from './treemap/rect';
export { MapItem } from './treemap/mapItem';
export { LayoutInputError } from './treemap/errors';
export { TreemapLayout, layoutItems, layoutRange, layoutRow, sortDescending } from './treemap/layout';
export { sliceRow, splitRect, totalSize } from './treemap/row';
export { aspect, normAspect, greedyRow, trialRow, legacyRow, ROW_SELECTORS } from './treemap/heuristics';
export type { RowContext, RowSelector } from './treemap/heuristics';
export { ManifestModel, buildManifestModel, groupByDirectory } from './treemap/buildManifestModel';
export type { DirectoryItem, DirectoryWeight, ManifestModelOptions } from './treemap/buildManifestModel';
export { useTreemapLayout } from './hooks/useTreemapLayout';
export type { PlacedItem } from './hooks/useTreemapLayout';
export { DEFAULT_LAYOUT_OPTIONS, resolveLayoutOptions } from './config';
export type { LayoutOptions, ResolvedLayoutOptions } from './config';
export { createLogger } from './log';
export type { Logger } from './log';
export type { FileEntry, Manifest } from './types';
