import type { Layout, MapModel, Mappable, Rect } from './types';
import type { RowSelector } from './heuristics';
import type { Logger } from '../log';
import { ROW_SELECTORS } from './heuristics';
import { sliceRow, splitRect, totalSize } from './row';
import { LayoutInputError } from './errors';
import { createLogger } from '../log';
import { resolveLayoutOptions, type LayoutOptions, type ResolvedLayoutOptions } from '../config';

// Squarified treemap layout (Bruls, Huizing, van Wijk)

/** Stable, in place: equal sizes keep their input order. */
export function sortDescending<T extends Mappable>(items: T[]): T[] {
  return items.sort((a, b) => b.size - a.size);
}

function validate(items: readonly Mappable[], bounds: Rect): void {
  for (const key of ['x', 'y', 'w', 'h'] as const) {
    if (!Number.isFinite(bounds[key])) {
      throw new LayoutInputError(`bounds.${key} must be a finite number (got ${bounds[key]})`);
    }
  }
  if (bounds.w < 0 || bounds.h < 0) {
    throw new LayoutInputError(`bounds must not have a negative size (got ${bounds.w}x${bounds.h})`);
  }
  items.forEach((item, i) => {
    if (!Number.isFinite(item.size) || item.size < 0) {
      throw new LayoutInputError(`item ${i} has invalid size ${item.size}; sizes must be finite and >= 0`);
    }
  });
  const total = totalSize(items);
  if (!Number.isFinite(total)) {
    throw new LayoutInputError(`total size overflows to ${total}; scale the sizes down`);
  }
}

/** Assign each item in `[start, end)` a slice of `bounds`, in order. */
export function layoutRow(items: Mappable[], start: number, end: number, bounds: Rect): void {
  const sizes: number[] = [];
  for (let i = start; i < end; i++) sizes.push(items[i].size);
  const rects = sliceRow(sizes, bounds);
  for (let i = start; i < end; i++) {
    items[i].bounds = rects[i - start];
  }
}

/**
 * Fill `bounds` with the already sorted items in `[start, end)`. Each pass
 * peels one row off the front of the range and the longer side of the rect,
 * so every item is written exactly once.
 */
export function layoutRange(
  items: Mappable[],
  start: number,
  end: number,
  bounds: Rect,
  selectRow: RowSelector,
  log: Logger,
): void {
  let rect = bounds;
  let i = start;

  while (i < end) {
    // Nothing left to squarify: zero-area rect, all-zero weights, or a pair
    if (end - i <= 2 || rect.w === 0 || rect.h === 0 || totalSize(items, i, end) === 0) {
      layoutRow(items, i, end, rect);
      return;
    }

    const { end: rowEnd, fraction } = selectRow({ items, start: i, end, bounds: rect });
    const { row, rest } = splitRect(rect, fraction);
    log.debug(`row [${i}, ${rowEnd}) of [${i}, ${end}) takes ${fraction} of ${rect.w}x${rect.h}`);
    layoutRow(items, i, rowEnd, row);

    rect = rest;
    i = rowEnd;
  }
}

export function layoutItems<T extends Mappable>(items: T[], bounds: Rect, options: LayoutOptions = {}): T[] {
  return new TreemapLayout(options).layoutItems(items, bounds);
}

export class TreemapLayout implements Layout {
  readonly options: ResolvedLayoutOptions;
  private readonly log: Logger;

  constructor(options: LayoutOptions = {}) {
    this.options = resolveLayoutOptions(options);
    this.log = createLogger('treemap', this.options.debug);
  }

  layout<T extends Mappable>(model: MapModel<T>, bounds: Rect): T[] {
    return this.layoutItems(model.getItems(), bounds);
  }

  /** Sort `items` by descending size and write every item's bounds. Returns `items`. */
  layoutItems<T extends Mappable>(items: T[], bounds: Rect): T[] {
    validate(items, bounds);
    if (items.length === 0) return items;

    sortDescending(items);
    layoutRange(items, 0, items.length, bounds, ROW_SELECTORS[this.options.heuristic], this.log);
    return items;
  }
}
