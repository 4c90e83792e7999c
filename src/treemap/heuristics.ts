import type { Mappable, Rect, RowHeuristic, RowSelection } from './types';
import { aspectRatio } from './rect';
import { sliceRow, splitRect, totalSize } from './row';

export interface RowContext {
  items: readonly Mappable[];
  /** First item of the remaining range. */
  start: number;
  /** One past the last item of the remaining range; always at least `start + 3`. */
  end: number;
  bounds: Rect;
}

export type RowSelector = (ctx: RowContext) => RowSelection;

export function aspect(big: number, small: number, a: number, b: number): number {
  return (big * b) / (small * a / b);
}

/** Estimated aspect ratio of a row, folded so that 1 is square and larger is worse. */
export function normAspect(big: number, small: number, a: number, b: number): number {
  const x = aspect(big, small, a, b);
  return x < 1 ? 1 / x : x;
}

function sides(bounds: Rect): [big: number, small: number] {
  return bounds.h > bounds.w ? [bounds.h, bounds.w] : [bounds.w, bounds.h];
}

// Forward scan: keep adding items while the normalized aspect does not get worse.
export const greedyRow: RowSelector = ({ items, start, end, bounds }) => {
  const [big, small] = sides(bounds);
  const total = totalSize(items, start, end);
  const a = items[start].size / total;
  let b = a;
  let mid = start + 1;

  while (mid < end) {
    const q = items[mid].size / total;
    if (normAspect(big, small, a, b + q) > normAspect(big, small, a, b)) break;
    b += q;
    mid++;
  }

  // A row that swallows the rest takes the whole rect; no sliver from rounding.
  return { end: mid, fraction: mid === end ? 1 : b };
};

function worstAspect(items: readonly Mappable[], start: number, end: number, bounds: Rect, total: number): number {
  const sizes = items.slice(start, end).map(item => item.size);
  const { row } = splitRect(bounds, totalSize(items, start, end) / total);
  let worst = 0;
  for (const rect of sliceRow(sizes, row)) {
    const ratio = aspectRatio(rect);
    if (ratio > worst) worst = ratio;
  }
  return worst;
}

// Lays out each candidate row and keeps extending while the worst item aspect strictly improves.
export const trialRow: RowSelector = ({ items, start, end, bounds }) => {
  const total = totalSize(items, start, end);
  let mid = start + 1;
  let best = worstAspect(items, start, mid, bounds, total);

  while (mid < end) {
    const candidate = worstAspect(items, start, mid + 1, bounds, total);
    if (candidate >= best) break;
    best = candidate;
    mid++;
  }

  return { end: mid, fraction: mid === end ? 1 : totalSize(items, start, mid) / total };
};

/**
 * Reproduces older output exactly. The range total leaves out its last item,
 * the first item is counted twice in `b`, and the row keeps the item the scan
 * stopped on. Areas are not proportional; use `greedyRow` for real layouts.
 */
export const legacyRow: RowSelector = ({ items, start, end, bounds }) => {
  const [big, small] = sides(bounds);
  const last = end - 1;
  const total = totalSize(items, start, last);
  const a = items[start].size / total;
  let b = a;
  let mid = start;

  while (mid <= last) {
    const aspectNow = normAspect(big, small, a, b);
    const q = items[mid].size / total;
    if (normAspect(big, small, a, b + q) > aspectNow) break;
    mid++;
    b += q;
  }

  // b never passes 1 once an item is accepted, so the scan stops before `last`
  return { end: mid + 1, fraction: b };
};

export const ROW_SELECTORS: Record<RowHeuristic, RowSelector> = {
  greedy: greedyRow,
  trial: trialRow,
  legacy: legacyRow,
};
