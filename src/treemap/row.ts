import type { Mappable, Rect } from './types';

export function totalSize(items: readonly Mappable[], start = 0, end = items.length): number {
  let sum = 0;
  for (let i = start; i < end; i++) {
    sum += items[i].size;
  }
  return sum;
}

/**
 * Cut `bounds` along its longer side: `row` takes `fraction` of it, `rest` the remainder.
 * Taller rects are cut across the height, everything else across the width.
 */
export function splitRect(bounds: Rect, fraction: number): { row: Rect; rest: Rect } {
  const { x, y, w, h } = bounds;
  if (h > w) {
    return {
      row: { x, y, w, h: h * fraction },
      rest: { x, y: y + h * fraction, w, h: h * (1 - fraction) },
    };
  }
  return {
    row: { x, y, w: w * fraction, h },
    rest: { x: x + w * fraction, y, w: w * (1 - fraction), h },
  };
}

/**
 * Divide `bounds` into consecutive slices, one per size, along its longer side.
 * A row with no weight collapses to zero-area rects at its origin.
 */
export function sliceRow(sizes: readonly number[], bounds: Rect): Rect[] {
  let total = 0;
  for (const size of sizes) total += size;

  if (total === 0) {
    return sizes.map(() => ({ x: bounds.x, y: bounds.y, w: 0, h: 0 }));
  }

  const isHorizontal = bounds.w > bounds.h;
  const rects: Rect[] = [];
  let offset = 0;

  for (const size of sizes) {
    const ratio = size / total;
    if (isHorizontal) {
      rects.push({ x: bounds.x + bounds.w * offset, y: bounds.y, w: bounds.w * ratio, h: bounds.h });
    } else {
      rects.push({ x: bounds.x, y: bounds.y + bounds.h * offset, w: bounds.w, h: bounds.h * ratio });
    }
    offset += ratio;
  }
  return rects;
}
