import { useMemo } from 'react';
import type { Mappable, Rect } from '../treemap/types';
import type { LayoutOptions } from '../config';
import { TreemapLayout } from '../treemap/layout';
import { unitRect } from '../treemap/rect';

export interface PlacedItem<T> {
  item: T;
  bounds: Rect;
}

interface Slot<T> extends Mappable {
  item: T;
}

/**
 * Lay out `items` into a `width` x `height` box at the origin. The items are
 * never mutated; results come back in layout order (largest first).
 */
export function useTreemapLayout<T extends { readonly size: number }>(
  items: readonly T[],
  width: number,
  height: number,
  options?: LayoutOptions,
): PlacedItem<T>[] {
  const heuristic = options?.heuristic;
  const debug = options?.debug;

  return useMemo(() => {
    if (items.length === 0 || width <= 0 || height <= 0) return [];

    const slots: Slot<T>[] = items.map(item => ({ item, size: item.size, bounds: unitRect() }));
    new TreemapLayout({ heuristic, debug }).layoutItems(slots, { x: 0, y: 0, w: width, h: height });
    return slots.map(({ item, bounds }) => ({ item, bounds }));
  }, [items, width, height, heuristic, debug]);
}
