import { describe, it, expect } from 'vitest';
import { aspect, greedyRow, legacyRow, normAspect, trialRow } from '../heuristics';
import { sliceRow, splitRect, totalSize } from '../row';
import { MapItem } from '../mapItem';
import { createRect } from '../rect';
import type { RowContext } from '../heuristics';

function context(sizes: number[], bounds = createRect(0, 0, 6, 4)): RowContext {
  return { items: sizes.map(s => new MapItem(s)), start: 0, end: sizes.length, bounds };
}

describe('normAspect', () => {
  it('matches the raw aspect when it is at least 1', () => {
    expect(aspect(6, 4, 0.25, 0.5)).toBe(1.5);
    expect(normAspect(6, 4, 0.25, 0.5)).toBe(1.5);
  });

  it('folds values below 1 to their reciprocal', () => {
    expect(aspect(6, 4, 0.25, 0.25)).toBe(0.375);
    expect(normAspect(6, 4, 0.25, 0.25)).toBeCloseTo(8 / 3, 12);
  });
});

describe('row selectors', () => {
  const sizes = [6, 6, 4, 3, 2, 2, 1];

  it('greedy stops before the item that makes the row less square', () => {
    expect(greedyRow(context(sizes))).toEqual({ end: 2, fraction: 0.5 });
  });

  it('greedy takes the whole rect once the row absorbs every item', () => {
    expect(greedyRow(context([4, 0, 0], createRect(0, 0, 4, 5)))).toEqual({ end: 3, fraction: 1 });
  });

  it('trial compares the worst aspect of each candidate row', () => {
    expect(trialRow(context(sizes))).toEqual({ end: 2, fraction: 0.5 });
  });

  it('legacy reproduces the older row boundary and fraction', () => {
    const row = legacyRow(context(sizes));
    expect(row.end).toBe(2);
    expect(row.fraction).toBeCloseTo(12 / 23, 15);
  });

  it('legacy keeps the single largest item when adding more only hurts', () => {
    expect(legacyRow(context([4, 1, 1], createRect(0, 0, 1, 1)))).toEqual({ end: 1, fraction: 0.8 });
  });
});

describe('row geometry', () => {
  it('sums sizes over a half-open range', () => {
    const items = [1, 2, 3, 4].map(s => new MapItem(s));
    expect(totalSize(items)).toBe(10);
    expect(totalSize(items, 1, 3)).toBe(5);
    expect(totalSize(items, 2, 2)).toBe(0);
  });

  it('splits a wide rect across its width', () => {
    expect(splitRect(createRect(1, 1, 8, 4), 0.25)).toEqual({
      row: { x: 1, y: 1, w: 2, h: 4 },
      rest: { x: 3, y: 1, w: 6, h: 4 },
    });
  });

  it('splits a tall rect across its height', () => {
    expect(splitRect(createRect(0, 2, 4, 8), 0.75)).toEqual({
      row: { x: 0, y: 2, w: 4, h: 6 },
      rest: { x: 0, y: 8, w: 4, h: 2 },
    });
  });

  it('slices a square row top to bottom', () => {
    expect(sliceRow([3, 1], createRect(0, 0, 2, 2))).toEqual([
      { x: 0, y: 0, w: 2, h: 1.5 },
      { x: 0, y: 1.5, w: 2, h: 0.5 },
    ]);
  });
});
