// @vitest-environment jsdom
import { describe, it, expect } from 'vitest';
import { renderHook } from '@testing-library/react';
import { useTreemapLayout } from '../useTreemapLayout';

const items = [
  { label: 'small', size: 1 },
  { label: 'large', size: 3 },
];

describe('useTreemapLayout', () => {
  it('places items largest first without mutating them', () => {
    const { result } = renderHook(() => useTreemapLayout(items, 8, 4));
    expect(result.current).toEqual([
      { item: items[1], bounds: { x: 0, y: 0, w: 6, h: 4 } },
      { item: items[0], bounds: { x: 6, y: 0, w: 2, h: 4 } },
    ]);
    expect(items.map(i => i.label)).toEqual(['small', 'large']);
    expect(items[0]).toEqual({ label: 'small', size: 1 });
  });

  it('returns nothing for an empty box', () => {
    const { result } = renderHook(() => useTreemapLayout(items, 0, 4));
    expect(result.current).toEqual([]);
  });

  it('reuses the result while inputs are unchanged', () => {
    const { result, rerender } = renderHook(({ width }) => useTreemapLayout(items, width, 4), {
      initialProps: { width: 8 },
    });
    const first = result.current;
    rerender({ width: 8 });
    expect(result.current).toBe(first);
    rerender({ width: 4 });
    expect(result.current).not.toBe(first);
    expect(result.current[0].bounds).toEqual({ x: 0, y: 0, w: 4, h: 3 });
  });
});
