import type { Rect } from './types';

export function createRect(x = 0, y = 0, w = 1, h = 1): Rect {
  return { x, y, w, h };
}

export function unitRect(): Rect {
  return createRect();
}

export function cloneRect(rect: Rect): Rect {
  return { x: rect.x, y: rect.y, w: rect.w, h: rect.h };
}

// 0 for degenerate rects; 1 is a perfect square
export function aspectRatio(rect: Rect): number {
  if (rect.w === 0 || rect.h === 0) return 0;
  return Math.max(rect.w / rect.h, rect.h / rect.w);
}

export function rectArea(rect: Rect): number {
  return rect.w * rect.h;
}
