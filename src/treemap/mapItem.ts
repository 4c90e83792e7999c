import type { Mappable, Rect } from './types';
import { createRect, unitRect } from './rect';

export class MapItem implements Mappable {
  size: number;
  bounds: Rect;

  constructor(size = 1) {
    this.size = size;
    this.bounds = unitRect();
  }

  setBounds(rect: Rect): void {
    this.bounds = rect;
  }

  setBoundsFromPoints(x: number, y: number, w: number, h: number): void {
    this.bounds = createRect(x, y, w, h);
  }
}
