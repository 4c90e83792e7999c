export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Anything that can be placed in a treemap: `size` maps to area, `bounds` is written by the layout. */
export interface Mappable {
  readonly size: number;
  bounds: Rect;
}

/** Supplies the items a layout arranges. */
export interface MapModel<T extends Mappable = Mappable> {
  getItems(): T[];
}

export interface Layout {
  /** Arrange the model's items to fill `bounds`. Returns them in layout order. */
  layout<T extends Mappable>(model: MapModel<T>, bounds: Rect): T[];
}

export type RowHeuristic = 'greedy' | 'trial' | 'legacy';

/** Result of picking a row: items `[start, end)` fill `fraction` of the split axis. */
export interface RowSelection {
  end: number;
  fraction: number;
}
