/**
 * Thrown when a layout is asked to place items it cannot give a proportional
 * area to: negative or non-finite sizes, or bounds with a negative or
 * non-finite dimension. Nothing is written to the items before it is thrown.
 */
export class LayoutInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutInputError';
  }
}
