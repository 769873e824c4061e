/**
 * Inclusive-exclusive range over one coordinate space: source offsets or
 * row/column points.
 */
export interface Extent<T> {
  readonly start: T;
  readonly end: T;
}

/**
 * Zero-based row and column. Columns count the engine's code units.
 */
export interface Point {
  readonly row: number;
  readonly column: number;
}

/**
 * Offsets in UTF-16 code units of the parsed string, as `String#slice` takes
 * them. They are not byte offsets into a UTF-8 `Buffer` of the same text.
 */
export type ByteRange = Extent<number>;
export type PointRange = Extent<Point>;

export function comparePoints(a: Point, b: Point): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.column - b.column;
}

function compareNumbers(a: number, b: number): number {
  return a - b;
}

/**
 * Build a frozen extent, rejecting one whose start lies after its end.
 */
export function extent(start: number, end: number): ByteRange;
export function extent(start: Point, end: Point): PointRange;
export function extent<T>(start: T, end: T, compare: (a: T, b: T) => number): Extent<T>;
export function extent<T>(
  start: T,
  end: T,
  compare?: (a: T, b: T) => number
): Extent<T> {
  const order = compare ?? pickComparator(start);
  if (order(start, end) > 0) {
    throw new RangeError(`Extent start ${format(start)} is after end ${format(end)}`);
  }
  return Object.freeze({ start, end });
}

function pickComparator<T>(sample: T): (a: T, b: T) => number {
  if (typeof sample === 'number') {
    return (a, b) => compareNumbers(Number(a), Number(b));
  }
  return (a, b) => (isPoint(a) && isPoint(b) ? comparePoints(a, b) : 0);
}

function isPoint(value: unknown): value is Point {
  return (
    typeof value === 'object' &&
    value !== null &&
    'row' in value &&
    'column' in value &&
    typeof value.row === 'number' &&
    typeof value.column === 'number'
  );
}

function format(value: unknown): string {
  return isPoint(value) ? `(${value.row}, ${value.column})` : String(value);
}
