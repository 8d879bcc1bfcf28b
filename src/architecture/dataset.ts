import { InvalidArgumentError } from '../utils/errors';

/**
 * Row view over a flat array of training values.
 *
 * `values[0 .. width)` is row 0, `values[width .. 2 * width)` row 1, and so on; column `j` of
 * every row belongs to the `j`-th node of whatever the rows feed (inputs or outputs).
 *
 * Rows are addressed by iteration number on a ring: iteration `i` reads row `i % length`, so
 * a driver may count iterations past the end of the data.
 */
export class RowTable {
  private constructor(
    /** Values per row. */
    readonly width: number,
    private readonly rows: readonly (readonly number[])[]
  ) {}

  /**
   * @throws {InvalidArgumentError} if `width` is not a positive integer, `values` is empty, or
   *   `values.length` is not a multiple of `width`.
   */
  static fromFlat(values: readonly number[], width: number): RowTable {
    if (!Number.isInteger(width) || width <= 0) {
      throw new InvalidArgumentError('Row width must be a positive integer.', { width });
    }
    if (values.length === 0 || values.length % width !== 0) {
      throw new InvalidArgumentError('values.length must be a non-zero multiple of the row width!', {
        length: values.length,
        width,
      });
    }
    const rows: number[][] = [];
    for (let start = 0; start < values.length; start += width) {
      rows.push(values.slice(start, start + width));
    }
    return new RowTable(width, rows);
  }

  /** Number of rows. */
  get length(): number {
    return this.rows.length;
  }

  /** The row used by iteration `iteration` (ring-indexed). */
  row(iteration: number): readonly number[] {
    if (!Number.isInteger(iteration) || iteration < 0) {
      throw new InvalidArgumentError('Iteration must be a non-negative integer.', { iteration });
    }
    return this.rows[iteration % this.rows.length];
  }
}
