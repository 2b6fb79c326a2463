import { err, ok, type Result } from 'neverthrow';

import { TableError } from './errors.js';
import type { RawDimension } from './schemas.js';
import type { Category, Dimension } from './types.js';

/**
 * Walks every cell coordinate of a table in row-major order without
 * materialising the cross product. Not safe to share between callers.
 */
export interface DimensionIterator {
  /** True once every cell has been visited */
  end(): boolean;
  /** Advance to the next cell; checks the abort signal first */
  next(): Result<void, TableError>;
  /** Category of dimension `column` at the current cell */
  categoryAtColumn(column: number): Result<Category, TableError>;
  /** Copy of the current per-dimension indices */
  coordinates(): number[];
}

class RowMajorIterator implements DimensionIterator {
  private readonly indices: number[];
  private readonly counts: number[];
  private readonly empty: boolean;

  constructor(
    private readonly dimensions: readonly Dimension[],
    private readonly signal: AbortSignal | undefined
  ) {
    this.counts = dimensions.map((dimension) => dimension.categories.length);
    this.indices = this.counts.map(() => 0);
    this.empty = this.counts.some((count) => count === 0);
  }

  end(): boolean {
    return this.empty || (this.indices[0] ?? 0) >= (this.counts[0] ?? 0);
  }

  next(): Result<void, TableError> {
    if (this.signal?.aborted) {
      return err(new TableError('canceled', 'iteration canceled', {}, { cause: this.signal.reason }));
    }
    if (this.end()) {
      return err(afterEnd());
    }

    // Carry from the last dimension towards the first; the first may reach its count
    for (let column = this.indices.length - 1; column >= 0; column--) {
      const index = (this.indices[column] ?? 0) + 1;
      if (index < (this.counts[column] ?? 0) || column === 0) {
        this.indices[column] = index;
        break;
      }
      this.indices[column] = 0;
    }
    return ok();
  }

  categoryAtColumn(column: number): Result<Category, TableError> {
    if (this.end()) {
      return err(afterEnd());
    }
    const category = this.dimensions[column]?.categories[this.indices[column] ?? 0];
    if (!Number.isInteger(column) || !category) {
      return err(
        new TableError('column_out_of_range', `column ${column} out of range [0, ${this.dimensions.length})`, {
          column,
        })
      );
    }
    return ok(category);
  }

  coordinates(): number[] {
    return [...this.indices];
  }
}

function afterEnd(): TableError {
  return new TableError('after_end', 'after end of table');
}

/**
 * Create an iterator positioned at the first cell. A dimension without
 * categories gives an iterator that has already ended.
 */
export function createIterator(
  dimensions: readonly Dimension[],
  signal?: AbortSignal
): Result<DimensionIterator, TableError> {
  if (dimensions.length === 0) {
    return err(new TableError('empty_dimensions', 'table has no dimensions'));
  }
  return ok(new RowMajorIterator(dimensions, signal));
}

/**
 * Turn dimensions as decoded from a response into `Dimension`s whose count is
 * the number of categories. A count sent upstream must agree with it.
 */
export function normalizeDimensions(raw: readonly RawDimension[]): Result<Dimension[], TableError> {
  const dimensions: Dimension[] = [];
  for (const [column, dimension] of raw.entries()) {
    const count = dimension.categories.length;
    if (dimension.count !== undefined && dimension.count !== null && dimension.count !== count) {
      return err(
        new TableError(
          'count_mismatch',
          `dimension ${dimension.variable.name} has count ${dimension.count} but ${count} categories`,
          { column }
        )
      );
    }
    dimensions.push({ categories: dimension.categories, count, variable: dimension.variable });
  }
  return ok(dimensions);
}
