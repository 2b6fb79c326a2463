export type TableErrorKind =
  | 'empty_dimensions'
  | 'count_mismatch'
  | 'shape_mismatch'
  | 'after_end'
  | 'column_out_of_range'
  | 'canceled'
  | 'sink'
  | 'malformed_stream';

export interface TableErrorDetails {
  /** Set for sink failures */
  phase?: 'header' | 'row' | undefined;
  /** Zero-based data row being written when the failure happened */
  row?: number | undefined;
  /** Dimension index for count and column errors */
  column?: number | undefined;
  /** CSV rows written before the failure, header included */
  rowsWritten?: number | undefined;
}

/**
 * Failure of the table core. Never thrown; returned through Result.
 */
export class TableError extends Error {
  constructor(
    public readonly kind: TableErrorKind,
    message: string,
    public readonly details: TableErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TableError';
  }

  /** Copy of this error carrying extra details */
  with(details: TableErrorDetails): TableError {
    return new TableError(this.kind, this.message, { ...this.details, ...details }, { cause: this.cause });
  }
}

export function isTableError(error: unknown): error is TableError {
  return error instanceof TableError;
}
