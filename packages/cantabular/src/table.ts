import { Readable, type Writable } from 'node:stream';

import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import { TableError } from './errors.js';
import type { Dimension, Table } from './types.js';

/** Last column of the rendered header */
export const COUNT_COLUMN = 'count';

/**
 * Destination for CSV text. A rejected (or throwing) write aborts the render.
 */
export interface CsvSink {
  write(chunk: string): Promise<void> | void;
}

/** Adapt a Node writable, waiting for each chunk to be flushed */
export function toCsvSink(writable: Writable): CsvSink {
  return {
    write: (chunk) =>
      new Promise<void>((resolve, reject) => {
        writable.write(chunk, (error) => (error ? reject(error) : resolve()));
      }),
  };
}

/** Format one record as a CSV line, newline included */
export function csvLine(record: (string | number)[]): string {
  return stringify([record]);
}

/**
 * Check a table's shape and return it with every `count` set to the number
 * of categories.
 */
export function validateTable(table: Table): Result<Table, TableError> {
  if (table.dimensions.length === 0) {
    return err(new TableError('empty_dimensions', 'table has no dimensions'));
  }

  const dimensions: Dimension[] = [];
  for (const [column, dimension] of table.dimensions.entries()) {
    if (dimension.count !== dimension.categories.length) {
      return err(
        new TableError(
          'count_mismatch',
          `dimension ${dimension.variable.name} has count ${dimension.count} but ${dimension.categories.length} categories`,
          { column }
        )
      );
    }
    dimensions.push({ ...dimension, count: dimension.categories.length });
  }

  const cells = dimensions.reduce((product, dimension) => product * dimension.count, 1);
  if (table.values.length !== cells) {
    return err(
      new TableError('shape_mismatch', `table shape mismatch: ${table.values.length} values for ${cells} cells`)
    );
  }

  return ok({ ...table, dimensions });
}

/**
 * Split a flat row-major index into one index per dimension, the last
 * dimension having the lowest weight. Fails with `shape_mismatch` when the
 * index is not a cell of the table, which includes any table with a zero count.
 */
export function decodeFlatIndex(index: number, counts: readonly number[]): Result<number[], TableError> {
  const cells = counts.reduce((product, count) => product * count, 1);
  if (counts.length === 0 || !Number.isInteger(index) || index < 0 || index >= cells) {
    return err(new TableError('shape_mismatch', `index ${index} outside a table of ${cells} cells`));
  }

  const indices = counts.map(() => 0);
  let remainder = index;
  for (let column = counts.length - 1; column >= 0; column--) {
    const count = counts[column] ?? 1;
    indices[column] = remainder % count;
    remainder = Math.floor(remainder / count);
  }
  return ok(indices);
}

function header(table: Table): string[] {
  return [...table.dimensions.map((dimension) => dimension.variable.label), COUNT_COLUMN];
}

function* rows(table: Table): Generator<(string | number)[]> {
  const counts = table.dimensions.map((dimension) => dimension.count);
  for (const [index, value] of table.values.entries()) {
    const decoded = decodeFlatIndex(index, counts);
    // validateTable has matched the values to the cells
    if (decoded.isErr()) return;
    const indices = decoded.value;
    const labels = table.dimensions.map((dimension, column) => {
      const category = dimension.categories[indices[column] ?? 0];
      return category ? category.label : '';
    });
    yield [...labels, value];
  }
}

/** Render the whole table to a CSV string */
export function renderTable(table: Table): Result<string, TableError> {
  return validateTable(table).map((valid) => stringify([header(valid), ...rows(valid)]));
}

/** A reader over the rendered CSV, producing one line at a time */
export function tableReadable(table: Table): Result<Readable, TableError> {
  return validateTable(table).map((valid) =>
    Readable.from(
      (function* () {
        yield csvLine(header(valid));
        for (const record of rows(valid)) {
          yield csvLine(record);
        }
      })()
    )
  );
}

/**
 * Write the table to `sink` line by line. Returns the number of rows written,
 * header included. A failed write ends the render; what was written so far
 * must be discarded.
 */
export async function writeTable(table: Table, sink: CsvSink): Promise<Result<number, TableError>> {
  const validated = validateTable(table);
  if (validated.isErr()) {
    return err(validated.error);
  }
  const valid = validated.value;

  try {
    await sink.write(csvLine(header(valid)));
  } catch (error) {
    return err(sinkError(error, 'header', undefined));
  }

  let row = 0;
  for (const record of rows(valid)) {
    try {
      await sink.write(csvLine(record));
    } catch (error) {
      return err(sinkError(error, 'row', row));
    }
    row++;
  }

  return ok(row + 1);
}

function sinkError(error: unknown, phase: 'header' | 'row', row: number | undefined): TableError {
  const reason = error instanceof Error ? error.message : String(error);
  const where = phase === 'header' ? 'header' : `row ${row ?? 0}`;
  return new TableError('sink', `error writing ${where}: ${reason}`, { phase, row }, { cause: error });
}
