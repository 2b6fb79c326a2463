import type { Readable } from 'node:stream';

import { ApiError } from '@ons-clients/http';
import { getLogger } from '@ons-clients/logger';
import { err, ok, type Result } from 'neverthrow';
import Assembler from 'stream-json/Assembler.js';
import Parser from 'stream-json/Parser.js';
import { z } from 'zod';

import { createIterator, normalizeDimensions, type DimensionIterator } from './dimensions.js';
import { TableError } from './errors.js';
import { graphQLErrorsToApiError, tableErrorToApiError } from './gql-error.js';
import { GraphQLErrorsSchema, RawDimensionSchema } from './schemas.js';
import { csvLine, type CsvSink } from './table.js';
import type { Dimension, GraphQLError } from './types.js';

const logger = getLogger('csv-stream');

const DIMENSIONS_PATH = 'data.dataset.table.dimensions';
const VALUES_PATH = 'data.dataset.table.values';
const VALUE_PATH = `${VALUES_PATH}.#`;
const TABLE_ERROR_PATH = 'data.dataset.table.error';
const ERRORS_PATH = 'errors';

export const OBSERVATION_COLUMN = 'Observation';

interface JsonToken {
  name: string;
  value?: string | undefined;
}

function isToken(chunk: unknown): chunk is JsonToken {
  return typeof chunk === 'object' && chunk !== null && 'name' in chunk && typeof chunk.name === 'string';
}

type Frame = { type: 'object'; key: string | undefined } | { type: 'array' };

export type StreamError = TableError | ApiError;

type Capture = { target: 'dimensions' | 'errors'; assembler: Assembler; depth: number };

export interface CsvStreamOptions {
  /** Polled before each data row; aborting stops the transform */
  signal?: AbortSignal | undefined;
}

/**
 * Header for the streamed format: a code and a label column per dimension,
 * then the observation.
 */
export function streamHeader(dimensions: readonly Dimension[]): string[] {
  return [
    ...dimensions.flatMap((dimension) => [`${dimension.variable.label} Code`, dimension.variable.label]),
    OBSERVATION_COLUMN,
  ];
}

function toDimensions(value: unknown): Result<Dimension[], TableError> {
  const parsed = z.array(RawDimensionSchema).safeParse(value);
  if (!parsed.success) {
    return err(
      new TableError(
        'malformed_stream',
        `invalid dimensions: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      )
    );
  }

  return normalizeDimensions(parsed.data);
}

/**
 * Incremental GraphQL-response-to-CSV transform for static dataset queries.
 *
 * Reads `data.dataset.table` token by token and writes one CSV row per
 * observation without holding the values in memory. Dimensions must precede
 * values in the response. On success returns the rows written, header
 * included; every failure carries the same count in `rowsWritten`.
 *
 * Aborting `signal` fails with kind `canceled`, including when the abort
 * surfaces as an error on `body`. `body` is destroyed on every failure.
 */
export async function graphQLJSONToCSV(
  body: Readable,
  sink: CsvSink,
  options: CsvStreamOptions = {}
): Promise<Result<number, StreamError>> {
  const transform = new CsvTransform(sink, options.signal);
  const tokens = new Parser({ streamValues: false });
  const onBodyError = (error: Error) => tokens.destroy(error);
  body.once('error', onBodyError);
  body.pipe(tokens);

  let failed = true;
  try {
    for await (const chunk of tokens) {
      if (!isToken(chunk)) {
        return transform.fail(new TableError('malformed_stream', 'unexpected token from JSON parser'));
      }
      const result = await transform.consume(chunk);
      if (result.isErr()) {
        return transform.fail(result.error);
      }
    }
    failed = false;
  } catch (error) {
    const canceled = transform.canceled();
    if (canceled) {
      return transform.fail(canceled);
    }
    const reason = error instanceof Error ? error.message : String(error);
    return transform.fail(new TableError('malformed_stream', `error decoding response: ${reason}`, {}, { cause: error }));
  } finally {
    body.off('error', onBodyError);
    body.unpipe(tokens);
    if (failed) {
      tokens.destroy();
      body.destroy();
    }
  }

  const finished = transform.finish();
  if (finished.isErr()) {
    body.destroy();
  }
  return finished;
}

class CsvTransform {
  private readonly frames: Frame[] = [];
  private capture: Capture | undefined;
  private dimensions: Dimension[] | undefined;
  private graphQLErrors: GraphQLError[] = [];
  private iterator: DimensionIterator | undefined;
  private valuesDepth: number | undefined;
  private valuesDone = false;
  private rowsWritten = 0;

  constructor(
    private readonly sink: CsvSink,
    private readonly signal: AbortSignal | undefined
  ) {}

  async consume(token: JsonToken): Promise<Result<void, StreamError>> {
    if (this.capture) {
      const captured = this.consumeCaptured(this.capture, token);
      return captured.isErr() ? err(captured.error) : ok();
    }

    const path = this.path();
    switch (token.name) {
      case 'startObject':
      case 'startArray': {
        if (path === DIMENSIONS_PATH || path === ERRORS_PATH) {
          const assembler = new Assembler();
          assembler.consume(token);
          this.capture = { assembler, depth: 1, target: path === ERRORS_PATH ? 'errors' : 'dimensions' };
          return ok();
        }
        if (path === VALUES_PATH && token.name === 'startArray') {
          const started = await this.startValues();
          if (started.isErr()) return err(started.error);
        }
        this.frames.push(token.name === 'startObject' ? { key: undefined, type: 'object' } : { type: 'array' });
        return ok();
      }
      case 'endObject':
      case 'endArray': {
        if (token.name === 'endArray' && this.valuesDepth !== undefined && this.frames.length === this.valuesDepth) {
          const ended = this.endValues();
          if (ended.isErr()) return err(ended.error);
        }
        this.frames.pop();
        return ok();
      }
      case 'keyValue': {
        const top = this.frames[this.frames.length - 1];
        if (top?.type === 'object') {
          top.key = token.value;
        }
        return ok();
      }
      case 'numberValue': {
        if (path === VALUE_PATH) {
          const written = await this.writeRow(token.value);
          return written.isErr() ? err(written.error) : ok();
        }
        return ok();
      }
      case 'stringValue':
        if (path === TABLE_ERROR_PATH && token.value) {
          return err(tableErrorToApiError(token.value));
        }
        return ok();
      default:
        return ok();
    }
  }

  fail(error: StreamError): Result<number, StreamError> {
    logger.warn({ error, rowsWritten: this.rowsWritten }, 'streaming CSV transform failed');
    if (error instanceof TableError) {
      return err(error.with({ rowsWritten: this.rowsWritten }));
    }
    return err(
      new ApiError(error.message, error.statusCode, { ...error.logData, rowsWritten: this.rowsWritten }, { cause: error.cause })
    );
  }

  /** The cancellation error once the signal has been aborted */
  canceled(): TableError | undefined {
    if (!this.signal?.aborted) {
      return undefined;
    }
    return new TableError('canceled', 'streaming canceled', {}, { cause: this.signal.reason });
  }

  finish(): Result<number, StreamError> {
    if (this.valuesDone) {
      return ok(this.rowsWritten);
    }
    if (this.graphQLErrors.length > 0) {
      return this.fail(graphQLErrorsToApiError(this.graphQLErrors));
    }
    return this.fail(new TableError('malformed_stream', 'response contains no table values'));
  }

  private path(): string {
    return this.frames.map((frame) => (frame.type === 'object' ? (frame.key ?? '') : '#')).join('.');
  }

  private consumeCaptured(capture: Capture, token: JsonToken): Result<void, TableError> {
    capture.assembler.consume(token);
    if (token.name === 'startObject' || token.name === 'startArray') {
      capture.depth++;
    } else if (token.name === 'endObject' || token.name === 'endArray') {
      capture.depth--;
    }
    if (capture.depth > 0) {
      return ok();
    }

    this.capture = undefined;
    const value: unknown = capture.assembler.current;
    if (capture.target === 'errors') {
      const parsed = GraphQLErrorsSchema.safeParse(value);
      if (!parsed.success) {
        return err(new TableError('malformed_stream', 'invalid errors array in response'));
      }
      this.graphQLErrors = parsed.data;
      return ok();
    }

    const dimensions = toDimensions(value);
    if (dimensions.isErr()) {
      return err(dimensions.error);
    }
    this.dimensions = dimensions.value;
    return ok();
  }

  private async startValues(): Promise<Result<void, TableError>> {
    if (!this.dimensions) {
      return err(new TableError('malformed_stream', 'table values received before dimensions'));
    }
    const iterator = createIterator(this.dimensions, this.signal);
    if (iterator.isErr()) {
      return err(iterator.error);
    }
    this.iterator = iterator.value;
    // Depth the values array sits at once pushed
    this.valuesDepth = this.frames.length + 1;
    return this.write(csvLine(streamHeader(this.dimensions)), 'header', undefined);
  }

  private endValues(): Result<void, TableError> {
    this.valuesDepth = undefined;
    if (this.iterator && !this.iterator.end()) {
      return err(
        new TableError('shape_mismatch', `table shape mismatch: values ended after ${this.rowsWritten - 1} cells`)
      );
    }
    this.valuesDone = true;
    return ok();
  }

  private async writeRow(raw: string | undefined): Promise<Result<void, TableError>> {
    const iterator = this.iterator;
    const dimensions = this.dimensions;
    if (!iterator || !dimensions) {
      return err(new TableError('malformed_stream', 'table value outside of a values array'));
    }
    if (iterator.end()) {
      return err(new TableError('shape_mismatch', 'table shape mismatch: more values than cells'));
    }
    const canceled = this.canceled();
    if (canceled) {
      return err(canceled);
    }

    const observation = Number(raw);
    if (!Number.isInteger(observation)) {
      return err(new TableError('malformed_stream', `invalid observation value: ${raw ?? ''}`));
    }

    const record: (string | number)[] = [];
    for (let column = 0; column < dimensions.length; column++) {
      const category = iterator.categoryAtColumn(column);
      if (category.isErr()) {
        return err(category.error);
      }
      record.push(category.value.code, category.value.label);
    }
    record.push(observation);

    const row = this.rowsWritten - 1;
    const written = await this.write(csvLine(record), 'row', row);
    if (written.isErr()) {
      return written;
    }
    const advanced = iterator.next();
    return advanced.isErr() ? err(advanced.error) : ok();
  }

  private async write(line: string, phase: 'header' | 'row', row: number | undefined): Promise<Result<void, TableError>> {
    try {
      await this.sink.write(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const where = phase === 'header' ? 'header' : `row ${row ?? 0}`;
      return err(new TableError('sink', `error writing ${where}: ${reason}`, { phase, row }, { cause: error }));
    }
    this.rowsWritten++;
    return ok();
  }
}
