import { PassThrough, Readable } from 'node:stream';

import { ApiError } from '@ons-clients/http';
import { describe, expect, it, vi } from 'vitest';

import { graphQLJSONToCSV, streamHeader } from '../csv-stream.js';
import { TableError } from '../errors.js';
import type { Dimension } from '../types.js';

import { chunkedBody, dimension, MemorySink, readFixture } from './fixtures/index.js';

const HEADER = 'City Code,City,Number of siblings Code,Number of siblings,Observation\n';

function tableBody(table: { dimensions?: Dimension[]; values?: unknown; error?: string }): Readable {
  return Readable.from([JSON.stringify({ data: { dataset: { table } } })]);
}

describe('streamHeader', () => {
  it('emits a code and a label column per dimension', () => {
    expect(streamHeader([dimension('city', ['London']), dimension('sex', ['F'])])).toEqual([
      'City Code',
      'City',
      'Sex Code',
      'Sex',
      'Observation',
    ]);
  });
});

describe('graphQLJSONToCSV', () => {
  it('converts the City x Siblings response', async () => {
    const sink = new MemorySink();

    const result = await graphQLJSONToCSV(chunkedBody(readFixture('static-dataset.json')), sink);

    expect(result.isOk() && result.value).toBe(22);
    expect(sink.text()).toBe(readFixture('static-dataset.csv'));
  });

  it('produces the same output whatever the chunking', async () => {
    const whole = new MemorySink();
    const tiny = new MemorySink();

    await graphQLJSONToCSV(Readable.from([readFixture('static-dataset.json')]), whole);
    await graphQLJSONToCSV(chunkedBody(readFixture('static-dataset.json'), 1), tiny);

    expect(tiny.text()).toBe(whole.text());
  });

  it('stops after the header when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client gone'));
    const sink = new MemorySink();

    const result = await graphQLJSONToCSV(chunkedBody(readFixture('static-dataset.json')), sink, {
      signal: controller.signal,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(TableError);
      expect(result.error instanceof TableError && result.error.kind).toBe('canceled');
      expect(result.error instanceof TableError && result.error.details.rowsWritten).toBe(1);
    }
    expect(sink.text()).toBe(HEADER);
  });

  it('reports an abort that surfaces as a body error as canceled', async () => {
    const controller = new AbortController();
    const body = new PassThrough();
    const sink = new MemorySink();
    const dimensions = JSON.stringify([dimension('area', ['North', 'South'])]);

    const pending = graphQLJSONToCSV(body, sink, { signal: controller.signal });
    body.write(`{"data":{"dataset":{"table":{"dimensions":${dimensions},"values":[7,`);
    await vi.waitFor(() => expect(sink.chunks).toHaveLength(2));
    const reason = new Error('client gone');
    controller.abort(reason);
    body.destroy(reason);
    const result = await pending;

    expect(result.isErr()).toBe(true);
    expect(result.isErr() && result.error).toBeInstanceOf(TableError);
    if (result.isErr() && result.error instanceof TableError) {
      expect(result.error.kind).toBe('canceled');
      expect(result.error.message).toBe('streaming canceled');
      expect(result.error.cause).toBe(reason);
      expect(result.error.details.rowsWritten).toBe(2);
    }
    expect(sink.text()).toBe('Area Code,Area,Observation\n0,North,7\n');
  });

  it('destroys the body when it stops early', async () => {
    const body = new PassThrough();
    body.write('{"data":{"dataset":{"table":{"values":[1');

    const result = await graphQLJSONToCSV(body, new MemorySink());

    expect(result.isErr() && result.error.message).toBe('table values received before dimensions');
    expect(body.destroyed).toBe(true);
  });

  it('rejects values that arrive before the dimensions', async () => {
    const body = Readable.from(['{"data":{"dataset":{"table":{"values":[1],"dimensions":[]}}}}']);

    const result = await graphQLJSONToCSV(body, new MemorySink());

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof TableError) {
      expect(result.error.kind).toBe('malformed_stream');
      expect(result.error.message).toBe('table values received before dimensions');
      expect(result.error.details.rowsWritten).toBe(0);
    }
  });

  it('fails when the values run out before the cells', async () => {
    const sink = new MemorySink();

    const result = await graphQLJSONToCSV(
      tableBody({ dimensions: [dimension('city', ['London', 'Belfast'])], values: [4] }),
      sink
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof TableError) {
      expect(result.error.kind).toBe('shape_mismatch');
      expect(result.error.message).toBe('table shape mismatch: values ended after 1 cells');
      expect(result.error.details.rowsWritten).toBe(2);
    }
    expect(sink.text()).toBe('City Code,City,Observation\n0,London,4\n');
  });

  it('fails on more values than cells', async () => {
    const result = await graphQLJSONToCSV(
      tableBody({ dimensions: [dimension('city', ['London', 'Belfast'])], values: [4, 5, 6] }),
      new MemorySink()
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof TableError) {
      expect(result.error.kind).toBe('shape_mismatch');
      expect(result.error.message).toBe('table shape mismatch: more values than cells');
      expect(result.error.details.rowsWritten).toBe(3);
    }
  });

  it('rejects a non-integer observation', async () => {
    const result = await graphQLJSONToCSV(
      tableBody({ dimensions: [dimension('city', ['London'])], values: [1.5] }),
      new MemorySink()
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('invalid observation value: 1.5');
    }
  });

  it('maps a table error to a bad request', async () => {
    const result = await graphQLJSONToCSV(
      tableBody({ dimensions: [dimension('city', ['London'])], error: 'withinMaxCells' }),
      new MemorySink()
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ApiError);
      expect(result.error.message).toBe('GraphQL error: resulting dataset too large');
      expect(result.error instanceof ApiError && result.error.statusCode).toBe(400);
      expect(result.error instanceof ApiError && result.error.logData).toEqual({ rowsWritten: 0 });
    }
  });

  it('surfaces GraphQL errors with the status of the first one', async () => {
    const result = await graphQLJSONToCSV(chunkedBody(readFixture('dataset-not-loaded.json')), new MemorySink());

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof ApiError) {
      expect(result.error.message).toBe('error(s) returned by graphQL query');
      expect(result.error.statusCode).toBe(404);
      expect(result.error.logData.rowsWritten).toBe(0);
      expect(result.error.logData.errors).toEqual([
        {
          locations: [{ column: 2, line: 2 }],
          message: '404 Not Found: dataset not loaded in this server',
          path: ['dataset'],
        },
      ]);
    }
  });

  it('fails when the response has no table values', async () => {
    const result = await graphQLJSONToCSV(Readable.from(['{"data":{"dataset":null}}']), new MemorySink());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('response contains no table values');
    }
  });

  it('reports the row a sink write failed on', async () => {
    let writes = 0;
    const sink = {
      write: () => {
        writes++;
        if (writes === 3) {
          throw new Error('broken pipe');
        }
      },
    };

    const result = await graphQLJSONToCSV(chunkedBody(readFixture('static-dataset.json')), sink);

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof TableError) {
      expect(result.error.kind).toBe('sink');
      expect(result.error.message).toBe('error writing row 1: broken pipe');
      expect(result.error.details).toEqual({ phase: 'row', row: 1, rowsWritten: 2 });
    }
  });

  it('fails on invalid JSON', async () => {
    const result = await graphQLJSONToCSV(Readable.from(['{"data": nope}']), new MemorySink());

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof TableError) {
      expect(result.error.kind).toBe('malformed_stream');
      expect(result.error.message.startsWith('error decoding response: ')).toBe(true);
      expect(result.error.details.rowsWritten).toBe(0);
    }
  });

  it('fails when the body errors mid-stream', async () => {
    const body = new Readable({
      read() {
        this.destroy(new Error('socket hang up'));
      },
    });

    const result = await graphQLJSONToCSV(body, new MemorySink());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('error decoding response: socket hang up');
    }
  });
});
