import { Readable, type Writable } from 'node:stream';

import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { streamThrough, type Consumer, type Transformer } from '../stream.js';

function write(output: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(chunk, (error) => (error ? reject(error) : resolve()));
  });
}

const upperCase: Transformer = async (input, output) => {
  for await (const chunk of input) {
    await write(output, String(chunk).toUpperCase());
  }
  return ok(undefined);
};

function collect(into: string[]): Consumer {
  return async (input) => {
    for await (const chunk of input) {
      into.push(String(chunk));
    }
  };
}

describe('streamThrough', () => {
  it('runs the transform and the consumer over the same bytes', async () => {
    const received: string[] = [];

    const result = await streamThrough(Readable.from(['a,b\n', 'c,d\n']), upperCase, collect(received));

    expect(result.isOk()).toBe(true);
    expect(received.join('')).toBe('A,B\nC,D\n');
  });

  it('reports a transform failure and fails the consumer read', async () => {
    const failing: Transformer = async (_input, output) => {
      await write(output, 'partial');
      return err(new Error('bad token'));
    };

    const result = await streamThrough(Readable.from(['x']), failing, collect([]));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('transform error: bad token, consumer error: bad token');
    }
  });

  it('reports a consumer failure', async () => {
    const consumer: Consumer = async (input) => {
      for await (const chunk of input) {
        if (String(chunk).length > 0) {
          throw new Error('disk full');
        }
      }
    };

    const result = await streamThrough(Readable.from(['a', 'b', 'c']), upperCase, consumer);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      // The transform may finish before the consumer fails, so only the consumer part is fixed
      expect(result.error.message.endsWith('consumer error: disk full')).toBe(true);
    }
  });

  it('destroys the source body once the transform returns', async () => {
    const body = Readable.from(['a']);

    await streamThrough(body, upperCase, collect([]));

    expect(body.destroyed).toBe(true);
  });
});
