import { describe, expect, it } from 'vitest';

import { createIterator, normalizeDimensions, type DimensionIterator } from '../dimensions.js';
import type { Dimension } from '../types.js';

import { cityBySiblings, dimension } from './fixtures/index.js';

function iteratorFor(dimensions: Dimension[], signal?: AbortSignal): DimensionIterator {
  const result = createIterator(dimensions, signal);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

function visitAll(iterator: DimensionIterator): number[][] {
  const visited: number[][] = [];
  while (!iterator.end()) {
    visited.push(iterator.coordinates());
    const advanced = iterator.next();
    if (advanced.isErr()) {
      throw advanced.error;
    }
  }
  return visited;
}

describe('createIterator', () => {
  it('rejects an empty dimension list', () => {
    const result = createIterator([]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('empty_dimensions');
    }
  });

  it('starts at the first cell', () => {
    const iterator = iteratorFor(cityBySiblings().dimensions);

    expect(iterator.end()).toBe(false);
    expect(iterator.coordinates()).toEqual([0, 0]);
  });
});

describe('DimensionIterator', () => {
  it('visits every cell exactly once', () => {
    const dimensions = [
      dimension('region', ['North', 'South']),
      dimension('age', ['0-15', '16-64', '65+']),
      dimension('sex', ['F', 'M']),
    ];

    const visited = visitAll(iteratorFor(dimensions));

    expect(visited).toHaveLength(12);
    expect(new Set(visited.map((coordinates) => coordinates.join(','))).size).toBe(12);
  });

  it('walks a two-dimension table in row-major order', () => {
    const visited = visitAll(iteratorFor(cityBySiblings().dimensions));

    expect(visited).toHaveLength(21);
    visited.forEach((coordinates, k) => {
      expect(coordinates).toEqual([Math.floor(k / 7), k % 7]);
    });
  });

  it('scans a single dimension linearly', () => {
    const visited = visitAll(iteratorFor([dimension('city', ['London', 'Liverpool', 'Belfast'])]));

    expect(visited).toEqual([[0], [1], [2]]);
  });

  it('is ended from the start when any dimension has no categories', () => {
    const iterator = iteratorFor([dimension('city', ['London']), dimension('siblings', [])]);

    expect(iterator.end()).toBe(true);
    expect(iterator.next().isErr()).toBe(true);
  });

  it('fails to advance after the end', () => {
    const iterator = iteratorFor([dimension('city', ['London'])]);
    expect(iterator.next().isOk()).toBe(true);

    const result = iterator.next();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('after_end');
      expect(result.error.message).toBe('after end of table');
    }
  });

  it('returns the same category until next is called', () => {
    const iterator = iteratorFor(cityBySiblings().dimensions);
    iterator.next();
    iterator.next();

    const first = iterator.categoryAtColumn(1);
    const second = iterator.categoryAtColumn(1);

    expect(first.isOk() && first.value).toEqual({ code: '2', label: '2 siblings' });
    expect(second.isOk() && second.value).toEqual({ code: '2', label: '2 siblings' });
    const city = iterator.categoryAtColumn(0);
    expect(city.isOk() && city.value).toEqual({ code: '0', label: 'London' });
  });

  it('rejects a column outside the table', () => {
    const iterator = iteratorFor(cityBySiblings().dimensions);

    const result = iterator.categoryAtColumn(2);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('column_out_of_range');
      expect(result.error.details.column).toBe(2);
    }
  });

  it('refuses categories after the end', () => {
    const iterator = iteratorFor([dimension('city', ['London'])]);
    iterator.next();

    const result = iterator.categoryAtColumn(0);

    expect(result.isErr() && result.error.kind).toBe('after_end');
  });

  it('checks the signal before moving', () => {
    const controller = new AbortController();
    const iterator = iteratorFor(cityBySiblings().dimensions, controller.signal);
    iterator.next();
    controller.abort(new Error('client disconnected'));

    const result = iterator.next();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('canceled');
      expect(result.error.cause).toEqual(new Error('client disconnected'));
    }
    expect(iterator.coordinates()).toEqual([0, 1]);
  });

  it('does not expose its internal state through coordinates', () => {
    const iterator = iteratorFor(cityBySiblings().dimensions);

    iterator.coordinates()[0] = 2;

    expect(iterator.coordinates()).toEqual([0, 0]);
  });
});

describe('normalizeDimensions', () => {
  it('derives a missing count from the categories', () => {
    const result = normalizeDimensions([
      { categories: [{ code: '0', label: 'London' }], variable: { label: 'City', name: 'city' } },
    ]);

    expect(result.isOk() && result.value[0]?.count).toBe(1);
  });

  it('rejects a count that disagrees with the categories', () => {
    const result = normalizeDimensions([
      { categories: [{ code: '0', label: 'London' }], count: 3, variable: { label: 'City', name: 'city' } },
    ]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('count_mismatch');
      expect(result.error.message).toBe('dimension city has count 3 but 1 categories');
    }
  });
});
