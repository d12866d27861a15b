/**
 * Unit Tests: SourceConnector helpers
 */

import { inBatches, isEmptyValue, projectRow, restartable } from '../../../src/connectors/source-connector';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('source-connector helpers', () => {
  test('inBatches groups rows and keeps a short last batch', async () => {
    const rows = restartable(async function* () {
      yield* [1, 2, 3, 4, 5];
    });

    expect(await collect(inBatches(rows, 2))).toEqual([[1, 2], [3, 4], [5]]);
    await expect(collect(inBatches(rows, 0))).rejects.toThrow('batchSize must be at least 1, got 0');
  });

  test('restartable iterables read from the start every time', async () => {
    let starts = 0;
    const rows = restartable(async function* () {
      starts++;
      yield 'a';
      yield 'b';
    });

    expect(await collect(rows)).toEqual(['a', 'b']);
    expect(await collect(rows)).toEqual(['a', 'b']);
    expect(starts).toBe(2);
  });

  test('projectRow keeps only the selected columns and converts exotic values', () => {
    expect(projectRow({ a: 1, b: BigInt(5), c: { x: 1 }, skip: 'no' }, ['a', 'b', 'c', 'd'])).toEqual({
      a: 1,
      b: '5',
      c: '{"x":1}',
      d: null
    });
  });

  test('isEmptyValue', () => {
    expect(isEmptyValue(null)).toBe(true);
    expect(isEmptyValue(undefined)).toBe(true);
    expect(isEmptyValue('   ')).toBe(true);
    expect(isEmptyValue(Number.NaN)).toBe(true);
    expect(isEmptyValue(new Date('invalid'))).toBe(true);
    expect(isEmptyValue(0)).toBe(false);
    expect(isEmptyValue(false)).toBe(false);
  });
});
