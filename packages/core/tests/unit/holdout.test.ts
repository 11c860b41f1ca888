import { describe, expect, it, vi } from 'vitest';
import { NotFoundError, SchemaMismatchError, TypeMismatchError } from '@trialkey/utils';
import { createTable, defineHoldoutSet } from '../../src/index.js';
import type { Table, TableLoader } from '../../src/index.js';

const train = createTable(
  ['a', 'b', 'target'],
  [
    { a: 1, b: 2, target: 0 },
    { a: 3, b: 4, target: 1 },
    { a: 5, b: 6, target: 0 },
  ]
);

const failingLoader: TableLoader = (path) => {
  throw new NotFoundError('Dataset file', path);
};

describe('defineHoldoutSet', () => {
  it('should leave the holdout absent when none is given', () => {
    const result = defineHoldoutSet(null, train, 'target', failingLoader);

    expect(result.holdoutDataset).toBeNull();
    expect(result.trainDataset).toBe(train);
  });

  it('should use a table with matching columns as-is', () => {
    const holdout = createTable(['a', 'b', 'target'], [{ a: 7, b: 8, target: 1 }]);

    const result = defineHoldoutSet(holdout, train, 'target', failingLoader);

    expect(result.holdoutDataset).toBe(holdout);
    expect(result.trainDataset).toBe(train);
  });

  it('should ignore column order when comparing schemas', () => {
    const holdout = createTable(['target', 'b', 'a']);
    expect(defineHoldoutSet(holdout, train, 'target', failingLoader).holdoutDataset).toBe(holdout);
  });

  it('should replace both tables with the splitter result', () => {
    const splitter = vi.fn((dataset: Table, _targetColumn: string): [Table, Table] => [
      createTable(dataset.columns, dataset.rows.slice(0, 2)),
      createTable(dataset.columns, dataset.rows.slice(2)),
    ]);

    const result = defineHoldoutSet(splitter, train, 'target', failingLoader);

    expect(splitter).toHaveBeenCalledWith(train, 'target');
    expect(result.trainDataset.rows).toHaveLength(2);
    expect(result.holdoutDataset?.rows).toEqual([{ a: 5, b: 6, target: 0 }]);
  });

  it('should reject a splitter that does not return two tables', () => {
    const splitter = (): unknown => 'nope';
    expect(() => defineHoldoutSet(splitter, train, 'target', failingLoader)).toThrow(TypeMismatchError);
  });

  it('should load a path through the loader', () => {
    const holdout = createTable(['a', 'b', 'target']);
    const loader = vi.fn<TableLoader>(() => holdout);

    const result = defineHoldoutSet('holdout.csv', train, 'target', loader);

    expect(loader).toHaveBeenCalledWith('holdout.csv');
    expect(result.holdoutDataset).toBe(holdout);
  });

  it('should propagate a missing holdout file', () => {
    expect(() => defineHoldoutSet('missing.csv', train, 'target', failingLoader)).toThrow(NotFoundError);
  });

  it('should reject any other input type', () => {
    expect(() => defineHoldoutSet(42, train, 'target', failingLoader)).toThrow(
      'holdoutDataset must be one of: [null, Table, function, string], not number: 42'
    );
  });

  it('should report both schemas when the columns differ', () => {
    const holdout = createTable(['a', 'b']);

    let caught: unknown;
    try {
      defineHoldoutSet(holdout, train, 'target', failingLoader);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaMismatchError);
    const mismatch = caught instanceof SchemaMismatchError ? caught : null;
    expect(mismatch?.context).toEqual({ expectedColumnCount: 3, receivedColumnCount: 2 });
    expect(mismatch?.message).toBe(
      [
        'trainDataset and holdoutDataset must have the same columns. Instead,',
        'trainDataset had 3 columns: ["a", "b", "target"]',
        'holdoutDataset had 2 columns: ["a", "b"]',
      ].join('\n')
    );
  });
});
