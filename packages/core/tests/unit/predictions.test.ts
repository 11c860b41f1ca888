import { describe, expect, it } from 'vitest';
import { ValidationError } from '@trialkey/utils';
import { createTable, defaultDoFullSave, formatPredictions } from '../../src/index.js';

const dataset = createTable(
  ['id', 'x', 'target'],
  [
    { id: 'a', x: 1, target: 0 },
    { id: 'b', x: 2, target: 1 },
  ]
);

describe('formatPredictions', () => {
  it('should put one-dimensional predictions under the target column', () => {
    expect(formatPredictions([0.25, 0.75], dataset, 'target', null)).toEqual({
      columns: ['target'],
      rows: [{ target: 0.25 }, { target: 0.75 }],
    });
  });

  it('should copy the id column when given', () => {
    expect(formatPredictions([0.25, 0.75], dataset, 'target', 'id')).toEqual({
      columns: ['id', 'target'],
      rows: [
        { id: 'a', target: 0.25 },
        { id: 'b', target: 0.75 },
      ],
    });
  });

  it('should number the columns of two-dimensional predictions', () => {
    expect(formatPredictions([[0.9, 0.1], [0.2, 0.8]], dataset, 'target', null)).toEqual({
      columns: ['target_0', 'target_1'],
      rows: [
        { target_0: 0.9, target_1: 0.1 },
        { target_0: 0.2, target_1: 0.8 },
      ],
    });
  });

  it('should reject a prediction count that does not match the dataset', () => {
    expect(() => formatPredictions([0.5], dataset, 'target', null)).toThrow(ValidationError);
    expect(() => formatPredictions([0.5], dataset, 'target', null)).toThrow(
      'Received 1 predictions for a dataset of 2 rows'
    );
  });
});

describe('defaultDoFullSave', () => {
  it('should always save', () => {
    expect(defaultDoFullSave({ score: 0 })).toBe(true);
  });
});
