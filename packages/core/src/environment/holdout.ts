/**
 * Holdout set derivation
 */

import { SchemaMismatchError, TypeMismatchError, describeValue } from '@trialkey/utils';
import { haveSameColumnSet, isTable } from '../data/table.js';
import type { Table, TableLoader } from '../data/table.js';

export interface HoldoutDerivation {
  readonly trainDataset: Table;
  readonly holdoutDataset: Table | null;
}

function renderColumns(columns: readonly string[]): string {
  return `[${columns.map((column) => JSON.stringify(column)).join(', ')}]`;
}

/**
 * Produce the final train/holdout pair from a holdout input
 *
 * - `null` → no holdout
 * - function → called with `(trainDataset, targetColumn)`, returns `[train, holdout]`
 * - string → loaded through `loadTable`
 * - table → used as-is
 *
 * @throws TypeMismatchError for any other input, or a splitter that does not return two tables
 * @throws SchemaMismatchError when holdout and train columns differ
 */
export function defineHoldoutSet(
  holdoutInput: unknown,
  trainDataset: Table,
  targetColumn: string,
  loadTable: TableLoader
): HoldoutDerivation {
  let train = trainDataset;
  let holdout: Table | null;

  if (holdoutInput === null || holdoutInput === undefined) {
    holdout = null;
  } else if (typeof holdoutInput === 'function') {
    const result: unknown = holdoutInput(trainDataset, targetColumn);
    if (!Array.isArray(result) || result.length !== 2 || !isTable(result[0]) || !isTable(result[1])) {
      const [type, rendered] = describeValue(result);
      throw new TypeMismatchError(
        `holdoutDataset function must return [trainDataset, holdoutDataset] tables. Received ${type}: ${rendered}`,
        type
      );
    }
    [train, holdout] = [result[0], result[1]];
  } else if (typeof holdoutInput === 'string') {
    holdout = loadTable(holdoutInput);
  } else if (isTable(holdoutInput)) {
    holdout = holdoutInput;
  } else {
    const [type, rendered] = describeValue(holdoutInput);
    throw new TypeMismatchError(
      `holdoutDataset must be one of: [null, Table, function, string], not ${type}: ${rendered}`,
      type
    );
  }

  if (holdout !== null && !haveSameColumnSet(train, holdout)) {
    throw new SchemaMismatchError(
      [
        'trainDataset and holdoutDataset must have the same columns. Instead,',
        `trainDataset had ${train.columns.length} columns: ${renderColumns(train.columns)}`,
        `holdoutDataset had ${holdout.columns.length} columns: ${renderColumns(holdout.columns)}`,
      ].join('\n'),
      train.columns,
      holdout.columns
    );
  }

  return { trainDataset: train, holdoutDataset: holdout };
}
