/**
 * Prediction formatting and result-saving predicates
 */

import { ValidationError } from '@trialkey/utils';
import type { CellValue, Row, Table } from './data/table.js';

export type RawPredictions = ReadonlyArray<number | readonly number[]>;

/**
 * Turns raw model output into a predictions table for `dataset`
 */
export type PredictionFormatter = (
  rawPredictions: RawPredictions,
  dataset: Table,
  targetColumn: string,
  idColumn: string | null
) => Table;

/**
 * Decides whether an experiment's full result set is saved, given its description
 */
export type DoFullSave = (resultDescription: Readonly<Record<string, unknown>>) => boolean;

/**
 * Default prediction formatter
 *
 * Copies `idColumn` from `dataset` when given. One-dimensional predictions go
 * under `targetColumn`; two-dimensional predictions (e.g. class probabilities)
 * go under `<targetColumn>_<i>`.
 */
export const formatPredictions: PredictionFormatter = (
  rawPredictions,
  dataset,
  targetColumn,
  idColumn
) => {
  if (rawPredictions.length !== dataset.rows.length) {
    throw new ValidationError(
      `Received ${rawPredictions.length} predictions for a dataset of ${dataset.rows.length} rows`,
      { predictions: rawPredictions.length, rows: dataset.rows.length }
    );
  }

  const width = predictionWidth(rawPredictions);
  const predictionColumns =
    width === null
      ? [targetColumn]
      : Array.from({ length: width }, (_, index) => `${targetColumn}_${index}`);
  const columns = idColumn === null ? predictionColumns : [idColumn, ...predictionColumns];

  const rows = rawPredictions.map((prediction, rowIndex): Row => {
    const row: Row = {};
    if (idColumn !== null) {
      const idValue: CellValue | undefined = dataset.rows[rowIndex]?.[idColumn];
      row[idColumn] = idValue ?? null;
    }
    if (typeof prediction === 'number') {
      row[targetColumn] = prediction;
    } else {
      prediction.forEach((value, index) => {
        row[`${targetColumn}_${index}`] = value;
      });
    }
    return row;
  });

  return { columns, rows };
};

function predictionWidth(rawPredictions: RawPredictions): number | null {
  const first = rawPredictions[0];
  if (first === undefined || typeof first === 'number') {
    return null;
  }
  return first.length;
}

export const defaultDoFullSave: DoFullSave = () => true;
