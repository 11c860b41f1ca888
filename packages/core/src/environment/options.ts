/**
 * Environment options
 *
 * The closed set of keyword options an Environment accepts, their value types,
 * the module-level default table, and the schema for values read from a
 * defaults file.
 */

import { z } from 'zod';
import type { Table } from '../data/table.js';
import type { LifecycleExtensionClass } from '../extensions/lifecycle.js';
import type { MetricsMap, MetricsParams } from '../metrics.js';
import { defaultDoFullSave, formatPredictions } from '../predictions.js';
import type { DoFullSave, PredictionFormatter } from '../predictions.js';
import { ReportingHandlerParamsSchema } from '../reporting/reporting-handler.js';
import type { ReportingHandlerParams } from '../reporting/reporting-handler.js';
import { KFold } from '../splitters/kfold.js';
import type { SplitterClass } from '../splitters/kfold.js';

/**
 * Splits the training table into a new training table and a holdout table
 */
export type HoldoutSplitter = (trainDataset: Table, targetColumn: string) => readonly [Table, Table];

/**
 * A dataset given directly as a table or as a path to load
 */
export type DatasetInput = Table | string;

export type HoldoutInput = DatasetInput | HoldoutSplitter;

export const BLACKLIST_ALL = 'ALL';

export type FileBlacklistInput = typeof BLACKLIST_ALL | readonly string[];

/**
 * Seeds shaped (repetitions, folds, runs)
 */
export type RandomSeeds = readonly (readonly (readonly number[])[])[];

export type ExperimentCallbacksInput = LifecycleExtensionClass | readonly LifecycleExtensionClass[];

export const ENVIRONMENT_OPTION_KEYS = [
  'rootResultsPath',
  'holdoutDataset',
  'testDataset',
  'targetColumn',
  'idColumn',
  'doPredictProba',
  'predictionFormatter',
  'metricsMap',
  'metricsParams',
  'crossValidationType',
  'runs',
  'globalRandomSeed',
  'randomSeeds',
  'randomSeedBounds',
  'crossValidationParams',
  'verbose',
  'fileBlacklist',
  'reportingHandlerParams',
  'toCsvParams',
  'doFullSave',
  'experimentCallbacks',
] as const;

export type EnvironmentOptionKey = (typeof ENVIRONMENT_OPTION_KEYS)[number];

export interface EnvironmentOptionTypes {
  rootResultsPath: string;
  holdoutDataset: HoldoutInput;
  testDataset: DatasetInput;
  targetColumn: string;
  idColumn: string;
  doPredictProba: boolean;
  predictionFormatter: PredictionFormatter;
  metricsMap: MetricsMap;
  metricsParams: MetricsParams;
  crossValidationType: SplitterClass;
  runs: number;
  globalRandomSeed: number;
  randomSeeds: RandomSeeds;
  randomSeedBounds: readonly [number, number];
  crossValidationParams: Readonly<Record<string, unknown>>;
  verbose: boolean;
  fileBlacklist: FileBlacklistInput;
  reportingHandlerParams: ReportingHandlerParams;
  toCsvParams: Readonly<Record<string, unknown>>;
  doFullSave: DoFullSave;
  experimentCallbacks: ExperimentCallbacksInput;
}

/**
 * Options as supplied by a caller or a defaults file; `null`/missing means "not given"
 */
export type EnvironmentOptions = {
  [K in EnvironmentOptionKey]?: EnvironmentOptionTypes[K] | null;
};

/**
 * Every option after the cascade; `null` only where no tier supplied a value
 */
export type ResolvedOptions = {
  [K in EnvironmentOptionKey]: EnvironmentOptionTypes[K] | null;
};

export type ModuleDefaults = {
  [K in EnvironmentOptionKey]?: EnvironmentOptionTypes[K];
};

export function isEnvironmentOptionKey(key: string): key is EnvironmentOptionKey {
  return ENVIRONMENT_OPTION_KEYS.some((optionKey) => optionKey === key);
}

/**
 * Module-level default table. Built fresh on every call so no two
 * environments share a mutable default.
 */
export function createModuleDefaults(): ModuleDefaults {
  return {
    targetColumn: 'target',
    doPredictProba: false,
    predictionFormatter: formatPredictions,
    metricsParams: {},
    crossValidationType: KFold,
    runs: 1,
    globalRandomSeed: 32,
    randomSeedBounds: [0, 100000],
    crossValidationParams: {},
    verbose: true,
    reportingHandlerParams: {
      heartbeatPath: null,
      floatDigits: 5,
      consoleParams: null,
      heartbeatParams: null,
    },
    toCsvParams: {},
    doFullSave: defaultDoFullSave,
    experimentCallbacks: [],
  };
}

/**
 * Options that only take functions or classes, so a defaults file cannot express them
 */
export const CALLABLE_OPTION_KEYS: readonly EnvironmentOptionKey[] = [
  'predictionFormatter',
  'crossValidationType',
  'doFullSave',
  'experimentCallbacks',
];

const MetricsMapSchema = z.union([
  z.array(z.string()),
  z.record(z.string(), z.string().nullable()),
]);

/**
 * Values a JSON defaults file may hold, one field per JSON-representable option
 */
export const DefaultsFileSchema = z.object({
  rootResultsPath: z.string().nullable().optional(),
  holdoutDataset: z.string().nullable().optional(),
  testDataset: z.string().nullable().optional(),
  targetColumn: z.string().nullable().optional(),
  idColumn: z.string().nullable().optional(),
  doPredictProba: z.boolean().nullable().optional(),
  metricsMap: MetricsMapSchema.nullable().optional(),
  metricsParams: z.record(z.string(), z.unknown()).nullable().optional(),
  runs: z.number().int().positive().nullable().optional(),
  globalRandomSeed: z.number().int().nullable().optional(),
  randomSeeds: z.array(z.array(z.array(z.number().int()))).nullable().optional(),
  randomSeedBounds: z.tuple([z.number().int(), z.number().int()]).nullable().optional(),
  crossValidationParams: z.record(z.string(), z.unknown()).nullable().optional(),
  verbose: z.boolean().nullable().optional(),
  fileBlacklist: z
    .union([z.literal(BLACKLIST_ALL), z.array(z.string())])
    .nullable()
    .optional(),
  reportingHandlerParams: ReportingHandlerParamsSchema.nullable().optional(),
  toCsvParams: z.record(z.string(), z.unknown()).nullable().optional(),
});

export type DefaultsFileOptions = z.infer<typeof DefaultsFileSchema>;
