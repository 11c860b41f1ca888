/**
 * Environment parameter validation
 *
 * Checks the resolved options beyond their types and brings them into canonical
 * form: the results root gains the assets directory, dataset paths become
 * tables, the metrics registry is folded into `metricsParams`, and the
 * cross-experiment parameters are frozen for fingerprinting.
 */

import { mkdirSync } from 'fs';
import { basename, join } from 'path';
import {
  MissingRequiredInputError,
  MutualExclusionError,
  TypeMismatchError,
  ValidationError,
  describeValue,
} from '@trialkey/utils';
import { isTable } from '../data/table.js';
import type { Table, TableLoader } from '../data/table.js';
import { isLifecycleExtensionClass } from '../extensions/lifecycle.js';
import type { LifecycleExtensionClass } from '../extensions/lifecycle.js';
import { METRICS_MAP_KEY } from '../metrics.js';
import type { MetricsMap, MetricsParams } from '../metrics.js';
import type { DoFullSave, PredictionFormatter } from '../predictions.js';
import type { ReportingHandlerParams } from '../reporting/reporting-handler.js';
import type { ReportingSink } from '../reporting/reporting-sink.js';
import { ASSETS_DIRNAME } from '../settings.js';
import type { SplitterClass } from '../splitters/kfold.js';
import { validateFileBlacklist } from './blacklist.js';
import type { FileBlacklist } from './blacklist.js';
import type { RandomSeeds, ResolvedOptions } from './options.js';

/**
 * Keys naming a write target; writers always supply their own
 */
export const EXPORT_TARGET_KEYS: readonly string[] = ['path', 'pathOrBuf'];

export interface CrossExperimentParams {
  readonly crossValidationType: SplitterClass;
  readonly runs: number;
  readonly globalRandomSeed: number;
  readonly randomSeeds: RandomSeeds | null;
  readonly randomSeedBounds: readonly [number, number];
}

export interface ValidationContext {
  /** Table, or path to load */
  trainDataset: unknown;
  loadTable: TableLoader;
  sink: ReportingSink;
}

export interface ValidatedParameters {
  rootResultsPath: string | null;
  verbose: boolean;
  fileBlacklist: FileBlacklist;
  trainDataset: Table;
  testDataset: Table | null;
  targetColumn: string;
  idColumn: string | null;
  doPredictProba: boolean;
  predictionFormatter: PredictionFormatter;
  metricsMap: MetricsMap;
  metricsParams: MetricsParams;
  crossValidationParams: Readonly<Record<string, unknown>>;
  reportingHandlerParams: ReportingHandlerParams;
  toCsvParams: Readonly<Record<string, unknown>>;
  doFullSave: DoFullSave;
  crossExperimentParams: CrossExperimentParams;
  experimentCallbacks: readonly LifecycleExtensionClass[];
}

/**
 * `null` warns that nothing will be stored; a string gains the assets
 * directory (unless it already ends with it) and is created on disk.
 */
export function normalizeRootResultsPath(value: unknown, sink: ReportingSink): string | null {
  if (value === null || value === undefined) {
    sink.warn('Received rootResultsPath=null. Results will not be stored at all.');
    return null;
  }
  if (typeof value !== 'string') {
    const [type, rendered] = describeValue(value);
    throw new TypeMismatchError(`rootResultsPath must be null or a string, not ${type}: ${rendered}`, type);
  }

  const root = basename(value) === ASSETS_DIRNAME ? value : join(value, ASSETS_DIRNAME);
  mkdirSync(root, { recursive: true });
  return root;
}

export function validateVerbose(value: unknown): boolean {
  if (typeof value !== 'boolean') {
    const [type, rendered] = describeValue(value);
    throw new TypeMismatchError(`verbose must be a boolean. Received ${type}: ${rendered}`, type);
  }
  return value;
}

/**
 * Tables pass through, strings are loaded, `null` stays absent
 */
export function materializeDataset(
  value: unknown,
  name: string,
  loadTable: TableLoader
): Table | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return loadTable(value);
  }
  if (isTable(value)) {
    return value;
  }
  const [type, rendered] = describeValue(value);
  throw new TypeMismatchError(`${name} must be one of: [null, Table, string], not ${type}: ${rendered}`, type);
}

function isMetricsMap(value: unknown): value is MetricsMap {
  if (Array.isArray(value)) {
    const entries: unknown[] = value;
    return entries.every((entry) => typeof entry === 'string');
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return Object.values(value).every(
    (spec) => spec === null || typeof spec === 'string' || typeof spec === 'function'
  );
}

/**
 * Enforce that the metrics registry comes from exactly one place, then fold it
 * into the parameters under `metricsMap`.
 *
 * @throws MutualExclusionError when given both directly and nested
 * @throws MissingRequiredInputError when given in neither place
 */
export function mergeMetricsParams(
  metricsMap: MetricsMap | null,
  metricsParams: MetricsParams | null
): { metricsMap: MetricsMap; metricsParams: MetricsParams } {
  const params = metricsParams ?? {};
  const nested: unknown = Object.hasOwn(params, METRICS_MAP_KEY) ? params[METRICS_MAP_KEY] : undefined;
  const hasNested = nested !== undefined && nested !== null;

  if (metricsMap !== null && hasNested) {
    throw new MutualExclusionError(
      [
        `metricsMap may be given directly, or as a key in metricsParams, but NOT BOTH. Received:`,
        `metricsMap=${describeValue(metricsMap)[1]}`,
        `metricsParams=${describeValue(params)[1]}`,
      ].join('\n '),
      ['metricsMap', `metricsParams.${METRICS_MAP_KEY}`]
    );
  }

  const registry: unknown = metricsMap ?? nested;
  if (registry === null || registry === undefined) {
    throw new MissingRequiredInputError(
      'metricsMap is required: give it directly, or as a key in metricsParams',
      'metricsMap'
    );
  }
  if (!isMetricsMap(registry)) {
    const [type, rendered] = describeValue(registry);
    throw new TypeMismatchError(
      `metricsMap must be a list of metric names or an object of metric specs, not ${type}: ${rendered}`,
      type
    );
  }

  return {
    metricsMap: registry,
    metricsParams: { ...params, [METRICS_MAP_KEY]: registry },
  };
}

export function stripExportTarget(
  toCsvParams: Readonly<Record<string, unknown>> | null
): Readonly<Record<string, unknown>> {
  return Object.fromEntries(
    Object.entries(toCsvParams ?? {}).filter(([key]) => !EXPORT_TARGET_KEYS.includes(key))
  );
}

export function requireResolved<T>(value: T | null, key: string): T {
  if (value === null) {
    throw new MissingRequiredInputError(`${key} has no value and no default`, key);
  }
  return value;
}

/**
 * Deep copy, so later changes to the caller's arrays cannot reach the snapshot
 */
function freezeRandomSeeds(seeds: RandomSeeds | null): RandomSeeds | null {
  if (seeds === null) {
    return null;
  }
  return Object.freeze(
    seeds.map((repetition) => Object.freeze(repetition.map((fold) => Object.freeze([...fold]))))
  );
}

export function snapshotCrossExperimentParams(options: ResolvedOptions): CrossExperimentParams {
  const randomSeedBounds = requireResolved(options.randomSeedBounds, 'randomSeedBounds');
  return Object.freeze({
    crossValidationType: requireResolved(options.crossValidationType, 'crossValidationType'),
    runs: requireResolved(options.runs, 'runs'),
    globalRandomSeed: requireResolved(options.globalRandomSeed, 'globalRandomSeed'),
    randomSeeds: freezeRandomSeeds(options.randomSeeds),
    randomSeedBounds: Object.freeze([randomSeedBounds[0], randomSeedBounds[1]] as const),
  });
}

/**
 * A single extension becomes a one-element list; every entry must be a class
 * carrying the lifecycle extension marker.
 */
export function normalizeExperimentCallbacks(value: unknown): LifecycleExtensionClass[] {
  if (value === null || value === undefined) {
    return [];
  }
  const entries: unknown[] = Array.isArray(value) ? value : [value];

  return entries.map((entry) => {
    if (typeof entry !== 'function') {
      const [type, rendered] = describeValue(entry);
      throw new TypeMismatchError(`experimentCallbacks must be classes. Received ${type}: ${rendered}`, type);
    }
    if (!isLifecycleExtensionClass(entry)) {
      throw new ValidationError(
        `experimentCallbacks must be lifecycle extension classes (see lambdaCallback), not ${entry.name || 'anonymous'}`,
        { callback: entry.name }
      );
    }
    return entry;
  });
}

export function validateParameters(
  options: ResolvedOptions,
  context: ValidationContext
): ValidatedParameters {
  const rootResultsPath = normalizeRootResultsPath(options.rootResultsPath, context.sink);
  const verbose = validateVerbose(options.verbose);
  const fileBlacklist = validateFileBlacklist(options.fileBlacklist, context.sink);

  const trainDataset = materializeDataset(context.trainDataset, 'trainDataset', context.loadTable);
  if (trainDataset === null) {
    throw new MissingRequiredInputError('trainDataset is required', 'trainDataset');
  }
  const testDataset = materializeDataset(options.testDataset, 'testDataset', context.loadTable);

  const { metricsMap, metricsParams } = mergeMetricsParams(options.metricsMap, options.metricsParams);

  return {
    rootResultsPath,
    verbose,
    fileBlacklist,
    trainDataset,
    testDataset,
    targetColumn: requireResolved(options.targetColumn, 'targetColumn'),
    idColumn: options.idColumn,
    doPredictProba: requireResolved(options.doPredictProba, 'doPredictProba'),
    predictionFormatter: requireResolved(options.predictionFormatter, 'predictionFormatter'),
    metricsMap,
    metricsParams,
    crossValidationParams: requireResolved(options.crossValidationParams, 'crossValidationParams'),
    reportingHandlerParams: requireResolved(options.reportingHandlerParams, 'reportingHandlerParams'),
    toCsvParams: stripExportTarget(options.toCsvParams),
    doFullSave: requireResolved(options.doFullSave, 'doFullSave'),
    crossExperimentParams: snapshotCrossExperimentParams(options),
    experimentCallbacks: normalizeExperimentCallbacks(options.experimentCallbacks),
  };
}
