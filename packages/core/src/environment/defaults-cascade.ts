/**
 * Defaults Cascade
 *
 * Resolves every environment option from three tiers, highest first:
 * 1. the value passed by the caller,
 * 2. the same key in the defaults file at `environmentParamsPath`,
 * 3. the module-level default table.
 * The first tier holding a non-null value wins; an option no tier supplies stays `null`.
 */

import { readFileSync } from 'fs';
import {
  NotFoundError,
  ParseError,
  TypeMismatchError,
  createPackageLogger,
  describeValue,
} from '@trialkey/utils';
import { firstSet, fromNullable } from '../maybe.js';
import type { ReportingSink } from '../reporting/reporting-sink.js';
import {
  CALLABLE_OPTION_KEYS,
  DefaultsFileSchema,
  ENVIRONMENT_OPTION_KEYS,
  createModuleDefaults,
  isEnvironmentOptionKey,
} from './options.js';
import type {
  EnvironmentOptionKey,
  EnvironmentOptionTypes,
  EnvironmentOptions,
  ModuleDefaults,
  ResolvedOptions,
} from './options.js';

const logger = createPackageLogger('@trialkey/core');

export type OptionSource = 'caller' | 'defaults-file' | 'module-default' | 'unset';

const TIERS: readonly OptionSource[] = ['caller', 'defaults-file', 'module-default'];

export interface OptionResolution {
  readonly options: ResolvedOptions;
  readonly sources: ReadonlyMap<EnvironmentOptionKey, OptionSource>;
}

function readDefaultsText(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    const code: unknown =
      typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
    if (code === 'ENOENT' || code === 'EISDIR') {
      throw new NotFoundError('Environment defaults file', path, { code });
    }
    throw error;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and decode the defaults file
 *
 * No path (`null`/`undefined`) means no defaults and is not an error. Unknown
 * keys are reported through `sink.warn` and dropped.
 *
 * @throws TypeMismatchError when the path is not a string, the content is not
 *   an object, or a value has the wrong type for its option
 * @throws NotFoundError when nothing exists at the path
 * @throws ParseError when the content is not JSON
 */
export function readEnvironmentDefaults(path: unknown, sink: ReportingSink): EnvironmentOptions {
  if (path === null || path === undefined) {
    return {};
  }
  if (typeof path !== 'string') {
    const [type, value] = describeValue(path);
    throw new TypeMismatchError(`environmentParamsPath must be a string, not ${type}: ${value}`, type);
  }

  const text = readDefaultsText(path);
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new ParseError(
      `Environment defaults file "${path}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  if (!isPlainRecord(decoded)) {
    const [type, value] = describeValue(decoded);
    throw new TypeMismatchError(
      `Environment defaults file "${path}" must contain an object. Received ${type}: ${value}`,
      type,
      { path }
    );
  }

  const known: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(decoded)) {
    if (!isEnvironmentOptionKey(key)) {
      sink.warn(
        [
          `Ignoring unrecognized key "${key}" in environment defaults file "${path}".`,
          `It has no effect and should be removed or corrected.`,
          `Valid keys: ${ENVIRONMENT_OPTION_KEYS.join(', ')}`,
        ].join('\n\t')
      );
      continue;
    }
    if (CALLABLE_OPTION_KEYS.includes(key) && value !== null) {
      const [type, rendered] = describeValue(value);
      throw new TypeMismatchError(
        `"${key}" only accepts a function or class and cannot be set from "${path}". Received ${type}: ${rendered}`,
        type,
        { path, option: key }
      );
    }
    known[key] = value;
  }

  const parsed = DefaultsFileSchema.safeParse(known);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const option = issue ? String(issue.path[0]) : 'unknown';
    const [type, rendered] = describeValue(known[option]);
    throw new TypeMismatchError(
      `Invalid value for "${option}" in environment defaults file "${path}" (${issue?.message ?? 'invalid'}). Received ${type}: ${rendered}`,
      type,
      { path, option }
    );
  }

  return parsed.data;
}

/**
 * Merge the three tiers into one resolved option set
 */
export function resolveEnvironmentOptions(
  callerOptions: EnvironmentOptions,
  fileOptions: EnvironmentOptions = {},
  moduleDefaults: ModuleDefaults = createModuleDefaults()
): OptionResolution {
  const sources = new Map<EnvironmentOptionKey, OptionSource>();

  const resolve = <K extends EnvironmentOptionKey>(key: K): EnvironmentOptionTypes[K] | null => {
    const winner = firstSet<EnvironmentOptionTypes[K]>([
      fromNullable<EnvironmentOptionTypes[K]>(callerOptions[key]),
      fromNullable<EnvironmentOptionTypes[K]>(fileOptions[key]),
      fromNullable<EnvironmentOptionTypes[K]>(moduleDefaults[key]),
    ]);
    const source = winner ? (TIERS[winner.index] ?? 'unset') : 'unset';
    sources.set(key, source);
    if (source === 'defaults-file') {
      logger.debug('Environment option set from defaults file', { option: key });
    }
    return winner ? winner.value : null;
  };

  const options: ResolvedOptions = {
    rootResultsPath: resolve('rootResultsPath'),
    holdoutDataset: resolve('holdoutDataset'),
    testDataset: resolve('testDataset'),
    targetColumn: resolve('targetColumn'),
    idColumn: resolve('idColumn'),
    doPredictProba: resolve('doPredictProba'),
    predictionFormatter: resolve('predictionFormatter'),
    metricsMap: resolve('metricsMap'),
    metricsParams: resolve('metricsParams'),
    crossValidationType: resolve('crossValidationType'),
    runs: resolve('runs'),
    globalRandomSeed: resolve('globalRandomSeed'),
    randomSeeds: resolve('randomSeeds'),
    randomSeedBounds: resolve('randomSeedBounds'),
    crossValidationParams: resolve('crossValidationParams'),
    verbose: resolve('verbose'),
    fileBlacklist: resolve('fileBlacklist'),
    reportingHandlerParams: resolve('reportingHandlerParams'),
    toCsvParams: resolve('toCsvParams'),
    doFullSave: resolve('doFullSave'),
    experimentCallbacks: resolve('experimentCallbacks'),
  };

  return { options, sources };
}
