/**
 * @trialkey/core
 *
 * Experiment environment: option resolution, validation, holdout derivation,
 * result path planning and the cross-experiment key.
 */

// ============================================================================
// Environment
// ============================================================================

export { Environment, ENVIRONMENT_STAGES } from './environment/environment.js';
export type { EnvironmentDependencies, EnvironmentInit, EnvironmentStage } from './environment/environment.js';
export { EnvironmentRegistry } from './environment/registry.js';
export type { RegistrableEnvironment } from './environment/registry.js';
export {
  BLACKLIST_ALL,
  CALLABLE_OPTION_KEYS,
  DefaultsFileSchema,
  ENVIRONMENT_OPTION_KEYS,
  createModuleDefaults,
  isEnvironmentOptionKey,
} from './environment/options.js';
export type {
  DatasetInput,
  DefaultsFileOptions,
  EnvironmentOptionKey,
  EnvironmentOptionTypes,
  EnvironmentOptions,
  ExperimentCallbacksInput,
  FileBlacklistInput,
  HoldoutInput,
  HoldoutSplitter,
  ModuleDefaults,
  RandomSeeds,
  ResolvedOptions,
} from './environment/options.js';
export { readEnvironmentDefaults, resolveEnvironmentOptions } from './environment/defaults-cascade.js';
export type { OptionResolution, OptionSource } from './environment/defaults-cascade.js';
export {
  EXPORT_TARGET_KEYS,
  mergeMetricsParams,
  normalizeExperimentCallbacks,
  normalizeRootResultsPath,
  validateParameters,
} from './environment/validation.js';
export type { CrossExperimentParams, ValidatedParameters, ValidationContext } from './environment/validation.js';
export { BLACKLIST_CATEGORIES, isBlacklistCategory, validateFileBlacklist } from './environment/blacklist.js';
export type { BlacklistCategory, FileBlacklist } from './environment/blacklist.js';
export { defineHoldoutSet } from './environment/holdout.js';
export type { HoldoutDerivation } from './environment/holdout.js';
export { createEmptyResultPaths, planResultPaths } from './environment/result-paths.js';
export type { ResultPathPlan, ResultPathPlanInput, ResultPaths } from './environment/result-paths.js';

// ============================================================================
// Layout
// ============================================================================

export {
  ASSETS_DIRNAME,
  HEARTBEAT_FILENAME,
  RESULT_FILE_SUB_DIR_PATHS,
  RESULT_PATH_KEYS,
} from './settings.js';
export type { ResultFileKey, ResultPathKey } from './settings.js';

// ============================================================================
// Data, identity and collaborators
// ============================================================================

export { createTable, haveSameColumnSet, isTable } from './data/table.js';
export type { CellValue, Row, Table, TableLoader } from './data/table.js';
export { loadTable } from './data/csv-loader.js';
export { CrossExperimentKeyMaker, crossExperimentKeyMaker } from './identity/key-maker.js';
export type { IdentityProjection, KeyMaker } from './identity/key-maker.js';
export { canonicalStringify } from './identity/canonical.js';
export { DeferredReportingSink } from './reporting/reporting-sink.js';
export type { ReportLevel, ReportingSink } from './reporting/reporting-sink.js';
export { ReportingHandler, ReportingHandlerParamsSchema } from './reporting/reporting-handler.js';
export type { ReportingHandlerOptions, ReportingHandlerParams } from './reporting/reporting-handler.js';
export { isLifecycleExtensionClass, lambdaCallback } from './extensions/lifecycle.js';
export type {
  LifecycleExtension,
  LifecycleExtensionClass,
  LifecycleHook,
  LifecycleHooks,
} from './extensions/lifecycle.js';
export { KFold, KFoldParamsSchema } from './splitters/kfold.js';
export type { Fold, KFoldParams, Splitter, SplitterClass } from './splitters/kfold.js';
export { defaultDoFullSave, formatPredictions } from './predictions.js';
export type { DoFullSave, PredictionFormatter, RawPredictions } from './predictions.js';
export { METRICS_MAP_KEY } from './metrics.js';
export type { MetricFunction, MetricSpec, MetricsMap, MetricsParams } from './metrics.js';
export { UNSET, firstSet, fromNullable, some } from './maybe.js';
export type { Maybe } from './maybe.js';
