/**
 * Experiment Environment
 *
 * Resolves, validates and plans everything an experiment needs before it
 * runs, then fingerprints the result into a cross-experiment key. Experiments
 * built from equal environments share a key, so their results can be grouped
 * and looked up by configuration.
 *
 * Construction walks a fixed sequence of stages:
 *
 *   resolving → validating → deriving-holdout → planning-paths → fingerprinting → ready
 *
 * Each transition happens once, in order. Any failure aborts construction;
 * directories already created for the results root stay on disk.
 */

import { join } from 'path';
import { ConfigurationError, createPackageLogger } from '@trialkey/utils';
import { loadTable as loadCsvTable } from '../data/csv-loader.js';
import type { Table, TableLoader } from '../data/table.js';
import type { LifecycleExtensionClass } from '../extensions/lifecycle.js';
import { crossExperimentKeyMaker } from '../identity/key-maker.js';
import type { IdentityProjection, KeyMaker } from '../identity/key-maker.js';
import type { MetricsMap, MetricsParams } from '../metrics.js';
import type { DoFullSave, PredictionFormatter } from '../predictions.js';
import { ReportingHandler } from '../reporting/reporting-handler.js';
import type { ReportingHandlerParams } from '../reporting/reporting-handler.js';
import { DeferredReportingSink } from '../reporting/reporting-sink.js';
import type { ReportingSink } from '../reporting/reporting-sink.js';
import { HEARTBEAT_FILENAME } from '../settings.js';
import type { FileBlacklist } from './blacklist.js';
import { readEnvironmentDefaults, resolveEnvironmentOptions } from './defaults-cascade.js';
import type { OptionSource } from './defaults-cascade.js';
import { defineHoldoutSet } from './holdout.js';
import { createModuleDefaults } from './options.js';
import type { DatasetInput, EnvironmentOptionKey, EnvironmentOptions, ModuleDefaults } from './options.js';
import type { EnvironmentRegistry } from './registry.js';
import { planResultPaths } from './result-paths.js';
import type { ResultPaths } from './result-paths.js';
import { validateParameters } from './validation.js';
import type { CrossExperimentParams } from './validation.js';

const logger = createPackageLogger('@trialkey/core');

export const ENVIRONMENT_STAGES = [
  'resolving',
  'validating',
  'deriving-holdout',
  'planning-paths',
  'fingerprinting',
  'ready',
] as const;

export type EnvironmentStage = (typeof ENVIRONMENT_STAGES)[number];

export interface EnvironmentInit extends EnvironmentOptions {
  /** Table, or path to a CSV file */
  trainDataset: DatasetInput;
  /** JSON file of option defaults, applied below caller values */
  environmentParamsPath?: string | null;
}

export interface EnvironmentDependencies {
  /** Reports go here from the start; otherwise they wait for `initializeReporting` */
  sink?: ReportingSink;
  loadTable?: TableLoader;
  keyMaker?: KeyMaker;
  /** Receives the environment once it is ready */
  registry?: EnvironmentRegistry<Environment>;
  moduleDefaults?: ModuleDefaults;
}

export class Environment {
  readonly environmentParamsPath: string | null;
  readonly rootResultsPath: string | null;
  readonly verbose: boolean;
  readonly trainDataset: Table;
  readonly holdoutDataset: Table | null;
  readonly testDataset: Table | null;
  readonly targetColumn: string;
  readonly idColumn: string | null;
  readonly doPredictProba: boolean;
  readonly predictionFormatter: PredictionFormatter;
  readonly metricsMap: MetricsMap;
  readonly metricsParams: MetricsParams;
  readonly crossValidationParams: Readonly<Record<string, unknown>>;
  readonly reportingHandlerParams: ReportingHandlerParams;
  readonly toCsvParams: Readonly<Record<string, unknown>>;
  readonly doFullSave: DoFullSave;
  readonly experimentCallbacks: readonly LifecycleExtensionClass[];
  readonly crossExperimentParams: CrossExperimentParams;
  /** Validated blacklist, extended with categories excluded for missing datasets */
  readonly fileBlacklist: FileBlacklist;
  readonly resultPaths: ResultPaths;
  readonly resolutionSources: ReadonlyMap<EnvironmentOptionKey, OptionSource>;
  readonly crossExperimentKey: string;

  private currentStage: EnvironmentStage = 'resolving';
  private readonly reporter: DeferredReportingSink;
  private readonly reportedWarnings: string[] = [];

  constructor(init: EnvironmentInit, deps: EnvironmentDependencies = {}) {
    const { trainDataset, environmentParamsPath, ...callerOptions } = init;
    const loadTable = deps.loadTable ?? loadCsvTable;
    const keyMaker = deps.keyMaker ?? crossExperimentKeyMaker;

    this.reporter = new DeferredReportingSink(deps.sink ?? null);
    const sink: ReportingSink = {
      log: (message) => this.reporter.log(message),
      debug: (message) => this.reporter.debug(message),
      warn: (message) => {
        this.reportedWarnings.push(message);
        this.reporter.warn(message);
      },
    };

    logger.debug('Environment stage', { stage: this.currentStage });
    this.environmentParamsPath = environmentParamsPath ?? null;
    const fileOptions = readEnvironmentDefaults(environmentParamsPath, sink);
    const { options, sources } = resolveEnvironmentOptions(
      callerOptions,
      fileOptions,
      deps.moduleDefaults ?? createModuleDefaults()
    );
    this.resolutionSources = sources;

    this.advance('validating');
    const validated = validateParameters(options, { trainDataset, loadTable, sink });
    this.rootResultsPath = validated.rootResultsPath;
    this.verbose = validated.verbose;
    this.testDataset = validated.testDataset;
    this.targetColumn = validated.targetColumn;
    this.idColumn = validated.idColumn;
    this.doPredictProba = validated.doPredictProba;
    this.predictionFormatter = validated.predictionFormatter;
    this.metricsMap = validated.metricsMap;
    this.metricsParams = validated.metricsParams;
    this.crossValidationParams = validated.crossValidationParams;
    this.reportingHandlerParams = validated.reportingHandlerParams;
    this.toCsvParams = validated.toCsvParams;
    this.doFullSave = validated.doFullSave;
    this.experimentCallbacks = validated.experimentCallbacks;
    this.crossExperimentParams = validated.crossExperimentParams;

    this.advance('deriving-holdout');
    const derived = defineHoldoutSet(options.holdoutDataset, validated.trainDataset, this.targetColumn, loadTable);
    this.trainDataset = derived.trainDataset;
    this.holdoutDataset = derived.holdoutDataset;

    this.advance('planning-paths');
    const plan = planResultPaths({
      rootResultsPath: this.rootResultsPath,
      fileBlacklist: validated.fileBlacklist,
      hasHoldoutDataset: this.holdoutDataset !== null,
      hasTestDataset: this.testDataset !== null,
    });
    this.resultPaths = plan.resultPaths;
    this.fileBlacklist = plan.fileBlacklist;

    this.advance('fingerprinting');
    this.crossExperimentKey = keyMaker.makeIdentity(this.identityProjection());
    sink.log(`Cross-Experiment Key: ${this.crossExperimentKey}`);

    this.advance('ready');
    deps.registry?.register(this);
  }

  get stage(): EnvironmentStage {
    return this.currentStage;
  }

  /**
   * Non-fatal warnings reported while constructing, in order
   */
  get warnings(): readonly string[] {
    return [...this.reportedWarnings];
  }

  /**
   * Attach a `ReportingHandler` built from `reportingHandlerParams`, flushing
   * everything reported so far. The heartbeat goes to `<root>/Heartbeat.log`
   * when a results root exists.
   */
  initializeReporting(): ReportingHandler {
    const heartbeatPath =
      this.rootResultsPath === null ? null : join(this.rootResultsPath, HEARTBEAT_FILENAME);
    const handler = new ReportingHandler(
      { ...this.reportingHandlerParams, heartbeatPath },
      { verbose: this.verbose }
    );
    this.reporter.attach(handler);
    return handler;
  }

  /**
   * Environments are equal when their cross-experiment keys are
   */
  equals(other: Environment | string): boolean {
    const key = typeof other === 'string' ? other : other.crossExperimentKey;
    return key === this.crossExperimentKey;
  }

  toString(): string {
    return `Environment(crossExperimentKey=${this.crossExperimentKey})`;
  }

  private identityProjection(): IdentityProjection {
    return Object.freeze({
      metricsParams: this.metricsParams,
      crossValidationParams: this.crossValidationParams,
      targetColumn: this.targetColumn,
      idColumn: this.idColumn,
      doPredictProba: this.doPredictProba,
      predictionFormatter: this.predictionFormatter,
      trainDataset: this.trainDataset,
      testDataset: this.testDataset,
      holdoutDataset: this.holdoutDataset,
      crossExperimentParams: this.crossExperimentParams,
      toCsvParams: this.toCsvParams,
    });
  }

  private advance(next: EnvironmentStage): void {
    const expected = ENVIRONMENT_STAGES[ENVIRONMENT_STAGES.indexOf(this.currentStage) + 1];
    if (next !== expected) {
      throw new ConfigurationError(`Invalid environment stage transition: ${this.currentStage} -> ${next}`, 'stage', {
        from: this.currentStage,
        to: next,
      });
    }
    this.currentStage = next;
    logger.debug('Environment stage', { stage: next });
  }
}
