/**
 * Compute Key Handler
 *
 * Builds an Environment from validated `key` command arguments. Flags that
 * were not given stay `null`, so the defaults file and module defaults can
 * supply them.
 *
 * @packageDocumentation
 */

import { Environment } from '@trialkey/core';
import type { EnvironmentRegistry, ReportingSink, ResultPaths } from '@trialkey/core';
import type { KeyCommandArgs } from '../../command-defs/key.js';

export interface KeyCommandContext {
  /** Receives the environment once it is ready */
  registry: EnvironmentRegistry<Environment>;
  sink?: ReportingSink;
}

export interface KeyCommandResult {
  crossExperimentKey: string;
  resultPaths: ResultPaths;
  warnings: readonly string[];
}

export function computeKeyHandler(args: KeyCommandArgs, ctx: KeyCommandContext): KeyCommandResult {
  const environment = new Environment(
    {
      trainDataset: args.train,
      environmentParamsPath: args.params ?? null,
      rootResultsPath: args.root ?? null,
      holdoutDataset: args.holdout ?? null,
      testDataset: args.test ?? null,
      targetColumn: args.target ?? null,
      idColumn: args.id ?? null,
      metricsMap: args.metrics ?? null,
      fileBlacklist: args.blacklist ?? null,
    },
    { registry: ctx.registry, sink: ctx.sink }
  );

  return {
    crossExperimentKey: environment.crossExperimentKey,
    resultPaths: environment.resultPaths,
    warnings: environment.warnings,
  };
}
