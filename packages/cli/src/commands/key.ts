/**
 * Key Command
 */

import type { Command } from 'commander';
import { EnvironmentRegistry } from '@trialkey/core';
import type { Environment } from '@trialkey/core';
import { keyCommandSchema } from '../command-defs/key.js';
import { parseArguments } from '../core/argument-parser.js';
import { handleError } from '../core/error-handler.js';
import { formatJSON, formatTable } from '../core/output-formatter.js';
import type { OutputFormat } from '../core/output-formatter.js';
import { computeKeyHandler } from '../handlers/key/compute-key.js';
import type { KeyCommandResult } from '../handlers/key/compute-key.js';

/**
 * Render the key and one row per result path category
 */
export function formatKeyResult(result: KeyCommandResult, format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON(result);
  }

  const rows = Object.entries(result.resultPaths).map(([category, path]) => ({
    category,
    path: path ?? '-',
  }));
  return [`Cross-Experiment Key: ${result.crossExperimentKey}`, '', formatTable(rows)].join('\n');
}

/**
 * Register the key command
 *
 * `TRIALKEY_ROOT_RESULTS_PATH` and `TRIALKEY_ENVIRONMENT_PARAMS_PATH` (e.g. from
 * `.env`) fill in `--root` and `--params` when the flags are absent.
 */
export function registerKeyCommand(program: Command): void {
  program
    .command('key')
    .description('Resolve an experiment environment and print its cross-experiment key')
    .requiredOption('--train <csv>', 'Training dataset CSV')
    .option('--params <json>', 'Environment defaults file', process.env.TRIALKEY_ENVIRONMENT_PARAMS_PATH)
    .option('--root <dir>', 'Root results directory', process.env.TRIALKEY_ROOT_RESULTS_PATH)
    .option('--holdout <csv>', 'Holdout dataset CSV')
    .option('--test <csv>', 'Test dataset CSV')
    .option('--target <column>', 'Target column')
    .option('--id <column>', 'ID column')
    .option('--metrics <names>', 'Comma-separated metric names')
    .option('--blacklist <categories>', 'Comma-separated result categories to skip, or ALL')
    .option('--format <format>', 'Output format (json, table)', 'table')
    .action((options: Record<string, unknown>) => {
      try {
        const args = parseArguments(keyCommandSchema, options);
        const registry = new EnvironmentRegistry<Environment>();
        const result = computeKeyHandler(args, { registry });

        const reporting = registry.requireActive().initializeReporting();
        console.log(formatKeyResult(result, args.format));
        reporting.close();
      } catch (error) {
        const message = handleError(error, { command: 'key' });
        console.error(`Error: ${message}`);
        process.exit(1);
      }
    });
}
