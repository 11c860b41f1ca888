/**
 * @trialkey/cli
 *
 * Command definitions, handlers and formatting for the trialkey CLI.
 */

export { keyCommandSchema } from './command-defs/key.js';
export type { KeyCommandArgs } from './command-defs/key.js';
export { computeKeyHandler } from './handlers/key/compute-key.js';
export type { KeyCommandContext, KeyCommandResult } from './handlers/key/compute-key.js';
export { formatKeyResult, registerKeyCommand } from './commands/key.js';
export { parseArguments } from './core/argument-parser.js';
export { formatError, handleError, logError } from './core/error-handler.js';
export { formatJSON, formatTable } from './core/output-formatter.js';
export type { OutputFormat, OutputRow } from './core/output-formatter.js';
