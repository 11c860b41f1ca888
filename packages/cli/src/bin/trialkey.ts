#!/usr/bin/env node

/**
 * TrialKey CLI Entry Point
 *
 * Loads `.env` before any command reads its defaults from the environment.
 */

import 'dotenv/config';
import { program } from 'commander';
import { registerKeyCommand } from '../commands/key.js';
import { handleError } from '../core/error-handler.js';

program
  .name('trialkey')
  .description('Resolve experiment environments into cross-experiment keys')
  .version('0.1.0');

registerKeyCommand(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

try {
  program.parse();
} catch (error) {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(1);
}

export { program };
