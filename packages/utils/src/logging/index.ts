/**
 * Package-aware logging
 *
 * ```typescript
 * import { createPackageLogger } from '@trialkey/utils';
 *
 * const logger = createPackageLogger('@trialkey/core');
 * logger.debug('Stage entered', { stage: 'validating' });
 * ```
 */

import { Logger, createLogger } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Get all registered package loggers
 */
export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}
