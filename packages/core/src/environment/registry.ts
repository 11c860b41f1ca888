/**
 * Active environment registry
 *
 * Collaborators that need "the current environment" receive a registry handle
 * instead of reading a global. Registration is last-writer-wins; the caller
 * owns teardown through `release`.
 */

import { ConfigurationError, createPackageLogger } from '@trialkey/utils';

const logger = createPackageLogger('@trialkey/core');

export interface RegistrableEnvironment {
  readonly crossExperimentKey: string;
}

export class EnvironmentRegistry<E extends RegistrableEnvironment = RegistrableEnvironment> {
  private current: E | null = null;

  get active(): E | null {
    return this.current;
  }

  register(environment: E): void {
    if (this.current !== null && this.current !== environment) {
      logger.debug('Replacing active environment', {
        previous: this.current.crossExperimentKey,
        next: environment.crossExperimentKey,
      });
    }
    this.current = environment;
  }

  /**
   * Clear the active environment, but only if it is `environment`
   *
   * @returns whether anything was released
   */
  release(environment: E): boolean {
    if (this.current !== environment) {
      return false;
    }
    this.current = null;
    return true;
  }

  requireActive(): E {
    if (this.current === null) {
      throw new ConfigurationError('No active environment has been registered', 'environment');
    }
    return this.current;
  }
}
