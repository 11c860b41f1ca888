/**
 * Cross-experiment key maker
 *
 * Turns the identity projection of an environment into a stable token.
 * Same projection by value → same key, regardless of key order or object identity.
 */

import { createHash } from 'crypto';
import { canonicalStringify } from './canonical.js';

export type IdentityProjection = Readonly<Record<string, unknown>>;

export interface KeyMaker {
  makeIdentity(projection: IdentityProjection): string;
}

export class CrossExperimentKeyMaker implements KeyMaker {
  /**
   * @returns lowercase hex SHA-256 of the canonical rendering
   */
  makeIdentity(projection: IdentityProjection): string {
    return createHash('sha256').update(canonicalStringify(projection), 'utf-8').digest('hex');
  }
}

export const crossExperimentKeyMaker: KeyMaker = new CrossExperimentKeyMaker();
