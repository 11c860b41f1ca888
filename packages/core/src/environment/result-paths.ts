/**
 * Result path planning
 *
 * Maps each result file category to its location under the results root, or
 * to `null` when it is blacklisted. Pure: nothing is created on disk here.
 */

import { join } from 'path';
import { RESULT_FILE_SUB_DIR_PATHS, RESULT_PATH_KEYS } from '../settings.js';
import type { ResultFileKey, ResultPathKey } from '../settings.js';
import type { BlacklistCategory, FileBlacklist } from './blacklist.js';
import { BLACKLIST_ALL } from './options.js';

export type ResultPaths = Readonly<Record<ResultPathKey, string | null>>;

export interface ResultPathPlanInput {
  rootResultsPath: string | null;
  fileBlacklist: FileBlacklist;
  hasHoldoutDataset: boolean;
  hasTestDataset: boolean;
}

export interface ResultPathPlan {
  readonly resultPaths: ResultPaths;
  /** The blacklist extended with categories excluded for missing datasets */
  readonly fileBlacklist: FileBlacklist;
}

export function createEmptyResultPaths(rootResultsPath: string | null): Record<ResultPathKey, string | null> {
  const paths: Record<ResultPathKey, string | null> = {
    root: rootResultsPath,
    checkpoint: null,
    description: null,
    heartbeat: null,
    predictions_holdout: null,
    predictions_in_fold: null,
    predictions_oof: null,
    predictions_test: null,
    script_backup: null,
    tested_keys: null,
    key_attribute_lookup: null,
    leaderboards: null,
    global_leaderboard: null,
  };
  return paths;
}

function withCategory(
  blacklist: readonly BlacklistCategory[],
  category: BlacklistCategory
): readonly BlacklistCategory[] {
  return blacklist.includes(category) ? blacklist : [...blacklist, category];
}

function isBlacklisted(blacklist: readonly BlacklistCategory[], key: ResultFileKey): boolean {
  return blacklist.some((category) => category === key);
}

export function planResultPaths(input: ResultPathPlanInput): ResultPathPlan {
  const { rootResultsPath, hasHoldoutDataset, hasTestDataset } = input;
  const paths = createEmptyResultPaths(rootResultsPath);

  if (input.fileBlacklist === BLACKLIST_ALL || rootResultsPath === null) {
    return { resultPaths: paths, fileBlacklist: input.fileBlacklist };
  }

  let blacklist = input.fileBlacklist;
  if (!hasHoldoutDataset) {
    blacklist = withCategory(blacklist, 'predictions_holdout');
  }
  if (!hasTestDataset) {
    blacklist = withCategory(blacklist, 'predictions_test');
  }

  for (const key of RESULT_PATH_KEYS) {
    if (key === 'root') {
      continue;
    }
    paths[key] = isBlacklisted(blacklist, key) ? null : join(rootResultsPath, RESULT_FILE_SUB_DIR_PATHS[key]);
  }

  return { resultPaths: paths, fileBlacklist: blacklist };
}
