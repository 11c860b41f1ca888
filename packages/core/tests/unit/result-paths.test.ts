import { readdirSync } from 'fs';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { RESULT_PATH_KEYS, planResultPaths } from '../../src/index.js';
import type { BlacklistCategory } from '../../src/index.js';
import { createScratchDir } from '../helpers/tmp.js';

const root = join('/results', 'TrialKeyAssets');

describe('planResultPaths', () => {
  it('should plan nothing under ALL but keep the root', () => {
    const { resultPaths, fileBlacklist } = planResultPaths({
      rootResultsPath: root,
      fileBlacklist: 'ALL',
      hasHoldoutDataset: true,
      hasTestDataset: true,
    });

    expect(fileBlacklist).toBe('ALL');
    expect(resultPaths.root).toBe(root);
    for (const key of RESULT_PATH_KEYS.filter((key) => key !== 'root')) {
      expect(resultPaths[key]).toBeNull();
    }
  });

  it('should plan nothing without a root', () => {
    const { resultPaths, fileBlacklist } = planResultPaths({
      rootResultsPath: null,
      fileBlacklist: [],
      hasHoldoutDataset: false,
      hasTestDataset: false,
    });

    expect(fileBlacklist).toEqual([]);
    expect(Object.values(resultPaths).every((path) => path === null)).toBe(true);
  });

  it('should join every unlisted category onto the root', () => {
    const { resultPaths, fileBlacklist } = planResultPaths({
      rootResultsPath: root,
      fileBlacklist: ['heartbeat'],
      hasHoldoutDataset: true,
      hasTestDataset: true,
    });

    expect(fileBlacklist).toEqual(['heartbeat']);
    expect(resultPaths).toEqual({
      root,
      checkpoint: join(root, 'Experiments/Checkpoints'),
      description: join(root, 'Experiments/Descriptions'),
      heartbeat: null,
      predictions_holdout: join(root, 'Experiments/Predictions/Holdout'),
      predictions_in_fold: join(root, 'Experiments/Predictions/InFold'),
      predictions_oof: join(root, 'Experiments/Predictions/OOF'),
      predictions_test: join(root, 'Experiments/Predictions/Test'),
      script_backup: join(root, 'Experiments/ScriptBackups'),
      tested_keys: join(root, 'TestedKeys'),
      key_attribute_lookup: join(root, 'KeyAttributeLookup'),
      leaderboards: join(root, 'Leaderboards'),
      global_leaderboard: join(root, 'Leaderboards/GlobalLeaderboard.csv'),
    });
  });

  it('should exclude prediction categories for missing datasets', () => {
    const { resultPaths, fileBlacklist } = planResultPaths({
      rootResultsPath: root,
      fileBlacklist: [],
      hasHoldoutDataset: false,
      hasTestDataset: false,
    });

    expect(fileBlacklist).toEqual(['predictions_holdout', 'predictions_test']);
    expect(resultPaths.predictions_holdout).toBeNull();
    expect(resultPaths.predictions_test).toBeNull();
    expect(resultPaths.predictions_oof).toBe(join(root, 'Experiments/Predictions/OOF'));
  });

  it('should not add a category that is already listed', () => {
    const { resultPaths, fileBlacklist } = planResultPaths({
      rootResultsPath: root,
      fileBlacklist: ['predictions_test'],
      hasHoldoutDataset: true,
      hasTestDataset: false,
    });

    expect(fileBlacklist).toEqual(['predictions_test']);
    expect(resultPaths.predictions_test).toBeNull();
  });

  it('should leave the given blacklist untouched', () => {
    const given: BlacklistCategory[] = ['heartbeat'];

    planResultPaths({ rootResultsPath: root, fileBlacklist: given, hasHoldoutDataset: false, hasTestDataset: false });

    expect(given).toEqual(['heartbeat']);
  });

  describe('filesystem', () => {
    const scratch = createScratchDir();

    afterEach(() => {
      scratch.cleanup();
    });

    it('should not create anything on disk', () => {
      planResultPaths({ rootResultsPath: scratch.dir, fileBlacklist: 'ALL', hasHoldoutDataset: false, hasTestDataset: false });
      planResultPaths({ rootResultsPath: scratch.dir, fileBlacklist: [], hasHoldoutDataset: true, hasTestDataset: true });

      expect(readdirSync(scratch.dir)).toEqual([]);
    });
  });
});
