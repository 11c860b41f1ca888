/**
 * Result directory layout
 *
 * Static configuration: the assets directory name appended to every root
 * results path, and the sub-path of every result artifact category under it.
 */

export const ASSETS_DIRNAME = 'TrialKeyAssets';

export const HEARTBEAT_FILENAME = 'Heartbeat.log';

/**
 * Result path catalogue keys, `root` first
 */
export const RESULT_PATH_KEYS = [
  'root',
  'checkpoint',
  'description',
  'heartbeat',
  'predictions_holdout',
  'predictions_in_fold',
  'predictions_oof',
  'predictions_test',
  'script_backup',
  'tested_keys',
  'key_attribute_lookup',
  'leaderboards',
  'global_leaderboard',
] as const;

export type ResultPathKey = (typeof RESULT_PATH_KEYS)[number];

export type ResultFileKey = Exclude<ResultPathKey, 'root'>;

export const RESULT_FILE_SUB_DIR_PATHS: Readonly<Record<ResultFileKey, string>> = {
  checkpoint: 'Experiments/Checkpoints',
  description: 'Experiments/Descriptions',
  heartbeat: 'Experiments/Heartbeats',
  predictions_holdout: 'Experiments/Predictions/Holdout',
  predictions_in_fold: 'Experiments/Predictions/InFold',
  predictions_oof: 'Experiments/Predictions/OOF',
  predictions_test: 'Experiments/Predictions/Test',
  script_backup: 'Experiments/ScriptBackups',
  tested_keys: 'TestedKeys',
  key_attribute_lookup: 'KeyAttributeLookup',
  leaderboards: 'Leaderboards',
  global_leaderboard: 'Leaderboards/GlobalLeaderboard.csv',
};
