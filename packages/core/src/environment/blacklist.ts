/**
 * Result file blacklist
 *
 * Names result files that should not be saved. `'ALL'` disables saving
 * entirely.
 *
 * Notes on some categories:
 * - `heartbeat`: the running heartbeat log is copied per experiment rather
 *   than written fresh, so blacklisting it skips that copy.
 * - `script_backup`: saved as early as possible in an experiment, so the
 *   backup reflects the script as it ran even when nothing else gets saved.
 * - `description` and `tested_keys`: the minimum record of an experiment.
 *   Without either one, the experiment is effectively never recorded, and
 *   blacklisting `tested_keys` also skips the key attribute lookup updates.
 */

import { TypeMismatchError, ValidationError, describeValue } from '@trialkey/utils';
import type { ReportingSink } from '../reporting/reporting-sink.js';
import { BLACKLIST_ALL } from './options.js';

export const BLACKLIST_CATEGORIES = [
  'description',
  'heartbeat',
  'predictions_holdout',
  'predictions_in_fold',
  'predictions_oof',
  'predictions_test',
  'script_backup',
  'tested_keys',
] as const;

export type BlacklistCategory = (typeof BLACKLIST_CATEGORIES)[number];

export type FileBlacklist = typeof BLACKLIST_ALL | readonly BlacklistCategory[];

const PROTECTED_CATEGORIES: readonly BlacklistCategory[] = ['description', 'tested_keys'];

export function isBlacklistCategory(value: unknown): value is BlacklistCategory {
  return BLACKLIST_CATEGORIES.some((category) => category === value);
}

/**
 * Validate a blacklist input against the fixed category set
 *
 * `null`/`undefined`/`[]` normalize to `[]`.
 *
 * @throws TypeMismatchError when the input is not a list, or holds non-strings
 * @throws ValidationError naming the first unknown category
 */
export function validateFileBlacklist(blacklist: unknown, sink: ReportingSink): FileBlacklist {
  if (blacklist === BLACKLIST_ALL) {
    sink.warn(`Received fileBlacklist="${BLACKLIST_ALL}". Nothing will be saved`);
    return BLACKLIST_ALL;
  }

  if (blacklist === null || blacklist === undefined) {
    return [];
  }
  if (!Array.isArray(blacklist)) {
    const [type, value] = describeValue(blacklist);
    throw new TypeMismatchError(`Expected fileBlacklist to be a list, but received ${type}: ${value}`, type);
  }

  const entries: unknown[] = blacklist;
  const invalidEntries = entries.filter((entry) => typeof entry !== 'string');
  if (invalidEntries.length > 0) {
    const rendered = invalidEntries.map((entry) => describeValue(entry).join(': ')).join(', ');
    throw new TypeMismatchError(
      `Expected contents of fileBlacklist to be strings, but received [${rendered}]`,
      describeValue(invalidEntries[0])[0],
      { invalidEntries: invalidEntries.length }
    );
  }

  const categories: BlacklistCategory[] = [];
  for (const entry of entries) {
    if (!isBlacklistCategory(entry)) {
      throw new ValidationError(
        `Received invalid fileBlacklist value: ${String(entry)}. Expected one of: [${BLACKLIST_CATEGORIES.join(', ')}]`,
        { value: entry }
      );
    }
    if (PROTECTED_CATEGORIES.includes(entry)) {
      sink.warn(`Including "${entry}" in fileBlacklist will severely impede experiment bookkeeping`);
    }
    categories.push(entry);
  }

  return categories;
}
