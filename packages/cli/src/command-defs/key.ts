/**
 * Key Command Definitions
 *
 * Schema for the `key` command, which resolves an experiment environment
 * from flags and prints its cross-experiment key and result paths.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/**
 * `a, b,c` → `['a', 'b', 'c']`
 */
const commaList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

export const keyCommandSchema = z.object({
  /** Training dataset CSV */
  train: z.string().min(1),

  /** JSON file of environment option defaults */
  params: z.string().min(1).optional(),

  /** Results root; the assets directory is appended */
  root: z.string().min(1).optional(),

  /** Holdout dataset CSV */
  holdout: z.string().min(1).optional(),

  /** Test dataset CSV */
  test: z.string().min(1).optional(),

  target: z.string().min(1).optional(),

  id: z.string().min(1).optional(),

  /** Metric names */
  metrics: commaList.optional(),

  /** Result file categories to skip, or ALL */
  blacklist: z.union([z.literal('ALL'), commaList]).optional(),

  /** Output format */
  format: z.enum(['json', 'table']).default('table'),
});

export type KeyCommandArgs = z.infer<typeof keyCommandSchema>;
