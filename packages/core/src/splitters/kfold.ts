/**
 * K-Fold cross-validation splitter
 *
 * The default `crossValidationType`. Environments never run folds themselves;
 * the class reference is part of the cross-experiment parameters and is
 * instantiated by experiments with `crossValidationParams`.
 */

import { z } from 'zod';
import { ValidationError } from '@trialkey/utils';

export interface Fold {
  readonly train: number[];
  readonly validation: number[];
}

export interface Splitter {
  split(nSamples: number): Generator<Fold>;
}

export interface SplitterClass {
  readonly name: string;
  new (params?: Record<string, unknown>): Splitter;
}

export const KFoldParamsSchema = z.object({
  nSplits: z.number().int().min(2).default(5),
  shuffle: z.boolean().default(false),
  randomState: z.number().int().nullable().default(null),
});

export type KFoldParams = z.infer<typeof KFoldParamsSchema>;

/**
 * mulberry32 - small seeded PRNG, enough for reproducible index shuffles
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class KFold implements Splitter {
  readonly params: Readonly<KFoldParams>;

  constructor(params: Record<string, unknown> = {}) {
    const parsed = KFoldParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ValidationError('Invalid KFold parameters', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    this.params = Object.freeze(parsed.data);
  }

  /**
   * Yield contiguous folds; the first `nSamples % nSplits` folds get one extra sample
   */
  *split(nSamples: number): Generator<Fold> {
    const { nSplits, shuffle, randomState } = this.params;
    if (!Number.isInteger(nSamples) || nSamples < nSplits) {
      throw new ValidationError(
        `Cannot have nSplits=${nSplits} greater than the number of samples: ${nSamples}`,
        { nSplits, nSamples }
      );
    }

    const indices = Array.from({ length: nSamples }, (_, index) => index);
    if (shuffle) {
      const random = seededRandom(randomState ?? 0);
      for (let i = indices.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [indices[i], indices[j]] = [indices[j], indices[i]];
      }
    }

    const baseSize = Math.floor(nSamples / nSplits);
    const remainder = nSamples % nSplits;
    let start = 0;

    for (let fold = 0; fold < nSplits; fold++) {
      const size = baseSize + (fold < remainder ? 1 : 0);
      const validation = indices.slice(start, start + size);
      const train = [...indices.slice(0, start), ...indices.slice(start + size)];
      yield { train, validation };
      start += size;
    }
  }
}
