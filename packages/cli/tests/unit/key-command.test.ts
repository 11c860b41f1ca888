import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Environment, EnvironmentRegistry } from '@trialkey/core';
import { NotFoundError, ValidationError } from '@trialkey/utils';
import { computeKeyHandler, formatKeyResult, keyCommandSchema, parseArguments } from '../../src/index.js';

describe('key command', () => {
  let dir: string;
  let registry: EnvironmentRegistry<Environment>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'trialkey-cli-'));
    writeFileSync(join(dir, 'train.csv'), 'id,a,target\n1,0.5,0\n2,0.7,1\n', 'utf8');
    writeFileSync(join(dir, 'test.csv'), 'id,a,target\n3,0.1,0\n', 'utf8');
    registry = new EnvironmentRegistry<Environment>();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('keyCommandSchema', () => {
    it('should split list flags and default the format', () => {
      const args = parseArguments(keyCommandSchema, {
        train: 'train.csv',
        metrics: 'roc_auc, f1,',
        blacklist: 'heartbeat,script_backup',
      });

      expect(args.metrics).toEqual(['roc_auc', 'f1']);
      expect(args.blacklist).toEqual(['heartbeat', 'script_backup']);
      expect(args.format).toBe('table');
    });

    it('should keep the ALL blacklist as-is', () => {
      expect(parseArguments(keyCommandSchema, { train: 'train.csv', blacklist: 'ALL' }).blacklist).toBe('ALL');
    });

    it('should reject an unknown format', () => {
      expect(() => parseArguments(keyCommandSchema, { train: 'train.csv', format: 'xml' })).toThrow(ValidationError);
    });
  });

  describe('computeKeyHandler', () => {
    it('should resolve the environment and register it', () => {
      const args = parseArguments(keyCommandSchema, {
        train: join(dir, 'train.csv'),
        test: join(dir, 'test.csv'),
        root: join(dir, 'results'),
        metrics: 'roc_auc',
      });

      const result = computeKeyHandler(args, { registry });

      expect(result.crossExperimentKey).toMatch(/^[0-9a-f]{64}$/);
      expect(registry.requireActive().crossExperimentKey).toBe(result.crossExperimentKey);
      expect(result.resultPaths.root).toBe(join(dir, 'results', 'TrialKeyAssets'));
      expect(result.resultPaths.predictions_holdout).toBeNull();
      expect(result.resultPaths.predictions_test).toBe(
        join(dir, 'results', 'TrialKeyAssets', 'Experiments/Predictions/Test')
      );
      expect(result.warnings).toEqual([]);
    });

    it('should give the same key for the same files', () => {
      const args = parseArguments(keyCommandSchema, { train: join(dir, 'train.csv'), metrics: 'roc_auc' });

      const first = computeKeyHandler(args, { registry });
      const second = computeKeyHandler(args, { registry });

      expect(second.crossExperimentKey).toBe(first.crossExperimentKey);
      expect(second.warnings).toEqual(['Received rootResultsPath=null. Results will not be stored at all.']);
    });

    it('should take metrics from the defaults file', () => {
      writeFileSync(join(dir, 'env.json'), JSON.stringify({ metricsMap: ['roc_auc'] }), 'utf8');
      const args = parseArguments(keyCommandSchema, {
        train: join(dir, 'train.csv'),
        params: join(dir, 'env.json'),
      });

      expect(computeKeyHandler(args, { registry }).crossExperimentKey).toBe(
        computeKeyHandler(parseArguments(keyCommandSchema, { train: join(dir, 'train.csv'), metrics: 'roc_auc' }), {
          registry,
        }).crossExperimentKey
      );
    });

    it('should propagate a missing dataset', () => {
      const args = parseArguments(keyCommandSchema, { train: join(dir, 'missing.csv'), metrics: 'roc_auc' });

      expect(() => computeKeyHandler(args, { registry })).toThrow(NotFoundError);
      expect(registry.active).toBeNull();
    });
  });

  describe('formatKeyResult', () => {
    const result = {
      crossExperimentKey: 'abc123',
      resultPaths: {
        root: '/r',
        checkpoint: null,
        description: '/r/Experiments/Descriptions',
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
      },
      warnings: [],
    };

    it('should print the key and a table of paths', () => {
      const lines = formatKeyResult(result, 'table').split('\n');

      expect(lines[0]).toBe('Cross-Experiment Key: abc123');
      expect(lines[1]).toBe('');
      expect(lines[2]).toBe('category             | path');
      expect(lines[4]).toBe('root                 | /r');
      expect(lines[6]).toBe('description          | /r/Experiments/Descriptions');
      expect(lines).toHaveLength(17);
    });

    it('should print JSON', () => {
      expect(JSON.parse(formatKeyResult(result, 'json'))).toEqual(result);
    });
  });
});
