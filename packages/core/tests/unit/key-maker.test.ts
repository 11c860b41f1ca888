import { describe, expect, it } from 'vitest';
import { ValidationError } from '@trialkey/utils';
import { CrossExperimentKeyMaker, canonicalStringify, createTable } from '../../src/index.js';

describe('canonicalStringify', () => {
  it('should sort object keys at every depth', () => {
    expect(canonicalStringify({ b: 1, a: [1, 'x', { d: true, c: null }] })).toBe(
      '{"a":[1,"x",{"c":null,"d":true}],"b":1}'
    );
  });

  it('should render undefined as null', () => {
    expect(canonicalStringify({ a: undefined })).toBe('{"a":null}');
  });

  it('should render non-finite numbers by name', () => {
    expect(canonicalStringify(Number.NaN)).toBe('{"__number__":"NaN"}');
    expect(canonicalStringify(-Infinity)).toBe('{"__number__":"-Infinity"}');
  });

  it('should render tables by column order', () => {
    const table = createTable(['a', 'b'], [{ b: 2, a: 1 }]);
    expect(canonicalStringify(table)).toBe('{"__table__":{"columns":["a","b"],"rows":[[1,2]]}}');
  });

  it('should render dates as ISO strings', () => {
    expect(canonicalStringify(new Date(Date.UTC(2024, 0, 2)))).toBe('{"__date__":"2024-01-02T00:00:00.000Z"}');
  });

  it('should allow shared references that are not cycles', () => {
    const shared = { value: 1 };
    expect(canonicalStringify({ left: shared, right: shared })).toBe('{"left":{"value":1},"right":{"value":1}}');
  });

  it('should reject cyclic structures', () => {
    const cyclic: Record<string, unknown> = { name: 'loop' };
    cyclic.self = cyclic;
    expect(() => canonicalStringify(cyclic)).toThrow(ValidationError);
  });
});

describe('CrossExperimentKeyMaker', () => {
  const keyMaker = new CrossExperimentKeyMaker();

  it('should produce a lowercase hex sha256 token', () => {
    expect(keyMaker.makeIdentity({ runs: 1 })).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should ignore key order and object identity', () => {
    const first = keyMaker.makeIdentity({ runs: 1, params: { a: 1, b: 2 } });
    const second = keyMaker.makeIdentity({ params: { b: 2, a: 1 }, runs: 1 });

    expect(second).toBe(first);
  });

  it('should change when a value changes', () => {
    expect(keyMaker.makeIdentity({ runs: 1 })).not.toBe(keyMaker.makeIdentity({ runs: 2 }));
  });

  it('should identify functions by name and source', () => {
    const makeFormatter = () => (value: number) => value * 2;
    const sameSource = keyMaker.makeIdentity({ formatter: makeFormatter() });

    expect(keyMaker.makeIdentity({ formatter: makeFormatter() })).toBe(sameSource);
    expect(keyMaker.makeIdentity({ formatter: (value: number) => value * 3 })).not.toBe(sameSource);
  });

  it('should identify tables by content', () => {
    const first = createTable(['a'], [{ a: 1 }]);
    const second = createTable(['a'], [{ a: 1 }]);

    expect(keyMaker.makeIdentity({ trainDataset: first })).toBe(keyMaker.makeIdentity({ trainDataset: second }));
    expect(keyMaker.makeIdentity({ trainDataset: first })).not.toBe(
      keyMaker.makeIdentity({ trainDataset: createTable(['a'], [{ a: 2 }]) })
    );
  });
});
