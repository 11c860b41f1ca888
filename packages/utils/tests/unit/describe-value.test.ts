import { describe, expect, it } from 'vitest';
import { describeValue } from '../../src/index.js';

describe('describeValue', () => {
  it('should describe primitives', () => {
    expect(describeValue(null)).toEqual(['null', 'null']);
    expect(describeValue(undefined)).toEqual(['undefined', 'undefined']);
    expect(describeValue(42)).toEqual(['number', '42']);
    expect(describeValue(true)).toEqual(['boolean', 'true']);
    expect(describeValue('x')).toEqual(['string', '"x"']);
    expect(describeValue(10n)).toEqual(['bigint', '10n']);
  });

  it('should name functions', () => {
    function splitHoldout(): void {}
    expect(describeValue(splitHoldout)).toEqual(['function', '[Function splitHoldout]']);
  });

  it('should use constructor names for objects', () => {
    class Custom {
      readonly id = 1;
    }
    expect(describeValue([1, 'a'])).toEqual(['Array', '[1,"a"]']);
    expect(describeValue({ a: 1 })).toEqual(['Object', '{"a":1}']);
    expect(describeValue(new Custom())).toEqual(['Custom', '{"id":1}']);
    expect(describeValue(Object.create(null))).toEqual(['Object', '{}']);
  });

  it('should fall back to String for cyclic objects', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(describeValue(cyclic)).toEqual(['Object', '[object Object]']);
  });
});
