/* packages/replica/test/type-map.spec.ts */
import { describe, it, expect } from 'vitest';
import { isKnownTypeCode, mapType } from '../src';

describe('mapType', () => {
  it('maps the integer family to int64', () => {
    for (const code of [1, 2, 3, 8, 9, 13]) expect(mapType(code, 'string')).toBe('int64');
  });

  it('maps floats, decimals and temporal codes', () => {
    expect(mapType(4, 'string')).toBe('float64');
    expect(mapType(5, 'binary')).toBe('float64');
    expect(mapType(246, 'string')).toBe('decimal');
    expect(mapType(7, 'string')).toBe('datetime');
    expect(mapType(12, 'string')).toBe('datetime');
    expect(mapType(10, 'string')).toBe('date');
  });

  it('maps the NULL code to the null type', () => {
    expect(mapType(6, 'guess')).toBe('null');
  });

  it('resolves text-or-binary codes by string mode', () => {
    for (const code of [15, 247, 248, 249, 250, 251, 252, 253, 254]) {
      expect(mapType(code, 'string')).toBe('string');
      expect(mapType(code, 'binary')).toBe('binary');
      expect(mapType(code, 'guess')).toBe('unknown');
    }
  });

  it('does not guess: the default mode leaves ambiguous codes unknown', () => {
    expect(mapType(253)).toBe('unknown');
  });

  it('maps codes outside the table to unknown without throwing', () => {
    expect(mapType(245, 'string')).toBe('unknown'); // JSON
    expect(mapType(255, 'binary')).toBe('unknown'); // GEOMETRY
    expect(mapType(-1, 'string')).toBe('unknown');
    expect(isKnownTypeCode(245)).toBe(false);
    expect(isKnownTypeCode(253)).toBe(true);
  });

  it('is deterministic', () => {
    expect(mapType(3, 'binary')).toBe(mapType(3, 'binary'));
    expect(mapType(999, 'guess')).toBe(mapType(999, 'guess'));
  });
});
