import { describe, it, expect } from 'vitest';
import { parseCount, parseFlags, parseNonNegative } from '../cli-utils';

describe('parseCount', () => {
  it('returns the default when missing', () => {
    expect(parseCount(undefined, 5)).toBe(5);
  });

  it('parses positive whole numbers', () => {
    expect(parseCount('10', 5)).toBe(10);
  });

  it('rejects zero, fractions and junk', () => {
    expect(() => parseCount('0', 5)).toThrow('Invalid count: 0');
    expect(() => parseCount('1.5', 5)).toThrow('Invalid count: 1.5');
    expect(() => parseCount('many', 5)).toThrow('Invalid count: many');
  });
});

describe('parseNonNegative', () => {
  it('returns the default when missing', () => {
    expect(parseNonNegative(undefined, 0.5)).toBe(0.5);
  });

  it('parses zero and fractions', () => {
    expect(parseNonNegative('0', 1)).toBe(0);
    expect(parseNonNegative('0.016', 1)).toBe(0.016);
  });

  it('rejects negatives and junk', () => {
    expect(() => parseNonNegative('-1', 1)).toThrow('Invalid value: -1');
    expect(() => parseNonNegative('soon', 1)).toThrow('Invalid value: soon');
  });
});

describe('parseFlags', () => {
  it('reads spaced and inline flag values', () => {
    const { flags } = parseFlags(['--frames', '30', '--out=tmp/frames']);
    expect(flags.get('frames')).toBe('30');
    expect(flags.get('out')).toBe('tmp/frames');
  });

  it('treats a flag without a value as true', () => {
    const { flags } = parseFlags(['--verbose', '--frames', '2']);
    expect(flags.get('verbose')).toBe('true');
    expect(flags.get('frames')).toBe('2');
  });

  it('collects positionals', () => {
    const { positionals } = parseFlags(['a.svg', '--dt', '0.1', 'b.svg']);
    expect(positionals).toEqual(['a.svg', 'b.svg']);
  });
});
