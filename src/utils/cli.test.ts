import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseInteger } from './cli';

describe('parseInteger', () => {
  it('should parse non-negative integers', () => {
    expect(parseInteger('0')).toBe(0);
    expect(parseInteger('20')).toBe(20);
  });

  it('should reject values that are not non-negative integers', () => {
    expect(() => parseInteger('abc')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('-3')).toThrow('Expected a non-negative integer.');
  });

  it('should reject values with trailing garbage', () => {
    expect(() => parseInteger('12abc')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('')).toThrow(InvalidArgumentError);
  });
});
