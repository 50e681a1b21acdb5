import { describe, it, expect } from 'vitest';
import { parseIndexFromDirName } from '../locator/index-parser.js';
import { IndexParseError } from '../utils/errors.js';

describe('parseIndexFromDirName', () => {
  it('should read the index before "th"', () => {
    expect(parseIndexFromDirName('12th fibonacci number')).toBe(12);
  });

  it('should split on the first occurrence only', () => {
    expect(parseIndexFromDirName('5th month then more')).toBe(5);
  });

  it('should accept signed values', () => {
    expect(parseIndexFromDirName('-3th x')).toBe(-3);
    expect(parseIndexFromDirName('+4th x')).toBe(4);
  });

  it('should normalise negative zero', () => {
    expect(parseIndexFromDirName('-0th x')).toBe(0);
  });

  it('should accept the 32-bit bounds', () => {
    expect(parseIndexFromDirName('2147483647th')).toBe(2147483647);
    expect(parseIndexFromDirName('-2147483648th')).toBe(-2147483648);
  });

  it('should honour a custom delimiter', () => {
    expect(parseIndexFromDirName('7_run', '_')).toBe(7);
  });

  it('should reject a name without the delimiter', () => {
    expect(() => parseIndexFromDirName('abc')).toThrow(IndexParseError);
    expect(() => parseIndexFromDirName('abc')).toThrow('Directory name "abc" does not contain "th"');
  });

  it('should reject a name whose prefix is not an integer', () => {
    expect(() => parseIndexFromDirName('month 5th')).toThrow(
      'Directory name "month 5th" does not start with an integer index'
    );
  });

  it.each(['th fibonacci', '12 th', ' 12th', '1.5th', '0x10th', '12e3th'])('should reject "%s"', name => {
    expect(() => parseIndexFromDirName(name)).toThrow(IndexParseError);
  });

  it('should reject values outside 32 bits', () => {
    expect(() => parseIndexFromDirName('2147483648th')).toThrow('Index 2147483648 in "2147483648th" is out of range');
  });
});
