import { describe, it, expect } from 'vitest';
import {
  indexInt,
  parseChineseNumber,
  parseEnglishNumber,
  parseRomanNumber,
} from '../../../src/utils/numerals.js';

describe('indexInt', () => {
  it.each([
    ['12', 12],
    ['twenty one', 21],
    ['one hundred and five', 105],
    ['一百二十三', 123],
    ['十二', 12],
    ['XIV', 14],
    ['iv', 4],
    ['abc', -1],
    ['', -1],
  ])('parses %j as %d', (input, expected) => {
    expect(indexInt(input)).toBe(expected);
  });
});

describe('parseEnglishNumber', () => {
  it('handles scales and hyphens', () => {
    expect(parseEnglishNumber('two thousand forty-two')).toBe(2042);
  });

  it('returns null for unknown words', () => {
    expect(parseEnglishNumber('many')).toBeNull();
  });
});

describe('parseChineseNumber', () => {
  it('handles 万 and zeros', () => {
    expect(parseChineseNumber('一万零五')).toBe(10005);
  });

  it('rejects digits without a unit between them', () => {
    expect(parseChineseNumber('一二')).toBeNull();
  });
});

describe('parseRomanNumber', () => {
  it('rejects malformed numerals', () => {
    expect(parseRomanNumber('IIII')).toBeNull();
    expect(parseRomanNumber('MCMXCIV')).toBe(1994);
  });
});
