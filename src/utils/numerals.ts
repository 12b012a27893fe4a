/**
 * Numeral parsing for list and question indices
 *
 * Accepts decimal integers, English number words ("twenty one"), Chinese
 * numerals (一百二十三) and Roman numerals (XIV). Anything else is -1.
 *
 * @module utils/numerals
 */

const ENGLISH_UNITS: Record<string, number> = {
  zero: 0, one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9,
  ten: 10, eleven: 11, twelve: 12, thirteen: 13, fourteen: 14, fifteen: 15, sixteen: 16,
  seventeen: 17, eighteen: 18, nineteen: 19,
  twenty: 20, thirty: 30, forty: 40, fifty: 50, sixty: 60, seventy: 70, eighty: 80, ninety: 90,
};

const ENGLISH_SCALES: Record<string, number> = {
  thousand: 1_000,
  million: 1_000_000,
  billion: 1_000_000_000,
};

const CHINESE_DIGITS: Record<string, number> = {
  零: 0, 〇: 0, 一: 1, 二: 2, 两: 2, 三: 3, 四: 4, 五: 5, 六: 6, 七: 7, 八: 8, 九: 9,
};

const CHINESE_UNITS: Record<string, number> = { 十: 10, 百: 100, 千: 1_000 };
const CHINESE_SCALES: Record<string, number> = { 万: 10_000, 亿: 100_000_000 };

const ROMAN_VALUES: Record<string, number> = { I: 1, V: 5, X: 10, L: 50, C: 100, D: 500, M: 1000 };
const ROMAN_FORM = /^M{0,3}(CM|CD|D?C{0,3})(XC|XL|L?X{0,3})(IX|IV|V?I{0,3})$/;

function lookup(table: Record<string, number>, key: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function parseEnglishNumber(input: string): number | null {
  const words = input
    .toLowerCase()
    .replace(/-/g, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 0 && w !== 'and');
  if (words.length === 0) return null;

  let total = 0;
  let current = 0;
  for (const word of words) {
    const unit = lookup(ENGLISH_UNITS, word);
    if (unit !== undefined) {
      current += unit;
      continue;
    }
    if (word === 'hundred') {
      current = (current || 1) * 100;
      continue;
    }
    const scale = lookup(ENGLISH_SCALES, word);
    if (scale === undefined) return null;
    total += (current || 1) * scale;
    current = 0;
  }
  return total + current;
}

export function parseChineseNumber(input: string): number | null {
  const chars = Array.from(input.trim());
  if (chars.length === 0) return null;

  let total = 0;
  let section = 0;
  let digit: number | null = null;
  for (const ch of chars) {
    const d = lookup(CHINESE_DIGITS, ch);
    if (d !== undefined) {
      // two digits in a row without a unit in between (一二) is not a number
      if (digit !== null && digit !== 0 && d !== 0) return null;
      digit = d;
      continue;
    }
    const unit = lookup(CHINESE_UNITS, ch);
    if (unit !== undefined) {
      section += (digit ?? 1) * unit;
      digit = null;
      continue;
    }
    const scale = lookup(CHINESE_SCALES, ch);
    if (scale === undefined) return null;
    total += (section + (digit ?? 0)) * scale;
    section = 0;
    digit = null;
  }
  return total + section + (digit ?? 0);
}

export function parseRomanNumber(input: string): number | null {
  const upper = input.trim().toUpperCase();
  if (upper.length === 0 || !ROMAN_FORM.test(upper)) return null;

  let value = 0;
  for (let i = 0; i < upper.length; i++) {
    const cur = ROMAN_VALUES[upper[i]];
    const next = i + 1 < upper.length ? ROMAN_VALUES[upper[i + 1]] : 0;
    value += cur < next ? -cur : cur;
  }
  return value;
}

/**
 * Integer value of an index string in any supported notation, -1 if none.
 */
export function indexInt(indexStr: string): number {
  const trimmed = indexStr.trim();
  if (/^[+-]?[0-9]+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  return parseEnglishNumber(trimmed) ?? parseChineseNumber(trimmed) ?? parseRomanNumber(trimmed) ?? -1;
}
