/**
 * Language heuristics
 *
 * @module utils/language
 */

const ENGLISH_UNIT = /^[`a-zA-Z0-9\s.,':;/"?<>!()-]+$/;
const CJK_IDEOGRAPH = /[\u4e00-\u9fff]/;

/**
 * True when more than 80% of the units consist of ASCII letters, digits and
 * common punctuation only. A string is judged character by character
 * (whitespace counts against it), a list entry by entry (blank entries
 * ignored).
 */
export function isEnglish(texts: string | readonly string[]): boolean {
  const units = typeof texts === 'string' ? Array.from(texts) : texts.filter((t) => t.trim().length > 0);
  if (units.length === 0) {
    return false;
  }
  const english = units.filter((t) => ENGLISH_UNIT.test(t.trim())).length;
  return english / units.length > 0.8;
}

/** More than 20% of the characters are CJK unified ideographs */
export function isChinese(text: string): boolean {
  const chars = Array.from(text);
  if (chars.length === 0) {
    return false;
  }
  const chinese = chars.filter((ch) => CJK_IDEOGRAPH.test(ch)).length;
  return chinese / chars.length > 0.2;
}
