/**
 * Level Assignment
 *
 * Maps one fragment to a hierarchy level under a numbering style:
 * the index of the first matching pattern, then two fallbacks after the
 * patterns are exhausted:
 *
 *   patternCount      layout-detected heading (title/head layout that looks
 *                     like a title)
 *   patternCount + 1  plain body
 *
 * @module services/chunking/level-assigner
 */

import type { LeveledFragment, Section } from '../../models/section.js';
import { PATTERN_REGISTRY, PatternRegistry } from './bullet-patterns.js';
import { sectionLayout, visibleText } from './sections.js';

/**
 * Numbered-looking lines that are not list structure: leading zero,
 * quantities ("3 个", "12 - 15"), dot leaders ("4.....").
 */
const NOT_BULLET_PATTERNS: readonly RegExp[] = [/^0/, /^[0-9]+ +[0-9~个只-]/, /^[0-9]+\.{2,}/];

const ARTICLE_HEADING = /^第[零一二三四五六七八九十百0-9]+条/;
const HEADING_LAYOUT = /(title|head)/;
const SENTENCE_PUNCTUATION = /[,;，。；！!]/;

/** Replace ideographic spaces and trim */
export function normalizeFragmentText(text: string): string {
  return text.replace(/\u3000/g, ' ').trim();
}

export function notBullet(line: string): boolean {
  return NOT_BULLET_PATTERNS.some((p) => p.test(line));
}

/**
 * True when a line tagged as a heading reads like body text:
 * too many words, one long unspaced run, or sentence punctuation.
 * Article headings ("第N条") are always titles.
 */
export function notTitle(text: string): boolean {
  if (ARTICLE_HEADING.test(text)) {
    return false;
  }
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  if (words.length > 12 || (!text.includes(' ') && text.length >= 32)) {
    return true;
  }
  return SENTENCE_PUNCTUATION.test(text);
}

export function isHeadingLayout(layout: string): boolean {
  return HEADING_LAYOUT.test(layout);
}

/**
 * Level of one fragment under a style (-1 = no style, pattern list empty).
 */
export function assignLevel(
  styleIndex: number,
  section: { text: string; layout?: string },
  registry: PatternRegistry = PATTERN_REGISTRY
): number {
  const patterns = registry.patternsOf(styleIndex);
  const text = normalizeFragmentText(section.text);

  for (let i = 0; i < patterns.length; i++) {
    if (patterns[i].test(text) && !notBullet(text)) {
      return i;
    }
  }

  if (isHeadingLayout(section.layout ?? '') && !notTitle(visibleText(text))) {
    return patterns.length;
  }
  return patterns.length + 1;
}

/** assignLevel over a normalized section */
export function levelOfSection(
  styleIndex: number,
  section: Section,
  registry: PatternRegistry = PATTERN_REGISTRY
): number {
  return assignLevel(styleIndex, { text: section.text, layout: sectionLayout(section) }, registry);
}

/**
 * Levels of all sections plus the most frequent heading level.
 *
 * `mostLevel` is the most common level that is a pattern level or the
 * pseudo-heading level (ties go to the level seen first); it is the body
 * level when no section reaches either.
 */
export function titleFrequency(
  styleIndex: number,
  sections: readonly Section[],
  registry: PatternRegistry = PATTERN_REGISTRY
): { mostLevel: number; levels: number[] } {
  const bulletsSize = registry.patternsOf(styleIndex).length;
  if (sections.length === 0 || styleIndex < 0) {
    return { mostLevel: bulletsSize + 1, levels: sections.map(() => bulletsSize + 1) };
  }

  const levels = sections.map((s) => levelOfSection(styleIndex, s, registry));

  const counts = new Map<number, number>();
  for (const level of levels) {
    counts.set(level, (counts.get(level) ?? 0) + 1);
  }
  const ranked = Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
  const top = ranked.find(([level]) => level <= bulletsSize);

  return { mostLevel: top ? top[0] : bulletsSize + 1, levels };
}

/** DOCX paragraph as read from the document: text and style name */
export interface DocxParagraph {
  text: string;
  /** e.g. "Heading 2", "Normal" */
  styleName: string;
}

const DOCX_HEADING_STYLE = /^Heading\b.*?(\d+)$/;

/**
 * Level of a DOCX paragraph: the number of a "Heading N" style, otherwise
 * one-based pattern level under the style (0 with no style, patternCount + 1
 * for body text).
 */
export function docxQuestionLevel(
  paragraph: DocxParagraph,
  styleIndex = -1,
  registry: PatternRegistry = PATTERN_REGISTRY
): LeveledFragment {
  const text = normalizeFragmentText(paragraph.text);
  const heading = DOCX_HEADING_STYLE.exec(paragraph.styleName);
  if (heading) {
    return { level: parseInt(heading[1], 10), text };
  }
  if (styleIndex < 0) {
    return { level: 0, text };
  }
  const patterns = registry.patternsOf(styleIndex);
  const index = patterns.findIndex((p) => p.test(text));
  return { level: index >= 0 ? index + 1 : patterns.length + 1, text };
}
