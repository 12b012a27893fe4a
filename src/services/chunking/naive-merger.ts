/**
 * Budgeted Flat Merge
 *
 * Final pass producing retrieval-sized chunks. Fragments are appended to a
 * running chunk until its accounted token count passes the budget; the next
 * chunk then opens with the tail of the previous one when overlap is set.
 *
 * A delimiter string containing backtick-quoted literals (e.g. "`\n\n`")
 * switches to hard-split mode: every fragment is split on the literals and
 * each segment becomes one chunk, whatever its size.
 *
 * @module services/chunking/naive-merger
 */

import type { Chunk } from '../../models/chunk.js';
import type { RasterImage } from '../../models/image.js';
import type { RawSection } from '../../models/section.js';
import { concatImages } from '../images/concat.js';
import { defaultTokenCounter, type TokenCounter } from '../tokenizer/token-counter.js';
import { extractPositionTags, removePositionTags } from './position-tags.js';
import { normalizeSection, sectionPositionTag } from './sections.js';

export const DEFAULT_DELIMITER = '\n。；！？';

/** Fragments counting fewer tokens drop their position tag */
const MIN_TAGGED_TOKENS = 8;

export interface NaiveMergeOptions {
  /** Token budget per chunk (default: 128) */
  chunkTokenNum?: number;
  /** Delimiter string; backtick-quoted literals enable hard-split mode */
  delimiter?: string;
  /** Share of each chunk repeated at the start of the next, 0-99 (default: 0) */
  overlappedPercent?: number;
  counter?: TokenCounter;
}

/** DOCX paragraph with its inline image */
export interface DocxSection {
  text: string;
  image: RasterImage | null;
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Backtick-quoted literals of a delimiter string, in order of appearance.
 */
export function extractCustomDelimiters(delimiter: string): string[] {
  return Array.from(delimiter.matchAll(/`([^`]+)`/g), (m) => m[1]);
}

/** Alternation of unique literals, longest first */
function alternation(literals: readonly string[]): string {
  return Array.from(new Set(literals))
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

/**
 * Pattern source splitting on every delimiter of a delimiter string: quoted literals and
 * each single character outside the quotes, longest first.
 */
export function getDelimiters(delimiters: string): string {
  const dels: string[] = [];
  let start = 0;
  for (const m of delimiters.matchAll(/`([^`]+)`/g)) {
    const from = m.index ?? 0;
    dels.push(m[1]);
    for (const ch of delimiters.slice(start, from)) dels.push(ch);
    start = from + m[0].length;
  }
  if (start < delimiters.length) {
    for (const ch of delimiters.slice(start)) dels.push(ch);
  }

  return dels
    .sort((a, b) => b.length - a.length)
    .filter((d) => d.length > 0)
    .map(escapeRegExp)
    .join('|');
}

/**
 * Split `text` on the literals, dropping the literals themselves.
 */
function splitOnLiterals(text: string, source: string, skipEmpty: boolean): string[] {
  const literal = new RegExp(`^(?:${source})$`);
  return text
    .split(new RegExp(`(${source})`))
    .filter((piece) => !literal.test(piece) && !(skipEmpty && piece.length === 0));
}

function toChunk(text: string, tokenCount: number, image: RasterImage | null): Chunk {
  return { text, tokenCount, positionTags: extractPositionTags(text), image, docType: null };
}

function toTextAndTag(raw: RawSection): [string, string] {
  const section = normalizeSection(raw);
  return [section.text, sectionPositionTag(section)];
}

/**
 * Running chunk list with per-chunk accounted token counts.
 * Index 0 is an empty sentinel so the first fragment always opens a chunk.
 */
class BudgetedAccumulator {
  private readonly texts: string[] = [''];
  private readonly counts: number[] = [0];
  private readonly images: Array<RasterImage | null> = [null];
  private readonly threshold: number;

  constructor(
    chunkTokenNum: number,
    private readonly overlappedPercent: number,
    private readonly counter: TokenCounter
  ) {
    this.threshold = (chunkTokenNum * (100 - overlappedPercent)) / 100;
  }

  add(fragment: string, tag: string, image: RasterImage | null = null): void {
    const tokens = this.counter.count(fragment);
    const pos = tokens < MIN_TAGGED_TOKENS ? '' : tag;
    const last = this.texts.length - 1;
    let text = fragment;

    if (this.texts[last] === '' || this.counts[last] > this.threshold) {
      const previous = removePositionTags(this.texts[last]);
      const overlapStart = Math.floor((previous.length * (100 - this.overlappedPercent)) / 100);
      text = previous.slice(overlapStart) + text;
      if (!text.includes(pos)) {
        text += pos;
      }
      this.texts.push(text);
      this.images.push(image);
      this.counts.push(tokens);
      return;
    }

    if (!this.texts[last].includes(pos)) {
      text += pos;
    }
    this.texts[last] += text;
    this.images[last] = concatImages(this.images[last], image);
    this.counts[last] += tokens;
  }

  chunks(): Chunk[] {
    const result: Chunk[] = [];
    for (let i = 1; i < this.texts.length; i++) {
      result.push(toChunk(this.texts[i], this.counts[i], this.images[i]));
    }
    return result;
  }
}

function hardSplit(
  inputs: ReadonlyArray<{ text: string; tag: string; image: RasterImage | null }>,
  source: string,
  counter: TokenCounter,
  skipEmpty: boolean
): Chunk[] {
  const chunks: Chunk[] = [];
  for (const { text, tag, image } of inputs) {
    for (const segment of splitOnLiterals(text, source, skipEmpty)) {
      let chunkText = '\n' + segment;
      const pos = counter.count(chunkText) < MIN_TAGGED_TOKENS ? '' : tag;
      if (pos && !chunkText.includes(pos)) {
        chunkText += pos;
      }
      chunks.push(toChunk(chunkText, counter.count(chunkText), image));
    }
  }
  return chunks;
}

/**
 * Merge fragments into token-budgeted chunks.
 */
export function naiveMerge(sections: string | readonly RawSection[], options: NaiveMergeOptions = {}): Chunk[] {
  const list: readonly RawSection[] = typeof sections === 'string' ? [sections] : sections;
  if (list.length === 0) {
    return [];
  }
  const chunkTokenNum = options.chunkTokenNum ?? 128;
  const overlappedPercent = options.overlappedPercent ?? 0;
  const counter = options.counter ?? defaultTokenCounter;
  const inputs = list.map((raw) => {
    const [text, tag] = toTextAndTag(raw);
    return { text, tag, image: null };
  });

  const custom = extractCustomDelimiters(options.delimiter ?? DEFAULT_DELIMITER);
  if (custom.length > 0) {
    return hardSplit(inputs, alternation(custom), counter, false);
  }

  const acc = new BudgetedAccumulator(chunkTokenNum, overlappedPercent, counter);
  for (const { text, tag } of inputs) {
    acc.add('\n' + text, tag);
  }
  return acc.chunks();
}

/**
 * naiveMerge with one image per fragment; images of merged fragments are
 * stacked vertically.
 */
export function naiveMergeWithImages(
  texts: readonly RawSection[],
  images: ReadonlyArray<RasterImage | null>,
  options: NaiveMergeOptions = {}
): Chunk[] {
  if (texts.length === 0 || texts.length !== images.length) {
    if (texts.length !== images.length) {
      console.error(`[naive-merger] ${texts.length} texts but ${images.length} images, nothing merged`);
    }
    return [];
  }
  const chunkTokenNum = options.chunkTokenNum ?? 128;
  const overlappedPercent = options.overlappedPercent ?? 0;
  const counter = options.counter ?? defaultTokenCounter;
  const inputs = texts.map((raw, i) => {
    const [text, tag] = toTextAndTag(raw);
    return { text, tag, image: images[i] };
  });

  const custom = extractCustomDelimiters(options.delimiter ?? DEFAULT_DELIMITER);
  if (custom.length > 0) {
    return hardSplit(inputs, alternation(custom), counter, false);
  }

  const acc = new BudgetedAccumulator(chunkTokenNum, overlappedPercent, counter);
  for (const { text, tag, image } of inputs) {
    acc.add('\n' + text, tag, image);
  }
  return acc.chunks();
}

/**
 * DOCX variant: no overlap, no position tags, empty split segments skipped.
 */
export function naiveMergeDocx(
  sections: readonly DocxSection[],
  options: Omit<NaiveMergeOptions, 'overlappedPercent'> = {}
): Chunk[] {
  if (sections.length === 0) {
    return [];
  }
  const chunkTokenNum = options.chunkTokenNum ?? 128;
  const counter = options.counter ?? defaultTokenCounter;

  const custom = extractCustomDelimiters(options.delimiter ?? DEFAULT_DELIMITER);
  if (custom.length > 0) {
    return hardSplit(
      sections.map((s) => ({ text: s.text, tag: '', image: s.image })),
      alternation(custom),
      counter,
      true
    );
  }

  const chunks: Chunk[] = [];
  for (const { text, image } of sections) {
    const fragment = '\n' + text;
    const tokens = counter.count(fragment);
    const last = chunks[chunks.length - 1];
    if (!last || last.tokenCount > chunkTokenNum) {
      chunks.push(toChunk(fragment, tokens, image));
      continue;
    }
    last.text += fragment;
    last.image = concatImages(last.image, image);
    last.tokenCount += tokens;
  }
  return chunks;
}
