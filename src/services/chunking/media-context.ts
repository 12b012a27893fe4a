/**
 * Media Context Attacher
 *
 * Post-pass over built chunk records. Table and image records get the text
 * of their neighbouring text records prepended/appended, within a token
 * budget per direction, so that a caption-less figure is still retrievable
 * by the prose around it.
 *
 * Neighbours are taken in reading order: when any record carries a position,
 * records are sorted by (page, top, left, original index), unpositioned ones
 * following in original order, and the array is left in that order.
 *
 * @module services/chunking/media-context
 */

import type { ChunkRecord } from '../../models/chunk.js';
import {
  defaultTokenCounter,
  defaultTokenizer,
  type TokenCounter,
  type Tokenizer,
} from '../tokenizer/token-counter.js';

export interface MediaContextOptions {
  /** Token budget per direction for table records, 0 disables */
  tableContextSize?: number;
  /** Token budget per direction for image records, 0 disables */
  imageContextSize?: number;
  counter?: TokenCounter;
  tokenizer?: Tokenizer;
}

const SENTENCE_END = /([.。！？!?；;：:\n])/;
const SENTENCE_END_ONLY = /^[.。！？!?；;：:\n]$/;

function isImageRecord(record: ChunkRecord): boolean {
  if (record.docType === 'image') return true;
  return Boolean(record.image) && record.content.trim().length === 0;
}

function isTableRecord(record: ChunkRecord): boolean {
  return record.docType === 'table';
}

function isTextRecord(record: ChunkRecord): boolean {
  return !isImageRecord(record) && !isTableRecord(record);
}

/**
 * Split into sentences, each keeping its terminating punctuation.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let buf = '';
  for (const part of text.split(SENTENCE_END)) {
    if (!part) continue;
    buf += part;
    if (SENTENCE_END_ONLY.test(part)) {
      sentences.push(buf);
      buf = '';
    }
  }
  if (buf) {
    sentences.push(buf);
  }
  return sentences;
}

/**
 * Whole sentences from the head (or tail) of `text` up to `budget` tokens.
 * The sentence that overflows the budget is still included, then collection
 * stops.
 */
export function trimToTokens(text: string, budget: number, fromTail: boolean, counter: TokenCounter): string {
  if (budget <= 0 || !text) {
    return '';
  }
  const sentences = splitSentences(text);
  const ordered = fromTail ? [...sentences].reverse() : sentences;
  const collected: string[] = [];
  let remaining = budget;
  for (const sentence of ordered) {
    const tokens = counter.count(sentence);
    if (tokens <= 0) continue;
    collected.push(sentence);
    if (tokens > remaining) break;
    remaining -= tokens;
  }
  if (fromTail) {
    collected.reverse();
  }
  return collected.join('');
}

interface Anchor {
  index: number;
  page: number;
  top: number;
  left: number;
}

function anchorOf(record: ChunkRecord, index: number): Anchor | null {
  const page = record.pageNumbers?.[0];
  const top = record.tops?.[0];
  if (page === undefined || top === undefined) {
    return null;
  }
  const left = record.positions?.[0]?.[1] ?? 0;
  return { index, page: Math.trunc(page), top: Math.trunc(top), left: Math.trunc(left) };
}

/** Indices in reading order, and whether any record had a position */
function readingOrder(records: readonly ChunkRecord[]): { order: number[]; positioned: boolean } {
  const anchors: Anchor[] = [];
  const unpositioned: number[] = [];
  records.forEach((record, index) => {
    const anchor = anchorOf(record, index);
    if (anchor) {
      anchors.push(anchor);
    } else {
      unpositioned.push(index);
    }
  });

  if (anchors.length === 0) {
    return { order: records.map((_, i) => i), positioned: false };
  }
  anchors.sort((a, b) => a.page - b.page || a.top - b.top || a.left - b.left || a.index - b.index);
  return { order: [...anchors.map((a) => a.index), ...unpositioned], positioned: true };
}

function collectContext(
  records: readonly ChunkRecord[],
  order: readonly number[],
  from: number,
  step: 1 | -1,
  budget: number,
  counter: TokenCounter
): string[] {
  const context: string[] = [];
  let remaining = budget;
  for (let pos = from + step; pos >= 0 && pos < order.length; pos += step) {
    if (remaining <= 0) break;
    const neighbour = records[order[pos]];
    if (!isTextRecord(neighbour)) break;
    let text = neighbour.content;
    if (!text) continue;
    let tokens = counter.count(text);
    if (tokens <= 0) continue;
    if (tokens > remaining) {
      text = trimToTokens(text, remaining, step === -1, counter);
      tokens = counter.count(text);
    }
    context.push(text);
    remaining -= tokens;
  }
  if (step === -1) {
    context.reverse();
  }
  return context;
}

/**
 * Attach neighbouring text to table and image records.
 *
 * Mutates `records` in place (content, token fields and order) and returns it.
 */
export function attachMediaContext(records: ChunkRecord[], options: MediaContextOptions = {}): ChunkRecord[] {
  const tableContextSize = options.tableContextSize ?? 0;
  const imageContextSize = options.imageContextSize ?? 0;
  if (records.length === 0 || (tableContextSize <= 0 && imageContextSize <= 0)) {
    return records;
  }
  const counter = options.counter ?? defaultTokenCounter;
  const tokenizer = options.tokenizer ?? defaultTokenizer;

  const { order, positioned } = readingOrder(records);

  // contexts are computed against the original texts, then written back
  const updates = new Map<number, string>();
  order.forEach((index, sortedPos) => {
    const record = records[index];
    const budget = isImageRecord(record) ? imageContextSize : isTableRecord(record) ? tableContextSize : 0;
    if (budget <= 0) return;

    const before = collectContext(records, order, sortedPos, -1, budget, counter);
    const after = collectContext(records, order, sortedPos, 1, budget, counter);
    if (before.length === 0 && after.length === 0) return;

    const pieces = [...before];
    if (record.content) {
      pieces.push(record.content);
    }
    for (const text of after) pieces.push(text);
    updates.set(index, pieces.join('\n'));
  });

  for (const [index, combined] of updates) {
    const record = records[index];
    if (combined === record.content) continue;
    record.content = combined;
    if (record.contentTokens !== undefined) {
      record.contentTokens = tokenizer.tokenize(combined);
    }
    if (record.contentFineTokens !== undefined) {
      record.contentFineTokens = tokenizer.fineGrainedTokenize(record.contentTokens ?? tokenizer.tokenize(combined));
    }
  }

  if (positioned) {
    // no argument spreading: the record list may be large
    const reordered = order.map((i) => records[i]);
    records.length = 0;
    for (const record of reordered) {
      records.push(record);
    }
  }
  return records;
}
