/**
 * Token Counting and Tokenization
 *
 * Mergers only depend on the TokenCounter / Tokenizer interfaces so that the
 * host can plug in the tokenizer of its embedding model. The defaults count
 * with gpt-tokenizer and produce a whitespace-joined token string for
 * full-text indexing.
 *
 * @module services/tokenizer/token-counter
 */

import { encode } from 'gpt-tokenizer';

export interface TokenCounter {
  /** Deterministic, non-negative token count */
  count(text: string): number;
}

export interface Tokenizer {
  /** Coarse token representation, tokens joined by single spaces */
  tokenize(text: string): string;
  /** Refinement of a coarse token string */
  fineGrainedTokenize(tokens: string): string;
}

/**
 * BPE token counter (cl100k-compatible encoding)
 */
export class GptTokenCounter implements TokenCounter {
  count(text: string): number {
    if (text.length === 0) {
      return 0;
    }
    try {
      return encode(text).length;
    } catch (error) {
      console.error(
        `[token-counter] Encoding failed, estimating from length: ${error instanceof Error ? error.message : String(error)}`
      );
      return Math.ceil(text.length / 4);
    }
  }

  countAll(texts: readonly string[]): number {
    return texts.reduce((sum, text) => sum + this.count(text), 0);
  }
}

const CJK = '\\u3400-\\u4dbf\\u4e00-\\u9fff\\uf900-\\ufaff';
const CJK_RUN = new RegExp(`[${CJK}]`);
const WORD_CHAR = `(?![${CJK}])[\\p{L}\\p{N}]`;
const TOKEN_REGEX = new RegExp(`[${CJK}]+|${WORD_CHAR}(?:${WORD_CHAR}|[._/-])*`, 'gu');

/**
 * Lightweight tokenizer: lower-cased word/number tokens, CJK kept in runs
 * for the coarse form and split into characters for the fine form.
 */
export class SimpleTokenizer implements Tokenizer {
  tokenize(text: string): string {
    const tokens = text.toLowerCase().match(TOKEN_REGEX) ?? [];
    return tokens.map((t) => t.replace(/[._/-]+$/, '')).join(' ');
  }

  fineGrainedTokenize(tokens: string): string {
    const fine: string[] = [];
    for (const token of tokens.split(' ')) {
      if (token.length === 0) continue;
      if (CJK_RUN.test(token)) {
        for (const ch of token) {
          fine.push(ch);
        }
        continue;
      }
      const parts = token.split(/[._/-]+/).filter((p) => p.length > 0);
      if (parts.length > 1) {
        fine.push(parts.join(' '));
      } else {
        fine.push(token);
      }
    }
    return fine.join(' ');
  }
}

export const defaultTokenCounter = new GptTokenCounter();
export const defaultTokenizer = new SimpleTokenizer();
