/**
 * Q&A Bullet Tracking
 *
 * Decides, line by line, whether a line opens a new question in a FAQ-like
 * document. A numbering match alone is not enough: the line must sit at the
 * indentation of earlier questions, must not continue a line ending in a
 * colon, and its index must not go backwards unless the line reads as a
 * question on its own.
 *
 * @module services/chunking/question-bullets
 */

import { indexInt } from '../../utils/numerals.js';

/** Laid-out line as produced by a PDF parser */
export interface QuestionBox {
  text: string;
  /** Left edge */
  x0: number;
  top: number;
  layoutType?: string;
}

export interface QuestionDecision {
  isQuestion: boolean;
  /** Index of the last accepted question (unchanged on rejection) */
  index: number | null;
  /** Raw index text captured by the pattern */
  indexText: string | null;
}

/** Horizontal drift tolerated between question bullets */
const INDENT_TOLERANCE = 10;
/** Lines closer than this below a non-question line continue it */
const LINE_GAP = 20;

const INTERROGATIVE = /^(what|when|where|how|why|which|who|whose|为什么|为啥|哪)/;

function endsWith(text: string, chars: string): boolean {
  return text.length > 0 && chars.includes(text[text.length - 1]);
}

export class QuestionBulletTracker {
  private lastBox: { text: string; x0?: number; top?: number } = { text: '' };
  private lastIndex: number | null = null;
  private lastWasQuestion = false;
  private readonly bulletX0: number[] = [];

  /**
   * @param pattern - anchored question pattern capturing the index in group 1
   */
  constructor(private readonly pattern: RegExp) {}

  /**
   * Judge `box` against the previous lines and remember it as the new
   * previous line.
   */
  check(box: QuestionBox): QuestionDecision {
    const decision = this.judge(box);
    this.lastBox = { text: box.text, x0: box.x0, top: box.top };
    this.lastIndex = decision.index;
    this.lastWasQuestion = decision.isQuestion;
    return decision;
  }

  private reject(): QuestionDecision {
    return { isQuestion: false, index: this.lastIndex, indexText: null };
  }

  private accept(box: QuestionBox, index: number, indexText: string): QuestionDecision {
    this.bulletX0.push(box.x0);
    return { isQuestion: true, index, indexText };
  }

  private judge(box: QuestionBox): QuestionDecision {
    const match = this.pattern.exec(box.text);
    if (!match || match.index !== 0) {
      return this.reject();
    }

    // the first line has nothing to continue
    const { x0: lastX0, top: lastTop } = this.lastBox;
    if (lastX0 !== undefined && lastTop !== undefined) {
      if (this.lastWasQuestion && box.x0 - lastX0 > INDENT_TOLERANCE) {
        return this.reject();
      }
      if (!this.lastWasQuestion && box.x0 >= lastX0 && box.top - lastTop < LINE_GAP) {
        return this.reject();
      }
    }

    const avgX0 =
      this.bulletX0.length > 0 ? this.bulletX0.reduce((sum, x) => sum + x, 0) / this.bulletX0.length : box.x0;
    if (box.x0 - avgX0 > INDENT_TOLERANCE) {
      return this.reject();
    }

    const indexText = match[1] ?? '';
    const index = indexInt(indexText);
    if (endsWith(this.lastBox.text, ':：')) {
      return this.reject();
    }
    if (!this.lastIndex || index >= this.lastIndex) {
      return this.accept(box, index, indexText);
    }
    if (endsWith(box.text, '?？')) {
      return this.accept(box, index, indexText);
    }
    if (box.layoutType === 'title') {
      return this.accept(box, index, indexText);
    }
    const question = box.text.slice(match[0].length).trimStart().toLowerCase();
    if (INTERROGATIVE.test(question)) {
      return this.accept(box, index, indexText);
    }
    return this.reject();
  }
}
