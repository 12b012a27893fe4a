/**
 * Level Assignment Tests
 */

import { describe, it, expect } from 'vitest';
import {
  assignLevel,
  docxQuestionLevel,
  notBullet,
  notTitle,
  titleFrequency,
} from '../../../src/services/chunking/level-assigner.js';
import { normalizeSection } from '../../../src/services/chunking/sections.js';

const MARKDOWN = 4;

describe('notBullet', () => {
  it('flags leading zeros, quantities and dot leaders', () => {
    expect(notBullet('0.5 mg')).toBe(true);
    expect(notBullet('3 个苹果')).toBe(true);
    expect(notBullet('12 - 15')).toBe(true);
    expect(notBullet('4.....12')).toBe(true);
  });

  it('accepts real numbering', () => {
    expect(notBullet('1. Introduction')).toBe(false);
  });
});

describe('notTitle', () => {
  it('keeps article headings as titles', () => {
    expect(notTitle('第三条 适用范围，包括以下内容')).toBe(false);
  });

  it('rejects sentences and long lines', () => {
    expect(notTitle('This reads like a sentence, not a title')).toBe(true);
    expect(notTitle('one two three four five six seven eight nine ten eleven twelve thirteen')).toBe(true);
    expect(notTitle('a'.repeat(32))).toBe(true);
  });

  it('accepts short headings', () => {
    expect(notTitle('Getting Started')).toBe(false);
  });
});

describe('assignLevel', () => {
  it('returns the index of the first matching pattern', () => {
    expect(assignLevel(MARKDOWN, { text: '# Title' })).toBe(0);
    expect(assignLevel(MARKDOWN, { text: '## Setup' })).toBe(1);
    expect(assignLevel(MARKDOWN, { text: '### Deep' })).toBe(2);
    // '###.*' also matches deeper headings
    expect(assignLevel(MARKDOWN, { text: '#### Deeper' })).toBe(2);
  });

  it('trims and replaces ideographic spaces before matching', () => {
    expect(assignLevel(MARKDOWN, { text: '\u3000# Title' })).toBe(0);
  });

  it('uses the pseudo-heading level for title layouts that look like titles', () => {
    expect(assignLevel(MARKDOWN, { text: 'Overview', layout: 'title' })).toBe(6);
    expect(assignLevel(MARKDOWN, { text: 'Page header', layout: 'header' })).toBe(6);
  });

  it('uses the body level otherwise', () => {
    expect(assignLevel(MARKDOWN, { text: 'Plain text, with a comma', layout: 'title' })).toBe(7);
    expect(assignLevel(MARKDOWN, { text: 'body' })).toBe(7);
  });

  it('has only the two fallback levels without a style', () => {
    expect(assignLevel(-1, { text: '# Title' })).toBe(1);
    expect(assignLevel(-1, { text: 'Intro', layout: 'title' })).toBe(0);
  });
});

describe('titleFrequency', () => {
  it('reports the most common heading level', () => {
    const sections = ['## a', '## b', '# c', 'body'].map((t) => normalizeSection(t));
    expect(titleFrequency(MARKDOWN, sections)).toEqual({ mostLevel: 1, levels: [1, 1, 0, 7] });
  });

  it('falls back to the body level without headings', () => {
    const sections = ['body', 'more body'].map((t) => normalizeSection(t));
    expect(titleFrequency(MARKDOWN, sections)).toEqual({ mostLevel: 7, levels: [7, 7] });
  });
});

describe('docxQuestionLevel', () => {
  it('takes the level from a heading style', () => {
    expect(docxQuestionLevel({ text: '\u3000Overview ', styleName: 'Heading 2' }, MARKDOWN)).toEqual({
      level: 2,
      text: 'Overview',
    });
  });

  it('returns level 0 without a numbering style', () => {
    expect(docxQuestionLevel({ text: '## Setup', styleName: 'Normal' })).toEqual({
      level: 0,
      text: '## Setup',
    });
  });

  it('uses one-based pattern levels under a numbering style', () => {
    expect(docxQuestionLevel({ text: '## Setup', styleName: 'Normal' }, MARKDOWN).level).toBe(2);
    expect(docxQuestionLevel({ text: 'body', styleName: 'Normal' }, MARKDOWN).level).toBe(7);
  });
});
