/**
 * Section Normalization Tests
 */

import { describe, it, expect } from 'vitest';
import {
  filterMeaningfulSections,
  normalizeSection,
  sectionLayout,
  sectionPositionTag,
} from '../../../src/services/chunking/sections.js';

const TAG = '@@1\t1.0\t2.0\t3.0\t4.0##';

describe('normalizeSection', () => {
  it('turns a string into a plain section', () => {
    expect(normalizeSection('hello')).toEqual({ kind: 'plain', text: 'hello' });
  });

  it('reads a tuple with a layout name as a layout section', () => {
    expect(normalizeSection(['Intro', 'title'])).toEqual({ kind: 'layout', text: 'Intro', layout: 'title' });
  });

  it('reads a tuple with a position tag as a positioned section', () => {
    expect(normalizeSection(['Intro', TAG])).toEqual({
      kind: 'positioned',
      text: 'Intro',
      position: { pages: [0], left: 1, right: 2, top: 3, bottom: 4 },
    });
  });

  it('prefers a valid position over a layout in object form', () => {
    const section = normalizeSection({ text: 'Intro', layout: 'title', position: TAG });
    expect(section.kind).toBe('positioned');
  });

  it('falls back to the layout when the position string is not a tag', () => {
    expect(normalizeSection({ text: 'Intro', layout: 'text', position: 'n/a' })).toEqual({
      kind: 'layout',
      text: 'Intro',
      layout: 'text',
    });
  });
});

describe('section accessors', () => {
  it('sectionLayout is empty for non-layout sections', () => {
    expect(sectionLayout(normalizeSection(['a', 'title']))).toBe('title');
    expect(sectionLayout(normalizeSection('a'))).toBe('');
  });

  it('sectionPositionTag re-encodes the position', () => {
    expect(sectionPositionTag(normalizeSection(['a', TAG]))).toBe(TAG);
    expect(sectionPositionTag(normalizeSection('a'))).toBe('');
  });
});

describe('filterMeaningfulSections', () => {
  it('drops blank, single-character and numeric fragments', () => {
    const sections = ['ok text', '  ', 'x', '42', `7${TAG}`, 'ab'].map((t) => normalizeSection(t));
    expect(filterMeaningfulSections(sections).map((s) => s.text)).toEqual(['ok text', 'ab']);
  });
});
