/**
 * Unit Tests for the content list adapter
 */

import { describe, it, expect } from 'vitest';
import {
  contentListToSections,
  FAILED_TABLE_TEXT,
  itemLayout,
  ContentItemSchema,
} from '../../../src/services/extraction/content-list.js';
import { ValidationError } from '../../../src/utils/validation.js';

const ITEMS = [
  { type: 'text', page_idx: 0, bbox: [100, 200, 300, 400], text: 'Intro', text_level: 1 },
  { type: 'discarded', page_idx: 0, text: 'running header' },
  { type: 'table', page_idx: 1, bbox: [0, 0, 10, 10] },
  { type: 'image', page_idx: 1, image_caption: ['Fig 1'] },
  { type: 'image', page_idx: 1 },
];

describe('contentListToSections', () => {
  it('returns positioned sections in auto mode', () => {
    const sections = contentListToSections(ITEMS);

    expect(sections).toHaveLength(3);
    expect(sections[0]).toEqual({
      kind: 'positioned',
      text: 'Intro',
      position: { pages: [0], left: 100, right: 300, top: 200, bottom: 400 },
    });
    expect(sections[1].text).toBe(FAILED_TABLE_TEXT);
    expect(sections[2].text).toBe('Fig 1\n');
  });

  it('inlines the tag and the layout in paper mode', () => {
    const [first] = contentListToSections(ITEMS, { mode: 'paper' });
    expect(first).toEqual({ kind: 'layout', text: 'Intro@@1\t100.0\t300.0\t200.0\t400.0##', layout: 'title' });
  });

  it('keeps both layout and position in manual mode', () => {
    const sections = contentListToSections(ITEMS, { mode: 'manual' });
    expect(sections).toHaveLength(3);
    expect(sections[0]).toEqual({
      text: 'Intro',
      layout: 'title',
      position: { pages: [0], left: 100, right: 300, top: 200, bottom: 400 },
    });
    expect(sections[1]).toMatchObject({ text: FAILED_TABLE_TEXT, layout: 'table' });
  });

  it('writes a readable tag for boxes that start left of the page', () => {
    const items = [{ type: 'text', page_idx: 0, bbox: [-5, 10, 20, 30], text: 'Edge' }];
    const [first] = contentListToSections(items, { mode: 'paper' });
    expect(first).toEqual({ kind: 'layout', text: 'Edge@@1\t0.0\t20.0\t10.0\t30.0##', layout: 'text' });
  });

  it('scales relative coordinates to the page size', () => {
    const [first] = contentListToSections(ITEMS.slice(0, 1), { pages: [{ width: 500, height: 1000 }] });
    expect(first).toEqual({
      kind: 'positioned',
      text: 'Intro',
      position: { pages: [0], left: 50, right: 150, top: 200, bottom: 400 },
    });
  });

  it('joins table body, caption and footnote', () => {
    const [section] = contentListToSections([
      { type: 'table', page_idx: 0, table_body: '<table></table>', table_caption: ['Table 1'] },
    ]);
    expect(section.text).toBe('<table></table>Table 1');
  });

  it('throws ValidationError for an unknown block type', () => {
    expect(() => contentListToSections([{ type: 'video', page_idx: 0 }])).toThrow(ValidationError);
  });

  it('throws ValidationError when the list is not an array', () => {
    expect(() => contentListToSections({ type: 'text' })).toThrow(ValidationError);
  });
});

describe('itemLayout', () => {
  it('types plain text blocks by their type', () => {
    expect(itemLayout(ContentItemSchema.parse({ type: 'text', page_idx: 0, text: 'x', text_level: 0 }))).toBe('text');
    expect(itemLayout(ContentItemSchema.parse({ type: 'code', page_idx: 0 }))).toBe('code');
  });
});
