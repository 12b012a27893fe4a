/**
 * Content List Adapter
 *
 * Converts the JSON "content list" written by layout-analysis extractors
 * (one item per text block, table, image, equation, code block or list, with
 * a page index and a bounding box in a 0-1000 relative space) into sections
 * ready for chunking.
 *
 * @module services/extraction/content-list
 */

import { z } from 'zod';
import type { PositionTag } from '../../models/position.js';
import type { LayoutSection, PositionedSection } from '../../models/section.js';
import { validateInput } from '../../utils/validation.js';
import { encodePositionTag } from '../chunking/position-tags.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ContentTypeSchema = z.enum(['text', 'table', 'image', 'equation', 'code', 'list', 'discarded']);
export type ContentType = z.infer<typeof ContentTypeSchema>;

const Lines = z.array(z.string()).default([]);

export const ContentItemSchema = z
  .object({
    type: ContentTypeSchema.describe('Block type'),
    page_idx: z.number().int().min(0).describe('Zero-based page index'),
    bbox: z
      .tuple([z.number(), z.number(), z.number(), z.number()])
      .default([0, 0, 0, 0])
      .describe('x0, top, x1, bottom in the 0-1000 page space'),
    text: z.string().default(''),
    text_level: z.number().int().optional().describe('Heading level of a text block'),
    table_body: z.string().default(''),
    table_caption: Lines,
    table_footnote: Lines,
    image_caption: Lines,
    image_footnote: Lines,
    code_body: z.string().default(''),
    code_caption: Lines,
    list_items: Lines,
  })
  .passthrough();
export type ContentItem = z.infer<typeof ContentItemSchema>;

export const ContentListSchema = z.array(ContentItemSchema);

export const ContentListOptionsSchema = z.object({
  mode: z
    .enum(['auto', 'manual', 'paper'])
    .default('auto')
    .describe('auto: positioned sections; manual: layout and position; paper: tag inline'),
});

export const FAILED_TABLE_TEXT = 'FAILED TO PARSE TABLE';

/** Relative coordinates are scaled against these when given */
export interface PageSize {
  width: number;
  height: number;
}

/**
 * Section of `manual` mode: block type and position kept side by side.
 * Accepted as a raw section; the position wins on normalization.
 */
export interface ManualSection {
  text: string;
  layout: string;
  position: PositionTag;
}

export type ContentListSection = PositionedSection | LayoutSection | ManualSection;

export interface ContentListOptions {
  mode?: 'auto' | 'manual' | 'paper';
  /** Page sizes (e.g. decoded page rasters), zero-based */
  pages?: readonly PageSize[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Display text of an item; null for discarded items.
 */
export function itemText(item: ContentItem): string | null {
  switch (item.type) {
    case 'text':
    case 'equation':
      return item.text;
    case 'table': {
      const text = item.table_body + item.table_caption.join('\n') + item.table_footnote.join('\n');
      return text.trim() ? text : FAILED_TABLE_TEXT;
    }
    case 'image':
      return item.image_caption.join('') + '\n' + item.image_footnote.join('');
    case 'code':
      return item.code_body + item.code_caption.join('\n');
    case 'list':
      return item.list_items.join('\n');
    case 'discarded':
      return null;
  }
}

/**
 * Position of an item, scaled to pixels when the page size is known.
 */
export function itemPosition(item: ContentItem, pages: readonly PageSize[] = []): PositionTag {
  let [x0, top, x1, bottom] = item.bbox;
  const page = pages[item.page_idx];
  if (page) {
    x0 = (x0 / 1000) * page.width;
    x1 = (x1 / 1000) * page.width;
    top = (top / 1000) * page.height;
    bottom = (bottom / 1000) * page.height;
  }
  return { pages: [item.page_idx], left: x0, right: x1, top, bottom };
}

/** Layout tag of an item; text blocks with a heading level are titles */
export function itemLayout(item: ContentItem): string {
  return item.type === 'text' && item.text_level !== undefined && item.text_level > 0 ? 'title' : item.type;
}

/**
 * Sections for a content list.
 *
 * `auto` yields positioned sections, `manual` keeps the layout next to the
 * position, and `paper` inlines the position tag into layout sections.
 * Discarded items and items with blank text are skipped.
 *
 * @throws ValidationError when an item does not match the content list schema
 */
export function contentListToSections(
  items: unknown,
  options: ContentListOptions = {}
): ContentListSection[] {
  const list = validateInput(ContentListSchema, items);
  const { mode } = validateInput(ContentListOptionsSchema, { mode: options.mode });
  const pages = options.pages ?? [];

  const sections: ContentListSection[] = [];
  let skipped = 0;
  for (const item of list) {
    const text = itemText(item);
    if (!text || text.trim().length === 0) {
      skipped++;
      continue;
    }
    const position = itemPosition(item, pages);
    if (mode === 'paper') {
      sections.push({ kind: 'layout', text: text + encodePositionTag(position), layout: itemLayout(item) });
    } else if (mode === 'manual') {
      sections.push({ text, layout: itemLayout(item), position });
    } else {
      sections.push({ kind: 'positioned', text, position });
    }
  }
  if (skipped > 0) {
    console.error(`[content-list] Skipped ${skipped} discarded or empty item(s) of ${list.length}`);
  }
  return sections;
}
