/**
 * Section normalization
 *
 * Converts the loose shapes produced by extraction into the Section variant,
 * once, so that mergers never branch on input shape.
 *
 * @module services/chunking/sections
 */

import type { RawSection, Section } from '../../models/section.js';
import { encodePositionTag, parsePositionTag, removePositionTags } from './position-tags.js';

/**
 * Normalize one raw section.
 *
 * A `[text, second]` tuple is positioned when `second` is a single position
 * tag and a layout section otherwise.
 */
export function normalizeSection(raw: RawSection): Section {
  if (typeof raw === 'string') {
    return { kind: 'plain', text: raw };
  }

  if (!('text' in raw)) {
    const [text, second] = raw;
    const position = parsePositionTag(second);
    if (position) {
      return { kind: 'positioned', text, position };
    }
    return { kind: 'layout', text, layout: second };
  }

  const { text, layout, position } = raw;
  if (position !== undefined) {
    const parsed = typeof position === 'string' ? parsePositionTag(position) : position;
    if (parsed) {
      return { kind: 'positioned', text, position: parsed };
    }
  }
  if (layout !== undefined) {
    return { kind: 'layout', text, layout };
  }
  return { kind: 'plain', text };
}

export function normalizeSections(raws: readonly RawSection[]): Section[] {
  return raws.map(normalizeSection);
}

/** Layout tag of a section, '' when it has none */
export function sectionLayout(section: Section): string {
  return section.kind === 'layout' ? section.layout : '';
}

/** Encoded position tag of a positioned section, '' otherwise */
export function sectionPositionTag(section: Section): string {
  return section.kind === 'positioned' ? encodePositionTag(section.position) : '';
}

/** Section text with inline tags removed, trimmed */
export function visibleText(text: string): string {
  return removePositionTags(text).trim();
}

/**
 * Drop fragments whose visible text is empty, a single character, or
 * purely numeric (page numbers, stray counters).
 */
export function filterMeaningfulSections(sections: readonly Section[]): Section[] {
  return sections.filter((s) => {
    const visible = visibleText(s.text);
    return visible.length > 1 && !/^[0-9]+$/.test(visible);
  });
}
