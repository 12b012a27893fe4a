/**
 * Inline Position Tags
 *
 * Extraction output embeds fragment positions directly in the text:
 *
 *   @@<p1>[-<p2>...]\t<left>\t<right>\t<top>\t<bottom>##
 *
 * Pages are one-based and hyphen-joined for fragments spanning pages,
 * coordinates carry one decimal. Internally pages are zero-based.
 *
 * @module services/chunking/position-tags
 */

import type { PositionTag } from '../../models/position.js';

const TAG_REGEX = /@@[0-9-]+\t[0-9.\t]+##/g;
const REMOVE_TAG_REGEX = /@@[\t0-9.-]+?##/g;

/**
 * Encode a position as an inline tag. Negative coordinates are clamped to 0,
 * the grammar has no sign.
 */
export function encodePositionTag(position: PositionTag): string {
  const pages = position.pages.map((p) => String(p + 1)).join('-');
  const coords = [position.left, position.right, position.top, position.bottom].map((c) =>
    Math.max(0, c).toFixed(1)
  );
  return `@@${pages}\t${coords.join('\t')}##`;
}

function decodeTag(tag: string): PositionTag | null {
  const parts = tag.replace(/^@+/, '').replace(/#+$/, '').split('\t');
  if (parts.length !== 5) {
    return null;
  }
  const pages = parts[0].split('-').map((p) => parseInt(p, 10) - 1);
  const [left, right, top, bottom] = parts.slice(1).map((c) => parseFloat(c));
  if (pages.some((p) => Number.isNaN(p)) || [left, right, top, bottom].some((c) => Number.isNaN(c))) {
    return null;
  }
  return { pages, left, right, top, bottom };
}

/**
 * Extract every position tag occurring in a text blob, in order.
 * Malformed tags are skipped.
 */
export function extractPositionTags(text: string): PositionTag[] {
  const positions: PositionTag[] = [];
  for (const match of text.matchAll(TAG_REGEX)) {
    const decoded = decodeTag(match[0]);
    if (decoded) {
      positions.push(decoded);
    }
  }
  return positions;
}

/**
 * Parse a string that consists of exactly one tag.
 * Returns null for anything else.
 */
export function parsePositionTag(value: string): PositionTag | null {
  const trimmed = value.trim();
  const matches = trimmed.match(TAG_REGEX);
  if (!matches || matches.length !== 1 || matches[0] !== trimmed) {
    return null;
  }
  return decodeTag(trimmed);
}

/**
 * Remove all inline tags, leaving the visible text.
 */
export function removePositionTags(text: string): string {
  return text.replace(REMOVE_TAG_REGEX, '');
}
