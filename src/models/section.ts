/**
 * Section interfaces
 *
 * A section is one fragment of extracted document text. The extraction layer
 * hands sections over in several loose shapes; they are normalized once into
 * the tagged variant below (see services/chunking/sections).
 */

import type { PositionTag } from './position.js';

/** Fragment with text only */
export interface PlainSection {
  kind: 'plain';
  text: string;
}

/**
 * Fragment with a layout tag ("title", "text", "table", ...).
 * The text may embed inline position tags.
 */
export interface LayoutSection {
  kind: 'layout';
  text: string;
  layout: string;
}

/** Fragment with a separate position */
export interface PositionedSection {
  kind: 'positioned';
  text: string;
  position: PositionTag;
}

export type Section = PlainSection | LayoutSection | PositionedSection;

/**
 * Loose shapes accepted at ingestion:
 * - `"text"`
 * - `["text", "title"]` or `["text", "@@1\t...##"]`
 * - `{ text, layout?, position? }`
 */
export type RawSection =
  | string
  | readonly [string, string]
  | { text: string; layout?: string; position?: PositionTag | string };

/**
 * Output of the level assigner
 */
export interface LeveledFragment {
  level: number;
  text: string;
}
