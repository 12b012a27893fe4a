/**
 * Chunk interfaces
 *
 * Chunk is the output of the merge passes (text still carries inline
 * position tags). ChunkRecord is the indexable form built from it, with
 * token representations and integer positions.
 */

import type { RasterImage } from './image.js';
import type { PagePosition, PositionTag, PositionTuple } from './position.js';

/** Media kinds recognised on chunks; absent means plain text */
export type DocType = 'table' | 'image';

/**
 * Result of a merge pass
 */
export interface Chunk {
  /** Chunk text, including any inline position tags */
  text: string;

  /** Token count the merger accounted for this chunk */
  tokenCount: number;

  /** Position tags parsed from the text, in order of appearance */
  positionTags: PositionTag[];

  /** Image carried by the chunk (merged vertically when inputs merge) */
  image: RasterImage | null;

  docType: DocType | null;
}

/**
 * Indexable chunk
 */
export interface ChunkRecord {
  /** Display text, position tags removed */
  content: string;

  /** Coarse token representation of content */
  contentTokens?: string;

  /** Fine-grained token representation derived from contentTokens */
  contentFineTokens?: string;

  /** Full text of the chunk this record was split from (child chunks only) */
  parentContent?: string;

  image?: RasterImage | null;

  docType?: DocType;

  /** One-based page of each position */
  pageNumbers?: number[];

  /** [page, left, right, top, bottom], one-based page, integers */
  positions?: PositionTuple[];

  /** Top coordinate of each position */
  tops?: number[];
}

/**
 * Table handed to tokenizeTable: either pre-rendered text or rows
 */
export interface TableInput {
  image: RasterImage | null;
  rows: string | string[];
  positions: PagePosition[];
}
