/**
 * Position interfaces for document fragments
 *
 * A position locates a fragment on its source page(s). Pages are zero-based
 * here; the inline text encoding (see services/chunking/position-tags) is
 * one-based.
 */

/**
 * Page span and bounding box of a fragment
 */
export interface PositionTag {
  /** Zero-based page indices, more than one for fragments spanning pages */
  pages: number[];
  left: number;
  right: number;
  top: number;
  bottom: number;
}

/**
 * Integer position stored on a chunk record:
 * [one-based page, left, right, top, bottom]
 */
export type PositionTuple = [number, number, number, number, number];

/**
 * Single-page position as produced by cropping:
 * [zero-based page, left, right, top, bottom]
 */
export type PagePosition = [number, number, number, number, number];
