/**
 * Chunk Cropping from Page Rasters
 *
 * Renders the visual source region of a chunk: every position tag in the
 * chunk text is cut out of its page raster, segments are stacked top to
 * bottom, and a band of surrounding page above the first and below the last
 * segment is added, dimmed, for context.
 *
 * @module services/images/crop
 */

import type { RasterImage } from '../../models/image.js';
import type { PagePosition, PositionTag } from '../../models/position.js';
import { extractPositionTags } from '../chunking/position-tags.js';
import { createRaster, cropRaster, darkenRaster, maxOf, pasteRaster } from './raster.js';

export interface CropOptions {
  /** Offset added to page indices of the returned positions (default: 0) */
  pageFrom?: number;
  /** Height of the context bands in pixels (default: 120) */
  contextHeight?: number;
  /** Vertical gap between stacked segments in pixels (default: 6) */
  gap?: number;
}

export interface CropResult {
  image: RasterImage;
  /** Positions actually cropped, context bands excluded */
  positions: PagePosition[];
}

const BACKGROUND = [245, 245, 245] as const;
const CONTEXT_ALPHA = 128;
const MIN_WIDTH = 6;

function validPositions(positions: PositionTag[], pageCount: number): PositionTag[] {
  const valid: PositionTag[] = [];
  for (const pos of positions) {
    if (pos.pages.length === 0) {
      console.error('[crop] Empty page index list, skipping position');
      continue;
    }
    const pages = pos.pages.filter((p) => p >= 0 && p < pageCount);
    if (pages.length === 0) {
      console.error(`[crop] All page indices [${pos.pages.join(', ')}] out of range for ${pageCount} pages, skipping`);
      continue;
    }
    valid.push({ ...pos, pages });
  }
  return valid;
}

/**
 * Crop the region of every position tag in `text` out of the page rasters.
 *
 * @returns null when the text has no usable position or no pages are given
 */
export function cropByPositionTags(
  text: string,
  pageImages: readonly RasterImage[],
  options: CropOptions = {}
): CropResult | null {
  const pageFrom = options.pageFrom ?? 0;
  const contextHeight = options.contextHeight ?? 120;
  const gap = options.gap ?? 6;

  const tagged = extractPositionTags(text);
  if (tagged.length === 0) {
    return null;
  }
  if (pageImages.length === 0) {
    console.error('[crop] Crop requested without page images, skipping');
    return null;
  }

  const pageCount = pageImages.length;
  const segments = validPositions(tagged, pageCount);
  if (segments.length === 0) {
    console.error('[crop] No valid positions after filtering, skipping');
    return null;
  }

  const maxWidth = Math.max(maxOf(segments.map((s) => s.right - s.left)), MIN_WIDTH);

  const first = segments[0];
  segments.unshift({
    pages: [first.pages[0]],
    left: first.left,
    right: first.right,
    top: Math.max(0, first.top - contextHeight),
    bottom: Math.max(first.top - gap, 0),
  });

  const last = segments[segments.length - 1];
  const lastPage = last.pages[last.pages.length - 1];
  const lastHeight = pageImages[lastPage].height;
  segments.push({
    pages: [lastPage],
    left: last.left,
    right: last.right,
    top: Math.min(lastHeight, last.bottom + gap),
    bottom: Math.min(lastHeight, last.bottom + contextHeight),
  });

  const pieces: RasterImage[] = [];
  const positions: PagePosition[] = [];

  segments.forEach((seg, ii) => {
    const isContext = ii === 0 || ii === segments.length - 1;
    const right = seg.left + maxWidth;
    let bottom = seg.bottom <= seg.top ? seg.top + 2 : seg.bottom;

    // spans continue on following pages: measure bottom from the first page top
    for (const pn of seg.pages.slice(1)) {
      if (pn >= 1) {
        bottom += pageImages[pn - 1].height;
      } else {
        console.error(`[crop] Page index ${pn} has no preceding page, skipping height accumulation`);
      }
    }

    const base = pageImages[seg.pages[0]];
    const x0 = Math.trunc(seg.left);
    const x1 = Math.trunc(right);
    const y0 = Math.trunc(seg.top);
    const y1 = Math.trunc(Math.min(bottom, base.height));
    pieces.push(cropRaster(base, x0, y0, x1, y1));
    if (!isContext) {
      positions.push([seg.pages[0] + pageFrom, x0, x1, y0, y1]);
    }

    bottom -= base.height;
    for (const pn of seg.pages.slice(1)) {
      const page = pageImages[pn];
      const py1 = Math.trunc(Math.min(bottom, page.height));
      pieces.push(cropRaster(page, x0, 0, x1, py1));
      if (!isContext) {
        positions.push([pn + pageFrom, x0, x1, 0, py1]);
      }
      bottom -= page.height;
    }
  });

  const width = maxOf(pieces.map((p) => p.width));
  const height = pieces.reduce((sum, p) => sum + p.height + gap, 0);
  const canvas = createRaster(width, height, BACKGROUND);

  let y = 0;
  pieces.forEach((piece, ii) => {
    const shown = ii === 0 || ii === pieces.length - 1 ? darkenRaster(piece, CONTEXT_ALPHA) : piece;
    pasteRaster(canvas, shown, 0, y);
    y += piece.height + gap;
  });

  return { image: canvas, positions };
}
