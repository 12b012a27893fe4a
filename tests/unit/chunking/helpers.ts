/**
 * Shared fixtures for chunking tests
 *
 * Token counts in tests come from a whitespace word counter so that every
 * expected budget decision can be traced by hand.
 */

import type { ChunkRecord } from '../../../src/models/chunk.js';
import type { RasterImage } from '../../../src/models/image.js';
import type { TokenCounter } from '../../../src/services/tokenizer/token-counter.js';
import { createRaster } from '../../../src/services/images/raster.js';

export const wordCounter: TokenCounter = {
  count: (text: string) => text.split(/\s+/).filter(Boolean).length,
};

export function solidImage(width: number, height: number, rgb: [number, number, number]): RasterImage {
  return createRaster(width, height, rgb);
}

/** RGB triple at (x, y) */
export function pixelAt(image: RasterImage, x: number, y: number): [number, number, number] {
  const i = (y * image.width + x) * 3;
  return [image.data[i], image.data[i + 1], image.data[i + 2]];
}

export function textRecord(content: string, extra: Partial<ChunkRecord> = {}): ChunkRecord {
  return { content, ...extra };
}
