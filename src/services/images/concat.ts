/**
 * Vertical image concatenation for merged chunks
 *
 * @module services/images/concat
 */

import type { RasterImage } from '../../models/image.js';
import { createRaster, pasteRaster, rastersEqual } from './raster.js';

/**
 * Stack `b` under `a`.
 *
 * Absent images yield the other one. The same image, or a pixel-identical
 * copy, yields `a` unchanged, so repeated merging of one image does not grow
 * it. Only the pair itself is compared: `a` already containing `b` is not
 * detected.
 */
export function concatImages(a: RasterImage | null, b: RasterImage | null): RasterImage | null {
  if (!a) return b;
  if (!b) return a;
  if (a === b || rastersEqual(a, b)) {
    return a;
  }

  const canvas = createRaster(Math.max(a.width, b.width), a.height + b.height);
  pasteRaster(canvas, a, 0, 0);
  pasteRaster(canvas, b, 0, a.height);
  return canvas;
}
