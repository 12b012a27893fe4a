/**
 * Raw RGB raster operations
 *
 * Synchronous pixel helpers behind image concatenation and page cropping.
 * Regions outside a source raster read as black.
 *
 * @module services/images/raster
 */

import { RASTER_CHANNELS, type RasterImage, type RgbColor } from '../../models/image.js';

/** Largest value, 0 for an empty list (no argument spreading) */
export function maxOf(values: readonly number[]): number {
  let max = values.length > 0 ? values[0] : 0;
  for (const v of values) {
    if (v > max) max = v;
  }
  return max;
}

export function createRaster(width: number, height: number, fill: RgbColor = [0, 0, 0]): RasterImage {
  const w = Math.max(0, Math.trunc(width));
  const h = Math.max(0, Math.trunc(height));
  const data = new Uint8Array(w * h * RASTER_CHANNELS);
  if (fill[0] !== 0 || fill[1] !== 0 || fill[2] !== 0) {
    for (let i = 0; i < data.length; i += RASTER_CHANNELS) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
    }
  }
  return { width: w, height: h, data };
}

/** Same dimensions and same bytes */
export function rastersEqual(a: RasterImage, b: RasterImage): boolean {
  if (a.width !== b.width || a.height !== b.height || a.data.length !== b.data.length) {
    return false;
  }
  for (let i = 0; i < a.data.length; i++) {
    if (a.data[i] !== b.data[i]) return false;
  }
  return true;
}

/**
 * Copy `src` onto `dst` with its top-left corner at (x, y), clipped to `dst`.
 */
export function pasteRaster(dst: RasterImage, src: RasterImage, x: number, y: number): void {
  for (let row = 0; row < src.height; row++) {
    const dy = y + row;
    if (dy < 0 || dy >= dst.height) continue;
    const from = Math.max(0, -x);
    const to = Math.min(src.width, dst.width - x);
    if (to <= from) continue;
    const srcStart = (row * src.width + from) * RASTER_CHANNELS;
    const srcEnd = (row * src.width + to) * RASTER_CHANNELS;
    dst.data.set(src.data.subarray(srcStart, srcEnd), (dy * dst.width + x + from) * RASTER_CHANNELS);
  }
}

/**
 * Box [x0, x1) × [y0, y1) of `src`; pixels outside the source are black.
 */
export function cropRaster(src: RasterImage, x0: number, y0: number, x1: number, y1: number): RasterImage {
  const out = createRaster(x1 - x0, y1 - y0);
  pasteRaster(out, src, -Math.trunc(x0), -Math.trunc(y0));
  return out;
}

/**
 * Composite a black layer of the given opacity (0-255) over the raster.
 */
export function darkenRaster(src: RasterImage, alpha: number): RasterImage {
  const keep = (255 - alpha) / 255;
  const data = new Uint8Array(src.data.length);
  for (let i = 0; i < src.data.length; i++) {
    data[i] = Math.round(src.data[i] * keep);
  }
  return { width: src.width, height: src.height, data };
}
