/**
 * Raster image interfaces for chunk media
 *
 * Chunk images are kept as raw RGB rasters so that stacking, cropping and
 * deduplication stay synchronous. Conversion from and to encoded files lives
 * in services/images/codec.
 */

/** Bytes per pixel of every raster (RGB) */
export const RASTER_CHANNELS = 3;

/**
 * Decoded RGB image, row-major, 3 bytes per pixel
 */
export interface RasterImage {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
  /** Pixel bytes, length = width * height * 3 */
  data: Uint8Array;
}

/**
 * RGB fill colour
 */
export type RgbColor = readonly [number, number, number];
