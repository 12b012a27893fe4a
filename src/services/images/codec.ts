/**
 * Image Codec
 *
 * Converts between encoded images (PNG, JPEG, WebP, ...) and the raw RGB
 * rasters the chunking pipeline works on. This is the only asynchronous
 * part of the library; callers decode page images before chunking and
 * encode chunk images afterwards.
 *
 * @module services/images/codec
 */

import sharp from 'sharp';
import { RASTER_CHANNELS, type RasterImage } from '../../models/image.js';
import { ImageCodecError } from '../../utils/validation.js';

/**
 * Decode any format sharp understands into an RGB raster.
 * Alpha is dropped, other colour spaces are converted to sRGB.
 */
export async function decodeImage(input: Buffer | Uint8Array): Promise<RasterImage> {
  try {
    const { data, info } = await sharp(input)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== RASTER_CHANNELS) {
      throw new ImageCodecError(`Expected ${RASTER_CHANNELS} channels after decoding, got ${info.channels}`);
    }
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  } catch (error) {
    if (error instanceof ImageCodecError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ImageCodecError(`Failed to decode image: ${message}`, error);
  }
}

/**
 * Encode an RGB raster as PNG.
 */
export async function encodePng(image: RasterImage): Promise<Buffer> {
  if (image.width === 0 || image.height === 0) {
    throw new ImageCodecError(`Cannot encode empty raster (${image.width}x${image.height})`);
  }
  try {
    return await sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: RASTER_CHANNELS },
    })
      .png()
      .toBuffer();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ImageCodecError(`Failed to encode PNG: ${message}`, error);
  }
}
