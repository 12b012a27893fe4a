/**
 * Unit Tests for raster encoding and decoding
 */

import { describe, it, expect } from 'vitest';
import { decodeImage, encodePng } from '../../../src/services/images/codec.js';
import { createRaster } from '../../../src/services/images/raster.js';
import { ImageCodecError } from '../../../src/utils/validation.js';
import { pixelAt, solidImage } from '../chunking/helpers.js';

describe('image codec', () => {
  it('decodes an encoded PNG to the same pixels', async () => {
    const original = solidImage(3, 2, [12, 34, 56]);
    const png = await encodePng(original);
    const decoded = await decodeImage(png);

    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    expect(pixelAt(decoded, 2, 1)).toEqual([12, 34, 56]);
  });

  it('rejects bytes that are not an image', async () => {
    await expect(decodeImage(Buffer.from('not an image'))).rejects.toThrow(ImageCodecError);
  });

  it('refuses to encode an empty raster', async () => {
    await expect(encodePng(createRaster(0, 4))).rejects.toThrow(ImageCodecError);
  });
});
