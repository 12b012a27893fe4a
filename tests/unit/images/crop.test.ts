/**
 * Unit Tests for chunk cropping from page rasters
 */

import { describe, it, expect } from 'vitest';
import { cropByPositionTags } from '../../../src/services/images/crop.js';
import { pixelAt, solidImage } from '../chunking/helpers.js';

const TAG = '@@1\t2.0\t8.0\t10.0\t20.0##';

describe('cropByPositionTags', () => {
  const page = solidImage(20, 40, [10, 20, 30]);

  it('stacks context bands around the tagged region', () => {
    const result = cropByPositionTags(`text${TAG}`, [page], { contextHeight: 5, gap: 2 });
    if (!result) throw new Error('expected a crop');

    // 3 rows above, 10 tagged rows, 3 rows below, each followed by a 2 row gap
    expect(result.image.width).toBe(6);
    expect(result.image.height).toBe(22);
    expect(result.positions).toEqual([[0, 2, 8, 10, 20]]);
  });

  it('dims the context bands and fills gaps with the background', () => {
    const result = cropByPositionTags(`text${TAG}`, [page], { contextHeight: 5, gap: 2 });
    if (!result) throw new Error('expected a crop');

    expect(pixelAt(result.image, 0, 0)).toEqual([5, 10, 15]);
    expect(pixelAt(result.image, 0, 3)).toEqual([245, 245, 245]);
    expect(pixelAt(result.image, 0, 5)).toEqual([10, 20, 30]);
    expect(pixelAt(result.image, 0, 17)).toEqual([5, 10, 15]);
    expect(pixelAt(result.image, 0, 21)).toEqual([245, 245, 245]);
  });

  it('offsets returned pages by pageFrom', () => {
    const result = cropByPositionTags(`text${TAG}`, [page], { contextHeight: 5, gap: 2, pageFrom: 4 });
    expect(result?.positions).toEqual([[4, 2, 8, 10, 20]]);
  });

  it('returns null for text without tags', () => {
    expect(cropByPositionTags('plain text', [page])).toBeNull();
  });

  it('returns null without page images', () => {
    expect(cropByPositionTags(`text${TAG}`, [])).toBeNull();
  });

  it('returns null when every page index is out of range', () => {
    expect(cropByPositionTags('text@@3\t2.0\t8.0\t10.0\t20.0##', [page])).toBeNull();
  });
});
