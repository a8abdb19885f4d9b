import { describe, it, expect } from 'vitest';
import { blendTextMask } from '../src/translate-image/blend';
import { getContrastColor, getContrastRatio, sampleBackgroundColor } from '../src/translate-image/color';
import { buildInkMask, eraseRegion } from '../src/translate-image/erase';
import { createRaster, fillBox, readPixel } from '../src/utils/raster';
import { changedPixels, insideAny, pageWithInk } from './helpers';

describe('background colour', () => {
  it('samples the median colour around a box', () => {
    const image = createRaster(40, 40, [30, 60, 90]);
    fillBox(image, { x: 10, y: 10, width: 20, height: 20 }, [0, 0, 0]);
    expect(sampleBackgroundColor(image, { x: 10, y: 10, width: 20, height: 20 })).toEqual([30, 60, 90]);
  });

  it('picks the text colour with the higher contrast', () => {
    expect(getContrastColor([255, 255, 255])).toEqual([0, 0, 0]);
    expect(getContrastColor([0, 0, 0])).toEqual([255, 255, 255]);
    expect(getContrastColor([20, 20, 120])).toEqual([255, 255, 255]);
    expect(getContrastRatio([0, 0, 0], [255, 255, 255])).toBeCloseTo(21, 5);
  });
});

describe('erasing source text', () => {
  it('fills the box with the surrounding colour', () => {
    const image = pageWithInk(40, 40, [{ x: 15, y: 15, width: 10, height: 10 }]);
    const original = createRaster(40, 40);
    const bounds = { x: 10, y: 10, width: 20, height: 20 };

    expect(eraseRegion(image, bounds, 'fill')).toEqual([255, 255, 255]);
    expect(changedPixels(original, image)).toEqual([]);
  });

  it('masks ink with a one pixel margin', () => {
    const image = createRaster(10, 10, [100, 100, 100]);
    fillBox(image, { x: 4, y: 4, width: 2, height: 2 }, [0, 0, 0]);
    const mask = buildInkMask(image, { x: 0, y: 0, width: 10, height: 10 }, [100, 100, 100]);

    const masked: number[] = [];
    mask.forEach((value, index) => {
      if (value) masked.push(index);
    });
    expect(masked).toEqual([33, 34, 35, 36, 43, 44, 45, 46, 53, 54, 55, 56, 63, 64, 65, 66]);
  });

  it('inpaints ink from the surrounding pixels and leaves the rest alone', () => {
    const image = createRaster(40, 40, [100, 100, 100]);
    fillBox(image, { x: 18, y: 18, width: 4, height: 4 }, [0, 0, 0]);
    const bounds = { x: 12, y: 12, width: 16, height: 16 };

    expect(eraseRegion(image, bounds, 'inpaint')).toEqual([100, 100, 100]);
    expect(readPixel(image, 19, 19)).toEqual([100, 100, 100]);
    expect(changedPixels(createRaster(40, 40, [100, 100, 100]), image)).toEqual([]);
  });
});

describe('blending text coverage', () => {
  it('composites the colour by coverage inside the bounds only', () => {
    const image = createRaster(4, 4, [255, 255, 255]);
    const coverage = new Uint8ClampedArray([255, 128, 0, 255]);
    blendTextMask(image, coverage, { x: 1, y: 1, width: 2, height: 2 }, [0, 0, 0]);

    expect(readPixel(image, 1, 1)).toEqual([0, 0, 0]);
    expect(readPixel(image, 2, 1)).toEqual([127, 127, 127]);
    expect(readPixel(image, 1, 2)).toEqual([255, 255, 255]);
    expect(readPixel(image, 2, 2)).toEqual([0, 0, 0]);
    expect(
      changedPixels(createRaster(4, 4), image).every((point) =>
        insideAny(point, [{ x: 1, y: 1, width: 2, height: 2 }])
      )
    ).toBe(true);
  });
});
