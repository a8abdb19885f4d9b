import type { Box, RasterImage } from '@/types/raster';
import { clamp } from '@/utils/math-utils';

const directions: Array<[number, number]> = [
  [0, -1],
  [1, -1],
  [1, 0],
  [1, 1],
  [0, 1],
  [-1, 1],
  [-1, 0],
  [-1, -1],
];

/**
 * Fills masked pixels from the nearest unmasked pixels along eight directions,
 * then smooths the filled area with a 3x3 box filter. `mask` covers `bounds`
 * row-major; only masked pixels inside `bounds` are written.
 */
export const inpaintRegion = (image: RasterImage, mask: Uint8Array, bounds: Box): void => {
  const { width, height } = image;
  const original = new Uint8ClampedArray(image.data);

  const isMasked = (x: number, y: number): boolean => {
    if (x < bounds.x || y < bounds.y || x >= bounds.x + bounds.width || y >= bounds.y + bounds.height) {
      return false;
    }
    return mask[(y - bounds.y) * bounds.width + (x - bounds.x)] > 0;
  };

  for (let y = bounds.y; y < bounds.y + bounds.height; y += 1) {
    for (let x = bounds.x; x < bounds.x + bounds.width; x += 1) {
      if (!isMasked(x, y)) continue;
      let totalR = 0;
      let totalG = 0;
      let totalB = 0;
      let count = 0;
      for (const radius of [3, 7]) {
        for (const [dx, dy] of directions) {
          for (let step = radius; step <= radius * 3; step += radius) {
            const sx = x + dx * step;
            const sy = y + dy * step;
            if (sx < 0 || sy < 0 || sx >= width || sy >= height) continue;
            if (!isMasked(sx, sy)) {
              const idx = (sy * width + sx) * 4;
              totalR += original[idx];
              totalG += original[idx + 1];
              totalB += original[idx + 2];
              count += 1;
              break;
            }
          }
        }
        if (count >= 3) break;
      }

      if (count >= 3) {
        const idx = (y * width + x) * 4;
        image.data[idx] = Math.round(totalR / count);
        image.data[idx + 1] = Math.round(totalG / count);
        image.data[idx + 2] = Math.round(totalB / count);
      }
    }
  }

  const filled = new Uint8ClampedArray(image.data);
  for (let y = bounds.y; y < bounds.y + bounds.height; y += 1) {
    for (let x = bounds.x; x < bounds.x + bounds.width; x += 1) {
      if (!isMasked(x, y)) continue;
      let sumR = 0;
      let sumG = 0;
      let sumB = 0;
      let samples = 0;
      for (let oy = -1; oy <= 1; oy += 1) {
        for (let ox = -1; ox <= 1; ox += 1) {
          const sx = clamp(x + ox, 0, width - 1);
          const sy = clamp(y + oy, 0, height - 1);
          const idx = (sy * width + sx) * 4;
          sumR += filled[idx];
          sumG += filled[idx + 1];
          sumB += filled[idx + 2];
          samples += 1;
        }
      }
      const idx = (y * width + x) * 4;
      image.data[idx] = Math.round(sumR / samples);
      image.data[idx + 1] = Math.round(sumG / samples);
      image.data[idx + 2] = Math.round(sumB / samples);
    }
  }
};
