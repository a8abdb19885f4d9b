import type { Box, RasterImage, RGB } from '@/types/raster';

/**
 * Composites `color` onto `target` inside `bounds`, using `coverage` (one
 * alpha byte per pixel of `bounds`, row-major) as the per-pixel opacity.
 */
export const blendTextMask = (
  target: RasterImage,
  coverage: Uint8ClampedArray,
  bounds: Box,
  color: RGB
): void => {
  const [tr, tg, tb] = color;
  for (let y = 0; y < bounds.height; y += 1) {
    const ty = bounds.y + y;
    if (ty < 0 || ty >= target.height) continue;
    for (let x = 0; x < bounds.width; x += 1) {
      const tx = bounds.x + x;
      if (tx < 0 || tx >= target.width) continue;
      const a = coverage[y * bounds.width + x] / 255;
      if (a <= 0) continue;
      const idx = (ty * target.width + tx) * 4;
      target.data[idx] = Math.round(target.data[idx] * (1 - a) + tr * a);
      target.data[idx + 1] = Math.round(target.data[idx + 1] * (1 - a) + tg * a);
      target.data[idx + 2] = Math.round(target.data[idx + 2] * (1 - a) + tb * a);
    }
  }
};
