import type { Box, RasterImage, RGB } from '@/types/raster';
import { fillBox } from '@/utils/raster';
import { sampleBackgroundColor } from './color';
import { inpaintRegion } from './inpaint';

export type EraseMode = 'fill' | 'inpaint';

/** Luminance distance from the background above which a pixel counts as ink. */
const INK_THRESHOLD = 48;

const luma = (r: number, g: number, b: number): number => 0.299 * r + 0.587 * g + 0.114 * b;

/**
 * Marks pixels of `bounds` that differ from `background`, dilated by one pixel
 * so anti-aliased stroke edges are covered too.
 */
export function buildInkMask(image: RasterImage, bounds: Box, background: RGB): Uint8Array {
  const raw = new Uint8Array(bounds.width * bounds.height);
  const backgroundLuma = luma(background[0], background[1], background[2]);
  for (let y = 0; y < bounds.height; y += 1) {
    for (let x = 0; x < bounds.width; x += 1) {
      const idx = ((bounds.y + y) * image.width + (bounds.x + x)) * 4;
      const value = luma(image.data[idx], image.data[idx + 1], image.data[idx + 2]);
      if (Math.abs(value - backgroundLuma) > INK_THRESHOLD) {
        raw[y * bounds.width + x] = 1;
      }
    }
  }

  const dilated = new Uint8Array(raw.length);
  for (let y = 0; y < bounds.height; y += 1) {
    for (let x = 0; x < bounds.width; x += 1) {
      let hit = 0;
      for (let oy = -1; oy <= 1 && !hit; oy += 1) {
        for (let ox = -1; ox <= 1; ox += 1) {
          const sx = x + ox;
          const sy = y + oy;
          if (sx < 0 || sy < 0 || sx >= bounds.width || sy >= bounds.height) continue;
          if (raw[sy * bounds.width + sx]) {
            hit = 1;
            break;
          }
        }
      }
      dilated[y * bounds.width + x] = hit;
    }
  }
  return dilated;
}

/**
 * Removes the source text inside `bounds` and returns the background colour
 * the translated text will be drawn against. `bounds` must lie inside the image.
 */
export function eraseRegion(image: RasterImage, bounds: Box, mode: EraseMode): RGB {
  const background = sampleBackgroundColor(image, bounds);
  if (mode === 'inpaint') {
    inpaintRegion(image, buildInkMask(image, bounds, background), bounds);
  } else {
    fillBox(image, bounds, background);
  }
  return background;
}
