import type { Box, RasterImage, RGB } from '@/types/raster';
import { getMedian } from '@/utils/math-utils';
import { readPixel } from '@/utils/raster';

/**
 * Median colour of eight points just outside the box (corners and edge
 * midpoints), clamped to the image.
 */
export function sampleBackgroundColor(image: RasterImage, box: Box): RGB {
  if (image.width === 0 || image.height === 0) {
    return [255, 255, 255];
  }

  const { x, y, width: w, height: h } = box;
  const margin = Math.max(2, Math.min(w, h) * 0.05);
  const points: [number, number][] = [
    [x - margin, y - margin],
    [x + w + margin, y - margin],
    [x - margin, y + h + margin],
    [x + w + margin, y + h + margin],
    [x + w / 2, y - margin],
    [x + w / 2, y + h + margin],
    [x - margin, y + h / 2],
    [x + w + margin, y + h / 2],
  ];

  const samples = points.map(([px, py]) => {
    const clampedX = Math.max(0, Math.min(image.width - 1, Math.round(px)));
    const clampedY = Math.max(0, Math.min(image.height - 1, Math.round(py)));
    return readPixel(image, clampedX, clampedY);
  });

  return [
    Math.round(getMedian(samples.map((s) => s[0]))),
    Math.round(getMedian(samples.map((s) => s[1]))),
    Math.round(getMedian(samples.map((s) => s[2]))),
  ];
}

function toLinearChannel(channel: number): number {
  const normalized = channel / 255;
  return normalized <= 0.03928 ? normalized / 12.92 : Math.pow((normalized + 0.055) / 1.055, 2.4);
}

export function getRelativeLuminance([r, g, b]: RGB): number {
  return 0.2126 * toLinearChannel(r) + 0.7152 * toLinearChannel(g) + 0.0722 * toLinearChannel(b);
}

export function getContrastRatio(a: RGB, b: RGB): number {
  const l1 = getRelativeLuminance(a);
  const l2 = getRelativeLuminance(b);
  return (Math.max(l1, l2) + 0.05) / (Math.min(l1, l2) + 0.05);
}

/** Black or white, whichever contrasts more with `background`. */
export function getContrastColor(background: RGB): RGB {
  const white: RGB = [255, 255, 255];
  const black: RGB = [0, 0, 0];
  return getContrastRatio(background, white) >= getContrastRatio(background, black) ? white : black;
}
