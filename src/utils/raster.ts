import type { Box, RasterImage, RGB } from '@/types/raster';

export function createRaster(width: number, height: number, fill: RGB = [255, 255, 255]): RasterImage {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fill[0];
    data[i + 1] = fill[1];
    data[i + 2] = fill[2];
    data[i + 3] = 255;
  }
  return { width, height, data };
}

export const cloneRaster = (image: RasterImage): RasterImage => ({
  width: image.width,
  height: image.height,
  data: new Uint8ClampedArray(image.data),
});

/** Intersection of `box` with the image, rounded outward to whole pixels. */
export function clipBox(box: Box, width: number, height: number): Box {
  const x0 = Math.max(0, Math.floor(box.x));
  const y0 = Math.max(0, Math.floor(box.y));
  const x1 = Math.min(width, Math.ceil(box.x + box.width));
  const y1 = Math.min(height, Math.ceil(box.y + box.height));
  return { x: x0, y: y0, width: Math.max(0, x1 - x0), height: Math.max(0, y1 - y0) };
}

export function cropRaster(image: RasterImage, box: Box): RasterImage {
  const bounds = clipBox(box, image.width, image.height);
  const data = new Uint8ClampedArray(bounds.width * bounds.height * 4);
  const rowBytes = bounds.width * 4;
  for (let y = 0; y < bounds.height; y += 1) {
    const start = ((bounds.y + y) * image.width + bounds.x) * 4;
    data.set(image.data.subarray(start, start + rowBytes), y * rowBytes);
  }
  return { width: bounds.width, height: bounds.height, data };
}

/** Copies `source` into `target` at (x, y); pixels falling outside `target` are dropped. */
export function pasteRaster(target: RasterImage, source: RasterImage, x: number, y: number): void {
  for (let row = 0; row < source.height; row += 1) {
    const ty = y + row;
    if (ty < 0 || ty >= target.height) continue;
    for (let col = 0; col < source.width; col += 1) {
      const tx = x + col;
      if (tx < 0 || tx >= target.width) continue;
      const from = (row * source.width + col) * 4;
      const to = (ty * target.width + tx) * 4;
      target.data[to] = source.data[from];
      target.data[to + 1] = source.data[from + 1];
      target.data[to + 2] = source.data[from + 2];
      target.data[to + 3] = source.data[from + 3];
    }
  }
}

export function fillBox(image: RasterImage, box: Box, color: RGB): void {
  const bounds = clipBox(box, image.width, image.height);
  for (let y = bounds.y; y < bounds.y + bounds.height; y += 1) {
    for (let x = bounds.x; x < bounds.x + bounds.width; x += 1) {
      const idx = (y * image.width + x) * 4;
      image.data[idx] = color[0];
      image.data[idx + 1] = color[1];
      image.data[idx + 2] = color[2];
      image.data[idx + 3] = 255;
    }
  }
}

export const readPixel = (image: RasterImage, x: number, y: number): RGB => {
  const idx = (y * image.width + x) * 4;
  return [image.data[idx], image.data[idx + 1], image.data[idx + 2]];
};
