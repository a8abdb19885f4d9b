/**
 * RGBA pixel buffer, row-major, 4 bytes per pixel. Mirrors the shape of a
 * canvas `ImageData` so buffers move between the pipeline and @napi-rs/canvas
 * without conversion.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type RGB = [number, number, number];
