import { createCanvas, ImageData, loadImage } from '@napi-rs/canvas';
import type { RasterImage } from '@/types/raster';

export type SourceFormat = 'png' | 'jpeg' | 'webp' | 'bmp' | 'pdf';

export const IMAGE_FORMATS: ReadonlySet<SourceFormat> = new Set(['png', 'jpeg', 'webp', 'bmp']);

const startsWith = (bytes: Uint8Array, signature: number[], offset: number = 0): boolean =>
  bytes.length >= offset + signature.length &&
  signature.every((value, index) => bytes[offset + index] === value);

/** Identifies the container by its magic bytes; file names and declared types are not trusted. */
export function sniffFormat(bytes: Uint8Array): SourceFormat | null {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'png';
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'jpeg';
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) {
    return 'webp';
  }
  if (startsWith(bytes, [0x42, 0x4d])) return 'bmp';
  if (startsWith(bytes, [0x25, 0x50, 0x44, 0x46, 0x2d])) return 'pdf';
  return null;
}

export async function decodeImage(bytes: Uint8Array): Promise<RasterImage> {
  const image = await loadImage(Buffer.from(bytes));
  const canvas = createCanvas(image.width, image.height);
  const context = canvas.getContext('2d');
  context.drawImage(image, 0, 0);
  const { data, width, height } = context.getImageData(0, 0, image.width, image.height);
  return { width, height, data: new Uint8ClampedArray(data) };
}

export async function encodePng(image: RasterImage): Promise<Buffer> {
  const canvas = createCanvas(image.width, image.height);
  const context = canvas.getContext('2d');
  context.putImageData(new ImageData(new Uint8ClampedArray(image.data), image.width, image.height), 0, 0);
  return await canvas.encode('png');
}
