import type { RasterImage } from '@/types/raster';
import { ValidationError } from '@/types/pipeline-errors';
import { decodeImage, IMAGE_FORMATS, type SourceFormat } from '@/utils/image-codec';
import { cloneRaster } from '@/utils/raster';
import { PdfPageSource } from './pdf-source';

export type SourceKind = 'image' | 'pdf';

/** An opened source document; pages are rasterised on demand. */
export interface PageSource {
  readonly kind: SourceKind;
  readonly pageCount: number;
  /** Raster pixels per PDF point (1 for images). */
  readonly pixelsPerPoint: number;
  loadPage(index: number, signal?: AbortSignal): Promise<RasterImage>;
  close(): Promise<void>;
}

export interface OpenOptions {
  pdfRenderScale: number;
}

/** Splits a submitted file into pages. Throws ValidationError for unreadable input. */
export interface PageSplitter {
  open(bytes: Uint8Array, format: SourceFormat, options: OpenOptions): Promise<PageSource>;
}

export class ImagePageSource implements PageSource {
  readonly kind = 'image';
  readonly pageCount = 1;
  readonly pixelsPerPoint = 1;

  private constructor(private readonly image: RasterImage) {}

  static async decode(bytes: Uint8Array): Promise<ImagePageSource> {
    try {
      return new ImagePageSource(await decodeImage(bytes));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Image could not be decoded: ${message}`, 'UNSUPPORTED_FORMAT');
    }
  }

  static fromRaster(image: RasterImage): ImagePageSource {
    return new ImagePageSource(image);
  }

  async loadPage(index: number): Promise<RasterImage> {
    if (index !== 0) {
      throw new RangeError(`Image sources have one page, requested ${index}`);
    }
    return cloneRaster(this.image);
  }

  async close(): Promise<void> {
    return;
  }
}

export class DefaultPageSplitter implements PageSplitter {
  async open(bytes: Uint8Array, format: SourceFormat, options: OpenOptions): Promise<PageSource> {
    if (format === 'pdf') {
      return await PdfPageSource.open(bytes, { scale: options.pdfRenderScale });
    }
    if (IMAGE_FORMATS.has(format)) {
      return await ImagePageSource.decode(bytes);
    }
    throw new ValidationError(`Unsupported format: ${format}`, 'UNSUPPORTED_FORMAT');
  }
}
