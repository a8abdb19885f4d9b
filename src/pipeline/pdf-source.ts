import { createCanvas } from '@napi-rs/canvas';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { RasterImage } from '@/types/raster';
import { ValidationError } from '@/types/pipeline-errors';
import { throwIfCancelled } from '@/utils/error-handling';
import type { PageSource } from './page-source';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

/** PDF pages rasterised with pdf.js onto @napi-rs/canvas. */
export class PdfPageSource implements PageSource {
  readonly kind = 'pdf';

  private constructor(
    private readonly document: PdfDocument,
    private readonly scale: number
  ) {}

  static async open(bytes: Uint8Array, options: { scale: number }): Promise<PdfPageSource> {
    try {
      // pdf.js transfers the buffer it is given, so hand it a copy.
      const task = getDocument({ data: new Uint8Array(bytes), isEvalSupported: false });
      return new PdfPageSource(await task.promise, options.scale);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`PDF could not be opened: ${message}`, 'UNSUPPORTED_FORMAT');
    }
  }

  get pageCount(): number {
    return this.document.numPages;
  }

  get pixelsPerPoint(): number {
    return this.scale;
  }

  async loadPage(index: number, signal?: AbortSignal): Promise<RasterImage> {
    throwIfCancelled(signal);
    const page = await this.document.getPage(index + 1);
    try {
      const viewport = page.getViewport({ scale: this.scale });
      const width = Math.max(1, Math.ceil(viewport.width));
      const height = Math.max(1, Math.ceil(viewport.height));
      const canvas = createCanvas(width, height);
      const context = canvas.getContext('2d');
      context.fillStyle = '#fff';
      context.fillRect(0, 0, width, height);

      const renderParams = { canvas, canvasContext: context, viewport };
      await page.render(renderParams).promise;

      const { data } = context.getImageData(0, 0, width, height);
      return { width, height, data: new Uint8ClampedArray(data) };
    } finally {
      page.cleanup();
    }
  }

  async close(): Promise<void> {
    await this.document.destroy();
  }
}
