import { PDFDocument } from 'pdf-lib';
import type { DocumentResult } from '@/types/pipeline';
import type { RasterImage } from '@/types/raster';
import { ValidationError } from '@/types/pipeline-errors';
import { encodePng } from '@/utils/image-codec';
import type { SourceKind } from './page-source';

export interface AssemblyLayout {
  kind: SourceKind;
  pixelsPerPoint: number;
}

/** Builds the output file from page rasters given in page order. */
export interface DocumentAssembler {
  assemble(pages: readonly RasterImage[], layout: AssemblyLayout): Promise<DocumentResult>;
}

/** A single image comes back as PNG; everything else becomes a PDF with one image per page. */
export class DefaultDocumentAssembler implements DocumentAssembler {
  async assemble(pages: readonly RasterImage[], layout: AssemblyLayout): Promise<DocumentResult> {
    if (pages.length === 0) {
      throw new ValidationError('Document has no pages.', 'EMPTY_DOCUMENT');
    }

    if (layout.kind === 'image' && pages.length === 1) {
      const png = await encodePng(pages[0]);
      return { data: new Uint8Array(png), mimeType: 'image/png', pageCount: 1 };
    }

    const pdf = await PDFDocument.create();
    for (const page of pages) {
      const image = await pdf.embedPng(await encodePng(page));
      const width = page.width / layout.pixelsPerPoint;
      const height = page.height / layout.pixelsPerPoint;
      const pdfPage = pdf.addPage([width, height]);
      pdfPage.drawImage(image, { x: 0, y: 0, width, height });
    }

    return { data: await pdf.save(), mimeType: 'application/pdf', pageCount: pages.length };
  }
}
