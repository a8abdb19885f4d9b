import { describe, it, expect, vi } from 'vitest';
import { DefaultPageSplitter, ImagePageSource } from '../src/pipeline/page-source';
import { encodePng } from '../src/utils/image-codec';
import { readPixel } from '../src/utils/raster';
import { pageWithInk } from './helpers';

const pdf = vi.hoisted(() => ({
  open: vi.fn(async (_bytes: Uint8Array, options: { scale: number }) => ({
    kind: 'pdf',
    pageCount: 3,
    pixelsPerPoint: options.scale,
  })),
}));

vi.mock('../src/pipeline/pdf-source', () => ({ PdfPageSource: { open: pdf.open } }));

describe('ImagePageSource', () => {
  it('decodes an image into a single page', async () => {
    const png = new Uint8Array(await encodePng(pageWithInk(12, 8, [{ x: 0, y: 0, width: 4, height: 4 }])));

    const source = await ImagePageSource.decode(png);

    expect([source.kind, source.pageCount, source.pixelsPerPoint]).toEqual(['image', 1, 1]);
    const page = await source.loadPage(0);
    expect([page.width, page.height]).toEqual([12, 8]);
    expect(readPixel(page, 1, 1)).toEqual([0, 0, 0]);
    await expect(source.loadPage(1)).rejects.toBeInstanceOf(RangeError);
  });

  it('hands out copies so callers cannot change the source', async () => {
    const source = ImagePageSource.fromRaster(pageWithInk(4, 4));

    const first = await source.loadPage(0);
    first.data.fill(0);

    expect(readPixel(await source.loadPage(0), 0, 0)).toEqual([255, 255, 255]);
  });

  it('rejects bytes that do not decode', async () => {
    const truncated = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0]);

    await expect(ImagePageSource.decode(truncated)).rejects.toMatchObject({
      name: 'ValidationError',
      reason: 'UNSUPPORTED_FORMAT',
    });
  });
});

describe('DefaultPageSplitter', () => {
  it('opens PDFs at the configured render scale', async () => {
    const source = await new DefaultPageSplitter().open(new Uint8Array([1]), 'pdf', { pdfRenderScale: 3 });

    expect(pdf.open).toHaveBeenCalledWith(new Uint8Array([1]), { scale: 3 });
    expect(source.pageCount).toBe(3);
  });

  it('decodes image formats as single pages', async () => {
    const png = new Uint8Array(await encodePng(pageWithInk(5, 5)));

    const source = await new DefaultPageSplitter().open(png, 'png', { pdfRenderScale: 2 });

    expect(source.kind).toBe('image');
  });
});
