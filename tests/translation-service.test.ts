import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  computeProgress,
  PanelTranslationService,
  type PanelTranslationServiceOptions,
} from '../src/service/translation-service';
import { MemoryDocumentStore } from '../src/service/memory-store';
import type { NewDocument, PageRecord, DocumentRecord } from '../src/service/document-store';
import { RegionRenderer } from '../src/translate-image/renderer';
import type { StatusLogEntry } from '../src/types/pipeline';
import type { RasterImage } from '../src/types/raster';
import { DocumentNotFoundError, NotReadyError, StorageError } from '../src/types/pipeline-errors';
import { decodeImage, encodePng } from '../src/utils/image-codec';
import { silentLogger } from '../src/utils/logger';
import { createRaster } from '../src/utils/raster';
import {
  CapturingAssembler,
  changedPixels,
  FakeDetector,
  FakeExtractor,
  FakePageSource,
  FakeRasterizer,
  FakeSplitter,
  FakeTranslator,
  insideAny,
  PDF_BYTES,
  pageWithInk,
} from './helpers';

const BOX_A = { x: 10, y: 10, width: 60, height: 30 };
const BOX_B = { x: 100, y: 60, width: 80, height: 30 };
const TEXT_BOX = { x: 2, y: 2, width: 30, height: 20 };

const panelImage = (): RasterImage =>
  pageWithInk(200, 120, [
    { x: 20, y: 20, width: 40, height: 10 },
    { x: 120, y: 70, width: 40, height: 10 },
  ]);

// Page i is 40 + i pixels wide so fakes can tell pages apart.
const makeRasters = (count: number): RasterImage[] =>
  Array.from({ length: count }, (_, index) => pageWithInk(40 + index, 60, [{ x: 5, y: 5, width: 20, height: 10 }]));

const makeService = (overrides: Partial<PanelTranslationServiceOptions> = {}) =>
  new PanelTranslationService({
    config: { maxPageConcurrency: 2 },
    detector: new FakeDetector(() => [BOX_A, BOX_B]),
    extractor: new FakeExtractor(),
    translator: new FakeTranslator(),
    createRenderer: (config) =>
      new RegionRenderer({
        rasterizer: new FakeRasterizer(),
        minFontSize: config.minFontSize,
        maxFontSize: config.maxFontSize,
      }),
    logger: silentLogger,
    storageRetryDelaysMs: [],
    ...overrides,
  });

const pdfService = (
  source: FakePageSource,
  detector: FakeDetector,
  overrides: Partial<PanelTranslationServiceOptions> = {}
) => {
  const assembler = new CapturingAssembler();
  const splitter = new FakeSplitter(source);
  const service = makeService({ detector, splitter, assembler, ...overrides });
  return { service, assembler, splitter };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('computeProgress', () => {
  it('reports the share of terminal pages while processing', () => {
    expect(computeProgress('processing', [{ status: 'done' }, { status: 'failed' }, { status: 'extracting' }])).toBe(
      66
    );
    expect(computeProgress('processing', [])).toBe(0);
  });

  it('only reports 100 for a terminal document', () => {
    expect(computeProgress('processing', [{ status: 'done' }])).toBe(99);
    expect(computeProgress('partially_failed', [{ status: 'failed' }])).toBe(100);
  });
});

describe('PanelTranslationService', () => {
  it('translates a single image into a PNG changed only inside the text regions', async () => {
    const service = makeService();
    const source = panelImage();

    const id = await service.submitDocument(new Uint8Array(await encodePng(source)), 'ja', 'en');
    const status = await service.waitForCompletion(id);

    expect(status.status).toBe('done');
    expect(status.progress).toBe(100);
    expect(status.pages).toEqual([
      { index: 0, status: 'done', error: null, blockCount: 2, translatedBlockCount: 2 },
    ]);

    const result = await service.getResult(id);
    expect(result.mimeType).toBe('image/png');
    expect(result.pageCount).toBe(1);
    const output = await decodeImage(result.data);
    const changed = changedPixels(source, output);
    expect(changed.some((point) => insideAny(point, [BOX_A]))).toBe(true);
    expect(changed.some((point) => insideAny(point, [BOX_B]))).toBe(true);
    expect(changed.every((point) => insideAny(point, [BOX_A, BOX_B]))).toBe(true);
  });

  it('refuses to hand out a result before the document is finished', async () => {
    const detector = new FakeDetector(() => [BOX_A], { delayMs: () => 30 });
    const service = makeService({ detector });

    const id = await service.submitDocument(new Uint8Array(await encodePng(panelImage())), 'ja', 'en');

    await expect(service.getResult(id)).rejects.toBeInstanceOf(NotReadyError);
    const status = await service.getStatus(id);
    expect(status.status).toBe('processing');
    expect(status.progress).toBeLessThan(100);

    await service.waitForCompletion(id);
    await expect(service.getResult(id)).resolves.toMatchObject({ mimeType: 'image/png' });
  });

  it('assembles multi-page documents in page order and keeps failed pages', async () => {
    const source = new FakePageSource(makeRasters(4));
    const detector = new FakeDetector(() => [TEXT_BOX], {
      delayMs: (image) => (image.width === 40 ? 30 : 0),
      fail: (image) => (image.width === 41 ? new Error('detector crashed') : null),
    });
    const { service, assembler, splitter } = pdfService(source, detector);

    const id = await service.submitDocument(PDF_BYTES, 'ja', 'en');
    const status = await service.waitForCompletion(id);

    expect(status.status).toBe('partially_failed');
    expect(status.pages.map((page) => page.status)).toEqual(['done', 'failed', 'done', 'done']);
    expect(status.pages[1].error).toEqual({
      code: 'DETECTION_FAILED',
      reason: null,
      message: 'Text detection failed: detector crashed',
    });
    expect(assembler.pages.map((page) => page.width)).toEqual([40, 41, 42, 43]);
    expect(changedPixels(makeRasters(4)[1], assembler.pages[1])).toEqual([]);
    expect(splitter.opened).toEqual([{ pdfRenderScale: 2 }]);
    expect(source.closed).toBe(true);

    const result = await service.getResult(id);
    expect(result).toEqual({ data: new Uint8Array([4]), mimeType: 'application/pdf', pageCount: 4 });
  });

  it('warns and redraws text untranslated when both languages match', async () => {
    const translator = new FakeTranslator();
    const service = makeService({ translator });

    const id = await service.submitDocument(new Uint8Array(await encodePng(panelImage())), 'ja', 'Japanese');
    const status = await service.waitForCompletion(id);

    expect(status.status).toBe('done');
    expect(status.log).toContainEqual(
      expect.objectContaining({
        pageIndex: null,
        level: 'warn',
        message: 'source and target language are both ja; recognised text is redrawn untranslated',
      })
    );
    expect(translator.requests.map((request) => [request.from, request.to, request.text])).toEqual(
      expect.arrayContaining([
        ['ja', 'ja', 'text-0'],
        ['ja', 'ja', 'text-1'],
      ])
    );
  });

  it('rejects a same-language submission in strict mode', async () => {
    const detector = new FakeDetector(() => [BOX_A]);
    const service = makeService({ detector });
    const png = new Uint8Array(await encodePng(panelImage()));

    await expect(service.submitDocument(png, 'en', 'en', { strictLanguagePair: true })).rejects.toMatchObject({
      name: 'ValidationError',
      reason: 'SAME_LANGUAGE_PAIR',
      message: 'Source and target language are both en.',
    });
    expect(detector.calls).toEqual([]);
  });

  it('validates submissions before anything is scheduled', async () => {
    const service = makeService();
    const png = new Uint8Array(await encodePng(panelImage()));

    await expect(service.submitDocument(new TextEncoder().encode('hello'), 'ja', 'en')).rejects.toMatchObject({
      reason: 'UNSUPPORTED_FORMAT',
      message: 'The submitted file is neither an image nor a PDF document.',
    });
    await expect(service.submitDocument(new Uint8Array(), 'ja', 'en')).rejects.toMatchObject({
      reason: 'EMPTY_DOCUMENT',
    });
    await expect(service.submitDocument(png, 'ja', 'en', { maxSourceBytes: 8 })).rejects.toMatchObject({
      reason: 'FILE_TOO_LARGE',
    });
    await expect(service.submitDocument(png, 'tlh', 'en')).rejects.toMatchObject({
      reason: 'UNSUPPORTED_LANGUAGE',
      message: 'Unsupported language: tlh',
    });
    await expect(service.submitDocument(png, 'ja', 'en', { maxPageConcurrency: 0 })).rejects.toMatchObject({
      reason: 'INVALID_CONFIG',
    });
    await expect(
      service.submitDocument(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0]), 'ja', 'en')
    ).rejects.toMatchObject({ reason: 'UNSUPPORTED_FORMAT' });
  });

  it('rejects a document without pages and closes its source', async () => {
    const source = new FakePageSource([]);
    const { service } = pdfService(source, new FakeDetector(() => []));

    await expect(service.submitDocument(PDF_BYTES, 'ja', 'en')).rejects.toMatchObject({ reason: 'EMPTY_DOCUMENT' });
    expect(source.closed).toBe(true);
  });

  it('cancels a running document and keeps every original page', async () => {
    const rasters = makeRasters(3);
    const detector = new FakeDetector(() => [TEXT_BOX], { delayMs: () => 20 });
    const { service, assembler } = pdfService(new FakePageSource(rasters), detector, {
      config: { maxPageConcurrency: 1 },
    });

    const id = await service.submitDocument(PDF_BYTES, 'ja', 'en');
    expect(await service.cancel(id)).toBe(true);
    const status = await service.waitForCompletion(id);

    expect(status.status).toBe('partially_failed');
    expect(status.pages.map((page) => page.error?.code)).toEqual(['CANCELLED', 'CANCELLED', 'CANCELLED']);
    expect(status.log.map((entry) => entry.message)).toContain('cancellation requested');
    assembler.pages.forEach((page, index) => {
      expect(changedPixels(rasters[index], page)).toEqual([]);
    });
    expect(await service.cancel(id)).toBe(false);
  });

  it('streams status entries to subscribers', async () => {
    const detector = new FakeDetector(() => [BOX_A], { delayMs: () => 10 });
    const service = makeService({ detector });
    const seen: StatusLogEntry[] = [];

    const id = await service.submitDocument(new Uint8Array(await encodePng(panelImage())), 'ja', 'en');
    const unsubscribe = service.subscribe(id, (entry) => seen.push(entry));
    await service.waitForCompletion(id);
    unsubscribe();

    const messages = seen.map((entry) => entry.message);
    expect(messages).toContain('detecting text regions');
    expect(messages.at(-1)).toBe('done: 1 pages translated');
  });

  it('records pages and the result in the document store', async () => {
    const store = new MemoryDocumentStore();
    const service = makeService({ store });

    const id = await service.submitDocument(new Uint8Array(await encodePng(panelImage())), 'ja', 'en');
    await service.waitForCompletion(id);

    const record = await store.getDocument(id);
    expect(record).toMatchObject({ status: 'done', mimeType: 'image/png', sourceLanguage: 'ja', targetLanguage: 'en' });
    const pages = await store.listPages(id);
    expect(pages).toHaveLength(1);
    expect(pages[0]).toMatchObject({ status: 'done', blockCount: 2, translatedBlockCount: 2 });
    const ref = pages[0].processedImageRef;
    expect(ref).not.toBeNull();
    expect(await store.getObject(ref ?? '')).toMatchObject({ contentType: 'image/png' });

    // A second service over the same store answers from the records alone.
    const reader = makeService({ store });
    const status = await reader.getStatus(id);
    expect(status).toMatchObject({ status: 'done', progress: 100, log: [] });
    expect(status.pages).toEqual([{ index: 0, status: 'done', error: null, blockCount: 2, translatedBlockCount: 2 }]);
    await expect(reader.getResult(id)).resolves.toMatchObject({ mimeType: 'image/png', pageCount: 1 });
    expect(await reader.cancel(id)).toBe(false);
  });

  it('retries transient store failures', async () => {
    class FlakyStore extends MemoryDocumentStore {
      failures = 1;
      async putObject(data: Uint8Array, contentType: string): Promise<string> {
        if (this.failures > 0) {
          this.failures -= 1;
          throw new Error('connection reset');
        }
        return super.putObject(data, contentType);
      }
    }
    const service = makeService({ store: new FlakyStore(), storageRetryDelaysMs: [1] });

    const id = await service.submitDocument(new Uint8Array(await encodePng(panelImage())), 'ja', 'en');

    await expect(service.waitForCompletion(id)).resolves.toMatchObject({ status: 'done' });
  });

  it('fails the document and surfaces a StorageError when the store stays down', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    class OfflinePageStore extends MemoryDocumentStore {
      async putPage(_record: Omit<PageRecord, 'updatedAt'>): Promise<PageRecord> {
        throw new Error('disk offline');
      }
    }
    const store = new OfflinePageStore();
    const service = makeService({ store });

    const id = await service.submitDocument(new Uint8Array(await encodePng(panelImage())), 'ja', 'en');

    await expect(service.waitForCompletion(id)).rejects.toMatchObject({
      name: 'StorageError',
      message: 'Document store write failed: disk offline',
    });
    await expect(service.getResult(id)).rejects.toBeInstanceOf(StorageError);
    const status = await service.getStatus(id);
    expect(status.status).toBe('failed');
    expect(status.log.at(-1)).toMatchObject({
      level: 'error',
      message: 'document failed: Document store write failed: disk offline',
    });
    expect((await store.getDocument(id))?.error).toEqual({
      code: 'STORAGE_UNAVAILABLE',
      reason: null,
      message: 'Document store write failed: disk offline',
    });
  });

  it('rejects a submission the store cannot record', async () => {
    class ReadOnlyStore extends MemoryDocumentStore {
      async createDocument(_input: NewDocument): Promise<DocumentRecord> {
        throw new Error('read-only volume');
      }
    }
    const source = new FakePageSource(makeRasters(1));
    const { service } = pdfService(source, new FakeDetector(() => []), { store: new ReadOnlyStore() });

    await expect(service.submitDocument(PDF_BYTES, 'ja', 'en')).rejects.toMatchObject({
      name: 'StorageError',
      message: 'Document store create failed: read-only volume',
    });
    expect(source.closed).toBe(true);
  });

  it('reports unknown documents', async () => {
    const service = makeService();

    await expect(service.getStatus('missing')).rejects.toBeInstanceOf(DocumentNotFoundError);
    await expect(service.getResult('missing')).rejects.toBeInstanceOf(DocumentNotFoundError);
    await expect(service.cancel('missing')).rejects.toBeInstanceOf(DocumentNotFoundError);
    expect(() => service.subscribe('missing', () => undefined)).toThrow(DocumentNotFoundError);
  });

  it('cancels running work and releases collaborators on close', async () => {
    const onClose = vi.fn(async () => undefined);
    const detector = new FakeDetector(() => [TEXT_BOX], { delayMs: () => 20 });
    const { service } = pdfService(new FakePageSource(makeRasters(2)), detector, {
      config: { maxPageConcurrency: 1 },
      onClose,
    });

    const id = await service.submitDocument(PDF_BYTES, 'ja', 'en');
    await service.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect((await service.getStatus(id)).status).toBe('partially_failed');
    await expect(service.submitDocument(PDF_BYTES, 'ja', 'en')).rejects.toMatchObject({
      code: 'PROCESSING_FAILED',
      message: 'The translation service is closed.',
    });
  });

  it('uses a blank page when no page of a document can be read', async () => {
    const source = new FakePageSource(makeRasters(1), 'pdf', new Set([0]));
    const { service, assembler } = pdfService(source, new FakeDetector(() => []));

    const id = await service.submitDocument(PDF_BYTES, 'ja', 'en');
    await service.waitForCompletion(id);

    expect(changedPixels(createRaster(595, 842), assembler.pages[0])).toEqual([]);
  });

  it('reports when each document was submitted', async () => {
    const store = new MemoryDocumentStore();
    const service = makeService({ store });

    const id = await service.submitDocument(new Uint8Array(await encodePng(panelImage())), 'ja', 'en');
    const running = await service.getStatus(id);
    await service.waitForCompletion(id);

    const record = await store.getDocument(id);
    expect(running.createdAt).toBe(record?.createdAt);
    expect((await makeService({ store }).getStatus(id)).createdAt).toBe(record?.createdAt);
  });

  it('keeps only the most recent finished documents in memory', async () => {
    const store = new MemoryDocumentStore();
    const service = makeService({ store, retainFinishedJobs: 1 });
    const bytes = new Uint8Array(await encodePng(panelImage()));

    const first = await service.submitDocument(bytes, 'ja', 'en');
    await service.waitForCompletion(first);
    const second = await service.submitDocument(bytes, 'ja', 'en');
    await service.waitForCompletion(second);

    const evicted = await service.getStatus(first);
    expect(evicted).toMatchObject({ status: 'done', progress: 100, log: [] });
    expect(() => service.subscribe(first, () => undefined)).toThrow(DocumentNotFoundError);
    await expect(service.getResult(first)).resolves.toMatchObject({ mimeType: 'image/png', pageCount: 1 });
    expect(await service.cancel(first)).toBe(false);

    const kept = await service.getStatus(second);
    expect(kept.log.at(-1)?.message).toBe('done: 1 pages translated');
  });
});
