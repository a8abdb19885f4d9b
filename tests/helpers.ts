import type { DetectOptions, ExtractOptions, OcrExtractor, RegionDetector } from '../src/types/ocr-engine';
import type { ITextTranslator, TranslationRequest, TranslationResponse } from '../src/types/translation';
import type { Region, TextBlock } from '../src/types/pipeline';
import type { Box, RasterImage, RGB } from '../src/types/raster';
import { OcrError } from '../src/types/pipeline-errors';
import type { PositionedLine, TextRasterizer } from '../src/translate-image/canvas';
import { StatusLog } from '../src/pipeline/status-log';
import type { OpenOptions, PageSource, PageSplitter, SourceKind } from '../src/pipeline/page-source';
import type { AssemblyLayout, DocumentAssembler } from '../src/pipeline/document-assembler';
import type { DocumentResult } from '../src/types/pipeline';
import { silentLogger } from '../src/utils/logger';
import { cloneRaster, createRaster, fillBox } from '../src/utils/raster';
import { RegionSequence } from '../src/utils/region-sequence';
import { throwIfCancelled } from '../src/utils/error-handling';

export const WHITE: RGB = [255, 255, 255];
export const BLACK: RGB = [0, 0, 0];

/** White page with black rectangles standing in for text. */
export function pageWithInk(width: number, height: number, inks: Box[] = []): RasterImage {
  const image = createRaster(width, height, WHITE);
  for (const box of inks) fillBox(image, box, BLACK);
  return image;
}

export const quietLog = (): StatusLog => new StatusLog({ logger: silentLogger });

/** Indices of pixels whose RGBA differs between two equally sized images. */
export function changedPixels(a: RasterImage, b: RasterImage): Array<{ x: number; y: number }> {
  const changed: Array<{ x: number; y: number }> = [];
  for (let y = 0; y < a.height; y += 1) {
    for (let x = 0; x < a.width; x += 1) {
      const idx = (y * a.width + x) * 4;
      if (
        a.data[idx] !== b.data[idx] ||
        a.data[idx + 1] !== b.data[idx + 1] ||
        a.data[idx + 2] !== b.data[idx + 2] ||
        a.data[idx + 3] !== b.data[idx + 3]
      ) {
        changed.push({ x, y });
      }
    }
  }
  return changed;
}

export const insideAny = (point: { x: number; y: number }, boxes: Box[]): boolean =>
  boxes.some(
    (box) =>
      point.x >= box.x && point.x < box.x + box.width && point.y >= box.y && point.y < box.y + box.height
  );

export const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

/** Returns fixed boxes; throws whatever `fail` returns for an image. */
export class FakeDetector implements RegionDetector {
  readonly calls: RasterImage[] = [];

  constructor(
    private readonly boxes: (image: RasterImage) => Box[],
    private readonly options: { fail?: (image: RasterImage) => Error | null; delayMs?: (image: RasterImage) => number } = {}
  ) {}

  async detect(image: RasterImage, options: DetectOptions = {}): Promise<RegionSequence> {
    this.calls.push(image);
    const delay = this.options.delayMs?.(image) ?? 0;
    if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    throwIfCancelled(options.signal);
    const failure = this.options.fail?.(image) ?? null;
    if (failure) throw failure;
    return new RegionSequence(this.boxes(image), image);
  }
}

/** Reads `text-<index>` from every region; confidence per region index is configurable. */
export class FakeExtractor implements OcrExtractor {
  readonly calls: Region[] = [];

  constructor(private readonly confidence: (region: Region) => number = () => 0.9) {}

  async extract(_image: RasterImage, region: Region, options: ExtractOptions): Promise<TextBlock> {
    this.calls.push(region);
    throwIfCancelled(options.signal);
    const confidence = this.confidence(region);
    if (confidence < options.minConfidence) {
      throw new OcrError(`Region ${region.index} is below the threshold.`, 'LOW_CONFIDENCE', confidence);
    }
    return Object.freeze({
      region,
      sourceText: `text-${region.index}`,
      confidence,
      translatedText: null,
      languagePair: options.languagePair,
    });
  }
}

/** Deterministic translator: `<to>:<text>`, or the text itself when the languages match. */
export class FakeTranslator implements ITextTranslator {
  readonly requests: TranslationRequest[] = [];
  destroyed = false;

  async translate(request: TranslationRequest): Promise<TranslationResponse> {
    this.requests.push(request);
    if (request.from === request.to) return { text: request.text };
    return { text: `${request.to}:${request.text}` };
  }

  destroy(): void {
    this.destroyed = true;
  }
}

/**
 * Monospace stand-in for canvas text: every character is 0.6 em wide and a
 * line covers a solid rectangle of its measured width and the font size.
 */
export class FakeRasterizer implements TextRasterizer {
  measure(text: string, fontSize: number): number {
    return Array.from(text).length * fontSize * 0.6;
  }

  rasterize(lines: PositionedLine[], fontSize: number, _fontFamily: string, width: number, height: number): Uint8ClampedArray {
    const coverage = new Uint8ClampedArray(width * height);
    for (const line of lines) {
      const lineWidth = this.measure(line.text, fontSize);
      const x0 = Math.max(0, Math.floor(line.x - lineWidth / 2));
      const x1 = Math.min(width, Math.ceil(line.x + lineWidth / 2));
      const y0 = Math.max(0, Math.floor(line.y - fontSize / 2));
      const y1 = Math.min(height, Math.ceil(line.y + fontSize / 2));
      for (let y = y0; y < y1; y += 1) {
        for (let x = x0; x < x1; x += 1) {
          coverage[y * width + x] = 255;
        }
      }
    }
    return coverage;
  }
}

/** Pages held in memory; indices in `failing` cannot be rasterised. */
export class FakePageSource implements PageSource {
  readonly pixelsPerPoint = 1;
  closed = false;

  constructor(
    private readonly pages: RasterImage[],
    readonly kind: SourceKind = 'pdf',
    private readonly failing: ReadonlySet<number> = new Set()
  ) {}

  get pageCount(): number {
    return this.pages.length;
  }

  async loadPage(index: number): Promise<RasterImage> {
    if (this.failing.has(index)) throw new Error(`page ${index} is corrupt`);
    return cloneRaster(this.pages[index]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeSplitter implements PageSplitter {
  readonly opened: OpenOptions[] = [];

  constructor(private readonly source: PageSource) {}

  async open(_bytes: Uint8Array, _format: string, options: OpenOptions): Promise<PageSource> {
    this.opened.push(options);
    return this.source;
  }
}

/** Keeps the page rasters it was given and returns a one-byte stand-in document. */
export class CapturingAssembler implements DocumentAssembler {
  pages: RasterImage[] = [];
  layout: AssemblyLayout | null = null;

  async assemble(pages: readonly RasterImage[], layout: AssemblyLayout): Promise<DocumentResult> {
    this.pages = [...pages];
    this.layout = layout;
    return { data: new Uint8Array([pages.length]), mimeType: 'application/pdf', pageCount: pages.length };
  }
}

/** Minimal PDF header so format sniffing routes the bytes to the PDF splitter. */
export const PDF_BYTES = new TextEncoder().encode('%PDF-1.7\n%test\n');
