import type { OcrExtractor, RegionDetector } from '@/types/ocr-engine';
import type { ITextTranslator } from '@/types/translation';
import type { LanguagePair, Page, PageStatus, Region, TextBlock } from '@/types/pipeline';
import type { RasterImage } from '@/types/raster';
import { CancelledError, DetectionError, OcrError, PipelineError } from '@/types/pipeline-errors';
import type { IRegionRenderer } from '@/translate-image/renderer';
import { translateWithPolicy } from '@/translation/translation-policy';
import { mapWithConcurrency } from '@/utils/concurrency';
import { formatErrorMessage, throwIfCancelled, toPageError } from '@/utils/error-handling';
import { clipBox, cloneRaster, cropRaster, pasteRaster } from '@/utils/raster';
import type { StatusLog } from './status-log';

/** Collaborators are built by the caller and shared across pages; none holds page state. */
export interface PageComponents {
  detector: RegionDetector;
  extractor: OcrExtractor;
  translator: ITextTranslator;
  renderer: IRegionRenderer;
}

export interface PageRunOptions {
  languagePair: LanguagePair;
  minOcrConfidence: number;
  translationTimeoutMs: number;
  regionConcurrency: number;
  log: StatusLog;
  signal?: AbortSignal;
  /** Called after every status change of the page. */
  onTransition?: (page: Page) => void;
}

const describe = (error: unknown): string => formatErrorMessage(error).message;

/**
 * Detect, extract, translate and render one page. Detection failures fail the
 * page; extraction, translation and render failures only cost the region
 * they happen in. The page object is the only state written.
 */
export class PagePipeline {
  constructor(private readonly components: PageComponents) {}

  async run(page: Page, options: PageRunOptions): Promise<Page> {
    try {
      throwIfCancelled(options.signal);
      this.transition(page, 'detecting', options, 'detecting text regions');
      const image = page.sourceImage;
      if (!image) {
        throw new DetectionError('Page image could not be decoded.');
      }
      const regions = await this.detect(image, options);

      throwIfCancelled(options.signal);
      this.transition(page, 'extracting', options, `extracting text from ${regions.length} regions`);
      const blocks = await this.extract(image, regions, page.index, options);

      throwIfCancelled(options.signal);
      this.transition(page, 'translating', options, `translating ${blocks.length} text blocks`);
      page.blocks = await this.translate(blocks, page.index, options);

      throwIfCancelled(options.signal);
      const drawable = page.blocks.filter((block) => block.translatedText !== null).length;
      this.transition(page, 'rendering', options, `rendering ${drawable} translated blocks`);
      page.processedImage = await this.render(image, page.blocks, page.index, options);

      page.error = null;
      this.transition(
        page,
        'done',
        options,
        `done: ${drawable} of ${regions.length} text regions translated`
      );
    } catch (error) {
      this.fail(page, error, options);
    }
    return page;
  }

  private async detect(image: RasterImage, options: PageRunOptions): Promise<Region[]> {
    try {
      const sequence = await this.components.detector.detect(image, {
        languageHint: options.languagePair.from,
        signal: options.signal,
      });
      return Array.from(sequence);
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new DetectionError(`Text detection failed: ${describe(error)}`);
    }
  }

  private async extract(
    image: RasterImage,
    regions: Region[],
    pageIndex: number,
    options: PageRunOptions
  ): Promise<TextBlock[]> {
    const { log, signal } = options;
    const results = await mapWithConcurrency(
      regions,
      options.regionConcurrency,
      async (region): Promise<TextBlock | null> => {
        try {
          return await this.components.extractor.extract(image, region, {
            languagePair: options.languagePair,
            minConfidence: options.minOcrConfidence,
            signal,
          });
        } catch (error) {
          throwIfCancelled(signal);
          const kind = error instanceof OcrError ? error.reason.toLowerCase().replace('_', ' ') : 'error';
          log.warn(`region ${region.index} skipped (${kind}): ${describe(error)}`, pageIndex);
          return null;
        }
      },
      { signal }
    );

    const blocks = results.filter((block): block is TextBlock => block !== null);
    const skipped = regions.length - blocks.length;
    if (skipped > 0) {
      log.warn(`${skipped} of ${regions.length} text regions could not be read`, pageIndex);
    }
    return blocks;
  }

  private async translate(
    blocks: TextBlock[],
    pageIndex: number,
    options: PageRunOptions
  ): Promise<TextBlock[]> {
    const { log, signal, languagePair } = options;
    const translated = await mapWithConcurrency(
      blocks,
      options.regionConcurrency,
      async (block): Promise<TextBlock> => {
        const outcome = await translateWithPolicy(
          this.components.translator,
          { from: languagePair.from, to: languagePair.to, text: block.sourceText },
          {
            timeoutMs: options.translationTimeoutMs,
            signal,
            onRetry: (_error, shortened) =>
              log.warn(
                `region ${block.region.index}: translation timed out, retrying with ${Array.from(shortened).length} characters`,
                pageIndex
              ),
          }
        );
        if (outcome.text === null) {
          log.warn(
            `region ${block.region.index} left untranslated: ${describe(outcome.error)}`,
            pageIndex
          );
        }
        return Object.freeze({ ...block, translatedText: outcome.text });
      },
      { signal }
    );

    const untranslated = translated.filter((block) => block.translatedText === null).length;
    if (untranslated > 0) {
      log.warn(`${untranslated} of ${blocks.length} text regions could not be translated`, pageIndex);
    }
    return translated;
  }

  /** Draws blocks one at a time in ascending region index; a failed block keeps its pixels. */
  private async render(
    source: RasterImage,
    blocks: TextBlock[],
    pageIndex: number,
    options: PageRunOptions
  ): Promise<RasterImage> {
    const { log } = options;
    let output = cloneRaster(source);
    const ordered = [...blocks].sort((a, b) => a.region.index - b.region.index);

    for (const block of ordered) {
      if (block.translatedText === null) continue;
      const bounds = clipBox(block.region, output.width, output.height);
      const snapshot = cropRaster(output, bounds);
      try {
        output = await this.components.renderer.render(output, block, {
          onDegraded: (message) => log.warn(message, pageIndex),
        });
      } catch (error) {
        pasteRaster(output, snapshot, bounds.x, bounds.y);
        log.warn(
          `region ${block.region.index}: rendering failed, original pixels kept (${describe(error)})`,
          pageIndex
        );
      }
    }
    return output;
  }

  private transition(page: Page, status: PageStatus, options: PageRunOptions, message: string): void {
    page.status = status;
    options.log.info(message, page.index);
    options.onTransition?.(page);
  }

  private fail(page: Page, error: unknown, options: PageRunOptions): void {
    // Once the document is cancelled every failure of this run is reported as a cancellation.
    const cancelled = options.signal?.aborted === true;
    const cause = cancelled && !(error instanceof CancelledError) ? new CancelledError() : error;

    page.status = 'failed';
    page.error = toPageError(cause);
    page.processedImage = null;
    if (cancelled) {
      options.log.warn('cancelled; original page kept', page.index);
    } else {
      options.log.error(`failed: ${describe(cause)}; original page kept`, page.index);
    }
    options.onTransition?.(page);
  }
}
