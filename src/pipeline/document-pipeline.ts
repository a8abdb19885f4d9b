import type { PipelineConfig } from '@/config/pipeline-config';
import type { DocumentResult, DocumentStatus, LanguagePair, Page } from '@/types/pipeline';
import { isTerminalPageStatus } from '@/types/pipeline';
import type { RasterImage } from '@/types/raster';
import { CancelledError } from '@/types/pipeline-errors';
import { runPool } from '@/utils/concurrency';
import { formatErrorMessage, toPageError } from '@/utils/error-handling';
import { createLogger, type Logger } from '@/utils/logger';
import { createRaster } from '@/utils/raster';
import type { DocumentAssembler } from './document-assembler';
import type { PageSource } from './page-source';
import type { PagePipeline } from './page-pipeline';
import type { StatusLog } from './status-log';

/** A4 in PDF points, used for blank pages when no page of the document could be read. */
const FALLBACK_PAGE_POINTS = { width: 595, height: 842 };

export interface DocumentRunOptions {
  config: PipelineConfig;
  languagePair: LanguagePair;
  source: PageSource;
  log: StatusLog;
  signal?: AbortSignal;
  /** Called after every status change of any page. */
  onPageUpdate?: (page: Page) => void;
}

export interface DocumentRunResult {
  status: Extract<DocumentStatus, 'done' | 'partially_failed'>;
  result: DocumentResult;
  pages: Page[];
}

export const createPages = (count: number): Page[] =>
  Array.from({ length: count }, (_, index) => ({
    index,
    sourceImage: null,
    blocks: [],
    processedImage: null,
    status: 'pending',
    error: null,
  }));

/**
 * Runs the page pipeline over every page with at most `maxPageConcurrency`
 * pages in flight, waits for all of them and assembles the output in page
 * order. Failed pages contribute their original pixels.
 */
export class DocumentPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly pagePipeline: PagePipeline,
    private readonly assembler: DocumentAssembler,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('document');
  }

  async run(pages: Page[], options: DocumentRunOptions): Promise<DocumentRunResult> {
    const { config, log, signal, source } = options;
    log.info(`processing ${pages.length} pages, up to ${config.maxPageConcurrency} at a time`);

    await runPool(
      pages,
      config.maxPageConcurrency,
      async (page) => {
        await this.loadSource(page, options);
        await this.pagePipeline.run(page, {
          languagePair: options.languagePair,
          minOcrConfidence: config.minOcrConfidence,
          translationTimeoutMs: config.translationTimeoutMs,
          regionConcurrency: config.regionConcurrency,
          log,
          signal,
          onTransition: options.onPageUpdate,
        });
      },
      { signal }
    );

    for (const page of pages) {
      if (isTerminalPageStatus(page.status)) continue;
      page.status = 'failed';
      page.error = toPageError(new CancelledError());
      log.warn('cancelled before processing; original page kept', page.index);
      options.onPageUpdate?.(page);
    }

    const rasters = await this.collectOutput(pages, source, log);
    const result = await this.assembler.assemble(rasters, {
      kind: source.kind,
      pixelsPerPoint: source.pixelsPerPoint,
    });

    const failed = pages.filter((page) => page.status === 'failed').length;
    const status = failed === 0 ? 'done' : 'partially_failed';
    if (failed === 0) {
      log.info(`done: ${pages.length} pages translated`);
    } else {
      log.warn(`${failed} of ${pages.length} pages could not be translated and keep their original image`);
    }
    this.logger.info('document assembled', { pages: pages.length, failed, mime: result.mimeType });

    return { status, result, pages };
  }

  private async loadSource(page: Page, options: DocumentRunOptions): Promise<void> {
    if (page.sourceImage) return;
    try {
      page.sourceImage = await options.source.loadPage(page.index, options.signal);
    } catch (error) {
      // The page pipeline fails a page without pixels at detection.
      options.log.warn(`page could not be rasterised: ${formatErrorMessage(error).message}`, page.index);
    }
  }

  private async collectOutput(pages: Page[], source: PageSource, log: StatusLog): Promise<RasterImage[]> {
    const rasters: Array<RasterImage | null> = [];
    for (const page of pages) {
      let raster = page.processedImage ?? page.sourceImage;
      if (!raster) {
        // Pages that never started still need their original pixels.
        try {
          raster = await source.loadPage(page.index);
        } catch (error) {
          log.warn(`original page unavailable, a blank page is used (${formatErrorMessage(error).message})`, page.index);
        }
      }
      rasters.push(raster);
    }

    const reference = rasters.find((raster): raster is RasterImage => raster !== null);
    const blankWidth = reference?.width ?? Math.round(FALLBACK_PAGE_POINTS.width * source.pixelsPerPoint);
    const blankHeight = reference?.height ?? Math.round(FALLBACK_PAGE_POINTS.height * source.pixelsPerPoint);
    return rasters.map((raster) => raster ?? createRaster(blankWidth, blankHeight));
  }
}
