import {
  mergePipelineConfig,
  parsePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
  type PipelineConfigOverrides,
} from '@/config/pipeline-config';
import { DefaultDocumentAssembler, type DocumentAssembler } from '@/pipeline/document-assembler';
import { createPages, DocumentPipeline } from '@/pipeline/document-pipeline';
import { DefaultPageSplitter, type PageSource, type PageSplitter } from '@/pipeline/page-source';
import { PagePipeline } from '@/pipeline/page-pipeline';
import { StatusLog, type StatusLogListener } from '@/pipeline/status-log';
import type { IRegionRenderer } from '@/translate-image/renderer';
import { requireLanguage } from '@/translation/languages';
import type { OcrExtractor, RegionDetector } from '@/types/ocr-engine';
import type { ITextTranslator } from '@/types/translation';
import {
  isTerminalDocumentStatus,
  isTerminalPageStatus,
  type DocumentResult,
  type DocumentStatus,
  type DocumentStatusReport,
  type Page,
  type PageStatusReport,
} from '@/types/pipeline';
import {
  CancelledError,
  DocumentNotFoundError,
  NotReadyError,
  PipelineError,
  StorageError,
  ValidationError,
} from '@/types/pipeline-errors';
import {
  createProcessingFailedError,
  formatErrorMessage,
  logError,
  retryWithBackoff,
  toPageError,
} from '@/utils/error-handling';
import { encodePng, sniffFormat } from '@/utils/image-codec';
import { createLogger, type Logger } from '@/utils/logger';
import type { DocumentRecord, DocumentStore, PageRecord } from './document-store';
import { MemoryDocumentStore } from './memory-store';

export interface PanelTranslationServiceOptions {
  /** Service-wide configuration; submissions may override single fields. */
  config: PipelineConfigInput;
  detector: RegionDetector;
  extractor: OcrExtractor;
  translator: ITextTranslator;
  /** Renderers take font and erase settings, which submissions may override. */
  createRenderer: (config: PipelineConfig) => IRegionRenderer;
  store?: DocumentStore;
  splitter?: PageSplitter;
  assembler?: DocumentAssembler;
  logger?: Logger;
  /** Waits between store write attempts. Default [250, 500, 1000] */
  storageRetryDelaysMs?: number[];
  /**
   * Finished documents kept in memory with their status log; older ones are
   * answered from the store without a log. Default 100
   */
  retainFinishedJobs?: number;
  /** Releases collaborators owned by whoever built the service. */
  onClose?: () => Promise<void>;
}

interface Job {
  id: string;
  status: DocumentStatus;
  createdAt: string;
  config: PipelineConfig;
  pages: Page[];
  log: StatusLog;
  controller: AbortController;
  source: PageSource;
  failure: PipelineError | null;
  done: Promise<void>;
}

/** Serialises store writes issued from synchronous callbacks and keeps the first failure. */
class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private failure: { error: unknown } | null = null;

  push(write: () => Promise<unknown>): void {
    this.tail = this.tail
      .then(async () => {
        if (!this.failure) await write();
      })
      .catch((error: unknown) => {
        this.failure ??= { error };
      });
  }

  async flush(): Promise<void> {
    await this.tail;
    if (this.failure) throw this.failure.error;
  }
}

const toPageReport = (page: Page): PageStatusReport => ({
  index: page.index,
  status: page.status,
  error: page.error,
  blockCount: page.blocks.length,
  translatedBlockCount: page.blocks.filter((block) => block.translatedText !== null).length,
});

const recordToPageReport = (record: PageRecord): PageStatusReport => ({
  index: record.index,
  status: record.status,
  error: record.error,
  blockCount: record.blockCount,
  translatedBlockCount: record.translatedBlockCount,
});

/** Share of terminal pages; only a terminal document reports 100. */
export function computeProgress(
  status: DocumentStatus,
  pages: ReadonlyArray<Pick<PageStatusReport, 'status'>>
): number {
  if (isTerminalDocumentStatus(status)) return 100;
  if (pages.length === 0) return 0;
  const terminal = pages.filter((page) => isTerminalPageStatus(page.status)).length;
  return Math.min(99, Math.floor((terminal * 100) / pages.length));
}

/**
 * Entry point for callers such as an upload handler or a queue consumer.
 * Submissions are validated synchronously with respect to the caller and then
 * processed in the background; progress is pulled with `getStatus` or pushed
 * through `subscribe`.
 */
export class PanelTranslationService {
  private readonly config: PipelineConfig;
  private readonly store: DocumentStore;
  private readonly splitter: PageSplitter;
  private readonly assembler: DocumentAssembler;
  private readonly logger: Logger;
  private readonly retryDelaysMs: number[];
  private readonly retainFinished: number;
  private readonly jobs = new Map<string, Job>();
  private readonly finished: string[] = [];
  private closed = false;

  constructor(private readonly options: PanelTranslationServiceOptions) {
    this.config = parsePipelineConfig(options.config);
    this.store = options.store ?? new MemoryDocumentStore();
    this.splitter = options.splitter ?? new DefaultPageSplitter();
    this.assembler = options.assembler ?? new DefaultDocumentAssembler();
    this.logger = options.logger ?? createLogger('service');
    this.retryDelaysMs = options.storageRetryDelaysMs ?? [250, 500, 1000];
    this.retainFinished = Math.max(0, options.retainFinishedJobs ?? 100);
  }

  /**
   * Validates the submission, records the document and starts processing.
   * Rejects with ValidationError for unreadable or unsupported input and with
   * StorageError when the document cannot be recorded.
   */
  async submitDocument(
    source: Uint8Array,
    sourceLang: string,
    targetLang: string,
    overrides: PipelineConfigOverrides = {}
  ): Promise<string> {
    if (this.closed) {
      throw createProcessingFailedError('The translation service is closed.', false);
    }

    const config = mergePipelineConfig(this.config, overrides);
    if (source.byteLength === 0) {
      throw new ValidationError('The submitted file is empty.', 'EMPTY_DOCUMENT');
    }
    if (source.byteLength > config.maxSourceBytes) {
      throw new ValidationError(
        `The submitted file is ${source.byteLength} bytes; the limit is ${config.maxSourceBytes}.`,
        'FILE_TOO_LARGE'
      );
    }

    const from = requireLanguage(sourceLang);
    const to = requireLanguage(targetLang);
    if (from === to && config.strictLanguagePair) {
      throw new ValidationError(
        `Source and target language are both ${from}.`,
        'SAME_LANGUAGE_PAIR'
      );
    }

    const format = sniffFormat(source);
    if (!format) {
      throw new ValidationError('The submitted file is neither an image nor a PDF document.', 'UNSUPPORTED_FORMAT');
    }

    const pageSource = await this.splitter.open(source, format, { pdfRenderScale: config.pdfRenderScale });
    let record: DocumentRecord;
    try {
      if (pageSource.pageCount === 0) {
        throw new ValidationError('The submitted document has no pages.', 'EMPTY_DOCUMENT');
      }
      record = await this.persist('create', () =>
        this.store.createDocument({
          pageCount: pageSource.pageCount,
          sourceLanguage: from,
          targetLanguage: to,
        })
      );
    } catch (error) {
      await this.closeSource(pageSource);
      throw error;
    }

    const job: Job = {
      id: record.id,
      status: 'pending',
      createdAt: record.createdAt,
      config,
      pages: createPages(pageSource.pageCount),
      log: new StatusLog({ logger: this.logger.child(record.id.slice(0, 8)) }),
      controller: new AbortController(),
      source: pageSource,
      failure: null,
      done: Promise.resolve(),
    };
    job.log.info(`submitted ${format} with ${pageSource.pageCount} pages, ${from} -> ${to}`);
    if (from === to) {
      job.log.warn(`source and target language are both ${from}; recognised text is redrawn untranslated`);
    }

    this.jobs.set(job.id, job);
    job.done = this.runJob(job, { from, to });
    this.logger.info('document submitted', { id: job.id, pages: pageSource.pageCount, format });
    return job.id;
  }

  async getStatus(documentId: string): Promise<DocumentStatusReport> {
    const job = this.jobs.get(documentId);
    if (job) {
      const pages = job.pages.map(toPageReport);
      return {
        documentId,
        status: job.status,
        createdAt: job.createdAt,
        progress: computeProgress(job.status, pages),
        pages,
        log: job.log.list(),
      };
    }

    const record = await this.persist('read', () => this.store.getDocument(documentId));
    if (!record) throw new DocumentNotFoundError(documentId);
    const pages = (await this.persist('read', () => this.store.listPages(documentId))).map(recordToPageReport);
    return {
      documentId,
      status: record.status,
      createdAt: record.createdAt,
      progress: computeProgress(record.status, pages),
      pages,
      log: [],
    };
  }

  /** Rejects with NotReadyError until the document reaches a terminal status. */
  async getResult(documentId: string): Promise<DocumentResult> {
    const job = this.jobs.get(documentId);
    if (job?.failure) throw job.failure;
    if (job && !isTerminalDocumentStatus(job.status)) throw new NotReadyError(documentId);

    const record = await this.persist('read', () => this.store.getDocument(documentId));
    if (!record) throw new DocumentNotFoundError(documentId);
    if (!isTerminalDocumentStatus(record.status)) throw new NotReadyError(documentId);
    if (record.status === 'failed') {
      throw createProcessingFailedError(record.error?.message, false);
    }

    const { resultRef, mimeType } = record;
    if (!resultRef || !mimeType) {
      throw new StorageError(`Result of document ${documentId} is missing from the store.`);
    }
    const stored = await this.persist('read', () => this.store.getObject(resultRef));
    if (!stored) {
      throw new StorageError(`Result object ${resultRef} is missing from the store.`);
    }
    return { data: stored.data, mimeType, pageCount: record.pageCount };
  }

  /**
   * Stops scheduling pages; pages in flight stop at their next OCR or
   * translation boundary. Returns false when the document already finished.
   */
  async cancel(documentId: string): Promise<boolean> {
    const job = this.jobs.get(documentId);
    if (!job) {
      const record = await this.persist('read', () => this.store.getDocument(documentId));
      if (!record) throw new DocumentNotFoundError(documentId);
      return false;
    }
    if (isTerminalDocumentStatus(job.status) || job.controller.signal.aborted) {
      return false;
    }
    job.log.warn('cancellation requested');
    job.controller.abort(new CancelledError());
    return true;
  }

  /** Resolves with the final status; rejects when the document failed on an infrastructure fault. */
  async waitForCompletion(documentId: string): Promise<DocumentStatusReport> {
    const job = this.jobs.get(documentId);
    if (job) {
      await job.done;
      if (job.failure) throw job.failure;
    }
    return await this.getStatus(documentId);
  }

  subscribe(documentId: string, listener: StatusLogListener): () => void {
    const job = this.jobs.get(documentId);
    if (!job) throw new DocumentNotFoundError(documentId);
    return job.log.subscribe(listener);
  }

  /** Cancels running documents, waits for them to settle and releases collaborators. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const running = [...this.jobs.values()].filter((job) => !isTerminalDocumentStatus(job.status));
    for (const job of running) {
      job.controller.abort(new CancelledError());
    }
    await Promise.all(running.map((job) => job.done));
    await this.options.onClose?.();
  }

  /** Never rejects; failures end up on the job and the document record. */
  private async runJob(job: Job, languagePair: { from: string; to: string }): Promise<void> {
    const writes = new WriteQueue();
    const pipeline = new DocumentPipeline(
      new PagePipeline({
        detector: this.options.detector,
        extractor: this.options.extractor,
        translator: this.options.translator,
        renderer: this.options.createRenderer(job.config),
      }),
      this.assembler,
      this.logger.child('document')
    );

    try {
      job.status = 'processing';
      await this.persist('update', () => this.store.updateDocument(job.id, { status: 'processing' }));
      for (const page of job.pages) {
        writes.push(() => this.persistPage(job.id, page, null));
      }

      const outcome = await pipeline.run(job.pages, {
        config: job.config,
        languagePair,
        source: job.source,
        log: job.log,
        signal: job.controller.signal,
        onPageUpdate: (page) => {
          const image = page.status === 'done' ? page.processedImage : null;
          const snapshot = { ...page, blocks: [...page.blocks] };
          writes.push(() => this.persistPage(job.id, snapshot, image));
        },
      });
      await writes.flush();

      const resultRef = await this.persist('write', () =>
        this.store.putObject(outcome.result.data, outcome.result.mimeType)
      );
      await this.persist('update', () =>
        this.store.updateDocument(job.id, {
          status: outcome.status,
          resultRef,
          mimeType: outcome.result.mimeType,
        })
      );
      job.status = outcome.status;
      this.logger.info('document finished', { id: job.id, status: outcome.status });
    } catch (error) {
      await this.failJob(job, error);
    } finally {
      for (const page of job.pages) {
        page.sourceImage = null;
        page.processedImage = null;
      }
      await this.closeSource(job.source);
      this.retire(job);
    }
  }

  /** Drops the oldest finished jobs beyond the retention limit. */
  private retire(job: Job): void {
    this.finished.push(job.id);
    while (this.finished.length > this.retainFinished) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) this.jobs.delete(evicted);
    }
  }

  private async failJob(job: Job, error: unknown): Promise<void> {
    logError(error);
    job.failure =
      error instanceof PipelineError
        ? error
        : createProcessingFailedError(formatErrorMessage(error).message, false);
    job.status = 'failed';
    job.log.error(`document failed: ${job.failure.message}`);
    try {
      await this.store.updateDocument(job.id, { status: 'failed', error: toPageError(job.failure) });
    } catch (updateError) {
      this.logger.error('failed status could not be recorded', updateError, { id: job.id });
    }
  }

  private async persistPage(documentId: string, page: Page, image: Page['processedImage']): Promise<void> {
    let processedImageRef: string | null = null;
    if (image) {
      const png = new Uint8Array(await encodePng(image));
      processedImageRef = await this.persist('write', () => this.store.putObject(png, 'image/png'));
    }
    const report = toPageReport(page);
    await this.persist('write', () =>
      this.store.putPage({
        documentId,
        index: report.index,
        status: report.status,
        processedImageRef,
        error: report.error,
        blockCount: report.blockCount,
        translatedBlockCount: report.translatedBlockCount,
      })
    );
  }

  private async persist<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(operation, {
        delaysMs: this.retryDelaysMs,
        shouldRetry: (error) => !(error instanceof DocumentNotFoundError),
        onRetry: (error, attempt) =>
          this.logger.warn('store retry', { action, attempt, reason: formatErrorMessage(error).message }),
      });
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new StorageError(`Document store ${action} failed: ${formatErrorMessage(error).message}`, {
        cause: error,
      });
    }
  }

  private async closeSource(source: PageSource): Promise<void> {
    try {
      await source.close();
    } catch (error) {
      this.logger.error('page source could not be closed', error);
    }
  }
}
