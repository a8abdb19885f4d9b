import { createWorker, PSM, type Worker } from 'tesseract.js';
import type { IOCREngine, OCRResult } from '@/types/ocr-engine';
import { createLogger, type Logger } from '@/utils/logger';

/**
 * - 'sparse': find as much text as possible in no particular order (page detection)
 * - 'block': one uniform block of horizontal text (region crops)
 * - 'vertical-block': one block of top-to-bottom columns
 */
export type TesseractSegmentation = 'sparse' | 'block' | 'vertical-block';

const PAGE_SEG_MODES: Record<TesseractSegmentation, PSM> = {
  sparse: PSM.SPARSE_TEXT,
  block: PSM.SINGLE_BLOCK,
  'vertical-block': PSM.SINGLE_BLOCK_VERT_TEXT,
};

export interface TesseractEngineOptions {
  /** Tesseract traineddata id, e.g. `jpn` */
  language: string;
  segmentation: TesseractSegmentation;
  /** Where traineddata is read from; tesseract.js downloads it when unset. */
  langPath?: string;
  cachePath?: string;
  logger?: Logger;
}

/** One tesseract.js worker bound to a language and a page segmentation mode. */
export class TesseractEngine implements IOCREngine {
  public readonly id = 'tesseract';
  public isLoading = false;
  private worker: Worker | null = null;
  private readonly options: TesseractEngineOptions;
  private readonly logger: Logger;

  constructor(options: TesseractEngineOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('tesseract');
  }

  async load(): Promise<void> {
    if (this.worker) {
      return;
    }

    this.isLoading = true;
    try {
      const worker = await createWorker(this.options.language, 1, {
        langPath: this.options.langPath,
        cachePath: this.options.cachePath,
      });
      await worker.setParameters({
        tessedit_pageseg_mode: PAGE_SEG_MODES[this.options.segmentation],
      });
      this.worker = worker;
      this.logger.info('worker ready', {
        language: this.options.language,
        segmentation: this.options.segmentation,
      });
    } finally {
      this.isLoading = false;
    }
  }

  async recognize(png: Uint8Array): Promise<OCRResult> {
    if (!this.worker) {
      throw new Error('Tesseract engine not loaded.');
    }

    const result = await this.worker.recognize(Buffer.from(png));
    return {
      text: result.data.text ?? '',
      confidence: (result.data.confidence ?? 0) / 100,
      words: (result.data.words ?? []).map((word) => ({
        text: word.text,
        confidence: word.confidence / 100,
        boundingBox: {
          x: word.bbox.x0,
          y: word.bbox.y0,
          width: word.bbox.x1 - word.bbox.x0,
          height: word.bbox.y1 - word.bbox.y0,
        },
      })),
    };
  }

  async destroy(): Promise<void> {
    if (this.worker) {
      await this.worker.terminate();
      this.worker = null;
    }
  }
}
