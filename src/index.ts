import { parsePipelineConfig, type PipelineConfigInput } from '@/config/pipeline-config';
import { EnginePool } from '@/engines/engine-factory';
import { TesseractOcrExtractor } from '@/engines/ocr-extractor';
import { TesseractRegionDetector } from '@/engines/region-detector';
import { TesseractEngine } from '@/engines/tesseract-engine';
import type { DocumentStore } from '@/service/document-store';
import { PanelTranslationService } from '@/service/translation-service';
import { CanvasTextRasterizer, registerFont } from '@/translate-image/canvas';
import { RegionRenderer } from '@/translate-image/renderer';
import { CachingTranslator, LruTranslationStorage } from '@/translation/caching-translator';
import { OpenAiTranslator, type ChatCompletionClient } from '@/translation/openai-translator';
import type { PreprocessingMode } from '@/utils/image-processor';
import { createLogger, type Logger } from '@/utils/logger';

export * from '@/config/pipeline-config';
export * from '@/types/pipeline';
export * from '@/types/pipeline-errors';
export type { RasterImage, Box } from '@/types/raster';
export type { ITextTranslator, TranslationRequest, TranslationResponse } from '@/types/translation';
export type { OcrExtractor, RegionDetector } from '@/types/ocr-engine';
export { PanelTranslationService, computeProgress } from '@/service/translation-service';
export type { PanelTranslationServiceOptions } from '@/service/translation-service';
export type { DocumentRecord, DocumentStore, PageRecord } from '@/service/document-store';
export { MemoryDocumentStore } from '@/service/memory-store';
export { LANGUAGES, normalizeLanguage } from '@/translation/languages';
export { createLogger } from '@/utils/logger';
export type { Logger } from '@/utils/logger';

export interface CreateServiceOptions {
  config: PipelineConfigInput;
  openai?: {
    apiKey?: string;
    model?: string;
    client?: ChatCompletionClient;
  };
  tesseract?: {
    /** Directory or URL holding `<lang>.traineddata` files. */
    langPath?: string;
    cachePath?: string;
    preprocessing?: PreprocessingMode;
  };
  /** Font files to register with the text renderer, keyed by family name. */
  fonts?: Record<string, string>;
  fontFamily?: string;
  translationCacheSize?: number;
  store?: DocumentStore;
  logger?: Logger;
}

/** Wires Tesseract, OpenAI and the canvas renderer into a ready-to-use service. */
export function createPanelTranslationService(options: CreateServiceOptions): PanelTranslationService {
  const logger = options.logger ?? createLogger('panel');
  const config = parsePipelineConfig(options.config);

  for (const [family, path] of Object.entries(options.fonts ?? {})) {
    if (!registerFont(path, family)) {
      logger.warn('font not registered', { family, path });
    }
  }

  const engines = new EnginePool(
    (engineOptions) =>
      new TesseractEngine({
        ...engineOptions,
        langPath: options.tesseract?.langPath,
        cachePath: options.tesseract?.cachePath,
        logger: logger.child('tesseract'),
      })
  );
  const translator = new CachingTranslator(
    new OpenAiTranslator({
      client: options.openai?.client,
      apiKey: options.openai?.apiKey,
      model: options.openai?.model ?? process.env.OPENAI_TRANSLATION_MODEL,
      logger: logger.child('translator'),
    }),
    new LruTranslationStorage(options.translationCacheSize)
  );
  const rasterizer = new CanvasTextRasterizer();

  return new PanelTranslationService({
    config,
    detector: new TesseractRegionDetector(engines, { logger: logger.child('detector') }),
    extractor: new TesseractOcrExtractor(engines, { preprocessing: options.tesseract?.preprocessing }),
    translator,
    createRenderer: (documentConfig) =>
      new RegionRenderer({
        rasterizer,
        minFontSize: documentConfig.minFontSize,
        maxFontSize: documentConfig.maxFontSize,
        eraseMode: documentConfig.eraseMode,
        fontFamily: options.fontFamily,
      }),
    store: options.store,
    logger: logger.child('service'),
    onClose: async () => {
      await translator.destroy();
      await engines.destroyAll();
    },
  });
}
