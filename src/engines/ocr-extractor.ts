import type { ExtractOptions, OcrExtractor } from '@/types/ocr-engine';
import type { Region, TextBlock } from '@/types/pipeline';
import type { RasterImage } from '@/types/raster';
import { OcrError } from '@/types/pipeline-errors';
import { isCjkLanguage, toTesseractLanguage } from '@/translation/languages';
import { isCancellation, throwIfCancelled } from '@/utils/error-handling';
import { encodePng } from '@/utils/image-codec';
import { ImageProcessor, type PreprocessingMode } from '@/utils/image-processor';
import { cropRaster } from '@/utils/raster';
import type { EnginePool } from './engine-factory';

export interface TesseractOcrExtractorOptions {
  preprocessing?: PreprocessingMode;
  processor?: ImageProcessor;
}

const CJK_CHAR = '[\\p{Script=Han}\\p{Script=Hiragana}\\p{Script=Katakana}ー、。！？「」]';
const CJK_GAP = new RegExp(`(?<=${CJK_CHAR})\\s+(?=${CJK_CHAR})`, 'gu');

/**
 * Collapses whitespace and line breaks to single spaces. Japanese and Chinese
 * do not separate words, so spaces Tesseract puts between their characters go.
 */
export function normalizeRecognizedText(text: string, language: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return isCjkLanguage(language) ? collapsed.replace(CJK_GAP, '') : collapsed;
}

/** Tall narrow CJK regions are read as vertical columns. */
export const isVerticalRegion = (region: Region, language: string): boolean =>
  isCjkLanguage(language) && region.height > region.width * 1.5;

/**
 * Recognises one region: crop, preprocess, single-block Tesseract pass. Empty
 * output and confidence below `minConfidence` are LOW_CONFIDENCE; any other
 * failure is DECODE_FAILURE.
 */
export class TesseractOcrExtractor implements OcrExtractor {
  private readonly processor: ImageProcessor;
  private readonly preprocessing: PreprocessingMode;

  constructor(
    private readonly engines: EnginePool,
    options: TesseractOcrExtractorOptions = {}
  ) {
    this.processor = options.processor ?? new ImageProcessor();
    this.preprocessing = options.preprocessing ?? 'light';
  }

  async extract(image: RasterImage, region: Region, options: ExtractOptions): Promise<TextBlock> {
    throwIfCancelled(options.signal);
    const language = options.languageHint ?? options.languagePair.from;
    const vertical = isVerticalRegion(region, language);

    let recognized: { text: string; confidence: number };
    try {
      const crop = cropRaster(image, region);
      const prepared = this.processor.preprocess(crop, options.preprocessing ?? this.preprocessing);
      const engine = await this.engines.acquire(
        toTesseractLanguage(language, vertical ? 'vertical' : 'horizontal'),
        vertical ? 'vertical-block' : 'block'
      );
      const png = await encodePng(prepared);
      throwIfCancelled(options.signal);
      recognized = await engine.recognize(png);
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new OcrError(`Region ${region.index} could not be read: ${message}`, 'DECODE_FAILURE');
    }

    const sourceText = normalizeRecognizedText(recognized.text, language);
    if (!sourceText) {
      throw new OcrError(`Region ${region.index} contains no readable text.`, 'LOW_CONFIDENCE', 0);
    }
    if (recognized.confidence < options.minConfidence) {
      throw new OcrError(
        `Region ${region.index} confidence ${recognized.confidence.toFixed(2)} is below ${options.minConfidence.toFixed(2)}.`,
        'LOW_CONFIDENCE',
        recognized.confidence
      );
    }

    return Object.freeze({
      region,
      sourceText,
      confidence: recognized.confidence,
      translatedText: null,
      languagePair: options.languagePair,
    });
  }
}
