import type { LanguagePair, Region, TextBlock } from './pipeline';
import type { RasterImage } from './raster';
import type { PreprocessingMode } from '@/utils/image-processor';
import type { RegionSequence } from '@/utils/region-sequence';

/** A recognised word with its box in the coordinates of the image that was recognised. */
export interface OCRWord {
  text: string;
  /** 0..1 */
  confidence: number;
  boundingBox: {
    x: number;
    y: number;
    width: number;
    height: number;
  };
}

export interface OCRResult {
  text: string;
  /** 0..1 */
  confidence: number;
  words: OCRWord[];
}

export interface IOCREngine {
  id: string;
  isLoading: boolean;
  load(): Promise<void>;
  recognize(png: Uint8Array): Promise<OCRResult>;
  destroy(): Promise<void>;
}

export interface DetectOptions {
  languageHint?: string;
  signal?: AbortSignal;
}

export interface RegionDetector {
  /** Throws DetectionError when the image cannot be processed; zero regions is a valid result. */
  detect(image: RasterImage, options?: DetectOptions): Promise<RegionSequence>;
}

export interface ExtractOptions {
  languagePair: LanguagePair;
  minConfidence: number;
  /** Defaults to the source language of `languagePair`. */
  languageHint?: string;
  preprocessing?: PreprocessingMode;
  signal?: AbortSignal;
}

export interface OcrExtractor {
  /** Throws OcrError with LOW_CONFIDENCE or DECODE_FAILURE. */
  extract(image: RasterImage, region: Region, options: ExtractOptions): Promise<TextBlock>;
}
