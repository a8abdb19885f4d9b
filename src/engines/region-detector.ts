import type { DetectOptions, RegionDetector } from '@/types/ocr-engine';
import type { Box, RasterImage } from '@/types/raster';
import { DetectionError } from '@/types/pipeline-errors';
import { toTesseractLanguage } from '@/translation/languages';
import { buildRegions } from '@/translate-image/regions';
import { isCancellation, throwIfCancelled } from '@/utils/error-handling';
import { encodePng } from '@/utils/image-codec';
import { createLogger, type Logger } from '@/utils/logger';
import { RegionSequence } from '@/utils/region-sequence';
import type { EnginePool } from './engine-factory';

export interface TesseractRegionDetectorOptions {
  /** Pixels added around each detected cluster. */
  padding?: number;
  /** Clusters narrower or shorter than this are treated as noise. */
  minRegionSize?: number;
  /** Clusters covering more than this share of both page dimensions are dropped. */
  maxPageCoverage?: number;
  /** Words below this confidence (0..1) do not seed regions. */
  minWordConfidence?: number;
  defaultLanguage?: string;
  logger?: Logger;
}

/**
 * Finds text areas with a sparse-text Tesseract pass over the whole page and
 * clusters the recognised words into speech-bubble sized regions.
 */
export class TesseractRegionDetector implements RegionDetector {
  private readonly padding: number;
  private readonly minRegionSize: number;
  private readonly maxPageCoverage: number;
  private readonly minWordConfidence: number;
  private readonly defaultLanguage: string;
  private readonly logger: Logger;

  constructor(
    private readonly engines: EnginePool,
    options: TesseractRegionDetectorOptions = {}
  ) {
    this.padding = options.padding ?? 5;
    this.minRegionSize = options.minRegionSize ?? 8;
    this.maxPageCoverage = options.maxPageCoverage ?? 0.9;
    this.minWordConfidence = options.minWordConfidence ?? 0.2;
    this.defaultLanguage = options.defaultLanguage ?? 'ja';
    this.logger = options.logger ?? createLogger('detector');
  }

  async detect(image: RasterImage, options: DetectOptions = {}): Promise<RegionSequence> {
    throwIfCancelled(options.signal);
    if (image.width === 0 || image.height === 0) {
      throw new DetectionError('Page image is empty.');
    }

    const language = options.languageHint ?? this.defaultLanguage;
    try {
      const engine = await this.engines.acquire(toTesseractLanguage(language), 'sparse');
      const png = await encodePng(image);
      throwIfCancelled(options.signal);
      const result = await engine.recognize(png);

      const clusters = buildRegions(result.words, {
        sourceLang: language,
        minWordConfidence: this.minWordConfidence,
      });
      const boxes = clusters
        .map((cluster) => this.pad(cluster.bbox))
        .filter((box) => this.isPlausible(box, image));

      this.logger.info('detected', { words: result.words.length, regions: boxes.length });
      return new RegionSequence(boxes, image);
    } catch (error) {
      if (isCancellation(error) || error instanceof DetectionError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new DetectionError(`Text detection failed: ${message}`);
    }
  }

  private pad(box: Box): Box {
    return {
      x: box.x - this.padding,
      y: box.y - this.padding,
      width: box.width + 2 * this.padding,
      height: box.height + 2 * this.padding,
    };
  }

  private isPlausible(box: Box, image: RasterImage): boolean {
    if (box.width < this.minRegionSize || box.height < this.minRegionSize) {
      return false;
    }
    return !(
      box.width > image.width * this.maxPageCoverage && box.height > image.height * this.maxPageCoverage
    );
  }
}
