import type { TextBlock } from '@/types/pipeline';
import type { RasterImage } from '@/types/raster';
import { RenderError } from '@/types/pipeline-errors';
import { clipBox } from '@/utils/raster';
import { blendTextMask } from './blend';
import type { TextRasterizer } from './canvas';
import { getContrastColor } from './color';
import { eraseRegion, type EraseMode } from './erase';
import { computeTextLayout, getFontFamily } from './layout';

export interface RenderOptions {
  /** Called for degradations that do not fail the block, such as clipped text. */
  onDegraded?: (message: string) => void;
}

export interface IRegionRenderer {
  /**
   * Erases the block's source text and draws its translation, writing into
   * `image` and returning it. Throws RenderError; never throws on overflow.
   */
  render(image: RasterImage, block: TextBlock, options?: RenderOptions): Promise<RasterImage>;
}

export interface RegionRendererOptions {
  rasterizer: TextRasterizer;
  minFontSize: number;
  maxFontSize: number;
  eraseMode?: EraseMode;
  /** Overrides the per-language default. */
  fontFamily?: string;
  lineSpacing?: number;
  paddingFactor?: number;
}

export class RegionRenderer implements IRegionRenderer {
  constructor(private readonly options: RegionRendererOptions) {}

  async render(image: RasterImage, block: TextBlock, options: RenderOptions = {}): Promise<RasterImage> {
    if (block.translatedText === null) {
      return image;
    }

    const bounds = clipBox(block.region, image.width, image.height);
    if (bounds.width === 0 || bounds.height === 0) {
      return image;
    }

    try {
      const background = eraseRegion(image, bounds, this.options.eraseMode ?? 'fill');
      const fontFamily = this.options.fontFamily ?? getFontFamily(block.languagePair.to);
      const layout = computeTextLayout(block.translatedText, bounds, this.options.rasterizer, {
        minFontSize: this.options.minFontSize,
        maxFontSize: this.options.maxFontSize,
        fontFamily,
        lineSpacing: this.options.lineSpacing,
        paddingFactor: this.options.paddingFactor,
      });

      if (layout.overflow) {
        options.onDegraded?.(
          `region ${block.region.index}: text does not fit at ${layout.fontSize}px and was clipped`
        );
      }

      if (layout.lines.length > 0) {
        const coverage = this.options.rasterizer.rasterize(
          layout.positions,
          layout.fontSize,
          fontFamily,
          bounds.width,
          bounds.height
        );
        blendTextMask(image, coverage, bounds, getContrastColor(background));
      }
      return image;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RenderError(`Region ${block.region.index} could not be rendered: ${message}`);
    }
  }
}
