import { createCanvas, GlobalFonts, type SKRSContext2D } from '@napi-rs/canvas';

export interface TextMeasurer {
  /** Advance width of `text` in pixels. */
  measure(text: string, fontSize: number, fontFamily: string): number;
}

/** A line of text centred horizontally on `x` and vertically on `y`. */
export interface PositionedLine {
  text: string;
  x: number;
  y: number;
}

export interface TextRasterizer extends TextMeasurer {
  /** Coverage mask, one byte per pixel of a `width` x `height` box, row-major. */
  rasterize(
    lines: PositionedLine[],
    fontSize: number,
    fontFamily: string,
    width: number,
    height: number
  ): Uint8ClampedArray;
}

/** Registers a font file under `family` so layouts can name it. */
export const registerFont = (path: string, family: string): boolean =>
  GlobalFonts.registerFromPath(path, family) !== null;

/** Text drawing through @napi-rs/canvas (Skia). */
export class CanvasTextRasterizer implements TextRasterizer {
  private measureContext: SKRSContext2D | null = null;

  measure(text: string, fontSize: number, fontFamily: string): number {
    if (!this.measureContext) {
      this.measureContext = createCanvas(1, 1).getContext('2d');
    }
    this.measureContext.font = `${fontSize}px ${fontFamily}`;
    return this.measureContext.measureText(text).width;
  }

  rasterize(
    lines: PositionedLine[],
    fontSize: number,
    fontFamily: string,
    width: number,
    height: number
  ): Uint8ClampedArray {
    const canvas = createCanvas(width, height);
    const context = canvas.getContext('2d');
    context.clearRect(0, 0, width, height);
    context.fillStyle = '#fff';
    context.font = `${fontSize}px ${fontFamily}`;
    context.textAlign = 'center';
    context.textBaseline = 'middle';
    for (const line of lines) {
      context.fillText(line.text, line.x, line.y);
    }

    const pixels = context.getImageData(0, 0, width, height).data;
    const coverage = new Uint8ClampedArray(width * height);
    for (let i = 0; i < coverage.length; i += 1) {
      coverage[i] = pixels[i * 4 + 3];
    }
    return coverage;
  }
}
