import type { RasterImage } from '@/types/raster';
import { clampByte } from './math-utils';

/**
 * Preprocessing intensity applied to a region crop before recognition.
 *
 * - 'none': pass the crop as-is
 * - 'light': grayscale, polarity normalisation and contrast stretch (default)
 * - 'aggressive': light plus median denoise and Otsu binarisation, for noisy scans
 */
export type PreprocessingMode = 'none' | 'light' | 'aggressive';

export interface PolarityAnalysis {
  /** Light text on a dark background */
  isInverted: boolean;
  meanLuminance: number;
  darkPixelRatio: number;
}

/** Crops smaller than this (in pixels of height) are upscaled before recognition. */
const MIN_CROP_HEIGHT = 32;
const MAX_UPSCALE_FACTOR = 4;

const luminanceAt = (data: Uint8ClampedArray, idx: number): number =>
  0.299 * data[idx] + 0.587 * data[idx + 1] + 0.114 * data[idx + 2];

export class ImageProcessor {
  preprocess(image: RasterImage, mode: PreprocessingMode = 'light'): RasterImage {
    if (mode === 'none') {
      return image;
    }

    let processed = this.upscaleForRecognition(image);
    processed = this.toGrayscale(processed);
    processed = this.normalizePolarity(processed);
    processed = this.stretchContrast(processed);

    if (mode === 'aggressive') {
      processed = this.denoise(processed);
      processed = this.binarize(processed);
    }

    return processed;
  }

  toGrayscale(image: RasterImage): RasterImage {
    const data = new Uint8ClampedArray(image.data);
    for (let i = 0; i < data.length; i += 4) {
      const gray = Math.round(luminanceAt(data, i));
      data[i] = gray;
      data[i + 1] = gray;
      data[i + 2] = gray;
    }
    return { width: image.width, height: image.height, data };
  }

  /**
   * Linear stretch between the 1st and 99th luminance percentiles. Crops that
   * already span the range, or are nearly uniform, come back unchanged.
   */
  stretchContrast(image: RasterImage): RasterImage {
    const histogram = this.histogram(image);
    const total = image.width * image.height;
    const clipCount = Math.floor(total * 0.01);

    let minVal = 0;
    let cumulative = 0;
    for (let i = 0; i < 256; i += 1) {
      cumulative += histogram[i];
      if (cumulative > clipCount) {
        minVal = i;
        break;
      }
    }

    let maxVal = 255;
    cumulative = 0;
    for (let i = 255; i >= 0; i -= 1) {
      cumulative += histogram[i];
      if (cumulative > clipCount) {
        maxVal = i;
        break;
      }
    }

    const range = maxVal - minVal;
    if (range < 10 || range > 240) {
      return image;
    }

    const data = new Uint8ClampedArray(image.data);
    for (let i = 0; i < data.length; i += 4) {
      data[i] = clampByte(((data[i] - minVal) / range) * 255);
      data[i + 1] = clampByte(((data[i + 1] - minVal) / range) * 255);
      data[i + 2] = clampByte(((data[i + 2] - minVal) / range) * 255);
    }
    return { width: image.width, height: image.height, data };
  }

  analyzePolarity(image: RasterImage): PolarityAnalysis {
    const total = image.width * image.height;
    if (total === 0) {
      return { isInverted: false, meanLuminance: 255, darkPixelRatio: 0 };
    }

    let sum = 0;
    let dark = 0;
    for (let i = 0; i < image.data.length; i += 4) {
      const luminance = luminanceAt(image.data, i);
      sum += luminance;
      if (luminance < 128) dark += 1;
    }

    const meanLuminance = sum / total;
    const darkPixelRatio = dark / total;
    // Text covers a minority of a speech bubble, so a mostly dark crop means light text.
    return { isInverted: darkPixelRatio > 0.5, meanLuminance, darkPixelRatio };
  }

  normalizePolarity(image: RasterImage): RasterImage {
    if (!this.analyzePolarity(image).isInverted) {
      return image;
    }

    const data = new Uint8ClampedArray(image.data);
    for (let i = 0; i < data.length; i += 4) {
      data[i] = 255 - data[i];
      data[i + 1] = 255 - data[i + 1];
      data[i + 2] = 255 - data[i + 2];
    }
    return { width: image.width, height: image.height, data };
  }

  /** 3x3 median filter on a grayscale image. */
  denoise(image: RasterImage): RasterImage {
    const { width, height } = image;
    const data = new Uint8ClampedArray(image.data);
    const window: number[] = [];

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        window.length = 0;
        for (let oy = -1; oy <= 1; oy += 1) {
          for (let ox = -1; ox <= 1; ox += 1) {
            const sx = Math.max(0, Math.min(width - 1, x + ox));
            const sy = Math.max(0, Math.min(height - 1, y + oy));
            window.push(image.data[(sy * width + sx) * 4]);
          }
        }
        window.sort((a, b) => a - b);
        const idx = (y * width + x) * 4;
        const value = window[4];
        data[idx] = value;
        data[idx + 1] = value;
        data[idx + 2] = value;
      }
    }

    return { width, height, data };
  }

  /** Otsu's threshold over the luminance histogram. */
  otsuThreshold(image: RasterImage): number {
    const histogram = this.histogram(image);
    const total = image.width * image.height;
    let sumAll = 0;
    for (let i = 0; i < 256; i += 1) sumAll += i * histogram[i];

    let sumBackground = 0;
    let weightBackground = 0;
    let bestVariance = -1;
    let threshold = 128;

    for (let t = 0; t < 256; t += 1) {
      weightBackground += histogram[t];
      if (weightBackground === 0) continue;
      const weightForeground = total - weightBackground;
      if (weightForeground === 0) break;

      sumBackground += t * histogram[t];
      const meanBackground = sumBackground / weightBackground;
      const meanForeground = (sumAll - sumBackground) / weightForeground;
      const variance =
        weightBackground * weightForeground * (meanBackground - meanForeground) ** 2;
      if (variance > bestVariance) {
        bestVariance = variance;
        threshold = t;
      }
    }

    return threshold;
  }

  binarize(image: RasterImage, threshold: number = this.otsuThreshold(image)): RasterImage {
    const data = new Uint8ClampedArray(image.data);
    for (let i = 0; i < data.length; i += 4) {
      const value = luminanceAt(data, i) > threshold ? 255 : 0;
      data[i] = value;
      data[i + 1] = value;
      data[i + 2] = value;
    }
    return { width: image.width, height: image.height, data };
  }

  /** Bilinear upscale; scales at or below 1 return the input. */
  upscale(image: RasterImage, scale: number): RasterImage {
    if (scale <= 1) {
      return image;
    }

    const width = Math.round(image.width * scale);
    const height = Math.round(image.height * scale);
    const data = new Uint8ClampedArray(width * height * 4);

    for (let y = 0; y < height; y += 1) {
      const sy = Math.min(image.height - 1, (y + 0.5) / scale - 0.5);
      const y0 = Math.max(0, Math.floor(sy));
      const y1 = Math.min(image.height - 1, y0 + 1);
      const fy = Math.max(0, sy - y0);
      for (let x = 0; x < width; x += 1) {
        const sx = Math.min(image.width - 1, (x + 0.5) / scale - 0.5);
        const x0 = Math.max(0, Math.floor(sx));
        const x1 = Math.min(image.width - 1, x0 + 1);
        const fx = Math.max(0, sx - x0);
        const out = (y * width + x) * 4;
        for (let c = 0; c < 4; c += 1) {
          const top =
            image.data[(y0 * image.width + x0) * 4 + c] * (1 - fx) +
            image.data[(y0 * image.width + x1) * 4 + c] * fx;
          const bottom =
            image.data[(y1 * image.width + x0) * 4 + c] * (1 - fx) +
            image.data[(y1 * image.width + x1) * 4 + c] * fx;
          data[out + c] = clampByte(top * (1 - fy) + bottom * fy);
        }
      }
    }

    return { width, height, data };
  }

  private upscaleForRecognition(image: RasterImage): RasterImage {
    if (image.height === 0 || image.height >= MIN_CROP_HEIGHT) {
      return image;
    }
    return this.upscale(image, Math.min(MAX_UPSCALE_FACTOR, MIN_CROP_HEIGHT / image.height));
  }

  private histogram(image: RasterImage): number[] {
    const histogram = new Array<number>(256).fill(0);
    for (let i = 0; i < image.data.length; i += 4) {
      histogram[Math.round(luminanceAt(image.data, i))] += 1;
    }
    return histogram;
  }
}
