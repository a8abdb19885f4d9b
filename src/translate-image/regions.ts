import type { OCRWord } from '@/types/ocr-engine';
import type { Box } from '@/types/raster';
import { isCjkLanguage } from '@/translation/languages';
import { getMedian } from '@/utils/math-utils';

/** Words that read as one block of text, e.g. the content of a speech bubble. */
export interface TextCluster {
  bbox: Box;
  words: OCRWord[];
  lines: string[];
}

type Token = {
  word: OCRWord;
  bbox: Box;
  centerX: number;
  centerY: number;
};

type Line = {
  tokens: Token[];
  bbox: Box;
  centerY: number;
  text: string;
};

const unionBbox = (a: Box, b: Box): Box => {
  const minX = Math.min(a.x, b.x);
  const minY = Math.min(a.y, b.y);
  const maxX = Math.max(a.x + a.width, b.x + b.width);
  const maxY = Math.max(a.y + a.height, b.y + b.height);
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
};

const verticalOverlapRatio = (a: Box, b: Box): number => {
  const top = Math.max(a.y, b.y);
  const bottom = Math.min(a.y + a.height, b.y + b.height);
  const overlap = Math.max(0, bottom - top);
  const denom = Math.min(a.height, b.height);
  return denom > 0 ? overlap / denom : 0;
};

const horizontalGap = (a: Box, b: Box): number =>
  Math.max(0, Math.max(a.x, b.x) - Math.min(a.x + a.width, b.x + b.width));

const lineText = (tokens: Token[], isCjk: boolean): string => {
  const parts = tokens.map((token) => token.word.text.replace(/\s+/g, ' ').trim()).filter(Boolean);
  return parts.join(isCjk ? '' : ' ');
};

/**
 * Groups recognised words into lines by vertical overlap, then lines into
 * clusters by vertical gap and horizontal overlap. Tokens further apart than
 * about two character heights never share a line, so neighbouring speech
 * bubbles stay separate.
 */
export const buildRegions = (
  words: OCRWord[],
  options: { sourceLang: string; minWordConfidence?: number }
): TextCluster[] => {
  const minConfidence = options.minWordConfidence ?? 0;
  const tokens: Token[] = words
    .filter((word) => word.text.trim().length > 0 && word.confidence >= minConfidence)
    .filter((word) => word.boundingBox.width > 0 && word.boundingBox.height > 0)
    .map((word) => {
      const bbox = { ...word.boundingBox };
      return {
        word,
        bbox,
        centerX: bbox.x + bbox.width / 2,
        centerY: bbox.y + bbox.height / 2,
      };
    });
  if (tokens.length === 0) return [];

  const medianHeight = getMedian(tokens.map((token) => token.bbox.height)) || 12;
  const sortedTokens = [...tokens].sort((a, b) => a.centerY - b.centerY || a.centerX - b.centerX);

  const lines: Line[] = [];
  for (const token of sortedTokens) {
    const candidates = lines.filter(
      (line) =>
        (Math.abs(token.centerY - line.centerY) <= 0.8 * medianHeight ||
          verticalOverlapRatio(token.bbox, line.bbox) >= 0.5) &&
        verticalOverlapRatio(token.bbox, line.bbox) >= 0.1 &&
        horizontalGap(token.bbox, line.bbox) <= 2 * medianHeight
    );
    if (candidates.length === 0) {
      lines.push({ tokens: [token], bbox: token.bbox, centerY: token.centerY, text: '' });
      continue;
    }
    const target = candidates.reduce((best, current) => {
      const bestDelta = Math.abs(token.centerY - best.centerY);
      const currentDelta = Math.abs(token.centerY - current.centerY);
      return currentDelta < bestDelta ? current : best;
    }, candidates[0]);
    target.tokens.push(token);
    target.bbox = unionBbox(target.bbox, token.bbox);
    target.centerY = target.bbox.y + target.bbox.height / 2;
  }

  const isCjk = isCjkLanguage(options.sourceLang);
  for (const line of lines) {
    line.tokens.sort((a, b) => a.bbox.x - b.bbox.x);
    line.text = lineText(line.tokens, isCjk);
  }

  const orderedLines = [...lines].sort((a, b) => a.bbox.y - b.bbox.y || a.bbox.x - b.bbox.x);
  const clusters: { lines: Line[]; bbox: Box }[] = [];

  for (const line of orderedLines) {
    const target = clusters.find((cluster) => {
      const previous = cluster.lines[cluster.lines.length - 1];
      const gap = line.bbox.y - (previous.bbox.y + previous.bbox.height);
      return gap <= 1.2 * medianHeight && horizontalGap(line.bbox, cluster.bbox) === 0;
    });
    if (target) {
      target.lines.push(line);
      target.bbox = unionBbox(target.bbox, line.bbox);
    } else {
      clusters.push({ lines: [line], bbox: line.bbox });
    }
  }

  return clusters.map((cluster) => ({
    bbox: cluster.bbox,
    words: cluster.lines.flatMap((line) => line.tokens.map((token) => token.word)),
    lines: cluster.lines.map((line) => line.text),
  }));
};
