import type { TextMeasurer, PositionedLine } from './canvas';

export interface LayoutOptions {
  minFontSize: number;
  maxFontSize: number;
  fontFamily: string;
  /** Line advance as a multiple of the font size. Default 1.2 */
  lineSpacing?: number;
  /** Inner padding as a share of the shorter box side. Default 0.1 */
  paddingFactor?: number;
}

export interface TextLayout {
  fontSize: number;
  lines: string[];
  lineHeight: number;
  padding: number;
  /** Nothing at or above `minFontSize` fit; lines are clipped by the box. */
  overflow: boolean;
  positions: PositionedLine[];
}

export const getFontFamily = (code: string): string => {
  const normalized = code.toLowerCase();
  if (normalized.startsWith('ja') || normalized.startsWith('zh') || normalized.startsWith('ko')) {
    return ['"Noto Sans CJK JP"', '"Noto Sans JP"', '"Hiragino Sans"', 'sans-serif'].join(', ');
  }
  if (normalized.startsWith('ar')) {
    return '"Noto Naskh Arabic", "Amiri", serif';
  }
  return '"Comic Neue", "Noto Sans", Arial, sans-serif';
};

type Token = { value: string; joinWithSpace: boolean };

function tokenizeParagraph(paragraph: string): Token[] {
  if (/\s/.test(paragraph.trim())) {
    return paragraph
      .split(/\s+/)
      .filter((token) => token.length > 0)
      .map((value) => ({ value, joinWithSpace: true }));
  }
  return Array.from(paragraph.trim()).map((value) => ({ value, joinWithSpace: false }));
}

/**
 * Greedy left-to-right wrapping. Space-separated text breaks between words;
 * text without spaces (Japanese, Chinese) breaks between characters. A single
 * word wider than `maxWidth` is split by characters.
 */
export function wrapText(text: string, maxWidth: number, measure: (value: string) => number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split(/\r?\n/)) {
    if (!paragraph.trim()) {
      continue;
    }

    let current = '';
    for (const token of tokenizeParagraph(paragraph)) {
      const separator = current && token.joinWithSpace ? ' ' : '';
      const candidate = current ? `${current}${separator}${token.value}` : token.value;

      if (measure(candidate) <= maxWidth || !current) {
        current = candidate;
      } else {
        lines.push(current);
        current = token.value;
      }

      if (measure(current) > maxWidth) {
        let piece = '';
        for (const char of current) {
          if (!piece || measure(piece + char) <= maxWidth) {
            piece += char;
          } else {
            lines.push(piece);
            piece = char;
          }
        }
        current = piece;
      }
    }
    if (current) {
      lines.push(current);
    }
  }

  return lines;
}

const positionLines = (
  lines: string[],
  lineHeight: number,
  box: { width: number; height: number }
): PositionedLine[] => {
  const blockHeight = lines.length * lineHeight;
  const top = Math.max(0, (box.height - blockHeight) / 2);
  return lines.map((text, index) => ({
    text,
    x: box.width / 2,
    y: top + lineHeight * (index + 0.5),
  }));
};

/**
 * Picks the largest integer font size, scanning down from `maxFontSize`,
 * whose wrapped lines fit inside the padded box. When none at or above
 * `minFontSize` fits, the text is laid out at `minFontSize` and flagged as
 * overflowing; callers draw it clipped.
 */
export function computeTextLayout(
  text: string,
  box: { width: number; height: number },
  measurer: TextMeasurer,
  options: LayoutOptions
): TextLayout {
  const lineSpacing = options.lineSpacing ?? 1.2;
  const padding = Math.min(box.width, box.height) * (options.paddingFactor ?? 0.1);
  const innerWidth = Math.max(1, box.width - 2 * padding);
  const innerHeight = Math.max(1, box.height - 2 * padding);
  const minFontSize = Math.max(1, Math.floor(options.minFontSize));
  const upper = Math.min(Math.floor(options.maxFontSize), Math.floor(innerHeight));

  const layoutAt = (fontSize: number) => {
    const measure = (value: string): number => measurer.measure(value, fontSize, options.fontFamily);
    const lines = wrapText(text, innerWidth, measure);
    const lineHeight = fontSize * lineSpacing;
    const widest = lines.reduce((max, line) => Math.max(max, measure(line)), 0);
    const fits = widest <= innerWidth && lines.length * lineHeight <= innerHeight;
    return { fontSize, lines, lineHeight, fits };
  };

  for (let fontSize = upper; fontSize >= minFontSize; fontSize -= 1) {
    const attempt = layoutAt(fontSize);
    if (attempt.fits) {
      return {
        fontSize,
        lines: attempt.lines,
        lineHeight: attempt.lineHeight,
        padding,
        overflow: false,
        positions: positionLines(attempt.lines, attempt.lineHeight, box),
      };
    }
  }

  const fallback = layoutAt(minFontSize);
  return {
    fontSize: minFontSize,
    lines: fallback.lines,
    lineHeight: fallback.lineHeight,
    padding,
    overflow: !fallback.fits,
    positions: positionLines(fallback.lines, fallback.lineHeight, box),
  };
}
