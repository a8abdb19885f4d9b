import { ValidationError } from '@/types/pipeline-errors';

export interface LanguageInfo {
  /** ISO 639-1 code used throughout the pipeline */
  code: string;
  name: string;
  /** Tesseract traineddata identifier */
  tesseract: string;
  /** Traineddata for top-to-bottom columns, where one exists */
  tesseractVertical?: string;
}

/**
 * Languages the pipeline accepts. Display names ("Japanese") and ISO codes
 * ("ja", "ja-JP") both resolve to the same entry.
 */
export const LANGUAGES: readonly LanguageInfo[] = [
  { code: 'ja', name: 'Japanese', tesseract: 'jpn', tesseractVertical: 'jpn_vert' },
  { code: 'zh', name: 'Chinese', tesseract: 'chi_sim', tesseractVertical: 'chi_sim_vert' },
  { code: 'ko', name: 'Korean', tesseract: 'kor', tesseractVertical: 'kor_vert' },
  { code: 'en', name: 'English', tesseract: 'eng' },
  { code: 'es', name: 'Spanish', tesseract: 'spa' },
  { code: 'fr', name: 'French', tesseract: 'fra' },
  { code: 'de', name: 'German', tesseract: 'deu' },
  { code: 'it', name: 'Italian', tesseract: 'ita' },
  { code: 'pt', name: 'Portuguese', tesseract: 'por' },
  { code: 'ru', name: 'Russian', tesseract: 'rus' },
  { code: 'vi', name: 'Vietnamese', tesseract: 'vie' },
  { code: 'th', name: 'Thai', tesseract: 'tha' },
  { code: 'id', name: 'Indonesian', tesseract: 'ind' },
  { code: 'ar', name: 'Arabic', tesseract: 'ara' },
];

const BY_CODE = new Map(LANGUAGES.map((language) => [language.code, language]));
const BY_NAME = new Map(LANGUAGES.map((language) => [language.name.toLowerCase(), language]));

const CJK_CODES = new Set(['zh', 'ja', 'ko']);

const baseCode = (code: string): string => code.toLowerCase().split(/[-_]/)[0] ?? '';

export function normalizeLanguage(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  const byName = BY_NAME.get(trimmed.toLowerCase());
  if (byName) return byName.code;
  const byCode = BY_CODE.get(baseCode(trimmed));
  return byCode ? byCode.code : null;
}

export function requireLanguage(input: string): string {
  const code = normalizeLanguage(input);
  if (!code) {
    throw new ValidationError(`Unsupported language: ${input}`, 'UNSUPPORTED_LANGUAGE');
  }
  return code;
}

export function getLanguageName(code: string): string {
  return BY_CODE.get(baseCode(code))?.name ?? code;
}

export type TextOrientation = 'horizontal' | 'vertical';

/** Falls back to English traineddata for codes outside the catalogue. */
export function toTesseractLanguage(code: string, orientation: TextOrientation = 'horizontal'): string {
  const language = BY_CODE.get(baseCode(code));
  if (!language) return 'eng';
  if (orientation === 'vertical' && language.tesseractVertical) return language.tesseractVertical;
  return language.tesseract;
}

export const isCjkLanguage = (code: string): boolean => CJK_CODES.has(baseCode(code));
