import { describe, it, expect } from 'vitest';
import {
  getLanguageName,
  isCjkLanguage,
  normalizeLanguage,
  requireLanguage,
  toTesseractLanguage,
} from '../src/translation/languages';
import { ValidationError } from '../src/types/pipeline-errors';

describe('language catalogue', () => {
  it('normalises names and regional codes', () => {
    expect(normalizeLanguage('Japanese')).toBe('ja');
    expect(normalizeLanguage('ja-JP')).toBe('ja');
    expect(normalizeLanguage('EN')).toBe('en');
    expect(normalizeLanguage('zh_TW')).toBe('zh');
    expect(normalizeLanguage('klingon')).toBeNull();
    expect(normalizeLanguage('  ')).toBeNull();
  });

  it('rejects unknown languages with a validation error', () => {
    expect(() => requireLanguage('xx')).toThrow(ValidationError);
    expect(() => requireLanguage('xx')).toThrow('Unsupported language: xx');
    expect(requireLanguage('Korean')).toBe('ko');
  });

  it('maps codes to Tesseract traineddata', () => {
    expect(toTesseractLanguage('ja')).toBe('jpn');
    expect(toTesseractLanguage('ja', 'vertical')).toBe('jpn_vert');
    expect(toTesseractLanguage('en', 'vertical')).toBe('eng');
    expect(toTesseractLanguage('zh')).toBe('chi_sim');
    expect(toTesseractLanguage('xx')).toBe('eng');
  });

  it('classifies scripts', () => {
    expect(isCjkLanguage('zh-TW')).toBe(true);
    expect(isCjkLanguage('en')).toBe(false);
    expect(getLanguageName('ko')).toBe('Korean');
    expect(getLanguageName('xx')).toBe('xx');
  });
});
