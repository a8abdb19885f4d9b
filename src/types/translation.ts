export interface TranslationRequest {
  from: string;
  to: string;
  text: string;
  signal?: AbortSignal;
}

export interface TranslationResponse {
  text: string;
}

/**
 * Identical `(text, from, to)` requests produce identical output. Failures are
 * TranslationError with UNSUPPORTED_LANGUAGE_PAIR or TIMEOUT.
 */
export interface ITextTranslator {
  translate(request: TranslationRequest): Promise<TranslationResponse>;
  destroy(): void | Promise<void>;
}
