import type { ITextTranslator, TranslationRequest } from '@/types/translation';
import { TranslationError } from '@/types/pipeline-errors';
import { throwIfCancelled, withTimeout } from '@/utils/error-handling';
import { isCjkLanguage } from './languages';

export interface TranslationOutcome {
  /** `null` when the block stays untranslated. */
  text: string | null;
  attempts: number;
  shortened: boolean;
  error: unknown;
}

export interface TranslationPolicyOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  onRetry?: (error: TranslationError, shortenedText: string) => void;
}

const isTimeout = (error: unknown): error is TranslationError =>
  error instanceof TranslationError && error.reason === 'TIMEOUT';

/**
 * Roughly the first half of `text`, cut back to a word boundary when the
 * language separates words with spaces.
 */
export function shortenForRetry(text: string, language: string): string {
  const trimmed = text.trim();
  const characters = Array.from(trimmed);
  if (characters.length <= 1) {
    return trimmed;
  }

  const target = Math.ceil(characters.length / 2);
  const head = characters.slice(0, target).join('');
  if (isCjkLanguage(language)) {
    return head;
  }

  const boundary = head.search(/\s\S*$/);
  return (boundary > 0 ? head.slice(0, boundary) : head).trim();
}

/**
 * Calls the translator under a timeout. A timeout is retried once with the
 * shortened text; any other failure, or a second timeout, leaves the block
 * untranslated. Cancellation is rethrown.
 */
export async function translateWithPolicy(
  translator: ITextTranslator,
  request: Omit<TranslationRequest, 'signal'>,
  options: TranslationPolicyOptions
): Promise<TranslationOutcome> {
  const attempt = (text: string) =>
    withTimeout(
      (signal) => translator.translate({ ...request, text, signal }),
      options.timeoutMs,
      {
        signal: options.signal,
        onTimeout: () =>
          new TranslationError(`Translation exceeded ${options.timeoutMs} ms.`, 'TIMEOUT'),
      }
    );

  try {
    const response = await attempt(request.text);
    return { text: response.text, attempts: 1, shortened: false, error: null };
  } catch (error) {
    throwIfCancelled(options.signal);
    if (!isTimeout(error)) {
      return { text: null, attempts: 1, shortened: false, error };
    }

    const shortened = shortenForRetry(request.text, request.from);
    options.onRetry?.(error, shortened);
    try {
      const response = await attempt(shortened);
      return { text: response.text, attempts: 2, shortened: true, error: null };
    } catch (retryError) {
      throwIfCancelled(options.signal);
      return { text: null, attempts: 2, shortened: true, error: retryError };
    }
  }
}
