import {
  CancelledError,
  OcrError,
  PipelineError,
  PipelineErrorCode,
  TranslationError,
  ValidationError,
  type ErrorMessage,
} from '@/types/pipeline-errors';
import type { PageError } from '@/types/pipeline';

export const ERROR_MESSAGES: Record<PipelineErrorCode, ErrorMessage> = {
  [PipelineErrorCode.VALIDATION_FAILED]: {
    code: PipelineErrorCode.VALIDATION_FAILED,
    message: 'The document was rejected before processing.',
    recoverySuggestion: 'Submit a PNG, JPEG, WebP, BMP or PDF file with two supported languages.',
  },
  [PipelineErrorCode.DETECTION_FAILED]: {
    code: PipelineErrorCode.DETECTION_FAILED,
    message: 'Text regions could not be detected on this page.',
    recoverySuggestion: 'Check that the page image is readable and not corrupted.',
  },
  [PipelineErrorCode.OCR_FAILED]: {
    code: PipelineErrorCode.OCR_FAILED,
    message: 'Text could not be read from a region.',
    recoverySuggestion: 'Use a higher resolution scan or lower the OCR confidence threshold.',
  },
  [PipelineErrorCode.TRANSLATION_FAILED]: {
    code: PipelineErrorCode.TRANSLATION_FAILED,
    message: 'Text could not be translated.',
    recoverySuggestion: 'Check the language pair or raise the translation timeout.',
  },
  [PipelineErrorCode.RENDER_FAILED]: {
    code: PipelineErrorCode.RENDER_FAILED,
    message: 'Translated text could not be drawn.',
    recoverySuggestion: 'The original pixels were kept for this region.',
  },
  [PipelineErrorCode.CANCELLED]: {
    code: PipelineErrorCode.CANCELLED,
    message: 'Processing was cancelled.',
  },
  [PipelineErrorCode.NOT_READY]: {
    code: PipelineErrorCode.NOT_READY,
    message: 'The document is still processing.',
    recoverySuggestion: 'Poll the status until it is done, partially_failed or failed.',
  },
  [PipelineErrorCode.DOCUMENT_NOT_FOUND]: {
    code: PipelineErrorCode.DOCUMENT_NOT_FOUND,
    message: 'Unknown document id.',
  },
  [PipelineErrorCode.STORAGE_UNAVAILABLE]: {
    code: PipelineErrorCode.STORAGE_UNAVAILABLE,
    message: 'The document store is unavailable.',
    recoverySuggestion: 'Retry once the storage backend is reachable again.',
  },
  [PipelineErrorCode.PROCESSING_FAILED]: {
    code: PipelineErrorCode.PROCESSING_FAILED,
    message: 'Unexpected processing failure.',
    recoverySuggestion: 'Retry the document; report the error if it persists.',
  },
};

export function formatErrorMessage(error: unknown): ErrorMessage {
  if (error instanceof PipelineError) {
    const fallback = ERROR_MESSAGES[error.code];
    return {
      code: error.code,
      message: error.message || fallback.message,
      recoverySuggestion: fallback.recoverySuggestion,
    };
  }

  const fallback = ERROR_MESSAGES[PipelineErrorCode.PROCESSING_FAILED];
  if (error instanceof Error) {
    return {
      code: PipelineErrorCode.PROCESSING_FAILED,
      message: error.message || fallback.message,
      recoverySuggestion: fallback.recoverySuggestion,
    };
  }

  return { ...fallback };
}

const reasonOf = (error: unknown): string | null => {
  if (error instanceof ValidationError || error instanceof OcrError || error instanceof TranslationError) {
    return error.reason;
  }
  return null;
};

/** Serialisable form of an error, as stored on page and document records. */
export function toPageError(error: unknown): PageError {
  const formatted = formatErrorMessage(error);
  return { code: formatted.code, reason: reasonOf(error), message: formatted.message };
}

export function logError(error: unknown): void {
  console.error('[panel]', error);
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof CancelledError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

export function createProcessingFailedError(message?: string, recoverable: boolean = true): PipelineError {
  return new PipelineError(
    message ?? ERROR_MESSAGES[PipelineErrorCode.PROCESSING_FAILED].message,
    PipelineErrorCode.PROCESSING_FAILED,
    recoverable
  );
}

/** Throws the signal's reason when it is a pipeline error, a CancelledError otherwise. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw reason instanceof CancelledError ? reason : new CancelledError();
}

/**
 * Runs `operation` with its own abort signal and rejects with the error from
 * `onTimeout` once `timeoutMs` elapses. The operation's signal is aborted on
 * timeout and when the parent `signal` aborts.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { signal?: AbortSignal; onTimeout: () => Error }
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const parent = options.signal;
    let settled = false;

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
      return true;
    };

    const onAbort = (): void => {
      if (!finish()) return;
      const cancelled = new CancelledError();
      controller.abort(cancelled);
      reject(cancelled);
    };

    const timer = setTimeout(() => {
      if (!finish()) return;
      const timeoutError = options.onTimeout();
      controller.abort(timeoutError);
      reject(timeoutError);
    }, timeoutMs);

    if (parent?.aborted) {
      onAbort();
      return;
    }
    parent?.addEventListener('abort', onAbort, { once: true });

    operation(controller.signal).then(
      (value) => {
        if (finish()) resolve(value);
      },
      (error: unknown) => {
        if (finish()) reject(error);
      }
    );
  });
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: {
    delaysMs?: number[];
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number) => void;
  } = {}
): Promise<T> {
  const delays = options.delaysMs ?? [250, 500, 1000];

  for (let attempt = 0; attempt <= delays.length; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= delays.length || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }

      options.onRetry?.(error, attempt + 1);
      await new Promise((resolve) => setTimeout(resolve, delays[attempt]));
    }
  }

  throw new Error('Retry attempts exhausted.');
}
