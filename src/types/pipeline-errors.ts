export enum PipelineErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  DETECTION_FAILED = 'DETECTION_FAILED',
  OCR_FAILED = 'OCR_FAILED',
  TRANSLATION_FAILED = 'TRANSLATION_FAILED',
  RENDER_FAILED = 'RENDER_FAILED',
  CANCELLED = 'CANCELLED',
  NOT_READY = 'NOT_READY',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  PROCESSING_FAILED = 'PROCESSING_FAILED',
}

export interface ErrorMessage {
  code: PipelineErrorCode;
  message: string;
  recoverySuggestion?: string;
}

export type ValidationReason =
  | 'UNSUPPORTED_FORMAT'
  | 'SAME_LANGUAGE_PAIR'
  | 'EMPTY_DOCUMENT'
  | 'FILE_TOO_LARGE'
  | 'UNSUPPORTED_LANGUAGE'
  | 'INVALID_CONFIG';

export type OcrFailureReason = 'LOW_CONFIDENCE' | 'DECODE_FAILURE';

export type TranslationFailureReason = 'UNSUPPORTED_LANGUAGE_PAIR' | 'TIMEOUT';

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly recoverable: boolean;

  constructor(message: string, code: PipelineErrorCode, recoverable: boolean = true) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.recoverable = recoverable;
  }
}

/** Rejected submission; nothing was scheduled. */
export class ValidationError extends PipelineError {
  public readonly reason: ValidationReason;

  constructor(message: string, reason: ValidationReason) {
    super(message, PipelineErrorCode.VALIDATION_FAILED, false);
    this.name = 'ValidationError';
    this.reason = reason;
  }
}

/** Page-fatal. */
export class DetectionError extends PipelineError {
  constructor(message: string) {
    super(message, PipelineErrorCode.DETECTION_FAILED, false);
    this.name = 'DetectionError';
  }
}

/** Region-local: the region is skipped and keeps its pixels. */
export class OcrError extends PipelineError {
  public readonly reason: OcrFailureReason;
  public readonly confidence: number | null;

  constructor(message: string, reason: OcrFailureReason, confidence: number | null = null) {
    super(message, PipelineErrorCode.OCR_FAILED, true);
    this.name = 'OcrError';
    this.reason = reason;
    this.confidence = confidence;
  }
}

export class TranslationError extends PipelineError {
  public readonly reason: TranslationFailureReason;

  constructor(message: string, reason: TranslationFailureReason) {
    super(message, PipelineErrorCode.TRANSLATION_FAILED, reason === 'TIMEOUT');
    this.name = 'TranslationError';
    this.reason = reason;
  }
}

export class RenderError extends PipelineError {
  constructor(message: string) {
    super(message, PipelineErrorCode.RENDER_FAILED, true);
    this.name = 'RenderError';
  }
}

export class CancelledError extends PipelineError {
  constructor(message: string = 'Processing was cancelled.') {
    super(message, PipelineErrorCode.CANCELLED, false);
    this.name = 'CancelledError';
  }
}

export class NotReadyError extends PipelineError {
  constructor(documentId: string) {
    super(`Document ${documentId} is still processing.`, PipelineErrorCode.NOT_READY, true);
    this.name = 'NotReadyError';
  }
}

export class DocumentNotFoundError extends PipelineError {
  constructor(documentId: string) {
    super(`Document not found: ${documentId}`, PipelineErrorCode.DOCUMENT_NOT_FOUND, false);
    this.name = 'DocumentNotFoundError';
  }
}

/** Infrastructure fault; the only failure besides validation that reaches callers. */
export class StorageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, PipelineErrorCode.STORAGE_UNAVAILABLE, false);
    this.name = 'StorageError';
    if (options && 'cause' in options) {
      this.cause = options.cause;
    }
  }
}
