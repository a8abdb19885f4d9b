import type { Box, RasterImage } from './raster';

/** A text area in page pixel coordinates; `index` is the detection order. */
export interface Region extends Readonly<Box> {
  readonly index: number;
}

export interface LanguagePair {
  readonly from: string;
  readonly to: string;
}

/**
 * Created by OCR with `translatedText: null`, filled once by translation and
 * immutable afterwards. A block that could not be translated keeps `null`.
 */
export interface TextBlock {
  readonly region: Region;
  readonly sourceText: string;
  readonly confidence: number;
  readonly translatedText: string | null;
  readonly languagePair: LanguagePair;
}

export type PageStatus =
  | 'pending'
  | 'detecting'
  | 'extracting'
  | 'translating'
  | 'rendering'
  | 'done'
  | 'failed';

export type DocumentStatus = 'pending' | 'processing' | 'done' | 'partially_failed' | 'failed';

export interface PageError {
  code: string;
  reason: string | null;
  message: string;
}

export interface Page {
  readonly index: number;
  sourceImage: RasterImage | null;
  blocks: TextBlock[];
  processedImage: RasterImage | null;
  status: PageStatus;
  error: PageError | null;
}

export type LogLevel = 'info' | 'warn' | 'error';

export interface StatusLogEntry {
  readonly timestamp: string;
  readonly pageIndex: number | null;
  readonly level: LogLevel;
  readonly message: string;
}

export interface PageStatusReport {
  index: number;
  status: PageStatus;
  error: PageError | null;
  blockCount: number;
  translatedBlockCount: number;
}

export interface DocumentStatusReport {
  documentId: string;
  status: DocumentStatus;
  /** ISO-8601 submission time. */
  createdAt: string;
  progress: number;
  pages: PageStatusReport[];
  log: StatusLogEntry[];
}

export type OutputMimeType = 'image/png' | 'application/pdf';

export interface DocumentResult {
  data: Uint8Array;
  mimeType: OutputMimeType;
  pageCount: number;
}

export const isTerminalPageStatus = (status: PageStatus): boolean =>
  status === 'done' || status === 'failed';

export const isTerminalDocumentStatus = (status: DocumentStatus): boolean =>
  status === 'done' || status === 'partially_failed' || status === 'failed';
