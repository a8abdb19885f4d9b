import type { DocumentStatus, OutputMimeType, PageError, PageStatus } from '@/types/pipeline';

export interface DocumentRecord {
  id: string;
  status: DocumentStatus;
  pageCount: number;
  sourceLanguage: string;
  targetLanguage: string;
  createdAt: string;
  updatedAt: string;
  /** Object reference of the assembled output, set once the document is done or partially failed. */
  resultRef: string | null;
  mimeType: OutputMimeType | null;
  error: PageError | null;
}

export interface PageRecord {
  documentId: string;
  index: number;
  status: PageStatus;
  processedImageRef: string | null;
  error: PageError | null;
  blockCount: number;
  translatedBlockCount: number;
  updatedAt: string;
}

export type NewDocument = Pick<DocumentRecord, 'pageCount' | 'sourceLanguage' | 'targetLanguage'>;

export type DocumentPatch = Partial<Pick<DocumentRecord, 'status' | 'resultRef' | 'mimeType' | 'error'>>;

export interface StoredObject {
  data: Uint8Array;
  contentType: string;
}

/**
 * Persistence for document and page records plus the binary objects they
 * reference. Implementations signal an unreachable backend by rejecting;
 * callers wrap those rejections in StorageError.
 */
export interface DocumentStore {
  createDocument(input: NewDocument): Promise<DocumentRecord>;
  getDocument(id: string): Promise<DocumentRecord | undefined>;
  /** Rejects with DocumentNotFoundError for unknown ids. */
  updateDocument(id: string, patch: DocumentPatch): Promise<DocumentRecord>;
  /** Inserts or replaces the record at `(documentId, index)`. */
  putPage(record: Omit<PageRecord, 'updatedAt'>): Promise<PageRecord>;
  /** Pages in index order. */
  listPages(documentId: string): Promise<PageRecord[]>;
  /** Stores bytes and returns an opaque reference. */
  putObject(data: Uint8Array, contentType: string): Promise<string>;
  getObject(ref: string): Promise<StoredObject | undefined>;
}
