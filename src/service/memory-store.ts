import { randomUUID } from 'node:crypto';
import { DocumentNotFoundError } from '@/types/pipeline-errors';
import type {
  DocumentPatch,
  DocumentRecord,
  DocumentStore,
  NewDocument,
  PageRecord,
  StoredObject,
} from './document-store';

const now = () => new Date().toISOString();

/** Process-local store; records are copied in and out so callers never share state with it. */
export class MemoryDocumentStore implements DocumentStore {
  private documents = new Map<string, DocumentRecord>();
  private pages = new Map<string, Map<number, PageRecord>>();
  private objects = new Map<string, StoredObject>();

  async createDocument(input: NewDocument): Promise<DocumentRecord> {
    const record: DocumentRecord = {
      id: randomUUID(),
      status: 'pending',
      pageCount: input.pageCount,
      sourceLanguage: input.sourceLanguage,
      targetLanguage: input.targetLanguage,
      createdAt: now(),
      updatedAt: now(),
      resultRef: null,
      mimeType: null,
      error: null,
    };
    this.documents.set(record.id, record);
    this.pages.set(record.id, new Map());
    return { ...record };
  }

  async getDocument(id: string): Promise<DocumentRecord | undefined> {
    const record = this.documents.get(id);
    return record ? { ...record } : undefined;
  }

  async updateDocument(id: string, patch: DocumentPatch): Promise<DocumentRecord> {
    const current = this.documents.get(id);
    if (!current) throw new DocumentNotFoundError(id);
    const merged = { ...current, ...patch, updatedAt: now() };
    this.documents.set(id, merged);
    return { ...merged };
  }

  async putPage(record: Omit<PageRecord, 'updatedAt'>): Promise<PageRecord> {
    const pages = this.pages.get(record.documentId);
    if (!pages) throw new DocumentNotFoundError(record.documentId);
    const stored: PageRecord = { ...record, updatedAt: now() };
    pages.set(record.index, stored);
    return { ...stored };
  }

  async listPages(documentId: string): Promise<PageRecord[]> {
    const pages = this.pages.get(documentId);
    if (!pages) return [];
    return [...pages.values()].sort((a, b) => a.index - b.index).map((page) => ({ ...page }));
  }

  async putObject(data: Uint8Array, contentType: string): Promise<string> {
    const ref = `obj_${randomUUID()}`;
    this.objects.set(ref, { data: new Uint8Array(data), contentType });
    return ref;
  }

  async getObject(ref: string): Promise<StoredObject | undefined> {
    const object = this.objects.get(ref);
    return object ? { data: new Uint8Array(object.data), contentType: object.contentType } : undefined;
  }
}
