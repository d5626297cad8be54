import type {
  BusinessRecord,
  ChunkRecord,
  DocumentPatch,
  DocumentRecord,
  DocumentType,
  IndexingTotals,
  KeywordSearchQuery,
  KnowledgeField,
  KnowledgeStats,
  NewChunkInput,
  NewDocumentInput,
  RetrievedChunk,
  ServiceRecord,
  VectorSearchQuery,
  VersionInput,
} from './types';

export interface DocumentListFilter {
  activeOnly?: boolean;
  serviceId?: string;
  type?: DocumentType;
  sourceField?: KnowledgeField;
}

/**
 * Persistence of documents and their chunks.
 *
 * Versioning is soft: superseded documents and their chunks are deactivated,
 * never edited in place. Search methods only consider chunks whose document is
 * active and `complete`.
 */
export interface KnowledgeStore {
  createDocument(input: NewDocumentInput): Promise<DocumentRecord>;
  getDocument(documentId: string): Promise<DocumentRecord | null>;
  updateDocument(documentId: string, patch: DocumentPatch): Promise<DocumentRecord | null>;
  listDocuments(businessId: string, filter?: DocumentListFilter): Promise<DocumentRecord[]>;

  /** Removes the document and its chunks. Returns false when there was nothing to delete. */
  deleteDocument(documentId: string): Promise<boolean>;
  /** Deactivates the document and every chunk it owns. */
  deactivateDocument(documentId: string): Promise<DocumentRecord | null>;

  listChunks(documentId: string, options?: { activeOnly?: boolean }): Promise<ChunkRecord[]>;
  deleteChunks(documentId: string): Promise<number>;
  /** Atomically swaps the document's chunk set. Returns the number of chunks removed. */
  replaceChunks(documentId: string, chunks: NewChunkInput[]): Promise<number>;

  /**
   * Deactivates the current document and its chunks, then creates the next
   * version pointing back at it with status `pending`. One transaction.
   * Throws ValidationError when the document is not the active head of its
   * lineage.
   */
  createVersion(documentId: string, input: VersionInput): Promise<DocumentRecord>;
  /**
   * Deactivates the current version and reactivates the previous one with its
   * chunks. Throws NotFoundError when there is no previous version and
   * ValidationError when the document is not the active head.
   */
  revert(documentId: string): Promise<DocumentRecord>;

  /**
   * Removes the synthetic documents generated from the given fields, with
   * their chunks, and creates the replacements. One transaction.
   */
  replaceFieldDocuments(
    businessId: string,
    fields: KnowledgeField[],
    documents: NewDocumentInput[]
  ): Promise<{ deletedDocuments: number; deletedChunks: number; created: DocumentRecord[] }>;

  searchByVector(query: VectorSearchQuery): Promise<RetrievedChunk[]>;
  searchByKeywords(query: KeywordSearchQuery): Promise<RetrievedChunk[]>;

  getStats(businessId: string): Promise<KnowledgeStats>;
  getIndexingTotals(): Promise<IndexingTotals>;
  /** Creation time of the business's newest active chunk, or null when it has none. */
  getLatestChunkTime(businessId: string): Promise<Date | null>;
}

/** Read access to the business entities the engine indexes and scopes by. */
export interface BusinessCatalog {
  getBusiness(businessId: string): Promise<BusinessRecord | null>;
  listActiveBusinesses(options: { skip: number; limit: number }): Promise<BusinessRecord[]>;
  countActiveBusinesses(): Promise<number>;
  listActiveServices(businessId: string): Promise<ServiceRecord[]>;
  getService(serviceId: string): Promise<ServiceRecord | null>;
}
