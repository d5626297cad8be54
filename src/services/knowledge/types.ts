export const DOCUMENT_TYPES = ['pdf', 'note', 'policy', 'faq', 'guide', 'general'] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const INDEXING_STATUSES = ['pending', 'processing', 'complete', 'failed'] as const;
export type IndexingStatus = (typeof INDEXING_STATUSES)[number];

/** Structured business fields that synthetic question/answer documents are generated from. */
export const KNOWLEDGE_FIELDS = [
  'business_profile',
  'service_catalog',
  'conversation_policies',
  'quick_responses',
  'contact_info',
  'ai_instructions',
] as const;
export type KnowledgeField = (typeof KNOWLEDGE_FIELDS)[number];

export type ChunkMetadata = Record<string, unknown> & {
  pageNumber?: number;
  answer?: string;
};

/** One indexed question of a synthetic document. The answer is surfaced, the question is embedded. */
export interface KnowledgeEntry {
  question: string;
  answer: string;
  metadata?: Record<string, unknown>;
}

export interface DocumentRecord {
  id: string;
  businessId: string;
  title: string;
  type: DocumentType;
  originalContent: string;
  filePath?: string;
  originalFilename?: string;
  fileSize?: number;
  pageCount?: number;
  indexingStatus: IndexingStatus;
  indexingError?: string;
  indexedAt?: Date;
  relatedServiceId?: string;
  previousVersionId?: string;
  sourceField?: KnowledgeField;
  entries: KnowledgeEntry[];
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChunkRecord {
  id: string;
  documentId: string;
  businessId: string;
  content: string;
  embedding: number[];
  chunkIndex: number;
  metadata: ChunkMetadata;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewDocumentInput {
  businessId: string;
  title: string;
  type: DocumentType;
  originalContent: string;
  filePath?: string;
  originalFilename?: string;
  fileSize?: number;
  relatedServiceId?: string;
  sourceField?: KnowledgeField;
  entries?: KnowledgeEntry[];
}

export interface NewChunkInput {
  content: string;
  embedding: number[];
  chunkIndex: number;
  metadata: ChunkMetadata;
}

export type DocumentPatch = Partial<
  Pick<
    DocumentRecord,
    'title' | 'originalContent' | 'pageCount' | 'indexingStatus' | 'indexedAt' | 'relatedServiceId' | 'fileSize'
  >
> & {
  /** `null` clears a previously stored error. */
  indexingError?: string | null;
};

export interface VersionInput {
  content: string;
  title?: string;
  fileSize?: number;
}

export interface ServiceRecord {
  id: string;
  businessId: string;
  name: string;
  description?: string;
  price?: number;
  priceDisplay?: string;
  duration?: number;
  isActive: boolean;
  displayOrder: number;
}

export interface CatalogEntry {
  description?: string;
  price?: number | string;
  duration?: number;
}

export interface ContactInfo {
  address?: string;
  email?: string;
  website?: string;
  officePhone?: string;
  emergencyLine?: string;
}

export interface BusinessProfile {
  description?: string;
  specialties?: string[];
  areasServed?: string[];
}

export interface BusinessRecord {
  id: string;
  name: string;
  isActive: boolean;
  businessProfile: BusinessProfile;
  serviceCatalog: Record<string, CatalogEntry>;
  conversationPolicies: Record<string, string>;
  quickResponses: Record<string, string>;
  contactInfo: ContactInfo;
  aiInstructions: string;
}

export type MatchScore = { kind: 'vector'; similarity: number } | { kind: 'keyword' };

/** A chunk as seen by retrieval, identical in shape for vector and keyword matches. */
export interface RetrievedChunk {
  chunkId: string;
  documentId: string;
  content: string;
  documentTitle: string;
  documentType: DocumentType;
  serviceName?: string;
  score: MatchScore;
  metadata: ChunkMetadata;
}

export interface ChunkSearchScope {
  businessId: string;
  /** Restrict to documents unrelated to any service or related to this one. */
  serviceId?: string;
  documentType?: DocumentType;
  limit: number;
}

export interface VectorSearchQuery extends ChunkSearchScope {
  embedding: number[];
  threshold: number;
}

export interface KeywordSearchQuery extends ChunkSearchScope {
  keywords: string[];
}

export interface KnowledgeStats {
  businessId: string;
  activeDocuments: number;
  activeChunks: number;
  chunksByDocumentType: Partial<Record<DocumentType, number>>;
}

/** Totals across every business. */
export interface IndexingTotals {
  /** Businesses that own at least one active chunk. */
  indexedBusinesses: number;
  activeChunks: number;
}
