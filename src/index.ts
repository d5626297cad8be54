export { connectToDatabase, disconnectFromDatabase } from './config/db';
export { env } from './config/env';
export type { Env } from './config/env';

export * from './services/knowledge/errors';
export type { BusinessCatalog, DocumentListFilter, KnowledgeStore } from './services/knowledge/knowledgeStore';
export { InMemoryBusinessCatalog, InMemoryKnowledgeStore } from './services/knowledge/memoryStore';
export { MongoBusinessCatalog } from './services/knowledge/mongoBusinessCatalog';
export { MongoKnowledgeStore } from './services/knowledge/mongoKnowledgeStore';
export { DOCUMENT_TYPES, INDEXING_STATUSES, KNOWLEDGE_FIELDS } from './services/knowledge/types';
export type * from './services/knowledge/types';

export { buildFieldDocuments } from './services/rag/businessKnowledge';
export { chunkText, defaultChunkerOptions, splitText } from './services/rag/chunker';
export type { ChunkerOptions, PageText, TextChunk } from './services/rag/chunker';
export { DocumentIndexer } from './services/rag/documentIndexer';
export type {
  CreateDocumentRequest,
  CreateDocumentResult,
  DeleteDocumentResult,
  IndexDocumentResult,
  ReindexDocumentResult,
  RevertResult,
  UpdateVersionRequest,
  VersionResult,
} from './services/rag/documentIndexer';
export { EmbeddingGenerator } from './services/rag/embeddings';
export type { Embedder, EmbeddingProvider } from './services/rag/embeddings';
export { createKnowledgeEngine } from './services/rag/engine';
export type { KnowledgeEngine, KnowledgeEngineOverrides } from './services/rag/engine';
export { assembleContext, formatDuration, formatPrice } from './services/rag/formatContext';
export { KnowledgeIndexer } from './services/rag/knowledgeIndexer';
export type {
  BatchIndexDetail,
  BatchIndexResult,
  BusinessIndexResult,
  DeleteBusinessKnowledgeResult,
  IndexingStatusResult,
  KnowledgeStatsResult,
} from './services/rag/knowledgeIndexer';
export {
  deleteBusinessKnowledge,
  getKnowledgeIndexingStatus,
  indexAllBusinessKnowledge,
  indexBusinessKnowledge,
  ingestBusinessDocument,
  refreshBusinessKnowledgeIfStale,
  retrieveBusinessContext,
  setKnowledgeEngine,
} from './services/rag/knowledgeService';
export type { ExtractedText, TextExtractor } from './services/rag/pdfText';
export { RetrievalEngine, detectServiceIntent } from './services/rag/retrieve';
export type { RetrievalDebugInfo, RetrievalDebugResult, RetrieveOptions } from './services/rag/retrieve';
