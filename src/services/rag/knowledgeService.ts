import type { CreateDocumentRequest, CreateDocumentResult } from './documentIndexer';
import { createKnowledgeEngine, type KnowledgeEngine } from './engine';
import type {
  BatchIndexResult,
  BusinessIndexResult,
  DeleteBusinessKnowledgeResult,
  IndexingStatusResult,
} from './knowledgeIndexer';
import type { RetrievalDebugInfo, RetrieveOptions } from './retrieve';

let cachedEngine: KnowledgeEngine | null = null;

function getEngine(): KnowledgeEngine {
  if (!cachedEngine) {
    cachedEngine = createKnowledgeEngine();
  }

  return cachedEngine;
}

/** Replaces the engine behind the functions below; `null` goes back to the default one. */
export function setKnowledgeEngine(engine: KnowledgeEngine | null): void {
  cachedEngine = engine;
}

export async function retrieveBusinessContext(
  query: string,
  businessId: string,
  options: RetrieveOptions = {}
): Promise<{ context: string; debug: RetrievalDebugInfo }> {
  return getEngine().retrieval.retrieveContextWithDebug(query, businessId, options);
}

export async function ingestBusinessDocument(request: CreateDocumentRequest): Promise<CreateDocumentResult> {
  return getEngine().documents.createAndIndexDocument(request);
}

/** Empty `fields` rebuilds every field. */
export async function indexBusinessKnowledge(
  businessId: string,
  fields: readonly string[] = []
): Promise<BusinessIndexResult> {
  return getEngine().businesses.updateBusinessKnowledgeIncremental(businessId, fields);
}

export async function indexAllBusinessKnowledge(batchSize?: number): Promise<BatchIndexResult> {
  return getEngine().businesses.indexAllBusinesses(batchSize);
}

export async function refreshBusinessKnowledgeIfStale(businessId: string, businessUpdatedAt: Date): Promise<boolean> {
  return getEngine().businesses.checkAndUpdateIfStale(businessId, businessUpdatedAt);
}

export async function deleteBusinessKnowledge(businessId: string): Promise<DeleteBusinessKnowledgeResult> {
  return getEngine().businesses.deleteBusinessKnowledge(businessId);
}

export async function getKnowledgeIndexingStatus(): Promise<IndexingStatusResult> {
  return getEngine().businesses.getIndexingStatus();
}
