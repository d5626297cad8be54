import { env } from '../../config/env';
import { RetrievalError, TimeoutError, getErrorMessage } from '../knowledge/errors';
import type { BusinessCatalog, KnowledgeStore } from '../knowledge/knowledgeStore';
import type { ChunkMetadata, ChunkSearchScope, DocumentType, RetrievedChunk, ServiceRecord } from '../knowledge/types';
import { withDeadline } from './concurrency';
import type { Embedder } from './embeddings';
import { assembleContext } from './formatContext';
import { extractKeywords } from './textUtils';

export interface RetrieveOptions {
  /** Service name to scope to, overriding detection from the query text. */
  serviceFilter?: string;
  documentTypeFilter?: DocumentType;
  limit?: number;
  similarityThreshold?: number;
}

export interface RetrievalDebugResult {
  documentTitle: string;
  documentType: DocumentType;
  serviceName?: string;
  /** Cosine similarity, or `null` for a keyword match. */
  similarity: number | null;
  contentPreview: string;
  metadata: ChunkMetadata;
}

export interface RetrievalDebugInfo {
  query: string;
  businessId: string;
  timestamp: string;
  detectedService: string | null;
  similarityThreshold: number;
  limit: number;
  keywords: string[];
  /** Vector search came back empty and the keyword search ran. */
  usedFallback: boolean;
  numResults: number;
  results: RetrievalDebugResult[];
  error?: string;
}

export interface RetrievalEngineDeps {
  store: KnowledgeStore;
  catalog: BusinessCatalog;
  embedder: Embedder;
  similarityThreshold?: number;
  maxChunks?: number;
  timeoutMs?: number;
  logQueries?: boolean;
}

/**
 * Picks the active service whose name appears in the query. The longest
 * matching name wins; ties go to the lower display order, then the name.
 */
export function detectServiceIntent(query: string, services: ServiceRecord[]): ServiceRecord | null {
  const lowered = query.toLowerCase();
  const matches = services.filter((service) => {
    const name = service.name.trim().toLowerCase();
    return name.length > 0 && lowered.includes(name);
  });
  if (matches.length === 0) {
    return null;
  }

  matches.sort(
    (a, b) =>
      b.name.trim().length - a.name.trim().length || a.displayOrder - b.displayOrder || a.name.localeCompare(b.name)
  );
  return matches[0];
}

/**
 * Answers a query with formatted business context: vector search first,
 * keyword search when no chunk clears the similarity threshold. Never
 * throws; any failure yields an empty context.
 */
export class RetrievalEngine {
  private readonly store: KnowledgeStore;
  private readonly catalog: BusinessCatalog;
  private readonly embedder: Embedder;
  private readonly similarityThreshold: number;
  private readonly maxChunks: number;
  private readonly timeoutMs: number;
  private readonly logQueries: boolean;

  constructor(deps: RetrievalEngineDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.embedder = deps.embedder;
    this.similarityThreshold = deps.similarityThreshold ?? env.RAG_SIMILARITY_THRESHOLD;
    this.maxChunks = deps.maxChunks ?? env.RAG_MAX_CONTEXT_CHUNKS;
    this.timeoutMs = deps.timeoutMs ?? env.RAG_RETRIEVAL_TIMEOUT_MS;
    this.logQueries = deps.logQueries ?? env.RAG_LOG_QUERIES;
  }

  async retrieveContext(query: string, businessId: string, options: RetrieveOptions = {}): Promise<string> {
    const { context } = await this.retrieveContextWithDebug(query, businessId, options);
    return context;
  }

  async retrieveContextWithDebug(
    query: string,
    businessId: string,
    options: RetrieveOptions = {}
  ): Promise<{ context: string; debug: RetrievalDebugInfo }> {
    const debug: RetrievalDebugInfo = {
      query,
      businessId,
      timestamp: new Date().toISOString(),
      detectedService: null,
      similarityThreshold: options.similarityThreshold ?? this.similarityThreshold,
      limit: options.limit ?? this.maxChunks,
      keywords: [],
      usedFallback: false,
      numResults: 0,
      results: [],
    };

    // A pass still running after the deadline writes only to its own copy.
    const pass: RetrievalDebugInfo = { ...debug };
    try {
      const context = await withDeadline(() => this.run(query, businessId, options, pass), this.timeoutMs, 'Retrieval');
      return { context, debug: pass };
    } catch (error) {
      const failure = error instanceof RetrievalError ? error : new RetrievalError(getErrorMessage(error), error);
      console.error(`[rag:retrieve] business ${businessId}: ${failure.message}`);
      const settled = error instanceof TimeoutError ? debug : pass;
      settled.error = failure.message;
      return { context: '', debug: settled };
    }
  }

  private async run(
    query: string,
    businessId: string,
    options: RetrieveOptions,
    debug: RetrievalDebugInfo
  ): Promise<string> {
    const text = query.trim();
    if (!text || !businessId) {
      return '';
    }

    const service = await this.resolveService(text, businessId, options.serviceFilter);
    debug.detectedService = service?.name ?? null;

    const embedding = await this.embedder.embed(text);
    const scope: ChunkSearchScope = {
      businessId,
      serviceId: service?.id,
      documentType: options.documentTypeFilter,
      limit: debug.limit,
    };

    let chunks = await this.store.searchByVector({ ...scope, embedding, threshold: debug.similarityThreshold });
    if (chunks.length === 0) {
      debug.usedFallback = true;
      debug.keywords = extractKeywords(text);
      if (debug.keywords.length > 0) {
        chunks = await this.store.searchByKeywords({ ...scope, keywords: debug.keywords });
      }
    }

    debug.numResults = chunks.length;
    debug.results = chunks.map(toDebugResult);

    if (this.logQueries) {
      console.log(
        `[rag:retrieve] business ${businessId}: ${chunks.length} chunks for "${text.slice(0, 50)}"` +
          (service ? ` (service: ${service.name})` : '') +
          (debug.usedFallback && chunks.length > 0 ? ' via keyword fallback' : '')
      );
    }

    return assembleContext(service, chunks);
  }

  private async resolveService(
    query: string,
    businessId: string,
    serviceFilter: string | undefined
  ): Promise<ServiceRecord | null> {
    const services = await this.catalog.listActiveServices(businessId);
    const wanted = serviceFilter?.trim().toLowerCase();
    if (wanted) {
      const named = services.find((service) => service.name.trim().toLowerCase() === wanted);
      if (named) {
        return named;
      }
    }
    return detectServiceIntent(query, services);
  }
}

function toDebugResult(chunk: RetrievedChunk): RetrievalDebugResult {
  return {
    documentTitle: chunk.documentTitle,
    documentType: chunk.documentType,
    serviceName: chunk.serviceName,
    similarity: chunk.score.kind === 'vector' ? chunk.score.similarity : null,
    contentPreview: chunk.content.length > 200 ? `${chunk.content.slice(0, 200)}...` : chunk.content,
    metadata: chunk.metadata,
  };
}
