import { env } from '../../config/env';
import type { BusinessCatalog, KnowledgeStore } from '../knowledge/knowledgeStore';
import { MongoBusinessCatalog } from '../knowledge/mongoBusinessCatalog';
import { MongoKnowledgeStore } from '../knowledge/mongoKnowledgeStore';
import { createEmbedding } from '../llm/openaiClient';
import { defaultChunkerOptions, type ChunkerOptions } from './chunker';
import { createLimiter } from './concurrency';
import { DocumentIndexer } from './documentIndexer';
import { EmbeddingGenerator, type Embedder } from './embeddings';
import { KnowledgeIndexer } from './knowledgeIndexer';
import type { ExtractedText, TextExtractor } from './pdfText';
import { RetrievalEngine } from './retrieve';

export interface KnowledgeEngine {
  store: KnowledgeStore;
  catalog: BusinessCatalog;
  embedder: Embedder;
  documents: DocumentIndexer;
  businesses: KnowledgeIndexer;
  retrieval: RetrievalEngine;
}

export interface KnowledgeEngineOverrides {
  store?: KnowledgeStore;
  catalog?: BusinessCatalog;
  embedder?: Embedder;
  extractPdf?: TextExtractor;
  chunker?: ChunkerOptions;
}

// pdfjs is only loaded once a PDF actually needs extracting.
async function loadAndExtractPdf(bytes: Uint8Array): Promise<ExtractedText> {
  const { extractPdfText } = await import('./pdfText');
  return extractPdfText(bytes);
}

/**
 * Wires the indexing and retrieval services over one store. Without
 * overrides everything is backed by MongoDB and the OpenAI embeddings API.
 */
export function createKnowledgeEngine(overrides: KnowledgeEngineOverrides = {}): KnowledgeEngine {
  const catalog = overrides.catalog ?? new MongoBusinessCatalog();
  const store = overrides.store ?? new MongoKnowledgeStore();
  const embedder =
    overrides.embedder ??
    new EmbeddingGenerator(createEmbedding, {
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
      dimension: env.EMBEDDING_DIMENSION,
    });

  const documents = new DocumentIndexer({
    store,
    catalog,
    embedder,
    extractPdf: overrides.extractPdf ?? loadAndExtractPdf,
    chunker: overrides.chunker ?? defaultChunkerOptions(),
    limiter: createLimiter(env.RAG_EMBED_CONCURRENCY),
  });

  return {
    store,
    catalog,
    embedder,
    documents,
    businesses: new KnowledgeIndexer({ store, catalog, documents }),
    retrieval: new RetrievalEngine({ store, catalog, embedder }),
  };
}
