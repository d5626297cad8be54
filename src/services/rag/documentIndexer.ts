import { z } from 'zod';
import { env } from '../../config/env';
import { EmbeddingError, ExtractionError, NotFoundError, ValidationError, getErrorMessage } from '../knowledge/errors';
import type { BusinessCatalog, KnowledgeStore } from '../knowledge/knowledgeStore';
import { DOCUMENT_TYPES } from '../knowledge/types';
import type { ChunkRecord, DocumentRecord, NewChunkInput } from '../knowledge/types';
import { chunkText, defaultChunkerOptions, type ChunkerOptions, type PageText, type TextChunk } from './chunker';
import { KeyedMutex, createLimiter, type Limiter } from './concurrency';
import type { Embedder } from './embeddings';
import type { ExtractedText, TextExtractor } from './pdfText';

export interface IndexDocumentResult {
  success: boolean;
  message: string;
  documentId: string;
  indexedCount: number;
  /** Chunks dropped because their embedding failed. */
  skippedCount: number;
}

export interface ReindexDocumentResult extends IndexDocumentResult {
  deletedCount: number;
}

export interface VersionResult {
  success: boolean;
  message: string;
  oldDocumentId: string;
  newDocumentId?: string;
  indexedCount: number;
  errors?: Record<string, string[] | undefined>;
}

export interface RevertResult {
  success: boolean;
  message: string;
  currentDocumentId: string;
  revertedToDocumentId?: string;
}

export interface DeleteDocumentResult {
  success: boolean;
  message: string;
  documentId: string;
}

export interface CreateDocumentResult {
  success: boolean;
  message: string;
  documentId?: string;
  indexedCount: number;
  errors?: Record<string, string[] | undefined>;
}

const createDocumentSchema = z
  .object({
    businessId: z.string().trim().min(1),
    title: z.string().trim().min(1).max(500),
    type: z.enum(DOCUMENT_TYPES),
    content: z.string().default(''),
    fileBytes: z.instanceof(Uint8Array).optional(),
    filePath: z.string().trim().min(1).optional(),
    originalFilename: z.string().trim().min(1).optional(),
    relatedServiceId: z.string().trim().min(1).optional(),
  })
  .refine((input) => input.content.trim().length > 0 || (input.type === 'pdf' && input.fileBytes !== undefined), {
    message: 'Either text content or PDF bytes are required',
    path: ['content'],
  });

export type CreateDocumentRequest = z.input<typeof createDocumentSchema>;

const updateVersionSchema = z
  .object({
    content: z.string().default(''),
    title: z.string().trim().min(1).max(500).optional(),
    fileBytes: z.instanceof(Uint8Array).optional(),
  })
  .refine((input) => input.content.trim().length > 0 || input.fileBytes !== undefined, {
    message: 'Either text content or PDF bytes are required',
    path: ['content'],
  });

export type UpdateVersionRequest = z.input<typeof updateVersionSchema>;

function isExpectedRefusal(error: unknown): boolean {
  return error instanceof NotFoundError || error instanceof ValidationError;
}

export interface DocumentIndexerDeps {
  store: KnowledgeStore;
  embedder: Embedder;
  /** Used to check that a related service belongs to the document's business. */
  catalog?: BusinessCatalog;
  extractPdf?: TextExtractor;
  chunker?: ChunkerOptions;
  /** Shared across indexers so the cap on in-flight embedding calls holds process-wide. */
  limiter?: Limiter;
}

/**
 * Drives a document through pending -> processing -> complete | failed.
 * Passes over the same document are serialized; different documents index
 * concurrently.
 */
export class DocumentIndexer {
  private readonly store: KnowledgeStore;
  private readonly embedder: Embedder;
  private readonly catalog?: BusinessCatalog;
  private readonly extractPdf?: TextExtractor;
  private readonly chunker: ChunkerOptions;
  private readonly limit: Limiter;
  private readonly locks = new KeyedMutex();

  constructor(deps: DocumentIndexerDeps) {
    this.store = deps.store;
    this.embedder = deps.embedder;
    this.catalog = deps.catalog;
    this.extractPdf = deps.extractPdf;
    this.chunker = deps.chunker ?? defaultChunkerOptions();
    this.limit = deps.limiter ?? createLimiter(env.RAG_EMBED_CONCURRENCY);
  }

  isIndexing(documentId: string): boolean {
    return this.locks.isLocked(documentId);
  }

  async indexDocument(documentId: string, fileBytes?: Uint8Array): Promise<IndexDocumentResult> {
    return this.locks.runExclusive(documentId, () => this.runIndexPass(documentId, fileBytes));
  }

  async reindexDocument(documentId: string, fileBytes?: Uint8Array): Promise<ReindexDocumentResult> {
    return this.locks.runExclusive(documentId, async () => {
      let deletedCount: number;
      try {
        const document = await this.store.getDocument(documentId);
        if (!document) {
          return { ...notFound(documentId), deletedCount: 0 };
        }
        deletedCount = await this.store.deleteChunks(documentId);
        await this.store.updateDocument(documentId, { indexingStatus: 'pending', indexingError: null });
      } catch (error) {
        const message = getErrorMessage(error);
        console.error(`[rag:index] reindex ${documentId} failed:`, error);
        await this.markFailed(documentId, message);
        return { ...failure(documentId, `Failed to reindex document: ${message}`), deletedCount: 0 };
      }

      console.log(`[rag:index] ${documentId}: cleared ${deletedCount} chunks for reindex`);
      const result = await this.runIndexPass(documentId, fileBytes);
      return { ...result, deletedCount };
    });
  }

  async createAndIndexDocument(request: CreateDocumentRequest): Promise<CreateDocumentResult> {
    const parsed = createDocumentSchema.safeParse(request);
    if (!parsed.success) {
      return {
        success: false,
        message: 'Invalid document payload',
        indexedCount: 0,
        errors: parsed.error.flatten().fieldErrors,
      };
    }

    const input = parsed.data;
    try {
      if (input.relatedServiceId && this.catalog) {
        const service = await this.catalog.getService(input.relatedServiceId);
        if (!service || service.businessId !== input.businessId) {
          return { success: false, message: 'Related service not found for this business', indexedCount: 0 };
        }
      }

      const document = await this.store.createDocument({
        businessId: input.businessId,
        title: input.title,
        type: input.type,
        originalContent: input.content,
        filePath: input.filePath,
        originalFilename: input.originalFilename,
        fileSize: input.fileBytes?.byteLength ?? Buffer.byteLength(input.content, 'utf8'),
        relatedServiceId: input.relatedServiceId,
      });

      const result = await this.indexDocument(document.id, input.fileBytes);
      return {
        success: result.success,
        message: result.message,
        documentId: document.id,
        indexedCount: result.indexedCount,
      };
    } catch (error) {
      console.error('[rag:index] create document failed:', error);
      return { success: false, message: `Failed to create document: ${getErrorMessage(error)}`, indexedCount: 0 };
    }
  }

  /**
   * Stores the new content as a fresh document that points back at the old
   * one, then indexes it. The old version and its chunks are kept inactive.
   */
  async updateDocumentVersion(documentId: string, request: UpdateVersionRequest): Promise<VersionResult> {
    const parsed = updateVersionSchema.safeParse(request);
    if (!parsed.success) {
      return {
        success: false,
        message: 'Invalid version payload',
        oldDocumentId: documentId,
        indexedCount: 0,
        errors: parsed.error.flatten().fieldErrors,
      };
    }

    const input = parsed.data;
    let created: DocumentRecord;
    try {
      created = await this.locks.runExclusive(documentId, async () => {
        const current = await this.store.getDocument(documentId);
        if (!current) {
          throw new NotFoundError(`Document not found: ${documentId}`);
        }
        if (current.type !== 'pdf' && !input.content.trim()) {
          throw new ValidationError('Text content is required for this document type');
        }
        return this.store.createVersion(documentId, {
          content: input.content,
          title: input.title,
          fileSize: input.fileBytes?.byteLength ?? Buffer.byteLength(input.content, 'utf8'),
        });
      });
    } catch (error) {
      if (!isExpectedRefusal(error)) {
        console.error(`[rag:index] versioning ${documentId} failed:`, error);
      }
      return {
        success: false,
        message: `Failed to create new version: ${getErrorMessage(error)}`,
        oldDocumentId: documentId,
        indexedCount: 0,
      };
    }

    const result = await this.indexDocument(created.id, input.fileBytes);
    return {
      success: result.success,
      message: `Created new version: ${result.message}`,
      oldDocumentId: documentId,
      newDocumentId: created.id,
      indexedCount: result.indexedCount,
    };
  }

  /**
   * Reactivates the previous version together with its chunks. A previous
   * version that never finished indexing is indexed again.
   */
  async revertDocumentVersion(documentId: string): Promise<RevertResult> {
    let previous: DocumentRecord;
    try {
      previous = await this.locks.runExclusive(documentId, () => this.store.revert(documentId));
    } catch (error) {
      if (!isExpectedRefusal(error)) {
        console.error(`[rag:index] revert ${documentId} failed:`, error);
      }
      return { success: false, message: getErrorMessage(error), currentDocumentId: documentId };
    }

    if (previous.indexingStatus !== 'complete') {
      const result = await this.indexDocument(previous.id);
      if (!result.success) {
        return {
          success: false,
          message: `Reverted, but indexing the previous version failed: ${result.message}`,
          currentDocumentId: documentId,
          revertedToDocumentId: previous.id,
        };
      }
    }

    return {
      success: true,
      message: 'Reverted to previous version',
      currentDocumentId: documentId,
      revertedToDocumentId: previous.id,
    };
  }

  async deleteDocument(documentId: string, options: { hard?: boolean } = {}): Promise<DeleteDocumentResult> {
    return this.locks.runExclusive(documentId, async () => {
      try {
        if (options.hard) {
          const deleted = await this.store.deleteDocument(documentId);
          return deleted
            ? { success: true, message: 'Document deleted', documentId }
            : { success: false, message: 'Document not found', documentId };
        }
        const deactivated = await this.store.deactivateDocument(documentId);
        return deactivated
          ? { success: true, message: 'Document deactivated', documentId }
          : { success: false, message: 'Document not found', documentId };
      } catch (error) {
        console.error(`[rag:index] delete ${documentId} failed:`, error);
        return { success: false, message: `Failed to delete document: ${getErrorMessage(error)}`, documentId };
      }
    });
  }

  async listDocumentChunks(documentId: string, options: { activeOnly?: boolean } = {}): Promise<ChunkRecord[]> {
    return this.store.listChunks(documentId, { activeOnly: options.activeOnly ?? true });
  }

  private async runIndexPass(documentId: string, fileBytes?: Uint8Array): Promise<IndexDocumentResult> {
    try {
      const document = await this.store.getDocument(documentId);
      if (!document) {
        return notFound(documentId);
      }

      await this.store.updateDocument(documentId, { indexingStatus: 'processing' });
      console.log(`[rag:index] ${documentId}: processing "${document.title}" (${document.type})`);

      const drafts = await this.prepareChunks(document, fileBytes);
      const chunks = await this.embedChunks(documentId, drafts);
      if (chunks.length === 0) {
        throw new EmbeddingError('No chunks could be embedded');
      }

      await this.store.replaceChunks(documentId, chunks);
      await this.store.updateDocument(documentId, {
        indexingStatus: 'complete',
        indexedAt: new Date(),
        indexingError: null,
      });

      const skippedCount = drafts.length - chunks.length;
      console.log(`[rag:index] ${documentId}: ${chunks.length} chunks indexed, ${skippedCount} skipped`);
      return {
        success: true,
        message: `Indexed ${chunks.length} chunks`,
        documentId,
        indexedCount: chunks.length,
        skippedCount,
      };
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`[rag:index] ${documentId}: indexing failed: ${message}`);
      await this.markFailed(documentId, message);
      return failure(documentId, `Indexing failed: ${message}`);
    }
  }

  private async prepareChunks(document: DocumentRecord, fileBytes?: Uint8Array): Promise<TextChunk[]> {
    if (document.entries.length > 0) {
      return document.entries.map((entry, index) => ({
        content: entry.question,
        index,
        metadata: { ...entry.metadata, question: entry.question, answer: entry.answer },
      }));
    }

    let text = document.originalContent;
    let pages: PageText[] | undefined;

    if (document.type === 'pdf' && fileBytes) {
      if (!this.extractPdf) {
        throw new ExtractionError('PDF extraction is not configured');
      }
      let extracted: ExtractedText;
      try {
        extracted = await this.extractPdf(fileBytes);
      } catch (error) {
        throw new ExtractionError(`Failed to extract text from PDF: ${getErrorMessage(error)}`, error);
      }
      text = extracted.text;
      pages = extracted.pages;
      await this.store.updateDocument(document.id, { originalContent: text, pageCount: extracted.pageCount });
    }

    if (!text.trim()) {
      throw new ExtractionError('No text content found in document');
    }

    const chunks = chunkText(text, pages, this.chunker);
    if (chunks.length === 0) {
      throw new ExtractionError('No chunks created from text');
    }
    return chunks;
  }

  private async embedChunks(documentId: string, drafts: TextChunk[]): Promise<NewChunkInput[]> {
    const outcomes = await Promise.allSettled(
      drafts.map((draft) => this.limit(() => this.embedder.embed(draft.content)))
    );

    const chunks: NewChunkInput[] = [];
    outcomes.forEach((outcome, position) => {
      const draft = drafts[position];
      if (outcome.status === 'fulfilled') {
        chunks.push({
          content: draft.content,
          embedding: outcome.value,
          chunkIndex: draft.index,
          metadata: draft.metadata,
        });
      } else {
        console.warn(
          `[rag:index] ${documentId}: skipping chunk ${draft.index}: ${getErrorMessage(outcome.reason)}`
        );
      }
    });
    return chunks;
  }

  private async markFailed(documentId: string, message: string): Promise<void> {
    try {
      await this.store.updateDocument(documentId, { indexingStatus: 'failed', indexingError: message });
    } catch (error) {
      console.error(`[rag:index] ${documentId}: could not record failure:`, error);
    }
  }
}

function failure(documentId: string, message: string): IndexDocumentResult {
  return { success: false, message, documentId, indexedCount: 0, skippedCount: 0 };
}

function notFound(documentId: string): IndexDocumentResult {
  return failure(documentId, 'Document not found');
}
