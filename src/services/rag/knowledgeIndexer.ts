import { env } from '../../config/env';
import { getErrorMessage } from '../knowledge/errors';
import type { BusinessCatalog, KnowledgeStore } from '../knowledge/knowledgeStore';
import { KNOWLEDGE_FIELDS, type BusinessRecord, type KnowledgeField, type KnowledgeStats } from '../knowledge/types';
import { buildFieldDocuments } from './businessKnowledge';
import { KeyedMutex } from './concurrency';
import type { DocumentIndexer } from './documentIndexer';

export interface BusinessIndexResult {
  success: boolean;
  message: string;
  businessId: string;
  updatedFields: KnowledgeField[];
  deletedDocuments: number;
  /** Chunks removed together with the replaced documents. */
  deletedCount: number;
  indexedCount: number;
  documentIds: string[];
  failedDocumentIds: string[];
}

export interface BatchIndexDetail {
  businessId: string;
  businessName: string;
  success: boolean;
  message: string;
  indexedCount: number;
}

export interface BatchIndexResult {
  success: boolean;
  message: string;
  totalBusinesses: number;
  successful: number;
  failed: number;
  details: BatchIndexDetail[];
}

export type KnowledgeStatsResult =
  | ({ success: true } & KnowledgeStats)
  | { success: false; businessId: string; message: string };

export type IndexingStatusResult =
  | {
      success: true;
      totalActiveBusinesses: number;
      indexedBusinesses: number;
      notIndexed: number;
      totalKnowledgeChunks: number;
      averageChunksPerBusiness: number;
    }
  | { success: false; message: string };

export interface DeleteBusinessKnowledgeResult {
  success: boolean;
  message: string;
  businessId: string;
  deletedDocuments: number;
  deletedCount: number;
}

export interface KnowledgeIndexerDeps {
  store: KnowledgeStore;
  catalog: BusinessCatalog;
  documents: DocumentIndexer;
  batchSize?: number;
}

export function isKnowledgeField(value: string): value is KnowledgeField {
  return KNOWLEDGE_FIELDS.some((field) => field === value);
}

/**
 * Keeps the synthetic question/answer documents of a business in step with
 * its structured data. Updates for one business never interleave.
 */
export class KnowledgeIndexer {
  private readonly store: KnowledgeStore;
  private readonly catalog: BusinessCatalog;
  private readonly documents: DocumentIndexer;
  private readonly batchSize: number;
  private readonly locks = new KeyedMutex();

  constructor(deps: KnowledgeIndexerDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.documents = deps.documents;
    this.batchSize = deps.batchSize ?? env.RAG_BATCH_SIZE;
  }

  async indexBusiness(businessId: string): Promise<BusinessIndexResult> {
    return this.updateBusinessKnowledgeIncremental(businessId, []);
  }

  /**
   * Replaces the generated documents of the named fields and indexes the
   * new ones. No fields means every field.
   */
  async updateBusinessKnowledgeIncremental(
    businessId: string,
    updatedFields: readonly string[]
  ): Promise<BusinessIndexResult> {
    const known = updatedFields.filter(isKnowledgeField);
    const unknown = updatedFields.filter((field) => !isKnowledgeField(field));
    if (unknown.length > 0) {
      console.warn(`[rag:index] business ${businessId}: ignoring unknown fields ${unknown.join(', ')}`);
    }
    if (updatedFields.length > 0 && known.length === 0) {
      return failedResult(businessId, [], 'No known knowledge fields to update');
    }
    const fields: KnowledgeField[] = known.length > 0 ? [...new Set(known)] : [...KNOWLEDGE_FIELDS];

    return this.locks.runExclusive(businessId, () => this.rebuildFields(businessId, fields));
  }

  async indexAllBusinesses(batchSize: number = this.batchSize): Promise<BatchIndexResult> {
    const size = Math.max(1, Math.floor(batchSize));
    const details: BatchIndexDetail[] = [];

    let total: number;
    try {
      total = await this.catalog.countActiveBusinesses();
    } catch (error) {
      console.error('[rag:index] could not count businesses:', error);
      return {
        success: false,
        message: `Batch indexing failed: ${getErrorMessage(error)}`,
        totalBusinesses: 0,
        successful: 0,
        failed: 0,
        details,
      };
    }

    console.log(`[rag:index] indexing ${total} active businesses in batches of ${size}`);

    for (let skip = 0; skip < total; skip += size) {
      let batch: BusinessRecord[];
      try {
        batch = await this.catalog.listActiveBusinesses({ skip, limit: size });
      } catch (error) {
        console.error(`[rag:index] could not load batch at ${skip}:`, error);
        break;
      }
      if (batch.length === 0) {
        break;
      }

      console.log(`[rag:index] batch ${Math.floor(skip / size) + 1}: ${batch.length} businesses`);
      for (const business of batch) {
        const result = await this.indexBusiness(business.id);
        details.push({
          businessId: business.id,
          businessName: business.name,
          success: result.success,
          message: result.message,
          indexedCount: result.indexedCount,
        });
      }
    }

    const successful = details.filter((detail) => detail.success).length;
    const failed = details.length - successful;
    return {
      success: true,
      message: `Indexed ${successful} of ${details.length} businesses`,
      totalBusinesses: total,
      successful,
      failed,
      details,
    };
  }

  async getKnowledgeStats(businessId: string): Promise<KnowledgeStatsResult> {
    try {
      const stats = await this.store.getStats(businessId);
      return { success: true, ...stats };
    } catch (error) {
      console.error(`[rag:index] stats for ${businessId} failed:`, error);
      return { success: false, businessId, message: getErrorMessage(error) };
    }
  }

  async getIndexingStatus(): Promise<IndexingStatusResult> {
    try {
      const [totalActiveBusinesses, totals] = await Promise.all([
        this.catalog.countActiveBusinesses(),
        this.store.getIndexingTotals(),
      ]);
      const { indexedBusinesses, activeChunks } = totals;
      return {
        success: true,
        totalActiveBusinesses,
        indexedBusinesses,
        notIndexed: Math.max(0, totalActiveBusinesses - indexedBusinesses),
        totalKnowledgeChunks: activeChunks,
        averageChunksPerBusiness:
          indexedBusinesses > 0 ? Math.round((activeChunks / indexedBusinesses) * 100) / 100 : 0,
      };
    } catch (error) {
      console.error('[rag:index] indexing status failed:', error);
      return { success: false, message: getErrorMessage(error) };
    }
  }

  /**
   * Rebuilds every field when the business changed after its newest active
   * chunk was written. A business with no knowledge yet is left alone.
   * Resolves to whether a rebuild ran and succeeded.
   */
  async checkAndUpdateIfStale(businessId: string, businessUpdatedAt: Date): Promise<boolean> {
    let latest: Date | null;
    try {
      latest = await this.store.getLatestChunkTime(businessId);
    } catch (error) {
      console.error(`[rag:index] staleness check for ${businessId} failed:`, error);
      return false;
    }

    if (!latest) {
      console.log(`[rag:index] business ${businessId}: no knowledge to refresh`);
      return false;
    }
    if (businessUpdatedAt <= latest) {
      return false;
    }

    console.log(
      `[rag:index] business ${businessId}: knowledge is stale ` +
        `(business ${businessUpdatedAt.toISOString()}, knowledge ${latest.toISOString()})`
    );
    const result = await this.indexBusiness(businessId);
    if (!result.success) {
      console.error(`[rag:index] business ${businessId}: refresh failed: ${result.message}`);
    }
    return result.success;
  }

  /** Removes every generated document of the business with its chunks. Uploaded documents stay. */
  async deleteBusinessKnowledge(businessId: string): Promise<DeleteBusinessKnowledgeResult> {
    return this.locks.runExclusive(businessId, async () => {
      try {
        const { deletedDocuments, deletedChunks } = await this.store.replaceFieldDocuments(
          businessId,
          [...KNOWLEDGE_FIELDS],
          []
        );
        console.log(
          `[rag:index] business ${businessId}: deleted ${deletedDocuments} documents (${deletedChunks} chunks)`
        );
        return {
          success: true,
          message: `Deleted ${deletedChunks} knowledge chunks`,
          businessId,
          deletedDocuments,
          deletedCount: deletedChunks,
        };
      } catch (error) {
        console.error(`[rag:index] business ${businessId}: delete failed:`, error);
        return {
          success: false,
          message: `Failed to delete knowledge: ${getErrorMessage(error)}`,
          businessId,
          deletedDocuments: 0,
          deletedCount: 0,
        };
      }
    });
  }

  private async rebuildFields(businessId: string, fields: KnowledgeField[]): Promise<BusinessIndexResult> {
    try {
      const business = await this.catalog.getBusiness(businessId);
      if (!business) {
        return failedResult(businessId, fields, 'Business not found');
      }

      const services = fields.includes('service_catalog') ? await this.catalog.listActiveServices(businessId) : [];
      const drafts = fields.flatMap((field) => buildFieldDocuments(business, field, services));
      const { deletedDocuments, deletedChunks, created } = await this.store.replaceFieldDocuments(
        businessId,
        fields,
        drafts
      );
      console.log(
        `[rag:index] business ${businessId}: replaced ${deletedDocuments} documents (${deletedChunks} chunks) ` +
          `with ${created.length} for ${fields.join(', ')}`
      );

      const results = await Promise.all(created.map((document) => this.documents.indexDocument(document.id)));
      const indexedCount = results.reduce((sum, result) => sum + result.indexedCount, 0);
      const failedDocumentIds = results.filter((result) => !result.success).map((result) => result.documentId);

      return {
        success: failedDocumentIds.length === 0,
        message:
          failedDocumentIds.length === 0
            ? `Indexed ${indexedCount} chunks from ${created.length} documents`
            : `Indexed ${indexedCount} chunks; ${failedDocumentIds.length} documents failed`,
        businessId,
        updatedFields: fields,
        deletedDocuments,
        deletedCount: deletedChunks,
        indexedCount,
        documentIds: created.map((document) => document.id),
        failedDocumentIds,
      };
    } catch (error) {
      console.error(`[rag:index] business ${businessId}: update failed:`, error);
      return failedResult(businessId, fields, `Knowledge update failed: ${getErrorMessage(error)}`);
    }
  }
}

function failedResult(
  businessId: string,
  updatedFields: KnowledgeField[],
  message: string
): BusinessIndexResult {
  return {
    success: false,
    message,
    businessId,
    updatedFields,
    deletedDocuments: 0,
    deletedCount: 0,
    indexedCount: 0,
    documentIds: [],
    failedDocumentIds: [],
  };
}
