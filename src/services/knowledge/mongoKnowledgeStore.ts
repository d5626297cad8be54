import mongoose, { Types, type ClientSession, type FilterQuery } from 'mongoose';
import { KnowledgeChunk, type KnowledgeChunkDocument } from '../../models/KnowledgeChunk';
import {
  KnowledgeDocument,
  type KnowledgeDocumentEntry,
  type KnowledgeEntryDocument,
} from '../../models/KnowledgeDocument';
import { Service } from '../../models/Service';
import { escapeRegExp } from '../rag/textUtils';
import { NotFoundError, ValidationError } from './errors';
import type { DocumentListFilter, KnowledgeStore } from './knowledgeStore';
import { rankByCosine, type ChunkHit, type VectorCandidate } from './search';
import type {
  ChunkMetadata,
  ChunkRecord,
  ChunkSearchScope,
  DocumentPatch,
  DocumentRecord,
  DocumentType,
  IndexingStatus,
  IndexingTotals,
  KeywordSearchQuery,
  KnowledgeField,
  KnowledgeStats,
  NewChunkInput,
  NewDocumentInput,
  RetrievedChunk,
  VectorSearchQuery,
  VersionInput,
} from './types';

type StoredDocument = {
  _id: Types.ObjectId;
  businessId: Types.ObjectId;
  title: string;
  type: DocumentType;
  originalContent?: string;
  filePath?: string;
  originalFilename?: string;
  fileSize?: number;
  pageCount?: number;
  indexingStatus: IndexingStatus;
  indexingError?: string;
  indexedAt?: Date;
  relatedServiceId?: Types.ObjectId | null;
  previousVersionId?: Types.ObjectId | null;
  sourceField?: KnowledgeField;
  entries?: KnowledgeEntryDocument[];
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

type StoredChunk = {
  _id: Types.ObjectId;
  documentId: Types.ObjectId;
  businessId: Types.ObjectId;
  content: string;
  embedding?: number[];
  chunkIndex: number;
  metadata?: ChunkMetadata;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

function parseObjectId(id: string | undefined): Types.ObjectId | null {
  return id && Types.ObjectId.isValid(id) ? new Types.ObjectId(id) : null;
}

function requireObjectId(id: string, label: string): Types.ObjectId {
  const parsed = parseObjectId(id);
  if (!parsed) {
    throw new ValidationError(`Invalid ${label}: ${id}`);
  }
  return parsed;
}

function optionalString(id: Types.ObjectId | null | undefined): string | undefined {
  return id ? id.toHexString() : undefined;
}

function toDocumentRecord(doc: StoredDocument): DocumentRecord {
  return {
    id: doc._id.toHexString(),
    businessId: doc.businessId.toHexString(),
    title: doc.title,
    type: doc.type,
    originalContent: doc.originalContent ?? '',
    filePath: doc.filePath,
    originalFilename: doc.originalFilename,
    fileSize: doc.fileSize,
    pageCount: doc.pageCount,
    indexingStatus: doc.indexingStatus,
    indexingError: doc.indexingError,
    indexedAt: doc.indexedAt,
    relatedServiceId: optionalString(doc.relatedServiceId),
    previousVersionId: optionalString(doc.previousVersionId),
    sourceField: doc.sourceField,
    entries: (doc.entries ?? []).map((entry) => ({
      question: entry.question,
      answer: entry.answer,
      metadata: entry.metadata,
    })),
    isActive: doc.isActive,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toChunkRecord(chunk: StoredChunk): ChunkRecord {
  return {
    id: chunk._id.toHexString(),
    documentId: chunk.documentId.toHexString(),
    businessId: chunk.businessId.toHexString(),
    content: chunk.content,
    embedding: chunk.embedding ?? [],
    chunkIndex: chunk.chunkIndex,
    metadata: chunk.metadata ?? {},
    isActive: chunk.isActive,
    createdAt: chunk.createdAt,
    updatedAt: chunk.updatedAt,
  };
}

function toDocumentPayload(input: NewDocumentInput, _id: Types.ObjectId) {
  return {
    _id,
    businessId: requireObjectId(input.businessId, 'business id'),
    title: input.title,
    type: input.type,
    originalContent: input.originalContent,
    filePath: input.filePath,
    originalFilename: input.originalFilename,
    fileSize: input.fileSize,
    relatedServiceId: input.relatedServiceId ? requireObjectId(input.relatedServiceId, 'service id') : undefined,
    sourceField: input.sourceField,
    entries: input.entries ?? [],
    indexingStatus: 'pending' as const,
    isActive: true,
  };
}

/**
 * MongoDB-backed store. Composite writes run in a transaction, which needs a
 * replica set or sharded cluster.
 */
export class MongoKnowledgeStore implements KnowledgeStore {
  private runInTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
    return mongoose.connection.transaction((session) => work(session));
  }

  private async findStoredDocument(
    documentId: string,
    session?: ClientSession
  ): Promise<StoredDocument | null> {
    const objectId = parseObjectId(documentId);
    if (!objectId) {
      return null;
    }
    return KnowledgeDocument.findById(objectId)
      .session(session ?? null)
      .lean<StoredDocument>();
  }

  private async requireStoredDocument(documentId: string, session?: ClientSession): Promise<StoredDocument> {
    const doc = await this.findStoredDocument(documentId, session);
    if (!doc) {
      throw new NotFoundError(`Document not found: ${documentId}`);
    }
    return doc;
  }

  /** Deactivates the active head of a lineage and its chunks. Only one writer can retire a given head. */
  private async retireHead(current: StoredDocument, session: ClientSession): Promise<void> {
    if (!current.isActive) {
      throw new ValidationError('Document is not the current version');
    }
    const result = await KnowledgeDocument.updateOne(
      { _id: current._id, isActive: true },
      { $set: { isActive: false } },
      { session }
    );
    if (result.modifiedCount === 0) {
      throw new ValidationError('Document is not the current version');
    }
    await KnowledgeChunk.updateMany({ documentId: current._id }, { $set: { isActive: false } }, { session });
  }

  async createDocument(input: NewDocumentInput): Promise<DocumentRecord> {
    const _id = new Types.ObjectId();
    await KnowledgeDocument.create(toDocumentPayload(input, _id));
    return toDocumentRecord(await this.requireStoredDocument(_id.toHexString()));
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    const doc = await this.findStoredDocument(documentId);
    return doc ? toDocumentRecord(doc) : null;
  }

  async updateDocument(documentId: string, patch: DocumentPatch): Promise<DocumentRecord | null> {
    const objectId = parseObjectId(documentId);
    if (!objectId) {
      return null;
    }

    const $set: Record<string, unknown> = {};
    const $unset: Record<string, 1> = {};
    for (const [key, value] of Object.entries(patch)) {
      if (value === undefined) {
        continue;
      }
      if (value === null) {
        $unset[key] = 1;
      } else if (key === 'relatedServiceId' && typeof value === 'string') {
        $set[key] = requireObjectId(value, 'service id');
      } else {
        $set[key] = value;
      }
    }

    const updated = await KnowledgeDocument.findByIdAndUpdate(
      objectId,
      { $set, $unset },
      { new: true }
    ).lean<StoredDocument>();
    return updated ? toDocumentRecord(updated) : null;
  }

  async listDocuments(businessId: string, filter: DocumentListFilter = {}): Promise<DocumentRecord[]> {
    const query: FilterQuery<KnowledgeDocumentEntry> = {
      businessId: requireObjectId(businessId, 'business id'),
    };
    if (filter.activeOnly) {
      query.isActive = true;
    }
    if (filter.type) {
      query.type = filter.type;
    }
    if (filter.sourceField) {
      query.sourceField = filter.sourceField;
    }
    if (filter.serviceId) {
      query.relatedServiceId = requireObjectId(filter.serviceId, 'service id');
    }

    const docs = await KnowledgeDocument.find(query).sort({ createdAt: 1 }).lean<StoredDocument[]>();
    return docs.map(toDocumentRecord);
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    const objectId = parseObjectId(documentId);
    if (!objectId) {
      return false;
    }
    return this.runInTransaction(async (session) => {
      await KnowledgeChunk.deleteMany({ documentId: objectId }, { session });
      const result = await KnowledgeDocument.deleteOne({ _id: objectId }, { session });
      return result.deletedCount > 0;
    });
  }

  async deactivateDocument(documentId: string): Promise<DocumentRecord | null> {
    const objectId = parseObjectId(documentId);
    if (!objectId) {
      return null;
    }
    return this.runInTransaction(async (session) => {
      const updated = await KnowledgeDocument.findByIdAndUpdate(
        objectId,
        { $set: { isActive: false } },
        { new: true, session }
      ).lean<StoredDocument>();
      if (!updated) {
        return null;
      }
      await KnowledgeChunk.updateMany({ documentId: objectId }, { $set: { isActive: false } }, { session });
      return toDocumentRecord(updated);
    });
  }

  async listChunks(documentId: string, options: { activeOnly?: boolean } = {}): Promise<ChunkRecord[]> {
    const objectId = parseObjectId(documentId);
    if (!objectId) {
      return [];
    }
    const query: FilterQuery<KnowledgeChunkDocument> = { documentId: objectId };
    if (options.activeOnly) {
      query.isActive = true;
    }
    const chunks = await KnowledgeChunk.find(query).sort({ chunkIndex: 1 }).lean<StoredChunk[]>();
    return chunks.map(toChunkRecord);
  }

  async deleteChunks(documentId: string): Promise<number> {
    const objectId = parseObjectId(documentId);
    if (!objectId) {
      return 0;
    }
    const result = await KnowledgeChunk.deleteMany({ documentId: objectId });
    return result.deletedCount;
  }

  async replaceChunks(documentId: string, chunks: NewChunkInput[]): Promise<number> {
    return this.runInTransaction(async (session) => {
      const doc = await this.requireStoredDocument(documentId, session);
      const removed = await KnowledgeChunk.deleteMany({ documentId: doc._id }, { session });

      if (chunks.length > 0) {
        await KnowledgeChunk.insertMany(
          chunks.map((chunk) => ({
            documentId: doc._id,
            businessId: doc.businessId,
            content: chunk.content,
            embedding: chunk.embedding,
            chunkIndex: chunk.chunkIndex,
            metadata: chunk.metadata,
            isActive: doc.isActive,
          })),
          { session }
        );
      }

      return removed.deletedCount;
    });
  }

  async createVersion(documentId: string, input: VersionInput): Promise<DocumentRecord> {
    const created = await this.runInTransaction(async (session) => {
      const current = await this.requireStoredDocument(documentId, session);
      await this.retireHead(current, session);

      const _id = new Types.ObjectId();
      await KnowledgeDocument.create(
        [
          {
            _id,
            businessId: current.businessId,
            title: input.title ?? current.title,
            type: current.type,
            originalContent: input.content,
            filePath: current.filePath,
            originalFilename: current.originalFilename,
            fileSize: input.fileSize ?? current.fileSize,
            relatedServiceId: current.relatedServiceId ?? undefined,
            previousVersionId: current._id,
            indexingStatus: 'pending',
            isActive: true,
          },
        ],
        { session }
      );

      return this.requireStoredDocument(_id.toHexString(), session);
    });

    return toDocumentRecord(created);
  }

  async revert(documentId: string): Promise<DocumentRecord> {
    const reverted = await this.runInTransaction(async (session) => {
      const current = await this.requireStoredDocument(documentId, session);
      if (!current.isActive) {
        throw new ValidationError('Document is not the current version');
      }
      if (!current.previousVersionId) {
        throw new NotFoundError('No previous version exists');
      }

      const previous = await KnowledgeDocument.findById(current.previousVersionId)
        .session(session)
        .lean<StoredDocument>();
      if (!previous) {
        throw new NotFoundError('Previous version not found');
      }

      await this.retireHead(current, session);
      await KnowledgeDocument.updateOne({ _id: previous._id }, { $set: { isActive: true } }, { session });
      await KnowledgeChunk.updateMany({ documentId: previous._id }, { $set: { isActive: true } }, { session });

      return this.requireStoredDocument(previous._id.toHexString(), session);
    });

    return toDocumentRecord(reverted);
  }

  async replaceFieldDocuments(
    businessId: string,
    fields: KnowledgeField[],
    documents: NewDocumentInput[]
  ): Promise<{ deletedDocuments: number; deletedChunks: number; created: DocumentRecord[] }> {
    const businessObjectId = requireObjectId(businessId, 'business id');

    return this.runInTransaction(async (session) => {
      const stale = await KnowledgeDocument.find(
        { businessId: businessObjectId, sourceField: { $in: fields } },
        { _id: 1 }
      )
        .session(session)
        .lean<Array<{ _id: Types.ObjectId }>>();
      const staleIds = stale.map((doc) => doc._id);

      const chunkResult = await KnowledgeChunk.deleteMany({ documentId: { $in: staleIds } }, { session });
      const docResult = await KnowledgeDocument.deleteMany({ _id: { $in: staleIds } }, { session });

      const ids = documents.map(() => new Types.ObjectId());
      if (documents.length > 0) {
        await KnowledgeDocument.insertMany(
          documents.map((input, i) => toDocumentPayload(input, ids[i])),
          { session }
        );
      }

      const created = await KnowledgeDocument.find({ _id: { $in: ids } })
        .session(session)
        .lean<StoredDocument[]>();
      const byId = new Map(created.map((doc) => [doc._id.toHexString(), doc]));

      return {
        deletedDocuments: docResult.deletedCount,
        deletedChunks: chunkResult.deletedCount,
        created: ids.flatMap((id) => {
          const doc = byId.get(id.toHexString());
          return doc ? [toDocumentRecord(doc)] : [];
        }),
      };
    });
  }

  private async loadSearchableDocuments(scope: ChunkSearchScope): Promise<Map<string, StoredDocument>> {
    const query: FilterQuery<KnowledgeDocumentEntry> = {
      businessId: requireObjectId(scope.businessId, 'business id'),
      isActive: true,
      indexingStatus: 'complete',
    };
    if (scope.documentType) {
      query.type = scope.documentType;
    }
    if (scope.serviceId) {
      const serviceObjectId = parseObjectId(scope.serviceId);
      query.$or = serviceObjectId
        ? [{ relatedServiceId: null }, { relatedServiceId: serviceObjectId }]
        : [{ relatedServiceId: null }];
    }

    const docs = await KnowledgeDocument.find(query, {
      title: 1,
      type: 1,
      relatedServiceId: 1,
      businessId: 1,
      indexingStatus: 1,
      isActive: 1,
      createdAt: 1,
      updatedAt: 1,
    }).lean<StoredDocument[]>();

    return new Map(docs.map((doc) => [doc._id.toHexString(), doc]));
  }

  private async loadServiceNames(documents: Iterable<StoredDocument>): Promise<Map<string, string>> {
    const serviceIds = new Set<string>();
    for (const doc of documents) {
      if (doc.relatedServiceId) {
        serviceIds.add(doc.relatedServiceId.toHexString());
      }
    }
    if (serviceIds.size === 0) {
      return new Map();
    }

    const services = await Service.find(
      { _id: { $in: [...serviceIds].map((id) => new Types.ObjectId(id)) } },
      { name: 1 }
    ).lean<Array<{ _id: Types.ObjectId; name: string }>>();
    return new Map(services.map((service) => [service._id.toHexString(), service.name]));
  }

  private toHit(chunk: StoredChunk, documents: Map<string, StoredDocument>, serviceNames: Map<string, string>): ChunkHit | null {
    const doc = documents.get(chunk.documentId.toHexString());
    if (!doc) {
      return null;
    }
    const serviceId = optionalString(doc.relatedServiceId);
    return {
      chunkId: chunk._id.toHexString(),
      documentId: doc._id.toHexString(),
      content: chunk.content,
      documentTitle: doc.title,
      documentType: doc.type,
      serviceName: serviceId ? serviceNames.get(serviceId) : undefined,
      metadata: chunk.metadata ?? {},
    };
  }

  async searchByVector(query: VectorSearchQuery): Promise<RetrievedChunk[]> {
    const documents = await this.loadSearchableDocuments(query);
    if (documents.size === 0) {
      return [];
    }
    const serviceNames = await this.loadServiceNames(documents.values());

    const chunks = await KnowledgeChunk.find({
      businessId: requireObjectId(query.businessId, 'business id'),
      isActive: true,
      documentId: { $in: [...documents.values()].map((doc) => doc._id) },
    })
      .sort({ documentId: 1, chunkIndex: 1 })
      .lean<StoredChunk[]>();

    const candidates: VectorCandidate[] = [];
    for (const chunk of chunks) {
      const hit = this.toHit(chunk, documents, serviceNames);
      if (hit) {
        candidates.push({ ...hit, embedding: chunk.embedding ?? [] });
      }
    }

    return rankByCosine(candidates, query.embedding, query.threshold, query.limit);
  }

  async searchByKeywords(query: KeywordSearchQuery): Promise<RetrievedChunk[]> {
    if (query.keywords.length === 0) {
      return [];
    }
    const documents = await this.loadSearchableDocuments(query);
    if (documents.size === 0) {
      return [];
    }
    const serviceNames = await this.loadServiceNames(documents.values());

    const chunks = await KnowledgeChunk.find(
      {
        businessId: requireObjectId(query.businessId, 'business id'),
        isActive: true,
        documentId: { $in: [...documents.values()].map((doc) => doc._id) },
        $or: query.keywords.map((keyword) => ({ content: { $regex: escapeRegExp(keyword), $options: 'i' } })),
      },
      { embedding: 0 }
    )
      .sort({ documentId: 1, chunkIndex: 1 })
      .limit(query.limit)
      .lean<StoredChunk[]>();

    return chunks.flatMap((chunk) => {
      const hit = this.toHit(chunk, documents, serviceNames);
      return hit ? [{ ...hit, score: { kind: 'keyword' as const } }] : [];
    });
  }

  async getStats(businessId: string): Promise<KnowledgeStats> {
    const businessObjectId = requireObjectId(businessId, 'business id');
    const docs = await KnowledgeDocument.find({ businessId: businessObjectId, isActive: true }, { type: 1 }).lean<
      Array<{ _id: Types.ObjectId; type: DocumentType }>
    >();
    const typeById = new Map(docs.map((doc) => [doc._id.toHexString(), doc.type]));

    const counts = await KnowledgeChunk.aggregate<{ _id: Types.ObjectId; count: number }>([
      { $match: { businessId: businessObjectId, isActive: true } },
      { $group: { _id: '$documentId', count: { $sum: 1 } } },
    ]);

    const chunksByDocumentType: Partial<Record<DocumentType, number>> = {};
    let activeChunks = 0;
    for (const { _id, count } of counts) {
      const type = typeById.get(_id.toHexString());
      if (!type) {
        continue;
      }
      activeChunks += count;
      chunksByDocumentType[type] = (chunksByDocumentType[type] ?? 0) + count;
    }

    return {
      businessId,
      activeDocuments: docs.length,
      activeChunks,
      chunksByDocumentType,
    };
  }

  async getIndexingTotals(): Promise<IndexingTotals> {
    const [businessIds, activeChunks] = await Promise.all([
      KnowledgeChunk.distinct('businessId', { isActive: true }),
      KnowledgeChunk.countDocuments({ isActive: true }),
    ]);
    return { indexedBusinesses: businessIds.length, activeChunks };
  }

  async getLatestChunkTime(businessId: string): Promise<Date | null> {
    const latest = await KnowledgeChunk.findOne(
      { businessId: requireObjectId(businessId, 'business id'), isActive: true },
      { createdAt: 1 }
    )
      .sort({ createdAt: -1 })
      .lean<{ createdAt: Date }>();
    return latest ? latest.createdAt : null;
  }
}
