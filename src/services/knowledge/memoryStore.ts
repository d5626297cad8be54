import { randomUUID } from 'node:crypto';
import { NotFoundError, ValidationError } from './errors';
import type { BusinessCatalog, DocumentListFilter, KnowledgeStore } from './knowledgeStore';
import { containsAnyKeyword, isSearchableDocument, rankByCosine, type ChunkHit } from './search';
import type {
  BusinessRecord,
  ChunkRecord,
  ChunkSearchScope,
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

/**
 * Process-local implementation of the store, used by tests and dry runs.
 * Records are copied in and out so callers never share state with the store.
 */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly chunks = new Map<string, ChunkRecord>();

  constructor(private readonly catalog?: BusinessCatalog) {}

  private insertDocument(input: NewDocumentInput, previousVersionId?: string): DocumentRecord {
    const now = new Date();
    const doc: DocumentRecord = {
      id: randomUUID(),
      businessId: input.businessId,
      title: input.title,
      type: input.type,
      originalContent: input.originalContent,
      filePath: input.filePath,
      originalFilename: input.originalFilename,
      fileSize: input.fileSize,
      indexingStatus: 'pending',
      relatedServiceId: input.relatedServiceId,
      previousVersionId,
      sourceField: input.sourceField,
      entries: input.entries ?? [],
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.documents.set(doc.id, structuredClone(doc));
    return doc;
  }

  private setActive(documentId: string, isActive: boolean): void {
    const doc = this.documents.get(documentId);
    if (doc) {
      doc.isActive = isActive;
      doc.updatedAt = new Date();
    }
    for (const chunk of this.chunks.values()) {
      if (chunk.documentId === documentId) {
        chunk.isActive = isActive;
        chunk.updatedAt = new Date();
      }
    }
  }

  private removeChunksOf(documentIds: Set<string>): number {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (documentIds.has(chunk.documentId)) {
        this.chunks.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  async createDocument(input: NewDocumentInput): Promise<DocumentRecord> {
    return this.insertDocument(input);
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    const doc = this.documents.get(documentId);
    return doc ? structuredClone(doc) : null;
  }

  async updateDocument(documentId: string, patch: DocumentPatch): Promise<DocumentRecord | null> {
    const doc = this.documents.get(documentId);
    if (!doc) {
      return null;
    }
    const { indexingError, ...rest } = patch;
    for (const [key, value] of Object.entries(rest)) {
      if (value !== undefined) {
        Object.assign(doc, { [key]: value });
      }
    }
    if (indexingError === null) {
      delete doc.indexingError;
    } else if (indexingError !== undefined) {
      doc.indexingError = indexingError;
    }
    doc.updatedAt = new Date();
    return structuredClone(doc);
  }

  async listDocuments(businessId: string, filter: DocumentListFilter = {}): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter(
        (doc) =>
          doc.businessId === businessId &&
          (!filter.activeOnly || doc.isActive) &&
          (!filter.type || doc.type === filter.type) &&
          (!filter.sourceField || doc.sourceField === filter.sourceField) &&
          (!filter.serviceId || doc.relatedServiceId === filter.serviceId)
      )
      .map((doc) => structuredClone(doc));
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    this.removeChunksOf(new Set([documentId]));
    return this.documents.delete(documentId);
  }

  async deactivateDocument(documentId: string): Promise<DocumentRecord | null> {
    if (!this.documents.has(documentId)) {
      return null;
    }
    this.setActive(documentId, false);
    return this.getDocument(documentId);
  }

  async listChunks(documentId: string, options: { activeOnly?: boolean } = {}): Promise<ChunkRecord[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.documentId === documentId && (!options.activeOnly || chunk.isActive))
      .sort((a, b) => a.chunkIndex - b.chunkIndex)
      .map((chunk) => structuredClone(chunk));
  }

  async deleteChunks(documentId: string): Promise<number> {
    return this.removeChunksOf(new Set([documentId]));
  }

  async replaceChunks(documentId: string, chunks: NewChunkInput[]): Promise<number> {
    const doc = this.documents.get(documentId);
    if (!doc) {
      throw new NotFoundError(`Document not found: ${documentId}`);
    }
    const removed = this.removeChunksOf(new Set([documentId]));
    const now = new Date();
    for (const chunk of chunks) {
      const record: ChunkRecord = {
        id: randomUUID(),
        documentId,
        businessId: doc.businessId,
        content: chunk.content,
        embedding: [...chunk.embedding],
        chunkIndex: chunk.chunkIndex,
        metadata: structuredClone(chunk.metadata),
        isActive: doc.isActive,
        createdAt: now,
        updatedAt: now,
      };
      this.chunks.set(record.id, record);
    }
    return removed;
  }

  async createVersion(documentId: string, input: VersionInput): Promise<DocumentRecord> {
    const current = this.documents.get(documentId);
    if (!current) {
      throw new NotFoundError(`Document not found: ${documentId}`);
    }
    if (!current.isActive) {
      throw new ValidationError('Document is not the current version');
    }
    this.setActive(documentId, false);
    return this.insertDocument(
      {
        businessId: current.businessId,
        title: input.title ?? current.title,
        type: current.type,
        originalContent: input.content,
        filePath: current.filePath,
        originalFilename: current.originalFilename,
        fileSize: input.fileSize ?? current.fileSize,
        relatedServiceId: current.relatedServiceId,
      },
      current.id
    );
  }

  async revert(documentId: string): Promise<DocumentRecord> {
    const current = this.documents.get(documentId);
    if (!current) {
      throw new NotFoundError(`Document not found: ${documentId}`);
    }
    if (!current.isActive) {
      throw new ValidationError('Document is not the current version');
    }
    if (!current.previousVersionId) {
      throw new NotFoundError('No previous version exists');
    }
    const previous = this.documents.get(current.previousVersionId);
    if (!previous) {
      throw new NotFoundError('Previous version not found');
    }
    this.setActive(current.id, false);
    this.setActive(previous.id, true);
    return structuredClone(previous);
  }

  async replaceFieldDocuments(
    businessId: string,
    fields: KnowledgeField[],
    documents: NewDocumentInput[]
  ): Promise<{ deletedDocuments: number; deletedChunks: number; created: DocumentRecord[] }> {
    const stale = new Set<string>();
    for (const doc of this.documents.values()) {
      if (doc.businessId === businessId && doc.sourceField && fields.includes(doc.sourceField)) {
        stale.add(doc.id);
      }
    }

    const deletedChunks = this.removeChunksOf(stale);
    for (const id of stale) {
      this.documents.delete(id);
    }

    return {
      deletedDocuments: stale.size,
      deletedChunks,
      created: documents.map((input) => this.insertDocument(input)),
    };
  }

  private async searchableHits(scope: ChunkSearchScope): Promise<Array<ChunkHit & { embedding: number[] }>> {
    const serviceNames = new Map<string, string>();
    const hits: Array<ChunkHit & { embedding: number[] }> = [];

    for (const chunk of this.chunks.values()) {
      const doc = this.documents.get(chunk.documentId);
      if (!chunk.isActive || chunk.businessId !== scope.businessId || !doc || !isSearchableDocument(doc, scope)) {
        continue;
      }

      let serviceName: string | undefined;
      if (doc.relatedServiceId) {
        serviceName = serviceNames.get(doc.relatedServiceId);
        if (serviceName === undefined && this.catalog) {
          serviceName = (await this.catalog.getService(doc.relatedServiceId))?.name;
          if (serviceName !== undefined) {
            serviceNames.set(doc.relatedServiceId, serviceName);
          }
        }
      }

      hits.push({
        chunkId: chunk.id,
        documentId: doc.id,
        content: chunk.content,
        documentTitle: doc.title,
        documentType: doc.type,
        serviceName,
        metadata: structuredClone(chunk.metadata),
        embedding: chunk.embedding,
      });
    }

    return hits;
  }

  async searchByVector(query: VectorSearchQuery): Promise<RetrievedChunk[]> {
    const hits = await this.searchableHits(query);
    return rankByCosine(hits, query.embedding, query.threshold, query.limit);
  }

  async searchByKeywords(query: KeywordSearchQuery): Promise<RetrievedChunk[]> {
    if (query.keywords.length === 0) {
      return [];
    }
    const hits = await this.searchableHits(query);
    return hits
      .filter((hit) => containsAnyKeyword(hit.content, query.keywords))
      .slice(0, query.limit)
      .map(({ embedding: _embedding, ...hit }): RetrievedChunk => ({ ...hit, score: { kind: 'keyword' } }));
  }

  async getStats(businessId: string): Promise<KnowledgeStats> {
    const activeDocs = [...this.documents.values()].filter((doc) => doc.businessId === businessId && doc.isActive);
    const typeById = new Map(activeDocs.map((doc) => [doc.id, doc.type]));

    const chunksByDocumentType: Partial<Record<DocumentType, number>> = {};
    let activeChunks = 0;
    for (const chunk of this.chunks.values()) {
      const type = typeById.get(chunk.documentId);
      if (!chunk.isActive || !type) {
        continue;
      }
      activeChunks += 1;
      chunksByDocumentType[type] = (chunksByDocumentType[type] ?? 0) + 1;
    }

    return { businessId, activeDocuments: activeDocs.length, activeChunks, chunksByDocumentType };
  }

  async getIndexingTotals(): Promise<IndexingTotals> {
    const active = [...this.chunks.values()].filter((chunk) => chunk.isActive);
    return {
      indexedBusinesses: new Set(active.map((chunk) => chunk.businessId)).size,
      activeChunks: active.length,
    };
  }

  async getLatestChunkTime(businessId: string): Promise<Date | null> {
    let latest: Date | null = null;
    for (const chunk of this.chunks.values()) {
      if (chunk.isActive && chunk.businessId === businessId && (!latest || chunk.createdAt > latest)) {
        latest = chunk.createdAt;
      }
    }
    return latest ? new Date(latest) : null;
  }
}

export class InMemoryBusinessCatalog implements BusinessCatalog {
  private readonly businesses = new Map<string, BusinessRecord>();
  private readonly services = new Map<string, ServiceRecord>();

  addBusiness(business: Partial<BusinessRecord> & Pick<BusinessRecord, 'name'>): BusinessRecord {
    const record: BusinessRecord = {
      id: business.id ?? randomUUID(),
      name: business.name,
      isActive: business.isActive ?? true,
      businessProfile: business.businessProfile ?? {},
      serviceCatalog: business.serviceCatalog ?? {},
      conversationPolicies: business.conversationPolicies ?? {},
      quickResponses: business.quickResponses ?? {},
      contactInfo: business.contactInfo ?? {},
      aiInstructions: business.aiInstructions ?? '',
    };
    this.businesses.set(record.id, record);
    return structuredClone(record);
  }

  addService(service: Omit<ServiceRecord, 'id' | 'isActive' | 'displayOrder'> & Partial<ServiceRecord>): ServiceRecord {
    const record: ServiceRecord = {
      ...service,
      id: service.id ?? randomUUID(),
      isActive: service.isActive ?? true,
      displayOrder: service.displayOrder ?? 0,
    };
    this.services.set(record.id, record);
    return structuredClone(record);
  }

  async getBusiness(businessId: string): Promise<BusinessRecord | null> {
    const business = this.businesses.get(businessId);
    return business ? structuredClone(business) : null;
  }

  async listActiveBusinesses(options: { skip: number; limit: number }): Promise<BusinessRecord[]> {
    return [...this.businesses.values()]
      .filter((business) => business.isActive)
      .slice(options.skip, options.skip + options.limit)
      .map((business) => structuredClone(business));
  }

  async countActiveBusinesses(): Promise<number> {
    return [...this.businesses.values()].filter((business) => business.isActive).length;
  }

  async listActiveServices(businessId: string): Promise<ServiceRecord[]> {
    return [...this.services.values()]
      .filter((service) => service.businessId === businessId && service.isActive)
      .sort((a, b) => a.displayOrder - b.displayOrder || a.name.localeCompare(b.name))
      .map((service) => structuredClone(service));
  }

  async getService(serviceId: string): Promise<ServiceRecord | null> {
    const service = this.services.get(serviceId);
    return service ? structuredClone(service) : null;
  }
}
