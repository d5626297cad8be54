import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryBusinessCatalog, InMemoryKnowledgeStore } from '../knowledge/memoryStore';
import type { BusinessRecord } from '../knowledge/types';
import { FakeEmbedder } from '../../test/fakes';
import { DocumentIndexer } from './documentIndexer';
import { KnowledgeIndexer } from './knowledgeIndexer';

describe('KnowledgeIndexer', () => {
  let catalog: InMemoryBusinessCatalog;
  let store: InMemoryKnowledgeStore;
  let indexer: KnowledgeIndexer;
  let salon: BusinessRecord;

  beforeEach(() => {
    catalog = new InMemoryBusinessCatalog();
    store = new InMemoryKnowledgeStore(catalog);
    const embedder = new FakeEmbedder((text) => {
      if (text.includes('Broken')) {
        throw new Error('provider rejected input');
      }
      return [1, 0];
    });
    const documents = new DocumentIndexer({ store, catalog, embedder });
    indexer = new KnowledgeIndexer({ store, catalog, documents, batchSize: 1 });

    salon = catalog.addBusiness({
      id: 'biz-1',
      name: 'Acme Salon',
      businessProfile: { description: 'We cut hair.' },
      serviceCatalog: { Haircut: { price: 30, duration: 30 } },
      quickResponses: { 'What are your hours?': '9-5 Mon-Fri.' },
    });
    catalog.addService({ businessId: 'biz-1', name: 'Haircut', price: 30, duration: 30 });
  });

  it('generates and indexes documents for every field', async () => {
    const result = await indexer.indexBusiness('biz-1');

    expect(result.success).toBe(true);
    expect(result.updatedFields).toEqual([
      'business_profile',
      'service_catalog',
      'conversation_policies',
      'quick_responses',
      'contact_info',
      'ai_instructions',
    ]);
    expect(result.documentIds).toHaveLength(3);
    expect(result.indexedCount).toBe(9);
    expect(result.deletedCount).toBe(0);

    const titles = (await store.listDocuments('biz-1')).map((doc) => [doc.title, doc.indexingStatus]);
    expect(titles).toEqual([
      ['Business description', 'complete'],
      ['Service: Haircut', 'complete'],
      ['FAQ: What are your hours?', 'complete'],
    ]);
  });

  it('replaces the previous generation when run again', async () => {
    await indexer.indexBusiness('biz-1');
    const again = await indexer.indexBusiness('biz-1');

    expect(again.deletedDocuments).toBe(3);
    expect(again.deletedCount).toBe(9);
    expect(again.indexedCount).toBe(9);
    expect(await store.listDocuments('biz-1')).toHaveLength(3);
  });

  it('rebuilds only the updated fields', async () => {
    await indexer.indexBusiness('biz-1');
    catalog.addBusiness({
      ...salon,
      quickResponses: { 'Do you take walk-ins?': 'Yes, until 4pm.', 'Is there parking?': 'Behind the shop.' },
    });

    const result = await indexer.updateBusinessKnowledgeIncremental('biz-1', ['quick_responses']);

    expect(result.success).toBe(true);
    expect(result.updatedFields).toEqual(['quick_responses']);
    expect(result.deletedDocuments).toBe(1);
    expect(result.deletedCount).toBe(1);
    expect(result.indexedCount).toBe(2);

    const titles = (await store.listDocuments('biz-1')).map((doc) => doc.title);
    expect(titles).toEqual([
      'Business description',
      'Service: Haircut',
      'FAQ: Do you take walk-ins?',
      'FAQ: Is there parking?',
    ]);
  });

  it('links generated service documents to the catalog service', async () => {
    await indexer.indexBusiness('biz-1');
    const [service] = await catalog.listActiveServices('biz-1');
    const [document] = await store.listDocuments('biz-1', { sourceField: 'service_catalog' });

    expect(document?.relatedServiceId).toBe(service?.id);
  });

  it('ignores unknown field names', async () => {
    const result = await indexer.updateBusinessKnowledgeIncremental('biz-1', ['opening_hours']);
    expect(result.success).toBe(false);
    expect(result.message).toBe('No known knowledge fields to update');
  });

  it('reports a missing business', async () => {
    const result = await indexer.indexBusiness('missing');
    expect(result.success).toBe(false);
    expect(result.message).toBe('Business not found');
  });

  it('indexes every active business in batches and isolates failures', async () => {
    catalog.addBusiness({ id: 'biz-2', name: 'Broken Barbers', quickResponses: { 'Broken question?': 'x' } });
    catalog.addBusiness({ id: 'biz-3', name: 'Closed Spa', isActive: false });

    const summary = await indexer.indexAllBusinesses();

    expect(summary.success).toBe(true);
    expect(summary.totalBusinesses).toBe(2);
    expect(summary.successful).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.details.map((detail) => [detail.businessId, detail.success])).toEqual([
      ['biz-1', true],
      ['biz-2', false],
    ]);
    expect(await store.listDocuments('biz-3')).toEqual([]);
  });

  it('reports knowledge statistics', async () => {
    await indexer.indexBusiness('biz-1');

    expect(await indexer.getKnowledgeStats('biz-1')).toEqual({
      success: true,
      businessId: 'biz-1',
      activeDocuments: 3,
      activeChunks: 9,
      chunksByDocumentType: { general: 8, faq: 1 },
    });
  });

  it('reports indexing status across businesses', async () => {
    catalog.addBusiness({ id: 'biz-2', name: 'Quiet Spa' });
    await indexer.indexBusiness('biz-1');

    expect(await indexer.getIndexingStatus()).toEqual({
      success: true,
      totalActiveBusinesses: 2,
      indexedBusinesses: 1,
      notIndexed: 1,
      totalKnowledgeChunks: 9,
      averageChunksPerBusiness: 9,
    });
  });

  it('rebuilds knowledge only when the business changed after it was indexed', async () => {
    expect(await indexer.checkAndUpdateIfStale('biz-1', new Date())).toBe(false);
    expect(await store.listDocuments('biz-1')).toEqual([]);

    await indexer.indexBusiness('biz-1');
    const [before] = await store.listDocuments('biz-1');
    const latest = await store.getLatestChunkTime('biz-1');
    expect(latest).not.toBeNull();
    const indexedAt = latest ?? new Date();

    expect(await indexer.checkAndUpdateIfStale('biz-1', new Date(indexedAt.getTime() - 1000))).toBe(false);
    expect((await store.listDocuments('biz-1'))[0]?.id).toBe(before?.id);

    expect(await indexer.checkAndUpdateIfStale('biz-1', new Date(indexedAt.getTime() + 60_000))).toBe(true);
    const after = await store.listDocuments('biz-1');
    expect(after).toHaveLength(3);
    expect(after[0]?.id).not.toBe(before?.id);
  });

  it('deletes generated knowledge and keeps uploaded documents', async () => {
    await indexer.indexBusiness('biz-1');
    await store.createDocument({ businessId: 'biz-1', title: 'Uploaded', type: 'note', originalContent: 'x' });

    const result = await indexer.deleteBusinessKnowledge('biz-1');

    expect(result).toEqual({
      success: true,
      message: 'Deleted 9 knowledge chunks',
      businessId: 'biz-1',
      deletedDocuments: 3,
      deletedCount: 9,
    });
    expect((await store.listDocuments('biz-1')).map((doc) => doc.title)).toEqual(['Uploaded']);
  });
});
