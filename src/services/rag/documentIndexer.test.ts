import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryBusinessCatalog, InMemoryKnowledgeStore } from '../knowledge/memoryStore';
import { FakeEmbedder } from '../../test/fakes';
import { DocumentIndexer } from './documentIndexer';
import type { ExtractedText } from './pdfText';

const twoPages: ExtractedText = {
  text: 'Page one text.\n\nPage two text.',
  pageCount: 2,
  pages: [
    { pageNumber: 1, text: 'Page one text.' },
    { pageNumber: 2, text: 'Page two text.' },
  ],
};

describe('DocumentIndexer', () => {
  let catalog: InMemoryBusinessCatalog;
  let store: InMemoryKnowledgeStore;
  let embedder: FakeEmbedder;
  let indexer: DocumentIndexer;
  let extracted: ExtractedText;

  beforeEach(() => {
    catalog = new InMemoryBusinessCatalog();
    catalog.addBusiness({ id: 'biz-1', name: 'Acme Salon' });
    store = new InMemoryKnowledgeStore(catalog);
    embedder = new FakeEmbedder((text) => {
      if (text.includes('bad')) {
        throw new Error('provider rejected input');
      }
      return [1, 0];
    });
    extracted = twoPages;
    indexer = new DocumentIndexer({
      store,
      catalog,
      embedder,
      extractPdf: async () => extracted,
      chunker: { chunkSize: 200, chunkOverlap: 20, boundaryWindow: 50 },
    });
  });

  it('creates a note and indexes it to complete', async () => {
    const result = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Parking',
      type: 'note',
      content: 'Free parking is available behind the building.',
    });

    expect(result.success).toBe(true);
    expect(result.indexedCount).toBe(1);

    const documentId = result.documentId ?? '';
    const document = await store.getDocument(documentId);
    expect(document?.indexingStatus).toBe('complete');
    expect(document?.indexedAt).toBeInstanceOf(Date);
    expect(document?.fileSize).toBe(46);

    const chunks = await indexer.listDocumentChunks(documentId);
    expect(chunks.map((chunk) => [chunk.content, chunk.chunkIndex, chunk.embedding])).toEqual([
      ['Free parking is available behind the building.', 0, [1, 0]],
    ]);
  });

  it('rejects a text document without content', async () => {
    const result = await indexer.createAndIndexDocument({ businessId: 'biz-1', title: 'Empty', type: 'note' });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Invalid document payload');
    expect(result.errors?.content).toEqual(['Either text content or PDF bytes are required']);
    expect(await store.listDocuments('biz-1')).toEqual([]);
  });

  it('rejects a related service from another business', async () => {
    const other = catalog.addService({ businessId: 'biz-2', name: 'Massage' });
    const result = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Prep',
      type: 'guide',
      content: 'Arrive early.',
      relatedServiceId: other.id,
    });

    expect(result).toEqual({
      success: false,
      message: 'Related service not found for this business',
      indexedCount: 0,
    });
  });

  it('extracts PDFs page by page and records the text', async () => {
    const result = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Menu',
      type: 'pdf',
      fileBytes: new Uint8Array([1, 2, 3]),
    });

    expect(result.success).toBe(true);
    const documentId = result.documentId ?? '';
    const document = await store.getDocument(documentId);
    expect(document?.originalContent).toBe('Page one text.\n\nPage two text.');
    expect(document?.pageCount).toBe(2);
    expect(document?.fileSize).toBe(3);

    const chunks = await store.listChunks(documentId);
    expect(chunks.map((chunk) => [chunk.content, chunk.metadata.pageNumber])).toEqual([
      ['Page one text.', 1],
      ['Page two text.', 2],
    ]);
  });

  it('fails a PDF without a text layer', async () => {
    extracted = { text: '', pageCount: 1, pages: [] };
    const result = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Scan',
      type: 'pdf',
      fileBytes: new Uint8Array([1]),
    });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Indexing failed: No text content found in document');
    const document = await store.getDocument(result.documentId ?? '');
    expect(document?.indexingStatus).toBe('failed');
    expect(document?.indexingError).toBe('No text content found in document');
  });

  it('embeds one chunk per question and skips failed embeddings', async () => {
    const document = await store.createDocument({
      businessId: 'biz-1',
      title: 'FAQ: Hours',
      type: 'faq',
      originalContent: '',
      entries: [
        { question: 'What are your hours?', answer: '9-5 Mon-Fri.', metadata: { kind: 'hours' } },
        { question: 'A bad question', answer: 'Never embedded.' },
      ],
    });

    const result = await indexer.indexDocument(document.id);

    expect(result).toEqual({
      success: true,
      message: 'Indexed 1 chunks',
      documentId: document.id,
      indexedCount: 1,
      skippedCount: 1,
    });
    const [chunk, ...rest] = await store.listChunks(document.id);
    expect(rest).toEqual([]);
    expect(chunk?.content).toBe('What are your hours?');
    expect(chunk?.metadata).toEqual({ kind: 'hours', question: 'What are your hours?', answer: '9-5 Mon-Fri.' });
  });

  it('fails when no chunk could be embedded', async () => {
    const document = await store.createDocument({
      businessId: 'biz-1',
      title: 'Broken',
      type: 'note',
      originalContent: 'A bad paragraph.',
    });

    const result = await indexer.indexDocument(document.id);

    expect(result.success).toBe(false);
    expect(result.message).toBe('Indexing failed: No chunks could be embedded');
    expect((await store.getDocument(document.id))?.indexingStatus).toBe('failed');
    expect(await store.listChunks(document.id)).toEqual([]);
  });

  it('clears a previous failure when indexing succeeds', async () => {
    const document = await store.createDocument({
      businessId: 'biz-1',
      title: 'Notes',
      type: 'note',
      originalContent: 'Good text.',
    });
    await store.updateDocument(document.id, { indexingStatus: 'failed', indexingError: 'old failure' });

    await indexer.indexDocument(document.id);

    const stored = await store.getDocument(document.id);
    expect(stored?.indexingStatus).toBe('complete');
    expect(stored?.indexingError).toBeUndefined();
  });

  it('reports a missing document', async () => {
    const result = await indexer.indexDocument('missing');
    expect(result.success).toBe(false);
    expect(result.message).toBe('Document not found');
  });

  it('reindexes by dropping the old chunks first', async () => {
    const created = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Notes',
      type: 'note',
      content: 'Some text.',
    });
    const documentId = created.documentId ?? '';

    const result = await indexer.reindexDocument(documentId);

    expect(result.success).toBe(true);
    expect(result.deletedCount).toBe(1);
    expect(result.indexedCount).toBe(1);
    expect(await store.listChunks(documentId)).toHaveLength(1);
  });

  it('serializes concurrent passes over the same document', async () => {
    const document = await store.createDocument({
      businessId: 'biz-1',
      title: 'Notes',
      type: 'note',
      originalContent: 'Some text.',
    });

    const first = indexer.indexDocument(document.id);
    const second = indexer.indexDocument(document.id);
    expect(indexer.isIndexing(document.id)).toBe(true);

    const results = await Promise.all([first, second]);
    expect(results.map((result) => result.success)).toEqual([true, true]);
    expect(await store.listChunks(document.id)).toHaveLength(1);
  });

  it('versions a document and reverts to the original', async () => {
    const created = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Policy',
      type: 'policy',
      content: 'Cancel 24 hours ahead.',
    });
    const originalId = created.documentId ?? '';

    const version = await indexer.updateDocumentVersion(originalId, { content: 'Cancel 48 hours ahead.' });
    expect(version.success).toBe(true);
    expect(version.oldDocumentId).toBe(originalId);
    const newId = version.newDocumentId ?? '';

    const newDocument = await store.getDocument(newId);
    expect(newDocument?.previousVersionId).toBe(originalId);
    expect(newDocument?.indexingStatus).toBe('complete');
    expect((await store.getDocument(originalId))?.isActive).toBe(false);
    expect(await store.listChunks(originalId, { activeOnly: true })).toEqual([]);

    const reverted = await indexer.revertDocumentVersion(newId);
    expect(reverted).toEqual({
      success: true,
      message: 'Reverted to previous version',
      currentDocumentId: newId,
      revertedToDocumentId: originalId,
    });
    expect((await store.getDocument(originalId))?.isActive).toBe(true);
    expect(await indexer.listDocumentChunks(originalId)).toHaveLength(1);
    expect(await indexer.listDocumentChunks(newId)).toEqual([]);
  });

  it('keeps one active version when the same document is versioned twice at once', async () => {
    const created = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Notes',
      type: 'note',
      content: 'v1 text.',
    });
    const originalId = created.documentId ?? '';

    const [first, second] = await Promise.all([
      indexer.updateDocumentVersion(originalId, { content: 'v2 text.' }),
      indexer.updateDocumentVersion(originalId, { content: 'v3 text.' }),
    ]);

    expect(first.success).toBe(true);
    expect(second).toEqual({
      success: false,
      message: 'Failed to create new version: Document is not the current version',
      oldDocumentId: originalId,
      indexedCount: 0,
    });
    const active = await store.listDocuments('biz-1', { activeOnly: true });
    expect(active.map((doc) => doc.originalContent)).toEqual(['v2 text.']);
  });

  it('refuses to version or revert a superseded document', async () => {
    const created = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Notes',
      type: 'note',
      content: 'v1 text.',
    });
    const originalId = created.documentId ?? '';
    const version = await indexer.updateDocumentVersion(originalId, { content: 'v2 text.' });
    const staleId = version.newDocumentId ?? '';
    expect((await indexer.revertDocumentVersion(staleId)).success).toBe(true);

    const update = await indexer.updateDocumentVersion(staleId, { content: 'v3 text.' });
    expect(update.success).toBe(false);
    expect(update.message).toBe('Failed to create new version: Document is not the current version');

    const revert = await indexer.revertDocumentVersion(staleId);
    expect(revert).toEqual({
      success: false,
      message: 'Document is not the current version',
      currentDocumentId: staleId,
    });

    const active = await store.listDocuments('biz-1', { activeOnly: true });
    expect(active.map((doc) => doc.originalContent)).toEqual(['v1 text.']);
  });

  it('rejects a version without content and leaves the live version searchable', async () => {
    const created = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Parking',
      type: 'note',
      content: 'Free parking behind the building.',
    });
    const documentId = created.documentId ?? '';

    const empty = await indexer.updateDocumentVersion(documentId, {});
    expect(empty.success).toBe(false);
    expect(empty.message).toBe('Invalid version payload');
    expect(empty.errors?.content).toEqual(['Either text content or PDF bytes are required']);

    const blank = await indexer.updateDocumentVersion(documentId, { content: '   ' });
    expect(blank.success).toBe(false);

    const bytesForNote = await indexer.updateDocumentVersion(documentId, { fileBytes: new Uint8Array([1, 2, 3]) });
    expect(bytesForNote.message).toBe(
      'Failed to create new version: Text content is required for this document type'
    );

    const live = await store.getDocument(documentId);
    expect(live?.isActive).toBe(true);
    expect(live?.indexingStatus).toBe('complete');
    expect(await store.listDocuments('biz-1')).toHaveLength(1);
  });

  it('versions a PDF from new bytes alone', async () => {
    const created = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Menu',
      type: 'pdf',
      fileBytes: new Uint8Array([1]),
    });

    const version = await indexer.updateDocumentVersion(created.documentId ?? '', {
      fileBytes: new Uint8Array([2]),
    });

    expect(version.success).toBe(true);
    expect(version.indexedCount).toBe(2);
  });

  it('reports version operations on unknown documents as failures', async () => {
    const version = await indexer.updateDocumentVersion('missing', { content: 'x' });
    expect(version.success).toBe(false);
    expect(version.message).toBe('Failed to create new version: Document not found: missing');

    const reverted = await indexer.revertDocumentVersion('missing');
    expect(reverted).toEqual({
      success: false,
      message: 'Document not found: missing',
      currentDocumentId: 'missing',
    });
  });

  it('soft deletes by deactivating and hard deletes by removing', async () => {
    const created = await indexer.createAndIndexDocument({
      businessId: 'biz-1',
      title: 'Notes',
      type: 'note',
      content: 'Some text.',
    });
    const documentId = created.documentId ?? '';

    expect((await indexer.deleteDocument(documentId)).message).toBe('Document deactivated');
    expect((await store.getDocument(documentId))?.isActive).toBe(false);
    expect(await indexer.listDocumentChunks(documentId, { activeOnly: false })).toHaveLength(1);

    expect((await indexer.deleteDocument(documentId, { hard: true })).message).toBe('Document deleted');
    expect(await store.getDocument(documentId)).toBeNull();
    expect(await store.listChunks(documentId)).toEqual([]);

    expect(await indexer.deleteDocument(documentId, { hard: true })).toEqual({
      success: false,
      message: 'Document not found',
      documentId,
    });
  });
});
