import { cosineSimilarity } from '../rag/textUtils';
import type { ChunkSearchScope, DocumentType, RetrievedChunk } from './types';

export type ChunkHit = Omit<RetrievedChunk, 'score'>;

export interface VectorCandidate extends ChunkHit {
  embedding: number[];
}

/** Generic knowledge (no related service) is never excluded by service scoping. */
export function isInServiceScope(relatedServiceId: string | undefined, serviceId: string | undefined): boolean {
  return !serviceId || !relatedServiceId || relatedServiceId === serviceId;
}

export function isSearchableDocument(
  document: { isActive: boolean; indexingStatus: string; type: DocumentType; relatedServiceId?: string },
  scope: Pick<ChunkSearchScope, 'serviceId' | 'documentType'>
): boolean {
  return (
    document.isActive &&
    document.indexingStatus === 'complete' &&
    (!scope.documentType || document.type === scope.documentType) &&
    isInServiceScope(document.relatedServiceId, scope.serviceId)
  );
}

/**
 * Keeps candidates strictly above the threshold, highest similarity first.
 * Equal scores keep their candidate order.
 */
export function rankByCosine(
  candidates: VectorCandidate[],
  queryEmbedding: number[],
  threshold: number,
  limit: number
): RetrievedChunk[] {
  const scored: Array<{ hit: ChunkHit; similarity: number }> = [];
  for (const { embedding, ...hit } of candidates) {
    const similarity = cosineSimilarity(queryEmbedding, embedding);
    if (similarity > threshold) {
      scored.push({ hit, similarity });
    }
  }

  return scored
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, limit)
    .map(({ hit, similarity }): RetrievedChunk => ({ ...hit, score: { kind: 'vector', similarity } }));
}

export function containsAnyKeyword(content: string, keywords: string[]): boolean {
  const haystack = content.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}
