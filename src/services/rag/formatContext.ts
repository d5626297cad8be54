import type { RetrievedChunk, ServiceRecord } from '../knowledge/types';

const HEAVY_RULE = '='.repeat(60);
const LIGHT_RULE = '-'.repeat(40);

const PREAMBLE = 'RELEVANT BUSINESS INFORMATION (USE THIS TO ANSWER)';
const POSTAMBLE = [
  "IMPORTANT: Use the SPECIFIC information above to answer the customer's question.",
  'Cite the source document when you rely on it.',
  'Do NOT give generic responses when specific details are provided.',
];

export function formatPrice(service: Pick<ServiceRecord, 'price' | 'priceDisplay'>): string {
  if (service.priceDisplay) {
    return service.priceDisplay;
  }
  if (service.price) {
    return `$${service.price.toFixed(2)}`;
  }
  return 'Contact for pricing';
}

export function formatDuration(service: Pick<ServiceRecord, 'duration'>): string {
  if (!service.duration) {
    return 'Duration varies';
  }

  const hours = Math.floor(service.duration / 60);
  const minutes = service.duration % 60;

  if (hours > 0 && minutes > 0) {
    return `${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h`;
  }
  return `${minutes} min`;
}

export function formatServiceBlock(service: ServiceRecord): string {
  const lines = [HEAVY_RULE, 'SERVICE DETAILS', HEAVY_RULE, `Service: ${service.name}`];
  if (service.description) {
    lines.push(`Description: ${service.description}`);
  }
  lines.push(`Price: ${formatPrice(service)}`, `Duration: ${formatDuration(service)}`);
  return lines.join('\n');
}

export function formatProvenance(chunk: RetrievedChunk): string {
  const parts = [`Source: ${chunk.documentTitle} (${chunk.documentType})`];
  if (chunk.serviceName) {
    parts.push(`Service: ${chunk.serviceName}`);
  }
  parts.push(
    chunk.score.kind === 'vector' ? `Similarity: ${Math.round(chunk.score.similarity * 100)}%` : 'keyword match'
  );
  if (typeof chunk.metadata.pageNumber === 'number') {
    parts.push(`Page ${chunk.metadata.pageNumber}`);
  }
  return `[${parts.join(' | ')}]`;
}

/** Synthetic chunks index the question; the answer travels in metadata. */
export function formatChunkContent(chunk: RetrievedChunk): string {
  const { answer } = chunk.metadata;
  if (typeof answer === 'string' && answer.trim()) {
    return `Q: ${chunk.content.trim()}\nA: ${answer.trim()}`;
  }
  return chunk.content;
}

export function formatChunks(chunks: RetrievedChunk[]): string {
  if (chunks.length === 0) {
    return '';
  }

  const lines = [HEAVY_RULE, PREAMBLE, HEAVY_RULE];
  for (const chunk of chunks) {
    lines.push('', formatProvenance(chunk), formatChunkContent(chunk), LIGHT_RULE);
  }
  lines.push('', ...POSTAMBLE);

  return lines.join('\n');
}

export function assembleContext(service: ServiceRecord | null, chunks: RetrievedChunk[]): string {
  return [service ? formatServiceBlock(service) : '', formatChunks(chunks)].filter(Boolean).join('\n\n');
}
