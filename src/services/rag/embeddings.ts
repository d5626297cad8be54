import { env } from '../../config/env';
import { EmbeddingError, TimeoutError, getErrorMessage } from '../knowledge/errors';
import { createEmbedding } from '../llm/openaiClient';
import { withDeadline } from './concurrency';
import { collapseWhitespace } from './textUtils';

/** A single external embedding round-trip. Must honour the abort signal. */
export type EmbeddingProvider = (input: string, signal: AbortSignal) => Promise<number[]>;

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface EmbeddingGeneratorOptions {
  timeoutMs: number;
  /** When set, vectors of any other length are rejected. */
  dimension?: number;
}

/**
 * Turns text into a vector through the external model. Stateless: callers
 * that need a concurrency cap enforce it themselves.
 */
export class EmbeddingGenerator implements Embedder {
  constructor(
    private readonly provider: EmbeddingProvider = createEmbedding,
    private readonly options: EmbeddingGeneratorOptions = { timeoutMs: env.EMBEDDING_TIMEOUT_MS }
  ) {}

  async embed(text: string): Promise<number[]> {
    const input = collapseWhitespace(text);
    if (!input) {
      throw new EmbeddingError('Cannot generate embedding for empty text');
    }

    let vector: number[];
    try {
      vector = await withDeadline(
        (signal) => this.provider(input, signal),
        this.options.timeoutMs,
        'Embedding request'
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        console.error(`[rag:embed] timeout after ${error.timeoutMs}ms for: ${input.slice(0, 50)}...`);
        throw error;
      }
      throw new EmbeddingError(`Embedding request failed: ${getErrorMessage(error)}`, error);
    }

    if (vector.length === 0) {
      throw new EmbeddingError('Embedding provider returned an empty vector');
    }
    const { dimension } = this.options;
    if (dimension !== undefined && vector.length !== dimension) {
      throw new EmbeddingError(`Expected an embedding of dimension ${dimension}, got ${vector.length}`);
    }

    return vector;
  }
}
