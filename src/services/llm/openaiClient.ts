import OpenAI from 'openai';
import { env, requireOpenAiKey } from '../../config/env';

let cachedClient: OpenAI | null = null;

function getClient(): OpenAI {
  if (!cachedClient) {
    cachedClient = new OpenAI({
      apiKey: requireOpenAiKey(),
      baseURL: env.OPENAI_BASE_URL,
      timeout: env.EMBEDDING_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  return cachedClient;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryableError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}

async function withRetry<T>(fn: () => Promise<T>, maxRetries: number, signal?: AbortSignal): Promise<T> {
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (attempt > maxRetries || signal?.aborted || !isRetryableError(error)) {
        throw error;
      }
      const backoffMs = 1000 * Math.pow(2, attempt - 1);
      await sleep(backoffMs);
    }
  }
}

function supportsDimensions(model: string): boolean {
  return model.startsWith('text-embedding-3');
}

/**
 * One embeddings round-trip for a single input.
 */
export async function createEmbedding(input: string, signal?: AbortSignal): Promise<number[]> {
  const model = env.EMBEDDING_MODEL;
  const response = await withRetry(
    () =>
      getClient().embeddings.create(
        {
          model,
          input: [input],
          ...(supportsDimensions(model) ? { dimensions: env.EMBEDDING_DIMENSION } : {}),
        },
        { signal }
      ),
    env.EMBEDDING_MAX_RETRIES,
    signal
  );

  return response.data[0]?.embedding ?? [];
}
