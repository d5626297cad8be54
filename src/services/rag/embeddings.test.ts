import { describe, expect, it, vi } from 'vitest';
import { EmbeddingError, TimeoutError } from '../knowledge/errors';
import { EmbeddingGenerator } from './embeddings';

describe('EmbeddingGenerator', () => {
  it('sends single-line text to the provider and returns its vector', async () => {
    const provider = vi.fn(async (_input: string, _signal: AbortSignal) => [0.1, 0.2]);
    const generator = new EmbeddingGenerator(provider, { timeoutMs: 1000 });

    await expect(generator.embed('hello\n world')).resolves.toEqual([0.1, 0.2]);
    expect(provider).toHaveBeenCalledTimes(1);
    expect(provider).toHaveBeenCalledWith('hello world', expect.any(AbortSignal));
  });

  it('rejects empty text without calling the provider', async () => {
    const provider = vi.fn(async (_input: string, _signal: AbortSignal) => [1]);
    const generator = new EmbeddingGenerator(provider, { timeoutMs: 1000 });

    await expect(generator.embed('  \n ')).rejects.toBeInstanceOf(EmbeddingError);
    expect(provider).not.toHaveBeenCalled();
  });

  it('wraps provider failures', async () => {
    const generator = new EmbeddingGenerator(
      async () => {
        throw new Error('boom');
      },
      { timeoutMs: 1000 }
    );

    await expect(generator.embed('text')).rejects.toThrow('Embedding request failed: boom');
  });

  it('times out slow requests and aborts them', async () => {
    let aborted = false;
    const generator = new EmbeddingGenerator(
      (_input, signal) =>
        new Promise<number[]>(() => {
          signal.addEventListener('abort', () => {
            aborted = true;
          });
        }),
      { timeoutMs: 10 }
    );

    await expect(generator.embed('slow')).rejects.toBeInstanceOf(TimeoutError);
    expect(aborted).toBe(true);
  });

  it('rejects empty vectors and unexpected dimensions', async () => {
    const empty = new EmbeddingGenerator(async () => [], { timeoutMs: 1000 });
    await expect(empty.embed('text')).rejects.toThrow('Embedding provider returned an empty vector');

    const short = new EmbeddingGenerator(async () => [1, 2], { timeoutMs: 1000, dimension: 3 });
    await expect(short.embed('text')).rejects.toThrow('Expected an embedding of dimension 3, got 2');
  });
});
