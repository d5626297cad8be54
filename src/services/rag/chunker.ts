import { env } from '../../config/env';
import type { ChunkMetadata } from '../knowledge/types';

const SENTENCE_BOUNDARIES = new Set(['.', '!', '?', '\n']);

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** How far back from the budget edge to look for a sentence boundary. */
  boundaryWindow: number;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface TextChunk {
  content: string;
  index: number;
  metadata: ChunkMetadata;
}

export function defaultChunkerOptions(): ChunkerOptions {
  return {
    chunkSize: env.RAG_CHUNK_SIZE,
    chunkOverlap: env.RAG_CHUNK_OVERLAP,
    boundaryWindow: env.RAG_BOUNDARY_WINDOW,
  };
}

/**
 * Splits text into overlapping pieces of at most `chunkSize` characters,
 * ending each piece just after the last sentence boundary found within
 * `boundaryWindow` characters of the budget edge, or at the edge itself.
 */
export function splitText(text: string, options: ChunkerOptions = defaultChunkerOptions()): string[] {
  const source = text.trim();
  if (!source) {
    return [];
  }

  const { chunkSize, chunkOverlap, boundaryWindow } = options;
  if (source.length <= chunkSize) {
    return [source];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < source.length) {
    let end = Math.min(start + chunkSize, source.length);

    if (end < source.length) {
      const floor = Math.max(end - boundaryWindow, start);
      for (let i = end - 1; i >= floor; i -= 1) {
        if (SENTENCE_BOUNDARIES.has(source[i])) {
          end = i + 1;
          break;
        }
      }
    }

    const chunk = source.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }

    if (end >= source.length) {
      break;
    }

    const next = end - chunkOverlap;
    start = next > start ? next : end;
  }

  return chunks;
}

/**
 * Chunks a document's text. With page structure (extracted PDFs), each page
 * is chunked on its own and every chunk carries its page number; indexes keep
 * counting across pages.
 */
export function chunkText(
  text: string,
  pages?: PageText[],
  options: ChunkerOptions = defaultChunkerOptions()
): TextChunk[] {
  if (!pages || pages.length === 0) {
    return splitText(text, options).map((content, index) => ({ content, index, metadata: {} }));
  }

  const chunks: TextChunk[] = [];
  let index = 0;

  for (const page of pages) {
    for (const content of splitText(page.text, options)) {
      chunks.push({ content, index, metadata: { pageNumber: page.pageNumber } });
      index += 1;
    }
  }

  return chunks;
}
