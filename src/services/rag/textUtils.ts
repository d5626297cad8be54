const KEYWORD_STOP_WORDS = new Set([
  'what',
  'is',
  'your',
  'the',
  'about',
  'do',
  'you',
  'have',
  'a',
  'an',
  'my',
  'can',
  'how',
  'where',
  'when',
  'who',
  'does',
  'are',
  'will',
  'would',
  'could',
  'should',
]);

const KEYWORD_MIN_LENGTH = 3;

export function normalizeText(input: string): string {
  return input
    .replace(/\r\n/g, '\n')
    .replace(/\u3000/g, ' ')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Single-line form sent to the embedding model. */
export function collapseWhitespace(input: string): string {
  return input.replace(/\s*\n\s*/g, ' ').trim();
}

/**
 * Keywords for the substring fallback: lowercased, punctuation stripped, stop
 * words and tokens shorter than three characters dropped, first occurrence kept.
 */
export function extractKeywords(query: string): string[] {
  const words = query
    .toLowerCase()
    .replace(/[?!.,;:"()]/g, ' ')
    .split(/\s+/)
    .filter(Boolean);

  const uniq = new Set<string>();
  for (const word of words) {
    if (word.length >= KEYWORD_MIN_LENGTH && !KEYWORD_STOP_WORDS.has(word)) {
      uniq.add(word);
    }
  }
  return [...uniq];
}

export function cosineSimilarity(vectorA: number[], vectorB: number[]): number {
  if (vectorA.length === 0 || vectorB.length === 0 || vectorA.length !== vectorB.length) {
    return 0;
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < vectorA.length; i += 1) {
    const a = vectorA[i];
    const b = vectorB[i];
    dot += a * b;
    magA += a * a;
    magB += b * b;
  }

  if (magA === 0 || magB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

export function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function stripExt(fileName: string): string {
  return fileName.replace(/\.[^/.]+$/, '');
}

/** `cancellation_policy` → `cancellation policy` */
export function humanizeKey(key: string): string {
  return key.replace(/_/g, ' ').trim();
}
