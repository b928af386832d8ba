const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export function toWordSet(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(EDGE_PUNCTUATION, ""))
    .filter((word) => word.length > 0);
  return new Set(words);
}

/**
 * Shared-word ratio of two questions: |common words| / max(|words a|, |words b|).
 */
export function questionSimilarity(a: string, b: string): number {
  const wordsA = toWordSet(a);
  const wordsB = toWordSet(b);
  const denominator = Math.max(wordsA.size, wordsB.size);
  if (denominator === 0) {
    return 0;
  }
  let common = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) {
      common += 1;
    }
  }
  return common / denominator;
}

export function maxSimilarity(candidate: string, previous: ReadonlyArray<string>): number {
  return previous.reduce((max, item) => Math.max(max, questionSimilarity(candidate, item)), 0);
}

export function isTooSimilar(candidate: string, previous: ReadonlyArray<string>, cutoff: number): boolean {
  return previous.some((item) => questionSimilarity(candidate, item) >= cutoff);
}
