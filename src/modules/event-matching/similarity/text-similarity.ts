import stopwordList from './stopwords.json';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export const DAY_MS = 24 * 60 * 60 * 1000;

// ============ Normalization ============

/** Lower-case, strip punctuation, collapse whitespace. */
export function normalizeTitle(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Normalized words with stopwords removed, in order of appearance. */
export function tokenize(text: string): string[] {
  return normalizeTitle(text)
    .split(' ')
    .filter((token) => token.length > 0 && !STOPWORDS.has(token));
}

// ============ String Distance ============

/**
 * Levenshtein (edit) distance, single-row dynamic programming.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Keep the shorter string in the row
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  let prevRow = Array.from({ length: short.length + 1 }, (_, i) => i);

  for (let j = 1; j <= long.length; j++) {
    const currRow = [j];
    for (let i = 1; i <= short.length; i++) {
      const cost = short[i - 1] === long[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1, // deletion
        (currRow[i - 1] ?? 0) + 1, // insertion
        (prevRow[i - 1] ?? 0) + cost, // substitution
      );
    }
    prevRow = currRow;
  }

  return prevRow[short.length] ?? 0;
}

/** 1 - distance / longer length. Identical non-empty strings score 1, an empty one scores 0. */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  if (a === b) return 1;

  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

// ============ Set / Vector Similarity ============

/** |A ∩ B| / |A ∪ B|; 0 when both sets are empty. */
export function jaccardSimilarity<T>(
  setA: ReadonlySet<T>,
  setB: ReadonlySet<T>,
): number {
  if (setA.size === 0 && setB.size === 0) return 0;

  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }
  return intersection / (setA.size + setB.size - intersection);
}

/** Cosine similarity of term-frequency vectors. */
export function termFrequencyCosine(
  tokensA: readonly string[],
  tokensB: readonly string[],
): number {
  const countsA = countTerms(tokensA);
  const countsB = countTerms(tokensB);

  let dot = 0;
  for (const [term, count] of countsA) {
    dot += count * (countsB.get(term) ?? 0);
  }
  const norm = (counts: Map<string, number>): number =>
    Math.sqrt([...counts.values()].reduce((sum, c) => sum + c * c, 0));
  const denominator = norm(countsA) * norm(countsB);

  return denominator === 0 ? 0 : dot / denominator;
}

function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

// ============ Dates ============

/**
 * Whole days between two instants, ignoring direction.
 * Null when either date is invalid.
 */
export function wholeDaysBetween(a: Date, b: Date): number | null {
  const diff = a.getTime() - b.getTime();
  if (Number.isNaN(diff)) return null;
  return Math.floor(Math.abs(diff) / DAY_MS);
}
