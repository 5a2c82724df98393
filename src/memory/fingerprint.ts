/**
 * Goal fingerprints and token-set similarity
 */

import { createHash } from 'crypto';

const STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'and', 'or', 'to', 'of', 'in', 'on', 'for', 'with', 'at', 'by',
  'from', 'into', 'is', 'are', 'be', 'it', 'this', 'that', 'my', 'me', 'please', 'then',
]);

/**
 * Lowercased content words of a goal, de-duplicated and sorted
 */
export function goalTokens(goal: string): string[] {
  const words = goal
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 0 && !STOP_WORDS.has(w));
  return Array.from(new Set(words)).sort();
}

/**
 * Stable fingerprint: goals with the same content words share it
 * regardless of order, case or punctuation.
 */
export function fingerprint(goal: string): string {
  return createHash('sha256').update(goalTokens(goal).join(' ')).digest('hex').slice(0, 32);
}

/**
 * Jaccard similarity of two token sets (1 = same words)
 */
export function tokenSimilarity(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 && b.length === 0) return 1;
  const setB = new Set(b);
  const intersection = a.filter((t) => setB.has(t)).length;
  const union = new Set([...a, ...b]).size;
  return union === 0 ? 0 : intersection / union;
}
