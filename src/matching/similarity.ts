import { distance } from 'fastest-levenshtein';

/** 1 - editDistance / longerLength; 1 for identical strings, 0 when either is empty. */
export function levenshteinRatio(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a === b) return 1;
  const maxLength = Math.max(a.length, b.length);
  return Math.max(0, 1 - distance(a, b) / maxLength);
}

/** Dice coefficient over distinct tokens. */
export function tokenOverlap(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a);
  const right = new Set(b);
  if (!left.size || !right.size) return 0;
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared += 1;
  }
  return (2 * shared) / (left.size + right.size);
}

/**
 * Similarity of two canonical token lists: the better of token overlap (word
 * order and extra words) and edit ratio (spelling drift).
 */
export function nameSimilarity(a: readonly string[], b: readonly string[]): number {
  if (!a.length || !b.length) return 0;
  return Math.max(tokenOverlap(a, b), levenshteinRatio(a.join(' '), b.join(' ')));
}

/**
 * 1 while |listing - record| stays within `tolerance` of the listing size, then
 * falling linearly to 0 over a further `decay`.
 */
export function sizeCloseness(listing: number, record: number, tolerance: number, decay: number): number {
  if (!(listing > 0) || !(record > 0)) return 0;
  const rel = Math.abs(listing - record) / listing;
  if (rel <= tolerance) return 1;
  return Math.max(0, 1 - (rel - tolerance) / decay);
}
