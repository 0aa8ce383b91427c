/**
 * @file src/lib/suggestions.ts
 * @description "Did you mean" ranking for unit and substance names.
 */

import stringSimilarity from 'string-similarity';

export interface RankedSuggestion {
  name: string;
  distance: number;
  similarity: number;
}

/**
 * Slides the shorter string over the longer one and counts positional mismatches at every
 * offset where it fits. The best offset's mismatch count plus the length difference is the
 * distance, so a name contained in the other scores exactly the length difference.
 */
export const slidingDistance = (a: string, b: string): number => {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  const lengthGap = longer.length - shorter.length;
  let best = shorter.length;
  for (let offset = 0; offset <= lengthGap; offset += 1) {
    let mismatches = 0;
    for (let i = 0; i < shorter.length; i += 1) {
      if (shorter[i] !== longer[offset + i]) {
        mismatches += 1;
      }
    }
    best = Math.min(best, mismatches);
  }
  return best + lengthGap;
};

const diceSimilarity = (a: string, b: string): number =>
  a.length && b.length ? stringSimilarity.compareTwoStrings(a, b) : 0;

/**
 * Scores every candidate against the input, closest first. Equal distances fall back to
 * bigram similarity, then to alphabetical order.
 */
export const scoreSuggestions = (
  input: string,
  candidates: Iterable<string>,
): RankedSuggestion[] =>
  Array.from(candidates, (name) => ({
    name,
    distance: slidingDistance(input, name),
    similarity: diceSimilarity(input, name),
  })).sort(
    (a, b) =>
      a.distance - b.distance || b.similarity - a.similarity || a.name.localeCompare(b.name),
  );

export const rankSuggestions = (input: string, candidates: Iterable<string>): string[] =>
  scoreSuggestions(input, candidates).map((entry) => entry.name);
