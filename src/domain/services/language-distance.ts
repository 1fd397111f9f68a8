import type { WordList } from "../entities/wordlist";
import { NoComparableConceptsError } from "../errors/lexicon-errors";
import { meanConceptDistance } from "./concept-distance";

/**
 * Concepts that have forms in both word lists, in the order of `first`.
 */
export function sharedConcepts(first: WordList, second: WordList): string[] {
  return first.conceptIds().filter((concept) => second.has(concept));
}

/**
 * Mean over shared concepts of the per-concept mean normalized distance.
 *
 * @throws NoComparableConceptsError when the word lists share no concept.
 */
export function meanLanguageDistance(
  first: WordList,
  second: WordList,
  vowelWeight = 1.0,
): number {
  const concepts = sharedConcepts(first, second);
  if (concepts.length === 0) {
    throw new NoComparableConceptsError(first.identifier, second.identifier);
  }

  let total = 0;
  for (const concept of concepts) {
    total += meanConceptDistance(
      first.get(concept),
      second.get(concept),
      vowelWeight,
    );
  }

  return total / concepts.length;
}
