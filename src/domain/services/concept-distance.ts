import { normalizedLevenshteinDistance } from "./levenshtein";

/**
 * Mean normalized distance over every pairing of `forms1` with `forms2`.
 *
 * Most concepts carry a single form per language, in which case this is just
 * the normalized distance between those two forms. Returns 0 when either side
 * has no forms.
 */
export function meanConceptDistance(
  forms1: readonly string[],
  forms2: readonly string[],
  vowelWeight = 1.0,
): number {
  if (forms1.length === 0 || forms2.length === 0) {
    return 0;
  }

  let total = 0;
  for (const x of forms1) {
    for (const y of forms2) {
      total += normalizedLevenshteinDistance(x, y, vowelWeight);
    }
  }

  return total / (forms1.length * forms2.length);
}
