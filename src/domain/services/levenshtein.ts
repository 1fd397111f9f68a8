import { ASJP_VOWELS } from "../constants/asjp";

/**
 * Edit distance between two ASJP transcriptions.
 *
 * Insertions and deletions cost 1. Substituting one vowel for another costs
 * `vowelWeight`; any other substitution of distinct symbols costs 1. Strings
 * are compared symbol by symbol (code points), and a missing value counts as
 * the empty string.
 *
 * Only two rows of the `(|a| + 1) x (|b| + 1)` table are kept at a time.
 */
export function levenshteinDistance(
  a: string | null | undefined,
  b: string | null | undefined,
  vowelWeight = 1.0,
): number {
  const source = Array.from(a ?? "");
  const target = Array.from(b ?? "");

  let previousRow = new Float64Array(target.length + 1);
  let currentRow = new Float64Array(target.length + 1);

  for (let column = 0; column <= target.length; column += 1) {
    previousRow[column] = column;
  }

  for (let row = 1; row <= source.length; row += 1) {
    currentRow[0] = row;
    const symbolA = source[row - 1];

    for (let column = 1; column <= target.length; column += 1) {
      const symbolB = target[column - 1];

      const deletion = previousRow[column] + 1;
      const insertion = currentRow[column - 1] + 1;
      const substitution =
        previousRow[column - 1] + substitutionCost(symbolA, symbolB, vowelWeight);

      currentRow[column] = Math.min(deletion, insertion, substitution);
    }

    const swap = previousRow;
    previousRow = currentRow;
    currentRow = swap;
  }

  return previousRow[target.length];
}

/**
 * Levenshtein distance divided by the length of the longer string; 0 when
 * both are empty.
 */
export function normalizedLevenshteinDistance(
  a: string | null | undefined,
  b: string | null | undefined,
  vowelWeight = 1.0,
): number {
  const longest = Math.max(symbolLength(a), symbolLength(b));
  if (longest === 0) {
    return 0;
  }
  return levenshteinDistance(a, b, vowelWeight) / longest;
}

export function symbolLength(value: string | null | undefined): number {
  return Array.from(value ?? "").length;
}

function substitutionCost(
  symbolA: string | undefined,
  symbolB: string | undefined,
  vowelWeight: number,
): number {
  if (symbolA === symbolB) {
    return 0;
  }
  if (
    symbolA !== undefined &&
    symbolB !== undefined &&
    ASJP_VOWELS.has(symbolA) &&
    ASJP_VOWELS.has(symbolB)
  ) {
    return vowelWeight;
  }
  return 1;
}
