import type { WordListRegistry } from "../../domain/registry/wordlist-registry";
import { NoComparableConceptsError } from "../../domain/errors/lexicon-errors";
import {
  meanLanguageDistance,
  sharedConcepts,
} from "../../domain/services/language-distance";
import {
  levenshteinDistance,
  normalizedLevenshteinDistance,
} from "../../domain/services/levenshtein";
import type { ErrorHandler } from "../../infrastructure/error/error-handler";
import type { Result } from "../../infrastructure/result/result";

interface CompareLanguagesUseCaseDependencies {
  readonly registry: WordListRegistry;
  readonly errorHandler: ErrorHandler;
  readonly vowelWeight: number;
  readonly nearestLimit: number;
}

interface PairRequest {
  readonly first: string;
  readonly second: string;
}

interface NearestRequest {
  readonly identifier: string;
  readonly limit?: number;
}

export interface LanguageComparison {
  readonly first: string;
  readonly second: string;
  readonly distance: number;
  readonly similarity: number;
  readonly sharedConceptCount: number;
}

export interface WordComparison {
  readonly first: string;
  readonly second: string;
  readonly distance: number;
  readonly normalizedDistance: number;
}

export interface NearestLanguage {
  readonly identifier: string;
  readonly displayName: string;
  readonly distance: number;
  readonly sharedConceptCount: number;
}

export class CompareLanguagesUseCase {
  private readonly registry: WordListRegistry;
  private readonly errorHandler: ErrorHandler;
  private readonly vowelWeight: number;
  private readonly nearestLimit: number;

  constructor({
    registry,
    errorHandler,
    vowelWeight,
    nearestLimit,
  }: CompareLanguagesUseCaseDependencies) {
    this.registry = registry;
    this.errorHandler = errorHandler;
    this.vowelWeight = vowelWeight;
    this.nearestLimit = nearestLimit;
  }

  compare({ first, second }: PairRequest): Result<LanguageComparison> {
    return this.errorHandler.execute(
      () => {
        const left = this.registry.get(first);
        const right = this.registry.get(second);
        const distance = meanLanguageDistance(left, right, this.vowelWeight);

        return {
          first,
          second,
          distance,
          // Vowel weights above 1 can push the distance past 1.
          similarity: Math.max(0, 1 - distance),
          sharedConceptCount: sharedConcepts(left, right).length,
        };
      },
      "compare languages",
      { first, second },
    );
  }

  compareWords({ first, second }: PairRequest): Result<WordComparison> {
    return this.errorHandler.execute(
      () => ({
        first,
        second,
        distance: levenshteinDistance(first, second, this.vowelWeight),
        normalizedDistance: normalizedLevenshteinDistance(
          first,
          second,
          this.vowelWeight,
        ),
      }),
      "compare words",
      { first, second },
    );
  }

  /**
   * Languages closest to `identifier`. Pairs without shared concepts are
   * skipped; ties are ordered by identifier.
   */
  nearest({ identifier, limit }: NearestRequest): Result<NearestLanguage[]> {
    return this.errorHandler.execute(
      () => {
        const target = this.registry.get(identifier);
        const candidates: NearestLanguage[] = [];

        for (const other of this.registry.wordLists()) {
          if (other.identifier === target.identifier) {
            continue;
          }

          let distance: number;
          try {
            distance = meanLanguageDistance(target, other, this.vowelWeight);
          } catch (error) {
            if (error instanceof NoComparableConceptsError) {
              continue;
            }
            throw error;
          }

          candidates.push({
            identifier: other.identifier,
            displayName: other.displayName,
            distance,
            sharedConceptCount: sharedConcepts(target, other).length,
          });
        }

        return candidates
          .sort((a, b) => {
            if (a.distance !== b.distance) {
              return a.distance - b.distance;
            }
            return a.identifier.localeCompare(b.identifier);
          })
          .slice(0, limit ?? this.nearestLimit);
      },
      "find nearest languages",
      { identifier, limit },
    );
  }
}
