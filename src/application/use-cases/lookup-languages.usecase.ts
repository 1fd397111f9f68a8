import type { LanguageMatch } from "../../domain/entities/language-match";
import type { WordListRegistry } from "../../domain/registry/wordlist-registry";
import type { ErrorHandler } from "../../infrastructure/error/error-handler";
import type { Result } from "../../infrastructure/result/result";
import type { LanguageSearchRepository } from "../ports/language-search-repository";

interface LookupLanguagesUseCaseDependencies {
  readonly registry: WordListRegistry;
  readonly repository: LanguageSearchRepository;
  readonly errorHandler: ErrorHandler;
  readonly resultLimit: number;
}

interface FindLanguagesRequest {
  readonly query: string;
}

interface ConceptFormsRequest {
  readonly identifier: string;
  readonly concept: string;
}

export interface FindLanguagesResponse {
  readonly matches: LanguageMatch[];
  readonly guidance: string;
}

export interface ConceptForms {
  readonly identifier: string;
  readonly concept: string;
  readonly forms: readonly string[];
}

export class LookupLanguagesUseCase {
  private readonly registry: WordListRegistry;
  private readonly repository: LanguageSearchRepository;
  private readonly errorHandler: ErrorHandler;
  private readonly resultLimit: number;

  constructor({
    registry,
    repository,
    errorHandler,
    resultLimit,
  }: LookupLanguagesUseCaseDependencies) {
    this.registry = registry;
    this.repository = repository;
    this.errorHandler = errorHandler;
    this.resultLimit = resultLimit;
  }

  async find({ query }: FindLanguagesRequest): Promise<Result<FindLanguagesResponse>> {
    return this.errorHandler.executeAsync(
      async () => {
        const matches = await this.repository.search(query, this.resultLimit);
        return {
          matches,
          guidance: this.buildGuidance(matches, query),
        };
      },
      "find languages",
      { query },
    );
  }

  forms({ identifier, concept }: ConceptFormsRequest): Result<ConceptForms> {
    return this.errorHandler.execute(
      () => ({
        identifier,
        concept,
        forms: this.registry.get(identifier).get(concept),
      }),
      "look up concept forms",
      { identifier, concept },
    );
  }

  private buildGuidance(matches: LanguageMatch[], query: string): string {
    if (matches.length === 0) {
      return `No languages matched "${query}". Try an ISO 639-3 code or part of the ASJP name.`;
    }

    if (matches.length === 1) {
      const [match] = matches;
      return `Single language match for "${query}" -> ${match.identifier} (${match.displayName}).`;
    }

    return "";
  }
}
