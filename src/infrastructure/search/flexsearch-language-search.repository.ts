import FlexSearch, { type Document } from "flexsearch";
import type { LanguageSearchRepository } from "../../application/ports/language-search-repository";
import type { LanguageMatch } from "../../domain/entities/language-match";
import type { WordList } from "../../domain/entities/wordlist";

const FIELD_WEIGHTS: Record<string, number> = {
  identifier: 4,
  displayName: 3,
};

const EXACT_TOKEN_MATCH_BONUS = 5;
const PREFIX_TOKEN_MATCH_BONUS = 2;

// Display names look like "ENGLISH" or "OLD_CHURCH_SLAVONIC".
const NAME_BOUNDARY = /[\p{P}\p{S}\s]+/u;

interface FlexSearchLanguageSearchRepositoryOptions {
  readonly wordLists: readonly WordList[];
}

interface IndexDocument {
  id: string;
  identifier: string;
  displayName: string;
  [key: string]: string;
}

type DocumentIndex = Document<IndexDocument, false>;

interface ScoreEntry {
  score: number;
}

export class FlexSearchLanguageSearchRepository
  implements LanguageSearchRepository
{
  private readonly wordLists: readonly WordList[];
  private readonly tokenIndex = new Map<string, Set<string>>();
  private readonly languageMap = new Map<string, WordList>();
  private document?: DocumentIndex;

  constructor({ wordLists }: FlexSearchLanguageSearchRepositoryOptions) {
    this.wordLists = wordLists;
  }

  async initialise(): Promise<void> {
    if (this.document) {
      return;
    }

    const document = new FlexSearch.Document<IndexDocument, false>({
      tokenize: "forward",
      cache: true,
      document: {
        id: "id",
        index: ["identifier", "displayName"],
      },
    });

    for (const wordList of this.wordLists) {
      document.add({
        id: wordList.identifier,
        identifier: wordList.identifier,
        displayName: this.tokenize(wordList.displayName).join(" "),
      });
      this.tokenIndex.set(wordList.identifier, this.buildTokens(wordList));
      this.languageMap.set(wordList.identifier, wordList);
    }

    this.document = document;
  }

  async search(query: string, limit: number): Promise<LanguageMatch[]> {
    const document = this.document;
    if (!document) {
      throw new Error(
        "FlexSearchLanguageSearchRepository must be initialised before searching.",
      );
    }

    const scores = new Map<string, ScoreEntry>();
    for (const keyword of this.tokenize(query)) {
      const results = document.search(keyword, {
        enrich: true,
        limit: Math.max(limit, 1) * 4,
        suggest: true,
      });

      for (const fieldResult of results) {
        for (const entry of fieldResult.result) {
          const id = this.resolveId(entry);
          if (!id || !this.languageMap.has(id)) {
            continue;
          }
          this.updateScore(scores, id, fieldResult.field, keyword);
        }
      }
    }

    return this.rankResults(scores).slice(0, limit);
  }

  private updateScore(
    scores: Map<string, ScoreEntry>,
    id: string,
    field: string,
    keyword: string,
  ): void {
    const current = scores.get(id) ?? { score: 0 };
    current.score += FIELD_WEIGHTS[field] ?? 1;

    for (const token of this.tokenIndex.get(id) ?? []) {
      if (token === keyword) {
        current.score += EXACT_TOKEN_MATCH_BONUS;
      } else if (token.startsWith(keyword)) {
        current.score += PREFIX_TOKEN_MATCH_BONUS;
      }
    }

    scores.set(id, current);
  }

  private rankResults(scores: Map<string, ScoreEntry>): LanguageMatch[] {
    return Array.from(scores.entries())
      .map(([id, value]) => {
        const wordList = this.languageMap.get(id);
        if (!wordList) {
          throw new Error(`Word list missing for id ${id}`);
        }

        return {
          identifier: wordList.identifier,
          displayName: wordList.displayName,
          conceptCount: wordList.size,
          score: Number.parseFloat(value.score.toFixed(2)),
        } satisfies LanguageMatch;
      })
      .sort((a, b) => {
        if (b.score !== a.score) {
          return b.score - a.score;
        }
        return a.identifier.localeCompare(b.identifier);
      });
  }

  private buildTokens(wordList: WordList): Set<string> {
    return new Set([
      ...this.tokenize(wordList.identifier),
      ...this.tokenize(wordList.displayName),
    ]);
  }

  private tokenize(value: string): string[] {
    return value
      .split(NAME_BOUNDARY)
      .map((token) => token.trim().toLowerCase())
      .filter(Boolean);
  }

  private resolveId(entry: unknown): string | undefined {
    if (typeof entry === "string") {
      return entry;
    }

    if (!entry || typeof entry !== "object") {
      return undefined;
    }

    if ("id" in entry && typeof entry.id === "string") {
      return entry.id;
    }

    return undefined;
  }
}
