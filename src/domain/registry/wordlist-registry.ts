import { WordList } from "../entities/wordlist";
import { NotFoundError } from "../errors/lexicon-errors";

/**
 * Resolves two word lists filed under the same identifier: the one with more
 * concepts wins, ties keep the one seen first.
 */
export function preferRicherWordList(
  existing: WordList | undefined,
  incoming: WordList,
): WordList {
  if (existing && incoming.size <= existing.size) {
    return existing;
  }
  return incoming;
}

export class WordListRegistry {
  private readonly entries: ReadonlyMap<string, WordList>;

  private constructor(entries: ReadonlyMap<string, WordList>) {
    this.entries = entries;
  }

  static fromWordLists(wordLists: Iterable<WordList>): WordListRegistry {
    const entries = new Map<string, WordList>();

    for (const wordList of wordLists) {
      entries.set(
        wordList.identifier,
        preferRicherWordList(entries.get(wordList.identifier), wordList),
      );
    }

    return new WordListRegistry(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get(identifier: string): WordList {
    const wordList = this.entries.get(identifier);
    if (!wordList) {
      throw new NotFoundError("word-list", identifier, "registry");
    }
    return wordList;
  }

  has(identifier: string): boolean {
    return this.entries.has(identifier);
  }

  identifiers(): string[] {
    return Array.from(this.entries.keys());
  }

  wordLists(): WordList[] {
    return Array.from(this.entries.values());
  }
}
