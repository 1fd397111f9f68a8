import { NotFoundError } from "../errors/lexicon-errors";

/**
 * Raw per-language data handed over by a loader.
 */
export interface WordListRecord {
  readonly identifier: string;
  readonly displayName: string;
  readonly concepts: Readonly<Record<string, readonly string[]>>;
}

/**
 * One language's word forms keyed by concept. Immutable once built.
 */
export class WordList {
  readonly identifier: string;
  readonly displayName: string;
  readonly concepts: ReadonlyMap<string, readonly string[]>;

  constructor({ identifier, displayName, concepts }: WordListRecord) {
    const entries = new Map<string, readonly string[]>();

    for (const [concept, forms] of Object.entries(concepts)) {
      if (forms.length === 0) {
        throw new Error(
          `Concept "${concept}" of word list "${identifier}" has no forms.`,
        );
      }
      entries.set(concept, Object.freeze([...forms]));
    }

    this.identifier = identifier;
    this.displayName = displayName;
    this.concepts = entries;
  }

  /** Number of concepts with at least one form. */
  get size(): number {
    return this.concepts.size;
  }

  get(concept: string): readonly string[] {
    const forms = this.concepts.get(concept);
    if (!forms) {
      throw new NotFoundError("concept", concept, `word list "${this.identifier}"`);
    }
    return forms;
  }

  has(concept: string): boolean {
    return this.concepts.has(concept);
  }

  conceptIds(): string[] {
    return Array.from(this.concepts.keys());
  }
}
