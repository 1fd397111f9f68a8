export type LookupKind = "word-list" | "concept";

export abstract class LexiconError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a registry or word list is queried with an unknown key.
 */
export class NotFoundError extends LexiconError {
  readonly kind: LookupKind;
  readonly key: string;

  constructor(kind: LookupKind, key: string, scope?: string) {
    super(
      scope
        ? `No ${kind} "${key}" in ${scope}.`
        : `No ${kind} "${key}".`,
    );
    this.kind = kind;
    this.key = key;
  }
}

/**
 * Raised when two word lists share no concept, so their mean distance is
 * undefined rather than zero.
 */
export class NoComparableConceptsError extends LexiconError {
  readonly first: string;
  readonly second: string;

  constructor(first: string, second: string) {
    super(`Word lists "${first}" and "${second}" share no concepts.`);
    this.first = first;
    this.second = second;
  }
}
