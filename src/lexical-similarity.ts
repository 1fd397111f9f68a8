export { ASJP_VOWELS, FORM_DELIMITER } from "./domain/constants/asjp";
export { WordList, type WordListRecord } from "./domain/entities/wordlist";
export type { LanguageMatch } from "./domain/entities/language-match";
export {
  LexiconError,
  NoComparableConceptsError,
  NotFoundError,
  type LookupKind,
} from "./domain/errors/lexicon-errors";
export {
  preferRicherWordList,
  WordListRegistry,
} from "./domain/registry/wordlist-registry";
export { meanConceptDistance } from "./domain/services/concept-distance";
export {
  meanLanguageDistance,
  sharedConcepts,
} from "./domain/services/language-distance";
export {
  levenshteinDistance,
  normalizedLevenshteinDistance,
} from "./domain/services/levenshtein";
export {
  AsjpTableError,
  loadAsjpRegistry,
  parseAsjpTable,
  readAsjpTable,
} from "./infrastructure/data/asjp-table.adapter";
