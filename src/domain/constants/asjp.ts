/**
 * Symbols of the ASJP transcription alphabet that denote vowels.
 */
export const ASJP_VOWELS: ReadonlySet<string> = new Set([
  "3",
  "a",
  "e",
  "E",
  "i",
  "o",
  "u",
]);

/**
 * Separator between synonymous forms inside one concept cell.
 */
export const FORM_DELIMITER = ", ";

// Columns before this index hold language metadata, the rest are concepts.
export const METADATA_COLUMN_COUNT = 10;

export const IDENTIFIER_COLUMN = "iso";
export const DISPLAY_NAME_COLUMN = "names";
