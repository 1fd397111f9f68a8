import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  DISPLAY_NAME_COLUMN,
  FORM_DELIMITER,
  IDENTIFIER_COLUMN,
  METADATA_COLUMN_COUNT,
} from "../../domain/constants/asjp";
import { WordList, type WordListRecord } from "../../domain/entities/wordlist";
import { WordListRegistry } from "../../domain/registry/wordlist-registry";
import type { ILogger } from "../logging/logger";

export class AsjpTableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AsjpTableError";
  }
}

const tableSchema = z.array(z.array(z.string()));

/**
 * Parses the tab-separated ASJP table into one record per row.
 *
 * The first ten columns describe the language; every later column is a
 * concept whose cell lists synonymous forms separated by ", ". Empty cells
 * are left out and rows without an ISO code are skipped.
 */
export function parseAsjpTable(text: string): WordListRecord[] {
  const rows = tableSchema.parse(
    parse(text, {
      delimiter: "\t",
      // ASJP uses `"` as a glottalization marker, never as a quote.
      quote: false,
      relax_column_count: true,
      skip_empty_lines: true,
    }),
  );

  const [header, ...body] = rows;
  if (!header) {
    throw new AsjpTableError("ASJP table is empty.");
  }

  const identifierIndex = requireColumn(header, IDENTIFIER_COLUMN);
  const displayNameIndex = requireColumn(header, DISPLAY_NAME_COLUMN);
  const conceptColumns = header
    .slice(METADATA_COLUMN_COUNT)
    .map((concept, offset) => ({ concept, index: METADATA_COLUMN_COUNT + offset }));

  const records: WordListRecord[] = [];
  for (const row of body) {
    const identifier = row[identifierIndex] ?? "";
    if (identifier === "") {
      continue;
    }

    const concepts: Record<string, string[]> = {};
    for (const { concept, index } of conceptColumns) {
      const cell = row[index];
      if (cell) {
        concepts[concept] = cell.split(FORM_DELIMITER);
      }
    }

    records.push({
      identifier,
      displayName: row[displayNameIndex] ?? "",
      concepts,
    });
  }

  return records;
}

/**
 * Reads an ASJP table from disk. The file must be valid UTF-8.
 */
export async function readAsjpTable(path: string): Promise<WordListRecord[]> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new AsjpTableError(`Cannot read ASJP table at ${path}.`, { cause: error });
  }

  return parseAsjpTable(decodeUtf8(bytes, path));
}

export async function loadAsjpRegistry(
  path: string,
  logger?: ILogger,
): Promise<WordListRegistry> {
  const records = await readAsjpTable(path);
  const registry = WordListRegistry.fromWordLists(
    records.map((record) => new WordList(record)),
  );

  logger?.info("Loaded ASJP table", {
    path,
    rows: records.length,
    languages: registry.size,
    mergedDuplicates: records.length - registry.size,
  });

  return registry;
}

function decodeUtf8(bytes: Uint8Array, path: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new AsjpTableError(`ASJP table at ${path} is not valid UTF-8.`, { cause: error });
  }
}

function requireColumn(header: readonly string[], column: string): number {
  const index = header.indexOf(column);
  if (index === -1 || index >= METADATA_COLUMN_COUNT) {
    throw new AsjpTableError(
      `ASJP table header must contain a "${column}" metadata column.`,
    );
  }
  return index;
}
