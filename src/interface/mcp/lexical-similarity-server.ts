import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { getLexiconUseCases, type LexiconUseCases } from "../../bootstrap/lexicon-use-cases";
import type { Result } from "../../infrastructure/result/result";

const SERVER_NAME = "asjp-lexical-similarity";
const SERVER_VERSION = "0.1.0";

const identifierSchema = z
  .string()
  .min(1, "Provide a language identifier.")
  .max(16, "Language identifiers are short ISO 639-3 codes.");

const formSchema = z
  .string()
  .max(64, "Word forms are single ASJP transcriptions.");

interface ToolResponse {
  [key: string]: unknown;
  isError?: boolean;
  content: { type: "text"; text: string }[];
  structuredContent?: Record<string, unknown>;
}

export async function startMcpServer(): Promise<void> {
  const useCases = await getLexiconUseCases();
  const server = createMcpServer(useCases);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  useCases.logger.info("MCP server listening on stdio", { name: SERVER_NAME });
}

export function createMcpServer({ compare, lookup }: LexiconUseCases): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "compare_languages",
    {
      title: "Compare two languages",
      description:
        "Mean normalized Levenshtein distance between the ASJP word lists of two languages, averaged over the concepts both lists attest. 0 means identical forms, values near 1 mean unrelated vocabulary.",
      inputSchema: {
        first: identifierSchema.describe("ISO 639-3 code of the first language (e.g. 'swe')"),
        second: identifierSchema.describe("ISO 639-3 code of the second language (e.g. 'eng')"),
      },
    },
    async ({ first, second }) =>
      toToolResponse(compare.compare({ first, second }), "Language comparison", (value) => [
        `${value.first} vs ${value.second}: distance ${value.distance.toFixed(4)}, similarity ${value.similarity.toFixed(4)} over ${value.sharedConceptCount} shared concepts.`,
      ]),
  );

  server.registerTool(
    "nearest_languages",
    {
      title: "Find the closest languages",
      description:
        "Rank every other language in the database by mean normalized Levenshtein distance to the given one. Languages with no shared concepts are left out.",
      inputSchema: {
        language: identifierSchema.describe("ISO 639-3 code of the reference language"),
        limit: z.number().int().positive().max(50).optional().describe("How many languages to return"),
      },
    },
    async ({ language, limit }) =>
      toToolResponse(
        compare.nearest({ identifier: language, limit }),
        "Nearest language search",
        (value) =>
          value.length === 0
            ? [`No language shares concepts with ${language}.`]
            : value.map(
                (entry) =>
                  `- ${entry.identifier} (${entry.displayName}) distance ${entry.distance.toFixed(4)} over ${entry.sharedConceptCount} concepts`,
              ),
        (value) => ({ languages: value }),
      ),
  );

  server.registerTool(
    "word_distance",
    {
      title: "Distance between two word forms",
      description:
        "Vowel-weighted Levenshtein distance between two ASJP transcriptions, raw and normalized by the longer form.",
      inputSchema: {
        first: formSchema.describe("First ASJP transcription (e.g. 'sten')"),
        second: formSchema.describe("Second ASJP transcription (e.g. 'ston')"),
      },
    },
    async ({ first, second }) =>
      toToolResponse(compare.compareWords({ first, second }), "Word comparison", (value) => [
        `${value.first} vs ${value.second}: distance ${value.distance}, normalized ${value.normalizedDistance.toFixed(4)}.`,
      ]),
  );

  server.registerTool(
    "find_languages",
    {
      title: "Find languages by code or name",
      description:
        "Search the loaded word lists by ISO code or ASJP language name. Returns the best matches with their concept counts.",
      inputSchema: {
        query: z
          .string()
          .min(1, "Provide a language code or name.")
          .max(100, "Keep the query to a code or a name.")
          .describe("ISO code or part of a language name (e.g. 'swedish')"),
      },
    },
    async ({ query }) =>
      toToolResponse(
        await lookup.find({ query }),
        "Language search",
        (value) => {
          const lines = value.guidance ? [value.guidance] : [];
          if (value.matches.length > 1) {
            lines.push("Matching languages:");
            for (const match of value.matches) {
              lines.push(`- ${match.identifier} ${match.displayName} (${match.conceptCount} concepts, score ${match.score.toFixed(2)})`);
            }
          }
          return lines;
        },
      ),
  );

  server.registerTool(
    "concept_forms",
    {
      title: "Word forms for a concept",
      description: "List the ASJP forms a language has for one concept (e.g. 'stone').",
      inputSchema: {
        language: identifierSchema.describe("ISO 639-3 code of the language"),
        concept: z.string().min(1, "Provide a concept name.").describe("Concept name as used in the ASJP table header"),
      },
    },
    async ({ language, concept }) =>
      toToolResponse(lookup.forms({ identifier: language, concept }), "Concept lookup", (value) => [
        `${value.identifier} ${value.concept}: ${value.forms.join(", ")}`,
      ]),
  );

  return server;
}

export function toToolResponse<T>(
  result: Result<T>,
  label: string,
  describe: (value: T) => string[],
  structure: (value: T) => Record<string, unknown> = (value) => ({ result: value }),
): ToolResponse {
  if (!result.success) {
    return {
      isError: true,
      content: [
        {
          type: "text",
          text: `${label} failed: ${result.error.message}`,
        },
      ],
    };
  }

  return {
    content: [
      {
        type: "text",
        text: describe(result.data).join("\n"),
      },
    ],
    structuredContent: structure(result.data),
  };
}
