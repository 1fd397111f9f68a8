import { WordList } from "../../src/domain/entities/wordlist";
import { WordListRegistry } from "../../src/domain/registry/wordlist-registry";

export const SAMPLE_WORD_LISTS: WordList[] = [
  new WordList({
    identifier: "swe",
    displayName: "SWEDISH",
    concepts: { I: ["yog"], stone: ["sten"], water: ["vatEn"], fish: ["fisk"] },
  }),
  new WordList({
    identifier: "nob",
    displayName: "NORWEGIAN_BOKMAAL",
    concepts: { I: ["y3i"], stone: ["sten"], water: ["vOn"], fish: ["fisk"] },
  }),
  new WordList({
    identifier: "eng",
    displayName: "ENGLISH",
    concepts: {
      I: ["Ei"],
      stone: ["ston"],
      water: ["wat3r", "wot3r"],
      fish: ["fiS"],
    },
  }),
  new WordList({
    identifier: "qqq",
    displayName: "QUOTED_EJECTIVE",
    concepts: { I: ['k"a'] },
  }),
  new WordList({
    identifier: "tst",
    displayName: "EMPTY_LIST",
    concepts: {},
  }),
];

export function buildSampleRegistry(): WordListRegistry {
  return WordListRegistry.fromWordLists(SAMPLE_WORD_LISTS);
}
