import { beforeEach, describe, expect, it } from "vitest";
import { CompareLanguagesUseCase } from "../../src/application/use-cases/compare-languages.usecase";
import {
  NoComparableConceptsError,
  NotFoundError,
} from "../../src/domain/errors/lexicon-errors";
import { WordList } from "../../src/domain/entities/wordlist";
import { WordListRegistry } from "../../src/domain/registry/wordlist-registry";
import { ErrorHandler } from "../../src/infrastructure/error/error-handler";
import { ConsoleLogger, LogLevel } from "../../src/infrastructure/logging/logger";
import { buildSampleRegistry } from "../fixtures/word-lists";

describe("CompareLanguagesUseCase", () => {
  let useCase: CompareLanguagesUseCase;

  beforeEach(() => {
    useCase = new CompareLanguagesUseCase({
      registry: buildSampleRegistry(),
      errorHandler: new ErrorHandler(new ConsoleLogger(LogLevel.ERROR)),
      vowelWeight: 1,
      nearestLimit: 5,
    });
  });

  it("compares two languages over their shared concepts", () => {
    const result = useCase.compare({ first: "swe", second: "eng" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.distance).toBeCloseTo(0.6125, 10);
      expect(result.data.similarity).toBeCloseTo(0.3875, 10);
      expect(result.data.sharedConceptCount).toBe(4);
    }
  });

  it("keeps similarity at 0 when a heavy vowel weight pushes the distance past 1", () => {
    const heavy = new CompareLanguagesUseCase({
      registry: WordListRegistry.fromWordLists([
        new WordList({ identifier: "aaa", displayName: "A", concepts: { stone: ["a"] } }),
        new WordList({ identifier: "eee", displayName: "E", concepts: { stone: ["e"] } }),
      ]),
      errorHandler: new ErrorHandler(new ConsoleLogger(LogLevel.ERROR)),
      vowelWeight: 1.5,
      nearestLimit: 5,
    });

    expect(heavy.compare({ first: "aaa", second: "eee" })).toEqual({
      success: true,
      data: {
        first: "aaa",
        second: "eee",
        distance: 1.5,
        similarity: 0,
        sharedConceptCount: 1,
      },
    });
  });

  it("fails with NotFoundError for an unknown language", () => {
    const result = useCase.compare({ first: "swe", second: "deu" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.message).toBe('No word-list "deu" in registry.');
    }
  });

  it("fails with NoComparableConceptsError for disjoint word lists", () => {
    const result = useCase.compare({ first: "swe", second: "tst" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(NoComparableConceptsError);
    }
  });

  it("compares two word forms", () => {
    expect(useCase.compareWords({ first: "tan", second: "ston" })).toEqual({
      success: true,
      data: { first: "tan", second: "ston", distance: 2, normalizedDistance: 0.5 },
    });
  });

  it("applies the configured vowel weight", () => {
    const weighted = new CompareLanguagesUseCase({
      registry: buildSampleRegistry(),
      errorHandler: new ErrorHandler(new ConsoleLogger(LogLevel.ERROR)),
      vowelWeight: 0.5,
      nearestLimit: 5,
    });

    expect(weighted.compareWords({ first: "ston", second: "sten" })).toEqual({
      success: true,
      data: { first: "ston", second: "sten", distance: 0.5, normalizedDistance: 0.125 },
    });
  });

  it("ranks the nearest languages and skips those without shared concepts", () => {
    const result = useCase.nearest({ identifier: "swe" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.map((entry) => entry.identifier)).toEqual(["nob", "eng", "qqq"]);
      // I: 2/3, stone 0, water 3/5, fish 0
      expect(result.data[0]?.distance).toBeCloseTo((2 / 3 + 0.6) / 4, 10);
      expect(result.data[2]).toEqual({
        identifier: "qqq",
        displayName: "QUOTED_EJECTIVE",
        distance: 1,
        sharedConceptCount: 1,
      });
    }
  });

  it("honours an explicit limit", () => {
    const result = useCase.nearest({ identifier: "swe", limit: 1 });

    expect(result.success && result.data.map((entry) => entry.identifier)).toEqual(["nob"]);
  });

  it("returns no neighbours for a word list without concepts", () => {
    expect(useCase.nearest({ identifier: "tst" })).toEqual({ success: true, data: [] });
  });
});
