import { beforeEach, describe, expect, it } from "vitest";
import { LookupLanguagesUseCase } from "../../src/application/use-cases/lookup-languages.usecase";
import { NotFoundError } from "../../src/domain/errors/lexicon-errors";
import { ErrorHandler } from "../../src/infrastructure/error/error-handler";
import { ConsoleLogger, LogLevel } from "../../src/infrastructure/logging/logger";
import { FlexSearchLanguageSearchRepository } from "../../src/infrastructure/search/flexsearch-language-search.repository";
import { buildSampleRegistry } from "../fixtures/word-lists";

describe("LookupLanguagesUseCase", () => {
  let useCase: LookupLanguagesUseCase;

  beforeEach(async () => {
    const registry = buildSampleRegistry();
    const repository = new FlexSearchLanguageSearchRepository({
      wordLists: registry.wordLists(),
    });
    await repository.initialise();
    useCase = new LookupLanguagesUseCase({
      registry,
      repository,
      errorHandler: new ErrorHandler(new ConsoleLogger(LogLevel.ERROR)),
      resultLimit: 5,
    });
  });

  it("gives single-match guidance", async () => {
    const result = await useCase.find({ query: "english" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.matches.map((match) => match.identifier)).toEqual(["eng"]);
      expect(result.data.guidance).toBe(
        'Single language match for "english" -> eng (ENGLISH).',
      );
    }
  });

  it("leaves guidance empty when several languages match", async () => {
    const result = await useCase.find({ query: "swedish, english" });

    expect(result.success && result.data.matches.length).toBe(2);
    expect(result.success && result.data.guidance).toBe("");
  });

  it("explains an empty search", async () => {
    const result = await useCase.find({ query: "klingon" });

    expect(result).toEqual({
      success: true,
      data: {
        matches: [],
        guidance:
          'No languages matched "klingon". Try an ISO 639-3 code or part of the ASJP name.',
      },
    });
  });

  it("returns the forms of a concept", () => {
    expect(useCase.forms({ identifier: "eng", concept: "water" })).toEqual({
      success: true,
      data: { identifier: "eng", concept: "water", forms: ["wat3r", "wot3r"] },
    });
  });

  it("fails with NotFoundError for an unknown concept", () => {
    const result = useCase.forms({ identifier: "eng", concept: "tree" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.message).toBe('No concept "tree" in word list "eng".');
    }
  });
});
