import { CompareLanguagesUseCase } from "../application/use-cases/compare-languages.usecase";
import { LookupLanguagesUseCase } from "../application/use-cases/lookup-languages.usecase";
import { ConfigManager } from "../infrastructure/config/config-manager";
import { loadAsjpRegistry } from "../infrastructure/data/asjp-table.adapter";
import { ErrorHandler } from "../infrastructure/error/error-handler";
import { ConsoleLogger, parseLogLevel } from "../infrastructure/logging/logger";
import { FlexSearchLanguageSearchRepository } from "../infrastructure/search/flexsearch-language-search.repository";

export interface LexiconUseCases {
  readonly compare: CompareLanguagesUseCase;
  readonly lookup: LookupLanguagesUseCase;
  readonly logger: ConsoleLogger;
}

let cachedUseCases: Promise<LexiconUseCases> | null = null;

export function getLexiconUseCases(): Promise<LexiconUseCases> {
  if (!cachedUseCases) {
    cachedUseCases = buildUseCases(ConfigManager.fromEnvironment(process.env));
  }
  return cachedUseCases;
}

export async function buildUseCases(
  configManager: ConfigManager,
): Promise<LexiconUseCases> {
  const logger = new ConsoleLogger(
    parseLogLevel(configManager.getLoggingConfig().level),
  );
  const { asjpPath } = configManager.getDataConfig();
  const similarity = configManager.getSimilarityConfig();

  const registry = await loadAsjpRegistry(asjpPath, logger.child("asjp"));
  const repository = new FlexSearchLanguageSearchRepository({
    wordLists: registry.wordLists(),
  });
  await repository.initialise();

  const errorHandler = new ErrorHandler(logger.child("lexicon"));

  return {
    compare: new CompareLanguagesUseCase({
      registry,
      errorHandler,
      vowelWeight: similarity.vowelWeight,
      nearestLimit: similarity.nearestLimit,
    }),
    lookup: new LookupLanguagesUseCase({
      registry,
      repository,
      errorHandler,
      resultLimit: configManager.getSearchConfig().resultLimit,
    }),
    logger,
  };
}
