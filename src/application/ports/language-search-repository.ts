import type { LanguageMatch } from "../../domain/entities/language-match";

export interface LanguageSearchRepository {
  search(query: string, limit: number): Promise<LanguageMatch[]>;
}
