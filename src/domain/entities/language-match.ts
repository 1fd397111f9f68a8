export interface LanguageMatch {
  readonly identifier: string;
  readonly displayName: string;
  readonly conceptCount: number;
  readonly score: number;
}
