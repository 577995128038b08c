export const LANGUAGE_MODEL = Symbol('LANGUAGE_MODEL');

export interface LanguageModel {
  readonly name: string;
  /** Answers `question` using only `evidence`; rejects with LanguageModelError. */
  complete(question: string, evidence: string[]): Promise<string>;
}
