/**
 * Analyzer report types.
 */

export interface WordFrequency {
  readonly word: string;
  readonly count: number;
}

export interface KeywordStat {
  readonly keyword: string;
  /** Whole-phrase, case-insensitive occurrences */
  readonly count: number;
  /** count × words in phrase / total words × 100, two decimals */
  readonly density: number;
  /** Heading paragraphs mentioning the phrase (documents only) */
  readonly inHeadings: number;
  /** Bold runs mentioning the phrase (documents only) */
  readonly inBold: number;
}

export interface AnalysisReport {
  readonly wordCount: number;
  readonly sentenceCount: number;
  readonly paragraphCount: number;
  readonly syllableCount: number;
  /** Words per sentence, one decimal */
  readonly averageSentenceLength: number;
  /** Characters per word, one decimal */
  readonly averageWordLength: number;
  /** Flesch-Kincaid grade, one decimal */
  readonly readingLevel: number;
  /** Flesch reading ease, one decimal */
  readonly readingEase: number;
  /** Most frequent non-stop words, by count then alphabetically */
  readonly topWords: readonly WordFrequency[];
  readonly keywords: readonly KeywordStat[];
}

export interface AnalyzeOptions {
  /** Phrases whose density is reported */
  readonly keywords?: readonly string[];
  /** Length of the word table (default 10) */
  readonly topWords?: number;
}

export type WordCountStatus = "on_target" | "over" | "under";
export type ReadingLevelStatus = "on_target" | "above" | "below";

export interface TargetComparison {
  readonly wordCount?: {
    readonly target: number;
    readonly actual: number;
    readonly difference: number;
    readonly status: WordCountStatus;
  };
  readonly readingLevel?: {
    readonly target: number;
    readonly actual: number;
    readonly difference: number;
    readonly status: ReadingLevelStatus;
  };
}
