/**
 * Text metrics: word and sentence counts, Flesch-Kincaid readability,
 * word frequencies and keyword density.
 *
 * Pure functions over text or a Document; nothing here rewrites content.
 */

import { loadStopWords } from "../data/index.js";
import { paragraphText, type Document } from "../document/types.js";
import { escapeRegExp, wordBounded } from "../rules/match.js";
import type { AnalysisReport, AnalyzeOptions, KeywordStat, WordFrequency } from "./types.js";

const DEFAULT_TOP_WORDS = 10;

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Whitespace-separated tokens with leading and trailing punctuation
 * stripped. Tokens left empty are dropped.
 */
export function tokenizeWords(text: string): string[] {
  return text
    .split(/\s+/)
    .map((token) => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ""))
    .filter((token) => token.length > 0);
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Vowel-group estimate. A final silent "e" is dropped unless it follows
 * an "l" ("little"). Every word has at least one syllable.
 */
export function countSyllables(word: string): number {
  const letters = word.toLowerCase().replace(/[^a-z]/g, "");
  let groups = letters.match(/[aeiouy]+/g)?.length ?? 0;
  if (groups > 1 && letters.endsWith("e") && !letters.endsWith("le")) {
    groups--;
  }
  return Math.max(1, groups);
}

function phrasePattern(keyword: string): RegExp {
  const source = keyword.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  return new RegExp(wordBounded(source), "giu");
}

function countPhrase(keyword: string, text: string): number {
  return text.match(phrasePattern(keyword))?.length ?? 0;
}

function topWords(words: readonly string[], limit: number): WordFrequency[] {
  const stopWords = loadStopWords();
  const counts = new Map<string, number>();

  for (const word of words) {
    const folded = word.toLowerCase();
    if (stopWords.has(folded) || !/\p{L}/u.test(folded)) {
      continue;
    }
    counts.set(folded, (counts.get(folded) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || a.word.localeCompare(b.word))
    .slice(0, limit);
}

function keywordStats(
  keywords: readonly string[],
  text: string,
  wordCount: number
): KeywordStat[] {
  return keywords
    .filter((keyword) => keyword.trim().length > 0)
    .map((keyword) => {
      const count = countPhrase(keyword, text);
      const phraseWords = keyword.trim().split(/\s+/).length;
      return {
        keyword,
        count,
        density: wordCount > 0 ? round(((count * phraseWords) / wordCount) * 100, 2) : 0,
        inHeadings: 0,
        inBold: 0,
      };
    });
}

/**
 * Analyze plain text. Paragraphs are newline-separated lines.
 */
export function analyzeText(text: string, options: AnalyzeOptions = {}): AnalysisReport {
  const words = tokenizeWords(text);
  const keywords = keywordStats(options.keywords ?? [], text, words.length);

  if (words.length === 0) {
    return {
      wordCount: 0,
      sentenceCount: 0,
      paragraphCount: 0,
      syllableCount: 0,
      averageSentenceLength: 0,
      averageWordLength: 0,
      readingLevel: 0,
      readingEase: 0,
      topWords: [],
      keywords,
    };
  }

  const sentenceCount = Math.max(1, splitSentences(text).length);
  const syllableCount = words.reduce((sum, word) => sum + countSyllables(word), 0);
  const wordsPerSentence = words.length / sentenceCount;
  const syllablesPerWord = syllableCount / words.length;

  return {
    wordCount: words.length,
    sentenceCount,
    paragraphCount: text.split("\n").filter((line) => line.trim().length > 0).length,
    syllableCount,
    averageSentenceLength: round(wordsPerSentence, 1),
    averageWordLength: round(words.reduce((sum, word) => sum + word.length, 0) / words.length, 1),
    readingLevel: round(0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59, 1),
    readingEase: round(206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord, 1),
    topWords: topWords(words, options.topWords ?? DEFAULT_TOP_WORDS),
    keywords,
  };
}

/**
 * Analyze a document. Besides the text metrics, each keyword reports how
 * many heading paragraphs and bold runs mention it.
 */
export function analyzeDocument(document: Document, options: AnalyzeOptions = {}): AnalysisReport {
  const report = analyzeText(document.paragraphs.map(paragraphText).join("\n"), options);

  const headings = document.paragraphs.filter((paragraph) => /^heading\b/i.test(paragraph.style ?? ""));
  const boldRuns = document.paragraphs.flatMap((paragraph) =>
    paragraph.runs.filter((run) => run.formatting.bold === true)
  );

  return {
    ...report,
    keywords: report.keywords.map((stat) => {
      const pattern = phrasePattern(stat.keyword);
      const mentions = (text: string) => new RegExp(pattern.source, "iu").test(text);
      return {
        ...stat,
        inHeadings: headings.filter((paragraph) => mentions(paragraphText(paragraph))).length,
        inBold: boldRuns.filter((run) => mentions(run.text)).length,
      };
    }),
  };
}
