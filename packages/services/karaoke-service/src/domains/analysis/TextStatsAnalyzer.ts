/**
 * TextStatsAnalyzer - vocabulary and rhythm statistics for lyrics lines
 */

import type { TextStatsDict } from '@lyricsync/shared-contracts';
import { getLogger, karaokeConfig } from '@config/service-config';
import { KaraokeError } from '../../application/errors';
import { roundTo } from '../text';
import stopWordList from '../../data/stop-words.json';

const logger = getLogger('text-stats');

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/** Sung words per second */
const WORDS_PER_SECOND = 3.5;

const VOWEL_CLUSTER = /[aeiouyäöü]+/gi;
const TOKEN = /[\p{L}\p{M}\p{N}_äöüß']+/gu;

export interface WordCount {
  word: string;
  count: number;
}

export interface BigramCount {
  bigram: string;
  count: number;
}

export interface TextStats {
  totalWords: number;
  uniqueWords: number;
  totalChars: number;
  totalSyllables: number;
  totalLines: number;
  avgWordsPerLine: number;
  avgWordLength: number;
  avgSyllablesPerWord: number;
  typeTokenRatio: number;
  hapaxLegomena: number;
  hapaxRatio: number;
  topWords: WordCount[];
  topBigrams: BigramCount[];
  /** Syllable count to number of words, ascending by syllable count */
  syllableDistribution: Map<number, number>;
  flowScore: number;
  readingTimeSec: number;
}

export interface TextStatsOptions {
  topN?: number;
  stopWords?: ReadonlySet<string>;
}

export function tokenizeWords(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

/**
 * Vowel-cluster syllable estimate, at least one per word.
 */
export function countSyllables(word: string): number {
  const lower = word.toLowerCase().trim();
  if (!lower) return 0;

  let count = lower.match(VOWEL_CLUSTER)?.length ?? 0;
  if (lower.endsWith('e') && count > 1) count--;
  if (lower.endsWith('le') && count === 0) count = 1;
  return Math.max(1, count);
}

/**
 * Counts in first-seen order; sorting by count keeps that order on ties.
 */
function countOccurrences<T>(items: readonly T[]): Map<T, number> {
  const counts = new Map<T, number>();
  for (const item of items) counts.set(item, (counts.get(item) ?? 0) + 1);
  return counts;
}

function mostCommon(counts: Map<string, number>, limit: number): Array<[string, number]> {
  return [...counts].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

/**
 * One minus the coefficient of variation of per-line syllable counts.
 */
function flowScore(lineSyllables: readonly number[]): number {
  if (lineSyllables.length < 2) return 0.5;
  const mean = lineSyllables.reduce((sum, value) => sum + value, 0) / lineSyllables.length;
  if (mean <= 0) return 0;
  const variance = lineSyllables.reduce((sum, value) => sum + (value - mean) ** 2, 0) / lineSyllables.length;
  return Math.max(0, 1 - Math.sqrt(variance) / mean);
}

export function analyzeTextStats(lines: readonly string[], options: TextStatsOptions = {}): TextStats {
  const topN = options.topN ?? karaokeConfig.statsTopN;
  const stopWords = options.stopWords ?? DEFAULT_STOP_WORDS;
  if (!Number.isInteger(topN) || topN < 0) {
    throw KaraokeError.invalidOption('topN', 'must be a non-negative integer');
  }

  const allWords: string[] = [];
  const lineSyllables: number[] = [];
  for (const line of lines) {
    const tokens = tokenizeWords(line);
    allWords.push(...tokens);
    lineSyllables.push(tokens.reduce((sum, token) => sum + countSyllables(token), 0));
  }

  if (allWords.length === 0) {
    return {
      totalWords: 0,
      uniqueWords: 0,
      totalChars: 0,
      totalSyllables: 0,
      totalLines: lines.length,
      avgWordsPerLine: 0,
      avgWordLength: 0,
      avgSyllablesPerWord: 0,
      typeTokenRatio: 0,
      hapaxLegomena: 0,
      hapaxRatio: 0,
      topWords: [],
      topBigrams: [],
      syllableDistribution: new Map(),
      flowScore: 0,
      readingTimeSec: 0,
    };
  }

  const n = allWords.length;
  const wordCounts = countOccurrences(allWords);
  const unique = wordCounts.size;
  const hapax = [...wordCounts.values()].filter(count => count === 1).length;

  const syllables = allWords.map(countSyllables);
  const totalSyllables = syllables.reduce((sum, value) => sum + value, 0);
  const syllableDistribution = new Map([...countOccurrences(syllables)].sort((a, b) => a[0] - b[0]));

  const contentWords = allWords.filter(word => !stopWords.has(word) && word.length > 1);
  const bigrams = allWords.slice(0, -1).map((word, i) => `${word} ${allWords[i + 1]}`);
  const totalChars = allWords.reduce((sum, word) => sum + word.length, 0);

  const stats: TextStats = {
    totalWords: n,
    uniqueWords: unique,
    totalChars,
    totalSyllables,
    totalLines: lines.length,
    avgWordsPerLine: n / Math.max(lines.length, 1),
    avgWordLength: totalChars / n,
    avgSyllablesPerWord: totalSyllables / n,
    typeTokenRatio: unique / n,
    hapaxLegomena: hapax,
    hapaxRatio: hapax / Math.max(unique, 1),
    topWords: mostCommon(countOccurrences(contentWords), topN).map(([word, count]) => ({ word, count })),
    topBigrams: mostCommon(countOccurrences(bigrams), topN).map(([bigram, count]) => ({ bigram, count })),
    syllableDistribution,
    flowScore: flowScore(lineSyllables),
    readingTimeSec: n / WORDS_PER_SECOND,
  };

  logger.info('Text statistics computed', {
    words: n,
    unique,
    typeTokenRatio: roundTo(stats.typeTokenRatio, 3),
    flowScore: roundTo(stats.flowScore, 2),
  });

  return stats;
}

export function textStatsToDict(stats: TextStats): TextStatsDict {
  return {
    total_words: stats.totalWords,
    unique_words: stats.uniqueWords,
    total_chars: stats.totalChars,
    total_syllables: stats.totalSyllables,
    total_lines: stats.totalLines,
    avg_words_per_line: roundTo(stats.avgWordsPerLine, 1),
    avg_word_length: roundTo(stats.avgWordLength, 1),
    avg_syllables_per_word: roundTo(stats.avgSyllablesPerWord, 2),
    type_token_ratio: roundTo(stats.typeTokenRatio, 3),
    hapax_legomena: stats.hapaxLegomena,
    hapax_ratio: roundTo(stats.hapaxRatio, 3),
    top_words: stats.topWords.map(entry => ({ ...entry })),
    top_bigrams: stats.topBigrams.map(entry => ({ ...entry })),
    syllable_distribution: Object.fromEntries(
      [...stats.syllableDistribution].map(([syllableCount, words]) => [String(syllableCount), words])
    ),
    flow_score: roundTo(stats.flowScore, 2),
    reading_time_sec: roundTo(stats.readingTimeSec, 1),
  };
}
