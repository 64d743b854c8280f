/**
 * RhymeAnalyzer - end, internal and multisyllabic rhymes in lyrics lines
 *
 * Scoring works on a rough phonetic spelling tuned for German with English
 * fallbacks: digraphs are folded, then the word's rhyme tail (from the last
 * or second-to-last vowel cluster) is compared.
 */

import type { RhymeSchemeDict, RhymeType } from '@lyricsync/shared-contracts';
import { getLogger, karaokeConfig } from '@config/service-config';
import { KaraokeError } from '../../application/errors';
import { roundTo, similarityRatio } from '../text';

const logger = getLogger('rhyme-analyzer');

/** Applied in order; a later entry sees the output of the earlier ones */
const PHONETIC_MAP: ReadonlyArray<readonly [string, string]> = [
  ['ph', 'f'],
  ['ck', 'k'],
  ['th', 't'],
  ['dt', 't'],
  ['tz', 'z'],
  ['ss', 's'],
  ['ß', 's'],
  ['ae', 'ä'],
  ['oe', 'ö'],
  ['ue', 'ü'],
  ['ei', 'ai'],
  ['ey', 'ai'],
  ['ay', 'ai'],
  ['eu', 'oi'],
  ['äu', 'oi'],
  ['ie', 'ii'],
  ['ih', 'ii'],
  ['ieh', 'ii'],
  ['ah', 'aa'],
  ['eh', 'ee'],
  ['oh', 'oo'],
  ['uh', 'uu'],
];

const VOWEL_CLUSTER = /[aeiouyäöü]+/gi;
const WORD_TOKEN = /[\p{L}\p{M}\p{N}_äöüß]+/gu;

const IDENTICAL_WORD_SCORE = 0.3;
const FUZZY_TAIL_WEIGHT = 0.6;
const MULTI_TAIL_MIN_CHARS = 4;
const MULTI_SIMILARITY_THRESHOLD = 0.7;
const MIN_TOKENS_FOR_INTERNAL = 4;
const SHORT_END_WORD_LENGTH = 3;

export interface RhymePair {
  lineA: number;
  lineB: number;
  wordA: string;
  wordB: string;
  score: number;
  type: RhymeType;
}

export interface RhymeScheme {
  totalLines: number;
  labels: string[];
  pattern: string;
  pairs: RhymePair[];
  density: number;
  internalRhymes: RhymePair[];
  multiRhymes: RhymePair[];
}

export interface RhymeOptions {
  /** Minimum score for two words to count as a rhyme */
  threshold?: number;
  /** How many lines ahead to look for end-rhyme partners */
  window?: number;
}

export function normalizePhonetic(word: string): string {
  let phonetic = word.toLowerCase().trim().normalize('NFC').replace(/[^a-zäöüß]/g, '');
  for (const [from, to] of PHONETIC_MAP) {
    phonetic = phonetic.replaceAll(from, to);
  }
  return phonetic;
}

export function getRhymeTail(word: string, minChars = 2): string {
  const phonetic = normalizePhonetic(word);
  if (phonetic.length < minChars) return phonetic;

  const clusters = [...phonetic.matchAll(VOWEL_CLUSTER)];
  if (clusters.length === 0) return phonetic.slice(-minChars);

  const from = clusters.length >= 2 ? clusters[clusters.length - 2] : clusters[clusters.length - 1];
  return phonetic.slice(from.index ?? 0);
}

function wordTokens(line: string): string[] {
  return line.match(WORD_TOKEN) ?? [];
}

/**
 * Last word of a line, skipping a trailing word of three characters or less.
 */
export function getEndWord(line: string): string {
  const words = wordTokens(line);
  const last = words.at(-1);
  if (last === undefined) return '';
  if (words.length >= 2 && last.length <= SHORT_END_WORD_LENGTH) return words[words.length - 2];
  return last;
}

export function rhymeScore(wordA: string, wordB: string): number {
  if (!wordA || !wordB) return 0;
  if (normalizePhonetic(wordA) === normalizePhonetic(wordB)) return IDENTICAL_WORD_SCORE;

  const tailA = getRhymeTail(wordA);
  const tailB = getRhymeTail(wordB);
  if (!tailA || !tailB) return 0;
  if (tailA === tailB) return 1.0;

  const maxLength = Math.min(tailA.length, tailB.length);
  let common = 0;
  while (common < maxLength && tailA[tailA.length - 1 - common] === tailB[tailB.length - 1 - common]) {
    common++;
  }

  if (common >= 3) return 0.9;
  if (common === 2) return 0.7;
  if (common === 1) return 0.4;
  return similarityRatio(tailA, tailB) * FUZZY_TAIL_WEIGHT;
}

function labelFor(index: number): string {
  return String.fromCharCode('A'.charCodeAt(0) + (index % 26));
}

function findInternalRhyme(line: string, lineIndex: number, threshold: number): RhymePair | null {
  const words = wordTokens(line);
  if (words.length < MIN_TOKENS_FOR_INTERNAL) return null;

  const middle = Math.floor(words.length / 2);
  for (const wordA of words.slice(0, middle)) {
    for (const wordB of words.slice(middle)) {
      const score = rhymeScore(wordA, wordB);
      if (score >= threshold && wordA.toLowerCase() !== wordB.toLowerCase()) {
        return { lineA: lineIndex, lineB: lineIndex, wordA, wordB, score, type: 'internal' };
      }
    }
  }
  return null;
}

export function detectRhymeScheme(lines: readonly string[], options: RhymeOptions = {}): RhymeScheme {
  const threshold = options.threshold ?? karaokeConfig.rhymeThreshold;
  const window = options.window ?? karaokeConfig.rhymeWindow;
  if (!Number.isInteger(window) || window < 1) {
    throw KaraokeError.invalidOption('window', 'must be a positive integer');
  }

  const n = lines.length;
  if (n === 0) {
    return { totalLines: 0, labels: [], pattern: '', pairs: [], density: 0, internalRhymes: [], multiRhymes: [] };
  }

  const endWords = lines.map(getEndWord);
  const pairs: RhymePair[] = [];
  const partners = new Map<number, Array<{ line: number; score: number }>>();
  const addPartner = (line: number, partner: number, score: number) => {
    const list = partners.get(line) ?? [];
    list.push({ line: partner, score });
    partners.set(line, list);
  };

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < Math.min(i + window + 1, n); j++) {
      const score = rhymeScore(endWords[i], endWords[j]);
      if (score >= threshold) {
        pairs.push({ lineA: i, lineB: j, wordA: endWords[i], wordB: endWords[j], score, type: 'end' });
        addPartner(i, j, score);
        addPartner(j, i, score);
      }
    }
  }

  // Greedy labelling: inherit from the best earlier partner, else a fresh letter
  const labels: string[] = new Array<string>(n).fill('');
  let nextLabel = 0;
  for (let i = 0; i < n; i++) {
    if (labels[i]) continue;

    let bestPartner: number | null = null;
    let bestScore = 0;
    for (const { line, score } of partners.get(i) ?? []) {
      if (line < i && labels[line] && score > bestScore) {
        bestPartner = line;
        bestScore = score;
      }
    }

    labels[i] = bestPartner !== null ? labels[bestPartner] : labelFor(nextLabel++);

    for (const { line, score } of partners.get(i) ?? []) {
      if (line > i && !labels[line] && score >= threshold) labels[line] = labels[i];
    }
  }

  const internalRhymes: RhymePair[] = [];
  lines.forEach((line, index) => {
    const pair = findInternalRhyme(line, index, threshold);
    if (pair) internalRhymes.push(pair);
  });

  const multiRhymes: RhymePair[] = [];
  for (const pair of pairs) {
    const tailA = getRhymeTail(pair.wordA, MULTI_TAIL_MIN_CHARS);
    const tailB = getRhymeTail(pair.wordB, MULTI_TAIL_MIN_CHARS);
    if (tailA.length < MULTI_TAIL_MIN_CHARS || tailB.length < MULTI_TAIL_MIN_CHARS) continue;

    const similarity = similarityRatio(tailA, tailB);
    if (similarity >= MULTI_SIMILARITY_THRESHOLD) {
      multiRhymes.push({ ...pair, score: similarity, type: 'multi' });
    }
  }

  const rhymingLines = new Set<number>();
  for (const pair of pairs) {
    rhymingLines.add(pair.lineA);
    rhymingLines.add(pair.lineB);
  }

  const scheme: RhymeScheme = {
    totalLines: n,
    labels,
    pattern: labels.join(''),
    pairs,
    density: rhymingLines.size / n,
    internalRhymes,
    multiRhymes,
  };

  logger.info('Rhyme scheme detected', {
    pattern: scheme.pattern.length > 40 ? `${scheme.pattern.slice(0, 40)}...` : scheme.pattern,
    pairs: pairs.length,
    density: roundTo(scheme.density, 2),
  });

  return scheme;
}

type RhymePairDict = RhymeSchemeDict['internal'][number];

function pairToDict(pair: RhymePair): RhymePairDict {
  return {
    a: pair.lineA,
    b: pair.lineB,
    words: [pair.wordA, pair.wordB],
    score: roundTo(pair.score, 2),
  };
}

export function rhymeSchemeToDict(scheme: RhymeScheme): RhymeSchemeDict {
  return {
    total_lines: scheme.totalLines,
    scheme: scheme.pattern,
    labels: [...scheme.labels],
    density: roundTo(scheme.density, 2),
    pairs: scheme.pairs.map(pair => ({ ...pairToDict(pair), type: pair.type })),
    internal: scheme.internalRhymes.map(pairToDict),
    multi: scheme.multiRhymes.map(pairToDict),
  };
}
