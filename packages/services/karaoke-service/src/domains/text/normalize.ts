/**
 * Text normalization shared by matching, rhyme and statistics.
 */

import { SequenceMatcher } from './SequenceMatcher';

const NON_WORD_PATTERN = /[^\p{L}\p{M}\p{N}_\s]/gu;
const WHITESPACE_PATTERN = /\s+/u;

/**
 * Lowercase, drop punctuation, NFC-normalize and collapse whitespace.
 * Applying it twice yields the same string.
 */
export function normalizeText(text: string): string {
  const stripped = text.toLowerCase().trim().replace(NON_WORD_PATTERN, '').normalize('NFC');
  return splitWords(stripped).join(' ');
}

/**
 * Split on runs of whitespace, dropping empty pieces.
 */
export function splitWords(text: string): string[] {
  return text.split(WHITESPACE_PATTERN).filter(word => word.length > 0);
}

export function tokenize(text: string): string[] {
  return splitWords(normalizeText(text));
}

/**
 * Character-level similarity of two strings in [0, 1].
 */
export function similarityRatio(a: string, b: string): number {
  return new SequenceMatcher(Array.from(a), Array.from(b)).ratio();
}

/**
 * Similarity between a lyrics line and recognized text after normalization.
 * Two empty strings match perfectly, one empty side never matches.
 */
export function computeMatchScore(lyricsText: string, asrText: string): number {
  const a = normalizeText(lyricsText);
  const b = normalizeText(asrText);
  if (!a && !b) return 1.0;
  if (!a || !b) return 0.0;
  return similarityRatio(a, b);
}

/**
 * Word-level differences as `-word` (only in lyrics) and `+word` (only in recognized text).
 */
export function findDiffWords(lyricsText: string, asrText: string): string[] {
  const aWords = tokenize(lyricsText);
  const bWords = tokenize(asrText);
  const diffs: string[] = [];

  for (const { tag, i1, i2, j1, j2 } of new SequenceMatcher(aWords, bWords).getOpcodes()) {
    if (tag === 'equal') continue;
    if (tag === 'replace' || tag === 'delete') {
      diffs.push(...aWords.slice(i1, i2).map(word => `-${word}`));
    }
    if (tag === 'replace' || tag === 'insert') {
      diffs.push(...bWords.slice(j1, j2).map(word => `+${word}`));
    }
  }

  return diffs;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
