/**
 * CpsFixer - bring subtitle reading speed under a characters-per-second limit
 *
 * Over-limit segments are split at natural break points (punctuation, then
 * conjunctions, then the space nearest the middle). Segments that cannot be
 * split keep their text and get a longer duration instead.
 */

import type { CpsFixResultDict, TranscriptSegment, WordInfo } from '@lyricsync/shared-contracts';
import { getLogger, karaokeConfig } from '@config/service-config';
import { KaraokeError } from '../../application/errors';
import { roundTo, splitWords } from '../text';

const logger = getLogger('cps-fixer');

/** Reported for segments without positive duration */
export const ZERO_DURATION_CPS = 999.0;

const MIN_SEGMENT_DURATION_SEC = 0.05;
const WORD_SPLIT_TOLERANCE_SEC = 0.05;
const MIN_WORDS_FOR_RESPLIT = 3;

const PUNCTUATION_BREAKS: readonly RegExp[] = [/,\s/g, /;\s/g, /\s-\s/g, /\s–\s/g];

const CONJUNCTIONS: readonly string[] = [
  'und',
  'oder',
  'aber',
  'denn',
  'weil',
  'dass',
  'wenn',
  'als',
  'with',
  'and',
  'but',
  'the',
  'for',
  'that',
  'when',
];

export interface CpsFixOptions {
  maxCps?: number;
}

export interface CpsFixResult {
  originalCount: number;
  fixedCount: number;
  segmentsSplit: number;
  segmentsTrimmed: number;
  maxCpsBefore: number;
  maxCpsAfter: number;
  avgCpsBefore: number;
  avgCpsAfter: number;
}

export function charactersPerSecond(segment: TranscriptSegment): number {
  const duration = segment.end - segment.start;
  return duration > 0 ? segment.text.length / duration : ZERO_DURATION_CPS;
}

function closestToMiddle(matches: RegExpMatchArray[], middle: number): RegExpMatchArray {
  let best = matches[0];
  for (const match of matches) {
    if (Math.abs((match.index ?? 0) - middle) < Math.abs((best.index ?? 0) - middle)) best = match;
  }
  return best;
}

/**
 * Character offset where the text should be split, or null if it has no
 * usable break.
 */
export function findSplitPoint(text: string): number | null {
  const middle = Math.floor(text.length / 2);

  for (const pattern of PUNCTUATION_BREAKS) {
    const matches = [...text.matchAll(pattern)];
    if (matches.length > 0) {
      const best = closestToMiddle(matches, middle);
      return (best.index ?? 0) + best[0].length;
    }
  }

  for (const word of CONJUNCTIONS) {
    const matches = [...text.matchAll(new RegExp(`\\s${word}\\s`, 'gi'))];
    if (matches.length > 0) {
      // Split before the conjunction
      return (closestToMiddle(matches, middle).index ?? 0) + 1;
    }
  }

  for (let offset = 0; offset < middle; offset++) {
    for (const position of [middle + offset, middle - offset]) {
      if (position > 0 && position < text.length && text[position] === ' ') {
        return position + 1;
      }
    }
  }

  return null;
}

function buildHalves(
  segment: TranscriptSegment,
  partA: string,
  partB: string,
  boundary: number
): [TranscriptSegment, TranscriptSegment] {
  const wordsA: WordInfo[] = [];
  const wordsB: WordInfo[] = [];
  for (const word of segment.words) {
    if (word.end <= boundary + WORD_SPLIT_TOLERANCE_SEC) wordsA.push({ ...word });
    else wordsB.push({ ...word });
  }

  return [
    {
      start: segment.start,
      end: boundary,
      text: partA,
      words: wordsA,
      confidence: segment.confidence,
      hasWordTimestamps: wordsA.length > 0,
    },
    {
      start: boundary,
      end: segment.end,
      text: partB,
      words: wordsB,
      confidence: segment.confidence,
      hasWordTimestamps: wordsB.length > 0,
    },
  ];
}

/**
 * End time of the word that covers the split position, if the segment has words.
 */
function wordBoundary(segment: TranscriptSegment, splitPosition: number): number | null {
  let charCount = 0;
  for (const word of segment.words) {
    charCount += word.word.length + 1;
    if (charCount >= splitPosition) return word.end;
  }
  return null;
}

/**
 * Split one segment in two, or return null when there is no usable break.
 * The boundary is the covering word's end when that keeps both halves at or
 * below the segment's own speed, else the character-proportional time.
 */
function splitOnce(segment: TranscriptSegment): [TranscriptSegment, TranscriptSegment] | null {
  const { text } = segment;
  const splitPosition = findSplitPoint(text);
  if (splitPosition === null || splitPosition <= 0 || splitPosition >= text.length) return null;

  const partA = text.slice(0, splitPosition).trimEnd();
  const partB = text.slice(splitPosition).trimStart();
  if (!partA || !partB) return null;

  const proportional = segment.start + (segment.end - segment.start) * (partA.length / text.length);
  const snapped = wordBoundary(segment, splitPosition);

  // Millisecond candidates; rounding either way may be needed to stay under the parent speed
  const candidates = [
    ...(snapped === null ? [] : [roundTo(snapped, 3)]),
    roundTo(proportional, 3),
    Math.ceil(proportional * 1000) / 1000,
    Math.floor(proportional * 1000) / 1000,
  ];

  const limit = charactersPerSecond(segment);
  for (const boundary of candidates) {
    if (boundary <= segment.start || boundary >= segment.end) continue;
    const halves = buildHalves(segment, partA, partB, boundary);
    if (halves.every(half => charactersPerSecond(half) <= limit)) return halves;
  }
  return null;
}

/**
 * Split an over-limit segment until every piece is under the limit, cannot be
 * split, or has fewer than three words. Pieces come back in text order.
 */
export function splitSegment(segment: TranscriptSegment, maxCps: number): TranscriptSegment[] {
  const pieces: TranscriptSegment[] = [];
  const pending: TranscriptSegment[] = [segment];
  let first = true;

  let current = pending.pop();
  while (current) {
    const shouldSplit = first
      ? charactersPerSecond(current) > maxCps
      : charactersPerSecond(current) > maxCps && splitWords(current.text).length >= MIN_WORDS_FOR_RESPLIT;
    first = false;

    const halves = shouldSplit ? splitOnce(current) : null;
    if (halves) {
      // Second half below the first so the first half is finished first
      pending.push(halves[1], halves[0]);
    } else {
      pieces.push(current);
    }
    current = pending.pop();
  }

  return pieces;
}

function cpsStats(segments: readonly TranscriptSegment[]): { max: number; avg: number } {
  if (segments.length === 0) return { max: 0, avg: 0 };
  const values = segments.map(charactersPerSecond);
  return { max: Math.max(...values), avg: values.reduce((sum, value) => sum + value, 0) / values.length };
}

export function autoFixCps(
  segments: readonly TranscriptSegment[],
  options: CpsFixOptions = {}
): { segments: TranscriptSegment[]; result: CpsFixResult } {
  const maxCps = options.maxCps ?? karaokeConfig.maxCps;
  if (!(maxCps > 0)) {
    throw KaraokeError.invalidOption('maxCps', 'must be a positive number');
  }

  if (segments.length === 0) {
    return {
      segments: [],
      result: {
        originalCount: 0,
        fixedCount: 0,
        segmentsSplit: 0,
        segmentsTrimmed: 0,
        maxCpsBefore: 0,
        maxCpsAfter: 0,
        avgCpsBefore: 0,
        avgCpsAfter: 0,
      },
    };
  }

  const before = cpsStats(segments);
  const fixed: TranscriptSegment[] = [];
  let splits = 0;
  let trims = 0;

  for (const segment of segments) {
    if (charactersPerSecond(segment) <= maxCps) {
      fixed.push(segment);
      continue;
    }

    const pieces = splitSegment(segment, maxCps);
    if (pieces.length > 1) {
      fixed.push(...pieces);
      splits++;
    } else {
      fixed.push({
        ...segment,
        // Rounding must not shorten the segment
        end: Math.max(segment.end, roundTo(segment.start + segment.text.length / maxCps, 3)),
        words: segment.words.map(word => ({ ...word })),
      });
      trims++;
    }
  }

  const kept = fixed.filter(segment => segment.end - segment.start >= MIN_SEGMENT_DURATION_SEC);
  const after = cpsStats(kept);

  const result: CpsFixResult = {
    originalCount: segments.length,
    fixedCount: kept.length,
    segmentsSplit: splits,
    segmentsTrimmed: trims,
    maxCpsBefore: before.max,
    maxCpsAfter: after.max,
    avgCpsBefore: before.avg,
    avgCpsAfter: after.avg,
  };

  logger.info('CPS fix applied', {
    split: splits,
    trimmed: trims,
    maxCpsBefore: Math.round(before.max),
    maxCpsAfter: Math.round(after.max),
    segmentsBefore: segments.length,
    segmentsAfter: kept.length,
  });

  return { segments: kept, result };
}

export function cpsFixResultToDict(result: CpsFixResult): CpsFixResultDict {
  return {
    original_count: result.originalCount,
    fixed_count: result.fixedCount,
    segments_split: result.segmentsSplit,
    segments_trimmed: result.segmentsTrimmed,
    max_cps_before: roundTo(result.maxCpsBefore, 1),
    max_cps_after: roundTo(result.maxCpsAfter, 1),
    avg_cps_before: roundTo(result.avgCpsBefore, 1),
    avg_cps_after: roundTo(result.avgCpsAfter, 1),
  };
}
