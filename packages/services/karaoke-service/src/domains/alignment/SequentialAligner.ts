/**
 * SequentialAligner - forward-only window search over recognized words
 *
 * Holds the flattened, normalized word stream of the recognized segments and
 * a cursor into it. Each lyrics line is matched against windows starting at
 * the cursor; the cursor only moves when a match is good enough, so one
 * badly recognized line cannot desynchronize the lines after it.
 */

import type { TranscriptSegment } from '@lyricsync/shared-contracts';
import { normalizeText, similarityRatio, splitWords } from '../text';

export const MATCH_ADVANCE_THRESHOLD = 0.3;

const LOOKAHEAD_WORDS_PER_TOKEN = 4;
const LOOKAHEAD_EXTRA_WORDS = 30;

export interface SequentialMatch {
  text: string;
  score: number;
  /** Window bounds in the word stream, end exclusive */
  start: number;
  end: number;
  /** Whether committing this match moves the cursor */
  advances: boolean;
}

/**
 * One element per recognized word, or the normalized tokens of segment text
 * where a segment has no word timings.
 */
export function flattenAsrWords(segments: readonly TranscriptSegment[]): string[] {
  const words: string[] = [];
  for (const segment of segments) {
    if (segment.words.length > 0) {
      words.push(...segment.words.map(word => normalizeText(word.word)));
    } else {
      words.push(...splitWords(normalizeText(segment.text)));
    }
  }
  return words;
}

export class SequentialAligner {
  private readonly words: readonly string[];
  private position = 0;

  constructor(words: readonly string[]) {
    this.words = words;
  }

  static fromSegments(segments: readonly TranscriptSegment[]): SequentialAligner {
    return new SequentialAligner(flattenAsrWords(segments));
  }

  get cursor(): number {
    return this.position;
  }

  get length(): number {
    return this.words.length;
  }

  /**
   * Best window for a lyrics line from the current cursor, without moving it.
   */
  peek(lyricsText: string): SequentialMatch {
    const target = normalizeText(lyricsText);
    const targetTokens = splitWords(target);
    const none: SequentialMatch = { text: '', score: 0, start: this.position, end: this.position, advances: false };
    if (targetTokens.length === 0 || this.words.length === 0) return none;

    const n = targetTokens.length;
    const searchEnd = Math.min(this.words.length, this.position + n * LOOKAHEAD_WORDS_PER_TOKEN + LOOKAHEAD_EXTRA_WORDS);
    let best = none;

    for (let windowStart = this.position; windowStart < searchEnd; windowStart++) {
      for (let size = Math.max(1, n - 2); size <= n + 3; size++) {
        const windowEnd = windowStart + size;
        if (windowEnd > this.words.length) break;

        const candidate = this.words.slice(windowStart, windowEnd).join(' ');
        const score = similarityRatio(target, candidate);
        if (score > best.score) {
          best = { text: candidate, score, start: windowStart, end: windowEnd, advances: false };
        }
      }
    }

    return { ...best, advances: best.score >= MATCH_ADVANCE_THRESHOLD };
  }

  /**
   * Move the cursor to the end of a match found by `peek`. Weak matches leave
   * it where it is. Returns the cursor afterwards.
   */
  commit(match: SequentialMatch): number {
    if (match.advances) this.position = match.end;
    return this.position;
  }

  findBestMatch(lyricsText: string): SequentialMatch {
    const match = this.peek(lyricsText);
    this.commit(match);
    return match;
  }
}
