/**
 * GapFiller - fill pauses, absorb micro-gaps, redistribute timing
 */

import type { GapFillResultDict, TranscriptSegment } from '@lyricsync/shared-contracts';
import { getLogger, karaokeConfig } from '@config/service-config';
import { KaraokeError } from '../../application/errors';
import { roundTo } from '../text';

const logger = getLogger('gap-filler');

const FILLER_MARGIN_SEC = 0.05;

export interface GapFillOptions {
  minGap?: number;
  mergeThreshold?: number;
  fillText?: string;
}

export interface GapFillResult {
  originalCount: number;
  finalCount: number;
  gapsFilled: number;
  microGapsMerged: number;
  totalGapDuration: number;
}

export interface RedistributeOptions {
  /** Defaults to the end of the last segment */
  totalDuration?: number;
  gap?: number;
}

function requireNonNegative(option: string, value: number): void {
  if (!(value >= 0)) {
    throw KaraokeError.invalidOption(option, 'must be a non-negative number');
  }
}

/**
 * Insert a filler segment into every gap longer than `minGap` and stretch a
 * segment to its successor when the gap between them is at most
 * `mergeThreshold`. Fillers sit 50 ms inside the gap, so gaps of 100 ms or
 * less never get one. Overlaps and touching segments are left alone.
 */
export function fillGaps(
  segments: readonly TranscriptSegment[],
  options: GapFillOptions = {}
): { segments: TranscriptSegment[]; result: GapFillResult } {
  const minGap = options.minGap ?? karaokeConfig.gapMin;
  const mergeThreshold = options.mergeThreshold ?? karaokeConfig.gapMergeThreshold;
  const fillText = options.fillText ?? karaokeConfig.gapFillText;
  requireNonNegative('minGap', minGap);
  requireNonNegative('mergeThreshold', mergeThreshold);

  if (segments.length < 2) {
    return {
      segments: [...segments],
      result: {
        originalCount: segments.length,
        finalCount: segments.length,
        gapsFilled: 0,
        microGapsMerged: 0,
        totalGapDuration: 0,
      },
    };
  }

  const filled: TranscriptSegment[] = [segments[0]];
  let gapsFilled = 0;
  let microMerged = 0;
  let totalGap = 0;

  for (const current of segments.slice(1)) {
    const previousIndex = filled.length - 1;
    const previous = filled[previousIndex];
    const gap = current.start - previous.end;
    const fillerStart = roundTo(previous.end + FILLER_MARGIN_SEC, 3);
    const fillerEnd = roundTo(current.start - FILLER_MARGIN_SEC, 3);

    // The filler keeps a margin on both sides, so it needs a gap wider than both margins
    if (gap > minGap && fillerEnd > fillerStart) {
      filled.push({
        start: fillerStart,
        end: fillerEnd,
        text: fillText,
        words: [],
        confidence: 1.0,
        hasWordTimestamps: false,
      });
      gapsFilled++;
      totalGap += gap;
    } else if (gap > 0 && gap <= mergeThreshold) {
      filled[previousIndex] = { ...previous, end: current.start };
      microMerged++;
    }

    filled.push(current);
  }

  logger.info('Gaps filled', {
    gapsFilled,
    microGapsMerged: microMerged,
    totalGapSec: roundTo(totalGap, 1),
  });

  return {
    segments: filled,
    result: {
      originalCount: segments.length,
      finalCount: filled.length,
      gapsFilled,
      microGapsMerged: microMerged,
      totalGapDuration: totalGap,
    },
  };
}

export function gapFillResultToDict(result: GapFillResult): GapFillResultDict {
  return {
    original_count: result.originalCount,
    final_count: result.finalCount,
    gaps_filled: result.gapsFilled,
    micro_gaps_merged: result.microGapsMerged,
    total_gap_duration: roundTo(result.totalGapDuration, 2),
  };
}

/**
 * Lay segments out back to back over the total duration, each getting time in
 * proportion to its character count. Word timings are dropped.
 */
export function redistributeTiming(
  segments: readonly TranscriptSegment[],
  options: RedistributeOptions = {}
): TranscriptSegment[] {
  const lastSegment = segments.at(-1);
  if (!lastSegment) return [];

  const gap = options.gap ?? karaokeConfig.redistributeGap;
  requireNonNegative('gap', gap);
  const totalDuration = options.totalDuration ?? lastSegment.end;

  const totalChars = segments.reduce((sum, segment) => sum + segment.text.length, 0);
  if (totalChars === 0) return [...segments];

  let usable = totalDuration - gap * (segments.length - 1);
  if (usable <= 0) usable = totalDuration;

  let cursor = 0;
  const redistributed = segments.map(segment => {
    const duration = usable * (segment.text.length / totalChars);
    const next: TranscriptSegment = {
      start: roundTo(cursor, 3),
      end: roundTo(cursor + duration, 3),
      text: segment.text,
      words: [],
      confidence: segment.confidence,
      hasWordTimestamps: false,
    };
    cursor += duration + gap;
    return next;
  });

  logger.info('Timing redistributed', { segments: segments.length, totalDurationSec: roundTo(totalDuration, 1) });
  return redistributed;
}
