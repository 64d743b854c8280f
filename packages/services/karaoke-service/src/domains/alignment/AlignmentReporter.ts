/**
 * AlignmentReporter - per-line match quality of lyrics against recognized text
 *
 * Every aligned segment (whose text is the lyrics line) is compared with the
 * raw recognizer output in two ways: the text that overlaps its time range,
 * and the best forward window in the recognized word stream. The better of
 * the two is reported, together with the words that differ and how reliable
 * the segment's timing is.
 */

import type {
  AlignmentReportDict,
  DiffReportDict,
  TimingSource,
  TranscriptSegment,
} from '@lyricsync/shared-contracts';
import { createTimer, generateCorrelationId, getCorrelationContext, runWithContext } from '@lyricsync/platform-core';
import { getLogger } from '@config/service-config';
import { computeMatchScore, findDiffWords, roundTo, splitWords } from '../text';
import { SequentialAligner } from './SequentialAligner';

const logger = getLogger('alignment-reporter');

const SEGMENT_TOLERANCE_SEC = 0.5;
const WORD_TOLERANCE_SEC = 0.1;
const DIFF_SCORE_LIMIT = 0.95;
const REVIEW_SCORE_LIMIT = 0.6;
const SEGMENT_CONFIDENCE_LIMIT = 0.5;
const REPORT_AVG_SCORE_LIMIT = 0.75;
const REPORT_APPROX_SHARE_LIMIT = 0.3;

export interface LineAlignment {
  lineIndex: number;
  lyricsText: string;
  asrText: string;
  matchScore: number;
  timingSource: TimingSource;
  start: number;
  end: number;
  wordCountLyrics: number;
  wordCountAsr: number;
  needsReview: boolean;
  diffWords: string[];
}

export interface AlignmentReport {
  totalLines: number;
  matchedLines: number;
  avgMatchScore: number;
  minMatchScore: number;
  linesNeedingReview: number;
  unresolvedLines: number;
  approxTimingLines: number;
  wordLevelLines: number;
  totalDuration: number;
  lineAlignments: LineAlignment[];
}

export function reportNeedsReview(report: AlignmentReport): boolean {
  return (
    report.avgMatchScore < REPORT_AVG_SCORE_LIMIT ||
    report.unresolvedLines > 0 ||
    report.approxTimingLines > report.totalLines * REPORT_APPROX_SHARE_LIMIT
  );
}

/**
 * Recognized text overlapping `[start, end]`, with half a second of slack per
 * segment and a tenth of a second per word.
 */
export function findAsrTextInRange(segments: readonly TranscriptSegment[], start: number, end: number): string {
  const texts: string[] = [];
  for (const segment of segments) {
    if (segment.end <= start - SEGMENT_TOLERANCE_SEC || segment.start >= end + SEGMENT_TOLERANCE_SEC) continue;

    if (segment.words.length > 0) {
      for (const word of segment.words) {
        if (word.end > start - WORD_TOLERANCE_SEC && word.start < end + WORD_TOLERANCE_SEC) {
          texts.push(word.word);
        }
      }
    } else {
      texts.push(segment.text);
    }
  }
  return texts.join(' ');
}

function classifyTiming(segment: TranscriptSegment): TimingSource {
  if (segment.hasWordTimestamps && segment.words.length > 0) return 'word_level';
  if (segment.confidence > SEGMENT_CONFIDENCE_LIMIT) return 'segment_level';
  return 'estimated';
}

/**
 * Score every aligned segment against its lyrics line. Runs inside a
 * correlation context so all log lines of one report share an id; an id
 * already set by the caller is reused.
 */
export function generateAlignmentReport(
  targetLines: readonly string[],
  alignedSegments: readonly TranscriptSegment[],
  originalSegments: readonly TranscriptSegment[]
): AlignmentReport {
  const correlationId = getCorrelationContext()?.correlationId ?? generateCorrelationId();
  return runWithContext({ correlationId, module: 'alignment-report' }, () =>
    buildAlignmentReport(targetLines, alignedSegments, originalSegments)
  );
}

function buildAlignmentReport(
  targetLines: readonly string[],
  alignedSegments: readonly TranscriptSegment[],
  originalSegments: readonly TranscriptSegment[]
): AlignmentReport {
  const stopTimer = createTimer(logger, 'alignment-report');
  const aligner = SequentialAligner.fromSegments(originalSegments);
  const lineAlignments: LineAlignment[] = [];
  let unresolved = 0;
  let approx = 0;
  let wordLevel = 0;

  if (targetLines.length !== alignedSegments.length) {
    logger.warn('Lyrics line count differs from aligned segment count', {
      targetLines: targetLines.length,
      alignedSegments: alignedSegments.length,
    });
  }

  alignedSegments.forEach((segment, index) => {
    const lyricsText = index < targetLines.length ? targetLines[index] : segment.text;

    const textByTime = findAsrTextInRange(originalSegments, segment.start, segment.end);
    const sequential = aligner.peek(lyricsText);

    const scoreByTime = textByTime ? computeMatchScore(lyricsText, textByTime) : 0;
    const scoreByWords = sequential.text ? computeMatchScore(lyricsText, sequential.text) : 0;

    let asrText = textByTime;
    let score = scoreByTime;
    if (scoreByWords > scoreByTime) {
      asrText = sequential.text;
      score = scoreByWords;
      aligner.commit(sequential);
    }

    const timingSource = classifyTiming(segment);
    if (timingSource === 'word_level') wordLevel++;
    if (timingSource === 'estimated') {
      approx++;
      unresolved++;
    }

    lineAlignments.push({
      lineIndex: index,
      lyricsText,
      asrText,
      matchScore: score,
      timingSource,
      start: segment.start,
      end: segment.end,
      wordCountLyrics: splitWords(lyricsText).length,
      wordCountAsr: splitWords(asrText).length,
      needsReview: score < REVIEW_SCORE_LIMIT || timingSource === 'estimated',
      diffWords: score < DIFF_SCORE_LIMIT ? findDiffWords(lyricsText, asrText) : [],
    });
  });

  const scores = lineAlignments.length > 0 ? lineAlignments.map(line => line.matchScore) : [0];
  const lastSegment = alignedSegments.at(-1);

  const report: AlignmentReport = {
    totalLines: targetLines.length,
    matchedLines: alignedSegments.length,
    avgMatchScore: scores.reduce((sum, score) => sum + score, 0) / scores.length,
    minMatchScore: Math.min(...scores),
    linesNeedingReview: lineAlignments.filter(line => line.needsReview).length,
    unresolvedLines: unresolved,
    approxTimingLines: approx,
    wordLevelLines: wordLevel,
    totalDuration: lastSegment ? lastSegment.end : 0,
    lineAlignments,
  };

  logger.info('Alignment report generated', {
    avgMatchScore: roundTo(report.avgMatchScore, 2),
    linesNeedingReview: report.linesNeedingReview,
    totalLines: report.totalLines,
    unresolvedLines: report.unresolvedLines,
    durationMs: stopTimer(),
  });

  return report;
}

export function alignmentReportToDict(report: AlignmentReport): AlignmentReportDict {
  return {
    total_lines: report.totalLines,
    matched_lines: report.matchedLines,
    avg_match_score: roundTo(report.avgMatchScore, 3),
    min_match_score: roundTo(report.minMatchScore, 3),
    lines_needing_review: report.linesNeedingReview,
    unresolved_lines: report.unresolvedLines,
    approx_timing_lines: report.approxTimingLines,
    word_level_lines: report.wordLevelLines,
    total_duration: roundTo(report.totalDuration, 2),
    needs_review: reportNeedsReview(report),
    lines: report.lineAlignments.map(line => ({
      index: line.lineIndex,
      lyrics: line.lyricsText,
      asr: line.asrText,
      score: roundTo(line.matchScore, 3),
      timing: line.timingSource,
      start: roundTo(line.start, 3),
      end: roundTo(line.end, 3),
      needs_review: line.needsReview,
      diffs: [...line.diffWords],
    })),
  };
}

/**
 * Lines with word differences or a score below the near-perfect limit.
 */
export function buildDiffReport(report: AlignmentReport): DiffReportDict {
  const lines = report.lineAlignments.filter(
    line => line.diffWords.length > 0 || line.matchScore < DIFF_SCORE_LIMIT
  );
  return {
    total_diffs: lines.length,
    lines: lines.map(line => ({
      index: line.lineIndex,
      lyrics: line.lyricsText,
      asr: line.asrText,
      score: roundTo(line.matchScore, 3),
      diffs: [...line.diffWords],
    })),
  };
}
