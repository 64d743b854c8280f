/**
 * Unit Tests for transcript and report contracts
 */

import { describe, it, expect } from 'vitest';
import {
  SpeechSegmentSchema,
  TranscriptResultSchema,
  TranscriptSegmentSchema,
} from '../timing/transcripts';
import { AlignmentReportDictSchema, DiffReportDictSchema } from '../reports/reports';
import { ContractValidationError, parseContract, safeParseContract } from '../validation-utils';

describe('TranscriptSegmentSchema', () => {
  it('should fill defaults for a bare segment', () => {
    const segment = TranscriptSegmentSchema.parse({ start: 0, end: 1.5, text: 'Zeile eins' });

    expect(segment).toEqual({
      start: 0,
      end: 1.5,
      text: 'Zeile eins',
      words: [],
      confidence: 1,
      hasWordTimestamps: false,
    });
  });

  it('should derive hasWordTimestamps from words', () => {
    const segment = TranscriptSegmentSchema.parse({
      start: 0,
      end: 1,
      text: 'hallo welt',
      words: [
        { word: 'hallo', start: 0, end: 0.4 },
        { word: 'welt', start: 0.5, end: 1, confidence: 0.8 },
      ],
    });

    expect(segment.hasWordTimestamps).toBe(true);
    expect(segment.words[0].confidence).toBe(1);
    expect(segment.words[1].confidence).toBe(0.8);
  });

  it('should honour the snake_case flag and drop it from the output', () => {
    const segment = TranscriptSegmentSchema.parse({
      start: 0,
      end: 1,
      text: 'x',
      words: [{ word: 'x', start: 0, end: 1 }],
      has_word_timestamps: false,
    });

    expect(segment.hasWordTimestamps).toBe(false);
    expect(segment).not.toHaveProperty('has_word_timestamps');
  });

  it('should reject segments that end before they start', () => {
    expect(() => parseContract(TranscriptSegmentSchema, { start: 2, end: 1, text: 'x' }, 'segment')).toThrow(
      ContractValidationError
    );
  });

  it('should reject confidence outside [0, 1]', () => {
    const result = safeParseContract(TranscriptSegmentSchema, { start: 0, end: 1, text: 'x', confidence: 1.5 });

    expect(result.success).toBe(false);
  });
});

describe('TranscriptResultSchema', () => {
  it('should default backend metadata', () => {
    const result = TranscriptResultSchema.parse({ segments: [] });

    expect(result).toEqual({ segments: [], language: 'unknown', backend: 'unknown', duration: 0 });
  });
});

describe('SpeechSegmentSchema', () => {
  it('should accept integer millisecond intervals', () => {
    expect(SpeechSegmentSchema.parse({ startMs: 100, endMs: 900 })).toEqual({ startMs: 100, endMs: 900 });
  });

  it('should reject fractional milliseconds and inverted intervals', () => {
    expect(SpeechSegmentSchema.safeParse({ startMs: 1.5, endMs: 900 }).success).toBe(false);
    expect(SpeechSegmentSchema.safeParse({ startMs: 900, endMs: 100 }).success).toBe(false);
  });
});

describe('report contracts', () => {
  it('should accept a minimal alignment report', () => {
    const report = {
      total_lines: 1,
      matched_lines: 1,
      avg_match_score: 1,
      min_match_score: 1,
      lines_needing_review: 0,
      unresolved_lines: 0,
      approx_timing_lines: 0,
      word_level_lines: 1,
      total_duration: 2,
      needs_review: false,
      lines: [
        {
          index: 0,
          lyrics: 'Zeile eins',
          asr: 'zeile eins',
          score: 1,
          timing: 'word_level',
          start: 0,
          end: 2,
          needs_review: false,
          diffs: [],
        },
      ],
    };

    expect(AlignmentReportDictSchema.safeParse(report).success).toBe(true);
  });

  it('should reject unknown timing sources', () => {
    const result = DiffReportDictSchema.safeParse({ total_diffs: 0, lines: [] });
    const bad = AlignmentReportDictSchema.shape.lines.element.shape.timing.safeParse('guessed');

    expect(result.success).toBe(true);
    expect(bad.success).toBe(false);
  });
});
