import { describe, it, expect } from 'vitest';
import { createMockSegment, createMockWord } from '@lyricsync/test-utils';
import {
  autoFixCps,
  charactersPerSecond,
  cpsFixResultToDict,
  findSplitPoint,
  splitSegment,
  ZERO_DURATION_CPS,
} from '../domains/timing';
import { KaraokeError, KaraokeErrorCode } from '../application/errors';

describe('charactersPerSecond', () => {
  it('divides text length by duration', () => {
    expect(charactersPerSecond(createMockSegment({ start: 0, end: 2, text: 'abcd' }))).toBe(2);
  });

  it('treats zero duration as always over the limit', () => {
    expect(charactersPerSecond(createMockSegment({ start: 1, end: 1, text: 'a' }))).toBe(ZERO_DURATION_CPS);
  });
});

describe('findSplitPoint', () => {
  it('prefers punctuation and splits after it', () => {
    expect(findSplitPoint('Hallo Welt, wie geht es dir')).toBe(12);
  });

  it('picks the punctuation closest to the middle', () => {
    expect(findSplitPoint('a, b, c, d')).toBe(6);
  });

  it('splits before a conjunction', () => {
    expect(findSplitPoint('ich komme und du gehst')).toBe(10);
  });

  it('tries conjunctions in their listed order', () => {
    expect(findSplitPoint('wir lachen oder weinen und gehen')).toBe(23);
  });

  it('falls back to the space nearest the middle', () => {
    expect(findSplitPoint('abc defgh ij')).toBe(10);
  });

  it('returns null without any break', () => {
    expect(findSplitPoint('abcdef')).toBeNull();
  });
});

describe('splitSegment', () => {
  it('returns a segment under the limit as is', () => {
    const segment = createMockSegment({ start: 0, end: 2, text: 'Hallo' });
    const pieces = splitSegment(segment, 22);
    expect(pieces).toHaveLength(1);
    expect(pieces[0]).toBe(segment);
  });

  it('does not re-split halves with fewer than three words', () => {
    const pieces = splitSegment(createMockSegment({ start: 0, end: 0.1, text: 'ab cd' }), 22);
    expect(pieces.map(piece => [piece.text, piece.start, piece.end])).toEqual([
      ['ab', 0, 0.04],
      ['cd', 0.04, 0.1],
    ]);
  });
});

describe('autoFixCps', () => {
  it('leaves segments under the limit untouched', () => {
    const segments = [createMockSegment({ start: 0, end: 2, text: 'Hallo' })];
    const { segments: fixed, result } = autoFixCps(segments, { maxCps: 22 });

    expect(fixed).toEqual(segments);
    expect(result.segmentsSplit).toBe(0);
    expect(result.segmentsTrimmed).toBe(0);
  });

  it('splits fast segments repeatedly at natural breaks', () => {
    const { segments, result } = autoFixCps(
      [createMockSegment({ start: 0, end: 1, text: 'Hallo Welt, wie geht es dir' })],
      { maxCps: 22 }
    );

    expect(segments.map(segment => [segment.text, segment.start, segment.end])).toEqual([
      ['Hallo Welt,', 0, 0.408],
      ['wie geht', 0.408, 0.724],
      ['es dir', 0.724, 1],
    ]);
    expect(result.originalCount).toBe(1);
    expect(result.fixedCount).toBe(3);
    expect(result.segmentsSplit).toBe(1);
    expect(result.maxCpsBefore).toBe(27);
    expect(result.maxCpsAfter).toBeLessThanOrEqual(result.maxCpsBefore);
  });

  it('splits at the word end when both halves stay under the original speed', () => {
    const words = [
      createMockWord({ word: 'eins', start: 0, end: 0.12 }),
      createMockWord({ word: 'zwei', start: 0.12, end: 0.25 }),
      createMockWord({ word: 'drei', start: 0.25, end: 0.38 }),
      createMockWord({ word: 'vier', start: 0.38, end: 0.5 }),
    ];
    const { segments } = autoFixCps([createMockSegment({ start: 0, end: 0.5, text: 'eins zwei drei vier', words })], {
      maxCps: 22,
    });

    expect(segments).toHaveLength(2);
    expect(segments[0]).toMatchObject({ text: 'eins zwei', start: 0, end: 0.25, hasWordTimestamps: true });
    expect(segments[0].words.map(word => word.word)).toEqual(['eins', 'zwei']);
    expect(segments[1]).toMatchObject({ text: 'drei vier', start: 0.25, end: 0.5, hasWordTimestamps: true });
    expect(segments[1].words.map(word => word.word)).toEqual(['drei', 'vier']);
  });

  it('keeps the proportional boundary when the word end would speed up a half', () => {
    const words = [
      createMockWord({ word: 'eins', start: 0, end: 0.1 }),
      createMockWord({ word: 'zwei', start: 0.1, end: 0.2 }),
      createMockWord({ word: 'drei', start: 0.2, end: 0.35 }),
      createMockWord({ word: 'vier', start: 0.35, end: 0.5 }),
    ];
    const { segments } = autoFixCps([createMockSegment({ start: 0, end: 0.5, text: 'eins zwei drei vier', words })], {
      maxCps: 22,
    });

    expect(segments.map(segment => [segment.text, segment.start, segment.end])).toEqual([
      ['eins zwei', 0, 0.237],
      ['drei vier', 0.237, 0.5],
    ]);
    expect(segments[0].words.map(word => word.word)).toEqual(['eins', 'zwei']);
    expect(segments[1].words.map(word => word.word)).toEqual(['drei', 'vier']);
  });

  it('never raises the fastest reading speed when a long word ends late', () => {
    const words = [
      createMockWord({ word: 'aaaaaaaaaa,', start: 0, end: 0.9 }),
      createMockWord({ word: 'bbbbbbbbbb', start: 0.9, end: 0.95 }),
      createMockWord({ word: 'cccccccccc', start: 0.95, end: 1 }),
    ];
    const { segments, result } = autoFixCps(
      [createMockSegment({ start: 0, end: 1, text: 'aaaaaaaaaa, bbbbbbbbbb cccccccccc', words })],
      { maxCps: 22 }
    );

    expect(segments.map(segment => [segment.text, segment.start, segment.end])).toEqual([
      ['aaaaaaaaaa,', 0, 0.334],
      ['bbbbbbbbbb cccccccccc', 0.334, 1],
    ]);
    expect(result.maxCpsBefore).toBe(33);
    expect(result.maxCpsAfter).toBeLessThanOrEqual(result.maxCpsBefore);
  });

  it('extends unsplittable segments instead of changing their text', () => {
    const input = [createMockSegment({ start: 0, end: 0.5, text: 'abcdefghijklmnopqrstuvwxyz' })];
    const { segments, result } = autoFixCps(input, { maxCps: 22 });

    expect(segments).toHaveLength(1);
    expect(segments[0].text).toBe('abcdefghijklmnopqrstuvwxyz');
    expect(segments[0].end).toBe(1.182);
    expect(result.segmentsTrimmed).toBe(1);
    expect(result.maxCpsAfter).toBeLessThanOrEqual(result.maxCpsBefore);
    expect(result.fixedCount).toBeGreaterThanOrEqual(result.originalCount);
  });

  it('drops degenerate segments after fixing', () => {
    const { segments, result } = autoFixCps(
      [createMockSegment({ start: 0, end: 2, text: 'Hallo' }), createMockSegment({ start: 3, end: 3.01, text: 'x' })],
      { maxCps: 22 }
    );

    expect(segments.map(segment => segment.text)).toEqual(['Hallo']);
    expect(result.segmentsTrimmed).toBe(1);
    expect(result.fixedCount).toBe(1);
  });

  it('returns zero statistics for no segments', () => {
    expect(autoFixCps([], { maxCps: 22 })).toEqual({
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
    });
  });

  it('rejects a non-positive limit', () => {
    expect(() => autoFixCps([], { maxCps: 0 })).toThrow(KaraokeError);
    expect(() => autoFixCps([], { maxCps: -5 })).toThrow(/maxCps/);
    try {
      autoFixCps([], { maxCps: 0 });
    } catch (error) {
      expect(error instanceof KaraokeError && error.code).toBe(KaraokeErrorCode.INVALID_OPTIONS);
    }
  });

  it('does not mutate its input', () => {
    const input = [createMockSegment({ start: 0, end: 1, text: 'Hallo Welt, wie geht es dir' })];
    const copy = structuredClone(input);
    autoFixCps(input, { maxCps: 22 });
    expect(input).toEqual(copy);
  });
});

describe('cpsFixResultToDict', () => {
  it('rounds speeds to one decimal', () => {
    expect(
      cpsFixResultToDict({
        originalCount: 2,
        fixedCount: 3,
        segmentsSplit: 1,
        segmentsTrimmed: 0,
        maxCpsBefore: 27,
        maxCpsAfter: 25.316,
        avgCpsBefore: 16.26,
        avgCpsAfter: 14.04,
      })
    ).toEqual({
      original_count: 2,
      fixed_count: 3,
      segments_split: 1,
      segments_trimmed: 0,
      max_cps_before: 27,
      max_cps_after: 25.3,
      avg_cps_before: 16.3,
      avg_cps_after: 14,
    });
  });
});
