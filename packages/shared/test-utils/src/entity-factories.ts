import type { SpeechSegment, TranscriptSegment, WordInfo } from '@lyricsync/shared-contracts';

export function createMockWord(overrides: Partial<WordInfo> = {}): WordInfo {
  return {
    word: 'wort',
    start: 0,
    end: 0.4,
    confidence: 1,
    ...overrides,
  };
}

/**
 * Build a segment; `hasWordTimestamps` follows the words unless overridden.
 */
export function createMockSegment(overrides: Partial<TranscriptSegment> = {}): TranscriptSegment {
  const words = overrides.words ?? [];
  return {
    start: 0,
    end: 2,
    text: 'Zeile eins',
    confidence: 0.9,
    ...overrides,
    words,
    hasWordTimestamps: overrides.hasWordTimestamps ?? words.length > 0,
  };
}

/**
 * Build a segment whose words are spread evenly over its interval.
 */
export function createTimedSegment(text: string, start: number, end: number, confidence = 0.9): TranscriptSegment {
  const tokens = text.split(/\s+/).filter(token => token.length > 0);
  const step = tokens.length > 0 ? (end - start) / tokens.length : 0;
  const words = tokens.map((word, i) =>
    createMockWord({
      word,
      start: Math.round((start + i * step) * 1000) / 1000,
      end: Math.round((start + (i + 1) * step) * 1000) / 1000,
    })
  );
  return createMockSegment({ text, start, end, words, confidence });
}

export function createMockSpeechSegment(startMs: number, endMs: number): SpeechSegment {
  return { startMs, endMs };
}
