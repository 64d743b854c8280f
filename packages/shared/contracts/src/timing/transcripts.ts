/**
 * Transcript Contracts
 *
 * Zod schemas for ASR output consumed by the alignment and timing-repair
 * pipeline. Segment times are seconds, speech-segment times are integer ms.
 */

import { z } from 'zod';

// =============================================================================
// WORD + SEGMENT SCHEMAS
// =============================================================================

export const WordInfoSchema = z.object({
  word: z.string(),
  start: z.number().finite(),
  end: z.number().finite(),
  confidence: z.number().min(0).max(1).default(1),
});
export type WordInfo = z.infer<typeof WordInfoSchema>;

export const TranscriptSegmentSchema = z
  .object({
    start: z.number().finite(),
    end: z.number().finite(),
    text: z.string(),
    words: z.array(WordInfoSchema).default([]),
    confidence: z.number().min(0).max(1).default(1),
    hasWordTimestamps: z.boolean().optional(),
    // Accepted for payloads written by older exporters
    has_word_timestamps: z.boolean().optional(),
  })
  .refine(segment => segment.start <= segment.end, {
    message: 'Segment start must not be after its end',
    path: ['end'],
  })
  .transform(({ has_word_timestamps, ...segment }) => ({
    ...segment,
    hasWordTimestamps: segment.hasWordTimestamps ?? has_word_timestamps ?? segment.words.length > 0,
  }));
export type TranscriptSegment = z.output<typeof TranscriptSegmentSchema>;
export type TranscriptSegmentInput = z.input<typeof TranscriptSegmentSchema>;

export const TranscriptResultSchema = z.object({
  segments: z.array(TranscriptSegmentSchema),
  language: z.string().default('unknown'),
  backend: z.string().default('unknown'),
  duration: z.number().min(0).default(0),
});
export type TranscriptResult = z.output<typeof TranscriptResultSchema>;

// =============================================================================
// VAD SCHEMAS
// =============================================================================

export const SpeechSegmentSchema = z
  .object({
    startMs: z.number().int().min(0),
    endMs: z.number().int().min(0),
  })
  .refine(segment => segment.startMs <= segment.endMs, {
    message: 'Speech segment start must not be after its end',
    path: ['endMs'],
  });
export type SpeechSegment = z.infer<typeof SpeechSegmentSchema>;

/**
 * One contiguous span of the silence-trimmed timeline and where it starts on
 * the original timeline.
 */
export const TimelineChunkSchema = z.object({
  vadStart: z.number().int().min(0),
  vadEnd: z.number().int().min(0),
  originalStart: z.number().int().min(0),
});
export type TimelineChunk = z.infer<typeof TimelineChunkSchema>;
