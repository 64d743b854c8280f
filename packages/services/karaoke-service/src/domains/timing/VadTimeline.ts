/**
 * VadTimeline - speech islands and the silence-trimmed timeline
 *
 * Recognition can run on audio where silence has been cut out between padded
 * speech islands. The chunks built here describe where each island sits in
 * the trimmed audio and where it started originally, so recognized times can
 * be mapped back. Trimming and mapping must use the same merge pass or the
 * two timelines drift apart.
 */

import type { SpeechSegment, TimelineChunk, TranscriptSegment, WordInfo } from '@lyricsync/shared-contracts';
import { getLogger, karaokeConfig } from '@config/service-config';
import { KaraokeError } from '../../application/errors';
import { roundTo } from '../text';

const logger = getLogger('vad-timeline');

export const DEFAULT_MERGE_GAP_MS = 400;
const LARGE_GAP_WARNING_SEC = 30;

export interface OriginalWindow {
  startMs: number;
  endMs: number;
}

export interface FrameDetectionOptions {
  frameMs?: number;
  minSpeechMs?: number;
  minSilenceMs?: number;
  /** Audio length; defaults to the number of frames times the frame length */
  totalMs?: number;
}

function requireNonNegativeMs(option: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw KaraokeError.invalidOption(option, 'must be a non-negative integer number of milliseconds');
  }
}

// =============================================================================
// MERGE + MAPPING
// =============================================================================

/**
 * Sort and merge speech segments whose gap is at most `gapMs`. Inputs are not
 * modified.
 */
export function mergeCloseSegments(
  segments: readonly SpeechSegment[],
  gapMs: number = DEFAULT_MERGE_GAP_MS
): SpeechSegment[] {
  if (segments.length === 0) return [];

  const sorted = [...segments].sort((a, b) => a.startMs - b.startMs);
  const merged: SpeechSegment[] = [{ ...sorted[0] }];

  for (const segment of sorted.slice(1)) {
    const last = merged[merged.length - 1];
    if (segment.startMs - last.endMs <= gapMs) {
      last.endMs = Math.max(last.endMs, segment.endMs);
    } else {
      merged.push({ ...segment });
    }
  }

  logger.debug('Speech segments merged', { before: segments.length, after: merged.length, gapMs });
  return merged;
}

/**
 * Padded original-timeline windows in trimming order. Each window starts no
 * earlier than the previous one ended; empty windows are skipped.
 */
function paddedWindows(segments: readonly SpeechSegment[], padMs: number, totalMs?: number): OriginalWindow[] {
  const windows: OriginalWindow[] = [];
  let previousEnd = -1;

  for (const segment of mergeCloseSegments(segments, padMs * 2)) {
    let startMs = Math.max(0, segment.startMs - padMs);
    const endMs = totalMs === undefined ? segment.endMs + padMs : Math.min(totalMs, segment.endMs + padMs);
    if (previousEnd >= 0 && startMs < previousEnd) startMs = previousEnd;
    if (startMs >= endMs) continue;

    windows.push({ startMs, endMs });
    previousEnd = endMs;
  }

  return windows;
}

/**
 * Windows of the original audio to concatenate into the trimmed audio.
 */
export function planVadTrim(
  segments: readonly SpeechSegment[],
  totalMs: number,
  padMs: number = karaokeConfig.vadPadMs
): OriginalWindow[] {
  requireNonNegativeMs('padMs', padMs);
  requireNonNegativeMs('totalMs', totalMs);
  return paddedWindows(segments, padMs, totalMs);
}

/**
 * Contiguous chunks of the trimmed timeline with their original start times.
 */
export function createTimeMapping(
  segments: readonly SpeechSegment[],
  padMs: number = karaokeConfig.vadPadMs
): TimelineChunk[] {
  requireNonNegativeMs('padMs', padMs);

  const mapping: TimelineChunk[] = [];
  let offset = 0;
  for (const window of paddedWindows(segments, padMs)) {
    const duration = window.endMs - window.startMs;
    mapping.push({ vadStart: offset, vadEnd: offset + duration, originalStart: window.startMs });
    offset += duration;
  }
  return mapping;
}

// =============================================================================
// REMAPPING
// =============================================================================

function chunkOffset(chunk: TimelineChunk): number {
  return chunk.originalStart - chunk.vadStart;
}

export function findChunk(mapping: readonly TimelineChunk[], ms: number): TimelineChunk | undefined {
  return mapping.find(chunk => chunk.vadStart <= ms && ms < chunk.vadEnd);
}

/**
 * Chunk whose trimmed start is closest to `ms`; the earliest wins on ties.
 */
export function findNearestChunk(mapping: readonly TimelineChunk[], ms: number): TimelineChunk | undefined {
  let nearest: TimelineChunk | undefined;
  for (const chunk of mapping) {
    if (!nearest || Math.abs(chunk.vadStart - ms) < Math.abs(nearest.vadStart - ms)) nearest = chunk;
  }
  return nearest;
}

function toMs(seconds: number): number {
  return Math.trunc(seconds * 1000);
}

function remapWord(word: WordInfo, mapping: readonly TimelineChunk[], segmentOffset: number): WordInfo {
  const startMs = toMs(word.start);
  const endMs = toMs(word.end);
  const startChunk = findChunk(mapping, startMs);
  const startOffset = startChunk ? chunkOffset(startChunk) : segmentOffset;
  const endChunk = findChunk(mapping, endMs);
  const endOffset = endChunk ? chunkOffset(endChunk) : startOffset;
  return { ...word, start: (startMs + startOffset) / 1000, end: (endMs + endOffset) / 1000 };
}

/**
 * Map segment and word times from the trimmed timeline back to the original.
 * A segment's end and each word are looked up on their own, since a segment
 * can straddle a cut. Segments outside every chunk use the nearest one.
 */
export function remapTimestamps(
  segments: readonly TranscriptSegment[],
  mapping: readonly TimelineChunk[]
): TranscriptSegment[] {
  if (mapping.length === 0) return [...segments];

  const remapped = segments.map(segment => {
    const startMs = toMs(segment.start);
    const endMs = toMs(segment.end);
    const startChunk = findChunk(mapping, startMs);

    if (startChunk) {
      const offset = chunkOffset(startChunk);
      let endOffset = offset;
      if (endMs > startChunk.vadEnd) {
        const endChunk = findChunk(mapping, endMs);
        if (endChunk) endOffset = chunkOffset(endChunk);
      }
      return {
        ...segment,
        start: (startMs + offset) / 1000,
        end: (endMs + endOffset) / 1000,
        words: segment.words.map(word => remapWord(word, mapping, offset)),
      };
    }

    return remapUnmatched(segment, mapping, startMs, endMs);
  });

  warnOnLargeGaps(remapped);
  return remapped;
}

function remapUnmatched(
  segment: TranscriptSegment,
  mapping: readonly TimelineChunk[],
  startMs: number,
  endMs: number
): TranscriptSegment {
  const nearest = findNearestChunk(mapping, startMs);
  const offset = nearest ? chunkOffset(nearest) : 0;
  logger.warn('Segment outside every speech chunk, using nearest chunk', {
    startSec: roundTo(segment.start, 1),
    offsetMs: offset,
  });
  return {
    ...segment,
    start: (startMs + offset) / 1000,
    end: (endMs + offset) / 1000,
    words: segment.words.map(word => ({ ...word, start: word.start + offset / 1000, end: word.end + offset / 1000 })),
  };
}

function warnOnLargeGaps(segments: readonly TranscriptSegment[]): void {
  let maxGap = 0;
  for (let i = 1; i < segments.length; i++) {
    maxGap = Math.max(maxGap, segments[i].start - segments[i - 1].end);
  }
  if (maxGap > LARGE_GAP_WARNING_SEC) {
    logger.warn('Large gap after remapping, speech may have been over-trimmed', { maxGapSec: roundTo(maxGap, 1) });
  }
}

// =============================================================================
// FRAME DETECTION
// =============================================================================

/**
 * Turn per-frame voice decisions into speech segments. Speech starts after
 * `minSpeechMs` of consecutive voiced frames (dated back to the first of
 * them) and ends after `minSilenceMs` of consecutive unvoiced frames (dated
 * back to the first silent one).
 */
export function detectSpeechFromFrames(
  frames: readonly boolean[],
  options: FrameDetectionOptions = {}
): SpeechSegment[] {
  const { frameMs = 30, minSpeechMs = 300, minSilenceMs = 500 } = options;
  if (!(frameMs > 0)) {
    throw KaraokeError.invalidOption('frameMs', 'must be a positive number');
  }
  const totalMs = options.totalMs ?? frames.length * frameMs;
  const minSpeechFrames = Math.floor(minSpeechMs / frameMs);
  const minSilenceFrames = Math.floor(minSilenceMs / frameMs);

  const segments: SpeechSegment[] = [];
  let inSpeech = false;
  let speechStart = 0;
  let speechFrames = 0;
  let silenceFrames = 0;

  frames.forEach((active, index) => {
    const frameStart = index * frameMs;
    if (!inSpeech) {
      if (!active) {
        speechFrames = 0;
        return;
      }
      speechFrames++;
      if (speechFrames >= minSpeechFrames) {
        inSpeech = true;
        speechStart = Math.trunc(frameStart - (speechFrames - 1) * frameMs);
        silenceFrames = 0;
      }
      return;
    }

    if (active) {
      silenceFrames = 0;
      return;
    }
    silenceFrames++;
    if (silenceFrames >= minSilenceFrames) {
      segments.push({ startMs: speechStart, endMs: Math.trunc(frameStart - silenceFrames * frameMs) });
      inSpeech = false;
      speechFrames = 0;
      silenceFrames = 0;
    }
  });

  if (inSpeech) {
    segments.push({ startMs: speechStart, endMs: Math.trunc(totalMs) });
  }

  logger.debug('Speech detected from frames', { frames: frames.length, segments: segments.length });
  return segments;
}
