/**
 * LyricsParser - lyrics files as the source of truth for line layout
 *
 * Plain text (`txt`) and timestamped (`lrc`) lyrics are parsed into lines,
 * section markers and the ordered target lines used for alignment. Target
 * line text is kept exactly as written apart from surrounding whitespace.
 */

import type { LyricsFormat, ParsedLyricsDict } from '@lyricsync/shared-contracts';
import { serializeError } from '@lyricsync/platform-core';
import { getLogger } from '@config/service-config';
import { KaraokeError } from '../../application/errors';

const logger = getLogger('lyrics-parser');

export interface LyricsLine {
  readonly index: number;
  readonly text: string;
  readonly isEmpty: boolean;
  readonly isSection: boolean;
  readonly sectionLabel: string;
  readonly lrcTime: number | null;
}

export interface ParsedLyrics {
  readonly lines: readonly LyricsLine[];
  readonly targetLines: readonly string[];
  readonly sections: readonly string[];
  readonly totalLines: number;
  readonly sourceName: string;
  readonly format: LyricsFormat;
  readonly hasTimestamps: boolean;
}

export interface ParseLyricsOptions {
  format?: LyricsFormat;
  preserveEmptyLines?: boolean;
  stripSectionMarkers?: boolean;
  sourceName?: string;
}

export interface LrcTiming {
  time: number;
  text: string;
}

// =============================================================================
// PATTERNS
// =============================================================================

const SECTION_PATTERNS: readonly RegExp[] = [
  /^\[(.*?)\]$/,
  /^\((.*?)\)$/,
  /^(?:verse|hook|chorus|bridge|intro|outro|refrain|pre-chorus|interlude|breakdown|drop)\s*\d*\s*[:：]?\s*$/i,
];

// Anything shaped like a time tag is stripped; only the strict form is read
const LRC_TIME_PATTERN = /\[\d+:\d+(?:\.\d+)?\]/g;
const LRC_TIME_TAG = /^\[(\d{1,2}):(\d{2})(?:\.(\d{1,3}))?\]$/;
const LRC_META_PATTERN = /^\[(ti|ar|al|by|offset|length|re|ve):(.+)\]$/i;
const BYTE_ORDER_MARK = '\uFEFF';

function detectSectionMarker(line: string): { isSection: boolean; label: string } {
  const stripped = line.trim();
  for (const pattern of SECTION_PATTERNS) {
    const match = pattern.exec(stripped);
    if (match) {
      return { isSection: true, label: (match[1] ?? stripped).trim() };
    }
  }
  return { isSection: false, label: '' };
}

/**
 * Seconds for one LRC time tag, or null when the tag does not have the
 * `[m:ss]` or `[mm:ss.xxx]` digit counts. The seconds field is not range
 * checked, so `[00:75.00]` is 75 s. The fraction is read as thousandths after
 * right-padding to three digits.
 */
export function parseLrcTime(tag: string): number | null {
  const match = LRC_TIME_TAG.exec(tag);
  if (!match) return null;

  const minutes = Number.parseInt(match[1], 10);
  const seconds = Number.parseInt(match[2], 10);

  const millis = Number.parseInt((match[3] ?? '0').padEnd(3, '0').slice(0, 3), 10);
  return minutes * 60 + seconds + millis / 1000;
}

function decodeContent(content: string | Uint8Array, sourceName: string): string {
  if (typeof content === 'string') {
    return content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(content);
  } catch (error) {
    logger.warn('Lyrics could not be decoded', { sourceName, bytes: content.length, error: serializeError(error) });
    throw KaraokeError.encodingFailed(sourceName || 'lyrics', error instanceof Error ? error : undefined);
  }
}

// =============================================================================
// PARSER
// =============================================================================

export function parseLyrics(content: string | Uint8Array, options: ParseLyricsOptions = {}): ParsedLyrics {
  const { format = 'txt', preserveEmptyLines = false, stripSectionMarkers = true, sourceName = '' } = options;
  const isLrc = format === 'lrc';
  const text = decodeContent(content, sourceName).trim();

  const lines: LyricsLine[] = [];
  const sections: string[] = [];
  let hasTimestamps = false;

  text.split('\n').forEach((rawLine, index) => {
    let line = rawLine.trimEnd();

    if (isLrc && LRC_META_PATTERN.test(line)) return;

    let lrcTime: number | null = null;
    if (isLrc) {
      const tags = line.match(LRC_TIME_PATTERN) ?? [];
      for (const tag of tags) {
        const seconds = parseLrcTime(tag);
        if (seconds === null) {
          logger.debug('Skipping malformed LRC time tag', { tag, line: index, sourceName });
          continue;
        }
        lrcTime = seconds;
        break;
      }
      if (tags.length > 0) {
        hasTimestamps = hasTimestamps || lrcTime !== null;
        line = line.replace(LRC_TIME_PATTERN, '').trim();
      }
    }

    if (!line.trim()) {
      lines.push({ index, text: '', isEmpty: true, isSection: false, sectionLabel: '', lrcTime: null });
      return;
    }

    const { isSection, label } = detectSectionMarker(line);
    if (isSection) sections.push(label);
    lines.push({ index, text: line.trim(), isEmpty: false, isSection, sectionLabel: label, lrcTime });
  });

  const targetLines: string[] = [];
  for (const line of lines) {
    if (line.isSection && stripSectionMarkers) continue;
    if (line.isEmpty) {
      if (preserveEmptyLines) targetLines.push('');
      continue;
    }
    targetLines.push(line.text);
  }

  logger.info('Lyrics parsed', {
    sourceName,
    format,
    targetLines: targetLines.length,
    sections: sections.length,
    hasTimestamps,
  });

  return {
    lines,
    targetLines,
    sections,
    totalLines: lines.length,
    sourceName,
    format,
    hasTimestamps,
  };
}

/**
 * Lyric lines grouped by the blank lines between them. Section markers do not
 * break a stanza.
 */
export function groupByStanzas(parsed: ParsedLyrics): string[][] {
  const stanzas: string[][] = [];
  let current: string[] = [];

  for (const line of parsed.lines) {
    if (line.isSection) continue;
    if (line.isEmpty) {
      if (current.length > 0) {
        stanzas.push(current);
        current = [];
      }
      continue;
    }
    current.push(line.text);
  }

  if (current.length > 0) stanzas.push(current);
  return stanzas;
}

export function getLrcTimings(parsed: ParsedLyrics): LrcTiming[] {
  const timings: LrcTiming[] = [];
  for (const line of parsed.lines) {
    if (line.lrcTime !== null && !line.isEmpty && !line.isSection) {
      timings.push({ time: line.lrcTime, text: line.text });
    }
  }
  return timings;
}

export function serializeParsedLyrics(parsed: ParsedLyrics): ParsedLyricsDict {
  return {
    source_file: parsed.sourceName,
    format: parsed.format,
    total_lines: parsed.totalLines,
    target_lines_count: parsed.targetLines.length,
    sections: [...parsed.sections],
    has_timestamps: parsed.hasTimestamps,
    lines: parsed.lines.map(line => ({
      index: line.index,
      text: line.text,
      is_empty: line.isEmpty,
      is_section: line.isSection,
      section_label: line.sectionLabel,
      lrc_time: line.lrcTime,
    })),
  };
}
