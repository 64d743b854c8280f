import { describe, it, expect, vi } from 'vitest';
import {
  getLrcTimings,
  groupByStanzas,
  parseLrcTime,
  parseLyrics,
  serializeParsedLyrics,
} from '../domains/lyrics';
import { KaraokeError, KaraokeErrorCode } from '../application/errors';

const { mockLogger } = await vi.hoisted(async () => {
  const { createMockLogger } = await import('@lyricsync/test-utils');
  return { mockLogger: createMockLogger() };
});

vi.mock('@config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../config/service-config')>()),
  getLogger: () => mockLogger,
}));

const SECTIONED = '[Verse 1]\nZeile eins\n\nChorus:\nZeile zwei\n(Bridge)\nZeile drei';

describe('parseLyrics', () => {
  it('keeps every lyric line exactly as written', () => {
    const parsed = parseLyrics('Ich betrat die Bank mit\nnem Koffer voller Tricks,');
    expect(parsed.targetLines).toEqual(['Ich betrat die Bank mit', 'nem Koffer voller Tricks,']);
  });

  it('strips only surrounding whitespace and carriage returns', () => {
    const parsed = parseLyrics('  Hallo,   Welt!  \r\nZweite  Zeile\t\r\n');
    expect(parsed.targetLines).toEqual(['Hallo,   Welt!', 'Zweite  Zeile']);
  });

  it('detects section markers and collects their labels in order', () => {
    const parsed = parseLyrics(SECTIONED);

    expect(parsed.sections).toEqual(['Verse 1', 'Chorus:', 'Bridge']);
    expect(parsed.targetLines).toEqual(['Zeile eins', 'Zeile zwei', 'Zeile drei']);
    expect(parsed.totalLines).toBe(7);
    expect(parsed.lines[0]).toEqual({
      index: 0,
      text: '[Verse 1]',
      isEmpty: false,
      isSection: true,
      sectionLabel: 'Verse 1',
      lrcTime: null,
    });
  });

  it('keeps duplicate section labels', () => {
    expect(parseLyrics('[Hook]\nA\n[Hook]\nB').sections).toEqual(['Hook', 'Hook']);
  });

  it('keeps section markers as target lines when asked to', () => {
    const parsed = parseLyrics(SECTIONED, { stripSectionMarkers: false });
    expect(parsed.targetLines).toEqual(['[Verse 1]', 'Zeile eins', 'Chorus:', 'Zeile zwei', '(Bridge)', 'Zeile drei']);
  });

  it('keeps empty lines as stanza separators when asked to', () => {
    const parsed = parseLyrics(SECTIONED, { preserveEmptyLines: true });
    expect(parsed.targetLines).toEqual(['Zeile eins', '', 'Zeile zwei', 'Zeile drei']);
  });

  it('records a trailing section marker without adding a target line', () => {
    const parsed = parseLyrics('Zeile eins\n[Outro]');
    expect(parsed.targetLines).toEqual(['Zeile eins']);
    expect(parsed.sections).toEqual(['Outro']);
  });

  it('strips a byte order mark from text and byte input', () => {
    expect(parseLyrics('\uFEFFZeile').targetLines).toEqual(['Zeile']);

    const bytes = new TextEncoder().encode('\uFEFFÄrger\nZwei');
    expect(parseLyrics(bytes).targetLines).toEqual(['Ärger', 'Zwei']);
  });

  it('rejects bytes that are not UTF-8', () => {
    const invalid = new Uint8Array([0xff, 0xfe, 0x41]);

    expect(() => parseLyrics(invalid, { sourceName: 'song.txt' })).toThrow(KaraokeError);
    try {
      parseLyrics(invalid, { sourceName: 'song.txt' });
    } catch (error) {
      expect(error).toBeInstanceOf(KaraokeError);
      expect(error instanceof KaraokeError && error.code).toBe(KaraokeErrorCode.ENCODING_ERROR);
    }
  });

  it('logs the decoder error before rejecting bytes', () => {
    mockLogger.warn.mockClear();
    expect(() => parseLyrics(new Uint8Array([0xc3, 0x28]), { sourceName: 'kaputt.lrc' })).toThrow(KaraokeError);

    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith('Lyrics could not be decoded', {
      sourceName: 'kaputt.lrc',
      bytes: 2,
      error: expect.objectContaining({ name: 'TypeError' }),
    });
  });

  it('leaves time tags alone in plain text', () => {
    const parsed = parseLyrics('[00:05.00]Text');
    expect(parsed.targetLines).toEqual(['[00:05.00]Text']);
    expect(parsed.hasTimestamps).toBe(false);
  });
});

describe('LRC lyrics', () => {
  const LRC = '[ti:Lied]\n[ar:Band]\n[00:05.00]First line\n[00:10.50]Second line';

  it('parses time tags to seconds', () => {
    expect(parseLrcTime('[02:30.45]')).toBe(150.45);
    expect(parseLrcTime('[00:05]')).toBe(5);
    expect(parseLrcTime('[01:02.5]')).toBe(62.5);
    expect(parseLrcTime('[00:75.00]')).toBe(75);
    expect(parseLrcTime('[00:5]')).toBeNull();
    expect(parseLrcTime('[00:05.1234]')).toBeNull();
  });

  it('drops metadata and extracts timings', () => {
    const parsed = parseLyrics(LRC, { format: 'lrc' });

    expect(parsed.hasTimestamps).toBe(true);
    expect(parsed.lines).toHaveLength(2);
    expect(parsed.lines[0].index).toBe(2);
    expect(getLrcTimings(parsed)).toEqual([
      { time: 5.0, text: 'First line' },
      { time: 10.5, text: 'Second line' },
    ]);
  });

  it('uses the first of several time tags', () => {
    const parsed = parseLyrics('[00:01.00][00:30.00]Wieder und wieder', { format: 'lrc' });
    expect(parsed.lines[0].lrcTime).toBe(1);
    expect(parsed.targetLines).toEqual(['Wieder und wieder']);
  });

  it('reads seconds fields of 60 and above as plain seconds', () => {
    const parsed = parseLyrics('[00:75.00]Spaeter', { format: 'lrc' });
    expect(parsed.lines[0].lrcTime).toBe(75);
    expect(parsed.hasTimestamps).toBe(true);
  });

  it('skips malformed time tags without failing', () => {
    const parsed = parseLyrics('[00:5][00:08.00]Text\n[000:01.00]Nur kaputt', { format: 'lrc' });

    expect(parsed.lines.map(line => line.lrcTime)).toEqual([8, null]);
    expect(parsed.targetLines).toEqual(['Text', 'Nur kaputt']);
    expect(getLrcTimings(parsed)).toEqual([{ time: 8, text: 'Text' }]);
  });

  it('reports no timestamps when every tag is malformed', () => {
    expect(parseLyrics('[00:05.1234]Nur kaputt', { format: 'lrc' }).hasTimestamps).toBe(false);
  });
});

describe('groupByStanzas', () => {
  it('groups lyric lines between blank lines and ignores section markers', () => {
    const parsed = parseLyrics('Zeile eins\nZeile zwei\n\n[Hook]\nZeile drei\n\n\nZeile vier');
    expect(groupByStanzas(parsed)).toEqual([['Zeile eins', 'Zeile zwei'], ['Zeile drei'], ['Zeile vier']]);
  });
});

describe('serializeParsedLyrics', () => {
  it('produces the persisted document shape', () => {
    const parsed = parseLyrics('[Intro]\n\n[00:02.50]Hallo', { format: 'lrc', sourceName: 'song.lrc' });

    expect(serializeParsedLyrics(parsed)).toEqual({
      source_file: 'song.lrc',
      format: 'lrc',
      total_lines: 3,
      target_lines_count: 1,
      sections: ['Intro'],
      has_timestamps: true,
      lines: [
        { index: 0, text: '[Intro]', is_empty: false, is_section: true, section_label: 'Intro', lrc_time: null },
        { index: 1, text: '', is_empty: true, is_section: false, section_label: '', lrc_time: null },
        { index: 2, text: 'Hallo', is_empty: false, is_section: false, section_label: '', lrc_time: 2.5 },
      ],
    });
  });
});
