export {
  parseLyrics,
  parseLrcTime,
  groupByStanzas,
  getLrcTimings,
  serializeParsedLyrics,
  type LyricsLine,
  type ParsedLyrics,
  type ParseLyricsOptions,
  type LrcTiming,
} from './LyricsParser';
