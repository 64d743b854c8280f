/**
 * Karaoke service - lyrics alignment and subtitle timing repair
 *
 * Lyrics parsing, alignment quality reports against recognizer output,
 * timing repair (CPS splitting, gap filling, redistribution, VAD remapping)
 * and rhyme / text statistics.
 */

export * from './domains/text';
export * from './domains/lyrics';
export * from './domains/alignment';
export * from './domains/timing';
export * from './domains/analysis';
export * from './application/errors';
export * from './application/validation';
export { karaokeConfig, loadKaraokeConfig, type KaraokeConfig } from './config/service-config';
