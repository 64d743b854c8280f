/**
 * Shared contracts for the lyricsync packages
 *
 * Data shapes exchanged with transcription backends, VAD detectors and exporters.
 */

export * from './timing/index';

export * from './reports/index';

export * from './validation-utils';
