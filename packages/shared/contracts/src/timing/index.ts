export * from './transcripts';
