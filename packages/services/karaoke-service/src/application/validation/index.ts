export { parseTranscriptSegments, parseSpeechSegments, parseTranscriptResult } from './segments';
