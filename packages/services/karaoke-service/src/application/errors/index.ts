export { KaraokeError, KaraokeErrorCode, type KaraokeErrorCodeType } from './errors';
