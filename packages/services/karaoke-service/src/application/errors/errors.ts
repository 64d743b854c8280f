import { DomainErrorCode, createDomainServiceError } from '@lyricsync/platform-core';

const KaraokeDomainCodes = {
  ENCODING_ERROR: 'ENCODING_ERROR',
  INVALID_SEGMENTS: 'INVALID_SEGMENTS',
  INVALID_OPTIONS: 'INVALID_OPTIONS',
} as const;

export const KaraokeErrorCode = { ...DomainErrorCode, ...KaraokeDomainCodes } as const;
export type KaraokeErrorCodeType = (typeof KaraokeErrorCode)[keyof typeof KaraokeErrorCode];

const KaraokeErrorBase = createDomainServiceError<KaraokeErrorCodeType>('Karaoke', KaraokeErrorCode);

export class KaraokeError extends KaraokeErrorBase {
  static encodingFailed(source: string, cause?: Error) {
    return new KaraokeError(
      `Lyrics could not be decoded as UTF-8: ${source}`,
      400,
      KaraokeErrorCode.ENCODING_ERROR,
      cause
    );
  }

  static invalidSegments(reason: string, cause?: Error) {
    return new KaraokeError(`Invalid segments: ${reason}`, 400, KaraokeErrorCode.INVALID_SEGMENTS, cause);
  }

  static invalidOption(option: string, reason: string) {
    return new KaraokeError(`Invalid option ${option}: ${reason}`, 400, KaraokeErrorCode.INVALID_OPTIONS, undefined, {
      option,
    });
  }
}
