import { z } from 'zod';
import {
  ContractValidationError,
  SpeechSegmentSchema,
  TranscriptResultSchema,
  TranscriptSegmentSchema,
  parseContract,
  safeParseContract,
  type SpeechSegment,
  type TranscriptResult,
  type TranscriptSegment,
} from '@lyricsync/shared-contracts';
import { wrapError } from '@lyricsync/platform-core';
import { getLogger } from '@config/service-config';
import { KaraokeError } from '../errors';

const logger = getLogger('segment-validation');

function describeIssues(error: { issues: z.ZodIssue[] }): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validate recognizer output at the boundary and fill in defaults.
 */
export function parseTranscriptSegments(data: unknown): TranscriptSegment[] {
  const result = safeParseContract(z.array(TranscriptSegmentSchema), data);
  if (!result.success) {
    const reason = describeIssues(result.error);
    logger.warn('Rejected transcript segments', { reason });
    throw KaraokeError.invalidSegments(reason, result.error);
  }
  return result.data;
}

export function parseSpeechSegments(data: unknown): SpeechSegment[] {
  const result = safeParseContract(z.array(SpeechSegmentSchema), data);
  if (!result.success) {
    const reason = describeIssues(result.error);
    logger.warn('Rejected speech segments', { reason });
    throw KaraokeError.invalidSegments(reason, result.error);
  }
  return result.data;
}

/**
 * Validate a whole recognizer result (segments plus language, backend and
 * duration metadata).
 */
export function parseTranscriptResult(data: unknown): TranscriptResult {
  try {
    return parseContract(TranscriptResultSchema, data, 'transcript result');
  } catch (error) {
    if (error instanceof ContractValidationError) {
      const reason = describeIssues(error);
      logger.warn('Rejected transcript result', { reason });
      throw KaraokeError.invalidSegments(reason, error);
    }
    throw wrapError(error);
  }
}
