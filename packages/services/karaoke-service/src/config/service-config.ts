/**
 * Karaoke service configuration
 *
 * Environment-driven defaults for every repair and analysis threshold.
 * Operation options override these per call.
 */

import { z } from 'zod';
import { getConfig, getLogger as getPlatformLogger } from '@lyricsync/platform-core';
import type { Logger } from '@lyricsync/platform-core';

export const SERVICE_NAME = 'karaoke-service';

export function getLogger(module: string): Logger {
  return getPlatformLogger(`${SERVICE_NAME}-${module}`);
}

const KaraokeConfigSchema = z.object({
  maxCps: z.number().positive(),
  gapMin: z.number().min(0),
  gapMergeThreshold: z.number().min(0),
  gapFillText: z.string().min(1),
  redistributeGap: z.number().min(0),
  vadPadMs: z.number().int().min(0),
  rhymeThreshold: z.number().min(0).max(1),
  rhymeWindow: z.number().int().min(1),
  statsTopN: z.number().int().min(0),
});
export type KaraokeConfig = z.infer<typeof KaraokeConfigSchema>;

export function loadKaraokeConfig(): KaraokeConfig {
  return KaraokeConfigSchema.parse({
    maxCps: getConfig('KARAOKE_MAX_CPS', 22),
    gapMin: getConfig('KARAOKE_GAP_MIN', 2.0),
    gapMergeThreshold: getConfig('KARAOKE_GAP_MERGE_THRESHOLD', 0.3),
    gapFillText: getConfig('KARAOKE_GAP_FILL_TEXT', '♪'),
    redistributeGap: getConfig('KARAOKE_REDISTRIBUTE_GAP', 0.05),
    vadPadMs: getConfig('KARAOKE_VAD_PAD_MS', 200),
    rhymeThreshold: getConfig('KARAOKE_RHYME_THRESHOLD', 0.6),
    rhymeWindow: getConfig('KARAOKE_RHYME_WINDOW', 8),
    statsTopN: getConfig('KARAOKE_STATS_TOP_N', 20),
  });
}

export const karaokeConfig: KaraokeConfig = loadKaraokeConfig();
