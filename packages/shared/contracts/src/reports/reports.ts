/**
 * Report Contracts
 *
 * JSON shapes handed to exporters and review tooling. Keys are snake_case
 * because these documents are persisted next to rendered subtitle files.
 */

import { z } from 'zod';

// =============================================================================
// ALIGNMENT REPORTS
// =============================================================================

export const TimingSourceSchema = z.enum(['word_level', 'segment_level', 'estimated']);
export type TimingSource = z.infer<typeof TimingSourceSchema>;

export const AlignmentLineDictSchema = z.object({
  index: z.number().int().min(0),
  lyrics: z.string(),
  asr: z.string(),
  score: z.number().min(0).max(1),
  timing: TimingSourceSchema,
  start: z.number(),
  end: z.number(),
  needs_review: z.boolean(),
  diffs: z.array(z.string()),
});
export type AlignmentLineDict = z.infer<typeof AlignmentLineDictSchema>;

export const AlignmentReportDictSchema = z.object({
  total_lines: z.number().int().min(0),
  matched_lines: z.number().int().min(0),
  avg_match_score: z.number().min(0).max(1),
  min_match_score: z.number().min(0).max(1),
  lines_needing_review: z.number().int().min(0),
  unresolved_lines: z.number().int().min(0),
  approx_timing_lines: z.number().int().min(0),
  word_level_lines: z.number().int().min(0),
  total_duration: z.number(),
  needs_review: z.boolean(),
  lines: z.array(AlignmentLineDictSchema),
});
export type AlignmentReportDict = z.infer<typeof AlignmentReportDictSchema>;

export const DiffLineDictSchema = z.object({
  index: z.number().int().min(0),
  lyrics: z.string(),
  asr: z.string(),
  score: z.number().min(0).max(1),
  diffs: z.array(z.string()),
});
export type DiffLineDict = z.infer<typeof DiffLineDictSchema>;

export const DiffReportDictSchema = z.object({
  total_diffs: z.number().int().min(0),
  lines: z.array(DiffLineDictSchema),
});
export type DiffReportDict = z.infer<typeof DiffReportDictSchema>;

// =============================================================================
// LYRICS
// =============================================================================

export const LyricsFormatSchema = z.enum(['txt', 'lrc']);
export type LyricsFormat = z.infer<typeof LyricsFormatSchema>;

export const ParsedLyricsDictSchema = z.object({
  source_file: z.string(),
  format: LyricsFormatSchema,
  total_lines: z.number().int().min(0),
  target_lines_count: z.number().int().min(0),
  sections: z.array(z.string()),
  has_timestamps: z.boolean(),
  lines: z.array(
    z.object({
      index: z.number().int().min(0),
      text: z.string(),
      is_empty: z.boolean(),
      is_section: z.boolean(),
      section_label: z.string(),
      lrc_time: z.number().nullable(),
    })
  ),
});
export type ParsedLyricsDict = z.infer<typeof ParsedLyricsDictSchema>;

// =============================================================================
// TIMING REPAIR
// =============================================================================

export const CpsFixResultDictSchema = z.object({
  original_count: z.number().int().min(0),
  fixed_count: z.number().int().min(0),
  segments_split: z.number().int().min(0),
  segments_trimmed: z.number().int().min(0),
  max_cps_before: z.number(),
  max_cps_after: z.number(),
  avg_cps_before: z.number(),
  avg_cps_after: z.number(),
});
export type CpsFixResultDict = z.infer<typeof CpsFixResultDictSchema>;

export const GapFillResultDictSchema = z.object({
  original_count: z.number().int().min(0),
  final_count: z.number().int().min(0),
  gaps_filled: z.number().int().min(0),
  micro_gaps_merged: z.number().int().min(0),
  total_gap_duration: z.number().min(0),
});
export type GapFillResultDict = z.infer<typeof GapFillResultDictSchema>;

// =============================================================================
// ANALYSIS
// =============================================================================

const RhymePairDictSchema = z.object({
  a: z.number().int().min(0),
  b: z.number().int().min(0),
  words: z.tuple([z.string(), z.string()]),
  score: z.number(),
});

export const RhymeTypeSchema = z.enum(['end', 'internal', 'multi']);
export type RhymeType = z.infer<typeof RhymeTypeSchema>;

export const RhymeSchemeDictSchema = z.object({
  total_lines: z.number().int().min(0),
  scheme: z.string(),
  labels: z.array(z.string()),
  density: z.number().min(0).max(1),
  pairs: z.array(RhymePairDictSchema.extend({ type: RhymeTypeSchema })),
  internal: z.array(RhymePairDictSchema),
  multi: z.array(RhymePairDictSchema),
});
export type RhymeSchemeDict = z.infer<typeof RhymeSchemeDictSchema>;

export const TextStatsDictSchema = z.object({
  total_words: z.number().int().min(0),
  unique_words: z.number().int().min(0),
  total_chars: z.number().int().min(0),
  total_syllables: z.number().int().min(0),
  total_lines: z.number().int().min(0),
  avg_words_per_line: z.number(),
  avg_word_length: z.number(),
  avg_syllables_per_word: z.number(),
  type_token_ratio: z.number(),
  hapax_legomena: z.number().int().min(0),
  hapax_ratio: z.number(),
  top_words: z.array(z.object({ word: z.string(), count: z.number().int() })),
  top_bigrams: z.array(z.object({ bigram: z.string(), count: z.number().int() })),
  syllable_distribution: z.record(z.number().int()),
  flow_score: z.number(),
  reading_time_sec: z.number(),
});
export type TextStatsDict = z.infer<typeof TextStatsDictSchema>;
