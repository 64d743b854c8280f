export {
  autoFixCps,
  cpsFixResultToDict,
  charactersPerSecond,
  findSplitPoint,
  splitSegment,
  ZERO_DURATION_CPS,
  type CpsFixOptions,
  type CpsFixResult,
} from './CpsFixer';
export {
  fillGaps,
  gapFillResultToDict,
  redistributeTiming,
  type GapFillOptions,
  type GapFillResult,
  type RedistributeOptions,
} from './GapFiller';
export {
  mergeCloseSegments,
  createTimeMapping,
  planVadTrim,
  remapTimestamps,
  findChunk,
  findNearestChunk,
  detectSpeechFromFrames,
  DEFAULT_MERGE_GAP_MS,
  type OriginalWindow,
  type FrameDetectionOptions,
} from './VadTimeline';
