export {
  SequentialAligner,
  flattenAsrWords,
  MATCH_ADVANCE_THRESHOLD,
  type SequentialMatch,
} from './SequentialAligner';
export {
  generateAlignmentReport,
  alignmentReportToDict,
  buildDiffReport,
  findAsrTextInRange,
  reportNeedsReview,
  type AlignmentReport,
  type LineAlignment,
} from './AlignmentReporter';
