export {
  normalizeText,
  splitWords,
  tokenize,
  similarityRatio,
  computeMatchScore,
  findDiffWords,
  roundTo,
} from './normalize';
export { SequenceMatcher, type MatchingBlock, type Opcode, type OpcodeTag } from './SequenceMatcher';
