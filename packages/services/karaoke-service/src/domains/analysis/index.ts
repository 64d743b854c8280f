export {
  detectRhymeScheme,
  rhymeSchemeToDict,
  rhymeScore,
  getRhymeTail,
  getEndWord,
  normalizePhonetic,
  type RhymePair,
  type RhymeScheme,
  type RhymeOptions,
} from './RhymeAnalyzer';
export {
  analyzeTextStats,
  textStatsToDict,
  countSyllables,
  tokenizeWords,
  DEFAULT_STOP_WORDS,
  type TextStats,
  type TextStatsOptions,
  type WordCount,
  type BigramCount,
} from './TextStatsAnalyzer';
