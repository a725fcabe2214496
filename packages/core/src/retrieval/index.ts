export {
  INTENT_KEYWORDS,
  ALGORITHM_ALIASES,
  SECTION_NAMES,
  normalizeQuestion,
  detectIntent,
  extractEntities,
  classifyQuestion,
} from './intent-classifier.js';

export {
  SCORE_WEIGHTS,
  DEFAULT_TOP_N,
  DOMAIN_TAGS,
  ROW_TEXT_FIELDS,
  rowText,
  tokenize,
  lexicalOverlapScore,
  entityMatchBoost,
  proximityBoost,
  scoreRow,
  sortByScore,
  scoreItems,
  selectTopN,
} from './ranking.js';
