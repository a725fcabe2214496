export type {
  QuestionIntent,
  AlgorithmAlias,
  SectionName,
  EntitySet,
  ClassifiedQuestion,
  QueryTag,
  QueryParams,
  QuerySpec,
  ResultRow,
  ScoredRow,
  TaggedRows,
  PaperGraphConfig,
  GraphConfig,
  RankingConfig,
  LoaderConfig,
  GraphExecutor,
} from './types/index.js';

export { GraphQueryError, LoaderError, PipelineError } from './types/index.js';

export {
  loadConfig,
  parseConfig,
  interpolateEnvVars,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config/config-parser.js';

export {
  INTENT_KEYWORDS,
  ALGORITHM_ALIASES,
  SECTION_NAMES,
  normalizeQuestion,
  detectIntent,
  extractEntities,
  classifyQuestion,
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
} from './retrieval/index.js';

export type { Neo4jExecutorOptions, GraphStats, NodeTypeCount } from './graph/index.js';
export {
  buildQueries,
  SECTION_SEARCH_QUERY,
  Neo4jGraphExecutor,
  toPlainValue,
  collectGraphStats,
} from './graph/index.js';

export type { PaperDocument, PaperSection, LoadStep, LoadSummary, PaperGraphLoaderOptions } from './loader/index.js';
export {
  paperDocumentSchema,
  parsePaperDocument,
  readPaperDocument,
  sectionText,
  sectionEntities,
  entityList,
  PaperGraphLoader,
  splitModelName,
} from './loader/index.js';

export type { QuestionPlan, AnswerResult, AnswerOptions, QuestionAnswererOptions } from './pipeline/index.js';
export { QuestionAnswerer, planQuestion, rankTaggedRows } from './pipeline/index.js';

export type { PaperGraphRuntime, RuntimeOptions, ExecutorFactory } from './runtime.js';
export { createRuntime, RuntimeError } from './runtime.js';

export { safeString, safeNumber, safeRecord } from './utils/safe-cast.js';
