export type {
  QuestionIntent,
  AlgorithmAlias,
  SectionName,
  EntitySet,
  ClassifiedQuestion,
} from './question.js';
export type { QueryTag, QueryParams, QuerySpec } from './query.js';
export type { ResultRow, ScoredRow, TaggedRows } from './row.js';
export type {
  PaperGraphConfig,
  GraphConfig,
  RankingConfig,
  LoaderConfig,
} from './config.js';
export type { GraphExecutor } from './provider.js';
export { GraphQueryError, LoaderError, PipelineError } from './provider.js';
