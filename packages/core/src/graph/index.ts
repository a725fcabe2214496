export { buildQueries, SECTION_SEARCH_QUERY } from './query-spec-builder.js';

export type { Neo4jExecutorOptions } from './neo4j-executor.js';
export { Neo4jGraphExecutor, toPlainValue } from './neo4j-executor.js';

export type { GraphStats, NodeTypeCount } from './graph-stats.js';
export { collectGraphStats } from './graph-stats.js';
