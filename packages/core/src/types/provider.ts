import type { Result } from 'neverthrow';
import type { QueryParams } from './query.js';
import type { ResultRow } from './row.js';

export class GraphQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphQueryError';
  }
}

export class LoaderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoaderError';
  }
}

export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Runs Cypher against the knowledge graph. Rows come back in whatever order
 * the store produces them; ranking imposes the only ordering callers rely on.
 */
export interface GraphExecutor {
  verifyConnectivity(): Promise<Result<void, GraphQueryError>>;
  execute(query: string, params: QueryParams): Promise<Result<ResultRow[], GraphQueryError>>;
  write(statement: string, params: Readonly<Record<string, unknown>>): Promise<Result<void, GraphQueryError>>;
  close(): Promise<void>;
}
