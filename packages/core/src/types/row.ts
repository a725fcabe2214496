import type { QueryTag } from './query.js';

/** One record returned by the graph store, keyed by the RETURN aliases. */
export type ResultRow = Readonly<Record<string, unknown>>;

export type ScoredRow = ResultRow & {
  readonly _score: number;
  readonly _tag: QueryTag;
};

/** Rows returned for a single spec, kept together with the spec's tag. */
export interface TaggedRows {
  readonly tag: QueryTag;
  readonly rows: readonly ResultRow[];
}
