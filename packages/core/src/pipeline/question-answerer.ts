import { ok, err, type Result } from 'neverthrow';
import { classifyQuestion } from '../retrieval/intent-classifier.js';
import { DEFAULT_TOP_N, scoreItems, selectTopN, sortByScore } from '../retrieval/ranking.js';
import { buildQueries } from '../graph/query-spec-builder.js';
import { PipelineError, type GraphExecutor } from '../types/provider.js';
import type { EntitySet, QuestionIntent } from '../types/question.js';
import type { QuerySpec } from '../types/query.js';
import type { ScoredRow, TaggedRows } from '../types/row.js';

export interface QuestionPlan {
  question: string;
  intent: QuestionIntent;
  entities: EntitySet;
  specs: QuerySpec[];
}

export interface AnswerResult extends QuestionPlan {
  /** Ranked rows across every spec, best first, truncated to topN. */
  rows: ScoredRow[];
  /** Number of rows the graph returned before truncation. */
  totalRows: number;
}

export interface AnswerOptions {
  topN?: number;
}

export interface QuestionAnswererOptions {
  /** Default number of rows kept per answer. */
  topN?: number;
}

/** Classification and query specs for a question, without touching the graph. */
export function planQuestion(question: string): QuestionPlan {
  const { intent, entities } = classifyQuestion(question);
  return {
    question,
    intent,
    entities,
    specs: buildQueries(intent, entities, question),
  };
}

/**
 * Classify a question, run its query specs against the graph and rank
 * what comes back.
 */
export class QuestionAnswerer {
  private readonly executor: GraphExecutor;
  private readonly defaultTopN: number;

  constructor(executor: GraphExecutor, options: QuestionAnswererOptions = {}) {
    this.executor = executor;
    this.defaultTopN = options.topN ?? DEFAULT_TOP_N;
  }

  plan(question: string): QuestionPlan {
    return planQuestion(question);
  }

  async answer(
    question: string,
    options: AnswerOptions = {},
  ): Promise<Result<AnswerResult, PipelineError>> {
    const topN = options.topN ?? this.defaultTopN;
    if (!Number.isInteger(topN) || topN < 1) {
      return err(new PipelineError(`topN must be a positive integer, got ${topN}`));
    }

    const plan = this.plan(question);

    const fetched = await this.fetchAll(plan.specs);
    if (fetched.isErr()) {
      return err(fetched.error);
    }

    const ranked = rankTaggedRows(question, plan.entities, fetched.value);

    return ok({
      ...plan,
      rows: selectTopN(ranked, topN),
      totalRows: ranked.length,
    });
  }

  /**
   * Run every spec concurrently. Promise.all keeps results in spec order,
   * whatever order the queries finish in.
   */
  private async fetchAll(specs: readonly QuerySpec[]): Promise<Result<TaggedRows[], PipelineError>> {
    const results = await Promise.all(
      specs.map(async (spec) => ({
        spec,
        result: await this.executor.execute(spec.query, spec.params),
      })),
    );

    const tagged: TaggedRows[] = [];
    for (const { spec, result } of results) {
      if (result.isErr()) {
        return err(new PipelineError(`${spec.tag} query failed: ${result.error.message}`));
      }
      tagged.push({ tag: spec.tag, rows: result.value });
    }
    return ok(tagged);
  }
}

/**
 * Score each group of rows under its own tag, then merge the groups into one
 * ranking. Ties keep spec order, then row order within the spec.
 */
export function rankTaggedRows(
  question: string,
  entities: EntitySet,
  groups: readonly TaggedRows[],
): ScoredRow[] {
  const scored = groups.flatMap(({ tag, rows }) => scoreItems(question, tag, rows, entities));
  return sortByScore(scored);
}
