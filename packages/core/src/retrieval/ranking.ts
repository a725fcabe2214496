import type { EntitySet } from '../types/question.js';
import type { QueryTag } from '../types/query.js';
import type { ResultRow, ScoredRow } from '../types/row.js';

/** Weights of the three score components; they sum to 1. */
export const SCORE_WEIGHTS = Object.freeze({
  lexical: 0.5,
  entity: 0.3,
  proximity: 0.2,
});

const ENTITY_MATCH_INCREMENT = 0.2;
const ENTITY_BOOST_CAP = 0.6;
const PROXIMITY_BOOST = 0.2;
export const DEFAULT_TOP_N = 8;

/** Tags whose rows come from a domain-specific query and earn the proximity boost. */
export const DOMAIN_TAGS: ReadonlySet<QueryTag> = new Set<QueryTag>([
  'Symptoms',
  'RiskFactors',
  'DiagnosticTechniques',
  'CancerTypes',
  'Dataset',
  'Results',
  'Conclusion',
]);

/** Fields consulted for a row's text, in precedence order. */
export const ROW_TEXT_FIELDS = Object.freeze(['text', 'item', 'model'] as const);

const TOKEN_RE = /[a-z][a-z-]{2,}/g;

/**
 * Text used to score a row: the first of `text`, `item`, `model` holding a
 * non-empty string, otherwise the empty string.
 */
export function rowText(row: ResultRow): string {
  for (const field of ROW_TEXT_FIELDS) {
    const value = row[field];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return '';
}

/** Lowercased words of three or more characters (letters and hyphens, starting with a letter). */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

/** Share of the question's distinct tokens that also occur in the text. */
export function lexicalOverlapScore(question: string, text: string): number {
  const questionTokens = new Set(tokenize(question));
  const textTokens = new Set(tokenize(text));
  if (questionTokens.size === 0 || textTokens.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const token of questionTokens) {
    if (textTokens.has(token)) {
      shared++;
    }
  }
  return shared / Math.max(1, questionTokens.size);
}

export function entityMatchBoost(text: string, entities: EntitySet): number {
  const lowered = text.toLowerCase();
  let boost = 0;
  for (const alias of entities.algorithms) {
    if (lowered.includes(alias)) {
      boost += ENTITY_MATCH_INCREMENT;
    }
  }
  for (const disease of entities.diseases) {
    if (lowered.includes(disease)) {
      boost += ENTITY_MATCH_INCREMENT;
    }
  }
  return Math.min(boost, ENTITY_BOOST_CAP);
}

export function proximityBoost(tag: QueryTag): number {
  return DOMAIN_TAGS.has(tag) ? PROXIMITY_BOOST : 0;
}

/** Weighted score of one row, always within [0, 1]. */
export function scoreRow(
  question: string,
  tag: QueryTag,
  row: ResultRow,
  entities: EntitySet,
): number {
  const text = rowText(row);
  return (
    SCORE_WEIGHTS.lexical * lexicalOverlapScore(question, text) +
    SCORE_WEIGHTS.entity * entityMatchBoost(text, entities) +
    SCORE_WEIGHTS.proximity * proximityBoost(tag)
  );
}

/**
 * Sort scored rows by descending score. Equal scores keep their input order;
 * the index comparison makes that explicit rather than relying on the engine.
 */
export function sortByScore<T extends { readonly _score: number }>(rows: readonly T[]): T[] {
  return rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => b.row._score - a.row._score || a.index - b.index)
    .map(({ row }) => row);
}

/**
 * Score every row returned for one query spec and sort them, best first.
 * Each result is a shallow copy carrying `_score` and `_tag`; the caller's
 * rows are left untouched.
 */
export function scoreItems(
  question: string,
  tag: QueryTag,
  rows: readonly ResultRow[],
  entities: EntitySet,
): ScoredRow[] {
  const scored: ScoredRow[] = rows.map((row) => ({
    ...row,
    _score: scoreRow(question, tag, row, entities),
    _tag: tag,
  }));
  return sortByScore(scored);
}

export function selectTopN<T>(scored: readonly T[], n: number = DEFAULT_TOP_N): T[] {
  return scored.slice(0, Math.max(0, n));
}
