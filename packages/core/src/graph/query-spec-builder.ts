import type { EntitySet, QuestionIntent } from '../types/question.js';
import type { QuerySpec } from '../types/query.js';

/**
 * Cypher templates keyed by intent. The query text must match the graph
 * written by the loader (labels, relationship types and RETURN aliases).
 */
const INTENT_QUERIES: Readonly<Record<Exclude<QuestionIntent, 'generic'>, readonly QuerySpec[]>> = {
  symptoms: [
    {
      tag: 'Symptoms',
      query: 'MATCH (:Introduction)-[:MENTIONS_SYMPTOM]->(s:Symptom) RETURN s.name AS item',
      params: {},
    },
  ],
  risk_factors: [
    {
      tag: 'RiskFactors',
      query: 'MATCH (:Introduction)-[:IDENTIFIES_RISK_FACTOR]->(r:RiskFactor) RETURN r.name AS item',
      params: {},
    },
  ],
  diagnostic_techniques: [
    {
      tag: 'DiagnosticTechniques',
      query: 'MATCH (:Introduction)-[:USES_TECHNIQUE]->(t:Technique) RETURN t.name AS item',
      params: {},
    },
  ],
  dataset: [
    {
      tag: 'Dataset',
      query:
        'MATCH (:Methodology)-[:USES_DATASET]->(d:Dataset) RETURN d.name AS name, d.source AS source, d.instances AS instances, d.features AS features, d.format AS format',
      params: {},
    },
  ],
  cancer_types: [
    {
      tag: 'CancerTypes',
      query: 'MATCH (:Introduction)-[:DISCUSSES_CANCER_TYPE]->(c:CancerType) RETURN c.name AS item',
      params: {},
    },
  ],
  results: [
    {
      tag: 'Results',
      query:
        'MATCH (m:Model)-[:HAS_RESULT]->(r:Result) RETURN coalesce(m.full_name,m.name) AS model, r.metric AS metric, r.accuracy AS accuracy',
      params: {},
    },
    {
      tag: 'BestModel',
      query: 'MATCH (:Paper)-[:BEST_MODEL]->(m:Model) RETURN coalesce(m.full_name,m.name) AS bestModel',
      params: {},
    },
  ],
  conclusion: [
    {
      tag: 'Conclusion',
      query: 'MATCH (s:Section:Conclusion) RETURN s.name AS name, s.text AS text',
      params: {},
    },
  ],
};

/** Full-text fallback over section bodies, used when no intent applies. */
export const SECTION_SEARCH_QUERY =
  'MATCH (s:Section) WHERE toLower(s.text) CONTAINS toLower($q) RETURN s.name AS name, s.text AS text LIMIT 50';

/**
 * Map a classified question to the ordered list of query specs to execute.
 *
 * Always returns at least one spec: intents without a catalog entry get the
 * section search, parameterized with the question exactly as asked.
 * Entities are accepted for symmetry with the ranking stage; no current
 * template binds them.
 */
export function buildQueries(
  intent: QuestionIntent,
  _entities: EntitySet,
  questionText: string,
): QuerySpec[] {
  const specs: QuerySpec[] = [];

  if (intent !== 'generic') {
    for (const spec of INTENT_QUERIES[intent]) {
      specs.push({ tag: spec.tag, query: spec.query, params: { ...spec.params } });
    }
  }

  if (specs.length === 0) {
    specs.push({
      tag: 'Sections',
      query: SECTION_SEARCH_QUERY,
      params: { q: questionText },
    });
  }

  return specs;
}
