import type {
  AlgorithmAlias,
  ClassifiedQuestion,
  EntitySet,
  QuestionIntent,
  SectionName,
} from '../types/question.js';

/**
 * Keyword table for intent detection. Order matters: the first intent whose
 * keyword occurs in the question wins, so entries are never reordered or
 * moved into a map.
 */
export const INTENT_KEYWORDS: ReadonlyArray<{
  readonly intent: Exclude<QuestionIntent, 'generic'>;
  readonly keywords: readonly string[];
}> = Object.freeze([
  { intent: 'symptoms', keywords: ['symptom', 'symptoms'] },
  { intent: 'risk_factors', keywords: ['risk', 'risk factor', 'risk factors', 'increase the risk'] },
  { intent: 'diagnostic_techniques', keywords: ['diagnostic', 'diagnosis', 'technique', 'techniques'] },
  { intent: 'dataset', keywords: ['dataset', 'data set', 'instances', 'features', 'source'] },
  { intent: 'cancer_types', keywords: ['type of cancer', 'types of cancer', 'cancer types', 'stage', 'stages'] },
  { intent: 'results', keywords: ['accuracy', 'result', 'results', 'benchmark', 'performance', 'best model'] },
  { intent: 'conclusion', keywords: ['conclusion', 'summary'] },
] as const);

/** Algorithm alias groups, in the order their codes are reported. */
export const ALGORITHM_ALIASES: ReadonlyArray<{
  readonly alias: AlgorithmAlias;
  readonly keywords: readonly string[];
}> = Object.freeze([
  { alias: 'svm', keywords: ['svm', 'support vector'] },
  { alias: 'ann', keywords: ['ann', 'artificial neural'] },
  { alias: 'rf', keywords: ['rf', 'random forest'] },
  { alias: 'mlr', keywords: ['mlr', 'multiple linear regression'] },
] as const);

export const SECTION_NAMES: readonly SectionName[] = Object.freeze([
  'abstract',
  'introduction',
  'methodology',
  'results',
  'conclusion',
] as const);

const LUNG_CANCER = 'lung cancer';

/** Lowercase, trim and collapse every whitespace run to a single space. */
export function normalizeQuestion(question: string): string {
  return question.toLowerCase().trim().replace(/\s+/g, ' ');
}

/** First-match-wins keyword lookup over {@link INTENT_KEYWORDS}. */
export function detectIntent(question: string): QuestionIntent {
  const normalized = normalizeQuestion(question);
  for (const { intent, keywords } of INTENT_KEYWORDS) {
    for (const keyword of keywords) {
      if (normalized.includes(keyword)) {
        return intent;
      }
    }
  }
  return 'generic';
}

export function extractEntities(question: string): EntitySet {
  const normalized = normalizeQuestion(question);

  const diseases = normalized.includes(LUNG_CANCER) ? [LUNG_CANCER] : [];

  const algorithms: AlgorithmAlias[] = [];
  for (const { alias, keywords } of ALGORITHM_ALIASES) {
    if (keywords.some((keyword) => normalized.includes(keyword))) {
      algorithms.push(alias);
    }
  }

  const sections = SECTION_NAMES.filter((name) => normalized.includes(name));

  return { diseases, algorithms, sections };
}

/**
 * Classify a question into one intent plus the entities it mentions.
 * Substring matching only; every input gets a classification, `generic` at worst.
 */
export function classifyQuestion(question: string): ClassifiedQuestion {
  return {
    intent: detectIntent(question),
    entities: extractEntities(question),
  };
}
