import neo4j from 'neo4j-driver';
import { ok, err, type Result } from 'neverthrow';
import { LoaderError, type GraphExecutor } from '../types/provider.js';
import {
  entityList,
  sectionEntities,
  sectionText,
  type PaperDocument,
  type PaperSection,
} from './paper-document.js';

export type LoadStep =
  | 'clear'
  | 'constraints'
  | 'paper'
  | 'abstract'
  | 'introduction'
  | 'methodology'
  | 'results'
  | 'conclusion'
  | 'relationships';

export interface LoadSummary {
  steps: LoadStep[];
  statements: number;
}

export interface PaperGraphLoaderOptions {
  /** Section bodies are cut to this many characters. Default: 5000 */
  maxSectionTextLength?: number;
  onProgress?: (step: LoadStep) => void;
}

interface Statement {
  cypher: string;
  params: Record<string, unknown>;
}

const DEFAULT_MAX_SECTION_TEXT_LENGTH = 5000;
const DEFAULT_TITLE = 'Lung Cancer Detection using Supervised ML';

const MAX_KEYWORDS = 10;
const MAX_SYMPTOMS = 20;
const MAX_CANCER_TYPES = 10;
const MAX_CANCER_TYPE_LENGTH = 100;
const MAX_TECHNIQUES = 10;
const MAX_HABITS = 10;

const DEFAULT_ALGORITHMS = ['SVM', 'ANN', 'MLR', 'Random Forest'];
const DEFAULT_MODELS = [
  'Artificial Neural Network (ANN)',
  'Support Vector Machine (SVM)',
  'Random Forest',
  'Multiple Linear Regression (MLR)',
];

/**
 * Dataset described in the paper's methodology. Counts are driver Integers:
 * plain JS numbers are stored as Cypher floats.
 */
const DATASET = {
  name: 'Lung Cancer Dataset',
  source: 'data.world',
  format: 'CSV',
  instances: neo4j.int(1000),
  features: neo4j.int(24),
};

/**
 * Test-set accuracy reported per model. `match` is a substring of the
 * model's short or full name.
 */
const MODEL_ACCURACY: ReadonlyArray<{ match: string; accuracy: number }> = [
  { match: 'ANN', accuracy: 65.75 },
  { match: 'MLR', accuracy: 77.52 },
  { match: 'Forest', accuracy: 99.99 },
  { match: 'SVM', accuracy: 98.91 },
];

const BEST_MODEL_MATCH = 'Forest';

const CONSTRAINTS = [
  'CREATE CONSTRAINT IF NOT EXISTS FOR (p:Paper) REQUIRE p.title IS UNIQUE',
  'CREATE CONSTRAINT IF NOT EXISTS FOR (s:Section) REQUIRE s.name IS UNIQUE',
  'CREATE CONSTRAINT IF NOT EXISTS FOR (a:Algorithm) REQUIRE a.name IS UNIQUE',
  'CREATE CONSTRAINT IF NOT EXISTS FOR (m:Metric) REQUIRE m.name IS UNIQUE',
];

/** Split "Support Vector Machine (SVM)" into its short and full names. */
export function splitModelName(model: string): { name: string; fullName: string } {
  const open = model.indexOf('(');
  const close = model.indexOf(')', open);
  if (open === -1 || close === -1) {
    return { name: model, fullName: model };
  }
  return {
    name: model.slice(open + 1, close),
    fullName: model.slice(0, open).trim(),
  };
}

function sectionStatement(label: string, text: string): Statement {
  return {
    cypher: `MATCH (p:Paper) CREATE (s:Section:${label} {name: '${label}', text: $text}) CREATE (p)-[:HAS_SECTION]->(s)`,
    params: { text },
  };
}

/**
 * Writes one paper into the knowledge graph: sections, the entities each
 * section mentions, models with their results, and the cross-links the
 * query catalog relies on. Existing graph content is removed first.
 */
export class PaperGraphLoader {
  private readonly executor: GraphExecutor;
  private readonly maxTextLength: number;
  private readonly onProgress: ((step: LoadStep) => void) | undefined;

  constructor(executor: GraphExecutor, options: PaperGraphLoaderOptions = {}) {
    this.executor = executor;
    this.maxTextLength = options.maxSectionTextLength ?? DEFAULT_MAX_SECTION_TEXT_LENGTH;
    this.onProgress = options.onProgress;
  }

  async load(document: PaperDocument): Promise<Result<LoadSummary, LoaderError>> {
    const plan: Array<[LoadStep, Statement[]]> = [
      ['clear', [{ cypher: 'MATCH (n) DETACH DELETE n', params: {} }]],
      ['constraints', CONSTRAINTS.map((cypher) => ({ cypher, params: {} }))],
      ['paper', this.paperStatements(document)],
      ['abstract', this.abstractStatements(document.Sections.Abstract)],
      ['introduction', this.introductionStatements(document.Sections.Introduction)],
      ['methodology', this.methodologyStatements(document.Sections.Methodology)],
      ['results', this.resultsStatements(document.Sections.Results)],
      ['conclusion', [sectionStatement('Conclusion', this.truncate(sectionText(document.Sections.Conclusion)))]],
      ['relationships', this.relationshipStatements()],
    ];

    const steps: LoadStep[] = [];
    let statements = 0;

    for (const [step, stepStatements] of plan) {
      for (const statement of stepStatements) {
        const result = await this.executor.write(statement.cypher, statement.params);
        if (result.isErr()) {
          return err(new LoaderError(`Loading ${step} failed: ${result.error.message}`));
        }
        statements++;
      }
      steps.push(step);
      this.onProgress?.(step);
    }

    return ok({ steps, statements });
  }

  private truncate(text: string): string {
    return text.slice(0, this.maxTextLength);
  }

  private paperStatements(document: PaperDocument): Statement[] {
    return [
      {
        cypher:
          'CREATE (p:Paper {file_path: $file_path, file_size: $file_size, page_count: $page_count, author: $author, creator: $creator, title: $title})',
        params: {
          file_path: document.file_path,
          file_size: document.file_size_human,
          page_count: neo4j.int(document.page_count),
          author: document.metadata.author,
          creator: document.metadata.creator,
          title: document.metadata.title ?? DEFAULT_TITLE,
        },
      },
    ];
  }

  private abstractStatements(section: PaperSection): Statement[] {
    const entities = sectionEntities(section);
    const statements = [sectionStatement('Abstract', this.truncate(sectionText(section)))];

    const tools = entities['ML Tools'] ?? entities['Diagnostic Techniques'];
    const algorithms = tools !== undefined ? entityList(tools) : DEFAULT_ALGORITHMS;
    for (const algo of algorithms) {
      statements.push({
        cypher: 'MATCH (s:Abstract) MERGE (a:Algorithm {name: $algo}) CREATE (s)-[:MENTIONS_ALGORITHM]->(a)',
        params: { algo },
      });
    }

    const keywords = entities['Keywords'] ?? entities['keywords'];
    if (typeof keywords === 'string') {
      for (const keyword of entityList(keywords).slice(0, MAX_KEYWORDS)) {
        statements.push({
          cypher: 'MATCH (s:Abstract) MERGE (k:Keyword {name: $keyword}) CREATE (s)-[:HAS_KEYWORD]->(k)',
          params: { keyword },
        });
      }
    }

    return statements;
  }

  private introductionStatements(section: PaperSection): Statement[] {
    const entities = sectionEntities(section);
    const statements = [sectionStatement('Introduction', this.truncate(sectionText(section)))];

    for (const symptom of entityList(entities['Symptoms']).slice(0, MAX_SYMPTOMS)) {
      statements.push({
        cypher: 'MATCH (s:Introduction) MERGE (sym:Symptom {name: $symptom}) CREATE (s)-[:MENTIONS_SYMPTOM]->(sym)',
        params: { symptom },
      });
    }

    const cancerTypes = entityList(entities['Type of Cancer'] ?? entities['Types of Cancer']);
    for (const cancerType of cancerTypes.slice(0, MAX_CANCER_TYPES)) {
      statements.push({
        cypher:
          'MATCH (s:Introduction) MERGE (c:CancerType {name: $cancer_type}) CREATE (s)-[:DISCUSSES_CANCER_TYPE]->(c)',
        params: { cancer_type: cancerType.slice(0, MAX_CANCER_TYPE_LENGTH) },
      });
    }

    for (const technique of entityList(entities['Common Diagnostic Techniques']).slice(0, MAX_TECHNIQUES)) {
      statements.push({
        cypher:
          "MATCH (s:Introduction) MERGE (t:Technique {name: $technique, type: 'diagnostic'}) CREATE (s)-[:USES_TECHNIQUE]->(t)",
        params: { technique },
      });
    }

    // Habits are the paper's risk factors
    for (const habit of entityList(entities['Habits']).slice(0, MAX_HABITS)) {
      statements.push({
        cypher:
          'MATCH (s:Introduction) MERGE (r:RiskFactor {name: $habit}) CREATE (s)-[:IDENTIFIES_RISK_FACTOR]->(r)',
        params: { habit },
      });
    }

    return statements;
  }

  private methodologyStatements(section: PaperSection | undefined): Statement[] {
    const entities = sectionEntities(section);
    const statements: Statement[] = [
      sectionStatement('Methodology', this.truncate(sectionText(section))),
      {
        cypher:
          'MATCH (s:Methodology) CREATE (d:Dataset {name: $name, source: $source, format: $format, instances: $instances, features: $features}) CREATE (s)-[:USES_DATASET]->(d)',
        params: { ...DATASET },
      },
    ];

    const proposed = entityList(entities['Proposed Models']);
    for (const model of proposed.length > 0 ? proposed : DEFAULT_MODELS) {
      const { name, fullName } = splitModelName(model);
      statements.push({
        cypher:
          "MATCH (s:Methodology) CREATE (m:Model:Algorithm {name: $name, full_name: $full_name, type: 'supervised'}) CREATE (s)-[:IMPLEMENTS_MODEL]->(m)",
        params: { name, full_name: fullName },
      });
    }

    for (const symptom of entityList(entities['Symptoms']).slice(0, MAX_SYMPTOMS)) {
      statements.push({
        cypher: 'MATCH (d:Dataset) MERGE (f:Feature:Symptom {name: $symptom}) CREATE (d)-[:HAS_FEATURE]->(f)',
        params: { symptom },
      });
    }

    return statements;
  }

  private resultsStatements(section: PaperSection | undefined): Statement[] {
    const statements = [sectionStatement('Results', this.truncate(sectionText(section)))];

    for (const { match, accuracy } of MODEL_ACCURACY) {
      statements.push({
        cypher:
          "MATCH (m:Model) WHERE m.name CONTAINS $model OR m.full_name CONTAINS $model MATCH (s:Results) CREATE (r:Result {accuracy: $accuracy, metric: 'Accuracy (%)', evaluated_on: 'Test Set'}) CREATE (m)-[:HAS_RESULT]->(r) CREATE (s)-[:CONTAINS_RESULT]->(r)",
        params: { model: match, accuracy },
      });
    }

    statements.push({
      cypher:
        'MATCH (m:Model) WHERE m.name CONTAINS $model OR m.full_name CONTAINS $model MATCH (p:Paper) CREATE (p)-[:BEST_MODEL]->(m)',
      params: { model: BEST_MODEL_MATCH },
    });

    return statements;
  }

  private relationshipStatements(): Statement[] {
    return [
      {
        cypher:
          "MATCH (s:Symptom) MATCH (c:CancerType) WHERE c.name CONTAINS 'lung' OR c.name CONTAINS 'Lung' CREATE (s)-[:INDICATES]->(c)",
        params: {},
      },
      {
        cypher:
          "MATCH (r:RiskFactor) MATCH (c:CancerType) WHERE c.name CONTAINS 'lung' OR c.name CONTAINS 'Lung' CREATE (r)-[:INCREASES_RISK_OF]->(c)",
        params: {},
      },
    ];
  }
}
