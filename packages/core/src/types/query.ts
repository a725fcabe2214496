export type QueryTag =
  | 'Symptoms'
  | 'RiskFactors'
  | 'DiagnosticTechniques'
  | 'Dataset'
  | 'CancerTypes'
  | 'Results'
  | 'BestModel'
  | 'Conclusion'
  | 'Sections';

export type QueryParams = Readonly<Record<string, string>>;

/** A tagged Cypher template with the parameters bound for one question. */
export interface QuerySpec {
  readonly tag: QueryTag;
  readonly query: string;
  readonly params: QueryParams;
}
