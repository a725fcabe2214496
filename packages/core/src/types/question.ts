export type QuestionIntent =
  | 'symptoms'
  | 'risk_factors'
  | 'diagnostic_techniques'
  | 'dataset'
  | 'cancer_types'
  | 'results'
  | 'conclusion'
  | 'generic';

/** Short codes for the models the paper evaluates. */
export type AlgorithmAlias = 'svm' | 'ann' | 'rf' | 'mlr';

export type SectionName = 'abstract' | 'introduction' | 'methodology' | 'results' | 'conclusion';

export interface EntitySet {
  diseases: string[];
  algorithms: AlgorithmAlias[];
  sections: SectionName[];
}

export interface ClassifiedQuestion {
  intent: QuestionIntent;
  entities: EntitySet;
}
