export interface GraphConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
}

export interface RankingConfig {
  topN: number;
}

export interface LoaderConfig {
  maxSectionTextLength: number;
}

export interface PaperGraphConfig {
  version: string;
  graph: GraphConfig;
  ranking: RankingConfig;
  loader: LoaderConfig;
}
