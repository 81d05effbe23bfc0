export type IdType = string;
export interface Id {
  id: IdType;
}

export type Edge = {
  source: IdType;
  target: IdType;
}

export type Graph<T extends Id = Id> = {
  readonly nodes: Map<IdType, T>;
  // source -> targets
  readonly dependencies: Map<IdType, Set<IdType>>;
  // target -> sources
  readonly dependants: Map<IdType, Set<IdType>>;
}

export type Syntax = {
  readonly graphPrefix: string;
  readonly edgePrefix: string;
  readonly sourceDelimiter: string;
  readonly edgeInfix: string;
  readonly targetDelimiter: string;
  readonly edgeSuffix: string;
  readonly graphSuffix: string;
  readonly stripWhitespace: boolean;
}
