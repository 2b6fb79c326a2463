/** One value of a dimension, e.g. London in City */
export interface Category {
  readonly code: string;
  readonly label: string;
}

export interface VariableBase {
  name: string;
  label: string;
}

/**
 * One categorical axis of a table. `count` is always `categories.length`
 * once a dimension has been through `validateTable` or `createIterator`.
 */
export interface Dimension {
  variable: VariableBase;
  count: number;
  categories: Category[];
}

/**
 * Observation counts in row-major order: the last dimension varies fastest.
 */
export interface Table {
  dimensions: Dimension[];
  values: number[];
  error?: string | undefined;
}

export interface StaticDatasetQueryRequest {
  dataset: string;
  variables: string[];
}

export interface GetDimensionOptionsRequest {
  dataset: string;
  dimensionNames: string[];
}

export interface GetGeographyDimensionsRequest {
  dataset: string;
  /** Page size, 20 when omitted */
  limit?: number | undefined;
  offset?: number | undefined;
}

export interface GetDimensionsByNameRequest {
  dataset: string;
  dimensionNames: string[];
}

export interface GetCodebookRequest {
  datasetName: string;
  variables: string[];
  categories: boolean;
}

export interface MapFrom {
  sourceNames?: string[] | undefined;
  codes?: string[] | undefined;
}

/** Codebook variable returned by the Cantabular server */
export interface Variable {
  name: string;
  label: string;
  len: number;
  codes?: string[] | undefined;
  labels?: string[] | undefined;
  mapFrom?: MapFrom[] | undefined;
}

export interface Dataset {
  name: string;
  digest?: string | undefined;
  description?: string | undefined;
  size?: number | undefined;
  ruleBaseVariable?: string | undefined;
  datetime?: string | undefined;
}

export interface GetCodebookResponse {
  codebook: Variable[];
  dataset: Dataset;
}

export interface GraphQLLocation {
  line: number;
  column: number;
}

export interface GraphQLError {
  message: string;
  locations?: GraphQLLocation[] | undefined;
  path?: (string | number)[] | undefined;
}

export interface Edge<T> {
  node: T;
}

export interface Edges<T> {
  edges: Edge<T>[];
}

export interface MapFromNode {
  filterOnly?: string | boolean | undefined;
  label: string;
  name: string;
}

export interface RuleBaseVariable {
  name: string;
  label: string;
  mapFrom: Edges<MapFromNode>;
  categories: { totalCount: number };
}

export interface GetDimensionsResponse {
  dataset: {
    ruleBase: {
      name: string;
      isSourceOf: Edges<RuleBaseVariable>;
    };
  };
}

/** Variable listed with the variables it can be mapped from */
export interface VariableNode {
  name: string;
  label: string;
  categories: { totalCount: number };
  mapFrom?: Edges<MapFromNode>[] | undefined;
}

export interface PaginationResponse {
  /** Items in this page */
  count: number;
  totalCount: number;
  limit: number;
  offset: number;
}

export interface GetGeographyDimensionsResponse {
  dataset: {
    ruleBase: {
      name: string;
      isSourceOf: Edges<VariableNode> & { totalCount: number };
    };
  };
  pagination: PaginationResponse;
}

export interface GetDimensionsByNameResponse {
  dataset: {
    variables: Edges<VariableNode>;
  };
}

export interface GetDimensionOptionsResponse {
  dataset: {
    table: {
      dimensions: Dimension[];
      error?: string | undefined;
    };
  };
}

export interface ListDatasetsResponse {
  datasets: { name: string; description?: string | undefined }[];
}
