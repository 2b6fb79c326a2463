export * from './types.js';
export * from './errors.js';
export { createIterator, normalizeDimensions, type DimensionIterator } from './dimensions.js';
export {
  COUNT_COLUMN,
  csvLine,
  decodeFlatIndex,
  renderTable,
  tableReadable,
  toCsvSink,
  validateTable,
  writeTable,
  type CsvSink,
} from './table.js';
export {
  graphQLJSONToCSV,
  OBSERVATION_COLUMN,
  streamHeader,
  type CsvStreamOptions,
  type StreamError,
} from './csv-stream.js';
export { graphQLErrorStatus, graphQLErrorsToApiError, parseTableError, tableErrorToApiError } from './gql-error.js';
export * from './queries.js';
export { cantabularConfigFromEnv, cantabularEnvSchema, type CantabularConfig, type CantabularEnv } from './config.js';
export {
  CantabularClient,
  Service,
  ServiceAPIExt,
  ServiceMetadata,
  SoftwareVersion,
  type CantabularClientOptions,
  type CantabularError,
  type StreamOptions,
} from './client.js';
