import { Readable } from 'node:stream';

import { CheckStatus, statusMessage, type CheckState } from '@ons-clients/health';
import {
  ApiError,
  HttpClient,
  HttpError,
  ResponseValidationError,
  statusCodeOf,
  streamThrough,
  type Consumer,
  type HttpClientHooks,
  type HttpEffects,
} from '@ons-clients/http';
import { getLogger, type LogData } from '@ons-clients/logger';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType } from 'zod';

import type { CantabularConfig } from './config.js';
import { graphQLJSONToCSV } from './csv-stream.js';
import { normalizeDimensions } from './dimensions.js';
import type { TableError } from './errors.js';
import { graphQLErrorsToApiError, tableErrorToApiError } from './gql-error.js';
import {
  graphQLRequestBody,
  QueryDimensionOptions,
  QueryDimensions,
  QueryDimensionsByName,
  QueryGeographyDimensions,
  QueryListDatasets,
  QueryStaticDataset,
  type QueryVariables,
} from './queries.js';
import {
  CodebookResponseSchema,
  DimensionOptionsDataSchema,
  DimensionsByNameDataSchema,
  DimensionsDataSchema,
  ErrorResponseSchema,
  GeographyDimensionsDataSchema,
  GraphQLEnvelopeSchema,
  ListDatasetsDataSchema,
  StaticDatasetDataSchema,
} from './schemas.js';
import { toCsvSink, validateTable } from './table.js';
import type {
  GetCodebookRequest,
  GetCodebookResponse,
  GetDimensionOptionsRequest,
  GetDimensionOptionsResponse,
  GetDimensionsByNameRequest,
  GetDimensionsByNameResponse,
  GetDimensionsResponse,
  GetGeographyDimensionsRequest,
  GetGeographyDimensionsResponse,
  ListDatasetsResponse,
  StaticDatasetQueryRequest,
  Table,
} from './types.js';

export const Service = 'cantabular';
export const ServiceAPIExt = 'cantabularAPIExt';
export const ServiceMetadata = 'cantabularMetadataService';
export const SoftwareVersion = 'v10';

const GRAPHQL_ENDPOINT = '/graphql';
const DEFAULT_PAGE_SIZE = 20;

export type CantabularError = ApiError | TableError;

export interface CantabularClientOptions {
  effects?: Partial<HttpEffects> | undefined;
  hooks?: HttpClientHooks | undefined;
}

export interface StreamOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Client for the Cantabular server (codebooks, health) and its extended
 * GraphQL API (tables, dimensions). Either host may be left unconfigured;
 * calls that need it then fail with a 503.
 */
export class CantabularClient {
  private readonly logger = getLogger('cantabular');
  private readonly server: HttpClient | undefined;
  private readonly extApi: HttpClient | undefined;

  constructor(config: CantabularConfig, options: CantabularClientOptions = {}) {
    if (config.host) {
      this.server = new HttpClient(
        { baseUrl: config.host, hooks: options.hooks, retries: config.retries, serviceName: Service },
        options.effects
      );
    }
    if (config.extApiHost) {
      this.extApi = new HttpClient(
        {
          baseUrl: config.extApiHost,
          hooks: options.hooks,
          retries: config.retries,
          serviceName: ServiceAPIExt,
          timeout: config.graphQLTimeoutMs ?? 60_000,
        },
        options.effects
      );
    }
  }

  /**
   * Run the static dataset query and load the whole table into memory.
   * Use `staticDatasetQueryStreamCSV` when large responses are expected.
   */
  async staticDatasetQuery(
    req: StaticDatasetQueryRequest,
    options: StreamOptions = {}
  ): Promise<Result<Table, CantabularError>> {
    const logData = { request: req, url: this.graphQLUrl() };
    const response = await this.query(
      QueryStaticDataset,
      { dataset: req.dataset, variables: req.variables },
      StaticDatasetDataSchema,
      options.signal
    );
    if (response.isErr()) {
      return err(response.error);
    }

    const table = response.value?.dataset?.table;
    if (table?.error) {
      return err(tableErrorToApiError(table.error, logData));
    }
    if (!table) {
      return err(new ApiError('no table returned by graphQL query', 502, logData));
    }

    const dimensions = normalizeDimensions(table.dimensions);
    if (dimensions.isErr()) {
      return err(dimensions.error);
    }
    const validated = validateTable({ dimensions: dimensions.value, values: table.values ?? [] });
    return validated.isErr() ? err(validated.error) : ok(validated.value);
  }

  /**
   * Variables of a dataset's rule base
   */
  async getDimensions(dataset: string, options: StreamOptions = {}): Promise<Result<GetDimensionsResponse, ApiError>> {
    const response = await this.query(QueryDimensions, { dataset }, DimensionsDataSchema, options.signal);
    if (response.isErr()) {
      return err(response.error);
    }

    const found = response.value?.dataset;
    if (!found) {
      return err(new ApiError('no dataset returned by graphQL query', 502, { dataset, url: this.graphQLUrl() }));
    }
    return ok({ dataset: found });
  }

  /**
   * One page of the geography variables of a dataset, the variables its
   * rule base is the source of
   */
  async getGeographyDimensions(
    req: GetGeographyDimensionsRequest,
    options: StreamOptions = {}
  ): Promise<Result<GetGeographyDimensionsResponse, ApiError>> {
    const limit = req.limit ?? DEFAULT_PAGE_SIZE;
    const offset = req.offset ?? 0;
    const response = await this.query(
      QueryGeographyDimensions,
      { dataset: req.dataset, limit, offset },
      GeographyDimensionsDataSchema,
      options.signal
    );
    if (response.isErr()) {
      return err(response.error);
    }

    const found = response.value?.dataset;
    if (!found) {
      return err(new ApiError('no dataset returned by graphQL query', 502, { request: req, url: this.graphQLUrl() }));
    }
    const { isSourceOf } = found.ruleBase;
    return ok({
      dataset: found,
      pagination: { count: isSourceOf.edges.length, limit, offset, totalCount: isSourceOf.totalCount },
    });
  }

  /** Variables of a dataset looked up by name */
  async getDimensionsByName(
    req: GetDimensionsByNameRequest,
    options: StreamOptions = {}
  ): Promise<Result<GetDimensionsByNameResponse, ApiError>> {
    const response = await this.query(
      QueryDimensionsByName,
      { dataset: req.dataset, variables: req.dimensionNames },
      DimensionsByNameDataSchema,
      options.signal
    );
    if (response.isErr()) {
      return err(response.error);
    }

    const found = response.value?.dataset;
    if (!found) {
      return err(new ApiError('no dataset returned by graphQL query', 502, { request: req, url: this.graphQLUrl() }));
    }
    return ok({ dataset: found });
  }

  /**
   * Categories of the requested dimensions, without counts
   */
  async getDimensionOptions(
    req: GetDimensionOptionsRequest,
    options: StreamOptions = {}
  ): Promise<Result<GetDimensionOptionsResponse, CantabularError>> {
    const logData = { request: req, url: this.graphQLUrl() };
    const response = await this.query(
      QueryDimensionOptions,
      { dataset: req.dataset, variables: req.dimensionNames },
      DimensionOptionsDataSchema,
      options.signal
    );
    if (response.isErr()) {
      return err(response.error);
    }

    const table = response.value?.dataset?.table;
    if (table?.error) {
      return err(tableErrorToApiError(table.error, logData));
    }
    if (!table) {
      return err(new ApiError('no table returned by graphQL query', 502, logData));
    }

    const dimensions = normalizeDimensions(table.dimensions);
    if (dimensions.isErr()) {
      return err(dimensions.error);
    }
    return ok({ dataset: { table: { dimensions: dimensions.value } } });
  }

  async listDatasets(options: StreamOptions = {}): Promise<Result<ListDatasetsResponse, ApiError>> {
    const response = await this.query(QueryListDatasets, {}, ListDatasetsDataSchema, options.signal);
    if (response.isErr()) {
      return err(response.error);
    }
    if (!response.value) {
      return err(new ApiError('no datasets returned by graphQL query', 502, { url: this.graphQLUrl() }));
    }
    return ok(response.value);
  }

  /**
   * Run the static dataset query and stream the response as CSV into
   * `consume` while it downloads. Returns the CSV rows, header included.
   * Failures in the transform or the consumer are prefixed with
   * "transform error:" or "consumer error:" and keep the original as cause.
   */
  async staticDatasetQueryStreamCSV(
    req: StaticDatasetQueryRequest,
    consume: Consumer,
    options: StreamOptions = {}
  ): Promise<Result<number, Error>> {
    const extApi = this.extApiClient();
    if (extApi.isErr()) {
      return err(extApi.error);
    }

    const logData = { request: req, url: this.graphQLUrl() };
    const response = await extApi.value.stream(GRAPHQL_ENDPOINT, {
      body: graphQLRequestBody(QueryStaticDataset, { dataset: req.dataset, variables: req.variables }),
      method: 'POST',
      signal: options.signal,
    });
    if (response.isErr()) {
      return err(this.requestError(response.error, logData));
    }
    if (!response.value.body) {
      return err(new ApiError('empty response body', 502, logData));
    }

    let rowCount = 0;
    const streamed = await streamThrough(
      Readable.fromWeb(response.value.body),
      async (input, output) => {
        const result = await graphQLJSONToCSV(input, toCsvSink(output), { signal: options.signal });
        if (result.isErr()) {
          return err(result.error);
        }
        rowCount = result.value;
        return ok();
      },
      consume
    );

    if (streamed.isErr()) {
      this.logger.warn({ ...logData, error: streamed.error }, 'failed to stream static dataset as CSV');
      return err(streamed.error);
    }
    return ok(rowCount);
  }

  /**
   * Codebook of a dataset from the Cantabular server
   */
  async getCodebook(req: GetCodebookRequest, options: StreamOptions = {}): Promise<Result<GetCodebookResponse, ApiError>> {
    const server = this.serverClient();
    if (server.isErr()) {
      return err(server.error);
    }

    const endpoint = `/${SoftwareVersion}/codebook/${encodeURIComponent(req.datasetName)}`;
    const logData = { url: `${server.value.baseUrl}${endpoint}` };
    const result = await server.value.get(endpoint, {
      query: { cats: req.categories, v: req.variables },
      schema: CodebookResponseSchema,
      signal: options.signal,
    });
    if (result.isErr()) {
      return err(this.requestError(result.error, logData));
    }
    return ok(result.value);
  }

  /** Health of the Cantabular server */
  async checker(state: CheckState, signal?: AbortSignal): Promise<Result<void, Error>> {
    return this.checkHealth(state, Service, this.server, `/${SoftwareVersion}/datasets`, signal);
  }

  /** Health of the extended API, through a minimal GraphQL query */
  async checkerAPIExt(state: CheckState, signal?: AbortSignal): Promise<Result<void, Error>> {
    return this.checkHealth(state, ServiceAPIExt, this.extApi, '/graphql?query={datasets{name}}', signal);
  }

  /** Health of the metadata service, served beside the extended API */
  async checkerMetadataService(state: CheckState, signal?: AbortSignal): Promise<Result<void, Error>> {
    return this.checkHealth(state, ServiceMetadata, this.extApi, GRAPHQL_ENDPOINT, signal);
  }

  /** Status code embedded in an error returned by this client, or 0 */
  statusCode(error: unknown): number {
    return statusCodeOf(error);
  }

  async close(): Promise<void> {
    await Promise.all([this.server?.close(), this.extApi?.close()]);
  }

  private graphQLUrl(): string {
    return `${this.extApi?.baseUrl ?? ''}${GRAPHQL_ENDPOINT}`;
  }

  private serverClient(): Result<HttpClient, ApiError> {
    return this.server ? ok(this.server) : err(new ApiError('cantabular server host not configured', 503));
  }

  private extApiClient(): Result<HttpClient, ApiError> {
    return this.extApi ? ok(this.extApi) : err(new ApiError('cantabular Extended API Client not configured', 503));
  }

  /**
   * POST a GraphQL query and return its `data`. A top-level `errors` array
   * fails the call with the status of the first error.
   */
  private async query<D>(
    query: string,
    variables: QueryVariables,
    dataSchema: ZodType<D>,
    signal: AbortSignal | undefined
  ): Promise<Result<D | undefined, ApiError>> {
    const extApi = this.extApiClient();
    if (extApi.isErr()) {
      return err(extApi.error);
    }

    const logData = { request: variables, url: this.graphQLUrl() };
    const result = await extApi.value.post(GRAPHQL_ENDPOINT, graphQLRequestBody(query, variables), {
      schema: GraphQLEnvelopeSchema,
      signal,
    });
    if (result.isErr()) {
      return err(this.requestError(result.error, logData));
    }

    const errors = result.value.errors;
    if (errors && errors.length > 0) {
      return err(graphQLErrorsToApiError(errors, logData));
    }
    if (result.value.data === undefined || result.value.data === null) {
      return ok(undefined);
    }

    const data = dataSchema.safeParse(result.value.data);
    if (!data.success) {
      const issues = data.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(
        new ApiError(`failed to unmarshal response body: ${issues}`, 500, {
          ...logData,
          response_body: JSON.stringify(result.value.data).slice(0, 500),
        })
      );
    }
    return ok(data.data);
  }

  /**
   * Map a transport failure to an ApiError. Error responses from Cantabular
   * carry `{ "message": ... }`, which becomes the error message.
   */
  private requestError(error: Error, logData: LogData): ApiError {
    if (error instanceof ApiError) {
      return error;
    }

    if (error instanceof HttpError) {
      const body = error.responseBody === '' ? '[response body empty]' : error.responseBody;
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch (parseError) {
        const reason = parseError instanceof Error ? parseError.message : String(parseError);
        return new ApiError(
          `failed to unmarshal error response body: ${reason}`,
          error.statusCode,
          { ...logData, response_body: body },
          { cause: error }
        );
      }
      const message = ErrorResponseSchema.safeParse(parsed);
      return new ApiError(message.success ? message.data.message : body, error.statusCode, logData, { cause: error });
    }

    if (error instanceof ResponseValidationError) {
      return new ApiError(
        `failed to unmarshal response body: ${error.message}`,
        500,
        { ...logData, response_body: error.truncatedPayload },
        { cause: error }
      );
    }

    return new ApiError(`failed to make request: ${error.message}`, 500, logData, { cause: error });
  }

  private async checkHealth(
    state: CheckState,
    service: string,
    client: HttpClient | undefined,
    endpoint: string,
    signal: AbortSignal | undefined
  ): Promise<Result<void, Error>> {
    if (!client) {
      return state.update(CheckStatus.CRITICAL, `${service} host not configured`, 0);
    }

    const response = await client.stream(endpoint, { signal });
    if (response.isOk()) {
      await response.value.body?.cancel();
      if (response.value.status === 200) {
        return state.update(CheckStatus.OK, statusMessage(service, CheckStatus.OK), 200);
      }
      return state.update(CheckStatus.CRITICAL, statusMessage(service, CheckStatus.CRITICAL), response.value.status);
    }

    const error = response.error;
    if (error instanceof HttpError) {
      return state.update(CheckStatus.CRITICAL, statusMessage(service, CheckStatus.CRITICAL), error.statusCode);
    }

    this.logger.error({ error, service }, 'failed to request service health');
    return state.update(CheckStatus.CRITICAL, error.message, 0);
  }
}
