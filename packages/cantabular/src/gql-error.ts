import { STATUS_CODES } from 'node:http';

import { ApiError } from '@ons-clients/http';
import type { LogData } from '@ons-clients/logger';

import type { GraphQLError } from './types.js';

const BAD_GATEWAY = 502;

const tableErrors: Record<string, string> = {
  withinMaxCells: 'resulting dataset too large',
};

/**
 * Status code a GraphQL error message starts with, e.g. 404 for
 * "404 Not Found: dataset not loaded in this server". Anything else is 502.
 */
export function graphQLErrorStatus(error: Pick<GraphQLError, 'message'>): number {
  const prefix = error.message.slice(0, 3);
  if (!/^\d{3}$/.test(prefix)) {
    return BAD_GATEWAY;
  }
  const statusCode = Number(prefix);
  return STATUS_CODES[statusCode] === undefined ? BAD_GATEWAY : statusCode;
}

/** Human readable form of a `table.error` code */
export function parseTableError(error: string): string {
  return tableErrors[error] ?? error;
}

/** Error for a response carrying a top-level `errors` array */
export function graphQLErrorsToApiError(errors: GraphQLError[], logData: LogData = {}): ApiError {
  const first = errors[0];
  const statusCode = first ? graphQLErrorStatus(first) : BAD_GATEWAY;
  return new ApiError(
    'error(s) returned by graphQL query',
    statusCode,
    { ...logData, errors },
    { cause: first ? new Error(first.message) : undefined }
  );
}

/** Error for a table that came back with `error` set */
export function tableErrorToApiError(error: string, logData: LogData = {}): ApiError {
  return new ApiError(`GraphQL error: ${parseTableError(error)}`, 400, logData);
}
