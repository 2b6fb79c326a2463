import type { LogData } from '@ons-clients/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { HttpError } from './types.js';

/**
 * Error returned by every client in this repository: the failure, the HTTP
 * status code the caller should surface, and log data describing the call.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly logData: LogData = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ApiError';
  }

  /**
   * Wrap any client-side failure. An HttpError keeps the downstream status,
   * anything else gets `fallbackStatus`.
   */
  static from(error: Error, fallbackStatus: number, logData: LogData = {}, message?: string): ApiError {
    if (error instanceof ApiError) {
      return new ApiError(message ?? error.message, error.statusCode, { ...error.logData, ...logData }, { cause: error });
    }
    const statusCode = error instanceof HttpError ? error.statusCode : fallbackStatus;
    return new ApiError(message ?? error.message, statusCode, logData, { cause: error });
  }
}

function causeOf(error: Error): Error | undefined {
  return error.cause instanceof Error ? error.cause : undefined;
}

/**
 * HTTP status code embedded in an error or its cause chain, or 0 when there is none.
 */
export function statusCodeOf(error: unknown): number {
  let current: Error | undefined = error instanceof Error ? error : undefined;
  while (current) {
    if (current instanceof ApiError || current instanceof HttpError) {
      return current.statusCode;
    }
    current = causeOf(current);
  }
  return 0;
}

/**
 * Log data gathered along an error's cause chain; outer errors win on key clashes.
 */
export function logDataOf(error: unknown): LogData {
  const layers: LogData[] = [];
  let current: Error | undefined = error instanceof Error ? error : undefined;
  while (current) {
    if (current instanceof ApiError) {
      layers.push(current.logData);
    }
    current = causeOf(current);
  }
  return layers.reduceRight<LogData>((merged, layer) => ({ ...merged, ...layer }), {});
}

const JsonErrorsSchema = z.object({
  errors: z.array(
    z.object({
      errorCode: z.string(),
      description: z.string(),
    })
  ),
});

/**
 * Decode the `{ "errors": [{ "errorCode", "description" }] }` body returned
 * by several APIs into a single Error, one `code: description` per line.
 */
export function errorFromJsonBody(body: string): Result<Error, Error> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return err(new Error(`failed to decode error body: ${error instanceof Error ? error.message : String(error)}`));
  }

  const result = JsonErrorsSchema.safeParse(parsed);
  if (!result.success) {
    return err(new Error(`unexpected error body: ${result.error.issues.map((issue) => issue.message).join('; ')}`));
  }

  return ok(new Error(result.data.errors.map((e) => `${e.errorCode}: ${e.description}`).join('\n')));
}
