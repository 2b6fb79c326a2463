import type { ZodType } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | (string | number | boolean)[];

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  hooks?: HttpClientHooks | undefined;
  /** Downstream service name, used in logs and errors (e.g. 'cantabular', 'cantabularAPIExt'). */
  serviceName: string;
  retries?: number | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions<T = unknown> {
  body?: string | object | undefined;
  headers?: Record<string, string> | undefined;
  method?: HttpMethod | undefined;
  /** Appended to the URL; array values repeat the key (`v=a&v=b`). */
  query?: Record<string, QueryValue | undefined> | undefined;
  schema?: ZodType<T> | undefined;
  /** Aborts the request (and a streamed body) when signalled. Not retried. */
  signal?: AbortSignal | undefined;
  timeout?: number | undefined;
}

export interface HttpClientHooks {
  /**
   * Called once when a logical request starts (before any retry attempts).
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: (event: { endpoint: string; method: string; timestamp: number }) => void;

  /** Called once when a logical request succeeds; durationMs spans every attempt. */
  onRequestSuccess?: (event: { durationMs: number; endpoint: string; method: string; status: number }) => void;

  /** Called once when a logical request fails after its last attempt. */
  onRequestFailure?: (event: {
    durationMs: number;
    endpoint: string;
    error: string;
    method: string;
    status?: number | undefined;
  }) => void;

  /** Called before each retry attempt. */
  onBackoff?: (event: { attemptNumber: number; delayMs: number; reason: 'rate_limit' | 'retry' }) => void;
}

/**
 * Non-2xx response. The body is kept verbatim so callers can decode
 * service-specific error payloads from it.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly serviceName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

export class RequestCanceledError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestCanceledError';
  }
}
