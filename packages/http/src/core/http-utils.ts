// Pure HTTP utility functions
// All functions are pure - no side effects

import type { QueryValue } from '../types.js';

import type { ErrorClassification, RetryDelayInfo } from './types.js';

/**
 * Build URL from base URL, endpoint and optional query parameters.
 * Array values repeat the parameter, undefined values are skipped.
 */
export const buildUrl = (
  baseUrl: string,
  endpoint: string,
  query?: Record<string, QueryValue | undefined>
): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  let url = cleanBaseUrl;
  if (endpoint && endpoint !== '/') {
    url += endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  }

  if (!query) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      params.append(key, String(item));
    }
  }

  const search = params.toString();
  if (!search) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${search}`;
};

const SENSITIVE_PARAMS = ['token', 'key', 'apikey', 'api_key', 'secret', 'password', 'access_token'];

/**
 * Sanitize URL for logging (redact credential-like query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    for (const param of SENSITIVE_PARAMS) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Classify a non-2xx status for retry logic.
 * Gateway failures are transient; other 5xx come from the service itself.
 */
export const classifyHttpError = (status: number): ErrorClassification => {
  if (status === 429) {
    return { shouldRetry: true, type: 'rate_limit' };
  }

  if (status === 502 || status === 503 || status === 504) {
    return { shouldRetry: true, type: 'server' };
  }

  if (status >= 500 && status < 600) {
    return { shouldRetry: false, type: 'server' };
  }

  if (status >= 400 && status < 500) {
    return { shouldRetry: false, type: 'client' };
  }

  return { shouldRetry: false, type: 'unknown' };
};

/**
 * Parse Retry-After header value
 * Supports both delay-seconds and HTTP-date formats, capped at 30s
 */
export const parseRetryAfter = (value: string, currentTime: number): number | undefined => {
  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) {
    if (seconds === 0) {
      return 1000;
    }

    if (seconds > 0) {
      return Math.min(seconds * 1000, 30_000);
    }
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const delayMs = Math.max(0, date.getTime() - currentTime);
    if (delayMs > 0) {
      return Math.min(delayMs, 30_000);
    }
  }

  return undefined;
};

/**
 * Determine the retry delay a throttled or unavailable service asked for
 */
export const parseRetryDelay = (headers: Headers, currentTime: number): RetryDelayInfo => {
  const retryAfter = headers.get('retry-after');
  if (retryAfter) {
    const delayMs = parseRetryAfter(retryAfter, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'Retry-After' };
    }
  }

  return { source: 'default' };
};

/**
 * Calculate exponential backoff delay
 */
export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};

/**
 * Path of an endpoint without its query string, for hook events
 */
export const endpointPath = (endpoint: string): string => {
  const index = endpoint.indexOf('?');
  return index === -1 ? endpoint : endpoint.slice(0, index);
};
