// Pure types for the functional core

/**
 * HTTP error classification
 */
export interface ErrorClassification {
  shouldRetry: boolean;
  type: 'rate_limit' | 'server' | 'client' | 'unknown';
}

/**
 * Retry delay derived from response headers
 */
export interface RetryDelayInfo {
  delayMs?: number | undefined;
  source: string;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: typeof fetch;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
