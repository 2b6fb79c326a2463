import { getLogger, type Logger } from '@ons-clients/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { HttpClientConfig, HttpClientHooks, HttpMethod, HttpRequestOptions } from './types.js';
import { HttpError, RequestCanceledError, ResponseValidationError } from './types.js';

type ResponseHandler<T> = (response: Response, release: () => void) => Promise<Result<T, Error>>;

/**
 * Same response, with a body that calls `release` once it has been read to
 * the end, has errored or has been canceled.
 */
function releaseWhenSettled(response: Response, release: () => void): Response {
  const source = response.body;
  if (!source) {
    release();
    return response;
  }

  const reader = source.getReader();
  const body = new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { done, value } = await reader.read();
        if (done) {
          release();
          controller.close();
          return;
        }
        controller.enqueue(value);
      } catch (error) {
        release();
        controller.error(error);
      }
    },
    async cancel(reason) {
      release();
      await reader.cancel(reason);
    },
  });

  return new Response(body, { headers: response.headers, status: response.status, statusText: response.statusText });
}

interface ResolvedConfig {
  baseUrl: string;
  defaultHeaders: Record<string, string>;
  hooks: HttpClientHooks | undefined;
  retries: number;
  serviceName: string;
  timeout: number;
}

export class HttpClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      baseUrl: config.baseUrl,
      defaultHeaders: {
        Accept: 'application/json',
        ...config.defaultHeaders,
      },
      hooks: config.hooks,
      retries: Math.max(1, config.retries ?? 3),
      serviceName: config.serviceName,
      timeout: config.timeout ?? 10000,
    };

    this.logger = getLogger(`HttpClient:${config.serviceName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10000,
      keepAliveMaxTimeout: 60000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => this.logger.log(level, message, metadata),
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.config.timeout}ms, Retries: ${this.config.retries}`
    );
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get serviceName(): string {
    return this.config.serviceName;
  }

  /**
   * GET a JSON resource; with a schema the result is validated and typed by it
   */
  async get<T = unknown>(
    endpoint: string,
    options: Omit<HttpRequestOptions<T>, 'method' | 'body'> = {}
  ): Promise<Result<T, Error>> {
    return this.request<T>(endpoint, { ...options, method: 'GET' });
  }

  /**
   * POST a body (objects are sent as JSON) and decode the JSON response
   */
  async post<T = unknown>(
    endpoint: string,
    body?: string | object,
    options: Omit<HttpRequestOptions<T>, 'method' | 'body'> = {}
  ): Promise<Result<T, Error>> {
    return this.request<T>(endpoint, { ...options, body, method: 'POST' });
  }

  /**
   * Make an HTTP request with retries and error handling, decoding a JSON body
   */
  async request<T = unknown>(endpoint: string, options: HttpRequestOptions<T> = {}): Promise<Result<T, Error>> {
    const method = options.method ?? 'GET';
    return this.execute(endpoint, options, (response) => this.decodeJson(response, endpoint, method, options.schema));
  }

  /**
   * Make an HTTP request and hand back the successful Response without reading its body.
   *
   * The caller owns the body and must consume or cancel it. The request timeout
   * covers the response headers only; `options.signal` keeps aborting the body
   * until it is read to the end, fails or is canceled.
   */
  async stream(endpoint: string, options: Omit<HttpRequestOptions, 'schema'> = {}): Promise<Result<Response, Error>> {
    return this.execute(
      endpoint,
      options,
      (response, release) => Promise.resolve(ok(releaseWhenSettled(response, release))),
      true
    );
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private async execute<T>(
    endpoint: string,
    options: Omit<HttpRequestOptions, 'schema'>,
    handle: ResponseHandler<T>,
    streaming = false
  ): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint, options.query);
    const method: HttpMethod = options.method ?? 'GET';
    const timeout = options.timeout ?? this.config.timeout;
    const hooks = this.config.hooks;
    const path = HttpUtils.endpointPath(endpoint);
    const externalSignal = options.signal;

    // Emit start event once before retry loop (logical request started)
    const startTime = this.effects.now();
    hooks?.onRequestStart?.({ endpoint: path, method, timestamp: startTime });

    const finish = (result: Result<T, Error>, status: number | undefined): Result<T, Error> => {
      const durationMs = this.effects.now() - startTime;
      if (result.isOk()) {
        hooks?.onRequestSuccess?.({ durationMs, endpoint: path, method, status: status ?? 0 });
      } else {
        hooks?.onRequestFailure?.({ durationMs, endpoint: path, error: result.error.message, method, status });
      }
      return result;
    };

    const canceled = (): Error =>
      new RequestCanceledError(`Request to ${this.config.serviceName} canceled`, { cause: externalSignal?.reason });

    let lastError: Error = new Error('Request failed with unknown error');
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= this.config.retries; attempt++) {
      if (externalSignal?.aborted) {
        return finish(err(canceled()), lastStatus);
      }

      const controller = new AbortController();
      const onExternalAbort = () => controller.abort(externalSignal?.reason);
      externalSignal?.addEventListener('abort', onExternalAbort, { once: true });
      const release = () => externalSignal?.removeEventListener('abort', onExternalAbort);
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      let bodyHandedOver = false;

      try {
        this.effects.log(
          'debug',
          `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Method: ${method}, Attempt: ${attempt}/${this.config.retries}`
        );

        const headers: Record<string, string> = {
          ...this.config.defaultHeaders,
          ...options.headers,
        };

        let body: string | undefined;
        if (options.body !== undefined) {
          if (typeof options.body === 'string') {
            body = options.body;
          } else {
            body = JSON.stringify(options.body);
            headers['Content-Type'] = 'application/json';
          }
        }

        const response = await this.effects.fetch(url, {
          // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
          body: body ?? null,
          headers,
          method,
          signal: controller.signal,
        });
        lastStatus = response.status;

        if (!response.ok) {
          const errorText = await response.text().catch(() => 'Unknown error');
          lastError = new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText);

          const classification = HttpUtils.classifyHttpError(response.status);
          if (classification.shouldRetry && attempt < this.config.retries) {
            await this.backoffAfterStatus(response, attempt, classification.type === 'rate_limit');
            continue;
          }

          this.effects.log('warn', `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Status: ${response.status}`, {
            method,
            serviceName: this.config.serviceName,
            status: response.status,
          });
          return finish(err(lastError), response.status);
        }

        const result = await handle(response, release);
        bodyHandedOver = streaming && result.isOk();
        return finish(result, response.status);
      } catch (error) {
        if (externalSignal?.aborted) {
          return finish(err(canceled()), lastStatus);
        }

        lastError = error instanceof Error ? error : new Error(String(error));
        if (controller.signal.aborted) {
          lastError = new Error(`Request timeout after ${timeout}ms`);
        }

        this.effects.log(
          'warn',
          `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${this.config.retries}, Error: ${lastError.message}`,
          {
            method,
            serviceName: this.config.serviceName,
          }
        );

        if (attempt < this.config.retries) {
          const delay = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10000);
          this.effects.log('debug', `Retrying after delay - Delay: ${delay}ms, NextAttempt: ${attempt + 1}`);
          hooks?.onBackoff?.({ attemptNumber: attempt, delayMs: delay, reason: 'retry' });
          await this.effects.delay(delay);
        }
      } finally {
        clearTimeout(timeoutId);
        // A streamed body stays tied to the caller's signal until it is consumed
        if (!bodyHandedOver) {
          release();
        }
      }
    }

    return finish(err(lastError), lastStatus);
  }

  private async backoffAfterStatus(response: Response, attempt: number, rateLimited: boolean): Promise<void> {
    const now = this.effects.now();
    const retryDelay = HttpUtils.parseRetryDelay(response.headers, now);
    const baseDelay = retryDelay.delayMs ?? (rateLimited ? 2000 : 1000);
    const delay = HttpUtils.calculateExponentialBackoff(attempt, baseDelay, rateLimited ? 60000 : 10000);

    this.effects.log(
      'warn',
      `HTTP ${response.status} received, waiting before retry - Source: ${retryDelay.source}, BaseDelay: ${baseDelay}ms, ActualDelay: ${delay}ms, Attempt: ${attempt}/${this.config.retries}`
    );

    this.config.hooks?.onBackoff?.({ attemptNumber: attempt, delayMs: delay, reason: rateLimited ? 'rate_limit' : 'retry' });
    await this.effects.delay(delay);
  }

  private async decodeJson<T>(
    response: Response,
    endpoint: string,
    method: HttpMethod,
    schema: ZodType<T> | undefined
  ): Promise<Result<T, Error>> {
    // Handle 204 No Content and empty responses
    if (response.status === 204 || response.headers.get('content-length') === '0') {
      return ok(undefined as T);
    }

    const data: unknown = await response.json();

    if (!schema) {
      return ok(data as T);
    }

    const parseResult = schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));

    // Format first 5 for error message
    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = JSON.stringify(data).slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      {
        endpoint: HttpUtils.endpointPath(endpoint),
        method,
        serviceName: this.config.serviceName,
        status: response.status,
        truncatedPayload,
      }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.serviceName,
        endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }
}
