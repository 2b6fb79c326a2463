import { HttpClient, HttpError, type HttpEffects } from '@ons-clients/http';
import { getLogger } from '@ons-clients/logger';
import type { Result } from 'neverthrow';
import { z } from 'zod';

import { buildCheck, CheckStatus, type CheckState } from './check.js';

const logger = getLogger('health');

const HealthResponseSchema = z.object({
  status: z.string(),
});

interface EndpointHealth {
  code: number;
  status: string;
  error?: Error | undefined;
}

export interface HealthClientConfig {
  name: string;
  url: string;
  timeout?: number | undefined;
}

/**
 * Checks a downstream service through its own health endpoint.
 * Requests are never retried so a check reflects a single attempt.
 */
export class HealthClient {
  readonly name: string;
  private readonly http: HttpClient;

  constructor(config: HealthClientConfig, effects?: Partial<HttpEffects>) {
    this.name = config.name;
    this.http = new HttpClient(
      { baseUrl: config.url, retries: 1, serviceName: config.name, timeout: config.timeout },
      effects
    );
  }

  get url(): string {
    return this.http.baseUrl;
  }

  async checker(state: CheckState, signal?: AbortSignal): Promise<Result<void, Error>> {
    let health = await this.get('/health', signal);
    // Older services still expose /healthcheck
    if (health.code === 404) {
      health = await this.get('/healthcheck', signal);
    }

    if (health.error) {
      logger.warn({ api: this.name, error: health.error }, 'failed to request service health');
    }

    const check = buildCheck(this.name, health.status, health.code, health.error?.message ?? '');
    return state.update(check.status, check.message, check.statusCode);
  }

  close(): Promise<void> {
    return this.http.close();
  }

  private async get(path: string, signal: AbortSignal | undefined): Promise<EndpointHealth> {
    logger.debug({ path, service: this.name }, 'checking health');

    const result = await this.http.stream(path, { signal });
    if (result.isErr()) {
      const error = result.error;
      if (error instanceof HttpError) {
        return {
          code: error.statusCode,
          error: new Error(
            `invalid response from downstream service - should be: 200, got: ${error.statusCode}, path: ${path}`,
            { cause: error }
          ),
          status: CheckStatus.CRITICAL,
        };
      }
      return { code: 0, error, status: CheckStatus.CRITICAL };
    }

    const response = result.value;
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return {
        code: response.status,
        error: error instanceof Error ? error : new Error(String(error)),
        status: CheckStatus.CRITICAL,
      };
    }

    const parsed = HealthResponseSchema.safeParse(body);
    if (!parsed.success) {
      return {
        code: response.status,
        error: new Error(`invalid health response: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`),
        status: CheckStatus.CRITICAL,
      };
    }

    return { code: response.status, status: parsed.data.status };
  }
}
