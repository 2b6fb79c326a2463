import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export interface CantabularConfig {
  /** Cantabular server, e.g. http://localhost:8491. Empty disables server calls. */
  host?: string | undefined;
  /** Cantabular extended API, e.g. http://localhost:8492. Empty disables GraphQL calls. */
  extApiHost?: string | undefined;
  graphQLTimeoutMs?: number | undefined;
  retries?: number | undefined;
}

const optionalUrl = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value))
  .pipe(z.string().url().optional());

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? String(fallback) : value))
    .pipe(z.coerce.number().int().positive());

export const cantabularEnvSchema = z.object({
  CANTABULAR_URL: optionalUrl,
  CANTABULAR_EXT_API_URL: optionalUrl,
  CANTABULAR_GRAPHQL_TIMEOUT_MS: positiveInt(60_000),
  CANTABULAR_HTTP_RETRIES: positiveInt(3),
});

export type CantabularEnv = z.infer<typeof cantabularEnvSchema>;

/**
 * Read client configuration from environment variables
 */
export function cantabularConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Result<CantabularConfig, Error> {
  const result = cantabularEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err(new Error(`Invalid cantabular environment: ${issues}`));
  }

  return ok({
    extApiHost: result.data.CANTABULAR_EXT_API_URL,
    graphQLTimeoutMs: result.data.CANTABULAR_GRAPHQL_TIMEOUT_MS,
    host: result.data.CANTABULAR_URL,
    retries: result.data.CANTABULAR_HTTP_RETRIES,
  });
}
