import type { z } from 'zod';
import { ConfigurationError } from '@taxi-stream/domain';

export type Env = Record<string, string | undefined>;

/**
 * Validate environment variables against a zod schema.
 * Throws ConfigurationError naming every missing or malformed variable.
 */
export function loadEnv<S extends z.ZodTypeAny>(schema: S, env: Env = process.env): z.output<S> {
  const result = schema.safeParse(env);
  if (result.success) return result.data;

  const problems = result.error.issues.map(
    (issue) => `${issue.path.map(String).join('.')} (${issue.message})`,
  );
  const variables = [...new Set(result.error.issues.map((issue) => issue.path.map(String).join('.')))];
  throw new ConfigurationError(
    `Missing or invalid environment variables: ${problems.join(', ')}`,
    variables,
  );
}
