import type { z } from 'zod';
import { ConfigurationError } from '../errors.js';

/**
 * Validate component parameters coming from a config file.
 */
export function parseParams<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  params: unknown,
  component: string,
): z.output<TSchema> {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid parameters for '${component}': ${formatIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
