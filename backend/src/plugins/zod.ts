/**
 * Zod request validation
 *
 * Lets routes declare zod schemas under `schema.querystring` (or body,
 * params, headers). Parsed output replaces the raw request part, so
 * handlers receive coerced values and defaults.
 */

import type { FastifyInstance, FastifySchemaCompiler } from 'fastify';
import type { ZodError, ZodTypeAny } from 'zod';
import { RequestValidationError, type ValidationIssue } from '../common/errors.js';

const PART_LOCATIONS: Record<string, string> = {
  querystring: 'query',
  body: 'body',
  params: 'path',
  headers: 'header',
};

export function toValidationIssues(error: ZodError, location: string): ValidationIssue[] {
  return error.issues.map(issue => ({
    loc: [location, ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

export const zodValidatorCompiler: FastifySchemaCompiler<ZodTypeAny> = ({ schema, httpPart }) => {
  const location = PART_LOCATIONS[httpPart ?? 'body'] ?? 'body';

  return (data: unknown) => {
    const result = schema.safeParse(data);
    if (result.success) {
      return { value: result.data };
    }
    return { error: new RequestValidationError(toValidationIssues(result.error, location)) };
  };
};

export function applyZodValidation(app: FastifyInstance): void {
  app.setValidatorCompiler(zodValidatorCompiler);
}
