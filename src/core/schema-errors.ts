/**
 * Turns ajv error objects into one readable line each.
 */

import type { ErrorObject } from 'ajv';

export interface SchemaProblem {
  /** JSON pointer of the offending value; `/` for the document root. */
  field: string;
  message: string;
}

export function describeSchemaErrors(errors: readonly ErrorObject[] | null | undefined): SchemaProblem[] {
  const problems: SchemaProblem[] = [];
  for (const err of errors ?? []) {
    const field = err.instancePath || '/';
    let message = err.message ?? 'Unknown schema error';

    if (err.keyword === 'additionalProperties') {
      const extra: unknown = err.params['additionalProperty'];
      if (typeof extra === 'string') {
        message = `Additional property "${extra}" is not allowed`;
      }
    } else if (err.keyword === 'required') {
      const missing: unknown = err.params['missingProperty'];
      if (typeof missing === 'string') {
        message = `Missing required property "${missing}"`;
      }
    } else if (err.keyword === 'enum') {
      const allowed: unknown = err.params['allowedValues'];
      if (Array.isArray(allowed)) {
        message = `Must be one of: ${allowed.map(String).join(', ')}`;
      }
    }

    problems.push({ field, message });
  }
  return problems;
}

export function formatProblem(problem: SchemaProblem): string {
  return `${problem.field}: ${problem.message}`;
}
