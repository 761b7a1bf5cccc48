// Schema validation results
//
// Protocol schemas are zod schemas; callers get a plain result object
// instead of a thrown ZodError so each layer can raise its own error type.

import type { z } from 'zod';

/**
 * A single validation failure, addressed by dotted key path.
 */
export type SchemaValidationError = {
  path: string;
  message: string;
  code: SchemaValidationErrorCode;
};

export type SchemaValidationErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_VALUE';

export type SchemaValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: SchemaValidationError[] };

/**
 * Validate input against a schema, returning errors with dotted paths.
 */
export function validateWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): SchemaValidationResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { valid: true, value: parsed.data };
  }

  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
      code: classifyIssue(issue),
    })),
  };
}

function classifyIssue(issue: z.ZodIssue): SchemaValidationErrorCode {
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE';
  }
  return 'INVALID_VALUE';
}
