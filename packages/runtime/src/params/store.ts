// Parameter store
//
// Parameters arrive as one untyped JSON document. The core validates only the
// keys it owns; engines pull out their own sections (`algorithm`, `dataset`)
// and validate those with their own schemas.

import type { z } from 'zod';
import {
  validateWithSchema,
  engineParamsSchema,
  type EngineParams,
  type ParameterTree,
  type SchemaValidationError,
} from '@enginehost/protocol';
import { ValidationError } from '../errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn a JSON string or already-parsed value into a parameter tree.
 *
 * @throws ValidationError if the input is not a JSON object
 */
export function parseParameterTree(json: unknown): ParameterTree {
  let value = json;

  if (typeof json === 'string') {
    try {
      value = JSON.parse(json);
    } catch (error) {
      throw new ValidationError('Parameters are not valid JSON', {
        details: { reason: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  if (!isRecord(value)) {
    throw new ValidationError('Parameters must be a JSON object');
  }

  return value;
}

function toValidationError(errors: SchemaValidationError[], prefix?: string): ValidationError {
  const qualified = errors.map((e) => ({
    ...e,
    path: prefix ? (e.path ? `${prefix}.${e.path}` : prefix) : e.path,
  }));
  const first = qualified[0];
  const field = first?.path || undefined;

  return new ValidationError(
    field ? `Invalid parameter "${field}": ${first.message}` : `Invalid parameters: ${first?.message ?? 'unknown error'}`,
    { field, details: { errors: qualified } }
  );
}

/**
 * Parse parameters and validate the keys `schema` declares.
 * Keys the schema does not mention are never errors.
 *
 * @throws ValidationError naming the first offending key path
 */
export function parseAndValidate<S extends z.ZodTypeAny>(json: unknown, schema: S): z.output<S> {
  const tree = parseParameterTree(json);
  const result = validateWithSchema(schema, tree);
  if (!result.valid) {
    throw toValidationError(result.errors);
  }
  return result.value;
}

/**
 * Validate one top-level section of an already-parsed tree.
 * A missing section is validated as `{}` so schema defaults apply.
 */
export function extractSection<S extends z.ZodTypeAny>(
  params: ParameterTree,
  key: string,
  schema: S
): z.output<S> {
  const section = params[key] ?? {};
  const result = validateWithSchema(schema, section);
  if (!result.valid) {
    throw toValidationError(result.errors, key);
  }
  return result.value;
}

/**
 * Parse the core's own keys: engineId, engineFactory, mirrorType, mirrorLocation.
 */
export function parseEngineParams(json: unknown): EngineParams {
  return parseAndValidate(json, engineParamsSchema);
}
