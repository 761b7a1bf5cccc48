// Event validation - shape checks applied before any state is touched

import { z } from 'zod';
import { jsonValueSchema, timestampSchema } from './schemas.js';
import { validateWithSchema, type SchemaValidationResult } from './result.js';

const nameSchema = z.string().min(1, 'cannot be empty');

export const eventInputSchema = z.object({
  entityType: nameSchema,
  entityId: nameSchema,
  event: nameSchema,
  targetEntityType: nameSchema.optional(),
  targetEntityId: nameSchema.optional(),
  properties: z.record(jsonValueSchema).default({}),
  eventTime: timestampSchema.optional(),
});

export type ValidatedEventInput = z.output<typeof eventInputSchema>;

/**
 * Validate a caller-submitted event.
 * Unknown top-level fields are dropped; the payload in `properties` is kept verbatim.
 */
export function validateEventInput(input: unknown): SchemaValidationResult<ValidatedEventInput> {
  return validateWithSchema(eventInputSchema, input);
}
