// Shared building blocks for protocol schemas

import { z } from 'zod';
import type { JsonValue } from '../types/common.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/**
 * ISO 8601 timestamp with an explicit offset or Z suffix.
 */
export const timestampSchema = z
  .string()
  .datetime({ offset: true, message: 'must be an ISO 8601 timestamp' });
