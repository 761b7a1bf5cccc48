// Engine parameter tree - top-level keys the core understands
//
// Everything not declared here passes through untouched so engines,
// algorithms and datasets can run their own parse over the same document.

import { z } from 'zod';

/**
 * Engine ids are used in file names and URL paths.
 */
export const ENGINE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export const engineIdSchema = z
  .string({ required_error: 'Required' })
  .min(1, 'cannot be empty')
  .max(128, 'must be at most 128 characters')
  .regex(ENGINE_ID_PATTERN, 'may only contain letters, digits, ".", "_" and "-", and must start with a letter or digit');

export const mirrorTypeSchema = z.enum(['file', 'db']);

export const engineParamsSchema = z
  .object({
    engineId: engineIdSchema,
    engineFactory: z.string().min(1, 'cannot be empty'),
    mirrorType: mirrorTypeSchema.optional(),
    mirrorLocation: z.string().min(1, 'cannot be empty').optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type EngineParams = z.output<typeof engineParamsSchema>;
