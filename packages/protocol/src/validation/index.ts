export {
  validateWithSchema,
  type SchemaValidationError,
  type SchemaValidationErrorCode,
  type SchemaValidationResult,
} from './result.js';
export { jsonValueSchema, timestampSchema } from './schemas.js';
export {
  ENGINE_ID_PATTERN,
  engineIdSchema,
  mirrorTypeSchema,
  engineParamsSchema,
  type EngineParams,
} from './params.js';
export { eventInputSchema, validateEventInput, type ValidatedEventInput } from './events.js';
