// Engine host error taxonomy

/**
 * Base class for all engine host errors.
 * Every subclass carries a stable `code` that survives serialization.
 */
export class EngineHostError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EngineHostError';
    this.code = code;
  }
}

/**
 * Malformed or missing parameter or event field.
 * Always raised before any state is mutated.
 */
export class ValidationError extends EngineHostError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; code?: string }
  ) {
    super(options?.code ?? 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * The engine does not support the requested operation
 * (e.g. `train` on a continuous engine, `$delete` without a handler).
 */
export class UnsupportedOperationError extends ValidationError {
  readonly engineId: string;
  readonly operation: string;

  constructor(engineId: string, operation: string, reason?: string) {
    super(
      `Engine ${engineId} does not support ${operation}${reason ? `: ${reason}` : ''}`,
      { field: operation, details: { engineId, operation }, code: 'UNSUPPORTED_OPERATION' }
    );
    this.name = 'UnsupportedOperationError';
    this.engineId = engineId;
    this.operation = operation;
  }
}

export class EngineNotFoundError extends EngineHostError {
  readonly engineId: string;

  constructor(engineId: string) {
    super('NOT_FOUND', `Engine not found: ${engineId}`);
    this.name = 'EngineNotFoundError';
    this.engineId = engineId;
  }
}

/**
 * No mirror log holds any history for the id: it was never mirrored, or its
 * log lives somewhere this host was not told about.
 */
export class MirrorNotFoundError extends EngineHostError {
  readonly engineId: string;

  constructor(engineId: string) {
    super('MIRROR_NOT_FOUND', `No mirror log found for ${engineId}`);
    this.name = 'MirrorNotFoundError';
    this.engineId = engineId;
  }
}

export class DuplicateIdError extends EngineHostError {
  readonly engineId: string;

  constructor(engineId: string) {
    super('DUPLICATE_ID', `Engine already exists: ${engineId}`);
    this.name = 'DuplicateIdError';
    this.engineId = engineId;
  }
}

/**
 * A parameter change the running engine cannot absorb.
 * The previous configuration stays active.
 */
export class UnsupportedUpdateError extends EngineHostError {
  readonly engineId: string;
  readonly field?: string;

  constructor(engineId: string, reason: string, field?: string) {
    super('UNSUPPORTED_UPDATE', `Engine ${engineId} cannot be updated: ${reason}`);
    this.name = 'UnsupportedUpdateError';
    this.engineId = engineId;
    this.field = field;
  }
}

export class AlreadyTrainingError extends EngineHostError {
  readonly engineId: string;
  readonly jobId?: string;

  constructor(engineId: string, jobId?: string) {
    super('ALREADY_TRAINING', `Engine ${engineId} is already training`);
    this.name = 'AlreadyTrainingError';
    this.engineId = engineId;
    this.jobId = jobId;
  }
}

/**
 * Mirror log or metadata persistence failed.
 */
export class StorageFailureError extends EngineHostError {
  readonly operation: string;
  readonly engineId?: string;

  constructor(operation: string, cause: unknown, engineId?: string) {
    super(
      'STORAGE_FAILURE',
      `Storage failure during ${operation}${engineId ? ` for ${engineId}` : ''}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'StorageFailureError';
    this.operation = operation;
    this.engineId = engineId;
  }
}

/**
 * An engine's own logic raised an error.
 * Wrapped with the instance id and the operation that was running.
 */
export class AlgorithmFailureError extends EngineHostError {
  readonly engineId: string;
  readonly operation: string;

  constructor(engineId: string, operation: string, cause: unknown) {
    super(
      'ALGORITHM_FAILURE',
      `Engine ${engineId} failed during ${operation}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'AlgorithmFailureError';
    this.engineId = engineId;
    this.operation = operation;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Structured error as it crosses the boundary. Never includes a stack.
 */
export type ErrorResponse = {
  kind: string;
  message: string;
  field?: string;
  engineId?: string;
};

export function toErrorResponse(error: unknown): ErrorResponse {
  if (!(error instanceof EngineHostError)) {
    return { kind: 'INTERNAL_ERROR', message: 'Internal error' };
  }

  const response: ErrorResponse = { kind: error.code, message: error.message };

  if ('field' in error && typeof error.field === 'string') {
    response.field = error.field;
  }
  if ('engineId' in error && typeof error.engineId === 'string') {
    response.engineId = error.engineId;
  }

  return response;
}
