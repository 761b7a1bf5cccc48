// Engine host error -> tRPC error mapping

import { TRPCError } from '@trpc/server';
import {
  AlreadyTrainingError,
  DuplicateIdError,
  EngineNotFoundError,
  MirrorNotFoundError,
  UnsupportedUpdateError,
  ValidationError,
} from '@enginehost/runtime';

type TRPCErrorCode = ConstructorParameters<typeof TRPCError>[0]['code'];

/**
 * The tRPC code an engine host error is reported under.
 */
export function trpcCodeFor(error: unknown): TRPCErrorCode {
  if (error instanceof ValidationError) return 'BAD_REQUEST';
  if (error instanceof EngineNotFoundError || error instanceof MirrorNotFoundError) return 'NOT_FOUND';
  if (error instanceof DuplicateIdError || error instanceof AlreadyTrainingError) return 'CONFLICT';
  if (error instanceof UnsupportedUpdateError) return 'PRECONDITION_FAILED';
  return 'INTERNAL_SERVER_ERROR';
}

export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  return new TRPCError({
    code: trpcCodeFor(error),
    message: error instanceof Error ? error.message : 'Internal error',
    cause: error,
  });
}
