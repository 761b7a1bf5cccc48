// tRPC initialization
//
// Sets up tRPC with the superjson transformer. Engine host errors reach the
// client as structured data (kind, field, engineId); stacks never do.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { EngineHostError, toErrorResponse } from '@enginehost/runtime';
import type { Context } from './context.js';
import { toTRPCError } from './errors.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  isDev: false,
  errorFormatter({ shape, error }) {
    const engineError = error.cause instanceof EngineHostError ? toErrorResponse(error.cause) : undefined;
    const internal = !engineError && error.code === 'INTERNAL_SERVER_ERROR';

    return {
      code: shape.code,
      message: internal ? 'Internal error' : shape.message,
      data: {
        code: shape.data.code,
        httpStatus: shape.data.httpStatus,
        path: shape.data.path,
        kind: engineError?.kind ?? (internal ? 'INTERNAL_ERROR' : shape.data.code),
        field: engineError?.field,
        engineId: engineError?.engineId,
      },
    };
  },
});

/**
 * Turn engine host errors thrown by a procedure into the matching TRPCError.
 */
const engineErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok && result.error.cause instanceof EngineHostError) {
    throw toTRPCError(result.error.cause);
  }
  return result;
});

export const router = t.router;

/**
 * Base procedure for everything that reaches the engine host.
 */
export const engineProcedure = t.procedure.use(engineErrors);

export const createCallerFactory = t.createCallerFactory;

export { TRPCError };
