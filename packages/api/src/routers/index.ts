// Root router

import { router } from '../trpc.js';
import { enginesRouter } from './engines.js';

/**
 * Usage from a client:
 * ```ts
 * const { engineId } = await trpc.engines.create.mutate({ params });
 * await trpc.engines.input.mutate({ engineId, event });
 * const result = await trpc.engines.query.query({ engineId, query: { num: 5 } });
 * ```
 */
export const appRouter = router({
  engines: enginesRouter,
});

export type AppRouter = typeof appRouter;
