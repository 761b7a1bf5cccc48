// Fetch-style request handler
//
// The host process owns the listener and mounts this handler on it, e.g.
// behind a node:http adapter or any framework that speaks Request/Response.

import { fetchRequestHandler } from '@trpc/server/adapters/fetch';
import type { EngineHost } from '@enginehost/runtime';
import { createContext } from './context.js';
import { appRouter } from './routers/index.js';

export type EngineRequestHandlerOptions = {
  host: EngineHost;
  /** Path prefix the handler is mounted at (default "/engines") */
  endpoint?: string;
};

export function createEngineRequestHandler(
  options: EngineRequestHandlerOptions
): (req: Request) => Promise<Response> {
  const { host } = options;
  const endpoint = options.endpoint ?? '/engines';

  return (req) =>
    fetchRequestHandler({
      endpoint,
      req,
      router: appRouter,
      createContext: () => createContext(host),
      onError({ error, path }) {
        if (error.code === 'INTERNAL_SERVER_ERROR') {
          host.logger.error(`tRPC error on ${path ?? '<unknown>'}`, { message: error.message });
        }
      },
    });
}
