// @enginehost/api
// tRPC surface, configuration and request handler for the engine host

export { appRouter, type AppRouter } from './routers/index.js';
export { createEngineRequestHandler, type EngineRequestHandlerOptions } from './handler.js';
export { createContext, type Context } from './context.js';
export { createCallerFactory } from './trpc.js';
export { toTRPCError, trpcCodeFor } from './errors.js';
export { loadConfig, type HostConfig } from './config.js';
export {
  createHostFromConfig,
  loggerFor,
  type ConfiguredHost,
  type CreateHostFromConfigOptions,
} from './host.js';
