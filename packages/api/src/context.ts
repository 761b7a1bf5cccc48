// tRPC request context

import type { EngineHost, EngineLogger } from '@enginehost/runtime';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  host: EngineHost;
  logger: EngineLogger;
};

/**
 * Every request shares the one engine host the process owns.
 */
export function createContext(host: EngineHost): Context {
  return { host, logger: host.logger };
}
