import type { Id, ParameterTree } from '@enginehost/protocol';
import type { RepositoryContext } from '@enginehost/repositories';
import type { EngineLogger } from '../logger.js';
import type { EngineContext } from './contract.js';

export type CreateEngineContextOptions = {
  engineId: Id;
  params: ParameterTree;
  repos: RepositoryContext;
  logger: EngineLogger;
};

/**
 * Bind dataset and model repositories to one engine id so an engine can only
 * reach its own data.
 */
export function createEngineContext(options: CreateEngineContextOptions): EngineContext {
  const { engineId, params, repos, logger } = options;

  return {
    engineId,
    params,
    datasets: {
      append: (event) => repos.datasets.append(engineId, event),
      list: (filter) => repos.datasets.list(engineId, filter),
      count: () => repos.datasets.count(engineId),
      stream: (filter) => repos.datasets.stream(engineId, filter),
    },
    models: {
      get: () => repos.models.get(engineId),
      put: (model) => repos.models.put(engineId, model),
    },
    logger: {
      debug: (message, data) => logger.debug(message, { engineId, ...data }),
      info: (message, data) => logger.info(message, { engineId, ...data }),
      warn: (message, data) => logger.warn(message, { engineId, ...data }),
      error: (message, data) => logger.error(message, { engineId, ...data }),
    },
  };
}
