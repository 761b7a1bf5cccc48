import type { EngineFactoryRegistry } from '../factory-registry.js';
import { CounterEngine, COUNTER_ENGINE_TYPE } from './counter-engine.js';
import { PopularityEngine, POPULARITY_ENGINE_TYPE } from './popularity-engine.js';

export {
  CounterEngine,
  COUNTER_ENGINE_TYPE,
  counterAlgorithmSchema,
  type CounterAlgorithm,
  type CounterModel,
  type CounterQueryResult,
} from './counter-engine.js';
export {
  PopularityEngine,
  POPULARITY_ENGINE_TYPE,
  popularityAlgorithmSchema,
  type PopularityAlgorithm,
  type PopularityModel,
  type PopularityQueryResult,
  type RankedItem,
} from './popularity-engine.js';

/**
 * Register the built-in reference engines.
 */
export function registerReferenceEngines(registry: EngineFactoryRegistry): EngineFactoryRegistry {
  registry.register(COUNTER_ENGINE_TYPE, () => new CounterEngine());
  registry.register(POPULARITY_ENGINE_TYPE, () => new PopularityEngine());
  return registry;
}
