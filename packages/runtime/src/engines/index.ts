export type {
  Engine,
  EngineContext,
  EngineFactory,
  DatasetStore,
  ModelStore,
} from './contract.js';
export { createEngineContext, type CreateEngineContextOptions } from './context.js';
export { EngineFactoryRegistry, createEngineFactoryRegistry } from './factory-registry.js';
export { BaseEngine } from './base-engine.js';
export * from './reference/index.js';
