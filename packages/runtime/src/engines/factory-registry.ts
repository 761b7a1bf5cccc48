// Engine factory registry - maps engine type identifiers to factories
//
// Populated explicitly at process start. Nothing is loaded dynamically.

import type { EngineFactory } from './contract.js';

export class EngineFactoryRegistry {
  private factories = new Map<string, EngineFactory>();

  /**
   * Register a factory for an engine type.
   *
   * @throws Error if the type is already registered
   */
  register(engineType: string, factory: EngineFactory): void {
    if (this.factories.has(engineType)) {
      throw new Error(`Engine factory already registered for type: ${engineType}`);
    }
    this.factories.set(engineType, factory);
  }

  get(engineType: string): EngineFactory | undefined {
    return this.factories.get(engineType);
  }

  has(engineType: string): boolean {
    return this.factories.has(engineType);
  }

  types(): string[] {
    return Array.from(this.factories.keys()).sort();
  }
}

export function createEngineFactoryRegistry(
  entries: Record<string, EngineFactory> = {}
): EngineFactoryRegistry {
  const registry = new EngineFactoryRegistry();
  for (const [engineType, factory] of Object.entries(entries)) {
    registry.register(engineType, factory);
  }
  return registry;
}
