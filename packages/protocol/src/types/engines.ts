// Engine instance types

import type { Id, ParameterTree, Timestamp } from './common.js';

/**
 * Lifecycle state of an engine instance.
 * - active: routable, accepting input and queries
 * - updating: routable, a parameter update is being applied
 * - destroyed: removed from the routing table, data released
 */
export type EngineState = 'active' | 'updating' | 'destroyed';

/**
 * How an engine learns from input.
 * - continuous: every accepted event updates model state immediately
 * - periodic: events accumulate; an explicit train run builds a new model
 * - mixed: both
 */
export type TrainingDiscipline = 'continuous' | 'periodic' | 'mixed';

/**
 * Capabilities an engine declares. The orchestrator dispatches on these,
 * never on the engine's class.
 */
export type EngineCapabilities =
  | { incrementalUpdate: true; batchTrain: false }
  | { incrementalUpdate: false; batchTrain: true }
  | { incrementalUpdate: true; batchTrain: true };

/**
 * Where mirrored events are written.
 * - file: one NDJSON file per engine under `mirrorLocation`
 * - db: the shared mirror record store
 */
export type MirrorType = 'file' | 'db';

/**
 * The canonical record of a live engine, owned by the administrator.
 */
export type EngineInstance = {
  /** Resource id, unique among active instances */
  id: Id;

  /** Factory identifier the engine was built from */
  engineType: string;

  /** Full parameter tree the engine was last configured with */
  params: ParameterTree;

  state: EngineState;

  trainingDiscipline: TrainingDiscipline;

  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * What is persisted per instance so it can be rebuilt on restart.
 */
export type EngineMetadata = {
  engineId: Id;
  engineFactory: string;
  params: ParameterTree;
  mirrorType?: MirrorType;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * Derive the discipline implied by a capability set.
 */
export function disciplineOf(capabilities: EngineCapabilities): TrainingDiscipline {
  if (capabilities.incrementalUpdate && capabilities.batchTrain) {
    return 'mixed';
  }
  return capabilities.batchTrain ? 'periodic' : 'continuous';
}
