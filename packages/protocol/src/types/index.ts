export type { Timestamp, Id, JsonValue, JsonObject, ParameterTree } from './common.js';

export type {
  EngineState,
  TrainingDiscipline,
  EngineCapabilities,
  MirrorType,
  EngineInstance,
  EngineMetadata,
} from './engines.js';
export { disciplineOf } from './engines.js';

export type { Event, EventInput, ReservedEventName, MirrorRecord } from './events.js';
export { RESERVED_EVENTS, isReservedEvent } from './events.js';

export type {
  TrainingState,
  TrainingJobStatus,
  TrainingJob,
  TrainingStatus,
  TrainRequestResult,
} from './training.js';
