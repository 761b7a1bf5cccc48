export {
  TrainingOrchestrator,
  wrapEngineError,
  type TrainingOrchestratorOptions,
} from './orchestrator.js';
