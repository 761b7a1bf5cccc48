// Training orchestration types

import type { Id, Timestamp } from './common.js';
import type { TrainingDiscipline } from './engines.js';

/**
 * Per-instance training state.
 * - idle: no batch run in flight
 * - training: a batch run is in flight
 * - failed: the last batch run failed; the previous model is still served
 */
export type TrainingState = 'idle' | 'training' | 'failed';

export type TrainingJobStatus = 'running' | 'succeeded' | 'failed';

/**
 * A batch training run.
 */
export type TrainingJob = {
  jobId: Id;
  engineId: Id;
  status: TrainingJobStatus;
  startedAt: Timestamp;
  finishedAt?: Timestamp;
  error?: string;
};

/**
 * Snapshot of an instance's training state.
 */
export type TrainingStatus = {
  engineId: Id;
  state: TrainingState;
  discipline: TrainingDiscipline;
  /** Inputs waiting behind the in-flight update */
  pendingInputs: number;
  currentJob?: TrainingJob;
  lastJob?: TrainingJob;
  lastError?: string;
};

/**
 * Result of asking for a batch run. Runs are detached from the caller;
 * completion is observed through TrainingStatus.
 */
export type TrainRequestResult = {
  status: 'accepted';
  jobId: Id;
};
