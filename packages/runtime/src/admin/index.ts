export {
  EngineAdministrator,
  type EngineAdministratorOptions,
  type EngineStatus,
  type RestoreFailure,
  type RestoreReport,
} from './administrator.js';
