export {
  MirrorLog,
  type MirrorLogOptions,
  type MirrorSettings,
  type MirrorInfo,
  type MirrorVerification,
  type ReplayFailure,
  type ReplayReport,
} from './mirror-log.js';
