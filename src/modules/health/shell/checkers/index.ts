export {
  makeSnapshotHealthChecker,
  type SnapshotHealthCheckerOptions,
} from './snapshot-checker.js';
