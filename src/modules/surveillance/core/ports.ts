import type { SnapshotRepoError } from './errors.js';
import type { CaseSnapshot } from './types.js';
import type { Result } from 'neverthrow';

export interface CaseSnapshotRepo {
  /**
   * Load the current case snapshot.
   * Malformed rows are excluded and listed in `rejected`.
   */
  load(): Promise<Result<CaseSnapshot, SnapshotRepoError>>;
}
