/**
 * Run engine types
 *
 * Shared between the engine and anything observing a run.
 */

export type RunMode = 'update' | 'rollback';

export type UpdateStepId = 'backup' | 'refresh-index' | 'upgrade' | 'verify-running';

export type RollbackStepId = 'fetch-package' | 'install-package' | 'verify-version' | 'verify-running';

export type RunStepId = UpdateStepId | RollbackStepId;

/**
 * Status of an individual run step
 */
export type RunStepStatus = 'pending' | 'running' | 'completed' | 'skipped' | 'error';

/**
 * A single step of a run
 */
export interface RunStep {
  id: RunStepId;
  /** Human-readable name */
  name: string;
  description: string;
  status: RunStepStatus;
  /** Error message if status is 'error' */
  error?: string;
}

/**
 * Overall run state
 */
export interface RunState {
  mode: RunMode;
  /** Requested version (rollback only) */
  targetVersion?: string;
  steps: RunStep[];
  /** Whether every step finished without error */
  isComplete: boolean;
  /** Whether a step failed */
  hasError: boolean;
}
