/**
 * Run engine types
 *
 * Types for the engine that drives `debpilot update` and
 * `debpilot rollback <version>`.
 */

import type { PilotConfig, PilotError, RunStepId } from '@debpilot/ipc';
import type { RunLogger } from '../utils/logger.js';
import type { PackageManager } from '../utils/apt.js';
import type { ServiceController } from '../utils/service.js';
import type { ArchiveBackupService } from '../utils/backup.js';
import type { ArchiveDownloader } from '../utils/download.js';

/**
 * Collaborators the engine drives. Everything that touches the host
 * comes in through here.
 */
export interface RunEngineDeps {
  config: PilotConfig;
  logger: RunLogger;
  packages: PackageManager;
  service: ServiceController;
  backups: ArchiveBackupService;
  downloader: Pick<ArchiveDownloader, 'download' | 'urlFor'>;
}

/**
 * Result of a whole run
 */
export interface RunOutcome {
  success: boolean;
  /** Process exit code: 0 on success, 1 on any failure */
  exitCode: number;
  /** Step that failed, if any */
  failedStep?: RunStepId;
  error?: PilotError;
}

/**
 * What a step handler reports when it returns normally
 */
export type StepResult = 'completed' | 'skipped';
