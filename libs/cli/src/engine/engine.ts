/**
 * Run engine
 *
 * Orchestrates the two workflows:
 * - update: backup → refresh index → upgrade → verify running
 * - rollback: fetch archive → install archive → verify version → verify running
 *
 * Steps run strictly in order. The first failing step logs one ERROR line
 * and ends the run (no retries, no automatic recovery).
 */

import {
  PilotError,
  ServiceControlError,
  ServiceNotRunningError,
  StepError,
  UpgradeError,
  VersionMismatchError,
  archiveFileName,
  parsePackageVersion,
  type RunMode,
  type RunState,
  type RunStep,
  type RunStepId,
  type RollbackStepId,
  type UpdateStepId,
} from '@debpilot/ipc';
import { errorMessage } from '../utils/process.js';
import type { RunEngineDeps, RunOutcome, StepResult } from './types.js';

type StepDefinition = Omit<RunStep, 'status' | 'error'>;
type StepHandler = () => Promise<StepResult>;

const UPDATE_STEPS: StepDefinition[] = [
  { id: 'backup', name: 'Back up archives', description: 'Copy cached package archives to the backups directory' },
  { id: 'refresh-index', name: 'Refresh index', description: 'Refresh the package index' },
  { id: 'upgrade', name: 'Upgrade', description: 'Stop the service and upgrade the package if a newer version is available' },
  { id: 'verify-running', name: 'Verify service', description: 'Check that the service is running' },
];

const ROLLBACK_STEPS: StepDefinition[] = [
  { id: 'fetch-package', name: 'Fetch archive', description: 'Find or download the archive of the requested version' },
  { id: 'install-package', name: 'Install archive', description: 'Install the archive with dpkg' },
  { id: 'verify-version', name: 'Verify version', description: 'Check the installed version matches the request' },
  { id: 'verify-running', name: 'Verify service', description: 'Check that the service is running' },
];

/**
 * Create the run engine
 */
export function createRunEngine(deps: RunEngineDeps) {
  const { config, logger, packages, service, backups, downloader } = deps;
  const pkg = config.packageName;

  let state: RunState = { mode: 'update', steps: [], isComplete: false, hasError: false };
  let onStateChange: ((state: RunState) => void) | undefined;

  function snapshot(): RunState {
    return { ...state, steps: state.steps.map((s) => ({ ...s })) };
  }

  function notify(): void {
    onStateChange?.(snapshot());
  }

  function updateStep(stepId: RunStepId, updates: Partial<RunStep>): void {
    const step = state.steps.find((s) => s.id === stepId);
    if (step) {
      Object.assign(step, updates);
      notify();
    }
  }

  function toPilotError(stepId: RunStepId, err: unknown): PilotError {
    if (err instanceof PilotError) return err;
    return new StepError(stepId, errorMessage(err), 'STEP_FAILED', { cause: err });
  }

  async function run(
    mode: RunMode,
    definitions: StepDefinition[],
    handlers: Record<string, StepHandler>,
    targetVersion?: string,
  ): Promise<RunOutcome> {
    state = {
      mode,
      targetVersion,
      steps: definitions.map((d) => ({ ...d, status: 'pending' })),
      isComplete: false,
      hasError: false,
    };
    notify();

    for (const step of state.steps) {
      const handler = handlers[step.id];
      updateStep(step.id, { status: 'running' });
      try {
        const result = await handler();
        updateStep(step.id, { status: result });
      } catch (err) {
        const error = toPilotError(step.id, err);
        logger.error(`  - ${error.message}. Exiting...`);
        state.hasError = true;
        updateStep(step.id, { status: 'error', error: error.message });
        return { success: false, exitCode: error.exitCode, failedStep: step.id, error };
      }
    }

    state.isComplete = true;
    notify();
    logger.info('DONE!');
    return { success: true, exitCode: 0 };
  }

  async function verifyRunning(): Promise<StepResult> {
    logger.action(`Checking ${service.name} service status:`);
    const status = await service.status();
    logger.info(`  ${status.detail}`);
    if (status.state !== 'running') {
      throw new ServiceNotRunningError(service.name, status.state);
    }
    logger.success(`  - ${service.name} service is running!`);
    return 'completed';
  }

  async function stopForUpgrade(): Promise<void> {
    logger.info(`  - stopping ${service.name} service:`);
    await service.stop();
    const status = await service.status();
    if (status.state !== 'stopped' && status.state !== 'failed') {
      throw new ServiceControlError(
        service.name,
        'stop',
        `${service.name} service did not stop (state: ${status.state})`,
      );
    }
  }

  const updateHandlers: Record<UpdateStepId, StepHandler> = {
    async backup() {
      logger.action(`Backing up current ${pkg} package:`);
      const result = backups.backupCachedArchives();
      if (result.copied.length === 0 && result.upToDate.length === 0) {
        logger.info(`  - No cached ${pkg} packages found in ${config.archiveDir}.`);
      } else {
        logger.success(
          `  - Current ${pkg} package was copied to backup (${result.copied.length} copied, ${result.upToDate.length} up to date).`,
        );
      }
      return 'completed';
    },

    async 'refresh-index'() {
      logger.action('Performing update:');
      await packages.refreshIndex();
      return 'completed';
    },

    async upgrade() {
      const running = await packages.getInstalledVersion();
      logger.info(`Running version is: ${running ?? 'unknown'}`);
      const available = await packages.getCandidateVersion();
      logger.info(`Available version is: ${available ?? 'unknown'}`);

      if (running === null) {
        throw new UpgradeError(`Unable to determine the installed ${pkg} version`);
      }
      if (available === null || running === available) {
        logger.info('Nothing to do.');
        logger.info('The current running version is the latest available.');
        return 'skipped';
      }

      logger.action(`Upgrading ${pkg}:`);
      await stopForUpgrade();
      logger.info('  - running apt-get:');
      await packages.upgradeInstalled();

      const installed = await packages.getInstalledVersion();
      if (installed !== available) {
        throw new UpgradeError(`${pkg} is at ${installed ?? 'unknown'} after the upgrade, expected ${available}`);
      }
      logger.success(`  - ${pkg} has been updated to ${installed}`);
      return 'completed';
    },

    'verify-running': verifyRunning,
  };

  return {
    get state(): RunState {
      return snapshot();
    },

    set onStateChange(cb: ((state: RunState) => void) | undefined) {
      onStateChange = cb;
    },

    /**
     * Run the update workflow
     */
    async runUpdate(): Promise<RunOutcome> {
      return run('update', UPDATE_STEPS, updateHandlers);
    },

    /**
     * Run the rollback workflow. Throws InvalidVersionError before any step
     * runs when the version is not an acceptable token.
     */
    async runRollback(requestedVersion: string): Promise<RunOutcome> {
      const version = parsePackageVersion(requestedVersion);
      const fileName = archiveFileName(pkg, version);
      let archivePath = '';

      logger.action(`Performing roll back to ${version}:`);

      const rollbackHandlers: Record<RollbackStepId, StepHandler> = {
        async 'fetch-package'() {
          const backedUp = backups.findArchive(fileName);
          if (backedUp) {
            logger.info(`  - Using backed up package ${backedUp}.`);
            archivePath = backedUp;
          } else {
            logger.info(`  - Downloading ${downloader.urlFor(fileName)}`);
            archivePath = await downloader.download(fileName);
          }
          logger.success(`  - ${pkg} package for roll back retrieved.`);
          return 'completed';
        },

        async 'install-package'() {
          await packages.installArchive(archivePath);
          return 'completed';
        },

        async 'verify-version'() {
          const installed = await packages.getInstalledVersion();
          if (installed !== version) {
            throw new VersionMismatchError(version, installed);
          }
          logger.success(`  - ${pkg} has been rolled back to ${version}`);
          return 'completed';
        },

        'verify-running': verifyRunning,
      };

      return run('rollback', ROLLBACK_STEPS, rollbackHandlers, version);
    },
  };
}

export type RunEngine = ReturnType<typeof createRunEngine>;
