/**
 * Shared plumbing for the run commands
 */

import { LockHeldError, type PilotConfig } from '@debpilot/ipc';
import type { RunEngine, RunOutcome } from '../engine/index.js';
import type { LogSink, RunLogger } from '../utils/logger.js';
import { withRunLock, type RunLock } from '../utils/lock.js';

/**
 * Everything a command needs; built once per process by createCliContext
 */
export interface CliContext {
  config: PilotConfig;
  logger: RunLogger;
  engine: RunEngine;
  lock: RunLock;
  stdout: LogSink;
  stderr: LogSink;
}

/** Receives the exit code of the command that ran */
export type ExitReporter = (exitCode: number) => void;

/**
 * Run a workflow while holding the run lock and return its exit code
 */
export async function runExclusive(ctx: CliContext, workflow: () => Promise<RunOutcome>): Promise<number> {
  try {
    const outcome = await withRunLock(ctx.lock, workflow);
    return outcome.exitCode;
  } catch (err) {
    if (err instanceof LockHeldError) {
      ctx.logger.error(`${err.message}. Exiting...`);
      return err.exitCode;
    }
    throw err;
  }
}
