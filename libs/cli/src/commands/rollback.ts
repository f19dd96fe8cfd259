/**
 * Rollback command
 *
 * Installs the archive of an earlier version and checks the result.
 */

import { Command } from 'commander';
import { parsePackageVersion } from '@debpilot/ipc';
import { runExclusive, type CliContext, type ExitReporter } from './run.js';

/**
 * Create the rollback command
 */
export function createRollbackCommand(ctx: CliContext, reportExit: ExitReporter): Command {
  return new Command('rollback')
    .description(`Roll the ${ctx.config.packageName} package back to an earlier version`)
    .argument('<version>', 'version string apt understands, e.g. 2.440.1')
    .action(async (version: string) => {
      // Validated before the lock is taken
      const requested = parsePackageVersion(version);
      reportExit(await runExclusive(ctx, () => ctx.engine.runRollback(requested)));
    });
}
