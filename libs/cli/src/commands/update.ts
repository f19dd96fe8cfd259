/**
 * Update command
 *
 * Backs up the cached archives, refreshes the index and upgrades the
 * package when apt has a newer candidate, then checks the service.
 */

import { Command } from 'commander';
import { runExclusive, type CliContext, type ExitReporter } from './run.js';

/**
 * Create the update command
 */
export function createUpdateCommand(ctx: CliContext, reportExit: ExitReporter): Command {
  return new Command('update')
    .description(`Update the local ${ctx.config.packageName} installation via apt-get`)
    .action(async () => {
      reportExit(await runExclusive(ctx, () => ctx.engine.runUpdate()));
    });
}
