/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createUpdateCommand } from './update.js';
export { createRollbackCommand } from './rollback.js';
export { runExclusive, type CliContext, type ExitReporter } from './run.js';
