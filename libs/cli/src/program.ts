/**
 * Program wiring
 *
 * Builds the commander program and the CLI context, and maps every way a
 * run can end onto an exit code.
 */

import { Command, CommanderError } from 'commander';
import {
  BadArgumentsError,
  PROGRAM_NAME,
  PilotError,
  RUN_SEPARATOR,
  type PilotConfig,
} from '@debpilot/ipc';
import { createRollbackCommand, createUpdateCommand, type CliContext, type ExitReporter } from './commands/index.js';
import { createRunEngine } from './engine/index.js';
import { AptPackageManager } from './utils/apt.js';
import { ArchiveBackupService } from './utils/backup.js';
import { lockFilePath, logFilePath } from './utils/config.js';
import { ArchiveDownloader } from './utils/download.js';
import { createCommandRunner } from './utils/exec.js';
import { RunLock } from './utils/lock.js';
import { RunLogger } from './utils/logger.js';
import { SystemdServiceController } from './utils/service.js';

/**
 * Usage text printed for any malformed invocation
 */
export function formatUsage(packageName: string): string {
  return [
    `Usage: ${PROGRAM_NAME} {update|rollback} [version]`,
    'The program accepts one or two parameters only; these are',
    `  update   - update the local ${packageName} installation via apt-get`,
    `  rollback - roll the ${packageName} package back to the version`,
    '             given as the second argument',
    '  version  - only required for rollback; a version string',
    '             apt understands',
    '',
    'Examples:',
    `   ${PROGRAM_NAME} update`,
    `   ${PROGRAM_NAME} rollback 2.440.1`,
    '',
  ].join('\n');
}

/**
 * Create and configure the commander program. Built-in help is switched
 * off: anything but the two documented forms is a usage error.
 */
export function createProgram(ctx: CliContext, reportExit: ExitReporter): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description(`Update or roll back the ${ctx.config.packageName} package and check its service`)
    .helpOption(false)
    .helpCommand(false)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => ctx.stdout.write(str),
      writeErr: (str) => ctx.stderr.write(str),
    });

  program.addCommand(createUpdateCommand(ctx, reportExit).copyInheritedSettings(program));
  program.addCommand(createRollbackCommand(ctx, reportExit).copyInheritedSettings(program));

  return program;
}

/**
 * Wire the real host adapters
 */
export function createCliContext(config: PilotConfig): CliContext {
  const logger = new RunLogger({ logFile: logFilePath(config), echoToScreen: config.echoToScreen });
  const runner = createCommandRunner();

  const engine = createRunEngine({
    config,
    logger,
    packages: new AptPackageManager(config.packageName, runner),
    service: new SystemdServiceController(config.serviceName, runner, { settleDelayMs: config.settleDelayMs }),
    backups: new ArchiveBackupService(config.packageName, config.archiveDir, config.backupDir),
    downloader: new ArchiveDownloader({ mirrorUrl: config.mirrorUrl, downloadDir: config.downloadDir }),
  });

  return {
    config,
    logger,
    engine,
    lock: new RunLock(lockFilePath(config)),
    stdout: process.stdout,
    stderr: process.stderr,
  };
}

function reportBadArguments(ctx: CliContext, err: BadArgumentsError): number {
  ctx.logger.error(`${err.message}. Exiting...`);
  ctx.stdout.write(formatUsage(ctx.config.packageName));
  return err.exitCode;
}

/**
 * Parse the user arguments (without node and script path), run the
 * selected workflow and return the process exit code
 */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  ctx.logger.info(RUN_SEPARATOR);
  ctx.logger.info('New run:');

  if (argv.length === 0) {
    return reportBadArguments(ctx, new BadArgumentsError());
  }

  let exitCode = 0;
  const program = createProgram(ctx, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return reportBadArguments(ctx, new BadArgumentsError());
    }
    if (err instanceof BadArgumentsError) {
      return reportBadArguments(ctx, err);
    }
    if (err instanceof PilotError) {
      ctx.logger.error(`${err.message}. Exiting...`);
      return err.exitCode;
    }
    throw err;
  }

  return exitCode;
}
