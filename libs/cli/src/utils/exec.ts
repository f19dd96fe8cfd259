/**
 * External command runner
 *
 * Every host tool (apt-get, dpkg, systemctl) goes through a CommandRunner so
 * the exit code is always captured and the adapters can be tested without a
 * Debian host.
 */

import { execFile } from 'node:child_process';
import type { CommandOptions, CommandResult } from '@debpilot/ipc';

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Create a runner backed by child_process.execFile (no shell).
 * Non-zero exits resolve with their exit code; they never reject.
 */
export function createCommandRunner(): CommandRunner {
  return {
    run(command, args, options = {}) {
      return new Promise<CommandResult>((resolve) => {
        execFile(
          command,
          [...args],
          {
            encoding: 'utf-8',
            env: { ...process.env, ...options.env },
            maxBuffer: MAX_BUFFER,
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ exitCode: 0, stdout, stderr });
              return;
            }
            // Spawn failures (ENOENT, EACCES) carry a string code
            const exitCode = typeof error.code === 'number' ? error.code : -1;
            resolve({ exitCode, stdout, stderr: stderr || error.message });
          },
        );
      });
    },
  };
}

/**
 * One-line reason for a failed command: the last stderr line, or the exit code
 */
export function describeFailure(command: string, result: CommandResult): string {
  const lastLine = result.stderr
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .pop();
  return lastLine
    ? `${command} exited with code ${result.exitCode}: ${lastLine}`
    : `${command} exited with code ${result.exitCode}`;
}
