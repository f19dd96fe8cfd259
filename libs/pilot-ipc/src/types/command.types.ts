/**
 * Result of an external command
 */
export interface CommandResult {
  /** Process exit code; -1 when the command could not be spawned */
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Extra environment merged over process.env */
  env?: Record<string, string>;
}
