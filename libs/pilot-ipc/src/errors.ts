/**
 * Typed error classes for debpilot
 *
 * Every failure of a run maps to one of these. All of them end the process
 * with exit code 1.
 */

import type { RunStepId } from './types/run.types.js';

export class PilotError extends Error {
  public readonly code: string;
  public readonly exitCode: number = 1;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PilotError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class BadArgumentsError extends PilotError {
  constructor(message = 'Parameter(s) is/are wrong', code = 'BAD_ARGUMENTS') {
    super(message, code);
    this.name = 'BadArgumentsError';
  }
}

export class InvalidVersionError extends BadArgumentsError {
  public readonly version: string;

  constructor(version: string, reason: string) {
    super(`Invalid version "${version}": ${reason}`, 'INVALID_VERSION');
    this.name = 'InvalidVersionError';
    this.version = version;
  }
}

export class ConfigError extends PilotError {
  public readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super(source ? `${message} (${source})` : message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
    this.source = source;
  }
}

export class LoggerMisuseError extends PilotError {
  constructor(severity: string) {
    super(`Unknown log severity: ${severity}`, 'LOGGER_MISUSE');
    this.name = 'LoggerMisuseError';
  }
}

export class LockHeldError extends PilotError {
  public readonly lockPath: string;
  public readonly pid?: number;

  constructor(lockPath: string, pid?: number) {
    super(
      pid !== undefined
        ? `Another run (PID ${pid}) holds the lock ${lockPath}`
        : `Another run holds the lock ${lockPath}`,
      'LOCK_HELD',
    );
    this.name = 'LockHeldError';
    this.lockPath = lockPath;
    this.pid = pid;
  }
}

/**
 * A failure inside a run step
 */
export class StepError extends PilotError {
  public readonly stepId: RunStepId;

  constructor(stepId: RunStepId, message: string, code: string, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'StepError';
    this.stepId = stepId;
  }
}

export class BackupError extends StepError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('backup', message, 'BACKUP_FAILED', options);
    this.name = 'BackupError';
  }
}

export class RefreshError extends StepError {
  constructor(message: string) {
    super('refresh-index', message, 'REFRESH_FAILED');
    this.name = 'RefreshError';
  }
}

export class UpgradeError extends StepError {
  constructor(message: string) {
    super('upgrade', message, 'UPGRADE_FAILED');
    this.name = 'UpgradeError';
  }
}

export class ServiceControlError extends PilotError {
  public readonly serviceName: string;
  public readonly action: string;

  constructor(serviceName: string, action: string, message: string) {
    super(message, 'SERVICE_CONTROL_FAILED');
    this.name = 'ServiceControlError';
    this.serviceName = serviceName;
    this.action = action;
  }
}

export class FetchError extends StepError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(url: string, message: string, opts?: { statusCode?: number; cause?: unknown }) {
    super('fetch-package', message, 'FETCH_FAILED', { cause: opts?.cause });
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = opts?.statusCode;
  }
}

export class InstallError extends StepError {
  constructor(message: string) {
    super('install-package', message, 'INSTALL_FAILED');
    this.name = 'InstallError';
  }
}

export class VersionMismatchError extends StepError {
  public readonly expected: string;
  public readonly actual: string | null;

  constructor(expected: string, actual: string | null) {
    super(
      'verify-version',
      `Installed version is ${actual ?? 'unknown'}, expected ${expected}`,
      'VERSION_MISMATCH',
    );
    this.name = 'VersionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ServiceNotRunningError extends StepError {
  public readonly serviceName: string;

  constructor(serviceName: string, state: string) {
    super('verify-running', `Service ${serviceName} is not running (state: ${state})`, 'SERVICE_NOT_RUNNING');
    this.name = 'ServiceNotRunningError';
    this.serviceName = serviceName;
  }
}
