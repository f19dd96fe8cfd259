/**
 * Host adapters
 */

export { RunLogger, formatLogLine, type RunLoggerOptions, type LogSink } from './logger.js';
export { createCommandRunner, describeFailure, type CommandRunner } from './exec.js';
export { AptPackageManager, parseCandidateVersion, parseInstalledVersion, type PackageManager } from './apt.js';
export {
  SystemdServiceController,
  parseShowOutput,
  toServiceState,
  type ServiceController,
  type SystemdServiceOptions,
} from './service.js';
export { ArchiveBackupService, type BackupResult } from './backup.js';
export { ArchiveDownloader, type ArchiveDownloaderOptions } from './download.js';
export { DEFAULT_STALE_AFTER_MS, RunLock, withRunLock, type RunLockOptions } from './lock.js';
export { loadConfig, logFilePath, lockFilePath, type LoadConfigOptions } from './config.js';
export { processExists } from './process.js';
