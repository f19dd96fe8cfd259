/**
 * Configuration loader
 *
 * Layers, later wins: built-in defaults, the JSON config file, then
 * DEBPILOT_* environment variables. The result is validated with
 * PilotConfigSchema.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  APT_ARCHIVES_DIR,
  BACKUPS_DIR,
  CONFIG_FILE,
  ConfigError,
  DEFAULT_MIRROR_URL,
  DEFAULT_PACKAGE,
  DEFAULT_SERVICE,
  LOCK_SUFFIX,
  LOG_SUFFIX,
  PROGRAM_NAME,
  PilotConfigFileSchema,
  PilotConfigSchema,
  type PilotConfig,
  type PilotConfigFile,
} from '@debpilot/ipc';
import { errorMessage } from './process.js';

export interface LoadConfigOptions {
  /** Path of the invoked program; its directory is the default log directory */
  programPath: string;
  env?: NodeJS.ProcessEnv;
}

const booleanFlag = z
  .enum(['true', 'false', 'yes', 'no', '1', '0'])
  .transform((value) => value === 'true' || value === 'yes' || value === '1');

const EnvOverridesSchema = z.object({
  DEBPILOT_PACKAGE: z.string().optional(),
  DEBPILOT_SERVICE: z.string().optional(),
  DEBPILOT_MIRROR_URL: z.string().optional(),
  DEBPILOT_ARCHIVE_DIR: z.string().optional(),
  DEBPILOT_LOG_DIR: z.string().optional(),
  DEBPILOT_BACKUP_DIR: z.string().optional(),
  DEBPILOT_DOWNLOAD_DIR: z.string().optional(),
  DEBPILOT_ECHO: booleanFlag.optional(),
  DEBPILOT_SETTLE_DELAY_MS: z.coerce.number().optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Read the JSON config file. DEBPILOT_CONFIG must point at an existing
 * file; the file beside the program is optional.
 */
function readConfigFile(env: NodeJS.ProcessEnv, programDir: string): PilotConfigFile {
  const explicit = env['DEBPILOT_CONFIG'];
  const filePath = explicit ? path.resolve(explicit) : path.join(programDir, CONFIG_FILE);

  if (!fs.existsSync(filePath)) {
    if (explicit) throw new ConfigError('Config file not found', filePath);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Unable to read config: ${errorMessage(err)}`, filePath, { cause: err });
  }

  const parsed = PilotConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config: ${formatIssues(parsed.error)}`, filePath);
  }

  // Relative paths in the file are relative to the file
  const baseDir = path.dirname(filePath);
  const config: PilotConfigFile = { ...parsed.data };
  for (const key of ['archiveDir', 'logDir', 'backupDir', 'downloadDir'] as const) {
    const value = config[key];
    if (value !== undefined) config[key] = path.resolve(baseDir, value);
  }
  return config;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): PilotConfigFile {
  const parsed = EnvOverridesSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  // Unset variables must not shadow the file layer
  return {
    ...(vars.DEBPILOT_PACKAGE !== undefined && { packageName: vars.DEBPILOT_PACKAGE }),
    ...(vars.DEBPILOT_SERVICE !== undefined && { serviceName: vars.DEBPILOT_SERVICE }),
    ...(vars.DEBPILOT_MIRROR_URL !== undefined && { mirrorUrl: vars.DEBPILOT_MIRROR_URL }),
    ...(vars.DEBPILOT_ARCHIVE_DIR !== undefined && { archiveDir: path.resolve(vars.DEBPILOT_ARCHIVE_DIR) }),
    ...(vars.DEBPILOT_LOG_DIR !== undefined && { logDir: path.resolve(vars.DEBPILOT_LOG_DIR) }),
    ...(vars.DEBPILOT_BACKUP_DIR !== undefined && { backupDir: path.resolve(vars.DEBPILOT_BACKUP_DIR) }),
    ...(vars.DEBPILOT_DOWNLOAD_DIR !== undefined && { downloadDir: path.resolve(vars.DEBPILOT_DOWNLOAD_DIR) }),
    ...(vars.DEBPILOT_ECHO !== undefined && { echoToScreen: vars.DEBPILOT_ECHO }),
    ...(vars.DEBPILOT_SETTLE_DELAY_MS !== undefined && { settleDelayMs: vars.DEBPILOT_SETTLE_DELAY_MS }),
  };
}

/**
 * Resolve the full configuration
 */
export function loadConfig(options: LoadConfigOptions): PilotConfig {
  const env = options.env ?? process.env;
  const programDir = path.dirname(path.resolve(options.programPath));

  const merged: PilotConfigFile = { ...readConfigFile(env, programDir), ...readEnvOverrides(env) };
  const logDir = merged.logDir ?? programDir;
  const backupDir = merged.backupDir ?? path.join(logDir, BACKUPS_DIR);

  const parsed = PilotConfigSchema.safeParse({
    packageName: DEFAULT_PACKAGE,
    serviceName: DEFAULT_SERVICE,
    mirrorUrl: DEFAULT_MIRROR_URL,
    archiveDir: APT_ARCHIVES_DIR,
    ...merged,
    logDir,
    backupDir,
    downloadDir: merged.downloadDir ?? backupDir,
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  return { ...parsed.data, mirrorUrl: withTrailingSlash(parsed.data.mirrorUrl) };
}

export function logFilePath(config: PilotConfig): string {
  return path.join(config.logDir, `${PROGRAM_NAME}${LOG_SUFFIX}`);
}

export function lockFilePath(config: PilotConfig): string {
  return path.join(config.logDir, `${PROGRAM_NAME}${LOCK_SUFFIX}`);
}
