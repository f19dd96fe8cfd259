/**
 * debpilot IPC Library
 *
 * Shared types, schemas, constants and errors used by the CLI and the
 * run engine.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Schemas
export {
  PilotConfigSchema,
  PilotConfigFileSchema,
  type PilotConfig,
  type PilotConfigInput,
  type PilotConfigFile,
} from './schemas/config.schema.js';

export {
  PACKAGE_VERSION_PATTERN,
  PackageVersionSchema,
  stripEpoch,
  archiveFileName,
  parsePackageVersion,
} from './schemas/version.schema.js';

// Constants
export * from './constants.js';

// Errors
export * from './errors.js';
