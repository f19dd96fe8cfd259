/**
 * Zod schemas for debpilot configuration validation
 */

import { z } from 'zod';
import { DEFAULT_SETTLE_DELAY_MS } from '../constants.js';

/**
 * Fully resolved configuration, as consumed by the CLI and the run engine
 */
export const PilotConfigSchema = z.object({
  /** Debian package to manage */
  packageName: z.string().min(1).max(64).regex(/^[a-z0-9][a-z0-9+.-]+$/),
  /** systemd unit that runs the package */
  serviceName: z.string().min(1).max(128).regex(/^[A-Za-z0-9@._-]+$/),
  /** Directory URL holding the upstream archives */
  mirrorUrl: z.string().url().regex(/^https?:\/\//, 'Mirror URL must use http or https'),
  /** apt archive cache */
  archiveDir: z.string().min(1),
  /** Directory of the log and lock files */
  logDir: z.string().min(1),
  backupDir: z.string().min(1),
  downloadDir: z.string().min(1),
  echoToScreen: z.boolean().default(true),
  settleDelayMs: z.number().int().min(0).max(600_000).default(DEFAULT_SETTLE_DELAY_MS),
});

/**
 * Shape of the optional JSON config file; every key is optional and
 * unknown keys are rejected.
 */
export const PilotConfigFileSchema = PilotConfigSchema.partial().strict();

export type PilotConfig = z.infer<typeof PilotConfigSchema>;
export type PilotConfigInput = z.input<typeof PilotConfigSchema>;
export type PilotConfigFile = z.infer<typeof PilotConfigFileSchema>;
