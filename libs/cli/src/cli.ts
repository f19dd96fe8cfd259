#!/usr/bin/env node
/**
 * debpilot CLI
 *
 * Updates or rolls back a Debian package through apt/dpkg and checks that
 * its service is running afterwards. Every run is appended to
 * `debpilot.log` beside the program.
 *
 * @example
 * ```bash
 * # Upgrade to the candidate version apt offers
 * sudo debpilot update
 *
 * # Go back to an earlier release
 * sudo debpilot rollback 2.440.1
 * ```
 */

import { ConfigError, type PilotConfig } from '@debpilot/ipc';
import { loadConfig } from './utils/config.js';
import { createCliContext, runCli } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  let config: PilotConfig;
  try {
    config = loadConfig({ programPath: process.argv[1] });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error('Error:', err.message);
      process.exit(1);
    }
    throw err;
  }

  process.exitCode = await runCli(process.argv.slice(2), createCliContext(config));
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
