/**
 * apt/dpkg adapter
 *
 * Version queries and package operations for a single package.
 */

import { InstallError, RefreshError, UpgradeError } from '@debpilot/ipc';
import type { CommandRunner } from './exec.js';
import { describeFailure } from './exec.js';

export interface PackageManager {
  /** Installed version, or null when it cannot be determined */
  getInstalledVersion(): Promise<string | null>;
  /** Version apt would install now, or null when there is none */
  getCandidateVersion(): Promise<string | null>;
  refreshIndex(): Promise<void>;
  /** Upgrade the package only if it is already installed */
  upgradeInstalled(): Promise<void>;
  /** Install a local archive, downgrades included */
  installArchive(archivePath: string): Promise<void>;
}

const NONINTERACTIVE_ENV = { DEBIAN_FRONTEND: 'noninteractive' };

/**
 * Parse `dpkg-query --showformat='${Status}\t${Version}'` output.
 * Only a fully installed package yields a version.
 */
export function parseInstalledVersion(output: string): string | null {
  const [status, version] = output.trim().split('\t');
  if (!status.endsWith(' installed') || !version) return null;
  return version.trim() || null;
}

/**
 * Extract the `Candidate:` field from `apt-cache policy` output
 */
export function parseCandidateVersion(output: string): string | null {
  const match = /^\s*Candidate:\s*(\S+)\s*$/m.exec(output);
  if (!match || match[1] === '(none)') return null;
  return match[1];
}

export class AptPackageManager implements PackageManager {
  constructor(
    private readonly packageName: string,
    private readonly runner: CommandRunner,
  ) {}

  async getInstalledVersion(): Promise<string | null> {
    const result = await this.runner.run('dpkg-query', [
      '--show',
      '--showformat=${Status}\t${Version}',
      this.packageName,
    ]);
    if (result.exitCode !== 0) return null;
    return parseInstalledVersion(result.stdout);
  }

  async getCandidateVersion(): Promise<string | null> {
    const result = await this.runner.run('apt-cache', ['policy', this.packageName]);
    if (result.exitCode !== 0) return null;
    return parseCandidateVersion(result.stdout);
  }

  async refreshIndex(): Promise<void> {
    const result = await this.runner.run('apt-get', ['-q', 'update'], { env: NONINTERACTIVE_ENV });
    if (result.exitCode !== 0) {
      throw new RefreshError(`Unable to refresh the package index: ${describeFailure('apt-get update', result)}`);
    }
  }

  async upgradeInstalled(): Promise<void> {
    const result = await this.runner.run(
      'apt-get',
      ['install', '-y', '-q', '--only-upgrade', this.packageName],
      { env: NONINTERACTIVE_ENV },
    );
    if (result.exitCode !== 0) {
      throw new UpgradeError(`Unable to upgrade ${this.packageName}: ${describeFailure('apt-get install', result)}`);
    }
  }

  async installArchive(archivePath: string): Promise<void> {
    const result = await this.runner.run('dpkg', ['-i', '--force-downgrade', archivePath], {
      env: NONINTERACTIVE_ENV,
    });
    if (result.exitCode !== 0) {
      throw new InstallError(`Unable to install ${archivePath}: ${describeFailure('dpkg -i', result)}`);
    }
  }
}
