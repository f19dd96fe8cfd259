/**
 * Archive backup service
 *
 * Copies the package's archives out of the apt cache into the backups
 * directory before an upgrade, with `cp -u --preserve` semantics: mode,
 * timestamps (and ownership when running as root) are kept, and a backup
 * copy at least as new as the cached archive is left alone.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { BackupError } from '@debpilot/ipc';
import { errorMessage } from './process.js';

export interface BackupResult {
  /** Archive file names copied on this run */
  copied: string[];
  /** Archive file names whose backup was already up to date */
  upToDate: string[];
}

export class ArchiveBackupService {
  constructor(
    private readonly packageName: string,
    private readonly archiveDir: string,
    readonly backupDir: string,
  ) {}

  /** Whether a file name is one of this package's archives */
  isPackageArchive(fileName: string): boolean {
    return fileName.startsWith(`${this.packageName}_`) && fileName.endsWith('.deb');
  }

  /**
   * Copy every cached archive of the package into the backups directory
   */
  backupCachedArchives(): BackupResult {
    let names: string[];
    try {
      names = fs
        .readdirSync(this.archiveDir, { withFileTypes: true })
        .filter((entry) => entry.isFile() && this.isPackageArchive(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      throw new BackupError(`Unable to read the package cache ${this.archiveDir}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const result: BackupResult = { copied: [], upToDate: [] };
    if (names.length === 0) return result;

    try {
      fs.mkdirSync(this.backupDir, { recursive: true });
    } catch (err) {
      throw new BackupError(`Unable to create ${this.backupDir}: ${errorMessage(err)}`, { cause: err });
    }

    for (const name of names) {
      const source = path.join(this.archiveDir, name);
      const dest = path.join(this.backupDir, name);
      try {
        if (this.copyIfNewer(source, dest)) {
          result.copied.push(name);
        } else {
          result.upToDate.push(name);
        }
      } catch (err) {
        throw new BackupError(`Unable to copy ${name} to ${this.backupDir}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }

    return result;
  }

  /** Path of a backed-up archive, or null when there is none */
  findArchive(fileName: string): string | null {
    const candidate = path.join(this.backupDir, fileName);
    try {
      return fs.statSync(candidate).isFile() ? candidate : null;
    } catch {
      return null;
    }
  }

  private copyIfNewer(source: string, dest: string): boolean {
    const src = fs.statSync(source);
    const existing = fs.statSync(dest, { throwIfNoEntry: false });
    if (existing && Math.trunc(existing.mtimeMs) >= Math.trunc(src.mtimeMs)) {
      return false;
    }

    fs.copyFileSync(source, dest);
    fs.chmodSync(dest, src.mode & 0o7777);
    if (process.getuid?.() === 0) {
      fs.chownSync(dest, src.uid, src.gid);
    }
    fs.utimesSync(dest, src.atime, src.mtime);
    return true;
  }
}
