/**
 * Run lock
 *
 * A PID file keeps two runs from working on the same host at once. The file
 * is staged with its PID and hard-linked into place, so it never appears
 * without one. A lock whose PID is gone is taken over; takeovers are
 * serialised through a second `<lock>.reclaim` file so two runs cannot both
 * reclaim the same stale lock.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { LockHeldError } from '@debpilot/ipc';
import { hasErrorCode, processExists } from './process.js';

/** Age after which a lock or reclaim file without a live owner is abandoned */
export const DEFAULT_STALE_AFTER_MS = 10_000;

export interface RunLockOptions {
  isProcessAlive?: (pid: number) => boolean;
  pid?: number;
  /** A lock without a readable PID counts as held until it is this old */
  staleAfterMs?: number;
}

export class RunLock {
  private held = false;
  private readonly isProcessAlive: (pid: number) => boolean;
  private readonly pid: number;
  private readonly staleAfterMs: number;

  constructor(
    readonly lockPath: string,
    options: RunLockOptions = {},
  ) {
    this.isProcessAlive = options.isProcessAlive ?? processExists;
    this.pid = options.pid ?? process.pid;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
  }

  get isHeld(): boolean {
    return this.held;
  }

  private get reclaimPath(): string {
    return `${this.lockPath}.reclaim`;
  }

  /**
   * Take the lock or throw LockHeldError
   */
  acquire(): void {
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });
    if (this.tryCreate()) return;

    this.assertStale();
    this.reclaim();
  }

  /**
   * Remove the lock file, unless another run has since taken it over
   */
  release(): void {
    if (!this.held) return;
    this.held = false;
    if (this.readHolder() === this.pid) {
      fs.rmSync(this.lockPath, { force: true });
    }
  }

  /** PID recorded in the lock file, or null when missing or unreadable */
  readHolder(): number | null {
    try {
      const pid = Number.parseInt(fs.readFileSync(this.lockPath, 'utf-8').trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch {
      return null;
    }
  }

  /**
   * Throw LockHeldError unless the current lock file is abandoned
   */
  private assertStale(): void {
    const holder = this.readHolder();
    if (holder !== null) {
      if (this.isProcessAlive(holder)) {
        throw new LockHeldError(this.lockPath, holder);
      }
      return;
    }
    if (!this.isOlderThan(this.lockPath, this.staleAfterMs)) {
      throw new LockHeldError(this.lockPath);
    }
  }

  private reclaim(): void {
    if (!this.createExclusive(this.reclaimPath)) {
      // Left behind by a run that died mid-takeover; the next attempt may proceed
      if (this.isOlderThan(this.reclaimPath, this.staleAfterMs)) {
        fs.rmSync(this.reclaimPath, { force: true });
      }
      throw new LockHeldError(this.lockPath);
    }

    try {
      // Another run may have reclaimed the lock since the first look
      if (fs.existsSync(this.lockPath)) {
        this.assertStale();
        fs.rmSync(this.lockPath, { force: true });
      }
      if (!this.tryCreate()) {
        throw new LockHeldError(this.lockPath);
      }
    } finally {
      fs.rmSync(this.reclaimPath, { force: true });
    }
  }

  private tryCreate(): boolean {
    if (!this.createExclusive(this.lockPath)) return false;
    this.held = true;
    return true;
  }

  /**
   * Create `target` holding this run's PID. False when it already exists.
   */
  private createExclusive(target: string): boolean {
    const staging = `${target}.${this.pid}.tmp`;
    fs.writeFileSync(staging, `${this.pid}\n`, 'utf-8');
    try {
      fs.linkSync(staging, target);
      return true;
    } catch (err) {
      if (hasErrorCode(err, 'EEXIST')) return false;
      throw err;
    } finally {
      fs.rmSync(staging, { force: true });
    }
  }

  private isOlderThan(file: string, ageMs: number): boolean {
    const stat = fs.statSync(file, { throwIfNoEntry: false });
    if (!stat) return true;
    return Date.now() - stat.mtimeMs > ageMs;
  }
}

/**
 * Run `fn` while holding the lock
 */
export async function withRunLock<T>(lock: RunLock, fn: () => Promise<T>): Promise<T> {
  lock.acquire();
  try {
    return await fn();
  } finally {
    lock.release();
  }
}
