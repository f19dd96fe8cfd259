/**
 * Process probing helpers
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Whether a process with the given PID exists. A process owned by another
 * user (EPERM) still counts as alive.
 */
export function processExists(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return hasErrorCode(err, 'EPERM');
  }
}

/**
 * Whether `err` carries a Node error code. Checked structurally: errors
 * raised by Node's own modules may come from another realm's Error.
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

export function sleep(ms: number): Promise<void> {
  return ms > 0 ? delay(ms) : Promise.resolve();
}
