/**
 * Service controller
 *
 * Start/stop/status for the systemd unit running the managed package.
 * Status comes from `systemctl show` properties rather than free-form
 * status text, and a reported main PID must belong to a live process.
 */

import { ServiceControlError, type ServiceState, type ServiceStatus } from '@debpilot/ipc';
import type { CommandRunner } from './exec.js';
import { describeFailure } from './exec.js';
import { processExists, sleep } from './process.js';

export interface ServiceController {
  readonly name: string;
  /** Start and wait for the settle delay */
  start(): Promise<void>;
  /** Stop and wait for the settle delay */
  stop(): Promise<void>;
  status(): Promise<ServiceStatus>;
}

export interface SystemdServiceOptions {
  /** Wait after start/stop before anything checks the service */
  settleDelayMs: number;
  isProcessAlive?: (pid: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

const SHOW_PROPERTIES = ['LoadState', 'ActiveState', 'SubState', 'MainPID'];

/**
 * Parse `systemctl show` key=value output
 */
export function parseShowOutput(output: string): Record<string, string> {
  const properties: Record<string, string> = {};
  for (const line of output.split('\n')) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    properties[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return properties;
}

/**
 * Map systemd ActiveState/SubState onto a ServiceState
 */
export function toServiceState(activeState: string | undefined, subState: string | undefined): ServiceState {
  switch (activeState) {
    case 'active':
      return subState === 'running' ? 'running' : 'unknown';
    case 'activating':
    case 'reloading':
      return 'starting';
    case 'deactivating':
      return 'stopping';
    case 'inactive':
      return 'stopped';
    case 'failed':
      return 'failed';
    default:
      return 'unknown';
  }
}

export class SystemdServiceController implements ServiceController {
  private readonly settleDelayMs: number;
  private readonly isProcessAlive: (pid: number) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    readonly name: string,
    private readonly runner: CommandRunner,
    options: SystemdServiceOptions,
  ) {
    this.settleDelayMs = options.settleDelayMs;
    this.isProcessAlive = options.isProcessAlive ?? processExists;
    this.sleep = options.sleep ?? sleep;
  }

  async start(): Promise<void> {
    await this.control('start');
  }

  async stop(): Promise<void> {
    await this.control('stop');
  }

  async status(): Promise<ServiceStatus> {
    const result = await this.runner.run('systemctl', [
      'show',
      this.name,
      `--property=${SHOW_PROPERTIES.join(',')}`,
    ]);
    if (result.exitCode !== 0) {
      return { state: 'unknown', detail: describeFailure('systemctl show', result) };
    }

    const props = parseShowOutput(result.stdout);
    if (props['LoadState'] === 'not-found') {
      return { state: 'unknown', detail: `Unit ${this.name} not found` };
    }

    const pid = Number.parseInt(props['MainPID'] ?? '', 10);
    const mainPid = Number.isInteger(pid) && pid > 0 ? pid : undefined;
    const detail = `ActiveState=${props['ActiveState'] ?? '?'} SubState=${props['SubState'] ?? '?'} MainPID=${mainPid ?? 0}`;
    const state = toServiceState(props['ActiveState'], props['SubState']);

    if (state === 'running' && mainPid !== undefined && !this.isProcessAlive(mainPid)) {
      return { state: 'unknown', pid: mainPid, detail: `${detail} (process ${mainPid} not found)` };
    }

    return { state, pid: mainPid, detail };
  }

  private async control(action: 'start' | 'stop'): Promise<void> {
    const result = await this.runner.run('systemctl', [action, this.name]);
    if (result.exitCode !== 0) {
      throw new ServiceControlError(
        this.name,
        action,
        `Unable to ${action} ${this.name}: ${describeFailure(`systemctl ${action}`, result)}`,
      );
    }
    await this.sleep(this.settleDelayMs);
  }
}
