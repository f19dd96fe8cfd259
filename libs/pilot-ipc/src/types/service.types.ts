/**
 * Service health types
 */

/**
 * Typed service state, mapped from the supervisor's own state machine
 */
export type ServiceState = 'running' | 'starting' | 'stopping' | 'stopped' | 'failed' | 'unknown';

export interface ServiceStatus {
  state: ServiceState;
  /** Main process ID, when the supervisor reports one */
  pid?: number;
  /** Short human-readable summary, written to the run log */
  detail: string;
}
