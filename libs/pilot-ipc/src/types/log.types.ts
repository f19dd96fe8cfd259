/**
 * Run record types
 */

/** Severities accepted by the run log, in the order they are documented */
export const SEVERITIES = ['INFO', 'ACTION', 'SUCCESS', 'ERROR'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * One line of the run record
 */
export interface LogEntry {
  /** Local date, YYYYMMDD */
  date: string;
  /** Local time, HHMMSS */
  time: string;
  severity: Severity;
  message: string;
}

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}
