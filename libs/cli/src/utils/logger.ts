/**
 * Run Logger
 *
 * Appends one `YYYYMMDD HHMMSS SEVERITY message` line per call to the run
 * log, creating the file with a header line first. Lines are written with a
 * single O_APPEND write so concurrent runs cannot split a line.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { format } from 'date-fns';
import {
  LOG_HEADER_MESSAGE,
  LoggerMisuseError,
  isSeverity,
  type LogEntry,
} from '@debpilot/ipc';
import { hasErrorCode } from './process.js';

export interface LogSink {
  write(chunk: string): unknown;
}

export interface RunLoggerOptions {
  logFile: string;
  /** Also write every line to the screen */
  echoToScreen: boolean;
  /** Clock, for tests */
  now?: () => Date;
  /** Screen sink; defaults to process.stdout */
  stdout?: LogSink;
}

export function formatLogLine(entry: LogEntry): string {
  return `${entry.date} ${entry.time} ${entry.severity} ${entry.message}`;
}

export class RunLogger {
  readonly logFile: string;
  private readonly echoToScreen: boolean;
  private readonly now: () => Date;
  private readonly stdout: LogSink;

  constructor(options: RunLoggerOptions) {
    this.logFile = options.logFile;
    this.echoToScreen = options.echoToScreen;
    this.now = options.now ?? (() => new Date());
    this.stdout = options.stdout ?? process.stdout;
  }

  /**
   * Append one line. Throws LoggerMisuseError for an unknown severity.
   */
  log(severity: string, message: string): LogEntry {
    if (!isSeverity(severity)) {
      throw new LoggerMisuseError(severity);
    }

    const timestamp = this.now();
    const entry: LogEntry = {
      date: format(timestamp, 'yyyyMMdd'),
      time: format(timestamp, 'HHmmss'),
      severity,
      message,
    };

    this.ensureFile(entry);

    const line = `${formatLogLine(entry)}\n`;
    fs.appendFileSync(this.logFile, line, 'utf-8');
    if (this.echoToScreen) {
      this.stdout.write(line);
    }
    return entry;
  }

  info(message: string): LogEntry {
    return this.log('INFO', message);
  }

  action(message: string): LogEntry {
    return this.log('ACTION', message);
  }

  success(message: string): LogEntry {
    return this.log('SUCCESS', message);
  }

  error(message: string): LogEntry {
    return this.log('ERROR', message);
  }

  private ensureFile(entry: LogEntry): void {
    if (fs.existsSync(this.logFile)) return;

    fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    const header = formatLogLine({ ...entry, severity: 'INFO', message: LOG_HEADER_MESSAGE });
    try {
      fs.writeFileSync(this.logFile, `${header}\n`, { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      // Another run created it first
      if (!hasErrorCode(err, 'EEXIST')) throw err;
    }
  }
}
