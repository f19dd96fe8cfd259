/**
 * debpilot CLI Library
 *
 * The run engine, host adapters and command creators behind the
 * `debpilot` binary.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

export * from './engine/index.js';
export * from './utils/index.js';
export * from './commands/index.js';
export { createProgram, createCliContext, formatUsage, runCli } from './program.js';
