/**
 * Engine module — barrel exports
 */

export { createRunEngine, type RunEngine } from './engine.js';
export type { RunEngineDeps, RunOutcome, StepResult } from './types.js';
