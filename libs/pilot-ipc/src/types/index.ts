export * from './log.types.js';
export * from './service.types.js';
export * from './command.types.js';
export * from './run.types.js';
