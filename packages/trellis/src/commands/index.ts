/**
 * Commands - Re-export all commands
 */

export * from './run.js';
export * from './plan.js';
export * from './validate.js';
export * from './inspect.js';
