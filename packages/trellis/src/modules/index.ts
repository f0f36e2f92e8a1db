/**
 * Modules - Re-export all engine functionality
 */

export * from './loader.js';
export * from './suggest.js';
export * from './semantic-types.js';
export * from './registry.js';
export * from './references.js';
export * from './dependencies.js';
export * from './hasher.js';
export * from './envelope.js';
export * from './builder.js';
export * from './runner.js';
export * from './validator.js';
export * from './run-log.js';
export * from './orchestrator.js';
