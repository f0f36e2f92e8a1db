/**
 * Trellis - Main Entry Point
 *
 * Exports all public APIs for programmatic use.
 */

// Types
export type {
  JsonValue,
  JsonObject,
  Manifest,
  ManifestDataset,
  Experiment,
  StepDefinition,
  Lineage,
  Method,
  MethodChoice,
  Layer,
  PrimitiveSpec,
  SemanticType,
  ExecutionPlan,
  HashProfile,
  HashMethod,
  HashInfo,
  InputRecord,
  ProvenanceEntry,
  WarningLevel,
  EnvelopeWarning,
  EnvelopeData,
  LineageRecord,
  EnvelopeMetadata,
  Envelope,
  PrimitiveInvocation,
  PrimitiveWarningReport,
  PrimitiveOutcome,
  PrimitiveExecutionPort,
  StepError,
  StepResult,
  OrchestrationResult,
  CommandContext,
  CommandResult,
} from './types.js';
export { LAYERS, isLayer, isJsonObject, ownEntry } from './types.js';

// Errors & configuration
export * from './errors.js';
export * from './config.js';

// Engine
export * from './modules/index.js';

// Commands
export * from './commands/index.js';
