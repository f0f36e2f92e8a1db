/**
 * Structured errors for parsing, planning, resolution and execution.
 */

import type { JsonObject, StepError } from './types.js';

// =============================================================================
// Error Kinds & Codes
// =============================================================================

export type ErrorKind =
  | 'StructuralParseError'
  | 'GraphError'
  | 'ReferenceError'
  | 'ResolutionError'
  | 'PrimitiveExecutionError'
  | 'EnvelopeValidationError';

export const ERROR_CODES = {
  // Documents & configuration
  E1001: 'MALFORMED_DOCUMENT',
  E1002: 'MISSING_FIELD',
  E1003: 'DUPLICATE_STEP_ID',
  E1004: 'INVALID_STEP_DEFINITION',
  E1005: 'INVALID_CONFIG',
  // Dependency graph
  E2001: 'UNKNOWN_STEP_REFERENCE',
  E2002: 'CYCLE_DETECTED',
  // References
  E3001: 'MALFORMED_REFERENCE',
  E3002: 'EMBEDDED_REFERENCE',
  E3003: 'WRONG_REFERENCE_KIND',
  E3004: 'UNKNOWN_CHOICE',
  E3005: 'UNKNOWN_PARAMETER',
  E3006: 'UNKNOWN_DATASET',
  E3007: 'DATASET_UNAVAILABLE',
  E3008: 'DATASET_FILE_NOT_FOUND',
  E3009: 'UNKNOWN_STEP',
  E3010: 'STEP_NOT_EXECUTED',
  E3011: 'UNKNOWN_STEP_OUTPUT',
  E3012: 'UNKNOWN_SEMANTIC_TYPE',
  // Primitive resolution
  E4001: 'INVALID_PRIMITIVE_REFERENCE',
  E4002: 'UNKNOWN_LAYER',
  E4003: 'UNKNOWN_PRIMITIVE',
  E4004: 'PRIMITIVE_FILE_MISSING',
  // Primitive execution
  E5001: 'NON_JSON_OUTPUT',
  E5002: 'NON_ZERO_EXIT',
  E5003: 'SPAWN_FAILED',
  E5004: 'PRIMITIVE_TIMEOUT',
  E5005: 'PRIMITIVE_KILLED',
  // Envelopes
  E6001: 'SCHEMA_VIOLATION',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export interface ErrorDetails {
  /** The offending value (reference string, step id, path, ...) */
  value?: string;
  /** Where it appeared, e.g. "step 'buffer' params.distance" */
  context?: string;
  suggestions?: string[];
  available?: string[];
  cycle?: string[];
  stepId?: string;
}

export class TrellisError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(kind: ErrorKind, code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function isTrellisError(error: unknown): error is TrellisError {
  return error instanceof TrellisError;
}

// =============================================================================
// Conversion
// =============================================================================

function detailsToJson(details: ErrorDetails): JsonObject | undefined {
  const json: JsonObject = {};
  if (details.value !== undefined) json.value = details.value;
  if (details.context !== undefined) json.context = details.context;
  if (details.suggestions) json.suggestions = details.suggestions;
  if (details.available) json.available = details.available;
  if (details.cycle) json.cycle = details.cycle;
  if (details.stepId !== undefined) json.step_id = details.stepId;
  return Object.keys(json).length > 0 ? json : undefined;
}

/**
 * Convert any thrown value into the structured error carried by a StepResult.
 */
export function toStepError(error: unknown, fallbackKind: ErrorKind = 'PrimitiveExecutionError'): StepError {
  if (isTrellisError(error)) {
    const details = detailsToJson(error.details);
    return {
      kind: error.kind,
      code: error.code,
      message: error.message,
      ...(details ? { details } : {}),
    };
  }
  return {
    kind: fallbackKind,
    code: 'UNEXPECTED_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

/** Format a list of errors as an indented bullet list */
export function formatErrorList(errors: Array<{ message: string }>): string {
  return errors.map(e => `  - ${e.message}`).join('\n');
}
