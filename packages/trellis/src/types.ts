/**
 * Trellis - Core Types
 * Documents (manifest, experiment, registry, method), plans, envelopes and results.
 */

// =============================================================================
// Dynamic Values
// =============================================================================

/** Closed value type for free-form params, choices and metadata. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Look up a key in a name-keyed table, ignoring inherited properties */
export function ownEntry<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

// =============================================================================
// Manifest
// =============================================================================

export interface ManifestDataset {
  name: string;
  /** Path relative to the manifest's directory */
  path: string;
  semanticType: string;
  format: string;
}

export interface Manifest {
  cityName: string;
  cityId: string;
  workingCrs?: string;
  /** Only datasets marked available */
  datasets: Record<string, ManifestDataset>;
  /** Declared but marked `available: false` */
  unavailable: string[];
  /** Directory the manifest was loaded from; dataset paths resolve against it */
  dataDir: string;
}

// =============================================================================
// Experiment
// =============================================================================

export interface StepDefinition {
  id: string;
  /** "layer/name", e.g. "soil/validate_vector" */
  primitive: string;
  version: string;
  description: string;
  /** input name -> reference string */
  inputs: Record<string, string>;
  /** output name -> semantic type */
  outputs: Record<string, string>;
  params: JsonObject;
}

/** Scientific lineage: where this experiment comes from. */
export interface Lineage {
  curiosityRef: string;
  subQuestion: string | null;
  methodRef: string;
  choices: JsonObject;
}

export interface Experiment {
  id: string;
  name: string;
  description: string;
  lineage: Lineage;
  city: string;
  manifestPath: string;
  choices: JsonObject;
  parameters: JsonObject;
  steps: StepDefinition[];
}

export interface MethodChoice {
  name: string;
  options: JsonValue[];
  description: string;
}

export interface Method {
  id: string;
  name: string;
  choices: Record<string, MethodChoice>;
}

// =============================================================================
// Registry & Semantic Types
// =============================================================================

export const LAYERS = ['roots', 'soil'] as const;

export type Layer = typeof LAYERS[number];

export function isLayer(value: string): value is Layer {
  return (LAYERS as readonly string[]).includes(value);
}

export interface PrimitiveSpec {
  name: string;
  /** Path relative to the layer directory */
  path: string;
  version: string;
  inputs: JsonValue[];
  outputs: JsonObject;
  params: JsonObject;
  /** Primitive may skip writing a new artifact */
  passthrough: boolean;
}

export interface SemanticType {
  name: string;
  /** "vector", "raster", "tabular" */
  category: string;
  /** "geojson", "tif", "parquet" */
  format: string;
  description: string;
  extra: JsonObject;
}

// =============================================================================
// Execution Plan
// =============================================================================

export interface ExecutionPlan {
  stepsInOrder: string[];
  /** step id -> ids of the steps it depends on */
  dependencyGraph: Map<string, Set<string>>;
}

// =============================================================================
// Envelope Types
// =============================================================================

export type HashProfile = 'full' | 'dev' | 'test';

export type HashMethod = 'full_file' | 'metadata' | 'skipped';

export interface HashInfo {
  value?: string;
  method: HashMethod;
  algorithm?: string;
  reason?: string;
}

export interface InputRecord {
  name: string;
  semanticType: string;
  path: string;
  hash: HashInfo;
}

export interface ProvenanceEntry {
  primitive: string;
  version: string;
  timestamp: string;
  params: JsonObject;
  inputs: InputRecord[];
  durationSeconds: number;
  /** Input through which this entry was inherited; null for the producing step */
  lineageBranch: string | null;
}

export type WarningLevel = 'info' | 'warning' | 'critical';

export interface EnvelopeWarning {
  level: WarningLevel;
  primitive: string;
  message: string;
}

export interface EnvelopeData {
  path: string;
  format: string;
  secondary: JsonObject;
}

/** Lineage block attached to sink envelopes */
export interface LineageRecord {
  curiosity: string;
  subQuestion: string | null;
  method: string;
  choices: JsonObject;
  parameters: JsonObject;
}

export interface EnvelopeMetadata {
  semanticType: string;
  dataCategory: string;
  lineage?: LineageRecord;
  /** Everything else the primitive reported (crs, feature_count, ...) */
  extra: JsonObject;
}

export interface Envelope {
  data: EnvelopeData;
  metadata: EnvelopeMetadata;
  provenance: ProvenanceEntry[];
  warnings: EnvelopeWarning[];
}

// =============================================================================
// Primitive Execution Port
// =============================================================================

export interface PrimitiveInvocation {
  /** Resolved primitive path relative to the project root ("soil/validate/validate_vector.R") */
  primitivePath: string;
  spec: PrimitiveSpec;
  /** input name -> file path */
  inputs: Record<string, string>;
  outputPath: string;
  params: JsonObject;
}

export interface PrimitiveWarningReport {
  level: WarningLevel;
  message: string;
}

export type PrimitiveOutcome =
  | {
      ok: true;
      /** Raw response object (transport fields included) */
      metadata: JsonObject;
      warnings: PrimitiveWarningReport[];
    }
  | {
      ok: false;
      error: {
        code: string;
        message: string;
        /** `error` field the primitive itself reported, if any */
        reported?: string;
      };
      warnings: PrimitiveWarningReport[];
    };

/** The narrow capability the orchestrator uses to run a primitive. */
export interface PrimitiveExecutionPort {
  execute(invocation: PrimitiveInvocation): Promise<PrimitiveOutcome>;
}

// =============================================================================
// Results
// =============================================================================

export interface StepError {
  kind: string;
  code: string;
  message: string;
  details?: JsonObject;
}

export interface StepResult {
  stepId: string;
  success: boolean;
  envelope: Envelope | null;
  /** output name -> path */
  outputPaths: Record<string, string>;
  error?: StepError;
}

export interface OrchestrationResult {
  success: boolean;
  completedSteps: string[];
  failedStep: string | null;
  stepResults: Record<string, StepResult>;
  /** Envelopes of sink steps, keyed by step id */
  finalEnvelopes: Record<string, Envelope>;
  lineage: Lineage | null;
  /** Non-fatal validation warnings */
  warnings: string[];
  /** Fatal validation errors (empty when validation passed) */
  validationErrors: StepError[];
  error?: string;
  /** Where the run log was written */
  runLogPath?: string;
}

// =============================================================================
// Command Types
// =============================================================================

export interface CommandContext {
  cwd: string;
  verbose?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
