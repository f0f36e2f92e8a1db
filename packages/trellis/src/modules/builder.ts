/**
 * Envelope Builder - run one primitive and wrap its output with merged
 * provenance and warnings.
 */

import { performance } from 'node:perf_hooks';
import type {
  Envelope,
  EnvelopeWarning,
  InputRecord,
  JsonObject,
  PrimitiveExecutionPort,
  PrimitiveSpec,
  PrimitiveWarningReport,
  ProvenanceEntry,
  StepError,
} from '../types.js';
import { RESERVED_METADATA_FIELDS } from './envelope.js';
import type { Hasher } from './hasher.js';

export interface BuilderInput {
  name: string;
  path: string;
  semanticType: string;
  /** Envelope of the producing step; null for raw datasets */
  envelope: Envelope | null;
}

export interface BuildRequest {
  /** Path relative to the project root, e.g. "soil/validate/validate_vector.R" */
  primitivePath: string;
  spec: PrimitiveSpec;
  version: string;
  inputs: BuilderInput[];
  outputPath: string;
  outputFormat: string;
  outputSemanticType: string;
  outputDataCategory: string;
  params: JsonObject;
}

export type BuildResult =
  | { success: true; envelope: Envelope }
  | { success: false; error: StepError };

const TRANSPORT_FIELDS = new Set(['warnings', 'status']);

/** "soil/validate/validate_vector.R" -> "validate_vector" */
export function shortPrimitiveName(primitivePath: string): string {
  const base = primitivePath.split('/').pop() ?? primitivePath;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

export class EnvelopeBuilder {
  constructor(
    private readonly hasher: Hasher,
    private readonly port: PrimitiveExecutionPort
  ) {}

  async run(request: BuildRequest): Promise<BuildResult> {
    const inputRecords = await this.hashInputs(request.inputs);

    const started = performance.now();
    const outcome = await this.port.execute({
      primitivePath: request.primitivePath,
      spec: request.spec,
      inputs: Object.fromEntries(request.inputs.map(i => [i.name, i.path])),
      outputPath: request.outputPath,
      params: request.params,
    });
    const durationSeconds = (performance.now() - started) / 1000;

    if (!outcome.ok) {
      return {
        success: false,
        error: {
          kind: 'PrimitiveExecutionError',
          code: outcome.error.code,
          message: outcome.error.message,
          ...(outcome.error.reported ? { details: { reported: outcome.error.reported } } : {}),
        },
      };
    }

    const primitive = shortPrimitiveName(request.primitivePath);
    const entry: ProvenanceEntry = {
      primitive,
      version: request.version,
      timestamp: new Date().toISOString(),
      params: request.params,
      inputs: inputRecords,
      durationSeconds: Math.round(durationSeconds * 1000) / 1000,
      lineageBranch: null,
    };

    return {
      success: true,
      envelope: {
        data: {
          path: this.dataPath(request, outcome.metadata),
          format: request.outputFormat,
          secondary: {},
        },
        metadata: {
          semanticType: request.outputSemanticType,
          dataCategory: request.outputDataCategory,
          extra: this.buildMetadata(outcome.metadata),
        },
        provenance: this.mergeProvenance(request.inputs, entry),
        warnings: this.mergeWarnings(request.inputs, outcome.warnings, primitive),
      },
    };
  }

  private async hashInputs(inputs: BuilderInput[]): Promise<InputRecord[]> {
    const records: InputRecord[] = [];
    for (const input of inputs) {
      records.push({
        name: input.name,
        semanticType: input.semanticType,
        path: input.path,
        hash: await this.hasher.hashFile(input.path),
      });
    }
    return records;
  }

  /**
   * Inherited entries first, tagged with the contributing input's name
   * unless already tagged, then the new entry.
   */
  mergeProvenance(inputs: BuilderInput[], entry: ProvenanceEntry): ProvenanceEntry[] {
    const merged: ProvenanceEntry[] = [];
    for (const input of inputs) {
      if (!input.envelope) continue;
      for (const inherited of input.envelope.provenance) {
        merged.push({
          ...inherited,
          lineageBranch: inherited.lineageBranch ?? input.name,
        });
      }
    }
    merged.push(entry);
    return merged;
  }

  mergeWarnings(
    inputs: BuilderInput[],
    reported: PrimitiveWarningReport[],
    primitive: string
  ): EnvelopeWarning[] {
    const merged: EnvelopeWarning[] = [];
    for (const input of inputs) {
      if (input.envelope) merged.push(...input.envelope.warnings);
    }
    for (const warning of reported) {
      merged.push({ level: warning.level, primitive, message: warning.message });
    }
    return merged;
  }

  private buildMetadata(response: JsonObject): JsonObject {
    const extra: JsonObject = {};
    for (const [key, value] of Object.entries(response)) {
      if (!TRANSPORT_FIELDS.has(key) && !RESERVED_METADATA_FIELDS.has(key)) {
        extra[key] = value;
      }
    }
    return extra;
  }

  private dataPath(request: BuildRequest, response: JsonObject): string {
    if (!request.spec.passthrough) return request.outputPath;
    const reported = response.output_path;
    if (typeof reported === 'string' && reported.length > 0) return reported;
    return request.inputs[0]?.path ?? request.outputPath;
  }
}
