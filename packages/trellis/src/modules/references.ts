/**
 * Reference Resolver - parse and resolve symbolic references.
 *
 *   $manifest.{dataset}          -> dataset path (inputs only)
 *   $steps.{step_id}.{output}    -> prior step output (inputs only)
 *   $choices.{name}              -> experiment choice (params only)
 *   $parameters.{name}           -> experiment parameter (params only)
 *
 * A reference is always the whole string value; anything else beginning
 * with `$` and a letter is malformed.
 */

import * as path from 'node:path';
import { TrellisError, ERROR_CODES } from '../errors.js';
import { isJsonObject, ownEntry } from '../types.js';
import type {
  Envelope,
  Experiment,
  JsonObject,
  JsonValue,
  Manifest,
  StepDefinition,
} from '../types.js';
import { fileExists } from './loader.js';
import { findCloseMatches, formatSuggestions, levenshtein } from './suggest.js';

// =============================================================================
// Reference AST
// =============================================================================

export type Reference =
  | { kind: 'manifest'; raw: string; name: string }
  | { kind: 'choice'; raw: string; name: string }
  | { kind: 'parameter'; raw: string; name: string }
  | { kind: 'step'; raw: string; stepId: string; output: string }
  | { kind: 'literal'; raw: string };

const NAME = '[a-zA-Z_][a-zA-Z0-9_]*';
const MANIFEST_PATTERN = new RegExp(`^\\$manifest\\.(${NAME})$`);
const CHOICES_PATTERN = new RegExp(`^\\$choices\\.(${NAME})$`);
const PARAMETERS_PATTERN = new RegExp(`^\\$parameters\\.(${NAME})$`);
const STEPS_PATTERN = new RegExp(`^\\$steps\\.(${NAME})\\.(${NAME})$`);
const LOOKS_LIKE_REFERENCE = /^\$[a-zA-Z]/;
const EMBEDDED_REFERENCE = /.+\$[a-zA-Z]/;

const PREFIX_WORDS = ['manifest', 'choices', 'parameters', 'steps'] as const;

const VALID_FORMATS = '$manifest.{name}, $choices.{name}, $parameters.{name}, $steps.{step_id}.{output}';

function withContext(context: string): string {
  return context ? ` (in ${context})` : '';
}

function malformedHints(raw: string): { hints: string[]; suggestions: string[] } {
  const hints: string[] = [];
  const suggestions: string[] = [];

  for (const word of PREFIX_WORDS) {
    const bare = `$${word}`;
    if (raw.startsWith(bare) && raw.charAt(bare.length) !== '.') {
      hints.push(`Did you mean '${bare}.'? (missing dot)`);
      suggestions.push(`${bare}.`);
      break;
    }
  }
  if (raw.startsWith('$params.') || raw === '$params') {
    hints.push(`Did you mean '$parameters.'? ($params is not valid)`);
    suggestions.push('$parameters.');
  }
  if (raw.startsWith('$step.')) {
    hints.push(`Did you mean '$steps.' (plural)?`);
    suggestions.push('$steps.');
  }
  if (raw.startsWith('$manifest.') && raw.slice('$manifest.'.length).includes('.')) {
    hints.push('$manifest references should be $manifest.{dataset_name} (one level deep)');
  }

  if (hints.length === 0) {
    const word = raw.slice(1).split('.')[0];
    for (const candidate of PREFIX_WORDS) {
      if (word !== candidate && levenshtein(word, candidate) <= 2) {
        hints.push(`Did you mean '$${candidate}.'?`);
        suggestions.push(`$${candidate}.`);
      }
    }
  }
  return { hints, suggestions };
}

/**
 * Parse a raw string into a typed reference.
 * Throws MALFORMED_REFERENCE or EMBEDDED_REFERENCE.
 */
export function parseReference(raw: string, context = ''): Reference {
  if (LOOKS_LIKE_REFERENCE.test(raw)) {
    let match = MANIFEST_PATTERN.exec(raw);
    if (match) return { kind: 'manifest', raw, name: match[1] };
    match = CHOICES_PATTERN.exec(raw);
    if (match) return { kind: 'choice', raw, name: match[1] };
    match = PARAMETERS_PATTERN.exec(raw);
    if (match) return { kind: 'parameter', raw, name: match[1] };
    match = STEPS_PATTERN.exec(raw);
    if (match) return { kind: 'step', raw, stepId: match[1], output: match[2] };

    const { hints, suggestions } = malformedHints(raw);
    const hintText = hints.length > 0 ? ` ${hints.join(' ')}` : '';
    throw new TrellisError(
      'ReferenceError',
      ERROR_CODES.E3001,
      `Invalid reference '${raw}'${withContext(context)}. Starts with '$' but doesn't match valid patterns.${hintText} Valid formats: ${VALID_FORMATS}`,
      { value: raw, context, suggestions }
    );
  }

  if (EMBEDDED_REFERENCE.test(raw)) {
    throw new TrellisError(
      'ReferenceError',
      ERROR_CODES.E3002,
      `Embedded reference detected in '${raw}'${withContext(context)}. References must be the entire value, not embedded in strings.`,
      { value: raw, context }
    );
  }

  return { kind: 'literal', raw };
}

function wrongKind(ref: Reference, context: string, message: string): TrellisError {
  return new TrellisError(
    'ReferenceError',
    ERROR_CODES.E3003,
    `Invalid reference '${ref.raw}'${withContext(context)}. ${message}`,
    { value: ref.raw, context }
  );
}

function checkInputKind(ref: Reference, context: string): void {
  switch (ref.kind) {
    case 'manifest':
    case 'step':
      return;
    case 'choice':
    case 'parameter':
      throw wrongKind(
        ref,
        context,
        `$${ref.kind === 'choice' ? 'choices' : 'parameters'} is for params, not inputs. Inputs must reference data: $manifest.{dataset} or $steps.{step}.{output}.`
      );
    case 'literal':
      throw wrongKind(ref, context, 'Expected $manifest.{name} or $steps.{step_id}.{output_name}.');
  }
}

function checkParamKind(ref: Reference, context: string): void {
  if (ref.kind === 'manifest') {
    throw wrongKind(ref, context, '$manifest references data files, not param values. Use $choices.{name} or $parameters.{name} for params.');
  }
  if (ref.kind === 'step') {
    throw wrongKind(ref, context, '$steps references data outputs, not param values. Use $choices.{name} or $parameters.{name} for params.');
  }
}

/**
 * Parse an input reference and reject kinds not allowed in inputs.
 */
export function parseInputReference(raw: string, context = ''): Reference {
  const ref = parseReference(raw, context);
  checkInputKind(ref, context);
  return ref;
}

// =============================================================================
// Resolver
// =============================================================================

export interface ResolvedInput {
  path: string;
  semanticType: string;
  /** Producing step's envelope; null for manifest datasets */
  envelope: Envelope | null;
}

interface StepOutput {
  path: string;
  envelope: Envelope;
}

export class ReferenceResolver {
  private readonly stepOutputs = new Map<string, Map<string, StepOutput>>();
  private readonly knownSteps: Set<string>;

  constructor(
    private readonly manifest: Manifest,
    private readonly experiment: Experiment
  ) {
    this.knownSteps = new Set(experiment.steps.map(s => s.id));
  }

  /**
   * Record a completed step's output. Each (step, output) is written once.
   */
  registerStepOutput(stepId: string, outputName: string, outputPath: string, envelope: Envelope): void {
    let outputs = this.stepOutputs.get(stepId);
    if (!outputs) {
      outputs = new Map();
      this.stepOutputs.set(stepId, outputs);
    }
    if (outputs.has(outputName)) {
      throw new Error(`Output '${outputName}' of step '${stepId}' is already registered`);
    }
    outputs.set(outputName, { path: outputPath, envelope });
  }

  hasStepOutput(stepId: string): boolean {
    return this.stepOutputs.has(stepId);
  }

  // ---------------------------------------------------------------------------
  // Inputs
  // ---------------------------------------------------------------------------

  async resolveInput(raw: string, context = ''): Promise<ResolvedInput> {
    const ref = parseInputReference(raw, context);
    if (ref.kind === 'step') {
      return this.resolveStepRef(ref.stepId, ref.output, context);
    }
    if (ref.kind === 'manifest') {
      return this.resolveManifestRef(ref.name, context);
    }
    // checkInputKind rejects every other kind
    throw wrongKind(ref, context, 'Expected $manifest.{name} or $steps.{step_id}.{output_name}.');
  }

  async resolveStepInputs(step: StepDefinition): Promise<Record<string, ResolvedInput>> {
    const resolved: Record<string, ResolvedInput> = {};
    for (const [name, raw] of Object.entries(step.inputs)) {
      resolved[name] = await this.resolveInput(raw, `step '${step.id}' inputs.${name}`);
    }
    return resolved;
  }

  private resolveStepRef(stepId: string, outputName: string, context: string): ResolvedInput {
    const outputs = this.stepOutputs.get(stepId);
    if (!outputs) {
      if (this.knownSteps.has(stepId)) {
        throw new TrellisError(
          'ReferenceError',
          ERROR_CODES.E3010,
          `Step '${stepId}' has not been executed yet${withContext(context)}. Steps must be ordered so dependencies run first.`,
          { value: stepId, context, stepId }
        );
      }
      const available = [...this.knownSteps].sort();
      throw new TrellisError(
        'ReferenceError',
        ERROR_CODES.E3009,
        `Unknown step '${stepId}'${withContext(context)}. Available steps: ${available.join(', ') || '(none)'}`,
        { value: stepId, context, available }
      );
    }

    const output = outputs.get(outputName);
    if (!output) {
      const available = [...outputs.keys()].sort();
      throw new TrellisError(
        'ReferenceError',
        ERROR_CODES.E3011,
        `Step '${stepId}' has no output named '${outputName}'${withContext(context)}. Available outputs from '${stepId}': ${available.join(', ') || '(none)'}`,
        { value: outputName, context, available, stepId }
      );
    }

    return {
      path: output.path,
      semanticType: output.envelope.metadata.semanticType,
      envelope: output.envelope,
    };
  }

  private async resolveManifestRef(name: string, context: string): Promise<ResolvedInput> {
    const dataset = ownEntry(this.manifest.datasets, name);
    if (!dataset) {
      if (this.manifest.unavailable.includes(name)) {
        throw new TrellisError(
          'ReferenceError',
          ERROR_CODES.E3007,
          `Dataset '${name}' is marked unavailable in the ${this.manifest.cityId} manifest${withContext(context)}`,
          { value: name, context }
        );
      }
      const available = Object.keys(this.manifest.datasets).sort();
      throw new TrellisError(
        'ReferenceError',
        ERROR_CODES.E3006,
        `Manifest has no dataset '${name}'${withContext(context)}. Available datasets in ${this.manifest.cityId} manifest: ${available.join(', ') || '(none)'}`,
        { value: name, context, available }
      );
    }

    const datasetPath = path.resolve(this.manifest.dataDir, dataset.path);
    if (!(await fileExists(datasetPath))) {
      throw new TrellisError(
        'ReferenceError',
        ERROR_CODES.E3008,
        `Dataset '${name}' declared in manifest but file not found${withContext(context)}. Expected path: ${datasetPath}`,
        { value: datasetPath, context }
      );
    }
    return { path: datasetPath, semanticType: dataset.semanticType, envelope: null };
  }

  // ---------------------------------------------------------------------------
  // Params
  // ---------------------------------------------------------------------------

  /**
   * Resolve a param value; lists and maps are resolved element-wise,
   * non-reference leaves pass through unchanged.
   */
  resolveParamValue(value: JsonValue, context = ''): JsonValue {
    if (Array.isArray(value)) {
      return value.map((item, i) => this.resolveParamValue(item, `${context}[${i}]`));
    }
    if (isJsonObject(value)) {
      const resolved: JsonObject = {};
      for (const [key, item] of Object.entries(value)) {
        resolved[key] = this.resolveParamValue(item, `${context}.${key}`);
      }
      return resolved;
    }
    if (typeof value !== 'string') {
      return value;
    }

    const ref = parseReference(value, context);
    checkParamKind(ref, context);
    if (ref.kind === 'choice') {
      return this.lookup(ref.name, this.experiment.choices, 'choice', context);
    }
    if (ref.kind === 'parameter') {
      return this.lookup(ref.name, this.experiment.parameters, 'parameter', context);
    }
    return value;
  }

  resolveStepParams(step: StepDefinition): JsonObject {
    const resolved: JsonObject = {};
    for (const [key, value] of Object.entries(step.params)) {
      resolved[key] = this.resolveParamValue(value, `step '${step.id}' params.${key}`);
    }
    return resolved;
  }

  private lookup(
    name: string,
    table: JsonObject,
    label: 'choice' | 'parameter',
    context: string
  ): JsonValue {
    const value = ownEntry(table, name);
    if (value !== undefined) return value;
    const available = Object.keys(table).sort();
    const suggestions = findCloseMatches(name, Object.keys(table));
    throw new TrellisError(
      'ReferenceError',
      label === 'choice' ? ERROR_CODES.E3004 : ERROR_CODES.E3005,
      `Unknown ${label} '${name}'${withContext(context)}. Available ${label}s: ${available.join(', ') || '(none)'}.${formatSuggestions(suggestions)}`,
      { value: name, context, available, suggestions }
    );
  }
}
