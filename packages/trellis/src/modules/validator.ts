/**
 * Experiment Validator - exhaustive pre-run checks.
 * Errors are fatal; warnings are informational.
 */

import { TrellisError, ERROR_CODES, isTrellisError } from '../errors.js';
import { isJsonObject, ownEntry } from '../types.js';
import type { Experiment, JsonValue, Manifest, Method, StepDefinition } from '../types.js';
import { DependencyResolver } from './dependencies.js';
import { fileExists, loadMethod, resolveMethodPath } from './loader.js';
import { ReferenceResolver, parseInputReference } from './references.js';
import type { RegistryManager } from './registry.js';
import type { SemanticTypeRegistry } from './semantic-types.js';

// =============================================================================
// Types
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: TrellisError[];
  warnings: string[];
}

export interface ValidationContext {
  experiment: Experiment;
  manifest: Manifest;
  registry: RegistryManager;
  semanticTypes: SemanticTypeRegistry;
  methodsDir: string;
  /** Check primitive files exist on disk (default: true) */
  validateExists?: boolean;
}

// =============================================================================
// Main Validation Entry Point
// =============================================================================

/**
 * Validate an experiment against its manifest, the primitive registries,
 * the semantic type vocabulary and its method document.
 */
export async function validateExperimentDefinition(ctx: ValidationContext): Promise<ValidationResult> {
  const errors: TrellisError[] = [];
  const warnings: string[] = [];

  errors.push(...await ctx.registry.validateAllPrimitives(ctx.experiment, {
    validateExists: ctx.validateExists ?? true,
  }));

  const resolver = new ReferenceResolver(ctx.manifest, ctx.experiment);
  for (const step of ctx.experiment.steps) {
    errors.push(...validateOutputs(step, ctx.semanticTypes));
    errors.push(...validateInputs(step, ctx.manifest));
    errors.push(...validateParams(step, resolver));
  }

  try {
    new DependencyResolver(ctx.experiment).createExecutionPlan();
  } catch (e) {
    if (!isTrellisError(e)) throw e;
    errors.push(e);
  }

  warnings.push(...await validateMethodChoices(ctx.experiment, ctx.methodsDir));

  return { valid: errors.length === 0, errors, warnings };
}

// =============================================================================
// Step Checks
// =============================================================================

function validateOutputs(step: StepDefinition, semanticTypes: SemanticTypeRegistry): TrellisError[] {
  const errors: TrellisError[] = [];
  const outputs = Object.entries(step.outputs);

  if (outputs.length !== 1) {
    errors.push(new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1004,
      `Step '${step.id}' declares ${outputs.length} outputs; exactly one output is supported`,
      { stepId: step.id }
    ));
  }

  for (const [name, semanticType] of outputs) {
    try {
      semanticTypes.get(semanticType);
    } catch (e) {
      if (!isTrellisError(e)) throw e;
      errors.push(new TrellisError(e.kind, e.code, `Step '${step.id}' output '${name}': ${e.message}`, {
        ...e.details,
        stepId: step.id,
      }));
    }
  }
  return errors;
}

function validateInputs(step: StepDefinition, manifest: Manifest): TrellisError[] {
  const errors: TrellisError[] = [];

  for (const [name, raw] of Object.entries(step.inputs)) {
    const context = `step '${step.id}' inputs.${name}`;
    try {
      const ref = parseInputReference(raw, context);
      if (ref.kind !== 'manifest' || ownEntry(manifest.datasets, ref.name)) continue;

      if (manifest.unavailable.includes(ref.name)) {
        errors.push(new TrellisError(
          'ReferenceError',
          ERROR_CODES.E3007,
          `Step '${step.id}' references $manifest.${ref.name}, but dataset '${ref.name}' is marked unavailable`,
          { value: ref.name, context, stepId: step.id }
        ));
      } else {
        errors.push(new TrellisError(
          'ReferenceError',
          ERROR_CODES.E3006,
          `Step '${step.id}' references $manifest.${ref.name}, but manifest has no dataset '${ref.name}'`,
          { value: ref.name, context, stepId: step.id, available: Object.keys(manifest.datasets).sort() }
        ));
      }
    } catch (e) {
      if (!isTrellisError(e)) throw e;
      errors.push(e);
    }
  }
  return errors;
}

/**
 * Resolve every param leaf independently so each bad reference is reported.
 */
function validateParams(step: StepDefinition, resolver: ReferenceResolver): TrellisError[] {
  const errors: TrellisError[] = [];

  const visit = (value: JsonValue, context: string): void => {
    if (Array.isArray(value)) {
      value.forEach((item, i) => visit(item, `${context}[${i}]`));
      return;
    }
    if (isJsonObject(value)) {
      for (const [key, item] of Object.entries(value)) visit(item, `${context}.${key}`);
      return;
    }
    try {
      resolver.resolveParamValue(value, context);
    } catch (e) {
      if (!isTrellisError(e)) throw e;
      errors.push(e);
    }
  };

  for (const [key, value] of Object.entries(step.params)) {
    visit(value, `step '${step.id}' params.${key}`);
  }
  return errors;
}

// =============================================================================
// Method Choices
// =============================================================================

function sameValue(a: JsonValue, b: JsonValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Compare experiment choices with the method's declared vocabulary.
 * Never fatal: every finding is a warning.
 */
export async function validateMethodChoices(experiment: Experiment, methodsDir: string): Promise<string[]> {
  const warnings: string[] = [];
  const methodRef = experiment.lineage.methodRef;
  if (!methodRef) return warnings;

  const methodPath = resolveMethodPath(methodRef, methodsDir);
  if (!(await fileExists(methodPath))) {
    warnings.push(`Method file not found: ${methodPath}. Choice validation skipped.`);
    return warnings;
  }

  let method: Method;
  try {
    method = await loadMethod(methodPath);
  } catch (e) {
    warnings.push(`Could not parse method file ${methodPath}: ${e instanceof Error ? e.message : String(e)}. Choice validation skipped.`);
    return warnings;
  }

  for (const [name, value] of Object.entries(experiment.choices)) {
    const declared = ownEntry(method.choices, name);
    if (!declared) {
      warnings.push(`Choice '${name}' not declared in method '${method.name}'. This may be intentional experimentation.`);
    } else if (!declared.options.some(option => sameValue(option, value))) {
      warnings.push(`Choice '${name}: ${JSON.stringify(value)}' not in method options ${JSON.stringify(declared.options)}. Proceeding anyway.`);
    }
  }

  for (const name of Object.keys(method.choices)) {
    if (ownEntry(experiment.choices, name) === undefined) {
      warnings.push(`Method '${method.name}' declares choice '${name}', but experiment does not provide it. Default may be used.`);
    }
  }
  return warnings;
}
