/**
 * Orchestrator - validate an experiment, plan it once, run its steps and
 * persist envelopes and a run log.
 *
 *   Validating -> Failed (no side effects beyond the run log)
 *              -> Provisioning -> Executing -> Succeeded | Failed-at-step
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { resolveConfig } from '../config.js';
import type { TrellisConfig, TrellisOptions } from '../config.js';
import { TrellisError, ERROR_CODES, formatErrorList, toStepError } from '../errors.js';
import { ownEntry } from '../types.js';
import type {
  Envelope,
  ExecutionPlan,
  Experiment,
  Manifest,
  OrchestrationResult,
  PrimitiveExecutionPort,
  StepDefinition,
  StepResult,
} from '../types.js';
import { EnvelopeBuilder } from './builder.js';
import type { BuilderInput } from './builder.js';
import { DependencyResolver } from './dependencies.js';
import { EnvelopeSchemaValidator, writeEnvelope } from './envelope.js';
import { Hasher } from './hasher.js';
import { loadExperiment, loadManifest } from './loader.js';
import { ReferenceResolver } from './references.js';
import { RegistryCache, RegistryManager } from './registry.js';
import { buildRunLog, writeRunLog } from './run-log.js';
import { SubprocessPrimitiveRunner } from './runner.js';
import { SemanticTypeRegistry } from './semantic-types.js';
import { validateExperimentDefinition } from './validator.js';
import type { ValidationResult } from './validator.js';

export interface OrchestratorOptions extends TrellisOptions {
  /** Execution port; defaults to the subprocess runner */
  port?: PrimitiveExecutionPort;
  /** Shared registry cache; defaults to one per orchestrator */
  registryCache?: RegistryCache;
  /** Skip primitive file existence checks */
  skipFileChecks?: boolean;
}

interface Components {
  config: TrellisConfig;
  experimentPath: string;
  experiment: Experiment;
  manifest: Manifest;
  semanticTypes: SemanticTypeRegistry;
  registry: RegistryManager;
  port: PrimitiveExecutionPort;
  validateExists: boolean;
}

export class Orchestrator {
  readonly config: TrellisConfig;
  readonly experiment: Experiment;
  readonly manifest: Manifest;
  readonly outputDir: string;
  readonly envelopeDir: string;

  private readonly experimentPath: string;
  private readonly semanticTypes: SemanticTypeRegistry;
  private readonly registry: RegistryManager;
  private readonly resolver: ReferenceResolver;
  private readonly builder: EnvelopeBuilder;
  private readonly schemaValidator: EnvelopeSchemaValidator;
  private readonly dependencies: DependencyResolver;
  private readonly validateExists: boolean;
  private plan: ExecutionPlan | null = null;
  private started = false;

  private constructor(components: Components) {
    this.config = components.config;
    this.experimentPath = components.experimentPath;
    this.experiment = components.experiment;
    this.manifest = components.manifest;
    this.semanticTypes = components.semanticTypes;
    this.registry = components.registry;
    this.validateExists = components.validateExists;

    this.outputDir = this.config.outputDir ?? path.join(this.manifest.dataDir, '.data');
    this.envelopeDir = this.config.envelopeDir ?? path.join(this.manifest.dataDir, '.envelopes');

    this.resolver = new ReferenceResolver(this.manifest, this.experiment);
    this.builder = new EnvelopeBuilder(new Hasher(this.config.profile), components.port);
    this.schemaValidator = new EnvelopeSchemaValidator(this.config.schemaDir);
    this.dependencies = new DependencyResolver(this.experiment);
  }

  /**
   * Load the experiment, its manifest (relative to the project root) and
   * the semantic type vocabulary.
   */
  static async create(experimentPath: string, options: OrchestratorOptions = {}): Promise<Orchestrator> {
    const config = resolveConfig(options);
    const resolvedPath = path.resolve(config.projectRoot, experimentPath);
    const experiment = await loadExperiment(resolvedPath);
    const manifest = await loadManifest(path.resolve(config.projectRoot, experiment.manifestPath));
    const semanticTypes = await SemanticTypeRegistry.load(config.semanticTypesPath);

    return new Orchestrator({
      config,
      experimentPath: resolvedPath,
      experiment,
      manifest,
      semanticTypes,
      registry: new RegistryManager(config.projectRoot, options.registryCache ?? new RegistryCache()),
      port: options.port ?? new SubprocessPrimitiveRunner({
        projectRoot: config.projectRoot,
        timeoutMs: config.timeoutMs,
        verbose: config.verbose,
      }),
      validateExists: !options.skipFileChecks,
    });
  }

  // ===========================================================================
  // Planning & Validation
  // ===========================================================================

  getPlan(): ExecutionPlan {
    if (!this.plan) {
      this.plan = this.dependencies.createExecutionPlan();
    }
    return this.plan;
  }

  visualize(): string {
    return this.dependencies.visualize(this.getPlan());
  }

  validate(): Promise<ValidationResult> {
    return validateExperimentDefinition({
      experiment: this.experiment,
      manifest: this.manifest,
      registry: this.registry,
      semanticTypes: this.semanticTypes,
      methodsDir: this.config.methodsDir,
      validateExists: this.validateExists,
    });
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Execute the experiment. One run per instance.
   */
  async run(): Promise<OrchestrationResult> {
    if (this.started) {
      throw new Error(`Orchestrator for '${this.experiment.id}' has already run`);
    }
    this.started = true;
    const startedAt = new Date();

    const validation = await this.validate();
    if (!validation.valid) {
      const result: OrchestrationResult = {
        success: false,
        completedSteps: [],
        failedStep: null,
        stepResults: {},
        finalEnvelopes: {},
        lineage: this.experiment.lineage,
        warnings: validation.warnings,
        validationErrors: validation.errors.map(e => toStepError(e)),
        error: `Validation failed:\n${formatErrorList(validation.errors)}`,
      };
      return this.finish(result, startedAt, this.experiment.steps.map(s => s.id));
    }

    const plan = this.getPlan();
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.mkdir(this.envelopeDir, { recursive: true });

    const { stepResults, completedSteps, failedStep } = await this.executePlan(plan);
    const sinks = DependencyResolver.sinks(plan);
    const finalEnvelopes: Record<string, Envelope> = {};
    for (const stepId of sinks) {
      const envelope = ownEntry(stepResults, stepId)?.envelope;
      if (envelope) finalEnvelopes[stepId] = envelope;
    }

    const success = failedStep === null;
    if (success) {
      await this.enrichWithLineage(finalEnvelopes);
    }

    const failure = failedStep ? stepResults[failedStep]?.error : undefined;
    const result: OrchestrationResult = {
      success,
      completedSteps,
      failedStep,
      stepResults,
      finalEnvelopes,
      lineage: this.experiment.lineage,
      warnings: validation.warnings,
      validationErrors: [],
      ...(failure ? { error: `Step '${failedStep}' failed: ${failure.message}` } : {}),
    };
    return this.finish(result, startedAt, plan.stepsInOrder);
  }

  /**
   * Launch ready steps (sorted by id) up to maxConcurrency at a time.
   * After the first failure nothing new is launched; in-flight steps finish.
   */
  private async executePlan(plan: ExecutionPlan): Promise<{
    stepResults: Record<string, StepResult>;
    completedSteps: string[];
    failedStep: string | null;
  }> {
    const stepResults: Record<string, StepResult> = {};
    const completedSteps: string[] = [];
    const pending = new Set(plan.stepsInOrder);
    const done = new Set<string>();
    const running = new Map<string, Promise<void>>();
    let failedStep: string | null = null;

    const isReady = (stepId: string): boolean =>
      [...(plan.dependencyGraph.get(stepId) ?? [])].every(dep => done.has(dep));

    for (;;) {
      if (failedStep === null) {
        const ready = [...pending].filter(isReady).sort();
        for (const stepId of ready) {
          if (running.size >= this.config.maxConcurrency) break;
          pending.delete(stepId);
          const step = this.getStep(stepId);
          running.set(stepId, this.executeStep(step).then(stepResult => {
            running.delete(stepId);
            stepResults[stepId] = stepResult;
            if (stepResult.success) {
              done.add(stepId);
              completedSteps.push(stepId);
            } else if (failedStep === null) {
              failedStep = stepId;
            }
          }));
        }
      }
      if (running.size === 0) break;
      await Promise.race(running.values());
    }

    return { stepResults, completedSteps, failedStep };
  }

  private getStep(stepId: string): StepDefinition {
    const step = this.experiment.steps.find(s => s.id === stepId);
    if (!step) {
      throw new TrellisError('GraphError', ERROR_CODES.E2001, `Unknown step: ${stepId}`, { value: stepId });
    }
    return step;
  }

  /**
   * Run one step. Never rejects: failures become a failed StepResult.
   */
  private async executeStep(step: StepDefinition): Promise<StepResult> {
    const failed = (error: StepResult['error']): StepResult => ({
      stepId: step.id,
      success: false,
      envelope: null,
      outputPaths: {},
      error,
    });

    let outputPath: string | null = null;
    try {
      if (this.config.verbose) {
        console.error(`[trellis] Running step '${step.id}' (${step.primitive})`);
      }

      const resolved = await this.registry.resolvePrimitive(step.primitive, {
        validateExists: this.validateExists,
      });
      const inputs = await this.resolver.resolveStepInputs(step);
      const params = this.resolver.resolveStepParams(step);

      const outputs = Object.entries(step.outputs);
      if (outputs.length !== 1) {
        throw new TrellisError(
          'StructuralParseError',
          ERROR_CODES.E1004,
          `Step '${step.id}' declares ${outputs.length} outputs; exactly one output is supported`,
          { stepId: step.id }
        );
      }
      const [outputName, semanticType] = outputs[0];
      const format = this.semanticTypes.getFormat(semanticType);
      outputPath = path.join(this.outputDir, `${step.id}_${outputName}.${format}`);

      const builderInputs: BuilderInput[] = Object.entries(inputs).map(([name, input]) => ({
        name,
        path: input.path,
        semanticType: input.semanticType,
        envelope: input.envelope,
      }));

      const build = await this.builder.run({
        primitivePath: resolved.path,
        spec: resolved.spec,
        version: step.version,
        inputs: builderInputs,
        outputPath,
        outputFormat: format,
        outputSemanticType: semanticType,
        outputDataCategory: this.semanticTypes.getCategory(semanticType),
        params,
      });

      if (!build.success) {
        await this.removeOutput(outputPath);
        if (this.config.verbose) {
          console.error(`[trellis] Step '${step.id}' failed: ${build.error.message}`);
        }
        return failed(build.error);
      }

      const envelope = build.envelope;
      await writeEnvelope(envelope, this.envelopePath(step.id, outputName), {
        validator: this.schemaValidator,
      });
      this.resolver.registerStepOutput(step.id, outputName, envelope.data.path, envelope);

      return {
        stepId: step.id,
        success: true,
        envelope,
        outputPaths: { [outputName]: envelope.data.path },
      };
    } catch (e) {
      if (outputPath) {
        await this.removeOutput(outputPath);
      }
      if (this.config.verbose) {
        console.error(`[trellis] Step '${step.id}' failed: ${e instanceof Error ? e.message : String(e)}`);
      }
      return failed(toStepError(e));
    }
  }

  private envelopePath(stepId: string, outputName: string): string {
    return path.join(this.envelopeDir, `${stepId}_${outputName}.envelope.json`);
  }

  private async removeOutput(outputPath: string): Promise<void> {
    await fs.rm(outputPath, { force: true });
  }

  /**
   * Attach experiment lineage to sink envelopes and re-write their files.
   */
  private async enrichWithLineage(envelopes: Record<string, Envelope>): Promise<void> {
    const lineage = this.experiment.lineage;
    for (const [stepId, envelope] of Object.entries(envelopes)) {
      envelope.metadata.lineage = {
        curiosity: lineage.curiosityRef,
        subQuestion: lineage.subQuestion,
        method: lineage.methodRef,
        choices: lineage.choices,
        parameters: this.experiment.parameters,
      };
      const outputName = Object.keys(this.getStep(stepId).outputs)[0];
      await writeEnvelope(envelope, this.envelopePath(stepId, outputName), {
        validator: this.schemaValidator,
      });
    }
  }

  private async finish(
    result: OrchestrationResult,
    startedAt: Date,
    stepOrder: string[]
  ): Promise<OrchestrationResult> {
    const log = buildRunLog({
      experiment: this.experiment,
      experimentPath: this.experimentPath,
      profile: this.config.profile,
      started: startedAt,
      completed: new Date(),
      stepOrder,
      result,
    });
    const runLogPath = await writeRunLog(this.config.logDir, log);
    if (this.config.verbose) {
      console.error(`[trellis] Run log written to ${runLogPath}`);
    }
    return { ...result, runLogPath };
  }
}

// =============================================================================
// Convenience API
// =============================================================================

export async function runExperiment(
  experimentPath: string,
  options: OrchestratorOptions = {}
): Promise<OrchestrationResult> {
  const orchestrator = await Orchestrator.create(experimentPath, options);
  return orchestrator.run();
}

export async function validateExperiment(
  experimentPath: string,
  options: OrchestratorOptions = {}
): Promise<ValidationResult> {
  const orchestrator = await Orchestrator.create(experimentPath, options);
  return orchestrator.validate();
}

export async function visualizeExperiment(
  experimentPath: string,
  options: OrchestratorOptions = {}
): Promise<string> {
  const orchestrator = await Orchestrator.create(experimentPath, options);
  return orchestrator.visualize();
}
