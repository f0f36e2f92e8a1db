/**
 * Tests for experiment validation
 *
 * - Exhaustive error collection across steps
 * - Method choice warnings
 */

import * as path from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { validateExperimentDefinition, validateMethodChoices } from './validator.js';
import type { ValidationContext } from './validator.js';
import { loadManifest } from './loader.js';
import { RegistryManager } from './registry.js';
import { SemanticTypeRegistry } from './semantic-types.js';
import { createTestProject, makeExperiment, makeStep, type TestProject } from '../testing/project.js';
import type { Experiment } from '../types.js';

let project: TestProject;

beforeAll(async () => {
  project = await createTestProject();
  await project.writeYaml('methods/thermal/buffer_gradient.yml', {
    name: 'buffer_gradient',
    choices: {
      buffer_method: { options: ['euclidean', 'network'] },
      ring_count: { options: [3, 5] },
    },
  });
});

afterAll(async () => {
  await project.cleanup();
});

async function contextFor(experiment: Experiment): Promise<ValidationContext> {
  return {
    experiment,
    manifest: await loadManifest(project.manifestPath),
    registry: new RegistryManager(project.root),
    semanticTypes: await SemanticTypeRegistry.load(path.join(project.root, 'schemas', 'semantic_types.yml')),
    methodsDir: path.join(project.root, 'methods'),
  };
}

// =============================================================================
// Definition Checks
// =============================================================================

describe('validateExperimentDefinition', () => {
  it('should accept a well-formed experiment', async () => {
    const experiment = makeExperiment([
      makeStep({
        id: 'validate',
        primitive: 'soil/validate_vector',
        inputs: { vector: '$manifest.parks' },
        outputs: { validated: 'park_boundaries' },
      }),
      makeStep({
        id: 'buffer',
        inputs: { vector: '$steps.validate.validated' },
        outputs: { buffers: 'buffers' },
        params: { distance: '$choices.distance' },
      }),
    ], { choices: { distance: 100 } });

    const result = await validateExperimentDefinition(await contextFor(experiment));
    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('should collect every error instead of stopping at the first', async () => {
    const experiment = makeExperiment([
      makeStep({
        id: 'a',
        primitive: 'roots/nope',
        inputs: { p: '$manifest.streets', q: '$manifest.roads' },
        outputs: {},
        params: { x: '$choices.missing', y: ['$parameters.nah'] },
      }),
      makeStep({
        id: 'b',
        inputs: { src: '$steps.ghost.out' },
        outputs: { out: 'nonsense' },
      }),
    ]);

    const result = await validateExperimentDefinition(await contextFor(experiment));
    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.code)).toEqual([
      'UNKNOWN_PRIMITIVE',
      'INVALID_STEP_DEFINITION',
      'DATASET_UNAVAILABLE',
      'UNKNOWN_DATASET',
      'UNKNOWN_CHOICE',
      'UNKNOWN_PARAMETER',
      'UNKNOWN_SEMANTIC_TYPE',
      'UNKNOWN_STEP_REFERENCE',
    ]);
    expect(result.errors[2].message).toBe(
      "Step 'a' references $manifest.streets, but dataset 'streets' is marked unavailable"
    );
    expect(result.errors[5].details.context).toBe("step 'a' params.y[0]");
  });

  it('should report inherited object keys as unknown datasets', async () => {
    const experiment = makeExperiment([
      makeStep({
        id: 'validate',
        primitive: 'soil/validate_vector',
        inputs: { vector: '$manifest.toString' },
        outputs: { validated: 'park_boundaries' },
      }),
    ]);
    const result = await validateExperimentDefinition(await contextFor(experiment));
    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.code)).toEqual(['UNKNOWN_DATASET']);
  });

  it('should report a dependency cycle', async () => {
    const experiment = makeExperiment([
      makeStep({ id: 'a', inputs: { src: '$steps.b.out' } }),
      makeStep({ id: 'b', inputs: { src: '$steps.a.out' } }),
    ]);
    const result = await validateExperimentDefinition(await contextFor(experiment));
    expect(result.errors.map(e => e.code)).toEqual(['CYCLE_DETECTED']);
  });
});

// =============================================================================
// Method Choices
// =============================================================================

describe('validateMethodChoices', () => {
  const methodsDir = (): string => path.join(project.root, 'methods');

  it('should warn about undeclared, unexpected and missing choices', async () => {
    const experiment = makeExperiment([], {
      lineage: { curiosityRef: '', subQuestion: null, methodRef: '$methods/thermal/buffer_gradient', choices: {} },
      choices: { buffer_method: 'manhattan', extra_choice: true },
    });
    expect(await validateMethodChoices(experiment, methodsDir())).toEqual([
      `Choice 'buffer_method: "manhattan"' not in method options ["euclidean","network"]. Proceeding anyway.`,
      "Choice 'extra_choice' not declared in method 'buffer_gradient'. This may be intentional experimentation.",
      "Method 'buffer_gradient' declares choice 'ring_count', but experiment does not provide it. Default may be used.",
    ]);
  });

  it('should warn about choices named like inherited object keys', async () => {
    const experiment = makeExperiment([], {
      lineage: { curiosityRef: '', subQuestion: null, methodRef: '$methods/thermal/buffer_gradient', choices: {} },
      choices: { buffer_method: 'euclidean', ring_count: 3, toString: 'x' },
    });
    expect(await validateMethodChoices(experiment, methodsDir())).toEqual([
      "Choice 'toString' not declared in method 'buffer_gradient'. This may be intentional experimentation.",
    ]);
  });

  it('should accept declared options', async () => {
    const experiment = makeExperiment([], {
      lineage: { curiosityRef: '', subQuestion: null, methodRef: '$methods/thermal/buffer_gradient', choices: {} },
      choices: { buffer_method: 'network', ring_count: 5 },
    });
    expect(await validateMethodChoices(experiment, methodsDir())).toEqual([]);
  });

  it('should skip when the method is absent', async () => {
    expect(await validateMethodChoices(makeExperiment([]), methodsDir())).toEqual([]);

    const experiment = makeExperiment([], {
      lineage: { curiosityRef: '', subQuestion: null, methodRef: '$methods/thermal/missing', choices: {} },
    });
    const expectedPath = path.join(methodsDir(), 'thermal', 'missing.yml');
    expect(await validateMethodChoices(experiment, methodsDir())).toEqual([
      `Method file not found: ${expectedPath}. Choice validation skipped.`,
    ]);
  });
});
