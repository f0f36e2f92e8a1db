/**
 * Tests for the document loader
 *
 * - Manifest defaults and availability
 * - Experiment parsing and structural errors
 * - Method, registry and semantic type documents
 */

import * as path from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  loadManifest,
  loadMethod,
  loadYamlDocument,
  parseExperiment,
  parseRegistryDocument,
  parseSemanticTypes,
  resolveMethodPath,
  toJsonValue,
} from './loader.js';
import { isTrellisError } from '../errors.js';
import { catchError, createTestProject, type TestProject } from '../testing/project.js';
import type { JsonObject } from '../types.js';

let project: TestProject;

beforeAll(async () => {
  project = await createTestProject();
});

afterAll(async () => {
  await project.cleanup();
});

// =============================================================================
// Raw Documents
// =============================================================================

describe('loadYamlDocument', () => {
  it('should convert timestamps to ISO strings', () => {
    expect(toJsonValue({ when: new Date('2024-05-01T00:00:00Z'), n: [1, undefined] })).toEqual({
      when: '2024-05-01T00:00:00.000Z',
      n: [1, null],
    });
  });

  it('should reject a document whose top level is not a mapping', async () => {
    const file = await project.write('bad/list.yml', '- a\n- b\n');
    await expect(loadYamlDocument(file)).rejects.toMatchObject({ code: 'MALFORMED_DOCUMENT' });
  });

  it('should reject invalid YAML and unreadable files', async () => {
    const file = await project.write('bad/broken.yml', 'a: [1, 2\n');
    await expect(loadYamlDocument(file)).rejects.toMatchObject({ code: 'MALFORMED_DOCUMENT' });
    await expect(loadYamlDocument(path.join(project.root, 'nope.yml')))
      .rejects.toMatchObject({ code: 'MALFORMED_DOCUMENT' });
  });
});

// =============================================================================
// Manifest
// =============================================================================

describe('loadManifest', () => {
  it('should load available datasets with defaults', async () => {
    const manifest = await loadManifest(project.manifestPath);

    expect(manifest.cityName).toBe('New York');
    expect(manifest.cityId).toBe('nyc');
    expect(manifest.workingCrs).toBe('EPSG:2263');
    expect(manifest.dataDir).toBe(project.dataDir);
    expect(manifest.unavailable).toEqual(['streets']);
    expect(Object.keys(manifest.datasets).sort()).toEqual(['parks', 'trees']);
    expect(manifest.datasets.parks).toEqual({
      name: 'parks',
      path: '.data/parks.geojson',
      semanticType: 'park_boundaries',
      format: 'geojson',
    });
  });

  it('should default cache path and semantic type to the dataset name', async () => {
    const file = await project.writeYaml('plots/bare/manifest.yml', {
      city: { name: 'Bare', id: 'bare' },
      datasets: { canopy: {} },
    });
    const manifest = await loadManifest(file);
    expect(manifest.datasets.canopy).toEqual({
      name: 'canopy',
      path: '.data/canopy.geojson',
      semanticType: 'canopy',
      format: 'geojson',
    });
  });

  it('should require a city', async () => {
    const file = await project.writeYaml('plots/nocity/manifest.yml', { datasets: {} });
    await expect(loadManifest(file)).rejects.toMatchObject({ code: 'MISSING_FIELD' });
  });
});

// =============================================================================
// Experiment
// =============================================================================

function experimentDoc(overrides: JsonObject = {}): JsonObject {
  return {
    id: 'exp_001',
    name: 'Buffer gradient',
    city: 'nyc',
    manifest: 'plots/nyc/manifest.yml',
    curiosity: { ref: 'curiosities/cooling.yml', sub_question: 'How far does cooling reach?' },
    method: { ref: '$methods/thermal/buffer_gradient' },
    choices: { buffer_method: 'euclidean' },
    parameters: { max_distance: 500 },
    steps: [
      {
        id: 'validate',
        primitive: 'soil/validate_vector',
        inputs: { vector: '$manifest.parks' },
        outputs: { validated: 'park_boundaries' },
      },
    ],
    ...overrides,
  };
}

describe('parseExperiment', () => {
  it('should parse lineage, choices and steps', () => {
    const experiment = parseExperiment(experimentDoc(), 'exp.yml');

    expect(experiment.lineage).toEqual({
      curiosityRef: 'curiosities/cooling.yml',
      subQuestion: 'How far does cooling reach?',
      methodRef: '$methods/thermal/buffer_gradient',
      choices: { buffer_method: 'euclidean' },
    });
    expect(experiment.manifestPath).toBe('plots/nyc/manifest.yml');
    expect(experiment.parameters).toEqual({ max_distance: 500 });
    expect(experiment.steps).toEqual([{
      id: 'validate',
      primitive: 'soil/validate_vector',
      version: '1.0.0',
      description: '',
      inputs: { vector: '$manifest.parks' },
      outputs: { validated: 'park_boundaries' },
      params: {},
    }]);
  });

  it('should reject duplicate step ids', () => {
    const step = { id: 'a', primitive: 'roots/make', outputs: { out: 'type1' } };
    const error = catchError(() => parseExperiment(experimentDoc({ steps: [step, step] }), 'exp.yml'));
    expect(isTrellisError(error)).toBe(true);
    if (!isTrellisError(error)) return;
    expect(error.code).toBe('DUPLICATE_STEP_ID');
    expect(error.details.stepId).toBe('a');
  });

  it('should report missing required fields', () => {
    const error = catchError(() => parseExperiment(experimentDoc({ steps: [{ id: 'a' }] }), 'exp.yml'));
    expect(isTrellisError(error) && error.message).toBe("Missing required field 'primitive' in step 'a'");
  });

  it('should require steps to be a list', () => {
    const error = catchError(() => parseExperiment(experimentDoc({ steps: { a: {} } }), 'exp.yml'));
    expect(isTrellisError(error) && error.code).toBe('MALFORMED_DOCUMENT');
  });
});

// =============================================================================
// Method, Registry & Semantic Types
// =============================================================================

describe('methods', () => {
  it('should map method references to files', () => {
    expect(resolveMethodPath('$methods/thermal/buffer_gradient', '/project/methods'))
      .toBe(path.join('/project/methods', 'thermal', 'buffer_gradient.yml'));
    expect(resolveMethodPath('thermal/buffer_gradient.yml', '/m')).toBe(path.join('/m', 'thermal', 'buffer_gradient.yml'));
  });

  it('should default id and name to the file stem', async () => {
    const file = await project.writeYaml('methods/thermal/buffer_gradient.yml', {
      choices: { buffer_method: { options: ['euclidean', 'network'] } },
    });
    expect(await loadMethod(file)).toEqual({
      id: 'buffer_gradient',
      name: 'buffer_gradient',
      choices: {
        buffer_method: { name: 'buffer_method', options: ['euclidean', 'network'], description: '' },
      },
    });
  });
});

describe('parseRegistryDocument', () => {
  it('should parse primitive specs with defaults', () => {
    const specs = parseRegistryDocument({
      primitives: {
        generate_buffers: { path: 'buffers/generate_buffers.R', inputs: ['vector'], passthrough: 'yes' },
      },
    }, 'roots/_registry.yml');
    expect(specs.generate_buffers).toEqual({
      name: 'generate_buffers',
      path: 'buffers/generate_buffers.R',
      version: '1.0.0',
      inputs: ['vector'],
      outputs: {},
      params: {},
      passthrough: false,
    });
  });

  it('should require a path', () => {
    const error = catchError(() => parseRegistryDocument({ primitives: { x: { version: '1.0.0' } } }, 'r.yml'));
    expect(isTrellisError(error) && error.code).toBe('MISSING_FIELD');
  });
});

describe('parseSemanticTypes', () => {
  it('should keep unknown keys as extras', () => {
    const types = parseSemanticTypes({
      types: { buffers: { category: 'vector', format: 'geojson', crs_required: true } },
    }, 'types.yml');
    expect(types.buffers).toEqual({
      name: 'buffers',
      category: 'vector',
      format: 'geojson',
      description: '',
      extra: { crs_required: true },
    });
  });
});
