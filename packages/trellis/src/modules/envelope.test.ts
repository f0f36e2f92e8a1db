/**
 * Tests for envelope conversion, schema validation and I/O
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  EnvelopeSchemaValidator,
  assertValidDocument,
  EnvelopeValidationError,
  envelopeFromDocument,
  envelopeToDocument,
  readEnvelope,
  writeEnvelope,
} from './envelope.js';
import { getDefaultSchemaDir } from '../config.js';
import { fileExists } from './loader.js';
import { makeEnvelope } from '../testing/project.js';
import type { Envelope } from '../types.js';

function richEnvelope(): Envelope {
  return makeEnvelope('/data/out/buffer_buffers.geojson', 'buffers', {
    metadata: {
      semanticType: 'buffers',
      dataCategory: 'vector',
      lineage: {
        curiosity: 'curiosities/cooling.yml',
        subQuestion: null,
        method: '$methods/thermal/buffer_gradient',
        choices: { buffer_method: 'euclidean' },
        parameters: { max_distance: 500 },
      },
      extra: { crs: 'EPSG:4326', feature_count: 12 },
    },
    provenance: [{
      primitive: 'generate_buffers',
      version: '1.0.0',
      timestamp: '2024-05-01T12:00:00.000Z',
      params: { distances: [100, 200] },
      inputs: [{
        name: 'parks',
        semanticType: 'park_boundaries',
        path: '/data/parks.geojson',
        hash: { value: 'abc123', method: 'full_file', algorithm: 'sha256' },
      }],
      durationSeconds: 1.25,
      lineageBranch: 'parks',
    }],
    warnings: [{ level: 'info', primitive: 'generate_buffers', message: '2 rings generated' }],
  });
}

// =============================================================================
// Document Conversion
// =============================================================================

describe('envelope documents', () => {
  it('should flatten metadata extras into snake_case metadata', () => {
    const doc = envelopeToDocument(richEnvelope());
    expect(doc.metadata).toEqual({
      crs: 'EPSG:4326',
      feature_count: 12,
      semantic_type: 'buffers',
      data_category: 'vector',
      lineage: {
        curiosity: 'curiosities/cooling.yml',
        sub_question: null,
        method: '$methods/thermal/buffer_gradient',
        choices: { buffer_method: 'euclidean' },
        parameters: { max_distance: 500 },
      },
    });
  });

  it('should convert back to the same envelope', () => {
    const envelope = richEnvelope();
    expect(envelopeFromDocument(envelopeToDocument(envelope))).toEqual(envelope);
  });

  it('should omit absent hash fields', () => {
    const envelope = makeEnvelope('/data/x.geojson');
    envelope.provenance[0].inputs = [{
      name: 'x',
      semanticType: 'type1',
      path: '/data/in.geojson',
      hash: { method: 'skipped', reason: 'test profile' },
    }];
    const doc = envelopeToDocument(envelope);
    expect(doc.provenance).toEqual([{
      primitive: 'make',
      version: '1.0.0',
      timestamp: '2024-05-01T12:00:00.000Z',
      params: {},
      inputs: [{
        name: 'x',
        semantic_type: 'type1',
        path: '/data/in.geojson',
        hash: { method: 'skipped', reason: 'test profile' },
      }],
      duration_seconds: 0.5,
      lineage_branch: null,
    }]);
  });
});

// =============================================================================
// Schema Validation
// =============================================================================

describe('EnvelopeSchemaValidator', () => {
  const validator = new EnvelopeSchemaValidator(getDefaultSchemaDir());

  it('should accept a well-formed envelope', async () => {
    expect(await validator.validate(envelopeToDocument(richEnvelope()))).toEqual([]);
  });

  it('should report nested locations', async () => {
    const envelope = makeEnvelope('/data/x.geojson');
    envelope.provenance[0].durationSeconds = -1;
    expect(await validator.validate(envelopeToDocument(envelope))).toEqual([
      'provenance → 0 → duration_seconds: must be >= 0',
    ]);
  });
});

// =============================================================================
// Read / Write
// =============================================================================

describe('readEnvelope / writeEnvelope', () => {
  const validator = new EnvelopeSchemaValidator(getDefaultSchemaDir());
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trellis-envelope-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write and read back an envelope', async () => {
    const file = path.join(dir, 'nested', 'buffer_buffers.envelope.json');
    const envelope = richEnvelope();
    await writeEnvelope(envelope, file, { validator });

    const messages: string[] = [];
    const read = await readEnvelope(file, { validator, onWarning: m => messages.push(m) });
    expect(read).toEqual(envelope);
    expect(messages).toEqual([]);
  });

  it('should warn once and default missing warnings on read', async () => {
    const file = path.join(dir, 'legacy.envelope.json');
    const doc = envelopeToDocument(makeEnvelope('/data/x.geojson'));
    delete doc.warnings;
    await fs.writeFile(file, JSON.stringify(doc), 'utf-8');

    const messages: string[] = [];
    const read = await readEnvelope(file, { validator, onWarning: m => messages.push(m) });

    expect(read.warnings).toEqual([]);
    expect(messages).toEqual([
      `Envelope at ${file} has validation issues:\n  - (root): must have required property 'warnings'`,
    ]);
  });

  it('should reject the same document when asserted before a write', async () => {
    const doc = envelopeToDocument(makeEnvelope('/data/x.geojson'));
    delete doc.warnings;
    await expect(assertValidDocument(doc, validator, 'legacy')).rejects.toBeInstanceOf(EnvelopeValidationError);
  });

  it('should refuse to write an invalid envelope', async () => {
    const file = path.join(dir, 'bad.envelope.json');
    const envelope = makeEnvelope('/data/x.geojson', 'type1', { provenance: [] });

    const error = await writeEnvelope(envelope, file, { validator }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EnvelopeValidationError);
    if (!(error instanceof EnvelopeValidationError)) return;
    expect(error.code).toBe('SCHEMA_VIOLATION');
    expect(error.errors).toEqual(['provenance: must NOT have fewer than 1 items']);
    expect(await fileExists(file)).toBe(false);
  });

  it('should reject a document that is not an object', async () => {
    const file = path.join(dir, 'list.envelope.json');
    await fs.writeFile(file, '[]', 'utf-8');
    await expect(readEnvelope(file)).rejects.toMatchObject({ code: 'MALFORMED_DOCUMENT' });
  });
});
