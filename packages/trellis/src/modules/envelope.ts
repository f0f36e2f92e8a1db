/**
 * Envelope I/O - document conversion, schema validation, read and write.
 *
 * In memory an Envelope is camelCase; the persisted document is snake_case
 * and validated against schemas/envelope.schema.json.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import _Ajv from 'ajv';
import _addFormats from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { TrellisError, ERROR_CODES } from '../errors.js';
import { isJsonObject } from '../types.js';
import type {
  Envelope,
  EnvelopeWarning,
  HashInfo,
  HashMethod,
  InputRecord,
  JsonObject,
  JsonValue,
  LineageRecord,
  ProvenanceEntry,
  WarningLevel,
} from '../types.js';
import { toJsonValue } from './loader.js';

const Ajv = _Ajv.default;
const addFormats = _addFormats.default;

export const ENVELOPE_SCHEMA_FILE = 'envelope.schema.json';

/** Metadata keys owned by the Envelope itself, never carried in `extra` */
export const RESERVED_METADATA_FIELDS: ReadonlySet<string> = new Set(['semantic_type', 'data_category', 'lineage']);

export class EnvelopeValidationError extends TrellisError {
  readonly errors: string[];

  constructor(message: string, errors: string[], value?: string) {
    super('EnvelopeValidationError', ERROR_CODES.E6001, message, { value });
    this.errors = errors;
  }
}

// =============================================================================
// Document Conversion
// =============================================================================

function hashToDocument(hash: HashInfo): JsonObject {
  const doc: JsonObject = {};
  if (hash.value !== undefined) doc.value = hash.value;
  doc.method = hash.method;
  if (hash.algorithm !== undefined) doc.algorithm = hash.algorithm;
  if (hash.reason !== undefined) doc.reason = hash.reason;
  return doc;
}

function lineageToDocument(lineage: LineageRecord): JsonObject {
  return {
    curiosity: lineage.curiosity,
    sub_question: lineage.subQuestion,
    method: lineage.method,
    choices: lineage.choices,
    parameters: lineage.parameters,
  };
}

export function provenanceEntryToDocument(entry: ProvenanceEntry): JsonObject {
  return {
    primitive: entry.primitive,
    version: entry.version,
    timestamp: entry.timestamp,
    params: entry.params,
    inputs: entry.inputs.map(input => ({
      name: input.name,
      semantic_type: input.semanticType,
      path: input.path,
      hash: hashToDocument(input.hash),
    })),
    duration_seconds: entry.durationSeconds,
    lineage_branch: entry.lineageBranch,
  };
}

export function envelopeToDocument(envelope: Envelope): JsonObject {
  const metadata: JsonObject = {
    ...envelope.metadata.extra,
    semantic_type: envelope.metadata.semanticType,
    data_category: envelope.metadata.dataCategory,
  };
  if (envelope.metadata.lineage) {
    metadata.lineage = lineageToDocument(envelope.metadata.lineage);
  }

  return {
    data: {
      path: envelope.data.path,
      format: envelope.data.format,
      secondary: envelope.data.secondary,
    },
    metadata,
    provenance: envelope.provenance.map(provenanceEntryToDocument),
    warnings: envelope.warnings.map(w => ({
      level: w.level,
      primitive: w.primitive,
      message: w.message,
    })),
  };
}

// Readers below default missing fields instead of throwing.

function str(value: JsonValue | undefined, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function optionalStr(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function obj(value: JsonValue | undefined): JsonObject {
  return isJsonObject(value) ? value : {};
}

function list(value: JsonValue | undefined): JsonValue[] {
  return Array.isArray(value) ? value : [];
}

const HASH_METHODS: HashMethod[] = ['full_file', 'metadata', 'skipped'];
const WARNING_LEVELS: WarningLevel[] = ['info', 'warning', 'critical'];

function hashFromDocument(value: JsonValue | undefined): HashInfo {
  const doc = obj(value);
  const method = HASH_METHODS.find(m => m === doc.method) ?? 'skipped';
  const hash: HashInfo = { method };
  const hashValue = optionalStr(doc.value);
  const algorithm = optionalStr(doc.algorithm);
  const reason = optionalStr(doc.reason);
  if (hashValue !== undefined) hash.value = hashValue;
  if (algorithm !== undefined) hash.algorithm = algorithm;
  if (reason !== undefined) hash.reason = reason;
  return hash;
}

function inputFromDocument(value: JsonValue): InputRecord {
  const doc = obj(value);
  return {
    name: str(doc.name),
    semanticType: str(doc.semantic_type),
    path: str(doc.path),
    hash: hashFromDocument(doc.hash),
  };
}

export function provenanceEntryFromDocument(value: JsonValue): ProvenanceEntry {
  const doc = obj(value);
  const duration = doc.duration_seconds;
  return {
    primitive: str(doc.primitive),
    version: str(doc.version),
    timestamp: str(doc.timestamp),
    params: obj(doc.params),
    inputs: list(doc.inputs).map(inputFromDocument),
    durationSeconds: typeof duration === 'number' ? duration : 0,
    lineageBranch: optionalStr(doc.lineage_branch) ?? null,
  };
}

function warningFromDocument(value: JsonValue): EnvelopeWarning {
  const doc = obj(value);
  return {
    level: WARNING_LEVELS.find(l => l === doc.level) ?? 'warning',
    primitive: str(doc.primitive),
    message: str(doc.message),
  };
}

function lineageFromDocument(value: JsonValue | undefined): LineageRecord | undefined {
  if (!isJsonObject(value)) return undefined;
  return {
    curiosity: str(value.curiosity),
    subQuestion: optionalStr(value.sub_question) ?? null,
    method: str(value.method),
    choices: obj(value.choices),
    parameters: obj(value.parameters),
  };
}

export function envelopeFromDocument(doc: JsonObject): Envelope {
  const data = obj(doc.data);
  const metadata = obj(doc.metadata);

  const extra: JsonObject = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (!RESERVED_METADATA_FIELDS.has(key)) {
      extra[key] = value;
    }
  }
  const lineage = lineageFromDocument(metadata.lineage);

  return {
    data: {
      path: str(data.path),
      format: str(data.format),
      secondary: obj(data.secondary),
    },
    metadata: {
      semanticType: str(metadata.semantic_type),
      dataCategory: str(metadata.data_category),
      ...(lineage ? { lineage } : {}),
      extra,
    },
    provenance: list(doc.provenance).map(provenanceEntryFromDocument),
    warnings: list(doc.warnings).map(warningFromDocument),
  };
}

// =============================================================================
// Schema Validation
// =============================================================================

function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath
    ? error.instancePath.slice(1).split('/').join(' → ')
    : '(root)';
  return `${location}: ${error.message ?? 'invalid'}`;
}

/**
 * Compiles the envelope schema once per instance.
 */
export class EnvelopeSchemaValidator {
  private compiled: Promise<ValidateFunction> | null = null;

  constructor(readonly schemaDir: string) {}

  get schemaPath(): string {
    return path.join(this.schemaDir, ENVELOPE_SCHEMA_FILE);
  }

  private compile(): Promise<ValidateFunction> {
    if (!this.compiled) {
      this.compiled = (async () => {
        const schema: unknown = JSON.parse(await fs.readFile(this.schemaPath, 'utf-8'));
        if (!isJsonObject(schema)) {
          throw new Error(`Schema at ${this.schemaPath} is not an object`);
        }
        const ajv = new Ajv({ allErrors: true, strict: false });
        addFormats(ajv);
        return ajv.compile(schema);
      })();
    }
    return this.compiled;
  }

  /**
   * Validation messages for a document (empty when valid).
   */
  async validate(doc: JsonValue): Promise<string[]> {
    const validate = await this.compile();
    if (validate(doc)) return [];
    return (validate.errors ?? []).map(formatSchemaError);
  }
}

// =============================================================================
// Read / Write
// =============================================================================

export interface ReadEnvelopeOptions {
  validator?: EnvelopeSchemaValidator;
  onWarning?: (message: string) => void;
}

/**
 * Read an envelope; schema violations are reported, not thrown.
 */
export async function readEnvelope(filePath: string, options: ReadEnvelopeOptions = {}): Promise<Envelope> {
  const parsed = toJsonValue(JSON.parse(await fs.readFile(filePath, 'utf-8')));
  if (!isJsonObject(parsed)) {
    throw new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1001,
      `Envelope at ${filePath} is not a JSON object`,
      { value: filePath }
    );
  }

  if (options.validator) {
    const errors = await options.validator.validate(parsed);
    if (errors.length > 0) {
      const onWarning = options.onWarning ?? ((message: string) => console.warn(`[trellis] ${message}`));
      onWarning(`Envelope at ${filePath} has validation issues:\n${errors.map(e => `  - ${e}`).join('\n')}`);
    }
  }
  return envelopeFromDocument(parsed);
}

/**
 * Validate and write an envelope. Nothing is written when validation fails.
 */
export async function writeEnvelope(
  envelope: Envelope,
  filePath: string,
  options: { validator?: EnvelopeSchemaValidator } = {}
): Promise<void> {
  const doc = envelopeToDocument(envelope);
  if (options.validator) {
    await assertValidDocument(doc, options.validator, filePath);
  }
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(doc, null, 2) + '\n', 'utf-8');
}

/** Throws EnvelopeValidationError listing every schema violation. */
export async function assertValidDocument(
  doc: JsonValue,
  validator: EnvelopeSchemaValidator,
  label: string
): Promise<void> {
  const errors = await validator.validate(doc);
  if (errors.length > 0) {
    throw new EnvelopeValidationError(
      `Envelope validation failed for ${label}:\n${errors.map(e => `  - ${e}`).join('\n')}`,
      errors,
      label
    );
  }
}
