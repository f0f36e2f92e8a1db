/**
 * Document Loader - Parse manifest, experiment, method, registry and
 * semantic type YAML documents into typed entities.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { TrellisError, ERROR_CODES } from '../errors.js';
import { isJsonObject } from '../types.js';
import type {
  JsonObject,
  JsonValue,
  Manifest,
  ManifestDataset,
  Experiment,
  StepDefinition,
  Method,
  MethodChoice,
  PrimitiveSpec,
  SemanticType,
} from '../types.js';

// =============================================================================
// Raw Document Access
// =============================================================================

/**
 * Convert a js-yaml value into the closed JSON value type.
 * Timestamps become ISO strings; anything non-representable becomes null.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  return null;
}

function malformed(message: string, filePath: string): TrellisError {
  return new TrellisError('StructuralParseError', ERROR_CODES.E1001, message, { value: filePath });
}

function missingField(field: string, context: string): TrellisError {
  return new TrellisError(
    'StructuralParseError',
    ERROR_CODES.E1002,
    `Missing required field '${field}' in ${context}`,
    { value: field, context }
  );
}

/**
 * Read a YAML file whose top level must be a mapping.
 */
export async function loadYamlDocument(filePath: string): Promise<JsonObject> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    throw malformed(`Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`, filePath);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e) {
    throw malformed(`Invalid YAML in ${filePath}: ${e instanceof Error ? e.message : String(e)}`, filePath);
  }

  const doc = toJsonValue(parsed);
  if (!isJsonObject(doc)) {
    throw malformed(`Expected a mapping at the top of ${filePath}`, filePath);
  }
  return doc;
}

// =============================================================================
// Field Helpers
// =============================================================================

function requireString(doc: JsonObject, key: string, context: string): string {
  const value = doc[key];
  if (value === undefined || value === null || value === '') {
    throw missingField(key, context);
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1001,
      `Field '${key}' in ${context} must be a string`,
      { value: key, context }
    );
  }
  return String(value);
}

function optionalString(doc: JsonObject, key: string, fallback: string): string {
  const value = doc[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

function optionalObject(doc: JsonObject, key: string, context: string): JsonObject {
  const value = doc[key];
  if (value === undefined || value === null) return {};
  if (!isJsonObject(value)) {
    throw new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1001,
      `Field '${key}' in ${context} must be a mapping`,
      { value: key, context }
    );
  }
  return value;
}

function stringMap(doc: JsonObject, key: string, context: string): Record<string, string> {
  const section = optionalObject(doc, key, context);
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(section)) {
    if (typeof value !== 'string') {
      throw new TrellisError(
        'StructuralParseError',
        ERROR_CODES.E1001,
        `Entry '${key}.${name}' in ${context} must be a string`,
        { value: name, context }
      );
    }
    result[name] = value;
  }
  return result;
}

// =============================================================================
// Manifest
// =============================================================================

export function parseManifest(doc: JsonObject, manifestPath: string): Manifest {
  const context = `manifest ${manifestPath}`;
  const city = optionalObject(doc, 'city', context);
  if (Object.keys(city).length === 0) {
    throw missingField('city', context);
  }
  const crs = optionalObject(doc, 'crs', context);

  const datasets: Record<string, ManifestDataset> = {};
  const unavailable: string[] = [];
  for (const [name, raw] of Object.entries(optionalObject(doc, 'datasets', context))) {
    const entry = isJsonObject(raw) ? raw : {};
    if (entry.available === false) {
      unavailable.push(name);
      continue;
    }
    const cache = optionalObject(entry, 'cache', `dataset '${name}'`);
    datasets[name] = {
      name,
      path: optionalString(cache, 'path', `.data/${name}.geojson`),
      semanticType: optionalString(entry, 'semantic_type', name),
      format: optionalString(entry, 'format', 'geojson'),
    };
  }

  return {
    cityName: requireString(city, 'name', `${context} city`),
    cityId: requireString(city, 'id', `${context} city`),
    workingCrs: typeof crs.working === 'string' ? crs.working : undefined,
    datasets,
    unavailable,
    dataDir: path.dirname(path.resolve(manifestPath)),
  };
}

export async function loadManifest(manifestPath: string): Promise<Manifest> {
  return parseManifest(await loadYamlDocument(manifestPath), manifestPath);
}

// =============================================================================
// Experiment
// =============================================================================

function parseStep(raw: JsonValue, index: number, context: string): StepDefinition {
  if (!isJsonObject(raw)) {
    throw new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1004,
      `Step #${index + 1} in ${context} must be a mapping`,
      { context }
    );
  }
  const stepContext = `step #${index + 1} of ${context}`;
  const id = requireString(raw, 'id', stepContext);
  const where = `step '${id}'`;

  return {
    id,
    primitive: requireString(raw, 'primitive', where),
    version: optionalString(raw, 'version', '1.0.0'),
    description: optionalString(raw, 'description', ''),
    inputs: stringMap(raw, 'inputs', where),
    outputs: stringMap(raw, 'outputs', where),
    params: optionalObject(raw, 'params', where),
  };
}

export function parseExperiment(doc: JsonObject, experimentPath: string): Experiment {
  const context = `experiment ${experimentPath}`;
  const curiosity = optionalObject(doc, 'curiosity', context);
  const method = optionalObject(doc, 'method', context);
  const choices = optionalObject(doc, 'choices', context);

  const rawSteps = doc.steps ?? [];
  if (!Array.isArray(rawSteps)) {
    throw new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1001,
      `Field 'steps' in ${context} must be a list`,
      { value: 'steps', context }
    );
  }

  const steps = rawSteps.map((raw, i) => parseStep(raw, i, context));
  const seen = new Set<string>();
  for (const step of steps) {
    if (seen.has(step.id)) {
      throw new TrellisError(
        'StructuralParseError',
        ERROR_CODES.E1003,
        `Duplicate step id '${step.id}' in ${context}`,
        { value: step.id, stepId: step.id, context }
      );
    }
    seen.add(step.id);
  }

  const subQuestion = curiosity.sub_question;
  return {
    id: requireString(doc, 'id', context),
    name: requireString(doc, 'name', context),
    description: optionalString(doc, 'description', ''),
    lineage: {
      curiosityRef: optionalString(curiosity, 'ref', ''),
      subQuestion: typeof subQuestion === 'string' ? subQuestion : null,
      methodRef: optionalString(method, 'ref', ''),
      choices,
    },
    city: requireString(doc, 'city', context),
    manifestPath: requireString(doc, 'manifest', context),
    choices,
    parameters: optionalObject(doc, 'parameters', context),
    steps,
  };
}

export async function loadExperiment(experimentPath: string): Promise<Experiment> {
  return parseExperiment(await loadYamlDocument(experimentPath), experimentPath);
}

// =============================================================================
// Method
// =============================================================================

/**
 * Map a method reference ("$methods/thermal/buffer_gradient") to its file.
 */
export function resolveMethodPath(methodRef: string, methodsDir: string): string {
  let ref = methodRef.startsWith('$methods/') ? methodRef.slice('$methods/'.length) : methodRef;
  if (!ref.endsWith('.yml')) {
    ref = `${ref}.yml`;
  }
  return path.join(methodsDir, ref);
}

export async function loadMethod(methodPath: string): Promise<Method> {
  const doc = await loadYamlDocument(methodPath);
  const stem = path.basename(methodPath, path.extname(methodPath));
  const context = `method ${methodPath}`;

  const choices: Record<string, MethodChoice> = {};
  for (const [name, raw] of Object.entries(optionalObject(doc, 'choices', context))) {
    const entry = isJsonObject(raw) ? raw : {};
    const options = entry.options;
    choices[name] = {
      name,
      options: Array.isArray(options) ? options : [],
      description: optionalString(entry, 'description', ''),
    };
  }

  return {
    id: optionalString(doc, 'id', stem),
    name: optionalString(doc, 'name', stem),
    choices,
  };
}

// =============================================================================
// Registry & Semantic Types
// =============================================================================

export function parseRegistryDocument(doc: JsonObject, registryPath: string): Record<string, PrimitiveSpec> {
  const context = `registry ${registryPath}`;
  const specs: Record<string, PrimitiveSpec> = {};

  for (const [name, raw] of Object.entries(optionalObject(doc, 'primitives', context))) {
    if (!isJsonObject(raw)) {
      throw new TrellisError(
        'StructuralParseError',
        ERROR_CODES.E1001,
        `Primitive '${name}' in ${context} must be a mapping`,
        { value: name, context }
      );
    }
    const where = `primitive '${name}' of ${context}`;
    const inputs = raw.inputs;
    specs[name] = {
      name,
      path: requireString(raw, 'path', where),
      version: optionalString(raw, 'version', '1.0.0'),
      inputs: Array.isArray(inputs) ? inputs : [],
      outputs: optionalObject(raw, 'outputs', where),
      params: optionalObject(raw, 'params', where),
      passthrough: raw.passthrough === true,
    };
  }
  return specs;
}

export async function loadRegistryDocument(registryPath: string): Promise<Record<string, PrimitiveSpec>> {
  return parseRegistryDocument(await loadYamlDocument(registryPath), registryPath);
}

const SEMANTIC_TYPE_FIELDS = new Set(['category', 'format', 'description']);

export function parseSemanticTypes(doc: JsonObject, typesPath: string): Record<string, SemanticType> {
  const context = `semantic types ${typesPath}`;
  const types: Record<string, SemanticType> = {};

  for (const [name, raw] of Object.entries(optionalObject(doc, 'types', context))) {
    const entry = isJsonObject(raw) ? raw : {};
    const where = `semantic type '${name}'`;
    const extra: JsonObject = {};
    for (const [key, value] of Object.entries(entry)) {
      if (!SEMANTIC_TYPE_FIELDS.has(key)) extra[key] = value;
    }
    types[name] = {
      name,
      category: requireString(entry, 'category', where),
      format: requireString(entry, 'format', where),
      description: optionalString(entry, 'description', ''),
      extra,
    };
  }
  return types;
}

export async function loadSemanticTypes(typesPath: string): Promise<Record<string, SemanticType>> {
  return parseSemanticTypes(await loadYamlDocument(typesPath), typesPath);
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
