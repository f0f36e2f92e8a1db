/**
 * Registry Manager - resolve "layer/name" primitive references to a spec
 * and a path under the project root.
 *
 * Each layer keeps its registry in `<projectRoot>/<layer>/_registry.yml`.
 */

import * as path from 'node:path';
import { TrellisError, ERROR_CODES, isTrellisError } from '../errors.js';
import { LAYERS, isLayer, ownEntry } from '../types.js';
import type { Experiment, Layer, PrimitiveSpec } from '../types.js';
import { loadRegistryDocument, fileExists } from './loader.js';

export const REGISTRY_FILE = '_registry.yml';

export interface ResolvedPrimitive {
  /** "<layer>/<spec.path>", relative to the project root */
  path: string;
  spec: PrimitiveSpec;
}

// =============================================================================
// Cache
// =============================================================================

/**
 * Per-layer registry documents, loaded at most once each.
 * Owned by whoever constructs it; share one instance to share the cache.
 */
export class RegistryCache {
  private readonly entries = new Map<string, Promise<Record<string, PrimitiveSpec>>>();
  private loadCount = 0;

  constructor(
    private readonly loader: (registryPath: string) => Promise<Record<string, PrimitiveSpec>> = loadRegistryDocument
  ) {}

  get(registryPath: string): Promise<Record<string, PrimitiveSpec>> {
    let entry = this.entries.get(registryPath);
    if (!entry) {
      this.loadCount++;
      entry = this.loader(registryPath);
      this.entries.set(registryPath, entry);
      // A failed load is retried on the next lookup
      entry.catch(() => this.entries.delete(registryPath));
    }
    return entry;
  }

  /** Number of registry documents read so far */
  get loads(): number {
    return this.loadCount;
  }

  clear(): void {
    this.entries.clear();
  }
}

// =============================================================================
// Manager
// =============================================================================

export class RegistryManager {
  constructor(
    private readonly projectRoot: string,
    private readonly cache: RegistryCache = new RegistryCache()
  ) {}

  registryPath(layer: Layer): string {
    return path.join(this.projectRoot, layer, REGISTRY_FILE);
  }

  async resolvePrimitive(
    primitiveRef: string,
    options: { validateExists?: boolean } = {}
  ): Promise<ResolvedPrimitive> {
    const validateExists = options.validateExists ?? true;
    const parts = primitiveRef.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new TrellisError(
        'ResolutionError',
        ERROR_CODES.E4001,
        `Invalid primitive reference: '${primitiveRef}'. Expected format: 'layer/primitive_name' (e.g., 'roots/generate_buffers')`,
        { value: primitiveRef }
      );
    }

    const [layer, name] = parts;
    if (!isLayer(layer)) {
      throw new TrellisError(
        'ResolutionError',
        ERROR_CODES.E4002,
        `Unknown layer: '${layer}'. Must be one of: ${LAYERS.join(', ')}`,
        { value: layer, available: [...LAYERS] }
      );
    }

    const registry = await this.cache.get(this.registryPath(layer));
    const spec = ownEntry(registry, name);
    if (!spec) {
      const available = Object.keys(registry).sort();
      throw new TrellisError(
        'ResolutionError',
        ERROR_CODES.E4003,
        `Primitive '${name}' not found in ${layer}/${REGISTRY_FILE}. Available: ${available.join(', ')}`,
        { value: name, available }
      );
    }

    const fullPath = `${layer}/${spec.path}`;
    if (validateExists) {
      const absolutePath = path.join(this.projectRoot, fullPath);
      if (!(await fileExists(absolutePath))) {
        throw new TrellisError(
          'ResolutionError',
          ERROR_CODES.E4004,
          `Primitive file not found: ${absolutePath}. Registry entry '${name}' in ${layer}/${REGISTRY_FILE} points to '${spec.path}'`,
          { value: fullPath }
        );
      }
    }

    return { path: fullPath, spec };
  }

  async getSpec(primitiveRef: string): Promise<PrimitiveSpec> {
    return (await this.resolvePrimitive(primitiveRef)).spec;
  }

  async getPath(primitiveRef: string): Promise<string> {
    return (await this.resolvePrimitive(primitiveRef)).path;
  }

  /**
   * Resolve every step's primitive; returns all failures, not just the first.
   */
  async validateAllPrimitives(
    experiment: Experiment,
    options: { validateExists?: boolean } = {}
  ): Promise<TrellisError[]> {
    const errors: TrellisError[] = [];
    for (const step of experiment.steps) {
      try {
        await this.resolvePrimitive(step.primitive, options);
      } catch (e) {
        if (!isTrellisError(e)) throw e;
        errors.push(new TrellisError(e.kind, e.code, `Step '${step.id}': ${e.message}`, {
          ...e.details,
          stepId: step.id,
        }));
      }
    }
    return errors;
  }
}
