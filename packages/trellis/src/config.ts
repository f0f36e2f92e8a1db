/**
 * Configuration - explicit options, then environment, then defaults.
 *
 * Environment variables:
 *   TRELLIS_PROJECT_ROOT    - project root (default: cwd)
 *   TRELLIS_PROFILE         - hashing profile: full | dev | test
 *   TRELLIS_LOG_DIR         - run log directory
 *   TRELLIS_MAX_CONCURRENCY - steps allowed to run at once (default: 1)
 *   TRELLIS_TIMEOUT_MS      - per-primitive timeout in milliseconds
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { TrellisError, ERROR_CODES } from './errors.js';
import type { HashProfile } from './types.js';

export interface TrellisOptions {
  projectRoot?: string;
  profile?: string;
  semanticTypesPath?: string;
  methodsDir?: string;
  logDir?: string;
  schemaDir?: string;
  outputDir?: string;
  envelopeDir?: string;
  maxConcurrency?: number;
  timeoutMs?: number;
  verbose?: boolean;
}

export interface TrellisConfig {
  projectRoot: string;
  profile: HashProfile;
  semanticTypesPath: string;
  methodsDir: string;
  logDir: string;
  schemaDir: string;
  /** Unset means "<manifest dir>/.data" */
  outputDir?: string;
  /** Unset means "<manifest dir>/.envelopes" */
  envelopeDir?: string;
  maxConcurrency: number;
  timeoutMs?: number;
  verbose: boolean;
}

const PROFILES: HashProfile[] = ['full', 'dev', 'test'];

/** Directory holding the bundled envelope schema */
export function getDefaultSchemaDir(): string {
  return fileURLToPath(new URL('../schemas/', import.meta.url));
}

function parseProfile(raw: string): HashProfile {
  const match = PROFILES.find(p => p === raw);
  if (!match) {
    throw new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1005,
      `Invalid profile: ${raw}. Must be one of: ${PROFILES.join(', ')}`,
      { value: raw, available: PROFILES }
    );
  }
  return match;
}

function parsePositiveInteger(raw: number | string, name: string): number {
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new TrellisError(
      'StructuralParseError',
      ERROR_CODES.E1005,
      `Invalid ${name}: ${raw}. Must be a positive integer`,
      { value: String(raw) }
    );
  }
  return value;
}

export function resolveConfig(
  options: TrellisOptions = {},
  env: NodeJS.ProcessEnv = process.env
): TrellisConfig {
  const projectRoot = path.resolve(options.projectRoot ?? env.TRELLIS_PROJECT_ROOT ?? process.cwd());
  const profile = parseProfile(options.profile ?? env.TRELLIS_PROFILE ?? 'full');

  const rawConcurrency = options.maxConcurrency ?? env.TRELLIS_MAX_CONCURRENCY;
  const maxConcurrency = rawConcurrency === undefined
    ? 1
    : parsePositiveInteger(rawConcurrency, 'maxConcurrency');

  const rawTimeout = options.timeoutMs ?? env.TRELLIS_TIMEOUT_MS;
  const timeoutMs = rawTimeout === undefined ? undefined : parsePositiveInteger(rawTimeout, 'timeoutMs');

  return {
    projectRoot,
    profile,
    semanticTypesPath: path.resolve(
      projectRoot,
      options.semanticTypesPath ?? path.join('schemas', 'semantic_types.yml')
    ),
    methodsDir: path.resolve(projectRoot, options.methodsDir ?? 'methods'),
    logDir: path.resolve(projectRoot, options.logDir ?? env.TRELLIS_LOG_DIR ?? path.join('logs', 'runs')),
    schemaDir: options.schemaDir ? path.resolve(projectRoot, options.schemaDir) : getDefaultSchemaDir(),
    outputDir: options.outputDir ? path.resolve(projectRoot, options.outputDir) : undefined,
    envelopeDir: options.envelopeDir ? path.resolve(projectRoot, options.envelopeDir) : undefined,
    maxConcurrency,
    timeoutMs,
    verbose: options.verbose ?? false,
  };
}
