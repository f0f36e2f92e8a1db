/**
 * Primitive Runner - execute a primitive as a subprocess.
 *
 * Contract: `<interpreter> <primitive> <inputs.json> <output path> <params.json>`.
 * The process prints a single JSON object on stdout; a non-zero exit
 * carries `error` and `message` fields.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { execa } from 'execa';
import { ERROR_CODES } from '../errors.js';
import { isJsonObject, ownEntry } from '../types.js';
import type {
  JsonObject,
  PrimitiveExecutionPort,
  PrimitiveInvocation,
  PrimitiveOutcome,
  PrimitiveWarningReport,
  WarningLevel,
} from '../types.js';
import { toJsonValue } from './loader.js';

export const DEFAULT_INTERPRETERS: Record<string, string> = {
  '.R': 'Rscript',
  '.py': 'python3',
  '.js': 'node',
  '.mjs': 'node',
  '.sh': 'bash',
};

const WARNING_LEVELS: WarningLevel[] = ['info', 'warning', 'critical'];

export interface SubprocessRunnerOptions {
  projectRoot: string;
  /** Extension -> interpreter; extensions not listed are executed directly */
  interpreters?: Record<string, string>;
  timeoutMs?: number;
  verbose?: boolean;
}

// =============================================================================
// Response Parsing
// =============================================================================

function parseWarnings(response: JsonObject): PrimitiveWarningReport[] {
  const raw = response.warnings;
  if (!Array.isArray(raw)) return [];
  const warnings: PrimitiveWarningReport[] = [];
  for (const item of raw) {
    if (typeof item === 'string') {
      warnings.push({ level: 'warning', message: item });
    } else if (isJsonObject(item)) {
      warnings.push({
        level: WARNING_LEVELS.find(l => l === item.level) ?? 'warning',
        message: typeof item.message === 'string' ? item.message : JSON.stringify(item),
      });
    }
  }
  return warnings;
}

/**
 * Interpret a primitive's stdout and exit code.
 */
export function parsePrimitiveResponse(stdout: string, stderr: string, exitCode: number): PrimitiveOutcome {
  const text = stdout.trim();
  let response: JsonObject = {};
  if (text) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return {
        ok: false,
        error: {
          code: ERROR_CODES.E5001,
          message: `Primitive returned non-JSON output: ${text.slice(0, 200)}`,
        },
        warnings: [],
      };
    }
    const value = toJsonValue(parsed);
    if (!isJsonObject(value)) {
      return {
        ok: false,
        error: { code: ERROR_CODES.E5001, message: 'Primitive output must be a JSON object' },
        warnings: [],
      };
    }
    response = value;
  }

  const warnings = parseWarnings(response);
  if (exitCode !== 0) {
    const message = typeof response.message === 'string'
      ? response.message
      : stderr.trim() || 'Primitive failed';
    return {
      ok: false,
      error: {
        code: ERROR_CODES.E5002,
        message,
        ...(typeof response.error === 'string' ? { reported: response.error } : {}),
      },
      warnings,
    };
  }

  return { ok: true, metadata: response, warnings };
}

// =============================================================================
// Subprocess Port
// =============================================================================

export class SubprocessPrimitiveRunner implements PrimitiveExecutionPort {
  private readonly interpreters: Record<string, string>;

  constructor(private readonly options: SubprocessRunnerOptions) {
    this.interpreters = { ...DEFAULT_INTERPRETERS, ...options.interpreters };
  }

  /** [command, ...args] used to launch a primitive */
  commandFor(primitiveFile: string, args: string[]): [string, string[]] {
    const interpreter = ownEntry(this.interpreters, path.extname(primitiveFile));
    return interpreter ? [interpreter, [primitiveFile, ...args]] : [primitiveFile, args];
  }

  async execute(invocation: PrimitiveInvocation): Promise<PrimitiveOutcome> {
    const primitiveFile = path.resolve(this.options.projectRoot, invocation.primitivePath);
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'trellis-'));

    try {
      const inputsFile = path.join(tempDir, 'inputs.json');
      const paramsFile = path.join(tempDir, 'params.json');
      await fs.writeFile(inputsFile, JSON.stringify(invocation.inputs), 'utf-8');
      await fs.writeFile(paramsFile, JSON.stringify(invocation.params), 'utf-8');

      const [command, args] = this.commandFor(primitiveFile, [inputsFile, invocation.outputPath, paramsFile]);
      if (this.options.verbose) {
        console.error(`[trellis] ${command} ${args.join(' ')}`);
      }

      const result = await execa(command, args, {
        cwd: this.options.projectRoot,
        reject: false,
        timeout: this.options.timeoutMs,
      });

      if (result.timedOut) {
        return {
          ok: false,
          error: {
            code: ERROR_CODES.E5004,
            message: `Primitive ${invocation.primitivePath} timed out after ${this.options.timeoutMs}ms`,
          },
          warnings: [],
        };
      }
      if (result.signal) {
        return {
          ok: false,
          error: {
            code: ERROR_CODES.E5005,
            message: `Primitive ${invocation.primitivePath} was terminated by ${result.signal}`,
          },
          warnings: [],
        };
      }
      if (typeof result.exitCode !== 'number') {
        return {
          ok: false,
          error: {
            code: ERROR_CODES.E5003,
            message: `Failed to start ${command} for primitive ${invocation.primitivePath}`,
          },
          warnings: [],
        };
      }

      return parsePrimitiveResponse(result.stdout, result.stderr, result.exitCode);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }
}
