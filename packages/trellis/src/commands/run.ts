/**
 * trellis run - Execute an experiment
 */

import type { CommandContext, CommandResult } from '../types.js';
import { runExperiment } from '../modules/index.js';

export interface RunOptions {
  profile?: string;
  /** Project root (default: cwd) */
  root?: string;
  concurrency?: number;
  /** Per-primitive timeout in milliseconds */
  timeout?: number;
}

export interface RunSummary {
  success: boolean;
  completedSteps: string[];
  failedStep: string | null;
  /** Sink step id -> data path */
  outputs: Record<string, string>;
  warnings: string[];
  error?: string;
  runLog?: string;
}

export async function run(
  experimentPath: string,
  ctx: CommandContext,
  options: RunOptions = {}
): Promise<CommandResult<RunSummary>> {
  try {
    const result = await runExperiment(experimentPath, {
      projectRoot: options.root ?? ctx.cwd,
      profile: options.profile,
      maxConcurrency: options.concurrency,
      timeoutMs: options.timeout,
      verbose: ctx.verbose,
    });

    const outputs: Record<string, string> = {};
    for (const [stepId, envelope] of Object.entries(result.finalEnvelopes)) {
      outputs[stepId] = envelope.data.path;
    }

    const summary: RunSummary = {
      success: result.success,
      completedSteps: result.completedSteps,
      failedStep: result.failedStep,
      outputs,
      warnings: result.warnings,
      ...(result.error ? { error: result.error } : {}),
      ...(result.runLogPath ? { runLog: result.runLogPath } : {}),
    };

    return {
      success: result.success,
      data: summary,
      ...(result.error ? { error: result.error } : {}),
    };
  } catch (e) {
    return {
      success: false,
      error: e instanceof Error ? e.message : String(e),
    };
  }
}
