/**
 * Run Log - one YAML document per run, written on success and failure.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { ownEntry } from '../types.js';
import type { Experiment, HashProfile, JsonObject, OrchestrationResult } from '../types.js';

export interface RunLogInput {
  experiment: Experiment;
  experimentPath: string;
  profile: HashProfile;
  started: Date;
  completed: Date;
  /** Step ids in plan order (declaration order when no plan was built) */
  stepOrder: string[];
  result: OrchestrationResult;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** "YYYYMMDD_HHMMSS" in UTC */
export function formatRunTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
    + `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

export function buildRunLog(input: RunLogInput): JsonObject {
  const { experiment, result } = input;

  const steps: JsonObject[] = [];
  let totalWarnings = 0;
  for (const stepId of input.stepOrder) {
    const stepResult = ownEntry(result.stepResults, stepId);
    if (!stepResult) continue;

    const envelope = stepResult.envelope;
    const last = envelope?.provenance[envelope.provenance.length - 1];
    const warningCount = envelope ? envelope.warnings.length : 0;
    totalWarnings += warningCount;

    steps.push({
      id: stepId,
      success: stepResult.success,
      duration_seconds: last ? last.durationSeconds : null,
      warning_count: warningCount,
      error: stepResult.error ? `${stepResult.error.code}: ${stepResult.error.message}` : null,
    });
  }

  return {
    run_id: `${experiment.id}_${formatRunTimestamp(input.started)}`,
    experiment: {
      id: experiment.id,
      name: experiment.name,
      path: input.experimentPath,
    },
    city: experiment.city,
    profile: input.profile,
    timing: {
      started: input.started.toISOString(),
      completed: input.completed.toISOString(),
    },
    result: {
      success: result.success,
      failed_step: result.failedStep,
      error: result.error ?? null,
    },
    validation_warnings: result.warnings,
    steps,
    summary: {
      total_steps: input.stepOrder.length,
      completed_steps: result.completedSteps.length,
      total_warnings: totalWarnings,
    },
  };
}

/**
 * Write the log as `<logDir>/<run_id>.yml` and return its path.
 */
export async function writeRunLog(logDir: string, log: JsonObject): Promise<string> {
  await fs.mkdir(logDir, { recursive: true });
  const logPath = path.join(logDir, `${String(log.run_id)}.yml`);
  await fs.writeFile(logPath, yaml.dump(log, { sortKeys: false, lineWidth: -1 }), 'utf-8');
  return logPath;
}
