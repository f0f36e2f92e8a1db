/**
 * Tests for run log construction
 */

import { describe, it, expect } from 'vitest';
import { buildRunLog, formatRunTimestamp } from './run-log.js';
import { makeEnvelope, makeExperiment, makeStep } from '../testing/project.js';
import type { OrchestrationResult } from '../types.js';

describe('formatRunTimestamp', () => {
  it('should format in UTC', () => {
    expect(formatRunTimestamp(new Date(Date.UTC(2024, 4, 1, 9, 5, 7)))).toBe('20240501_090507');
  });
});

describe('buildRunLog', () => {
  it('should summarize a failed run in plan order', () => {
    const experiment = makeExperiment([makeStep({ id: 'b' }), makeStep({ id: 'a' }), makeStep({ id: 'c' })]);
    const envelope = makeEnvelope('/out/a_out.geojson', 'type1', {
      warnings: [{ level: 'info', primitive: 'make', message: 'empty input' }],
    });
    const result: OrchestrationResult = {
      success: false,
      completedSteps: ['a'],
      failedStep: 'b',
      stepResults: {
        a: { stepId: 'a', success: true, envelope, outputPaths: { out: '/out/a_out.geojson' } },
        b: {
          stepId: 'b',
          success: false,
          envelope: null,
          outputPaths: {},
          error: { kind: 'PrimitiveExecutionError', code: 'NON_ZERO_EXIT', message: 'boom' },
        },
      },
      finalEnvelopes: {},
      lineage: experiment.lineage,
      warnings: ['Method file not found'],
      validationErrors: [],
      error: "Step 'b' failed: boom",
    };

    const log = buildRunLog({
      experiment,
      experimentPath: '/project/experiments/exp.yml',
      profile: 'dev',
      started: new Date(Date.UTC(2024, 4, 1, 9, 5, 7)),
      completed: new Date(Date.UTC(2024, 4, 1, 9, 5, 9)),
      stepOrder: ['a', 'b', 'c'],
      result,
    });

    expect(log).toEqual({
      run_id: 'exp_001_20240501_090507',
      experiment: { id: 'exp_001', name: 'Test experiment', path: '/project/experiments/exp.yml' },
      city: 'nyc',
      profile: 'dev',
      timing: { started: '2024-05-01T09:05:07.000Z', completed: '2024-05-01T09:05:09.000Z' },
      result: { success: false, failed_step: 'b', error: "Step 'b' failed: boom" },
      validation_warnings: ['Method file not found'],
      steps: [
        { id: 'a', success: true, duration_seconds: 0.5, warning_count: 1, error: null },
        { id: 'b', success: false, duration_seconds: null, warning_count: 0, error: 'NON_ZERO_EXIT: boom' },
      ],
      summary: { total_steps: 3, completed_steps: 1, total_warnings: 1 },
    });
  });
});
