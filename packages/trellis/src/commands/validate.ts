/**
 * trellis validate - Check an experiment without running it
 */

import type { CommandContext, CommandResult } from '../types.js';
import { validateExperiment } from '../modules/index.js';

export interface ValidateReport {
  valid: boolean;
  errors: Array<{ code: string; message: string }>;
  warnings: string[];
}

export async function validate(
  experimentPath: string,
  ctx: CommandContext,
  options: { root?: string } = {}
): Promise<CommandResult<ValidateReport>> {
  try {
    const result = await validateExperiment(experimentPath, {
      projectRoot: options.root ?? ctx.cwd,
      verbose: ctx.verbose,
    });
    const report: ValidateReport = {
      valid: result.valid,
      errors: result.errors.map(e => ({ code: e.code, message: e.message })),
      warnings: result.warnings,
    };
    return {
      success: result.valid,
      data: report,
      ...(result.valid ? {} : { error: `${result.errors.length} validation error(s)` }),
    };
  } catch (e) {
    return {
      success: false,
      error: e instanceof Error ? e.message : String(e),
    };
  }
}
