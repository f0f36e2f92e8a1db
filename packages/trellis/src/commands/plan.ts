/**
 * trellis plan - Show the execution order of an experiment
 */

import type { CommandContext, CommandResult } from '../types.js';
import { visualizeExperiment } from '../modules/index.js';

export async function plan(
  experimentPath: string,
  ctx: CommandContext,
  options: { root?: string } = {}
): Promise<CommandResult<{ listing: string }>> {
  try {
    const listing = await visualizeExperiment(experimentPath, {
      projectRoot: options.root ?? ctx.cwd,
      verbose: ctx.verbose,
    });
    return { success: true, data: { listing } };
  } catch (e) {
    return {
      success: false,
      error: e instanceof Error ? e.message : String(e),
    };
  }
}
