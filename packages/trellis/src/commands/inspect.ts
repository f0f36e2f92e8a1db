/**
 * trellis inspect - Print an envelope's provenance chain
 */

import * as path from 'node:path';
import { resolveConfig } from '../config.js';
import type { CommandContext, CommandResult } from '../types.js';
import { EnvelopeSchemaValidator, readEnvelope } from '../modules/index.js';
import type { Envelope } from '../types.js';

export interface InspectReport {
  path: string;
  semanticType: string;
  dataCategory: string;
  chain: string[];
  warnings: string[];
  schemaIssues: string[];
}

/** One line per provenance entry, oldest first */
export function describeProvenance(envelope: Envelope): string[] {
  return envelope.provenance.map((entry, i) => {
    const branch = entry.lineageBranch ? ` [via ${entry.lineageBranch}]` : '';
    return `${i + 1}. ${entry.primitive} v${entry.version} at ${entry.timestamp} (${entry.durationSeconds}s)${branch}`;
  });
}

export async function inspect(
  envelopePath: string,
  ctx: CommandContext,
  options: { root?: string } = {}
): Promise<CommandResult<InspectReport>> {
  try {
    const config = resolveConfig({ projectRoot: options.root ?? ctx.cwd, verbose: ctx.verbose });
    const schemaIssues: string[] = [];
    const envelope = await readEnvelope(path.resolve(ctx.cwd, envelopePath), {
      validator: new EnvelopeSchemaValidator(config.schemaDir),
      onWarning: message => schemaIssues.push(message),
    });

    const report: InspectReport = {
      path: envelope.data.path,
      semanticType: envelope.metadata.semanticType,
      dataCategory: envelope.metadata.dataCategory,
      chain: describeProvenance(envelope),
      warnings: envelope.warnings.map(w => `[${w.level}] ${w.primitive}: ${w.message}`),
      schemaIssues,
    };
    return { success: true, data: report };
  } catch (e) {
    return {
      success: false,
      error: e instanceof Error ? e.message : String(e),
    };
  }
}
