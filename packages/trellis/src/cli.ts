#!/usr/bin/env node
/**
 * Trellis CLI
 *
 * trellis run <experiment.yml>        - Execute an experiment
 * trellis plan <experiment.yml>       - Show the execution order
 * trellis validate <experiment.yml>   - Check an experiment without running it
 * trellis inspect <envelope.json>     - Print an envelope's provenance chain
 */

import { parseArgs } from 'node:util';
import { run, plan, validate, inspect } from './commands/index.js';
import type { CommandContext } from './types.js';

const VERSION = '0.3.0';

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    process.exit(0);
  }

  if (command === '--version' || command === '-v') {
    console.log(`Trellis v${VERSION}`);
    process.exit(0);
  }

  const { values, positionals } = parseArgs({
    args: args.slice(1),
    options: {
      profile: { type: 'string', short: 'p' },
      root: { type: 'string', short: 'r' },
      concurrency: { type: 'string', short: 'c' },
      timeout: { type: 'string', short: 't' },
      pretty: { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'V', default: false },
    },
    allowPositionals: true,
  });

  const ctx: CommandContext = {
    cwd: process.cwd(),
    verbose: values.verbose,
  };

  const target = positionals[0];
  if (!target) {
    console.error(`Usage: trellis ${command} <${command === 'inspect' ? 'envelope.json' : 'experiment.yml'}>`);
    process.exit(1);
  }

  const indent = values.pretty ? 2 : 0;

  switch (command) {
    case 'run': {
      const result = await run(target, ctx, {
        profile: values.profile,
        root: values.root,
        concurrency: parseNumber(values.concurrency),
        timeout: parseNumber(values.timeout),
      });
      if (result.data) {
        console.log(JSON.stringify(result.data, null, indent));
      }
      if (!result.success) {
        console.error(`Error: ${result.error}`);
        process.exit(1);
      }
      break;
    }

    case 'plan': {
      const result = await plan(target, ctx, { root: values.root });
      if (!result.success || !result.data) {
        console.error(`Error: ${result.error}`);
        process.exit(1);
      }
      console.log(result.data.listing);
      break;
    }

    case 'validate': {
      const result = await validate(target, ctx, { root: values.root });
      if (!result.data) {
        console.error(`Error: ${result.error}`);
        process.exit(1);
      }
      const report = result.data;
      if (report.valid) {
        console.log('✓ Experiment is valid');
      } else {
        console.log('✗ Experiment has errors:');
        for (const e of report.errors) {
          console.log(`  - [${e.code}] ${e.message}`);
        }
      }
      if (report.warnings.length > 0) {
        console.log('');
        console.log('Warnings:');
        for (const w of report.warnings) {
          console.log(`  - ${w}`);
        }
      }
      if (!report.valid) process.exit(1);
      break;
    }

    case 'inspect': {
      const result = await inspect(target, ctx, { root: values.root });
      if (!result.success || !result.data) {
        console.error(`Error: ${result.error}`);
        process.exit(1);
      }
      const report = result.data;
      if (values.pretty) {
        console.log(JSON.stringify(report, null, 2));
        break;
      }
      console.log(`Data: ${report.path}`);
      console.log(`Type: ${report.semanticType} (${report.dataCategory})`);
      console.log('');
      console.log('Provenance:');
      for (const line of report.chain) {
        console.log(`  ${line}`);
      }
      if (report.warnings.length > 0) {
        console.log('');
        console.log('Warnings:');
        for (const w of report.warnings) {
          console.log(`  ${w}`);
        }
      }
      for (const issue of report.schemaIssues) {
        console.warn(`[trellis] ${issue}`);
      }
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run "trellis --help" for usage.');
      process.exit(1);
  }
}

function printHelp() {
  console.log(`
Trellis v${VERSION}

Usage: trellis <command> <file> [options]

Commands:
  run <experiment.yml>       Execute an experiment
  plan <experiment.yml>      Show the execution order
  validate <experiment.yml>  Check an experiment without running it
  inspect <envelope.json>    Print an envelope's provenance chain

Options:
  -p, --profile <name>       Hashing profile: full, dev, test (default: full)
  -r, --root <dir>           Project root (default: current directory)
  -c, --concurrency <n>      Steps allowed to run at once (default: 1)
  -t, --timeout <ms>         Per-primitive timeout
  --pretty                   Pretty-print JSON output
  -V, --verbose              Log progress to stderr
  -h, --help                 Show this help
  -v, --version              Show version

Environment:
  TRELLIS_PROJECT_ROOT, TRELLIS_PROFILE, TRELLIS_LOG_DIR,
  TRELLIS_MAX_CONCURRENCY, TRELLIS_TIMEOUT_MS
`);
}

main().catch(e => {
  console.error('Fatal error:', e instanceof Error ? e.message : e);
  process.exit(1);
});
