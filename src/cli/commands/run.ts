/**
 * CLI command: `av-aip run <batch-root>`
 *
 * Loads the pipeline config, builds the toolkit and runs every AIP
 * folder in the batch root through the pipeline.
 *
 * Exit codes:
 * - 0: Batch finished (individual AIPs may have been moved to errors/)
 * - 1: Fatal error, or bad arguments
 *
 * @module cli/commands/run
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { BatchRootError, runBatch } from '../../batch/driver.js';
import type { BatchSummary } from '../../batch/driver.js';
import { MetadataCsvError } from '../../batch/metadata-csv.js';
import type { BatchReporter } from '../../batch/reporter.js';
import { DEFAULT_CONFIG_PATH, PipelineConfigError, readPipelineConfig } from '../../config/reader.js';
import type { PipelineConfig } from '../../config/schema.js';
import { LockError } from '../../safety/batch-lock.js';
import { ToolNotFoundError } from '../../tools/command-runner.js';
import { createToolkit } from '../../tools/index.js';
import type { Toolkit } from '../../tools/types.js';
import { ConsoleReporter } from '../console-reporter.js';

export interface RunCommandDeps {
  toolkitFactory?: (config: PipelineConfig) => Toolkit;
  reporter?: BatchReporter;
}

/**
 * Errors that end a run with a message instead of a stack trace.
 */
export function isFatalRunError(err: unknown): err is Error {
  return (
    err instanceof BatchRootError ||
    err instanceof MetadataCsvError ||
    err instanceof PipelineConfigError ||
    err instanceof ToolNotFoundError ||
    err instanceof LockError
  );
}

/**
 * Execute the `run` CLI command.
 *
 * @param args - CLI arguments after `run`
 * @returns Exit code
 */
export async function runBatchCommand(args: string[], deps: RunCommandDeps = {}): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showRunHelp();
    return 0;
  }

  const configArg = args.find((a) => a.startsWith('--config='));
  const configPath = configArg ? configArg.slice('--config='.length) : DEFAULT_CONFIG_PATH;
  const batchRoot = args.find((a) => !a.startsWith('-'));

  if (!batchRoot) {
    p.log.error('Usage: av-aip run <batch-root> [--config=<path>]');
    return 1;
  }

  const reporter = deps.reporter ?? new ConsoleReporter();
  const toolkitFactory = deps.toolkitFactory ?? ((config: PipelineConfig) => createToolkit(config));

  p.intro(pc.bgCyan(pc.black(' AIP batch ')));

  let summary: BatchSummary;
  try {
    const config = await readPipelineConfig(configPath);
    summary = await runBatch(batchRoot, config, { toolkit: toolkitFactory(config), reporter });
  } catch (err) {
    if (isFatalRunError(err)) {
      p.log.error(`${err.name}: ${err.message}`);
      p.outro(pc.red('Batch stopped'));
      return 1;
    }
    throw err;
  }

  const completed = summary.outcomes.filter((o) => o.status === 'complete').length;
  const errored = summary.outcomes.length - completed;
  p.outro(
    `${summary.total} AIP folder(s): ${pc.green(`${completed} complete`)}, ` +
      (errored > 0 ? pc.red(`${errored} moved to errors`) : '0 moved to errors'),
  );

  return 0;
}

function showRunHelp(): void {
  console.log(`
av-aip run - Package every AIP folder in a batch root

Usage:
  av-aip run <batch-root> [--config=<path>]

Options:
  --config=<path>   Pipeline config file (default: ${DEFAULT_CONFIG_PATH})
  --help, -h        Show this help message

Results land in <batch-root>/aips-to-ingest, failures in
<batch-root>/errors/<kind>, and one row per AIP in <batch-root>/log.csv.
`);
}
