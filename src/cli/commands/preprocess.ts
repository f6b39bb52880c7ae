/**
 * CLI command: `av-aip preprocess <transfer-bag>`
 *
 * Validates a delivered transfer bag and unpacks it into a batch root.
 *
 * Exit codes:
 * - 0: Bag unpacked
 * - 1: Bag invalid, or bad arguments
 *
 * @module cli/commands/preprocess
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readPipelineConfig, DEFAULT_CONFIG_PATH, PipelineConfigError } from '../../config/reader.js';
import { BagitTool } from '../../tools/cli-adapters.js';
import { ToolNotFoundError } from '../../tools/command-runner.js';
import type { BagTool } from '../../tools/types.js';
import { TransferBagError, unpackTransferBag } from '../../transfer/unpack.js';
import type { UnpackResult } from '../../transfer/unpack.js';

export interface PreprocessCommandDeps {
  bagTool?: BagTool;
}

/**
 * Execute the `preprocess` CLI command.
 *
 * @param args - CLI arguments after `preprocess`
 * @returns Exit code
 */
export async function preprocessCommand(args: string[], deps: PreprocessCommandDeps = {}): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showPreprocessHelp();
    return 0;
  }

  const configArg = args.find((a) => a.startsWith('--config='));
  const configPath = configArg ? configArg.slice('--config='.length) : DEFAULT_CONFIG_PATH;
  const bagPath = args.find((a) => !a.startsWith('-'));

  if (!bagPath) {
    p.log.error('Usage: av-aip preprocess <transfer-bag> [--config=<path>]');
    return 1;
  }

  let result: UnpackResult;
  try {
    const bagTool = deps.bagTool ?? new BagitTool((await readPipelineConfig(configPath)).tools);
    result = await unpackTransferBag(bagPath, bagTool);
  } catch (err) {
    if (
      err instanceof PipelineConfigError ||
      err instanceof ToolNotFoundError ||
      err instanceof TransferBagError
    ) {
      p.log.error(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (!result.valid) {
    p.log.error(`${bagPath} is not a valid bag; nothing was changed.`);
    if (result.diagnostics.trim()) {
      p.log.message(pc.dim(result.diagnostics.trim()));
    }
    return 1;
  }

  p.log.success(
    `Unpacked ${bagPath}: ${result.movedEntries.length} entr${result.movedEntries.length === 1 ? 'y' : 'ies'} moved out of data/`,
  );
  return 0;
}

function showPreprocessHelp(): void {
  console.log(`
av-aip preprocess - Unpack a transfer bag into a batch root

Usage:
  av-aip preprocess <transfer-bag> [--config=<path>]

The bag is validated first; an invalid bag is left untouched. A valid
bag loses its tag files and its data/ contents move up one level.
`);
}
