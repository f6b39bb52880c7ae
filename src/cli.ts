#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { z } from 'zod';
import { runBatchCommand } from './cli/commands/run.js';
import { preprocessCommand } from './cli/commands/preprocess.js';

const PackageInfoSchema = z.object({ name: z.string(), version: z.string() });

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = PackageInfoSchema.parse(require('../package.json'));

  console.log(`${pkg.name} v${pkg.version} (Node.js ${process.version}, ${process.platform}-${process.arch})`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  switch (command) {
    case 'run':
    case 'r': {
      const exitCode = await runBatchCommand(args.slice(1));
      if (exitCode !== 0) process.exit(exitCode);
      break;
    }

    case 'preprocess':
    case 'pp': {
      const exitCode = await preprocessCommand(args.slice(1));
      if (exitCode !== 0) process.exit(exitCode);
      break;
    }

    case 'help':
    case '-h':
    case '--help':
      showHelp();
      break;

    default:
      if (command) {
        p.log.error(`Unknown command: ${command}`);
      }
      showHelp();
      process.exit(command ? 1 : 0);
  }
}

function showHelp() {
  console.log(`
av-aip - Package folders of audiovisual objects as AIPs for preservation ingest

Usage:
  av-aip <command> [options]

Commands:
  run, r <batch-root>              Process every AIP folder in a batch root
  preprocess, pp <transfer-bag>    Validate and unpack a delivered transfer bag
  help, -h                         Show this help message

Options:
  --config=<path>   Pipeline config file (default: aip-pipeline.json)
  --version, -V     Show version information

Examples:
  av-aip preprocess /ingest/2024-03-transfer
  av-aip run /ingest/2024-03-transfer
  av-aip run /ingest/batch-17 --config=/etc/aip-pipeline.json

Batch root layout after a run:
  aips-to-ingest/     Packaged AIPs and department manifests
  mediainfo-xml/      Copy of every extractor report
  preservation-xml/   Copy of every valid preservation record
  errors/<kind>/      AIPs that could not be packaged, by reason
  log.csv             One row per AIP: folder name and final status
`);
}

main().catch((err) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
