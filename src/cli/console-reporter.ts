/**
 * Terminal rendering of batch progress.
 *
 * @module cli/console-reporter
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { ErrorKind } from '../aip/types.js';
import type { BatchReporter } from '../batch/reporter.js';
import type { ManifestResult } from '../packaging/manifest.js';

export class ConsoleReporter implements BatchReporter {
  progress(name: string, index: number, total: number): void {
    p.log.step(`Processing ${pc.bold(name)} (${index} of ${total})`);
  }

  warn(message: string): void {
    p.log.warn(message);
  }

  diverted(name: string, kind: ErrorKind, errorPath: string): void {
    p.log.error(`${name} moved to ${pc.red(kind)}: ${pc.dim(errorPath)}`);
  }

  completed(name: string, artifact: string): void {
    p.log.success(`${name} packaged as ${pc.cyan(artifact)}`);
  }

  manifest(result: ManifestResult): void {
    if (!result.produced) {
      p.log.warn(result.reason);
    } else {
      for (const manifest of result.manifests) {
        p.log.info(`Manifest for ${manifest.department}: ${manifest.path} (${manifest.entries} entries)`);
      }
    }
    for (const name of result.unassigned) {
      p.log.warn(`${name} matches no department and is not in any manifest`);
    }
  }
}
