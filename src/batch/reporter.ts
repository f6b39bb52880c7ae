/**
 * Progress reporting for batch runs.
 *
 * The batch driver reports through this interface; the CLI renders it
 * to the terminal and tests record it.
 *
 * @module batch/reporter
 */

import type { ErrorKind } from '../aip/types.js';
import type { ManifestResult } from '../packaging/manifest.js';

export interface BatchReporter {
  /** An AIP is about to be processed (`index` is 1-based). */
  progress(name: string, index: number, total: number): void;
  warn(message: string): void;
  diverted(name: string, kind: ErrorKind, errorPath: string): void;
  completed(name: string, artifact: string): void;
  manifest(result: ManifestResult): void;
}

/** Reporter that discards everything. */
export const silentReporter: BatchReporter = {
  progress: () => undefined,
  warn: () => undefined,
  diverted: () => undefined,
  completed: () => undefined,
  manifest: () => undefined,
};
