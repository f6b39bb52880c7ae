/**
 * Error partitions: `errors/<kind>/` folders holding diverted AIPs.
 *
 * Partitions are created on first use. A move never overwrites: an AIP
 * whose name is already taken in the partition (left by an earlier run)
 * gets a numeric suffix.
 *
 * @module aip/error-partition
 */

import { appendFile, mkdir, rename } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { pathExists } from './files.js';
import type { ErrorKind, ValidationDiagnostics } from './types.js';

export function partitionPath(errorsRoot: string, kind: ErrorKind): string {
  return join(errorsRoot, kind);
}

/**
 * Move the AIP folder at `aipPath` into the partition for `kind`.
 *
 * @returns Absolute path of the folder in its new location
 */
export async function moveToErrorPartition(
  errorsRoot: string,
  kind: ErrorKind,
  aipPath: string,
): Promise<string> {
  const partition = partitionPath(errorsRoot, kind);
  await mkdir(partition, { recursive: true });

  const name = basename(aipPath);
  let target = join(partition, name);
  for (let n = 1; await pathExists(target); n++) {
    target = join(partition, `${name}-${n}`);
  }

  await rename(aipPath, target);
  return target;
}

export function sidecarFileName(aipId: string, stage: string): string {
  return `${aipId}_${stage}_validation_error.txt`;
}

/**
 * Append validator diagnostics to the partition's sidecar file for
 * this AIP, one message per blank-line-separated paragraph.
 *
 * @returns Absolute path of the sidecar file
 */
export async function writeValidationSidecar(
  errorsRoot: string,
  kind: ErrorKind,
  aipId: string,
  diagnostics: ValidationDiagnostics,
): Promise<string> {
  const partition = partitionPath(errorsRoot, kind);
  await mkdir(partition, { recursive: true });

  const sidecar = join(partition, sidecarFileName(aipId, diagnostics.stage));
  const body = diagnostics.messages.map((message) => `${message}\n\n`).join('');
  await appendFile(sidecar, body, 'utf-8');
  return sidecar;
}
