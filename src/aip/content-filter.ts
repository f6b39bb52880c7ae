/**
 * Content filter: deletes files the preservation system does not take.
 *
 * Extension matching is case-insensitive. An AIP left with no files at
 * all is diverted to `all_files_deleted` rather than packaged empty.
 *
 * @module aip/content-filter
 */

import { unlink } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { StageContext } from '../batch/context.js';
import { listFilesRecursive } from './files.js';
import { transition } from './state-machine.js';
import type { AipWorkItem, StageOutcome } from './types.js';

/**
 * Delete every file under `dir` whose extension is not in `keepExtensions`.
 *
 * @returns Absolute paths of the deleted files
 */
export async function removeDisallowedFiles(
  dir: string,
  keepExtensions: readonly string[],
): Promise<string[]> {
  const deleted: string[] = [];

  for (const file of await listFilesRecursive(dir)) {
    if (!keepExtensions.includes(extname(file).toLowerCase())) {
      await unlink(file);
      deleted.push(file);
    }
  }

  return deleted;
}

/**
 * Delete OS-generated files (e.g. `.DS_Store`) anywhere under `dir`.
 *
 * They break bag manifests and the desktop environment can recreate
 * them between stages, so packaging runs this again right before bagging.
 *
 * @returns Absolute paths of the deleted files
 */
export async function removeIncidentalFiles(
  dir: string,
  incidentalNames: readonly string[],
): Promise<string[]> {
  const deleted: string[] = [];

  for (const file of await listFilesRecursive(dir)) {
    if (incidentalNames.includes(basename(file))) {
      await unlink(file);
      deleted.push(file);
    }
  }

  return deleted;
}

/**
 * Filter stage: apply the extension allow-list to the AIP folder.
 */
export async function filterStage(item: AipWorkItem, ctx: StageContext): Promise<StageOutcome> {
  await removeDisallowedFiles(item.path, ctx.config.keepExtensions);

  const remaining = await listFilesRecursive(item.path);
  if (remaining.length === 0) {
    return { status: 'diverted', kind: 'all_files_deleted', item };
  }

  return { status: 'advanced', item: transition(item, 'filtered') };
}
