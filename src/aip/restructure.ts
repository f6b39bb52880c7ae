/**
 * Directory restructurer: imposes the `objects` + `metadata` layout
 * inside an AIP folder.
 *
 * A folder that already has an `objects` folder is not in the expected
 * pre-restructure state. It is diverted instead of merged into.
 *
 * @module aip/restructure
 */

import { mkdir, readdir, rename } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { requireIdentity } from '../batch/context.js';
import type { StageContext } from '../batch/context.js';
import { pathExists } from './files.js';
import { transition } from './state-machine.js';
import type { AipWorkItem, StageOutcome } from './types.js';

export const OBJECTS_DIR = 'objects';
export const METADATA_DIR = 'metadata';

/**
 * Move the AIP's contents into `objects` and create an empty `metadata`.
 *
 * @returns false if `objects` already existed (nothing was changed)
 */
export async function createAipDirectories(aipPath: string): Promise<boolean> {
  try {
    await mkdir(join(aipPath, OBJECTS_DIR));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'EEXIST') {
      return false;
    }
    throw err;
  }

  for (const entry of await readdir(aipPath)) {
    if (entry === OBJECTS_DIR) continue;
    await rename(join(aipPath, entry), join(aipPath, OBJECTS_DIR, entry));
  }

  // Cannot exist yet: everything was just moved into objects
  await mkdir(join(aipPath, METADATA_DIR));
  return true;
}

/**
 * Restructure stage: build the layout, then rename the folder to the
 * canonical id for departments that rename.
 */
export async function restructureStage(item: AipWorkItem, ctx: StageContext): Promise<StageOutcome> {
  const identity = requireIdentity(item);

  if (!(await createAipDirectories(item.path))) {
    return { status: 'diverted', kind: 'preexisting_objects_folder', item };
  }

  let path = item.path;
  if (identity.renameTo && identity.renameTo !== basename(path)) {
    const target = join(dirname(path), identity.renameTo);
    if (await pathExists(target)) {
      // Left under its source name; the duplicate id is caught at extraction
      ctx.reporter.warn(`${item.sourceName} not renamed: ${identity.renameTo} already exists`);
    } else {
      await rename(path, target);
      path = target;
    }
  }

  return { status: 'advanced', item: transition(item, 'restructured', { path }) };
}
