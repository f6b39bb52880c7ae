/**
 * Technical-metadata extraction stage.
 *
 * Runs the extractor over the AIP's `objects` folder, keeps its report
 * in the AIP's `metadata` folder and copies it into the shared
 * `mediainfo-xml` folder for staff reference. A copy that is already
 * there means a second AIP with the same id; that AIP is diverted so
 * the earlier evidence is not overwritten.
 *
 * @module metadata/extraction
 */

import { constants } from 'node:fs';
import { copyFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from '../aip/files.js';
import { METADATA_DIR, OBJECTS_DIR } from '../aip/restructure.js';
import { transition } from '../aip/state-machine.js';
import type { AipWorkItem, StageOutcome } from '../aip/types.js';
import { requireIdentity } from '../batch/context.js';
import type { StageContext } from '../batch/context.js';

export function mediainfoFileName(aipId: string): string {
  return `${aipId}_mediainfo.xml`;
}

/** Path of the extractor report inside an AIP folder. */
export function mediainfoPath(aipPath: string, aipId: string): string {
  return join(aipPath, METADATA_DIR, mediainfoFileName(aipId));
}

export async function extractionStage(item: AipWorkItem, ctx: StageContext): Promise<StageOutcome> {
  const { aipId } = requireIdentity(item);
  const output = mediainfoPath(item.path, aipId);

  const result = await ctx.toolkit.extractor.extract(join(item.path, OBJECTS_DIR), output);
  if (result.exitCode !== 0) {
    ctx.reporter.warn(
      `Metadata extractor exited with ${result.exitCode} for ${aipId}: ${result.stderr.trim()}`,
    );
  }

  if (!(await pathExists(output))) {
    // Nothing to copy; the preservation stage diverts on the missing report
    ctx.reporter.warn(`No extractor report written for ${aipId}`);
    return { status: 'advanced', item: transition(item, 'extracted') };
  }

  try {
    await copyFile(
      output,
      join(ctx.layout.mediainfoCache, mediainfoFileName(aipId)),
      constants.COPYFILE_EXCL,
    );
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'EEXIST') {
      return { status: 'diverted', kind: 'preexisting_mediainfo_copy', item };
    }
    throw err;
  }

  return { status: 'advanced', item: transition(item, 'extracted') };
}
