/**
 * Packaging stage: bag, rename, validate, archive.
 *
 * This is the only way out of the pipeline that ends in an ingest
 * artifact. A bag that does not validate is diverted to `bag_invalid`
 * with the bag tool's diagnostics, and no artifact is written for it.
 * So is an AIP whose bag folder name is already taken; it is left
 * unbagged.
 *
 * @module packaging/packager
 */

import { rename } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { removeIncidentalFiles } from '../aip/content-filter.js';
import { pathExists } from '../aip/files.js';
import { transition } from '../aip/state-machine.js';
import type { AipWorkItem, StageOutcome } from '../aip/types.js';
import { requireIdentity } from '../batch/context.js';
import type { StageContext } from '../batch/context.js';
import { splitDiagnostics } from '../tools/validation-report.js';

/** Stage tag used in the sidecar file name. */
export const BAG_SIDECAR_STAGE = 'bag';

/** Suffix marking a finished bag folder. */
export const BAG_SUFFIX = '_bag';

export function bagName(aipId: string): string {
  return `${aipId}${BAG_SUFFIX}`;
}

export async function packageStage(item: AipWorkItem, ctx: StageContext): Promise<StageOutcome> {
  const { aipId } = requireIdentity(item);
  const { bagger, archiver } = ctx.toolkit;

  const bagPath = join(dirname(item.path), bagName(aipId));
  if (await pathExists(bagPath)) {
    return {
      status: 'diverted',
      kind: 'bag_invalid',
      item,
      diagnostics: { stage: BAG_SIDECAR_STAGE, messages: [`${bagPath} already exists`] },
    };
  }

  await removeIncidentalFiles(item.path, ctx.config.incidentalFiles);

  const bagResult = await bagger.bag(item.path);
  if (bagResult.exitCode !== 0) {
    ctx.reporter.warn(`Bag tool exited with ${bagResult.exitCode} for ${aipId}: ${bagResult.stderr.trim()}`);
  }

  await rename(item.path, bagPath);
  const bagged: AipWorkItem = { ...item, path: bagPath };

  const report = await bagger.validate(bagPath);
  if (!report.valid) {
    return {
      status: 'diverted',
      kind: 'bag_invalid',
      item: bagged,
      diagnostics: {
        stage: BAG_SIDECAR_STAGE,
        messages: splitDiagnostics(report.diagnostics, ';'),
      },
    };
  }

  const artifact = await archiver.archive(bagPath, ctx.layout.ingestStaging);

  return { status: 'advanced', item: transition(bagged, 'packaged', { artifact }) };
}
