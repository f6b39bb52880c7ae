/**
 * Preservation metadata stage.
 *
 * Transforms the extractor report into the PREMIS/Dublin Core
 * preservation record, validates it against the repository schema, and
 * copies valid records into the shared `preservation-xml` folder.
 *
 * A record that failed to load and a record that failed the schema are
 * the same failure: both divert to `preservation_invalid`, with the
 * validator's diagnostics kept beside the AIP.
 *
 * @module metadata/preservation
 */

import { copyFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from '../aip/files.js';
import { METADATA_DIR } from '../aip/restructure.js';
import { transition } from '../aip/state-machine.js';
import type { AipWorkItem, ResolvedIdentity, StageOutcome } from '../aip/types.js';
import { requireIdentity } from '../batch/context.js';
import type { StageContext } from '../batch/context.js';
import { splitDiagnostics } from '../tools/validation-report.js';
import type { TransformParams } from '../tools/types.js';
import { mediainfoPath } from './extraction.js';

/** Stage tag used in the sidecar file name. */
export const PRESERVATION_SIDECAR_STAGE = 'preservationxml';

export function preservationFileName(aipId: string): string {
  return `${aipId}_preservation.xml`;
}

/**
 * Stylesheet parameters for one AIP. Title falls back to the AIP id for
 * departments that defer it.
 */
export function buildTransformParams(identity: ResolvedIdentity, namespace: string): TransformParams {
  const params: TransformParams = {
    'aip-id': identity.aipId,
    department: identity.department,
    title: identity.title ?? identity.aipId,
    type: identity.type,
    namespace,
  };
  if (identity.collection) params['collection-id'] = identity.collection;
  if (identity.version) params.version = identity.version;
  return params;
}

export async function preservationStage(item: AipWorkItem, ctx: StageContext): Promise<StageOutcome> {
  const identity = requireIdentity(item);
  const source = mediainfoPath(item.path, identity.aipId);

  if (!(await pathExists(source))) {
    return { status: 'diverted', kind: 'no_mediainfo_xml', item };
  }

  const output = join(item.path, METADATA_DIR, preservationFileName(identity.aipId));
  const transformResult = await ctx.toolkit.transformer.transform(
    source,
    output,
    buildTransformParams(identity, ctx.config.namespace),
  );

  const report = await ctx.toolkit.validator.validate(output);
  if (!report.valid) {
    const messages = splitDiagnostics(report.diagnostics, /\r?\n/);
    if (transformResult.exitCode !== 0) {
      messages.unshift(...splitDiagnostics(transformResult.stderr, /\r?\n/));
    }
    return {
      status: 'diverted',
      kind: 'preservation_invalid',
      item,
      diagnostics: { stage: PRESERVATION_SIDECAR_STAGE, messages },
    };
  }

  await copyFile(output, join(ctx.layout.preservationCache, preservationFileName(identity.aipId)));

  return { status: 'advanced', item: transition(item, 'preserved') };
}
