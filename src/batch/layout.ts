/**
 * Batch root layout: output folders, control files, and the rule for
 * which top-level entries are AIPs.
 *
 * @module batch/layout
 */

import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

/**
 * Names of pipeline-owned entries in the batch root.
 */
export const BATCH_ENTRIES = {
  mediainfoCache: 'mediainfo-xml',
  preservationCache: 'preservation-xml',
  ingestStaging: 'aips-to-ingest',
  errors: 'errors',
  statusLog: 'log.csv',
  metadataCsv: 'metadata.csv',
  lockFile: '.aip-pipeline.lock',
} as const;

/** Every top-level name the batch driver never treats as an AIP. */
export const CONTROL_ENTRY_NAMES: ReadonlySet<string> = new Set(Object.values(BATCH_ENTRIES));

/** Absolute paths of everything the pipeline owns in one batch root. */
export interface BatchLayout {
  root: string;
  mediainfoCache: string;
  preservationCache: string;
  ingestStaging: string;
  errors: string;
  statusLog: string;
  metadataCsv: string;
  lockFile: string;
}

export function batchLayout(batchRoot: string): BatchLayout {
  const root = resolve(batchRoot);
  return {
    root,
    mediainfoCache: join(root, BATCH_ENTRIES.mediainfoCache),
    preservationCache: join(root, BATCH_ENTRIES.preservationCache),
    ingestStaging: join(root, BATCH_ENTRIES.ingestStaging),
    errors: join(root, BATCH_ENTRIES.errors),
    statusLog: join(root, BATCH_ENTRIES.statusLog),
    metadataCsv: join(root, BATCH_ENTRIES.metadataCsv),
    lockFile: join(root, BATCH_ENTRIES.lockFile),
  };
}

export function isControlEntry(name: string): boolean {
  return CONTROL_ENTRY_NAMES.has(name);
}

/**
 * Create the shared output folders. Idempotent.
 *
 * The errors root is not created here; error partitions appear on
 * first use.
 */
export async function ensureOutputFolders(layout: BatchLayout): Promise<void> {
  await Promise.all(
    [layout.mediainfoCache, layout.preservationCache, layout.ingestStaging].map((dir) =>
      mkdir(dir, { recursive: true }),
    ),
  );
}
