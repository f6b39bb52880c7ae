/**
 * Batch driver: runs every AIP folder in a batch root through the
 * pipeline, one AIP at a time.
 *
 * Each stage returns an explicit outcome. On `diverted` the driver moves
 * the AIP into `errors/<kind>/`, writes any validator sidecar, appends
 * the status-log row and goes on to the next AIP; a diverted AIP never
 * reaches a later stage and never gets a second log row. After the last
 * AIP the manifest finalizer runs over the ingest staging folder.
 *
 * Stages mutate shared folders without locking, so AIPs are processed
 * strictly in sequence and a lockfile keeps other runs out of the
 * batch root.
 *
 * @module batch/driver
 */

import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { filterStage } from '../aip/content-filter.js';
import { moveToErrorPartition, writeValidationSidecar } from '../aip/error-partition.js';
import { namingStage } from '../aip/naming.js';
import { restructureStage } from '../aip/restructure.js';
import { transition } from '../aip/state-machine.js';
import type { AipOutcome, AipWorkItem, StageOutcome } from '../aip/types.js';
import type { PipelineConfig } from '../config/schema.js';
import { extractionStage } from '../metadata/extraction.js';
import { preservationStage } from '../metadata/preservation.js';
import { finalizeManifests } from '../packaging/manifest.js';
import type { ManifestResult } from '../packaging/manifest.js';
import { BAG_SUFFIX, packageStage } from '../packaging/packager.js';
import { BatchLock } from '../safety/batch-lock.js';
import type { Toolkit } from '../tools/types.js';
import type { Stage, StageContext } from './context.js';
import { batchLayout, ensureOutputFolders, isControlEntry } from './layout.js';
import type { BatchLayout } from './layout.js';
import { loadMetadataCsv } from './metadata-csv.js';
import { silentReporter } from './reporter.js';
import type { BatchReporter } from './reporter.js';
import { COMPLETE_STATUS, StatusLog } from './status-log.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Thrown when the batch root is missing or not a directory. Fatal.
 */
export class BatchRootError extends Error {
  constructor(public readonly batchRoot: string, reason: string) {
    super(`Batch root ${batchRoot} ${reason}`);
    this.name = 'BatchRootError';
  }
}

export interface RunBatchOptions {
  toolkit: Toolkit;
  reporter?: BatchReporter;
  /** Clock for the manifest timestamp. */
  now?: () => Date;
}

export interface SkippedEntry {
  name: string;
  reason: 'not a folder' | 'already bagged';
}

export interface BatchSummary {
  batchRoot: string;
  /** Number of AIP folders attempted. */
  total: number;
  outcomes: AipOutcome[];
  /** Top-level entries left alone, with the reason. */
  skipped: SkippedEntry[];
  manifest: ManifestResult;
}

/** The pipeline, in order. */
export const PIPELINE_STAGES: readonly { name: string; run: Stage }[] = [
  { name: 'naming', run: namingStage },
  { name: 'filter', run: filterStage },
  { name: 'restructure', run: restructureStage },
  { name: 'extraction', run: extractionStage },
  { name: 'preservation', run: preservationStage },
  { name: 'packaging', run: packageStage },
];

// ============================================================================
// Discovery
// ============================================================================

async function assertBatchRoot(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new BatchRootError(root, 'does not exist');
    }
    throw err;
  }
  if (!isDirectory) {
    throw new BatchRootError(root, 'is not a directory');
  }
}

/**
 * Split the batch root listing into AIP folders and entries to leave
 * alone, ignoring everything the pipeline owns. Bag folders kept from
 * earlier runs are not AIPs. Both lists are sorted by name.
 */
export async function discoverAipFolders(
  layout: BatchLayout,
): Promise<{ folders: string[]; skipped: SkippedEntry[] }> {
  const folders: string[] = [];
  const skipped: SkippedEntry[] = [];

  const entries = (await readdir(layout.root, { withFileTypes: true })).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
  for (const entry of entries) {
    if (isControlEntry(entry.name)) continue;
    if (!entry.isDirectory()) {
      skipped.push({ name: entry.name, reason: 'not a folder' });
    } else if (entry.name.endsWith(BAG_SUFFIX)) {
      skipped.push({ name: entry.name, reason: 'already bagged' });
    } else {
      folders.push(entry.name);
    }
  }

  return { folders, skipped };
}

// ============================================================================
// Per-AIP processing
// ============================================================================

async function divert(
  outcome: Extract<StageOutcome, { status: 'diverted' }>,
  ctx: StageContext,
  log: StatusLog,
): Promise<AipOutcome> {
  const { item, kind, diagnostics } = outcome;

  const errorPath = await moveToErrorPartition(ctx.layout.errors, kind, item.path);
  if (diagnostics) {
    const aipId = item.identity?.aipId ?? item.sourceName;
    await writeValidationSidecar(ctx.layout.errors, kind, aipId, diagnostics);
  }

  const errored = transition(item, 'errored', { path: errorPath });
  await log.append(errored.sourceName, kind);
  ctx.reporter.diverted(errored.sourceName, kind, errored.path);

  return { sourceName: errored.sourceName, status: 'errored', kind, errorPath: errored.path };
}

/**
 * Drive one AIP folder to a terminal state.
 */
export async function processAip(
  folderName: string,
  ctx: StageContext,
  log: StatusLog,
): Promise<AipOutcome> {
  let item: AipWorkItem = {
    sourceName: folderName,
    path: join(ctx.layout.root, folderName),
    state: 'discovered',
  };

  for (const stage of PIPELINE_STAGES) {
    const outcome = await stage.run(item, ctx);
    if (outcome.status === 'diverted') {
      return divert(outcome, ctx, log);
    }
    item = outcome.item;
  }

  if (item.state !== 'packaged' || !item.identity || !item.artifact) {
    throw new Error(`AIP ${folderName} left the pipeline unpackaged (state ${item.state})`);
  }

  await log.append(folderName, COMPLETE_STATUS);
  ctx.reporter.completed(folderName, item.artifact);

  return {
    sourceName: folderName,
    status: 'complete',
    aipId: item.identity.aipId,
    department: item.identity.department,
    artifact: item.artifact,
  };
}

// ============================================================================
// Batch
// ============================================================================

/**
 * Run the pipeline over every AIP folder in `batchRoot`.
 *
 * @throws {BatchRootError} If the batch root is unusable
 * @throws {LockError} If another run holds the batch root
 * @throws {MetadataCsvError} If metadata.csv is present but invalid
 */
export async function runBatch(
  batchRoot: string,
  config: PipelineConfig,
  options: RunBatchOptions,
): Promise<BatchSummary> {
  const reporter = options.reporter ?? silentReporter;
  const now = options.now ?? (() => new Date());
  const layout = batchLayout(batchRoot);

  await assertBatchRoot(layout.root);

  return BatchLock.withLock(layout.lockFile, 'run', async () => {
    const { folders, skipped } = await discoverAipFolders(layout);
    for (const entry of skipped) {
      reporter.warn(`Skipping ${entry.name}: ${entry.reason}`);
    }

    // Checked before anything in the batch root changes
    const csvRows = await loadMetadataCsv(layout.metadataCsv, config.groups, folders);

    await ensureOutputFolders(layout);

    const ctx: StageContext = { layout, config, toolkit: options.toolkit, reporter, csvRows };
    const outcomes = await StatusLog.use(layout.statusLog, async (log) => {
      const results: AipOutcome[] = [];
      for (const [index, name] of folders.entries()) {
        reporter.progress(name, index + 1, folders.length);
        results.push(await processAip(name, ctx, log));
      }
      return results;
    });

    const departments = new Map<string, string>();
    for (const outcome of outcomes) {
      if (outcome.status === 'complete') {
        departments.set(basename(outcome.artifact), outcome.department);
      }
    }
    const manifest = await finalizeManifests(layout.ingestStaging, now(), { departments });
    reporter.manifest(manifest);

    return { batchRoot: layout.root, total: folders.length, outcomes, skipped, manifest };
  });
}
