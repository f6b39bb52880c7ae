/**
 * Batch driver and the batch-root resources it owns.
 *
 * @module batch
 */

export type { BatchSummary, RunBatchOptions, SkippedEntry } from './driver.js';
export { BatchRootError, PIPELINE_STAGES, discoverAipFolders, processAip, runBatch } from './driver.js';
export type { Stage, StageContext } from './context.js';
export { requireIdentity } from './context.js';
export type { BatchLayout } from './layout.js';
export { BATCH_ENTRIES, CONTROL_ENTRY_NAMES, batchLayout, ensureOutputFolders, isControlEntry } from './layout.js';
export type { MetadataCsvCheck, MetadataCsvRow } from './metadata-csv.js';
export { METADATA_CSV_COLUMNS, MetadataCsvError, checkMetadataCsv, loadMetadataCsv } from './metadata-csv.js';
export type { BatchReporter } from './reporter.js';
export { silentReporter } from './reporter.js';
export type { StatusLogRow } from './status-log.js';
export { COMPLETE_STATUS, STATUS_LOG_HEADER, StatusLog } from './status-log.js';
