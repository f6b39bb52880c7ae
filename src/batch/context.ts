/**
 * Per-batch context handed to every stage.
 *
 * @module batch/context
 */

import type { AipWorkItem, ResolvedIdentity, StageOutcome } from '../aip/types.js';
import type { PipelineConfig } from '../config/schema.js';
import type { Toolkit } from '../tools/types.js';
import type { BatchLayout } from './layout.js';
import type { MetadataCsvRow } from './metadata-csv.js';
import type { BatchReporter } from './reporter.js';

export interface StageContext {
  layout: BatchLayout;
  config: PipelineConfig;
  toolkit: Toolkit;
  reporter: BatchReporter;
  /** Present when the batch root carries a valid metadata.csv. */
  csvRows?: ReadonlyMap<string, MetadataCsvRow>;
}

/** One pipeline stage. */
export type Stage = (item: AipWorkItem, ctx: StageContext) => Promise<StageOutcome>;

/**
 * Identity of an AIP past the naming stage.
 *
 * @throws Error if called before the naming stage ran
 */
export function requireIdentity(item: AipWorkItem): ResolvedIdentity {
  if (!item.identity) {
    throw new Error(`AIP ${item.sourceName} has no resolved identity in state ${item.state}`);
  }
  return item.identity;
}
