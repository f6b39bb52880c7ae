/**
 * Type definitions and constants for AIPs moving through the pipeline.
 *
 * Defines the AIP lifecycle states, the closed set of error kinds an
 * AIP can be diverted under, and the outcome every stage returns to
 * the batch driver.
 *
 * @module aip/types
 */

/** Payload composition of an AIP, embedded in its canonical id. */
export type AipType = 'media' | 'metadata';

/** Lifecycle of a single AIP through the pipeline. */
export type AipState =
  | 'discovered'
  | 'named'
  | 'filtered'
  | 'restructured'
  | 'extracted'
  | 'preserved'
  | 'packaged'
  | 'errored';

/** All lifecycle states in pipeline order, `errored` last. */
export const AIP_STATES = [
  'discovered',
  'named',
  'filtered',
  'restructured',
  'extracted',
  'preserved',
  'packaged',
  'errored',
] as const;

/**
 * Named error partitions. Each is also the `Status` written to the
 * status log when an AIP is diverted under it.
 */
export const ERROR_KINDS = [
  'department_unknown',
  'aip_folder_name_invalid',
  'all_files_deleted',
  'preexisting_objects_folder',
  'preexisting_mediainfo_copy',
  'no_mediainfo_xml',
  'preservation_invalid',
  'bag_invalid',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Identity derived from an AIP folder by the naming resolver.
 */
export interface ResolvedIdentity {
  /** Department (or, with metadata.csv, the group) that owns the content. */
  department: string;
  /** Canonical id: `<identifier>_<type>`. */
  aipId: string;
  /** Free-text title; absent when the department defers it. */
  title?: string;
  type: AipType;
  /** Folder name to rename the AIP to, or undefined to keep the source name. */
  renameTo?: string;
  /** Collection id, from metadata.csv only. */
  collection?: string;
  /** Record version, from metadata.csv only. */
  version?: string;
}

/**
 * An AIP as the batch driver tracks it between stages.
 */
export interface AipWorkItem {
  /** Folder name as found in the batch root; the status log key. */
  sourceName: string;
  /** Absolute path to the AIP folder under its current name. */
  path: string;
  state: AipState;
  /** Set once the naming resolver has run. */
  identity?: ResolvedIdentity;
  /** Ingest artifact, set once the AIP is packaged. */
  artifact?: string;
}

/**
 * Validator output preserved beside a diverted AIP for human review.
 */
export interface ValidationDiagnostics {
  /** Stage tag used in the sidecar name, e.g. `preservationxml` or `bag`. */
  stage: string;
  /** One entry per diagnostic message. */
  messages: string[];
}

/**
 * Result of running one stage against one AIP.
 *
 * A stage never moves an AIP into an error partition itself; it reports
 * the diversion and the batch driver performs it.
 */
export type StageOutcome =
  | { status: 'advanced'; item: AipWorkItem }
  | {
      status: 'diverted';
      kind: ErrorKind;
      item: AipWorkItem;
      diagnostics?: ValidationDiagnostics;
    };

/** Terminal record of one AIP after the batch driver is done with it. */
export type AipOutcome =
  | { sourceName: string; status: 'complete'; aipId: string; department: string; artifact: string }
  | { sourceName: string; status: 'errored'; kind: ErrorKind; errorPath: string };
