/**
 * Naming resolver: derives department, canonical AIP id, title and type
 * from an AIP folder name and its first-level file listing.
 *
 * Each department's naming grammar is one variant of
 * {@link DepartmentPolicy}. Adding a department means adding a policy to
 * {@link DEPARTMENT_POLICIES}, not another branch in the stages.
 *
 * Type classification uses an any-file rule: one metadata-document
 * extension anywhere in the listing makes the whole AIP `metadata`.
 * Folders holding both media and metadata files are not split; they
 * are classified `metadata` and reported with a warning.
 *
 * @module aip/naming
 */

import { extname } from 'node:path';
import type { AipType, AipWorkItem, ResolvedIdentity, StageOutcome } from './types.js';
import { listTopLevelFiles } from './files.js';
import { transition } from './state-machine.js';
import type { StageContext } from '../batch/context.js';
import type { MetadataCsvRow } from '../batch/metadata-csv.js';

// ============================================================================
// Department policies
// ============================================================================

export type DepartmentName = 'hargrett' | 'russell';

/**
 * Identifier plus free-text title in one folder name. The folder is
 * renamed to the canonical id during restructuring.
 */
export interface CompoundNamingPolicy {
  grammar: 'compound';
  department: DepartmentName;
  prefix: string;
  /** Group 1 is the identifier, group 2 the title. */
  pattern: RegExp;
}

/**
 * The folder name is the identifier, whatever follows the prefix. Title
 * is deferred and the folder keeps its name.
 */
export interface IdentifierNamingPolicy {
  grammar: 'identifier';
  department: DepartmentName;
  prefix: string;
}

export type DepartmentPolicy = CompoundNamingPolicy | IdentifierNamingPolicy;

export const DEPARTMENT_POLICIES: readonly DepartmentPolicy[] = [
  {
    grammar: 'compound',
    department: 'hargrett',
    prefix: 'har',
    pattern: /^(har-ua\d{2}-\d{3}_\d{4})_(.+)$/,
  },
  {
    grammar: 'identifier',
    department: 'russell',
    prefix: 'rbrl',
  },
];

/**
 * Find the policy whose prefix starts `name`, or undefined.
 */
export function findDepartmentPolicy(
  name: string,
  policies: readonly DepartmentPolicy[] = DEPARTMENT_POLICIES,
): DepartmentPolicy | undefined {
  return policies.find((policy) => name.startsWith(policy.prefix));
}

// ============================================================================
// Type classification
// ============================================================================

export interface TypeClassification {
  type: AipType;
  /** True when both metadata and media files were present. */
  mixed: boolean;
}

/**
 * Classify an AIP from the names of the files at its first level.
 *
 * @param fileNames - First-level file names (directories excluded)
 * @param metadataExtensions - Lowercase extensions that mark a metadata document
 * @param keepExtensions - When given, files the content filter will delete are ignored
 */
export function classifyType(
  fileNames: readonly string[],
  metadataExtensions: readonly string[],
  keepExtensions?: readonly string[],
): TypeClassification {
  let hasMetadata = false;
  let hasMedia = false;

  for (const name of fileNames) {
    const ext = extname(name).toLowerCase();
    if (keepExtensions && !keepExtensions.includes(ext)) continue;
    if (metadataExtensions.includes(ext)) {
      hasMetadata = true;
    } else {
      hasMedia = true;
    }
  }

  return {
    type: hasMetadata ? 'metadata' : 'media',
    mixed: hasMetadata && hasMedia,
  };
}

// ============================================================================
// Resolver
// ============================================================================

export type NamingResult =
  | { ok: true; identity: ResolvedIdentity; warnings: string[] }
  | { ok: false; kind: 'department_unknown' | 'aip_folder_name_invalid'; reason: string };

export interface ResolveIdentityOptions {
  metadataExtensions: readonly string[];
  keepExtensions?: readonly string[];
  /** Rows from metadata.csv keyed by Folder; switches to the csv policy. */
  csvRows?: ReadonlyMap<string, MetadataCsvRow>;
  policies?: readonly DepartmentPolicy[];
}

/**
 * Resolve the identity of the AIP in folder `folderName`.
 *
 * @param folderName - Folder name as found in the batch root
 * @param fileNames - First-level file names inside that folder
 */
export function resolveIdentity(
  folderName: string,
  fileNames: readonly string[],
  options: ResolveIdentityOptions,
): NamingResult {
  const { type, mixed } = classifyType(
    fileNames,
    options.metadataExtensions,
    options.keepExtensions,
  );
  const warnings = mixed
    ? [`${folderName} has mixed content (media and metadata files); classified as metadata`]
    : [];

  if (options.csvRows) {
    const row = options.csvRows.get(folderName);
    if (!row) {
      return {
        ok: false,
        kind: 'aip_folder_name_invalid',
        reason: `${folderName} has no row in metadata.csv`,
      };
    }
    return {
      ok: true,
      identity: {
        department: row.department,
        aipId: `${row.aipId}_${type}`,
        title: row.title || undefined,
        type,
        collection: row.collection || undefined,
        version: row.version || undefined,
      },
      warnings,
    };
  }

  const policy = findDepartmentPolicy(folderName, options.policies);
  if (!policy) {
    return {
      ok: false,
      kind: 'department_unknown',
      reason: `${folderName} does not start with a known department prefix`,
    };
  }

  switch (policy.grammar) {
    case 'compound': {
      const match = policy.pattern.exec(folderName);
      if (!match) {
        return {
          ok: false,
          kind: 'aip_folder_name_invalid',
          reason: `${folderName} does not match the ${policy.department} naming pattern`,
        };
      }
      const aipId = `${match[1]}_${type}`;
      return {
        ok: true,
        identity: {
          department: policy.department,
          aipId,
          title: match[2],
          type,
          renameTo: aipId,
        },
        warnings,
      };
    }
    case 'identifier':
      return {
        ok: true,
        identity: {
          department: policy.department,
          aipId: `${folderName}_${type}`,
          type,
        },
        warnings,
      };
  }
}

// ============================================================================
// Stage
// ============================================================================

/**
 * Naming stage: resolve the AIP's identity from its folder name and
 * first-level files.
 */
export async function namingStage(item: AipWorkItem, ctx: StageContext): Promise<StageOutcome> {
  const fileNames = await listTopLevelFiles(item.path);
  const result = resolveIdentity(item.sourceName, fileNames, {
    metadataExtensions: ctx.config.metadataExtensions,
    keepExtensions: ctx.config.keepExtensions,
    csvRows: ctx.csvRows,
  });

  if (!result.ok) {
    ctx.reporter.warn(result.reason);
    return { status: 'diverted', kind: result.kind, item };
  }

  for (const warning of result.warnings) {
    ctx.reporter.warn(warning);
  }

  return { status: 'advanced', item: transition(item, 'named', { identity: result.identity }) };
}
