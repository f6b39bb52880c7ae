/**
 * metadata.csv: optional table naming every AIP in the batch.
 *
 * When present in the batch root it replaces folder-name parsing as the
 * source of department, AIP id and title. It is checked in full before
 * any AIP is touched, and any problem aborts the whole batch with every
 * problem listed.
 *
 * @module batch/metadata-csv
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

export const METADATA_CSV_COLUMNS = [
  'Department',
  'Collection',
  'Folder',
  'AIP_ID',
  'Title',
  'Version',
] as const;

export interface MetadataCsvRow {
  department: string;
  collection: string;
  folder: string;
  aipId: string;
  title: string;
  version: string;
}

/**
 * Thrown when metadata.csv is present but cannot be used. Fatal to the batch.
 */
export class MetadataCsvError extends Error {
  constructor(public readonly problems: string[]) {
    super(`metadata.csv cannot be used:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'MetadataCsvError';
  }
}

const CsvRecordsSchema = z.array(z.array(z.string()));

export type MetadataCsvCheck =
  | { ok: true; rows: Map<string, MetadataCsvRow> }
  | { ok: false; problems: string[] };

/**
 * Check metadata.csv content against the configured groups and the
 * folders present in the batch root (no I/O).
 *
 * @param content - Raw file content
 * @param groups - Department allow-list
 * @param folders - Candidate AIP folder names in the batch root
 */
export function checkMetadataCsv(
  content: string,
  groups: readonly string[],
  folders: readonly string[],
): MetadataCsvCheck {
  let records: string[][];
  try {
    records = CsvRecordsSchema.parse(
      parse(content, { bom: true, trim: true, skip_empty_lines: true, relax_column_count: true }),
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, problems: [`Could not parse metadata.csv: ${message}`] };
  }

  const [header = [], ...body] = records;
  if (
    header.length !== METADATA_CSV_COLUMNS.length ||
    header.some((column, i) => column !== METADATA_CSV_COLUMNS[i])
  ) {
    return {
      ok: false,
      problems: [
        `Columns must be ${METADATA_CSV_COLUMNS.join(', ')}; found ${header.join(', ')}`,
      ],
    };
  }

  const problems: string[] = [];
  const rows: MetadataCsvRow[] = [];

  body.forEach((record, i) => {
    if (record.length !== METADATA_CSV_COLUMNS.length) {
      problems.push(`Row ${i + 1} has ${record.length} fields; expected ${METADATA_CSV_COLUMNS.length}`);
      return;
    }
    const [department, collection, folder, aipId, title, version] = record;
    rows.push({ department, collection, folder, aipId, title, version });
  });

  for (const row of rows) {
    if (!groups.includes(row.department)) {
      problems.push(`Department "${row.department}" for folder ${row.folder} is not an allowed group`);
    }
  }

  const counts = new Map<string, number>();
  for (const row of rows) {
    counts.set(row.folder, (counts.get(row.folder) ?? 0) + 1);
  }
  for (const [folder, count] of counts) {
    if (count > 1) {
      problems.push(`Folder ${folder} appears ${count} times`);
    }
  }

  const present = new Set(folders);
  for (const folder of counts.keys()) {
    if (!present.has(folder)) {
      problems.push(`Folder ${folder} is in metadata.csv but not in the batch`);
    }
  }
  for (const folder of folders) {
    if (!counts.has(folder)) {
      problems.push(`Folder ${folder} is in the batch but not in metadata.csv`);
    }
  }

  if (problems.length > 0) {
    return { ok: false, problems };
  }
  return { ok: true, rows: new Map(rows.map((row) => [row.folder, row])) };
}

/**
 * Load and check metadata.csv at `path`.
 *
 * @returns Rows keyed by folder, or undefined when there is no metadata.csv
 * @throws {MetadataCsvError} If the file is present but fails any check
 */
export async function loadMetadataCsv(
  path: string,
  groups: readonly string[],
  folders: readonly string[],
): Promise<Map<string, MetadataCsvRow> | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }

  const check = checkMetadataCsv(content, groups, folders);
  if (!check.ok) {
    throw new MetadataCsvError(check.problems);
  }
  return check.rows;
}
