/**
 * Manifest finalizer: MD5 manifests of the ingest staging folder.
 *
 * Runs once after every AIP in the batch has been attempted. Each
 * artifact goes into the manifest of the department that packaged it in
 * this run; artifacts left by earlier runs fall back to the department
 * whose prefix starts the file name. One `md5<TAB>filename` line per
 * artifact, in directory listing order. Manifest names carry the run timestamp and department:
 * `<YYYY-MM-DD-HHmm>_<department>_manifest.txt`.
 *
 * @module packaging/manifest
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { appendFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { DEPARTMENT_POLICIES, findDepartmentPolicy } from '../aip/naming.js';
import type { DepartmentPolicy } from '../aip/naming.js';

export const MANIFEST_SUFFIX = '_manifest.txt';

export interface DepartmentManifest {
  department: string;
  path: string;
  /** Number of artifacts listed. */
  entries: number;
}

export type ManifestResult =
  | { produced: false; reason: string; unassigned: string[] }
  | { produced: true; manifests: DepartmentManifest[]; unassigned: string[] };

/**
 * Format `date` (local time) as `YYYY-MM-DD-HHmm`.
 */
export function formatManifestTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}`
  );
}

export function manifestFileName(timestamp: string, department: string): string {
  return `${timestamp}_${department}${MANIFEST_SUFFIX}`;
}

/** Hex MD5 of the file at `path`. */
export async function md5File(path: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export interface FinalizeManifestsOptions {
  /** Department of each artifact packaged in this run, keyed by file name. */
  departments?: ReadonlyMap<string, string>;
  policies?: readonly DepartmentPolicy[];
}

/**
 * Write the department manifests for every artifact in `stagingDir`.
 *
 * Manifests left by earlier runs are not themselves listed. Artifacts
 * with no known department are returned in `unassigned`.
 */
export async function finalizeManifests(
  stagingDir: string,
  now: Date,
  options: FinalizeManifestsOptions = {},
): Promise<ManifestResult> {
  const { departments = new Map<string, string>(), policies = DEPARTMENT_POLICIES } = options;

  const artifacts = (await readdir(stagingDir, { withFileTypes: true }))
    .filter((entry) => entry.isFile() && !entry.name.endsWith(MANIFEST_SUFFIX))
    .map((entry) => entry.name);

  if (artifacts.length === 0) {
    return { produced: false, reason: 'Could not make manifest. aips-to-ingest is empty.', unassigned: [] };
  }

  const timestamp = formatManifestTimestamp(now);
  const manifests = new Map<string, DepartmentManifest>();
  const unassigned: string[] = [];

  for (const name of artifacts) {
    const department = departments.get(name) ?? findDepartmentPolicy(name, policies)?.department;
    if (department === undefined) {
      unassigned.push(name);
      continue;
    }

    let manifest = manifests.get(department);
    if (!manifest) {
      manifest = {
        department,
        path: join(stagingDir, manifestFileName(timestamp, department)),
        entries: 0,
      };
      manifests.set(department, manifest);
    }

    const checksum = await md5File(join(stagingDir, name));
    await appendFile(manifest.path, `${checksum}\t${name}\n`, 'utf-8');
    manifest.entries++;
  }

  if (manifests.size === 0) {
    return {
      produced: false,
      reason: 'Could not make manifest. No artifact in aips-to-ingest belongs to a known department.',
      unassigned,
    };
  }

  return { produced: true, manifests: [...manifests.values()], unassigned };
}
