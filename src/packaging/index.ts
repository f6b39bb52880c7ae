/**
 * Bagging, archiving and ingest manifests.
 *
 * @module packaging
 */

export { TarGzArchiver, uncompressedSize } from './archiver.js';
export { BAG_SIDECAR_STAGE, BAG_SUFFIX, bagName, packageStage } from './packager.js';
export type { DepartmentManifest, ManifestResult } from './manifest.js';
export {
  MANIFEST_SUFFIX,
  finalizeManifests,
  formatManifestTimestamp,
  manifestFileName,
  md5File,
} from './manifest.js';
