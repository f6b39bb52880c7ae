/**
 * Technical and preservation metadata stages.
 *
 * @module metadata
 */

export { extractionStage, mediainfoFileName, mediainfoPath } from './extraction.js';
export {
  PRESERVATION_SIDECAR_STAGE,
  buildTransformParams,
  preservationFileName,
  preservationStage,
} from './preservation.js';
