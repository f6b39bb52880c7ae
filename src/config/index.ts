/**
 * Pipeline configuration module.
 *
 * @module config
 */

export type { PipelineConfig, ToolsConfig } from './schema.js';
export {
  PipelineConfigSchema,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_KEEP_EXTENSIONS,
  DEFAULT_METADATA_EXTENSIONS,
  DEFAULT_INCIDENTAL_FILES,
} from './schema.js';
export {
  readPipelineConfig,
  validatePipelineConfig,
  PipelineConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
