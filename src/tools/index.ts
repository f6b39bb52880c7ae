/**
 * External tool adapters.
 *
 * @module tools
 */

import type { PipelineConfig } from '../config/schema.js';
import { TarGzArchiver } from '../packaging/archiver.js';
import { BagitTool, MediainfoExtractor, SaxonTransformEngine, XmllintValidator } from './cli-adapters.js';
import { runCommand } from './command-runner.js';
import type { CommandRunner } from './command-runner.js';
import type { Toolkit } from './types.js';

export type { CommandResult, CommandRunner, RunCommandOptions } from './command-runner.js';
export { runCommand, ToolNotFoundError } from './command-runner.js';
export type {
  Archiver,
  BagTool,
  MetadataExtractor,
  SchemaValidator,
  Toolkit,
  TransformEngine,
  TransformParams,
  ValidationReport,
} from './types.js';
export { BagitTool, MediainfoExtractor, SaxonTransformEngine, XmllintValidator } from './cli-adapters.js';
export {
  BAGIT_FAILURE_MARKERS,
  XMLLINT_FAILURE_MARKERS,
  classifyValidation,
  splitDiagnostics,
} from './validation-report.js';

/**
 * Build the production toolkit from the config.
 */
export function createToolkit(config: PipelineConfig, runner: CommandRunner = runCommand): Toolkit {
  return {
    extractor: new MediainfoExtractor(config.tools, runner),
    transformer: new SaxonTransformEngine(config.tools, runner),
    validator: new XmllintValidator(config.tools, runner),
    bagger: new BagitTool(config.tools, runner),
    archiver: new TarGzArchiver(),
  };
}
