/**
 * Command-line adapters for the external tools.
 *
 * Each adapter builds the argument vector for one program from the
 * tools config and runs it through a {@link CommandRunner}.
 *
 * @module tools/cli-adapters
 */

import type { ToolsConfig } from '../config/schema.js';
import { runCommand } from './command-runner.js';
import type { CommandResult, CommandRunner } from './command-runner.js';
import type {
  BagTool,
  MetadataExtractor,
  SchemaValidator,
  TransformEngine,
  TransformParams,
  ValidationReport,
} from './types.js';
import {
  BAGIT_FAILURE_MARKERS,
  XMLLINT_FAILURE_MARKERS,
  classifyValidation,
} from './validation-report.js';

/**
 * MediaInfo: full XML report, sizes in raw bytes.
 *
 * `--Output=XML` is the XML structure introduced in MediaInfo 18.03.
 */
export class MediainfoExtractor implements MetadataExtractor {
  constructor(
    private readonly tools: ToolsConfig,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  extract(objectsDir: string, outputPath: string): Promise<CommandResult> {
    return this.runner(
      this.tools.mediainfo,
      ['-f', '--Output=XML', '--Language=raw', objectsDir],
      { stdoutPath: outputPath },
    );
  }
}

/** Saxon HE run from its jar. */
export class SaxonTransformEngine implements TransformEngine {
  constructor(
    private readonly tools: ToolsConfig,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  transform(inputPath: string, outputPath: string, params: TransformParams): Promise<CommandResult> {
    return this.runner(this.tools.java, [
      '-cp',
      this.tools.saxonJar,
      'net.sf.saxon.Transform',
      `-s:${inputPath}`,
      `-xsl:${this.tools.stylesheet}`,
      `-o:${outputPath}`,
      ...Object.entries(params).map(([key, value]) => `${key}=${value}`),
    ]);
  }
}

/** xmllint schema validation against the configured XSD. */
export class XmllintValidator implements SchemaValidator {
  constructor(
    private readonly tools: ToolsConfig,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async validate(documentPath: string): Promise<ValidationReport> {
    const result = await this.runner(this.tools.xmllint, [
      '--noout',
      '--schema',
      this.tools.schema,
      documentPath,
    ]);
    return classifyValidation(result, XMLLINT_FAILURE_MARKERS);
  }
}

/** bagit.py, writing md5 and sha256 manifests. */
export class BagitTool implements BagTool {
  constructor(
    private readonly tools: ToolsConfig,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  bag(dir: string): Promise<CommandResult> {
    return this.runner(this.tools.bagit, ['--md5', '--sha256', '--quiet', dir]);
  }

  async validate(dir: string): Promise<ValidationReport> {
    const result = await this.runner(this.tools.bagit, ['--validate', '--quiet', dir]);
    return classifyValidation(result, BAGIT_FAILURE_MARKERS);
  }
}
