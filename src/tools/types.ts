/**
 * Interfaces for the external collaborators the pipeline calls out to.
 *
 * The stages only ever see these interfaces. Production adapters wrap
 * command-line programs; tests substitute in-process fakes.
 *
 * @module tools/types
 */

import type { CommandResult } from './command-runner.js';

/**
 * Outcome of a validating tool: exit status plus the raw diagnostic text.
 */
export interface ValidationReport {
  valid: boolean;
  exitCode: number;
  /** Raw diagnostic output, usually the tool's stderr. */
  diagnostics: string;
}

/** Technical-metadata extractor (MediaInfo). */
export interface MetadataExtractor {
  /** Extract metadata for everything under `objectsDir` into `outputPath`. */
  extract(objectsDir: string, outputPath: string): Promise<CommandResult>;
}

/** Parameters handed to the transform stylesheet. */
export type TransformParams = Record<string, string>;

/** Metadata-transform engine (Saxon). */
export interface TransformEngine {
  transform(inputPath: string, outputPath: string, params: TransformParams): Promise<CommandResult>;
}

/** Schema validator (xmllint) bound to one schema. */
export interface SchemaValidator {
  validate(documentPath: string): Promise<ValidationReport>;
}

/** Packaging and checksum tool (bagit). */
export interface BagTool {
  /** Bag `dir` in place. */
  bag(dir: string): Promise<CommandResult>;
  validate(dir: string): Promise<ValidationReport>;
}

/** Archive/compress utility. */
export interface Archiver {
  /**
   * Archive the bag at `bagDir` into one compressed file in `destDir`.
   *
   * @returns Absolute path of the artifact written
   */
  archive(bagDir: string, destDir: string): Promise<string>;
}

/** Every external collaborator a batch run needs. */
export interface Toolkit {
  extractor: MetadataExtractor;
  transformer: TransformEngine;
  validator: SchemaValidator;
  bagger: BagTool;
  archiver: Archiver;
}
