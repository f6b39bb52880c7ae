/**
 * Pipeline config file reader with Zod validation.
 *
 * Reads the JSON config from disk, parses it through the Zod schema,
 * and returns a fully populated config with defaults filling any
 * missing fields. Missing file = all defaults.
 *
 * The CLI calls this once at startup and passes the result down; no
 * other module reads configuration on its own.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import { PipelineConfigSchema, DEFAULT_PIPELINE_CONFIG } from './schema.js';
import type { PipelineConfig } from './schema.js';

/** Default path for the pipeline config file. */
export const DEFAULT_CONFIG_PATH = 'aip-pipeline.json';

/**
 * Error thrown when config reading or validation fails.
 */
export class PipelineConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}

/**
 * Read and validate the pipeline config from disk.
 *
 * @throws {PipelineConfigError} On invalid JSON or validation failure
 */
export async function readPipelineConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<PipelineConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_PIPELINE_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new PipelineConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = validatePipelineConfig(raw);
  if (!result.valid) {
    throw new PipelineConfigError(
      `Config validation failed:\n${result.errors.join('\n')}`,
      result.errors[0]?.split(':')[0],
    );
  }

  return result.config;
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validatePipelineConfig(
  raw: unknown,
): { valid: true; config: PipelineConfig } | { valid: false; errors: string[] } {
  const result = PipelineConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { valid: false, errors };
}
