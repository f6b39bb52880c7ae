/**
 * Zod schema for the pipeline configuration.
 *
 * Every field has a `.default()` so that `PipelineConfigSchema.parse({})`
 * returns a complete config. Tool locations default to the program names
 * expected on PATH; only the stylesheet, schema and Saxon jar paths
 * normally need setting per machine.
 *
 * @module config/schema
 */

import { z } from 'zod';

// ============================================================================
// Tool locations
// ============================================================================

const ToolsSchema = z.object({
  mediainfo: z.string().min(1).default('mediainfo'),
  java: z.string().min(1).default('java'),
  saxonJar: z.string().min(1).default('saxon-he.jar'),
  stylesheet: z.string().min(1).default('stylesheets/mediainfo-to-preservation.xslt'),
  xmllint: z.string().min(1).default('xmllint'),
  schema: z.string().min(1).default('stylesheets/preservation.xsd'),
  bagit: z.string().min(1).default('bagit.py'),
});

// ============================================================================
// Extension lists
// ============================================================================

/** Lowercase extension with its leading dot, e.g. `.mp4`. */
const ExtensionSchema = z
  .string()
  .regex(/^\.[a-z0-9]+$/, 'must be a lowercase extension with a leading dot');

export const DEFAULT_KEEP_EXTENSIONS = ['.dv', '.mov', '.mp3', '.mp4', '.wav', '.pdf', '.xml'];
export const DEFAULT_METADATA_EXTENSIONS = ['.pdf', '.xml'];
export const DEFAULT_INCIDENTAL_FILES = ['.DS_Store', 'Thumbs.db'];

// ============================================================================
// Composite schema
// ============================================================================

export const PipelineConfigSchema = z.object({
  namespace: z.string().min(1).default('http://example.org/archive'),
  groups: z.array(z.string().min(1)).default([]),
  tools: ToolsSchema.default(() => ToolsSchema.parse({})),
  keepExtensions: z.array(ExtensionSchema).min(1).default(DEFAULT_KEEP_EXTENSIONS),
  metadataExtensions: z.array(ExtensionSchema).min(1).default(DEFAULT_METADATA_EXTENSIONS),
  incidentalFiles: z.array(z.string().min(1)).default(DEFAULT_INCIDENTAL_FILES),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsSchema>;

/** Fully populated config with every default applied. */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});
