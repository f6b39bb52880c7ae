/**
 * Classification of validator output.
 *
 * A non-zero exit status is the primary failure signal. Some tool
 * versions exit 0 while still reporting a failure on stderr, so a
 * fixed set of marker phrases is checked as a fallback. The phrases are
 * pinned by tests against the exact wording of:
 *
 * - xmllint (libxml2 2.9+): `<file> fails to validate`,
 *   `failed to load external entity "<file>"`
 * - bagit.py 1.8: `Bag validation failed: <dir> is invalid: ...`
 *
 * @module tools/validation-report
 */

import type { CommandResult } from './command-runner.js';
import type { ValidationReport } from './types.js';

/** Marker phrases xmllint writes when a document is not valid. */
export const XMLLINT_FAILURE_MARKERS = ['fails to validate', 'failed to load'] as const;

/** Marker phrase bagit.py writes when a bag is not valid. */
export const BAGIT_FAILURE_MARKERS = ['invalid'] as const;

/**
 * Turn a tool's command result into a validation report.
 */
export function classifyValidation(
  result: CommandResult,
  failureMarkers: readonly string[],
): ValidationReport {
  const text = result.stderr;
  const markerHit = failureMarkers.some((marker) => text.includes(marker));

  return {
    valid: result.exitCode === 0 && !markerHit,
    exitCode: result.exitCode,
    diagnostics: text,
  };
}

/**
 * Split raw diagnostic text into one trimmed message per entry.
 */
export function splitDiagnostics(text: string, separator: string | RegExp): string[] {
  return text
    .split(separator)
    .map((message) => message.trim())
    .filter((message) => message.length > 0);
}
