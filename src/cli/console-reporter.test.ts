import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
    step: vi.fn(),
  },
}));

// Plain strings so assertions need not account for ANSI codes
vi.mock('picocolors', () => ({
  default: {
    bold: (s: string) => s,
    red: (s: string) => s,
    dim: (s: string) => s,
    cyan: (s: string) => s,
  },
}));

import * as p from '@clack/prompts';
import { ConsoleReporter } from './console-reporter.js';

describe('ConsoleReporter', () => {
  const reporter = new ConsoleReporter();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('prints the processing counter', () => {
    reporter.progress('rbrl001', 2, 5);
    expect(p.log.step).toHaveBeenCalledWith('Processing rbrl001 (2 of 5)');
  });

  it('prints diversions as errors', () => {
    reporter.diverted('randomfolder', 'department_unknown', '/b/errors/department_unknown/randomfolder');
    expect(p.log.error).toHaveBeenCalledWith(
      'randomfolder moved to department_unknown: /b/errors/department_unknown/randomfolder',
    );
  });

  it('prints why no manifest was made', () => {
    reporter.manifest({ produced: false, reason: 'Could not make manifest. aips-to-ingest is empty.', unassigned: [] });
    expect(p.log.warn).toHaveBeenCalledWith('Could not make manifest. aips-to-ingest is empty.');
  });

  it('prints each manifest and every unassigned artifact', () => {
    reporter.manifest({
      produced: true,
      manifests: [{ department: 'russell', path: '/b/aips-to-ingest/m.txt', entries: 2 }],
      unassigned: ['stray.tar.gz'],
    });
    expect(p.log.info).toHaveBeenCalledWith('Manifest for russell: /b/aips-to-ingest/m.txt (2 entries)');
    expect(p.log.warn).toHaveBeenCalledWith('stray.tar.gz matches no department and is not in any manifest');
  });
});
