/**
 * End-to-end tests for the batch driver, run against the in-process
 * tool fakes.
 *
 * Covers:
 * - A media AIP through to an ingest artifact and manifest
 * - metadata.csv departments in the manifests
 * - The real tar.gz archiver behind the fake tools
 * - Diversions at each stage, with status-log rows and sidecars
 * - Duplicate AIP ids within one batch
 * - An empty ingest folder at the end of the batch
 * - Fatal errors: bad batch root, invalid metadata.csv, held lock
 * - Discovery rules and re-runs against the same batch root
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { hostname, tmpdir } from 'os';
import { BatchRootError, PIPELINE_STAGES, runBatch } from './driver.js';
import { MetadataCsvError } from './metadata-csv.js';
import { StatusLog } from './status-log.js';
import { pathExists } from '../aip/files.js';
import { DEFAULT_PIPELINE_CONFIG } from '../config/schema.js';
import type { PipelineConfig } from '../config/schema.js';
import { LockError } from '../safety/batch-lock.js';
import { RecordingReporter, createFakeToolkit, readTree, writeTree } from '../testing/fake-toolkit.js';
import type { FakeToolkit } from '../testing/fake-toolkit.js';
import { TarGzArchiver } from '../packaging/archiver.js';
import type { Toolkit } from '../tools/types.js';

const RUN_AT = new Date(2024, 2, 5, 9, 7);

describe('runBatch', () => {
  let root: string;
  let toolkit: FakeToolkit;
  let reporter: RecordingReporter;
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, groups: ['russell', 'peabody'] };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'batch-driver-test-'));
    toolkit = createFakeToolkit();
    reporter = new RecordingReporter();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function run(overrides: { toolkit?: Toolkit; now?: Date } = {}) {
    return runBatch(root, config, {
      toolkit: overrides.toolkit ?? toolkit,
      reporter,
      now: () => overrides.now ?? RUN_AT,
    });
  }

  it('runs the stages in pipeline order', () => {
    expect(PIPELINE_STAGES.map((s) => s.name)).toEqual([
      'naming',
      'filter',
      'restructure',
      'extraction',
      'preservation',
      'packaging',
    ]);
  });

  // --------------------------------------------------------------------------
  // Scenario A: a media AIP completes
  // --------------------------------------------------------------------------

  describe('a media AIP', () => {
    it('ends as one artifact, one Complete row and a department manifest', async () => {
      await writeTree(join(root, 'rbrl999_smith'), { 'clip.mp4': 'video' });

      const summary = await run();

      expect(summary.total).toBe(1);
      expect(summary.outcomes).toHaveLength(1);
      const [outcome] = summary.outcomes;
      expect(outcome.status).toBe('complete');
      if (outcome.status === 'complete') {
        expect(outcome.aipId).toBe('rbrl999_smith_media');
        expect(outcome.artifact).toMatch(/rbrl999_smith_media_bag\.\d+\.tar\.gz$/);
      }

      const staged = (await readdir(join(root, 'aips-to-ingest'))).sort();
      expect(staged).toHaveLength(2);
      expect(staged[0]).toBe('2024-03-05-0907_russell_manifest.txt');
      expect(staged[1]).toMatch(/^rbrl999_smith_media_bag\.\d+\.tar\.gz$/);

      const manifest = await readFile(join(root, 'aips-to-ingest', staged[0]), 'utf-8');
      expect(manifest).toMatch(new RegExp(`^[0-9a-f]{32}\\t${staged[1].replace(/\./g, '\\.')}\\n$`));

      expect(await StatusLog.read(join(root, 'log.csv'))).toEqual([
        { folder: 'rbrl999_smith', status: 'Complete' },
      ]);
      expect(await readdir(join(root, 'mediainfo-xml'))).toEqual(['rbrl999_smith_media_mediainfo.xml']);
      expect(await readdir(join(root, 'preservation-xml'))).toEqual(['rbrl999_smith_media_preservation.xml']);
    });

    it('validates the bag before archiving it', async () => {
      await writeTree(join(root, 'rbrl999_smith'), { 'clip.mp4': 'video' });

      await run();

      const bagPath = join(root, 'rbrl999_smith_media_bag');
      expect(toolkit.bagger.validated).toEqual([bagPath]);
      expect(toolkit.archiver.calls).toEqual([{ bagDir: bagPath, destDir: join(root, 'aips-to-ingest') }]);
      expect((await toolkit.bagger.validate(bagPath)).valid).toBe(true);
    });

    it('passes the hargrett title and renamed id to the transform', async () => {
      await writeTree(join(root, 'har-ua20-002_0001_Football Game'), { 'game.mov': 'video' });

      await run();

      expect(toolkit.transformer.calls).toHaveLength(1);
      expect(toolkit.transformer.calls[0].params).toMatchObject({
        'aip-id': 'har-ua20-002_0001_media',
        department: 'hargrett',
        title: 'Football Game',
        type: 'media',
      });
      expect(await pathExists(join(root, 'har-ua20-002_0001_media_bag'))).toBe(true);
    });

    it('reports progress for each AIP', async () => {
      await writeTree(join(root, 'rbrl001'), { 'a.mp4': 'v' });
      await writeTree(join(root, 'rbrl002'), { 'b.mp4': 'v' });

      await run();

      expect(reporter.events.filter((e) => e.type === 'progress')).toEqual([
        { type: 'progress', name: 'rbrl001', index: 1, total: 2 },
        { type: 'progress', name: 'rbrl002', index: 2, total: 2 },
      ]);
    });
  });

  describe('with the tar.gz archiver', () => {
    it('packages every AIP in the batch', async () => {
      await writeTree(join(root, 'rbrl998'), { 'a.mp4': 'first' });
      await writeTree(join(root, 'rbrl999_smith'), { 'b.mp4': 'second' });

      const summary = await run({ toolkit: { ...createFakeToolkit(), archiver: new TarGzArchiver() } });

      expect(summary.outcomes.map((o) => [o.sourceName, o.status])).toEqual([
        ['rbrl998', 'complete'],
        ['rbrl999_smith', 'complete'],
      ]);
      expect(await StatusLog.read(join(root, 'log.csv'))).toEqual([
        { folder: 'rbrl998', status: 'Complete' },
        { folder: 'rbrl999_smith', status: 'Complete' },
      ]);

      const staged = (await readdir(join(root, 'aips-to-ingest'))).sort();
      expect(staged).toHaveLength(3);
      expect(staged[0]).toBe('2024-03-05-0907_russell_manifest.txt');
      expect(staged[1]).toMatch(/^rbrl998_media_bag\.\d+\.tar\.gz$/);
      expect(staged[2]).toMatch(/^rbrl999_smith_media_bag\.\d+\.tar\.gz$/);
    });
  });

  // --------------------------------------------------------------------------
  // metadata.csv departments
  // --------------------------------------------------------------------------

  describe('a metadata.csv batch', () => {
    it('writes the manifest under the department named in the row', async () => {
      await writeTree(root, {
        'tape a/a.mp4': 'v',
        'metadata.csv': ['Department,Collection,Folder,AIP_ID,Title,Version', 'peabody,pbc,tape a,pbc001,Tape A,1'].join(
          '\n',
        ),
      });

      const summary = await run();

      expect(summary.outcomes).toHaveLength(1);
      expect(summary.outcomes[0]).toMatchObject({ status: 'complete', department: 'peabody', aipId: 'pbc001_media' });
      expect(summary.manifest).toMatchObject({ produced: true, unassigned: [] });

      const staged = (await readdir(join(root, 'aips-to-ingest'))).sort();
      expect(staged).toHaveLength(2);
      expect(staged[0]).toBe('2024-03-05-0907_peabody_manifest.txt');
      expect(staged[1]).toMatch(/^pbc001_media_bag\.\d+\.tar\.gz$/);
      const manifest = await readFile(join(root, 'aips-to-ingest', staged[0]), 'utf-8');
      expect(manifest).toMatch(new RegExp(`^[0-9a-f]{32}\\t${staged[1].replace(/\./g, '\\.')}\\n$`));
    });
  });

  // --------------------------------------------------------------------------
  // Scenario B: nothing left after filtering
  // --------------------------------------------------------------------------

  describe('an AIP with no recognized files', () => {
    it('is diverted to all_files_deleted before restructuring', async () => {
      await writeTree(join(root, 'har-ua99-001_1999_Interview'), { 'notes.txt': 'n', 'scan.jpg': 'i' });

      const summary = await run();

      const errorPath = join(root, 'errors', 'all_files_deleted', 'har-ua99-001_1999_Interview');
      expect(summary.outcomes).toEqual([
        {
          sourceName: 'har-ua99-001_1999_Interview',
          status: 'errored',
          kind: 'all_files_deleted',
          errorPath,
        },
      ]);
      expect(await readdir(errorPath)).toEqual([]);
      expect(await pathExists(join(root, 'har-ua99-001_1999_Interview'))).toBe(false);
      expect(await StatusLog.read(join(root, 'log.csv'))).toEqual([
        { folder: 'har-ua99-001_1999_Interview', status: 'all_files_deleted' },
      ]);
      expect(toolkit.extractor.calls).toEqual([]);
    });
  });

  // --------------------------------------------------------------------------
  // Scenario C: unknown department
  // --------------------------------------------------------------------------

  describe('an AIP with no department prefix', () => {
    it('is diverted untouched and no other stage runs', async () => {
      await writeTree(join(root, 'randomfolder'), { 'a.mov': 'v', 'notes.txt': 'n' });

      await run();

      const errorPath = join(root, 'errors', 'department_unknown', 'randomfolder');
      expect(await readTree(errorPath)).toEqual(['a.mov', 'notes.txt']);
      expect(toolkit.extractor.calls).toEqual([]);
      expect(toolkit.bagger.bagged).toEqual([]);
      expect(reporter.events).toContainEqual({
        type: 'diverted',
        name: 'randomfolder',
        kind: 'department_unknown',
        errorPath,
      });
    });
  });

  // --------------------------------------------------------------------------
  // Scenario D: duplicate AIP id
  // --------------------------------------------------------------------------

  describe('two folders resolving to one AIP id', () => {
    it('diverts the second at extraction and keeps the first report', async () => {
      await writeTree(join(root, 'har-ua01-001_0001_First'), { 'a.mov': 'v' });
      await writeTree(join(root, 'har-ua01-001_0001_Second'), { 'b.mov': 'v' });

      const summary = await run();

      expect(summary.outcomes.map((o) => [o.sourceName, o.status])).toEqual([
        ['har-ua01-001_0001_First', 'complete'],
        ['har-ua01-001_0001_Second', 'errored'],
      ]);
      expect(summary.outcomes[1]).toMatchObject({ kind: 'preexisting_mediainfo_copy' });
      expect(
        await readFile(join(root, 'mediainfo-xml', 'har-ua01-001_0001_media_mediainfo.xml'), 'utf-8'),
      ).toBe('<MediaInfo>\n  <File>a.mov</File>\n</MediaInfo>\n');
      expect(await StatusLog.read(join(root, 'log.csv'))).toEqual([
        { folder: 'har-ua01-001_0001_First', status: 'Complete' },
        { folder: 'har-ua01-001_0001_Second', status: 'preexisting_mediainfo_copy' },
      ]);
    });

    it('diverts duplicates named through metadata.csv', async () => {
      await writeTree(root, {
        'tape a/a.mp4': 'v',
        'tape b/b.mp4': 'v',
        'metadata.csv': [
          'Department,Collection,Folder,AIP_ID,Title,Version',
          'russell,rbrl,tape a,rbrl001,Tape A,1',
          'russell,rbrl,tape b,rbrl001,Tape B,1',
        ].join('\n'),
      });

      const summary = await run();

      expect(summary.outcomes.map((o) => o.status)).toEqual(['complete', 'errored']);
      expect(await pathExists(join(root, 'errors', 'preexisting_mediainfo_copy', 'tape b'))).toBe(true);
    });
  });

  // --------------------------------------------------------------------------
  // Scenario E: invalid preservation record
  // --------------------------------------------------------------------------

  describe('an AIP whose preservation record fails validation', () => {
    it('is diverted with a sidecar and no cached record', async () => {
      const failing = createFakeToolkit({
        rejectDocument: () => 'rec.xml:3: element title: missing\nrec.xml fails to validate\n',
      });
      await writeTree(join(root, 'rbrl001'), { 'a.wav': 'audio' });

      await run({ toolkit: failing });

      expect(await pathExists(join(root, 'errors', 'preservation_invalid', 'rbrl001'))).toBe(true);
      expect(
        await readFile(
          join(root, 'errors', 'preservation_invalid', 'rbrl001_media_preservationxml_validation_error.txt'),
          'utf-8',
        ),
      ).toBe('rec.xml:3: element title: missing\n\nrec.xml fails to validate\n\n');
      expect(await readdir(join(root, 'preservation-xml'))).toEqual([]);
      expect(failing.bagger.bagged).toEqual([]);
      expect(await StatusLog.read(join(root, 'log.csv'))).toEqual([
        { folder: 'rbrl001', status: 'preservation_invalid' },
      ]);
    });
  });

  describe('an AIP whose bag fails validation', () => {
    it('is diverted under its bag name with a sidecar and no artifact', async () => {
      const failing = createFakeToolkit({ rejectBag: () => 'Payload-Oxum validation failed' });
      await writeTree(join(root, 'rbrl001'), { 'a.wav': 'audio' });

      await run({ toolkit: failing });

      const bagPath = join(root, 'rbrl001_media_bag');
      expect(await pathExists(join(root, 'errors', 'bag_invalid', 'rbrl001_media_bag'))).toBe(true);
      expect(
        await readFile(join(root, 'errors', 'bag_invalid', 'rbrl001_media_bag_validation_error.txt'), 'utf-8'),
      ).toBe(`Bag validation failed: ${bagPath} is invalid: Payload-Oxum validation failed\n\n`);
      expect(await readdir(join(root, 'aips-to-ingest'))).toEqual([]);
    });
  });

  // --------------------------------------------------------------------------
  // Scenario F: empty ingest folder
  // --------------------------------------------------------------------------

  describe('a batch where every AIP fails', () => {
    it('writes no manifest and reports why', async () => {
      await writeTree(join(root, 'randomfolder'), { 'a.mov': 'v' });

      const summary = await run();

      const expected = {
        produced: false,
        reason: 'Could not make manifest. aips-to-ingest is empty.',
        unassigned: [],
      };
      expect(summary.manifest).toEqual(expected);
      expect(reporter.events.at(-1)).toEqual({ type: 'manifest', result: expected });
      expect(await readdir(join(root, 'aips-to-ingest'))).toEqual([]);
    });

    it('handles a batch root with no AIP folders', async () => {
      const summary = await run();

      expect(summary.total).toBe(0);
      expect(summary.manifest.produced).toBe(false);
      expect(await readFile(join(root, 'log.csv'), 'utf-8')).toBe('AIP Folder,Status\n');
    });
  });

  // --------------------------------------------------------------------------
  // Discovery and re-runs
  // --------------------------------------------------------------------------

  describe('discovery', () => {
    it('skips control entries and reports loose files', async () => {
      await writeTree(root, {
        'notes.txt': 'loose',
        'errors/bag_invalid/rbrl000_media_bag/bagit.txt': 'old',
        'rbrl001/a.mp4': 'v',
      });

      const summary = await run();

      expect(summary.total).toBe(1);
      expect(summary.skipped).toEqual([{ name: 'notes.txt', reason: 'not a folder' }]);
      expect(reporter.warnings).toContain('Skipping notes.txt: not a folder');
      expect(await pathExists(join(root, 'errors', 'bag_invalid', 'rbrl000_media_bag'))).toBe(true);
    });

    it('does not reprocess anything on a second run', async () => {
      await writeTree(join(root, 'rbrl001'), { 'a.mp4': 'v' });
      await writeTree(join(root, 'randomfolder'), { 'a.mov': 'v' });
      await run();

      const second = await run({ now: new Date(2024, 2, 5, 10, 0) });

      expect(second.total).toBe(0);
      expect(second.skipped).toEqual([{ name: 'rbrl001_media_bag', reason: 'already bagged' }]);
      expect((await StatusLog.read(join(root, 'log.csv'))).map((row) => row.folder)).toEqual([
        'randomfolder',
        'rbrl001',
      ]);
    });

    it('releases the lock when the run ends', async () => {
      await run();
      expect(await pathExists(join(root, '.aip-pipeline.lock'))).toBe(false);
    });
  });

  // --------------------------------------------------------------------------
  // Fatal errors
  // --------------------------------------------------------------------------

  describe('fatal errors', () => {
    it('rejects a missing batch root', async () => {
      const missing = join(root, 'nope');
      await expect(runBatch(missing, config, { toolkit })).rejects.toThrow(
        new BatchRootError(missing, 'does not exist').message,
      );
    });

    it('rejects a batch root that is a file', async () => {
      const file = join(root, 'file');
      await writeFile(file, 'x', 'utf-8');
      await expect(runBatch(file, config, { toolkit })).rejects.toBeInstanceOf(BatchRootError);
    });

    it('aborts on an invalid metadata.csv before touching anything', async () => {
      await writeTree(root, {
        'rbrl001/a.mp4': 'v',
        'metadata.csv': 'Department,Collection,Folder,AIP_ID,Title,Version\nhargrett,x,rbrl001,rbrl001,T,1\n',
      });

      await expect(run()).rejects.toBeInstanceOf(MetadataCsvError);

      expect((await readdir(root)).sort()).toEqual(['metadata.csv', 'rbrl001']);
    });

    it('refuses to run while another run holds the batch root', async () => {
      await writeTree(join(root, 'rbrl001'), { 'a.mp4': 'v' });
      await writeFile(
        join(root, '.aip-pipeline.lock'),
        JSON.stringify({ pid: process.pid, hostname: hostname(), command: 'run', startedAt: '2026-01-05T09:30:00.000Z' }),
        'utf-8',
      );

      await expect(run()).rejects.toBeInstanceOf(LockError);
      expect(await readTree(join(root, 'rbrl001'))).toEqual(['a.mp4']);
    });
  });
});
