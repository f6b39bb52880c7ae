/**
 * Append-only CSV status log, one row per terminal AIP outcome.
 *
 * Opened once per batch run and owned by the batch driver. The header
 * is written only when the file is new, so successive runs against one
 * batch root extend the same ledger. Each row is flushed to disk before
 * `append` resolves so a crashed run still leaves an accurate record of
 * every AIP it finished.
 *
 * @module batch/status-log
 */

import { open, readFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

export const STATUS_LOG_HEADER = ['AIP Folder', 'Status'] as const;

/** Status written for an AIP that reached the ingest staging folder. */
export const COMPLETE_STATUS = 'Complete';

export interface StatusLogRow {
  folder: string;
  status: string;
}

const CsvRecordsSchema = z.array(z.array(z.string()));

export class StatusLog {
  private writeQueue: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly path: string,
  ) {}

  /**
   * Open (or create) the log at `path` for appending.
   */
  static async open(path: string): Promise<StatusLog> {
    const handle = await open(path, 'a');
    const log = new StatusLog(handle, path);

    const { size } = await handle.stat();
    if (size === 0) {
      await log.write([...STATUS_LOG_HEADER]);
    }

    return log;
  }

  /**
   * Open the log, run `fn`, and close the log whatever `fn` does.
   */
  static async use<T>(path: string, fn: (log: StatusLog) => Promise<T>): Promise<T> {
    const log = await StatusLog.open(path);
    try {
      return await fn(log);
    } finally {
      await log.close();
    }
  }

  /** Append one terminal row for the AIP in `folder`. */
  async append(folder: string, status: string): Promise<void> {
    if (this.closed) {
      throw new Error(`Status log ${this.path} is closed`);
    }
    await this.write([folder, status]);
  }

  /** Flush pending rows and release the file. Idempotent. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.writeQueue;
    await this.handle.close();
  }

  /**
   * Read every data row of the log at `path`. A missing log reads as empty.
   */
  static async read(path: string): Promise<StatusLogRow[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const records = CsvRecordsSchema.parse(parse(content, { skip_empty_lines: true }));
    return records.slice(1).map(([folder = '', status = '']) => ({ folder, status }));
  }

  /**
   * Write one record with write serialization.
   */
  private async write(record: string[]): Promise<void> {
    this.writeQueue = this.writeQueue.then(async () => {
      await this.handle.appendFile(stringify([record]), 'utf-8');
      await this.handle.datasync();
    });

    await this.writeQueue;
  }
}
