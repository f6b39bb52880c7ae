/**
 * Transfer-bag preprocessing.
 *
 * Batches delivered by another unit arrive as one BagIt bag whose
 * `data/` folder holds the AIP folders. Unpacking validates the bag,
 * drops its tag files and lifts the payload up one level so the bag
 * folder becomes a batch root.
 *
 * @module transfer/unpack
 */

import { readdir, rename, rm, rmdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { BagTool } from '../tools/types.js';

export const PAYLOAD_DIR = 'data';

export type UnpackResult =
  | { valid: false; diagnostics: string }
  | { valid: true; removedTagFiles: string[]; movedEntries: string[] };

/**
 * Thrown when a payload entry would land on a name already used beside
 * the payload folder.
 */
export class TransferBagError extends Error {
  constructor(public readonly bagPath: string, message: string) {
    super(message);
    this.name = 'TransferBagError';
  }
}

/**
 * Unpack the transfer bag at `bagPath` in place.
 *
 * An invalid bag is left untouched.
 */
export async function unpackTransferBag(bagPath: string, bagTool: BagTool): Promise<UnpackResult> {
  const report = await bagTool.validate(bagPath);
  if (!report.valid) {
    return { valid: false, diagnostics: report.diagnostics };
  }

  const topLevel = await readdir(bagPath, { withFileTypes: true });
  const tagFiles = topLevel
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.txt')
    .map((entry) => entry.name);

  const payloadPath = join(bagPath, PAYLOAD_DIR);
  const payload = await readdir(payloadPath);

  const remaining = new Set(
    topLevel.map((entry) => entry.name).filter((name) => name !== PAYLOAD_DIR && !tagFiles.includes(name)),
  );
  const clashes = payload.filter((name) => remaining.has(name));
  if (clashes.length > 0) {
    throw new TransferBagError(
      bagPath,
      `Cannot unpack ${bagPath}: ${clashes.join(', ')} already exist beside ${PAYLOAD_DIR}/`,
    );
  }

  for (const name of tagFiles) {
    await rm(join(bagPath, name));
  }

  // A payload entry may share a tag file's name, so tags go first
  for (const name of payload) {
    await rename(join(payloadPath, name), join(bagPath, name));
  }
  await rmdir(payloadPath);

  return { valid: true, removedTagFiles: tagFiles.sort(), movedEntries: payload.sort() };
}
