/**
 * Archiver -- turns a validated bag into the single compressed artifact
 * submitted for ingest.
 *
 * The artifact is a gzipped tar of the bag folder, named
 * `<bag-name>.<uncompressed-bytes>.tar.gz` so the ingest system can
 * check the expanded size before unpacking.
 *
 * @module packaging/archiver
 */

import { packTar, type TarSource } from 'modern-tar/fs';
import { createWriteStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, join, relative, sep } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import { listFilesRecursive } from '../aip/files.js';
import type { Archiver } from '../tools/types.js';

/**
 * Sum of the sizes of `files`, in bytes.
 */
export async function uncompressedSize(files: readonly string[]): Promise<number> {
  let total = 0;
  for (const file of files) {
    total += (await stat(file)).size;
  }
  return total;
}

export class TarGzArchiver implements Archiver {
  async archive(bagDir: string, destDir: string): Promise<string> {
    const bagName = basename(bagDir);
    const files = await listFilesRecursive(bagDir);
    const size = await uncompressedSize(files);

    // Tar entry names always use forward slashes
    const sources: TarSource[] = files.map((file) => ({
      type: 'file',
      source: file,
      target: `${bagName}/${relative(bagDir, file).split(sep).join('/')}`,
    }));

    const artifactPath = join(destDir, `${bagName}.${size}.tar.gz`);
    await pipeline(packTar(sources), createGzip(), createWriteStream(artifactPath));

    return artifactPath;
  }
}
