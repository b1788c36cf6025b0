/**
 * Artifact Writer
 *
 * Writes output files through a temporary sibling and renames them into
 * place, so a reader never observes a partial artifact. Returns the sha256
 * checksum recorded in the cache index.
 */

import { createHash, randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { CancelledError, StorageError } from '../errors/index.js';

export interface WrittenFile {
  path: string;
  checksum: string;
  sizeBytes: number;
}

export function sha256Hex(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class ArtifactWriter {
  /**
   * Write bytes to path atomically. The temporary file is removed on any
   * failure, including cancellation.
   */
  async write(path: string, bytes: Buffer, signal?: AbortSignal): Promise<WrittenFile> {
    if (signal?.aborted) throw new CancelledError();

    const dir = dirname(path);
    const tmpPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);

    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new StorageError(`Cannot create ${dir}: ${err instanceof Error ? err.message : String(err)}`, { path });
    }

    try {
      await writeFile(tmpPath, bytes, { signal });
      if (signal?.aborted) throw new CancelledError();
      await rename(tmpPath, path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      if (err instanceof CancelledError) throw err;
      if (signal?.aborted) throw new CancelledError();
      throw new StorageError(`Failed to write ${path}: ${err instanceof Error ? err.message : String(err)}`, { path });
    }

    return { path, checksum: sha256Hex(bytes), sizeBytes: bytes.length };
  }

  /**
   * True when the file exists and its contents hash to the expected checksum.
   */
  async verify(path: string, checksum: string): Promise<boolean> {
    try {
      return sha256Hex(await readFile(path)) === checksum;
    } catch (err) {
      if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'EISDIR' || err.code === 'ENOTDIR')) {
        return false;
      }
      throw new StorageError(`Failed to read ${path}: ${err instanceof Error ? err.message : String(err)}`, { path });
    }
  }
}
