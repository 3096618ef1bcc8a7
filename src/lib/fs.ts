/**
 * Atomic file system utilities for crash-safe artifacts and records.
 *
 * Every write goes to `<target>.tmp`, is fsynced, then renamed over the target,
 * so a reader either sees the previous complete file or the new complete file.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { access, copyFile, open, readFile, readdir, rename, stat, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { TMP_SUFFIX } from './branding.js';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * Returns the errno code of a Node.js system error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Removes a file, treating "already gone" as success.
 */
export async function removeIfExists(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

function wrapError(prefix: string, filePath: string, error: unknown): AtomicFsError {
  const message = error instanceof Error ? error.message : String(error);
  return new AtomicFsError(`${prefix}: ${message}`, filePath, error instanceof Error ? error : undefined);
}

/**
 * Best-effort removal of a temp file after a failed write. The original error
 * is the one reported.
 */
async function discardTmp(tmpPath: string): Promise<void> {
  await unlink(tmpPath).catch(() => undefined);
}

async function fsyncPath(path: string): Promise<void> {
  const handle = await open(path, 'r+');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Atomically writes JSON data to a file using the write-tmp-fsync-rename pattern.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/path/to/selection.json', { version: 1, backend: 'embedded' });
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}${TMP_SUFFIX}`;
  try {
    const handle = await open(tmpPath, 'w');
    try {
      await handle.writeFile(JSON.stringify(data, null, 2) + '\n', 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, filePath);
  } catch (error) {
    await discardTmp(tmpPath);
    throw wrapError(`Failed to atomically write JSON to ${filePath}`, filePath, error);
  }
}

/**
 * Reads and parses a JSON file.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson<T>(filePath: string): Promise<T> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as T;
  } catch (error) {
    throw wrapError(`Failed to read JSON from ${filePath}`, filePath, error);
  }
}

/**
 * Copies `source` over `destination` atomically.
 *
 * The bytes land in `<destination>.tmp` first and are fsynced; the rename is the
 * only step that touches `destination`. On failure the temp file is removed and
 * `destination` is left as it was.
 *
 * @returns Size of the copied file in bytes
 * @throws {AtomicFsError} If the copy fails
 */
export async function atomicCopyFile(source: string, destination: string): Promise<number> {
  const tmpPath = `${destination}${TMP_SUFFIX}`;
  try {
    await copyFile(source, tmpPath);
    await fsyncPath(tmpPath);
    await rename(tmpPath, destination);
    return (await stat(destination)).size;
  } catch (error) {
    await discardTmp(tmpPath);
    throw wrapError(`Failed to copy ${source} to ${destination}`, destination, error);
  }
}

/**
 * Streams a file through SHA-256.
 */
export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Deletes `*.tmp` files left in `dir` by an interrupted write or export.
 * A missing directory yields an empty list.
 *
 * @returns Deleted paths
 * @throws {AtomicFsError} If the directory cannot be read or a temp file cannot be removed
 */
export async function cleanupTmpFiles(dir: string, suffix = TMP_SUFFIX): Promise<string[]> {
  let names: string[];
  try {
    names = (await readdir(dir, { withFileTypes: true }))
      .filter((entry) => entry.isFile() && entry.name.endsWith(suffix))
      .map((entry) => entry.name);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw wrapError(`Failed to list temp files in ${dir}`, dir, error);
  }

  const deleted: string[] = [];
  for (const name of names) {
    const filePath = join(dir, name);
    try {
      if (await removeIfExists(filePath)) deleted.push(filePath);
    } catch (error) {
      throw wrapError(`Failed to delete temp file ${filePath}`, filePath, error);
    }
  }
  return deleted;
}
