/**
 * Engine-level access to the embedded database file: lock probe, schema
 * version and online snapshot.
 */

import Database from 'better-sqlite3';
import { errnoCode, fileExists } from './fs.js';
import type { ProbeResult } from '../types/stop.js';

/** Timeout for the snapshot connection to wait out a writer */
const SNAPSHOT_BUSY_TIMEOUT_MS = 5000;

/**
 * Whether an engine error means another connection holds the file. Extended
 * codes such as SQLITE_BUSY_SNAPSHOT count too.
 */
export function isLockError(error: unknown): boolean {
  const code = errnoCode(error);
  return code !== undefined && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

/**
 * Opens the file, takes and releases a write lock, closes it.
 *
 * `timeout: 0` makes a held lock fail immediately with SQLITE_BUSY instead of
 * waiting. Only busy/locked errors are `locked`; any other failure (a corrupt
 * file, one that is not a database) is `unreadable`. A missing file is reported
 * as `missing`; the probe never creates one.
 */
export async function probeDatabase(dbPath: string): Promise<ProbeResult> {
  if (!(await fileExists(dbPath))) {
    return { status: 'missing' };
  }

  let db: Database.Database | null = null;
  try {
    db = new Database(dbPath, { fileMustExist: true, timeout: 0 });
    db.exec('BEGIN IMMEDIATE');
    db.exec('ROLLBACK');
    return { status: 'ok' };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: isLockError(error) ? 'locked' : 'unreadable', message };
  } finally {
    db?.close();
  }
}

/**
 * Reads `PRAGMA user_version` read-only. Returns null when the file is missing
 * or unreadable.
 */
export function readSchemaVersion(dbPath: string): number | null {
  let db: Database.Database | null = null;
  try {
    db = new Database(dbPath, { readonly: true, fileMustExist: true, timeout: 0 });
    const version = db.pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : null;
  } catch {
    return null;
  } finally {
    db?.close();
  }
}

/**
 * Writes a consistent copy of a live database to `destination` through the
 * online backup API. Pages committed to the write-ahead log but not yet
 * checkpointed are included, and open readers do not hold it up. The copy is
 * switched to rollback-journal mode so it opens without sidecars.
 *
 * @returns `user_version` of the copy
 */
export async function snapshotDatabase(dbPath: string, destination: string): Promise<number> {
  const source = new Database(dbPath, { fileMustExist: true, timeout: SNAPSHOT_BUSY_TIMEOUT_MS });
  try {
    await source.backup(destination);
  } finally {
    source.close();
  }

  const copy = new Database(destination, { fileMustExist: true });
  try {
    copy.pragma('journal_mode = DELETE');
    const version = copy.pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  } finally {
    copy.close();
  }
}
