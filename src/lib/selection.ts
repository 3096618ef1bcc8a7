/**
 * Backend Selection Store: the persisted record of the active backend.
 *
 * Writes are compare-and-set on `version`, so only one writer can move the
 * record from a given version to the next.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { atomicReadJson, atomicWriteJson, fileExists } from './fs.js';
import { validateBundled } from './schema.js';
import type { BackendKind, StackConfig } from '../types/config.js';
import type { BackendSelection, SelectionWriter } from '../types/backup.js';

/**
 * Error thrown when the record changed since it was read.
 */
export class SelectionConflictError extends Error {
  constructor(
    message: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number
  ) {
    super(message);
    this.name = 'SelectionConflictError';
  }
}

/**
 * Error thrown when the record exists but is not a valid selection.
 */
export class SelectionCorruptError extends Error {
  constructor(
    message: string,
    public readonly selectionPath: string
  ) {
    super(message);
    this.name = 'SelectionCorruptError';
  }
}

/**
 * Reads the selection. A missing file yields version 0 with the configured
 * default backend.
 *
 * @throws {SelectionCorruptError} If the file cannot be parsed or validated
 */
export async function readBackendSelection(
  config: Pick<StackConfig, 'selection_file' | 'default_backend'>
): Promise<BackendSelection> {
  const path = config.selection_file;
  if (!(await fileExists(path))) {
    return {
      version: 0,
      backend: config.default_backend,
      updated_at: '',
      updated_by: 'operator',
      previous_backend: 'none',
    };
  }

  let raw: unknown;
  try {
    raw = await atomicReadJson<unknown>(path);
  } catch (error) {
    throw new SelectionCorruptError(
      `Backend selection at ${path} is unreadable: ${error instanceof Error ? error.message : String(error)}. ` +
        `Delete it and select a backend again.`,
      path
    );
  }

  const result = await validateBundled<BackendSelection>(raw, 'backend-selection.schema.json');
  if (!result.valid || !result.data) {
    throw new SelectionCorruptError(`Backend selection at ${path} is invalid: ${result.errors.join('; ')}`, path);
  }
  return result.data;
}

export interface SelectionWrite {
  backend: BackendKind;
  updated_by: SelectionWriter;
  /** Version the caller read; the write fails if the record moved on */
  expectedVersion: number;
  now?: Date;
}

/**
 * Writes the next version of the selection.
 *
 * @throws {SelectionConflictError} If the stored version differs from `expectedVersion`
 */
export async function writeBackendSelection(
  config: Pick<StackConfig, 'selection_file' | 'default_backend'>,
  write: SelectionWrite
): Promise<BackendSelection> {
  const current = await readBackendSelection(config);
  if (current.version !== write.expectedVersion) {
    throw new SelectionConflictError(
      `Backend selection changed (expected version ${write.expectedVersion}, found ${current.version}); re-read and retry`,
      write.expectedVersion,
      current.version
    );
  }

  const next: BackendSelection = {
    version: current.version + 1,
    backend: write.backend,
    updated_at: (write.now ?? new Date()).toISOString(),
    updated_by: write.updated_by,
    previous_backend: current.version === 0 ? 'none' : current.backend,
  };

  await mkdir(dirname(config.selection_file), { recursive: true });
  await atomicWriteJson(config.selection_file, next);
  return next;
}
