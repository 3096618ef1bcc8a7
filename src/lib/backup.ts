/**
 * Backup Manager: creates and restores artifacts for either backend.
 *
 * Backends are dispatched through a map of `{ backup, restore }` strategies.
 * An artifact only ever appears under its canonical name once it is complete;
 * the manifest is written after the rename.
 */

import { mkdir, rename, stat, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import {
  atomicCopyFile,
  atomicWriteJson,
  AtomicFsError,
  cleanupTmpFiles,
  fileExists,
  removeIfExists,
  sha256File,
} from './fs.js';
import { listArtifacts, manifestPath, nextArtifactPath, readManifest } from './artifacts.js';
import { readSchemaVersion, snapshotDatabase } from './db_probe.js';
import { SIDECAR_SUFFIXES } from './lock_inspector.js';
import { describeFailure, runCommand, type CommandRunner } from './exec.js';
import { TMP_SUFFIX } from './branding.js';
import { BACKEND_KINDS, type BackendKind, type ServerConnection, type StackConfig } from '../types/config.js';
import type { BackupArtifact, BackupManifest } from '../types/backup.js';

/**
 * Error thrown when an artifact cannot be produced.
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly backend: BackendKind,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
  }
}

/**
 * Error thrown when an artifact cannot be restored.
 */
export class RestoreError extends Error {
  constructor(
    message: string,
    public readonly backend: BackendKind,
    public readonly artifactPath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RestoreError';
  }
}

/**
 * Error thrown when an embedded artifact carries an older schema than the
 * live database. Restoring it would need a migration, which is not supported.
 */
export class SchemaMismatchError extends Error {
  constructor(
    message: string,
    public readonly artifactVersion: number,
    public readonly liveVersion: number
  ) {
    super(message);
    this.name = 'SchemaMismatchError';
  }
}

export interface BackupContext {
  config: StackConfig;
  run?: CommandRunner;
  now?: () => Date;
}

export interface BackupResult {
  artifact: BackupArtifact;
  manifest: BackupManifest;
  /** Stale temp files removed before the backup */
  cleaned: string[];
}

export interface RestoreResult {
  backend: BackendKind;
  artifact: string;
  /** Live file (embedded) or connection string (server) that was overwritten */
  target: string;
  /** Sidecar files removed after an embedded restore */
  removed_sidecars: string[];
}

interface BackendStrategy {
  /** Writes a complete artifact to `destination` or throws BackupError */
  backup(context: BackupContext, destination: string): Promise<{ source: string; schema_version?: number }>;
  restore(context: BackupContext, artifact: BackupArtifact): Promise<RestoreResult>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `postgresql://user@host:port/database`, without any password.
 */
export function connectionLabel(server: ServerConnection): string {
  return `postgresql://${server.user}@${server.host}:${server.port}/${server.database}`;
}

export function serverBinary(server: ServerConnection, name: 'pg_dump' | 'psql'): string {
  return server.bin_dir ? join(server.bin_dir, name) : name;
}

export function connectionArgs(server: ServerConnection): string[] {
  return ['-h', server.host, '-p', String(server.port), '-U', server.user, '-d', server.database];
}

const embeddedStrategy: BackendStrategy = {
  async backup({ config }, destination) {
    const source = config.embedded.db_path;
    if (!(await fileExists(source))) {
      throw new BackupError(`Database file not found: ${source}`, 'embedded');
    }

    // With a write-ahead log present the main file alone is not the committed
    // state; go through the engine instead of copying bytes.
    if (await fileExists(`${source}-wal`)) {
      const tmpPath = `${destination}${TMP_SUFFIX}`;
      try {
        const version = await snapshotDatabase(source, tmpPath);
        await rename(tmpPath, destination);
        return { source, schema_version: version };
      } catch (error) {
        for (const path of [tmpPath, ...SIDECAR_SUFFIXES.map((suffix) => `${tmpPath}${suffix}`)]) {
          await removeIfExists(path);
        }
        throw new BackupError(
          `Failed to snapshot ${source}: ${errorMessage(error)}`,
          'embedded',
          error instanceof Error ? error : undefined
        );
      }
    }

    try {
      await atomicCopyFile(source, destination);
    } catch (error) {
      throw new BackupError(
        `Failed to copy ${source}: ${errorMessage(error)}`,
        'embedded',
        error instanceof AtomicFsError ? error : undefined
      );
    }

    const version = readSchemaVersion(destination);
    return version === null ? { source } : { source, schema_version: version };
  },

  async restore({ config }, artifact) {
    const live = config.embedded.db_path;

    const manifest = artifact.manifest ?? (await readManifest(artifact.path));
    const artifactVersion = manifest?.schema_version ?? readSchemaVersion(artifact.path);
    const liveVersion = (await fileExists(live)) ? readSchemaVersion(live) : null;
    if (artifactVersion !== null && liveVersion !== null && artifactVersion < liveVersion) {
      throw new SchemaMismatchError(
        `Artifact ${artifact.file} has schema version ${artifactVersion}, the live database has ${liveVersion}; ` +
          'restoring an older schema is not supported',
        artifactVersion,
        liveVersion
      );
    }

    try {
      await mkdir(dirname(live), { recursive: true });
      await atomicCopyFile(artifact.path, live);
    } catch (error) {
      throw new RestoreError(
        `Failed to restore ${artifact.file} over ${live}: ${errorMessage(error)}`,
        'embedded',
        artifact.path,
        error instanceof Error ? error : undefined
      );
    }

    // Sidecars of the old file would be replayed against the restored one.
    const removed: string[] = [];
    for (const suffix of SIDECAR_SUFFIXES) {
      const sidecar = `${live}${suffix}`;
      if (await removeIfExists(sidecar)) removed.push(sidecar);
    }

    return { backend: 'embedded', artifact: artifact.path, target: live, removed_sidecars: removed };
  },
};

const serverStrategy: BackendStrategy = {
  async backup({ config, run = runCommand }, destination) {
    const server = config.server;
    const tmpPath = `${destination}${TMP_SUFFIX}`;
    const binary = serverBinary(server, 'pg_dump');

    const result = await run(
      binary,
      [...connectionArgs(server), '--clean', '--if-exists', '--no-owner', '-f', tmpPath],
      { timeoutMs: config.export_timeout_ms, env: process.env }
    );

    if (!result.ok) {
      await removeIfExists(tmpPath);
      throw new BackupError(`Export failed: ${describeFailure(binary, result)}`, 'server');
    }

    let size = 0;
    try {
      size = (await stat(tmpPath)).size;
    } catch {
      size = 0;
    }
    if (size === 0) {
      await removeIfExists(tmpPath);
      throw new BackupError(`Export produced no output for ${connectionLabel(server)}`, 'server');
    }

    await rename(tmpPath, destination);
    return { source: connectionLabel(server) };
  },

  async restore({ config, run = runCommand }, artifact) {
    const server = config.server;
    const binary = serverBinary(server, 'psql');
    const result = await run(
      binary,
      ['-v', 'ON_ERROR_STOP=1', ...connectionArgs(server), '-f', artifact.path],
      { timeoutMs: config.export_timeout_ms, env: process.env }
    );
    if (!result.ok) {
      throw new RestoreError(`Import failed: ${describeFailure(binary, result)}`, 'server', artifact.path);
    }
    return { backend: 'server', artifact: artifact.path, target: connectionLabel(server), removed_sidecars: [] };
  },
};

const STRATEGIES: Record<BackendKind, BackendStrategy> = {
  embedded: embeddedStrategy,
  server: serverStrategy,
};

/**
 * Creates one artifact for `backend` plus its manifest.
 *
 * @throws {BackupError} If the source is missing or the export fails. No
 *   artifact is left under a canonical name in that case.
 */
export async function createBackup(context: BackupContext, backend: BackendKind): Promise<BackupResult> {
  const { config } = context;
  const now = (context.now ?? (() => new Date()))();

  try {
    await mkdir(config.backup_dir, { recursive: true });
  } catch (error) {
    throw new BackupError(
      `Cannot create backup directory ${config.backup_dir}: ${errorMessage(error)}`,
      backend,
      error instanceof Error ? error : undefined
    );
  }
  const cleaned = await cleanupTmpFiles(config.backup_dir);

  const destination = await nextArtifactPath(config.backup_dir, config.system_name, backend, now);
  const produced = await STRATEGIES[backend].backup(context, destination);

  const size = (await stat(destination)).size;
  const manifest: BackupManifest = {
    backend,
    created_at: now.toISOString(),
    source: produced.source,
    file: basename(destination),
    size,
    sha256: await sha256File(destination),
  };
  if (produced.schema_version !== undefined) manifest.schema_version = produced.schema_version;

  await atomicWriteJson(manifestPath(destination), manifest);

  return {
    artifact: { backend, path: destination, file: basename(destination), created_at: now, size, manifest },
    manifest,
    cleaned,
  };
}

/**
 * Restores `artifact` into its backend.
 *
 * @throws {SchemaMismatchError} If an embedded artifact is older than the live schema
 * @throws {RestoreError} If the copy or import fails
 */
export async function restoreBackup(context: BackupContext, artifact: BackupArtifact): Promise<RestoreResult> {
  return await STRATEGIES[artifact.backend].restore(context, artifact);
}

export interface PruneResult {
  kept: string[];
  removed: string[];
}

/**
 * Deletes all but the newest `keep` artifacts of each backend, with their
 * manifests.
 *
 * @throws {RangeError} If `keep` is not a positive integer
 */
export async function pruneBackups(config: StackConfig, keep: number, backend?: BackendKind): Promise<PruneResult> {
  if (!Number.isInteger(keep) || keep < 1) {
    throw new RangeError(`keep must be a positive integer, got ${keep}`);
  }

  const kept: string[] = [];
  const removed: string[] = [];
  for (const kind of backend ? [backend] : BACKEND_KINDS) {
    const artifacts = await listArtifacts(config.backup_dir, config.system_name, kind);
    for (const [index, artifact] of artifacts.entries()) {
      if (index < keep) {
        kept.push(artifact.path);
        continue;
      }
      await unlink(artifact.path);
      await removeIfExists(manifestPath(artifact.path));
      removed.push(artifact.path);
    }
  }
  return { kept, removed };
}
