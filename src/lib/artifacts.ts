/**
 * Artifact catalog: naming, listing and checking backup files.
 *
 * Artifacts are named `<system>_<backend>_<YYYYMMDD_HHMMSS>[_<n>].<ext>` with a
 * UTC timestamp. "Latest" is decided by the name, never by modification time.
 */

import micromatch from 'micromatch';
import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { atomicReadJson, AtomicFsError, errnoCode, fileExists, sha256File } from './fs.js';
import { validateBundled } from './schema.js';
import { MANIFEST_SUFFIX, TMP_SUFFIX } from './branding.js';
import { BACKEND_KINDS, type BackendKind } from '../types/config.js';
import type { ArtifactCheck, BackupArtifact, BackupManifest } from '../types/backup.js';

/**
 * Error thrown when an artifact or its manifest cannot be read.
 */
export class ArtifactError extends Error {
  constructor(
    message: string,
    public readonly artifactPath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ArtifactError';
  }
}

export const ARTIFACT_EXTENSIONS: Record<BackendKind, string> = {
  embedded: 'db',
  server: 'sql',
};

const NAME_PATTERN = /^(.+)_(embedded|server)_(\d{8})_(\d{6})(?:_(\d+))?\.(db|sql)$/;

export interface ParsedArtifactName {
  system: string;
  backend: BackendKind;
  /** `YYYYMMDD_HHMMSS` */
  stamp: string;
  /** Collision sequence; 1 for the first artifact of a second */
  seq: number;
  created_at: Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a date as `YYYYMMDD_HHMMSS` in UTC.
 */
export function formatStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function artifactFileName(system: string, backend: BackendKind, date: Date, seq = 1): string {
  const suffix = seq > 1 ? `_${seq}` : '';
  return `${system}_${backend}_${formatStamp(date)}${suffix}.${ARTIFACT_EXTENSIONS[backend]}`;
}

function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

/**
 * Parses an artifact file name. Returns null for anything that is not one,
 * including names whose extension does not belong to their backend.
 */
export function parseArtifactName(fileName: string): ParsedArtifactName | null {
  const match = fileName.match(NAME_PATTERN);
  if (!match) return null;
  const [, system, backend, day, time, seq, ext] = match;
  if (!isBackendKind(backend) || ARTIFACT_EXTENSIONS[backend] !== ext) return null;

  const created = new Date(
    Date.UTC(
      Number(day.slice(0, 4)),
      Number(day.slice(4, 6)) - 1,
      Number(day.slice(6, 8)),
      Number(time.slice(0, 2)),
      Number(time.slice(2, 4)),
      Number(time.slice(4, 6))
    )
  );
  if (Number.isNaN(created.getTime())) return null;

  return {
    system,
    backend,
    stamp: `${day}_${time}`,
    seq: seq === undefined ? 1 : Number.parseInt(seq, 10),
    created_at: created,
  };
}

/**
 * Newest first: timestamp, then collision sequence.
 */
export function compareArtifactNames(a: ParsedArtifactName, b: ParsedArtifactName): number {
  if (a.stamp !== b.stamp) return a.stamp < b.stamp ? 1 : -1;
  return b.seq - a.seq;
}

export function manifestPath(artifactPath: string): string {
  return `${artifactPath}${MANIFEST_SUFFIX}`;
}

/**
 * Picks a free artifact path for `date`, appending `_<n>` when an artifact of
 * the same second already exists.
 */
export async function nextArtifactPath(
  dir: string,
  system: string,
  backend: BackendKind,
  date: Date
): Promise<string> {
  for (let seq = 1; ; seq++) {
    const candidate = join(dir, artifactFileName(system, backend, date, seq));
    if (!(await fileExists(candidate)) && !(await fileExists(`${candidate}${TMP_SUFFIX}`))) {
      return candidate;
    }
  }
}

/**
 * Reads and validates the manifest beside an artifact.
 *
 * @returns The manifest, or null when there is none
 * @throws {ArtifactError} If the manifest exists but cannot be read or is invalid
 */
export async function readManifest(artifactPath: string): Promise<BackupManifest | null> {
  const path = manifestPath(artifactPath);
  if (!(await fileExists(path))) return null;

  let raw: unknown;
  try {
    raw = await atomicReadJson<unknown>(path);
  } catch (error) {
    throw new ArtifactError(
      `Unreadable manifest ${path}: ${error instanceof Error ? error.message : String(error)}`,
      artifactPath,
      error instanceof AtomicFsError ? error : undefined
    );
  }

  const result = await validateBundled<BackupManifest>(raw, 'backup-manifest.schema.json');
  if (!result.valid || !result.data) {
    throw new ArtifactError(`Invalid manifest ${path}: ${result.errors.join('; ')}`, artifactPath);
  }
  return result.data;
}

/**
 * Lists artifacts of `system` in `dir`, newest first. Temp files and manifests
 * are never listed. A missing directory yields an empty list.
 */
export async function listArtifacts(dir: string, system: string, backend?: BackendKind): Promise<BackupArtifact[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw error;
  }

  const kinds = backend ? [backend] : [...BACKEND_KINDS];
  const globs = kinds.map((kind) => `${system}_${kind}_*.${ARTIFACT_EXTENSIONS[kind]}`);
  const candidates = micromatch(names, globs, { ignore: [`*${TMP_SUFFIX}`, `*${MANIFEST_SUFFIX}`] });

  const parsed: Array<{ name: string; info: ParsedArtifactName }> = [];
  for (const name of candidates) {
    const info = parseArtifactName(name);
    if (info && info.system === system) parsed.push({ name, info });
  }
  parsed.sort((a, b) => compareArtifactNames(a.info, b.info));

  const artifacts: BackupArtifact[] = [];
  for (const { name, info } of parsed) {
    const path = join(dir, name);
    let size: number;
    try {
      const stats = await stat(path);
      if (!stats.isFile()) continue;
      size = stats.size;
    } catch (error) {
      // Pruned between readdir and stat.
      if (errnoCode(error) === 'ENOENT') continue;
      throw error;
    }

    let manifest: BackupManifest | null = null;
    try {
      manifest = await readManifest(path);
    } catch (error) {
      if (!(error instanceof ArtifactError)) throw error;
    }

    artifacts.push({ backend: info.backend, path, file: name, created_at: info.created_at, size, manifest });
  }
  return artifacts;
}

export async function latestArtifact(dir: string, system: string, backend: BackendKind): Promise<BackupArtifact | null> {
  const artifacts = await listArtifacts(dir, system, backend);
  return artifacts[0] ?? null;
}

/**
 * Recomputes size and SHA-256 and compares them with the manifest.
 */
export async function verifyArtifact(artifactPath: string): Promise<ArtifactCheck> {
  let manifest: BackupManifest | null;
  try {
    manifest = await readManifest(artifactPath);
  } catch (error) {
    if (error instanceof ArtifactError) {
      return { ok: false, checked: true, problems: [error.message] };
    }
    throw error;
  }
  if (!manifest) {
    return { ok: true, checked: false, problems: [] };
  }

  const problems: string[] = [];
  if (manifest.file !== basename(artifactPath)) {
    problems.push(`manifest describes ${manifest.file}, not ${basename(artifactPath)}`);
  }

  const size = (await stat(artifactPath)).size;
  if (size !== manifest.size) {
    problems.push(`size ${size} does not match manifest size ${manifest.size}`);
  }

  const digest = await sha256File(artifactPath);
  if (digest !== manifest.sha256) {
    problems.push('sha256 does not match manifest');
  }

  return { ok: problems.length === 0, checked: true, problems };
}
