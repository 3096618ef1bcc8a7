/**
 * Types for backup artifacts and the active backend selection.
 */

import type { BackendKind } from './config.js';

/**
 * On-disk manifest written beside each artifact as `<artifact>.manifest.json`.
 */
export interface BackupManifest {
  backend: BackendKind;
  /** ISO-8601 UTC creation time */
  created_at: string;
  /** Database file path (embedded) or `postgresql://user@host:port/db` (server) */
  source: string;
  /** Artifact file name, relative to the backup directory */
  file: string;
  size: number;
  sha256: string;
  /** `PRAGMA user_version` of the copied file; embedded only */
  schema_version?: number;
}

/**
 * An artifact found in the backup directory.
 */
export interface BackupArtifact {
  backend: BackendKind;
  /** Absolute path of the artifact */
  path: string;
  /** File name only */
  file: string;
  /** Creation time parsed from the file name */
  created_at: Date;
  size: number;
  /** Present when the manifest exists and is valid */
  manifest: BackupManifest | null;
}

/**
 * Who last wrote the selection record.
 */
export type SelectionWriter = 'rollback' | 'operator';

/**
 * The active storage backend, read by the application at startup.
 *
 * `version` starts at 1 and grows by one on every write. Version 0 is never
 * persisted; it stands for "no record yet".
 */
export interface BackendSelection {
  version: number;
  backend: BackendKind;
  updated_at: string;
  updated_by: SelectionWriter;
  previous_backend: BackendKind | 'none';
}

/**
 * Result of recomputing an artifact's size and digest against its manifest.
 */
export interface ArtifactCheck {
  ok: boolean;
  /** False when there was no manifest to compare against */
  checked: boolean;
  problems: string[];
}
