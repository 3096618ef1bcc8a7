/**
 * TypeScript interfaces for stackctl.config.json.
 */

/**
 * Storage backends the application can run against.
 *
 * - `embedded`: a single local database file opened in-process
 * - `server`: a networked PostgreSQL database reached with connection parameters
 */
export type BackendKind = 'embedded' | 'server';

export const BACKEND_KINDS: readonly BackendKind[] = ['embedded', 'server'];

/**
 * Category a process pattern belongs to. Used only for reporting.
 */
export type PatternCategory = 'web' | 'pipeline' | 'generic-app';

export const PATTERN_CATEGORIES: readonly PatternCategory[] = ['web', 'pipeline', 'generic-app'];

export type PatternSet = Record<PatternCategory, string[]>;

/**
 * Connection parameters for the server backend. The password is never part of
 * the config; pg_dump and psql read PGPASSWORD or ~/.pgpass.
 */
export interface ServerConnection {
  host: string;
  port: number;
  user: string;
  database: string;
  /** Directory holding pg_dump and psql when they are not on PATH */
  bin_dir?: string;
}

export interface EmbeddedConfig {
  /** Path to the embedded database file */
  db_path: string;
}

/**
 * Fully resolved configuration. Every path is absolute.
 */
export interface StackConfig {
  version: 1;
  /** Short system name used as the artifact file name prefix */
  system_name: string;
  embedded: EmbeddedConfig;
  server: ServerConnection;
  backup_dir: string;
  selection_file: string;
  /** Backend assumed when no selection record exists yet */
  default_backend: BackendKind;
  /** Ports the application listens on */
  ports: number[];
  patterns: PatternSet;
  /** Wait between signaling and verification */
  settle_ms: number;
  /** Timeout for ps/lsof/psql style helper commands */
  command_timeout_ms: number;
  /** Timeout for a logical export */
  export_timeout_ms: number;
  /** Directory relative paths were resolved against */
  root: string;
  /** Config file that was loaded, or null when defaults were used */
  config_path: string | null;
}

/**
 * Shape of stackctl.config.json on disk. Every field is optional; nested
 * sections are merged over the defaults field by field.
 */
export interface StackConfigFile {
  version: 1;
  system_name?: string;
  embedded?: Partial<EmbeddedConfig>;
  server?: Partial<ServerConnection>;
  backup_dir?: string;
  selection_file?: string;
  default_backend?: BackendKind;
  ports?: number[];
  patterns?: Partial<PatternSet>;
  settle_ms?: number;
  command_timeout_ms?: number;
  export_timeout_ms?: number;
}
