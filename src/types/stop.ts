/**
 * State machine types for the stop sequence.
 *
 * RUNNING → SIGNALING → SETTLING → VERIFIED
 *                                └→ PARTIALLY_STOPPED (operator may re-run)
 */

import type { LockHolder, PortBinding, ProcessHandle } from './process.js';

export enum StopPhase {
  RUNNING = 'RUNNING',
  SIGNALING = 'SIGNALING',
  SETTLING = 'SETTLING',
  VERIFIED = 'VERIFIED',
  PARTIALLY_STOPPED = 'PARTIALLY_STOPPED',
}

export interface LocatorResult {
  matched: ProcessHandle[];
  /** Processes a termination signal was delivered to */
  signaled: number;
  /** True when no process matched at all */
  nothing_to_do: boolean;
  warnings: string[];
}

export interface PortReclaimResult {
  bindings: PortBinding[];
  /** Processes a kill signal was delivered to */
  killed: number;
  warnings: string[];
}

export interface LockClearResult {
  /** False when the database file does not exist */
  file_present: boolean;
  holders: LockHolder[];
  killed: number;
  /** Holders that could not be signaled */
  remaining: LockHolder[];
  warnings: string[];
}

/**
 * Result of the open-then-close probe.
 *
 * - `ok`: opened, took and released a write lock, closed
 * - `missing`: no database file, nothing to probe
 * - `locked`: the engine reported the file busy or locked; `message` carries its error
 * - `unreadable`: the file opened but is not a usable database (corrupt,
 *   truncated, not a database at all); a restore is the remedy, not a kill
 */
export type ProbeStatus = 'ok' | 'missing' | 'locked' | 'unreadable';

export interface ProbeResult {
  status: ProbeStatus;
  message?: string;
}

export interface VerificationResult {
  /** Processes still matching the patterns after the settle interval */
  remaining: ProcessHandle[];
  probe: ProbeResult;
  /** Set when the re-scan itself failed */
  scan_error?: string;
}

export interface StopReport {
  phase: StopPhase;
  started_at: string;
  finished_at: string;
  locator: LocatorResult | null;
  ports: PortReclaimResult | null;
  locks: LockClearResult | null;
  verification: VerificationResult | null;
  /** Set when an operator interrupt skipped the remaining steps */
  interrupted: boolean;
}
