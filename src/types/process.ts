/**
 * Types for process discovery and termination.
 */

import type { PatternCategory } from './config.js';

/**
 * A row of the process table.
 */
export interface ProcessInfo {
  pid: number;
  /** Full command line as reported by ps */
  command: string;
}

/**
 * A running process matched by the locator. Lives for one pass only.
 */
export interface ProcessHandle extends ProcessInfo {
  category: PatternCategory;
  /** The pattern that matched */
  pattern: string;
}

/**
 * PIDs reported by a lookup (port listeners, file holders).
 *
 * `warning` is set when the lookup could not see everything, for example when
 * lsof lacks privilege or is not installed.
 */
export interface PidLookup {
  pids: number[];
  warning?: string;
}

/**
 * Outcome of delivering one signal.
 *
 * - `sent`: delivered
 * - `gone`: the process exited between scan and signal (ESRCH)
 * - `denied`: the process belongs to someone else (EPERM)
 */
export type SignalOutcome = 'sent' | 'gone' | 'denied';

/**
 * Seam between the controller and the operating system.
 */
export interface ProcessHost {
  /** Every process visible to the current user */
  listProcesses(): Promise<ProcessInfo[]>;
  /** Processes listening on a TCP port */
  findListeners(port: number): Promise<PidLookup>;
  /** Processes holding a file open */
  findFileHolders(path: string): Promise<PidLookup>;
  signal(pid: number, signal: NodeJS.Signals): SignalOutcome;
  /** PIDs that must never be matched (the controller and its parent) */
  protectedPids(): number[];
}

/**
 * Status of one configured port after a reclaim pass.
 */
export type PortStatus = 'free' | 'reclaimed' | 'failed';

export interface PortBinding {
  port: number;
  /** Listening PIDs found by the scan */
  pids: number[];
  status: PortStatus;
}

export interface LockHolder {
  pid: number;
  /** The file (database or sidecar) the process holds open */
  path: string;
}
