/**
 * Process Locator: finds the application's processes by command-line pattern
 * and asks them to terminate.
 *
 * Matching is a case-sensitive substring test so that decorated child
 * invocations (`node /path/.bin/next dev --port 3001`) are caught too. The scan
 * is racy by nature; the result is a count, never a promise that everything is
 * gone.
 */

import { PATTERN_CATEGORIES, type PatternCategory, type PatternSet } from '../types/config.js';
import type { ProcessHandle, ProcessHost, ProcessInfo } from '../types/process.js';
import type { LocatorResult } from '../types/stop.js';

/**
 * Returns the first (category, pattern) pair whose pattern occurs in `command`.
 * Categories are checked in the order web, pipeline, generic-app.
 */
export function matchCommand(
  command: string,
  patterns: PatternSet
): { category: PatternCategory; pattern: string } | null {
  for (const category of PATTERN_CATEGORIES) {
    for (const pattern of patterns[category]) {
      if (pattern !== '' && command.includes(pattern)) {
        return { category, pattern };
      }
    }
  }
  return null;
}

/**
 * Pure filter over a process table snapshot.
 */
export function filterProcesses(
  rows: ProcessInfo[],
  patterns: PatternSet,
  excludePids: number[] = []
): ProcessHandle[] {
  const handles: ProcessHandle[] = [];
  for (const row of rows) {
    if (excludePids.includes(row.pid)) continue;
    const match = matchCommand(row.command, patterns);
    if (match) {
      handles.push({ ...row, ...match });
    }
  }
  return handles;
}

/**
 * Scans the process table.
 *
 * @throws Error if the process table cannot be read
 */
export async function locateProcesses(host: ProcessHost, patterns: PatternSet): Promise<ProcessHandle[]> {
  const rows = await host.listProcesses();
  return filterProcesses(rows, patterns, host.protectedPids());
}

/**
 * Sends SIGTERM to each handle without waiting for exit.
 */
export function terminateProcesses(
  host: ProcessHost,
  handles: ProcessHandle[]
): { signaled: number; warnings: string[] } {
  let signaled = 0;
  const warnings: string[] = [];

  for (const handle of handles) {
    const outcome = host.signal(handle.pid, 'SIGTERM');
    if (outcome === 'sent') {
      signaled++;
    } else if (outcome === 'gone') {
      warnings.push(`PID ${handle.pid} exited before it could be signaled`);
    } else {
      warnings.push(`Not permitted to signal PID ${handle.pid} (${handle.category}: ${handle.pattern})`);
    }
  }

  return { signaled, warnings };
}

/**
 * One locator pass: scan, then signal every match.
 *
 * A failed scan is reported as a warning so the rest of the stop sequence
 * still runs.
 */
export async function runLocatorPass(host: ProcessHost, patterns: PatternSet): Promise<LocatorResult> {
  let matched: ProcessHandle[];
  try {
    matched = await locateProcesses(host, patterns);
  } catch (error) {
    return {
      matched: [],
      signaled: 0,
      nothing_to_do: false,
      warnings: [error instanceof Error ? error.message : String(error)],
    };
  }

  if (matched.length === 0) {
    return { matched, signaled: 0, nothing_to_do: true, warnings: [] };
  }

  const { signaled, warnings } = terminateProcesses(host, matched);
  return { matched, signaled, nothing_to_do: false, warnings };
}
