/**
 * Lock Inspector: clears processes holding the embedded database open.
 *
 * The engine refuses new connections while a stale handle survives a crash,
 * so every holder of the database file (or of its write-ahead log, shared
 * memory or rollback journal) is killed.
 */

import { fileExists } from './fs.js';
import type { LockHolder, ProcessHost } from '../types/process.js';
import type { LockClearResult } from '../types/stop.js';

export const SIDECAR_SUFFIXES = ['-wal', '-shm', '-journal'] as const;

/**
 * The database file plus whichever sidecars currently exist.
 */
export async function lockTargets(dbPath: string): Promise<string[]> {
  const targets = [dbPath];
  for (const suffix of SIDECAR_SUFFIXES) {
    const sidecar = `${dbPath}${suffix}`;
    if (await fileExists(sidecar)) targets.push(sidecar);
  }
  return targets;
}

/**
 * Lists holders without signaling anything.
 */
export async function findLockHolders(
  host: ProcessHost,
  dbPath: string
): Promise<{ file_present: boolean; holders: LockHolder[]; warnings: string[] }> {
  if (!(await fileExists(dbPath))) {
    return { file_present: false, holders: [], warnings: [] };
  }

  const protectedPids = host.protectedPids();
  const holders: LockHolder[] = [];
  const warnings: string[] = [];
  const seen = new Set<number>();

  for (const target of await lockTargets(dbPath)) {
    const lookup = await host.findFileHolders(target);
    if (lookup.warning && !warnings.includes(lookup.warning)) warnings.push(lookup.warning);
    for (const pid of lookup.pids) {
      if (protectedPids.includes(pid) || seen.has(pid)) continue;
      seen.add(pid);
      holders.push({ pid, path: target });
    }
  }

  return { file_present: true, holders, warnings };
}

/**
 * One lock-clear pass: find holders, SIGKILL each.
 */
export async function clearLocks(host: ProcessHost, dbPath: string): Promise<LockClearResult> {
  const found = await findLockHolders(host, dbPath);
  const warnings = [...found.warnings];
  const remaining: LockHolder[] = [];
  let killed = 0;

  for (const holder of found.holders) {
    const outcome = host.signal(holder.pid, 'SIGKILL');
    if (outcome === 'sent') {
      killed++;
    } else if (outcome === 'gone') {
      warnings.push(`PID ${holder.pid} released ${holder.path} before it could be killed`);
    } else {
      remaining.push(holder);
      warnings.push(`Not permitted to kill PID ${holder.pid} holding ${holder.path}`);
    }
  }

  return {
    file_present: found.file_present,
    holders: found.holders,
    killed,
    remaining,
    warnings,
  };
}
