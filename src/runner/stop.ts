/**
 * The stop sequence: one deterministic, re-runnable pass.
 *
 *   1. Process Locator   (SIGTERM by pattern)
 *   2. Port Reclaimer    (SIGKILL listeners)
 *   3. Lock Inspector    (SIGKILL database holders)
 *   4. Shutdown Verifier (settle, re-scan, probe)
 *
 * Each step finishes before the next begins. An abort between steps skips the
 * rest and leaves a well-defined report behind.
 */

import { runLocatorPass } from '../lib/process_locator.js';
import { reclaimPorts } from '../lib/port_reclaimer.js';
import { clearLocks } from '../lib/lock_inspector.js';
import { isVerified, verifyShutdown, type Sleep } from '../lib/verifier.js';
import type { StepLogger } from '../lib/log.js';
import type { StackConfig } from '../types/config.js';
import type { ProcessHost } from '../types/process.js';
import { StopPhase, type ProbeResult, type StopReport } from '../types/stop.js';

export interface StopOptions {
  signal?: AbortSignal;
  sleep?: Sleep;
  probe?: (dbPath: string) => Promise<ProbeResult>;
  now?: () => Date;
}

export function createInitialReport(now: Date): StopReport {
  return {
    phase: StopPhase.RUNNING,
    started_at: now.toISOString(),
    finished_at: now.toISOString(),
    locator: null,
    ports: null,
    locks: null,
    verification: null,
    interrupted: false,
  };
}

export function transitionPhase(report: StopReport, phase: StopPhase): StopReport {
  return { ...report, phase };
}

/**
 * True when nothing at all had to be done: no process matched, every port was
 * free and no lock holder existed.
 */
export function wasNothingToDo(report: StopReport): boolean {
  return (
    report.locator?.nothing_to_do === true &&
    (report.ports?.bindings.every((binding) => binding.status === 'free') ?? false) &&
    report.locks !== null &&
    report.locks.holders.length === 0
  );
}

export async function runStopSequence(
  config: StackConfig,
  host: ProcessHost,
  log: StepLogger,
  options: StopOptions = {}
): Promise<StopReport> {
  const now = options.now ?? (() => new Date());
  let report = createInitialReport(now());

  const interrupted = (): boolean => {
    if (!options.signal?.aborted) return false;
    log.warning('Interrupted; remaining steps skipped. Re-run to finish.');
    report = { ...report, interrupted: true, finished_at: now().toISOString() };
    return true;
  };

  report = transitionPhase(report, StopPhase.SIGNALING);

  // Step 1: application processes
  log.info('Stopping application processes...');
  const locator = await runLocatorPass(host, config.patterns);
  report = { ...report, locator };
  if (locator.nothing_to_do) {
    log.info('No application processes found');
  } else {
    for (const handle of locator.matched) {
      log.info(`  PID ${handle.pid} [${handle.category}] ${handle.command}`);
    }
    if (locator.signaled > 0) {
      log.success(`Sent SIGTERM to ${locator.signaled} process(es)`);
    }
  }
  for (const warning of locator.warnings) log.warning(warning);
  if (interrupted()) return report;

  // Step 2: ports
  log.info(`Reclaiming ports ${config.ports.join(', ')}...`);
  const ports = await reclaimPorts(host, config.ports);
  report = { ...report, ports };
  for (const binding of ports.bindings) {
    if (binding.status === 'free') {
      log.info(`Port ${binding.port} is already free`);
    } else if (binding.status === 'reclaimed') {
      log.success(`Port ${binding.port} cleared (PID ${binding.pids.join(', ')})`);
    } else {
      log.warning(`Could not clear port ${binding.port}`);
    }
  }
  for (const warning of ports.warnings) log.warning(warning);
  if (interrupted()) return report;

  // Step 3: database locks
  log.info('Checking database locks...');
  const locks = await clearLocks(host, config.embedded.db_path);
  report = { ...report, locks };
  if (!locks.file_present) {
    log.info(`No database file at ${config.embedded.db_path}; no lock to clear`);
  } else if (locks.holders.length === 0) {
    log.success('No database locks found');
  } else if (locks.remaining.length === 0) {
    log.success(`Database locks cleared (${locks.killed} process(es) killed)`);
  } else {
    log.warning(`Could not clear all database locks (${locks.remaining.length} holder(s) remain)`);
  }
  for (const warning of locks.warnings) log.warning(warning);
  if (interrupted()) return report;

  // Step 4: settle and verify
  report = transitionPhase(report, StopPhase.SETTLING);
  log.info(`Waiting ${config.settle_ms}ms for processes to terminate...`);
  const verification = await verifyShutdown(host, {
    patterns: config.patterns,
    dbPath: config.embedded.db_path,
    settleMs: config.settle_ms,
    sleep: options.sleep,
    probe: options.probe,
  });
  report = { ...report, verification };

  log.info('Verifying cleanup...');
  if (verification.scan_error) {
    log.warning(`Could not re-scan processes: ${verification.scan_error}`);
  } else if (verification.remaining.length === 0) {
    log.success('All processes stopped');
  } else {
    log.warning(`${verification.remaining.length} process(es) may still be running`);
  }

  if (verification.probe.status === 'ok') {
    log.success('Database is accessible (no locks)');
  } else if (verification.probe.status === 'missing') {
    log.info('No database file to probe');
  } else if (verification.probe.status === 'unreadable') {
    log.warning(`Database file is not readable (${verification.probe.message ?? 'unknown error'}); no lock, restore a backup to repair it`);
  } else {
    log.error(`Database may still be locked: ${verification.probe.message ?? 'unknown error'}`);
  }

  report = transitionPhase(report, isVerified(verification) ? StopPhase.VERIFIED : StopPhase.PARTIALLY_STOPPED);
  return { ...report, finished_at: now().toISOString() };
}
