/**
 * Rollback Coordinator: stop the stack, restore the latest artifact of the
 * target backend, flip the backend selection.
 *
 * Everything that can be checked without side effects (selection record,
 * artifact presence, artifact integrity) is checked before anything is
 * stopped. Nothing is overwritten unless the stop sequence left the database
 * free. The application is never restarted here.
 */

import { latestArtifact, verifyArtifact } from './artifacts.js';
import { restoreBackup, type RestoreResult } from './backup.js';
import { readBackendSelection, writeBackendSelection } from './selection.js';
import type { CommandRunner } from './exec.js';
import type { StepLogger } from './log.js';
import { runStopSequence, type StopOptions } from '../runner/stop.js';
import type { BackendKind, StackConfig } from '../types/config.js';
import type { ProcessHost } from '../types/process.js';
import type { BackendSelection, BackupArtifact } from '../types/backup.js';
import type { StopReport } from '../types/stop.js';

export type RollbackStage = 'selection' | 'locate' | 'verify' | 'stop' | 'precondition';

/**
 * Error thrown when a rollback precondition fails. Nothing has been
 * overwritten when this is thrown.
 */
export class RollbackError extends Error {
  constructor(
    message: string,
    public readonly target: BackendKind,
    public readonly stage: RollbackStage,
    public readonly report?: StopReport
  ) {
    super(message);
    this.name = 'RollbackError';
  }
}

export interface RollbackOptions extends StopOptions {
  host: ProcessHost;
  log: StepLogger;
  run?: CommandRunner;
}

export interface RollbackOutcome {
  target: BackendKind;
  artifact: BackupArtifact;
  stop: StopReport;
  restore: RestoreResult;
  selection: BackendSelection;
}

/**
 * Reasons the stop sequence did not leave a safe state to overwrite, or an
 * empty list when it did.
 */
export function unmetPreconditions(report: StopReport): string[] {
  const reasons: string[] = [];
  if (report.interrupted) {
    reasons.push('the stop sequence was interrupted');
  }
  const failedPorts = report.ports?.bindings.filter((binding) => binding.status === 'failed') ?? [];
  if (failedPorts.length > 0) {
    reasons.push(`port(s) ${failedPorts.map((binding) => binding.port).join(', ')} could not be reclaimed`);
  }
  const holders = report.locks?.remaining ?? [];
  if (holders.length > 0) {
    reasons.push(`PID(s) ${holders.map((holder) => holder.pid).join(', ')} still hold the database file`);
  }
  if (report.verification?.probe.status === 'locked') {
    reasons.push(`the database is still locked (${report.verification.probe.message ?? 'no detail'})`);
  }
  return reasons;
}

/**
 * Rolls the stack back to `target`.
 *
 * @throws {RollbackError} If a precondition fails (nothing overwritten)
 * @throws {SchemaMismatchError} If the embedded artifact is older than the live schema
 * @throws {RestoreError} If the restore itself fails
 * @throws {SelectionConflictError} If the selection record changed during the rollback
 */
export async function rollback(
  config: StackConfig,
  target: BackendKind,
  options: RollbackOptions
): Promise<RollbackOutcome> {
  const { log } = options;

  let selection: BackendSelection;
  try {
    selection = await readBackendSelection(config);
  } catch (error) {
    throw new RollbackError(error instanceof Error ? error.message : String(error), target, 'selection');
  }

  log.info(`Looking for the latest ${target} backup in ${config.backup_dir}...`);
  const artifact = await latestArtifact(config.backup_dir, config.system_name, target);
  if (!artifact) {
    throw new RollbackError(`No ${target} backup found in ${config.backup_dir}`, target, 'locate');
  }
  log.info(`Using ${artifact.file} (${artifact.size} bytes)`);

  const check = await verifyArtifact(artifact.path);
  if (!check.ok) {
    throw new RollbackError(`Backup ${artifact.file} failed verification: ${check.problems.join('; ')}`, target, 'verify');
  }
  if (check.checked) {
    log.success('Backup matches its manifest');
  } else {
    log.warning(`No manifest for ${artifact.file}; integrity not verified`);
  }

  log.info('Stopping application...');
  const report = await runStopSequence(config, options.host, log, options);

  const reasons = unmetPreconditions(report);
  if (reasons.length > 0) {
    throw new RollbackError(
      `Not safe to restore: ${reasons.join('; ')}. Nothing was overwritten.`,
      target,
      reasons.length === 1 && report.interrupted ? 'stop' : 'precondition',
      report
    );
  }

  log.info(`Restoring ${artifact.file}...`);
  const restore = await restoreBackup({ config, run: options.run, now: options.now }, artifact);
  for (const sidecar of restore.removed_sidecars) {
    log.info(`Removed stale ${sidecar}`);
  }
  log.success(`Restored ${restore.target}`);

  const next = await writeBackendSelection(config, {
    backend: target,
    updated_by: 'rollback',
    expectedVersion: selection.version,
    now: options.now?.(),
  });
  log.success(`Active backend is now ${next.backend} (selection version ${next.version})`);
  log.info('Restart the application to pick up the change.');

  return { target, artifact, stop: report, restore, selection: next };
}
