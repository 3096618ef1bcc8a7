import { locateProcesses } from '../lib/process_locator.js';
import { findLockHolders } from '../lib/lock_inspector.js';
import { probeDatabase } from '../lib/db_probe.js';
import { readBackendSelection } from '../lib/selection.js';
import { latestArtifact } from '../lib/artifacts.js';
import { BACKEND_KINDS, type BackendKind } from '../types/config.js';
import type { BackendSelection } from '../types/backup.js';
import type { LockHolder, PidLookup, ProcessHandle } from '../types/process.js';
import type { ProbeResult } from '../types/stop.js';
import { EXIT_OK, errorMessage, type CommandContext } from './context.js';

export interface StatusReport {
  system_name: string;
  config_path: string | null;
  selection: BackendSelection | null;
  processes: ProcessHandle[];
  ports: Array<{ port: number; pids: number[] }>;
  database: {
    path: string;
    present: boolean;
    holders: LockHolder[];
    probe: ProbeResult;
  };
  latest_backups: Record<BackendKind, string | null>;
  warnings: string[];
}

/**
 * Collects the status report. Read-only: nothing is signaled or written.
 */
export async function collectStatus(ctx: CommandContext): Promise<StatusReport> {
  const { config, host } = ctx;
  const warnings: string[] = [];

  let selection: BackendSelection | null = null;
  try {
    selection = await readBackendSelection(config);
  } catch (error) {
    warnings.push(errorMessage(error));
  }

  let processes: ProcessHandle[] = [];
  try {
    processes = await locateProcesses(host, config.patterns);
  } catch (error) {
    warnings.push(errorMessage(error));
  }

  const ports: StatusReport['ports'] = [];
  for (const port of config.ports) {
    const lookup: PidLookup = await host.findListeners(port);
    if (lookup.warning) warnings.push(lookup.warning);
    ports.push({ port, pids: lookup.pids });
  }

  const locks = await findLockHolders(host, config.embedded.db_path);
  warnings.push(...locks.warnings);
  const probe = await (ctx.probe ?? probeDatabase)(config.embedded.db_path);

  const latest: Record<BackendKind, string | null> = { embedded: null, server: null };
  for (const kind of BACKEND_KINDS) {
    latest[kind] = (await latestArtifact(config.backup_dir, config.system_name, kind))?.file ?? null;
  }

  return {
    system_name: config.system_name,
    config_path: config.config_path,
    selection,
    processes,
    ports,
    database: { path: config.embedded.db_path, present: locks.file_present, holders: locks.holders, probe },
    latest_backups: latest,
    warnings,
  };
}

export async function statusCommand(ctx: CommandContext, options: { json?: boolean } = {}): Promise<number> {
  const report = await collectStatus(ctx);
  if (options.json) {
    ctx.print(JSON.stringify(report, null, 2));
    return EXIT_OK;
  }

  const { log } = ctx;
  log.plain(`${report.system_name} status`);
  log.plain(`  config: ${report.config_path ?? '(defaults)'}`);
  if (report.selection) {
    const version = report.selection.version === 0 ? 'default, never written' : `version ${report.selection.version}`;
    log.plain(`  active backend: ${report.selection.backend} (${version})`);
  }

  if (report.processes.length === 0) {
    log.plain('  processes: none running');
  } else {
    log.plain(`  processes: ${report.processes.length}`);
    for (const handle of report.processes) {
      log.plain(`    PID ${handle.pid} [${handle.category}] ${handle.command}`);
    }
  }

  for (const binding of report.ports) {
    const state = binding.pids.length === 0 ? 'free' : `in use by PID ${binding.pids.join(', ')}`;
    log.plain(`  port ${binding.port}: ${state}`);
  }

  const db = report.database;
  if (!db.present) {
    log.plain(`  database: ${db.path} (missing)`);
  } else {
    const holders = db.holders.length === 0 ? 'no holders' : `held by PID ${db.holders.map((h) => h.pid).join(', ')}`;
    log.plain(`  database: ${db.path} (${holders}, probe ${db.probe.status})`);
  }

  for (const kind of BACKEND_KINDS) {
    log.plain(`  latest ${kind} backup: ${report.latest_backups[kind] ?? 'none'}`);
  }

  for (const warning of report.warnings) log.warning(warning);
  return EXIT_OK;
}
