import { stat } from 'node:fs/promises';
import { clearLocks, findLockHolders } from '../lib/lock_inspector.js';
import { probeDatabase } from '../lib/db_probe.js';
import { errnoCode } from '../lib/fs.js';
import { defaultSleep } from '../lib/verifier.js';
import { EXIT_INTERRUPTED, EXIT_OK, errorMessage, formatSize, type CommandContext } from './context.js';

export interface ClearLocksOptions {
  yes?: boolean;
}

/**
 * Interactive lock cleanup: show the database file, list its holders, kill
 * them after confirmation, then probe.
 */
export async function clearLocksCommand(ctx: CommandContext, options: ClearLocksOptions = {}): Promise<number> {
  const { log, config } = ctx;
  const dbPath = config.embedded.db_path;

  log.info(`Database file: ${dbPath}`);
  try {
    const stats = await stat(dbPath);
    log.info(`  size ${formatSize(stats.size)}, modified ${stats.mtime.toISOString()}`);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') throw error;
    log.info('Database file does not exist; nothing can hold a lock on it');
    return EXIT_OK;
  }

  const found = await findLockHolders(ctx.host, dbPath);
  for (const warning of found.warnings) log.warning(warning);
  if (found.holders.length === 0) {
    log.success('No processes are holding the database');
    return EXIT_OK;
  }

  let commands = new Map<number, string>();
  try {
    commands = new Map((await ctx.host.listProcesses()).map((row) => [row.pid, row.command]));
  } catch (error) {
    log.warning(`Could not read process command lines: ${errorMessage(error)}`);
  }

  log.warning(`${found.holders.length} process(es) holding the database:`);
  for (const holder of found.holders) {
    log.plain(`  PID ${holder.pid}  ${commands.get(holder.pid) ?? '?'}  (${holder.path})`);
  }

  if (!options.yes) {
    if (!ctx.interactive) {
      log.warning('Not killing anything without --yes in non-interactive mode');
      return EXIT_OK;
    }
    if (!(await ctx.confirm('Kill these processes?'))) {
      log.info('Left the processes running');
      return EXIT_OK;
    }
  }

  if (ctx.signal?.aborted) return EXIT_INTERRUPTED;

  const result = await clearLocks(ctx.host, dbPath);
  for (const warning of result.warnings) log.warning(warning);
  if (result.killed > 0) log.success(`Killed ${result.killed} process(es)`);

  if (config.settle_ms > 0) {
    await (ctx.sleep ?? defaultSleep)(config.settle_ms);
  }

  const probe = await (ctx.probe ?? probeDatabase)(dbPath);
  if (probe.status === 'locked') {
    log.error(`Database is still locked: ${probe.message ?? 'unknown error'}`);
  } else if (probe.status === 'unreadable') {
    log.warning(`Database file is not readable: ${probe.message ?? 'unknown error'}`);
  } else {
    log.success('Database is accessible (no locks)');
  }
  return EXIT_OK;
}
