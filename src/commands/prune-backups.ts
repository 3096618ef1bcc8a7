import { relative } from 'node:path';
import { pruneBackups } from '../lib/backup.js';
import type { BackendKind } from '../types/config.js';
import { EXIT_FAILURE, EXIT_OK, type CommandContext } from './context.js';

export interface PruneBackupsOptions {
  /** Raw `--keep` value */
  keep: string;
  backend?: BackendKind;
}

export async function pruneBackupsCommand(ctx: CommandContext, options: PruneBackupsOptions): Promise<number> {
  const { log, config } = ctx;
  const raw = options.keep.trim();
  if (!/^\d+$/.test(raw) || Number.parseInt(raw, 10) < 1) {
    log.error(`--keep must be a positive integer, got '${options.keep}'`);
    return EXIT_FAILURE;
  }
  const keep = Number.parseInt(raw, 10);

  const result = await pruneBackups(config, keep, options.backend);
  for (const path of result.removed) {
    log.info(`Removed ${relative(config.backup_dir, path)}`);
  }
  log.success(`Kept ${result.kept.length} backup(s), removed ${result.removed.length}`);
  return EXIT_OK;
}
