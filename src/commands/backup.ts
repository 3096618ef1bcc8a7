import { BackupError, connectionLabel, createBackup } from '../lib/backup.js';
import type { BackendKind } from '../types/config.js';
import { EXIT_FAILURE, EXIT_OK, errorMessage, formatSize, type CommandContext } from './context.js';

export async function backupCommand(ctx: CommandContext, backend: BackendKind): Promise<number> {
  const { log, config } = ctx;
  const source = backend === 'embedded' ? config.embedded.db_path : connectionLabel(config.server);
  log.info(`Backing up ${backend} database ${source}...`);

  try {
    const result = await createBackup({ config, run: ctx.run, now: ctx.now }, backend);
    for (const path of result.cleaned) log.info(`Removed stale temp file ${path}`);
    log.success(`Backup created: ${result.artifact.path}`);
    log.info(`Backup size: ${formatSize(result.artifact.size)}`);
    if (result.manifest.schema_version !== undefined) {
      log.info(`Schema version: ${result.manifest.schema_version}`);
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof BackupError) {
      log.error(error.message);
      return EXIT_FAILURE;
    }
    log.error(`Backup failed: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
}
