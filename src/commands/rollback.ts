import { rollback, RollbackError } from '../lib/rollback.js';
import { RestoreError, SchemaMismatchError } from '../lib/backup.js';
import { SelectionConflictError } from '../lib/selection.js';
import type { BackendKind } from '../types/config.js';
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, errorMessage, type CommandContext } from './context.js';

export async function rollbackCommand(ctx: CommandContext, target: BackendKind): Promise<number> {
  const { log } = ctx;
  log.info(`Rolling back to the ${target} backend...`);

  try {
    await rollback(ctx.config, target, {
      host: ctx.host,
      log,
      run: ctx.run,
      signal: ctx.signal,
      sleep: ctx.sleep,
      probe: ctx.probe,
      now: ctx.now,
    });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof RollbackError) {
      log.error(error.message);
      return error.report?.interrupted ? EXIT_INTERRUPTED : EXIT_FAILURE;
    }
    if (error instanceof SchemaMismatchError) {
      log.error(error.message);
      return EXIT_FAILURE;
    }
    if (error instanceof RestoreError) {
      log.error(error.message);
      log.warning('The backend selection was not changed');
      return EXIT_FAILURE;
    }
    if (error instanceof SelectionConflictError) {
      log.error(`Data was restored but the backend selection was not written: ${error.message}`);
      return EXIT_FAILURE;
    }
    log.error(`Rollback failed: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
}
