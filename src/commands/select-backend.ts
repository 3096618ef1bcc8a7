import { readBackendSelection, writeBackendSelection } from '../lib/selection.js';
import { BACKEND_KINDS, type BackendKind } from '../types/config.js';
import { EXIT_FAILURE, EXIT_OK, errorMessage, type CommandContext } from './context.js';

function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

/**
 * Sets the active backend by hand. No data is moved.
 */
export async function selectBackendCommand(ctx: CommandContext, backend: string): Promise<number> {
  const { log, config } = ctx;
  if (!isBackendKind(backend)) {
    log.error(`Unknown backend '${backend}'. Expected one of: ${BACKEND_KINDS.join(', ')}`);
    return EXIT_FAILURE;
  }

  try {
    const current = await readBackendSelection(config);
    if (current.version > 0 && current.backend === backend) {
      log.info(`Active backend is already ${backend} (selection version ${current.version})`);
      return EXIT_OK;
    }
    const next = await writeBackendSelection(config, {
      backend,
      updated_by: 'operator',
      expectedVersion: current.version,
      now: ctx.now?.(),
    });
    log.success(`Active backend is now ${next.backend} (selection version ${next.version})`);
    log.info('Restart the application to pick up the change.');
    return EXIT_OK;
  } catch (error) {
    log.error(errorMessage(error));
    return EXIT_FAILURE;
  }
}
