import { runDoctor } from '../lib/doctor.js';
import { readBackendSelection } from '../lib/selection.js';
import type { BackendKind } from '../types/config.js';
import { EXIT_FAILURE, EXIT_OK, errorMessage, type CommandContext } from './context.js';

export async function doctorCommand(ctx: CommandContext): Promise<number> {
  const { log, config } = ctx;

  let active: BackendKind = config.default_backend;
  try {
    active = (await readBackendSelection(config)).backend;
  } catch (error) {
    log.warning(`${errorMessage(error)}; assuming ${active}`);
  }

  log.info(`Config: ${config.config_path ?? '(defaults)'}`);
  log.info(`Active backend: ${active}`);

  const report = await runDoctor(config, active, ctx.run);
  for (const check of report.checks) {
    if (check.available) {
      log.success(`${check.name}: ${check.version ?? 'available'}`);
    } else if (check.required) {
      log.error(`${check.name}: ${check.details ?? 'not available'}`);
    } else {
      log.warning(`${check.name}: ${check.details ?? 'not available'} (needed for the server backend)`);
    }
  }

  return report.ok ? EXIT_OK : EXIT_FAILURE;
}
