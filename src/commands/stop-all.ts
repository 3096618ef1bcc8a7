import { runStopSequence, wasNothingToDo } from '../runner/stop.js';
import { StopPhase } from '../types/stop.js';
import { EXIT_INTERRUPTED, EXIT_OK, type CommandContext } from './context.js';

/**
 * Runs one stop pass. Partial stops are warnings, never failures: the
 * operator re-runs the command.
 */
export async function stopAllCommand(ctx: CommandContext): Promise<number> {
  const { log } = ctx;
  log.info(`Stopping ${ctx.config.system_name} application stack...`);

  const report = await runStopSequence(ctx.config, ctx.host, log, {
    signal: ctx.signal,
    sleep: ctx.sleep,
    probe: ctx.probe,
    now: ctx.now,
  });

  if (report.interrupted) {
    return EXIT_INTERRUPTED;
  }

  if (report.phase === StopPhase.VERIFIED && wasNothingToDo(report)) {
    log.success('Nothing to do: the application stack was already stopped');
  } else if (report.phase === StopPhase.VERIFIED) {
    log.success('Application stack stopped');
  } else {
    log.warning('Stack only partially stopped; re-run stop-all to retry');
  }
  log.info('Start the application again when ready (e.g. npm run dev)');
  return EXIT_OK;
}
