import { Command, InvalidArgumentError } from "commander";
import { loadConfig, ConfigError } from "./lib/config.js";
import { createStepLogger } from "./lib/log.js";
import { BACKEND_KINDS, type BackendKind } from "./types/config.js";
import {
  createCommandContext,
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  errorMessage,
  type CommandContext,
} from "./commands/context.js";
import { CLI_NAME } from "./lib/branding.js";

const VERSION = "1.0.0";

interface RunOptions {
  /** Wire SIGINT/SIGTERM to an AbortSignal for the duration of the command */
  interruptible?: boolean;
}

function parseBackend(value: string): BackendKind {
  const match = BACKEND_KINDS.find((kind) => kind === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${BACKEND_KINDS.join(", ")}`);
  }
  return match;
}

/**
 * Loads the config, builds the context and runs `body`. Sets process.exitCode;
 * no error escapes.
 */
async function runWithContext(
  configPath: string | undefined,
  body: (ctx: CommandContext) => Promise<number>,
  options: RunOptions = {}
): Promise<void> {
  const log = createStepLogger();

  let ctx: CommandContext;
  try {
    const config = await loadConfig({ configPath });
    ctx = createCommandContext(config, { log });
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(`Configuration error: ${error.message}`);
    } else {
      log.error(errorMessage(error));
    }
    process.exitCode = EXIT_FAILURE;
    return;
  }

  if (!options.interruptible) {
    try {
      process.exitCode = await body(ctx);
    } catch (error) {
      log.error(errorMessage(error));
      process.exitCode = EXIT_FAILURE;
    }
    return;
  }

  // Set up interrupt handling
  const abortController = new AbortController();
  let signalCount = 0;

  const signalHandler = (signal: string) => {
    signalCount++;
    if (signalCount === 1) {
      log.warning(`${signal} received, finishing the current step...`);
      abortController.abort();
    } else {
      log.error("Force exit");
      process.exit(EXIT_INTERRUPTED);
    }
  };
  const sigintHandler = () => signalHandler("SIGINT");
  const sigtermHandler = () => signalHandler("SIGTERM");

  process.on("SIGINT", sigintHandler);
  process.on("SIGTERM", sigtermHandler);
  try {
    process.exitCode = await body({ ...ctx, signal: abortController.signal });
  } catch (error) {
    log.error(errorMessage(error));
    process.exitCode = EXIT_FAILURE;
  } finally {
    process.off("SIGINT", sigintHandler);
    process.off("SIGTERM", sigtermHandler);
  }
}

export function createProgram(): Command {
  const program = new Command();

  // Global config option
  let globalConfigPath: string | undefined;

  program
    .name(CLI_NAME)
    .description("Stop, back up and roll back a local application stack")
    .version(VERSION)
    .option("-c, --config <path>", "Path to configuration file")
    .hook("preAction", (thisCommand) => {
      const opts: { config?: string } = thisCommand.opts();
      globalConfigPath = opts.config;
    });

  program
    .command("stop-all")
    .description("Stop application processes, free ports, clear database locks and verify")
    .action(async () => {
      const { stopAllCommand } = await import("./commands/stop-all.js");
      await runWithContext(globalConfigPath, stopAllCommand, { interruptible: true });
    });

  program
    .command("clear-locks")
    .description("Find and kill processes holding the embedded database file")
    .option("-y, --yes", "Kill without asking")
    .action(async (options: { yes?: boolean }) => {
      const { clearLocksCommand } = await import("./commands/clear-locks.js");
      await runWithContext(globalConfigPath, (ctx) => clearLocksCommand(ctx, { yes: options.yes }), {
        interruptible: true,
      });
    });

  program
    .command("backup-embedded")
    .description("Copy the embedded database file into the backup directory")
    .action(async () => {
      const { backupCommand } = await import("./commands/backup.js");
      await runWithContext(globalConfigPath, (ctx) => backupCommand(ctx, "embedded"));
    });

  program
    .command("backup-server-backend")
    .description("Export the server database with pg_dump into the backup directory")
    .action(async () => {
      const { backupCommand } = await import("./commands/backup.js");
      await runWithContext(globalConfigPath, (ctx) => backupCommand(ctx, "server"));
    });

  program
    .command("rollback-to-embedded")
    .description("Stop the stack, restore the latest embedded backup and select the embedded backend")
    .action(async () => {
      const { rollbackCommand } = await import("./commands/rollback.js");
      await runWithContext(globalConfigPath, (ctx) => rollbackCommand(ctx, "embedded"), { interruptible: true });
    });

  program
    .command("rollback-to-server")
    .description("Stop the stack, restore the latest server backup and select the server backend")
    .action(async () => {
      const { rollbackCommand } = await import("./commands/rollback.js");
      await runWithContext(globalConfigPath, (ctx) => rollbackCommand(ctx, "server"), { interruptible: true });
    });

  program
    .command("select-backend <backend>")
    .description("Set the active backend without moving any data (embedded or server)")
    .action(async (backend: string) => {
      const { selectBackendCommand } = await import("./commands/select-backend.js");
      await runWithContext(globalConfigPath, (ctx) => selectBackendCommand(ctx, backend));
    });

  program
    .command("list-backups")
    .description("List backups, newest first")
    .option("--backend <backend>", "Only this backend (embedded or server)", parseBackend)
    .option("--json", "Output in JSON format")
    .action(async (options: { backend?: BackendKind; json?: boolean }) => {
      const { listBackupsCommand } = await import("./commands/list-backups.js");
      await runWithContext(globalConfigPath, (ctx) => listBackupsCommand(ctx, options));
    });

  program
    .command("prune-backups")
    .description("Delete all but the newest backups of each backend")
    .requiredOption("--keep <n>", "Number of backups to keep per backend")
    .option("--backend <backend>", "Only this backend (embedded or server)", parseBackend)
    .action(async (options: { keep: string; backend?: BackendKind }) => {
      const { pruneBackupsCommand } = await import("./commands/prune-backups.js");
      await runWithContext(globalConfigPath, (ctx) => pruneBackupsCommand(ctx, options));
    });

  program
    .command("status")
    .description("Show processes, ports, database locks and the active backend without changing anything")
    .option("--json", "Output in JSON format")
    .action(async (options: { json?: boolean }) => {
      const { statusCommand } = await import("./commands/status.js");
      await runWithContext(globalConfigPath, (ctx) => statusCommand(ctx, options));
    });

  program
    .command("doctor")
    .description("Check that ps, lsof, pg_dump and psql can be executed")
    .action(async () => {
      const { doctorCommand } = await import("./commands/doctor.js");
      await runWithContext(globalConfigPath, doctorCommand);
    });

  return program;
}

/**
 * Runs the program on `args` (without the node and script entries).
 */
export async function main(args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: "user" });
}
