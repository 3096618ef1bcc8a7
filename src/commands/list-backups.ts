import { listArtifacts } from '../lib/artifacts.js';
import type { BackendKind } from '../types/config.js';
import { EXIT_OK, formatSize, type CommandContext } from './context.js';

export interface ListBackupsOptions {
  json?: boolean;
  backend?: BackendKind;
}

export async function listBackupsCommand(ctx: CommandContext, options: ListBackupsOptions = {}): Promise<number> {
  const { config } = ctx;
  const artifacts = await listArtifacts(config.backup_dir, config.system_name, options.backend);

  if (options.json) {
    ctx.print(
      JSON.stringify(
        artifacts.map((artifact) => ({
          backend: artifact.backend,
          file: artifact.file,
          path: artifact.path,
          created_at: artifact.created_at.toISOString(),
          size: artifact.size,
          sha256: artifact.manifest?.sha256 ?? null,
          schema_version: artifact.manifest?.schema_version ?? null,
        })),
        null,
        2
      )
    );
    return EXIT_OK;
  }

  if (artifacts.length === 0) {
    ctx.log.info(`No backups in ${config.backup_dir}`);
    return EXIT_OK;
  }

  ctx.log.info(`Backups in ${config.backup_dir} (newest first):`);
  for (const artifact of artifacts) {
    const note = artifact.manifest ? '' : '  (no manifest)';
    ctx.log.plain(
      `  ${artifact.backend.padEnd(8)}  ${artifact.created_at.toISOString()}  ${formatSize(artifact.size).padStart(6)}  ${artifact.file}${note}`
    );
  }
  return EXIT_OK;
}
